import { HandLayoutService } from './hand-layout.service.js';
import { CombatConfigService } from '../../config/combat-config.service.js';
import { FakeHand, makeCard, makePC } from '../../testing/combat-fakes.js';

describe('HandLayoutService', () => {
  const viewport = { width: 800, height: 600 };
  let service: HandLayoutService;

  beforeEach(() => {
    service = new HandLayoutService(new CombatConfigService());
  });

  it('3장 → 가운데 정렬, 하단 여백 70', () => {
    expect(service.cardRects(3, viewport)).toEqual([
      { x: 230, y: 390, width: 100, height: 140 },
      { x: 350, y: 390, width: 100, height: 140 },
      { x: 470, y: 390, width: 100, height: 140 },
    ]);
  });

  it('카드 안 / 경계 / 사이 간격', () => {
    expect(service.cardIndexAt(280, 450, 3, 3, viewport)).toBe(0);
    expect(service.cardIndexAt(350, 390, 3, 3, viewport)).toBe(1);
    expect(service.cardIndexAt(570, 530, 3, 3, viewport)).toBe(2);
    expect(service.cardIndexAt(340, 450, 3, 3, viewport)).toBeNull();
    expect(service.cardIndexAt(280, 389, 3, 3, viewport)).toBeNull();
  });

  it('maxCards 밖의 카드는 판정하지 않음', () => {
    expect(service.cardIndexAt(500, 450, 3, 2, viewport)).toBeNull();
  });

  it('빈 손패 → null', () => {
    expect(service.cardRects(0, viewport)).toEqual([]);
    expect(service.cardIndexAt(400, 450, 0, 3, viewport)).toBeNull();
  });

  it('createProbe → 손패 장수와 플레이트 위치 반영', () => {
    const hero = makePC('hero');
    const hand = new FakeHand().deal(hero, [
      makeCard('Ace of Swords', 1),
      makeCard('Two of Swords', 2),
    ]);
    const probe = service.createProbe({
      hand,
      viewport: () => viewport,
      plates: () => [{ entity: hero, x: 10, y: 10, width: 180, height: 60 }],
    });

    // 2장: totalWidth 220 → startX 290
    expect(probe.handCardIndexAt(300, 400, hero, 3)).toBe(0);
    expect(probe.handCardIndexAt(420, 400, hero, 3)).toBe(1);
    expect(probe.plateAt(100, 40)).toBe(hero);
    expect(probe.plateAt(100, 80)).toBeNull();
  });
});
