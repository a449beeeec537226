import { Logger } from '@nestjs/common';
import { InitiativeService, type InitiativeContext } from './initiative.service.js';
import { FlowOutput } from '../selection/flow-output.js';
import { loadCombatConfig } from '../../config/combat-config.service.js';
import type { FlowEvent } from '../../types/index.js';
import {
  FakeHand,
  FakeLayout,
  FakePhaseAuthority,
  RecordingSink,
  makeCard,
  makePC,
  noticeCodes,
} from '../../testing/combat-fakes.js';

describe('InitiativeService', () => {
  const service = new InitiativeService();

  const fighter = makePC('fighter', { name: 'Fighter' });
  const rogue = makePC('rogue', { name: 'Rogue' });
  const mage = makePC('mage', { name: 'Mage' });
  const priest = makePC('priest', { name: 'Priest' });

  const c = (name: string, value: number) => makeCard(name, value, 'pentacles');

  let phase: FakePhaseAuthority;
  let hand: FakeHand;
  let sink: RecordingSink;
  let ctx: InitiativeContext;

  function drain(): FlowEvent[] {
    return ctx.out.drain();
  }

  beforeEach(() => {
    phase = new FakePhaseAuthority();
    phase.phase = 'pre_round';
    phase.pcs = [fighter, rogue, mage, priest];
    phase.awaitingInitiative = new Set(['fighter', 'rogue', 'mage', 'priest']);

    hand = new FakeHand()
      .deal(fighter, [c('Two of Coins', 2), c('Nine of Coins', 9)])
      .deal(rogue, [c('Five of Coins', 5)])
      .deal(mage, [])
      .deal(priest, [c('Knight of Coins', 12), c('Ace of Coins', 1)]);

    sink = new RecordingSink();
    ctx = {
      phase,
      hand,
      layout: new FakeLayout(hand).addPlate(rogue, 0, 0),
      out: new FlowOutput(sink, new Logger('InitiativeServiceTest')),
      config: loadCombatConfig({}),
    };
  });

  describe('submitAllPending', () => {
    it('로스터 순서대로 첫 카드 제출, 빈 손패는 건너뜀', () => {
      const submitted = service.submitAllPending(ctx);

      expect(submitted).toBe(3);
      expect(phase.initiatives).toEqual([
        { entityId: 'fighter', card: c('Two of Coins', 2) },
        { entityId: 'rogue', card: c('Five of Coins', 5) },
        { entityId: 'priest', card: c('Knight of Coins', 12) },
      ]);
      expect(drain()).toEqual([
        { kind: 'INITIATIVE_SUBMITTED', entityId: 'fighter' },
        { kind: 'INITIATIVE_SUBMITTED', entityId: 'rogue' },
        { kind: 'INITIATIVE_SUBMITTED', entityId: 'priest' },
      ]);
      expect(phase.isAwaitingInitiative('mage')).toBe(true);
      expect(hand.getHand(fighter)).toEqual([c('Nine of Coins', 9)]);
      expect(hand.getSelectedPC()).toBeNull();
    });

    it('이미 제출한 PC는 건너뜀', () => {
      phase.awaitingInitiative.delete('fighter');
      service.submitAllPending(ctx);

      expect(phase.initiatives.map((i) => i.entityId)).toEqual(['rogue', 'priest']);
      expect(hand.getHand(fighter)).toHaveLength(2);
    });

    it('space 키 = 일괄 제출', () => {
      expect(service.handleKey('space', ctx)).toBe(true);
      expect(phase.initiatives).toHaveLength(3);
    });
  });

  describe('handleKey', () => {
    it('숫자키 → PC 선택 + 카드 목록', () => {
      expect(service.handleKey('1', ctx)).toBe(true);

      expect(hand.getSelectedPC()).toBe(fighter);
      expect(drain()).toEqual([
        {
          kind: 'NOTICE',
          code: 'INITIATIVE_SELECT_CARD',
          text: 'Select a card for Fighter (Q/W/E/R)',
          lines: ['Q: Two of Coins (2)', 'W: Nine of Coins (9)'],
        },
      ]);
    });

    it('선택 후 W → 두 번째 카드 제출, 선택 해제', () => {
      service.handleKey('1', ctx);
      drain();
      service.handleKey('w', ctx);

      expect(phase.initiatives).toEqual([{ entityId: 'fighter', card: c('Nine of Coins', 9) }]);
      expect(hand.initiativeCards.get('fighter')).toEqual(c('Nine of Coins', 9));
      expect(hand.getSelectedPC()).toBeNull();
      expect(drain()).toEqual([{ kind: 'INITIATIVE_SUBMITTED', entityId: 'fighter' }]);
    });

    it('없는 위치 → 잘못된 카드 안내', () => {
      service.handleKey('2', ctx);
      drain();
      expect(service.handleKey('e', ctx)).toBe(true);

      expect(noticeCodes(drain())).toEqual(['INITIATIVE_INVALID_CARD']);
      expect(phase.initiatives).toEqual([]);
      expect(hand.getSelectedPC()).toBe(rogue);
    });

    it('손패 없는 PC → 안내', () => {
      service.handleKey('3', ctx);
      expect(drain()).toEqual([
        { kind: 'NOTICE', code: 'INITIATIVE_NO_CARDS', text: 'Mage has no cards!' },
      ]);
      expect(hand.getSelectedPC()).toBeNull();
    });

    it('이미 제출한 PC → 안내', () => {
      phase.awaitingInitiative.delete('priest');
      service.handleKey('4', ctx);

      expect(noticeCodes(drain())).toEqual(['INITIATIVE_ALREADY_SUBMITTED']);
    });

    it('escape → 선택 해제', () => {
      service.handleKey('1', ctx);
      expect(service.handleKey('escape', ctx)).toBe(true);
      expect(hand.getSelectedPC()).toBeNull();
    });

    it('파티 슬롯 밖 숫자키 → 처리 안 함', () => {
      expect(service.handleKey('5', ctx)).toBe(false);
    });

    it('phase가 거절 → 안내', () => {
      phase.awaitingInitiative.delete('rogue');
      hand.selectPC(rogue);

      // 대기 중이 아닌 PC의 카드 키는 무시
      expect(service.handleKey('q', ctx)).toBe(false);

      const result = service.submitCard(rogue, 0, ctx);
      expect(result).toBe(false);
      expect(drain()).toEqual([
        {
          kind: 'NOTICE',
          code: 'INITIATIVE_REJECTED',
          text: 'Initiative submit failed for Rogue: already_submitted',
        },
      ]);
    });
  });

  describe('handlePointer', () => {
    it('플레이트 클릭 → PC 선택, 카드 클릭 → 제출', () => {
      expect(service.handlePointer(10, 10, ctx)).toBe(true);
      expect(hand.getSelectedPC()).toBe(rogue);
      expect(drain()).toEqual([
        {
          kind: 'NOTICE',
          code: 'INITIATIVE_SELECT_CARD',
          text: 'Select a card for Rogue (Q/W/E/R or click)',
        },
      ]);

      expect(service.handlePointer(40, 520, ctx)).toBe(true);
      expect(phase.initiatives).toEqual([{ entityId: 'rogue', card: c('Five of Coins', 5) }]);
    });

    it('LayoutProbe 없음 → 처리 안 함', () => {
      ctx.layout = null;
      expect(service.handlePointer(10, 10, ctx)).toBe(false);
    });

    it('sink도 같은 이벤트를 받는다', () => {
      service.submitAllPending(ctx);
      expect(sink.kinds()).toEqual([
        'INITIATIVE_SUBMITTED',
        'INITIATIVE_SUBMITTED',
        'INITIATIVE_SUBMITTED',
      ]);
    });
  });
});
