import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from './app.module.js';
import { ContentLoaderService } from './content/content-loader.service.js';
import { SelectionFlowService } from './engine/selection/selection-flow.service.js';
import { InputRouterService } from './engine/input/input-router.service.js';
import {
  FakeHand,
  FakePhaseAuthority,
  RecordingSink,
  makeCard,
  makeNPC,
  makePC,
  makeZone,
} from './testing/combat-fakes.js';

describe('AppModule', () => {
  let app: INestApplicationContext;

  beforeAll(async () => {
    app = await NestFactory.createApplicationContext(AppModule, { logger: false });
  });

  afterAll(async () => {
    await app.close();
  });

  it('초기화 시 행동 카탈로그 로드', () => {
    const content = app.get(ContentLoaderService);
    expect(content.getActions()).toHaveLength(27);
  });

  it('DI로 구성한 흐름: 카드 → 근접 → 대상 클릭 → 제출', () => {
    const hero = makePC('hero', { name: 'Hero', zone: 'near' });
    const goblin = makeNPC('goblin', { name: 'Goblin', zone: 'near' });
    const ace = makeCard('Ace of Swords', 1, 'swords');

    const phase = new FakePhaseAuthority();
    phase.activeEntity = hero;
    phase.pcs = [hero];
    phase.npcs = [goblin];
    phase.zones = [makeZone('near')];
    const hand = new FakeHand().deal(hero, [ace]);
    const sink = new RecordingSink();

    const flow = app
      .get(SelectionFlowService)
      .create({ phase, hand, adjacency: null, layout: null, sink });
    const router = app.get(InputRouterService);

    router.dispatch(flow, { type: 'key_pressed', key: 'q' });
    router.dispatch(flow, { type: 'action_selected', actionId: 'melee' });
    router.dispatch(flow, { type: 'entity_clicked', entityId: 'goblin' });

    expect(phase.submitted).toHaveLength(1);
    expect(phase.submitted[0]).toMatchObject({ actor: hero, target: goblin, type: 'melee' });
    expect(hand.getHand(hero)).toEqual([]);
    expect(sink.kinds()).toEqual([
      'CARD_SELECTED',
      'NOTICE',
      'NOTICE',
      'ACTION_SUBMITTED',
      'NOTICE',
      'CARD_DESELECTED',
    ]);
  });
});
