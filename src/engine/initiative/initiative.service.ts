// 이니셔티브 제출: pre_round 단계 전용 입력 처리

import { Injectable } from '@nestjs/common';
import type {
  CombatEntity,
  HandAuthority,
  LayoutProbe,
  PhaseAuthority,
} from '../../types/index.js';
import type { CombatConfig } from '../../config/combat-config.service.js';
import type { FlowOutput } from '../selection/flow-output.js';
import {
  cardKeyLabel,
  cardKeyRange,
  cardSlotForKey,
  numberForKey,
} from '../input/input-keys.js';

export interface InitiativeContext {
  phase: PhaseAuthority;
  hand: HandAuthority;
  layout: LayoutProbe | null;
  out: FlowOutput;
  config: CombatConfig;
}

@Injectable()
export class InitiativeService {
  /**
   * 키 입력
   * - 선택된 PC가 대기 중: Q/W/E/R 제출, escape 선택 해제
   * - 숫자키: 파티 슬롯의 PC 선택
   * - space: 대기 중인 전원 일괄 제출
   */
  handleKey(key: string, ctx: InitiativeContext): boolean {
    const { phase, hand, config } = ctx;
    const selected = hand.getSelectedPC();

    if (selected && phase.isAwaitingInitiative(selected.id)) {
      const slot = cardSlotForKey(key, config.initiativeHandSlots);
      if (slot !== null) {
        this.submitCard(selected, slot, ctx);
        return true;
      }
      if (key === 'escape') {
        hand.clearSelection();
        return true;
      }
    }

    const slotNumber = numberForKey(key);
    if (slotNumber !== null && slotNumber <= config.partyKeySlots) {
      const pc = phase.getPcs()[slotNumber - 1];
      if (!pc) return false;
      this.selectPC(pc, ctx);
      return true;
    }

    if (key === 'space') {
      this.submitAllPending(ctx);
      return true;
    }

    return false;
  }

  /** 플레이트 클릭으로 PC 선택, 손패 카드 클릭으로 제출 */
  handlePointer(x: number, y: number, ctx: InitiativeContext): boolean {
    const { phase, hand, layout, config } = ctx;
    if (!layout) return false;

    if (!hand.getSelectedPC()) {
      const entity = layout.plateAt(x, y);
      if (entity && phase.isAwaitingInitiative(entity.id)) {
        hand.selectPC(entity);
        ctx.out.notice(
          'INITIATIVE_SELECT_CARD',
          `Select a card for ${entity.name} (${cardKeyRange(config.initiativeHandSlots)} or click)`,
        );
        return true;
      }
    }

    const selected = hand.getSelectedPC();
    if (!selected || !phase.isAwaitingInitiative(selected.id)) return false;

    const index = layout.handCardIndexAt(x, y, selected, config.initiativeHandSlots);
    if (index === null) return false;

    return this.submitCard(selected, index, ctx);
  }

  /** 0-based 손패 위치의 카드를 이니셔티브로 제출 */
  submitCard(entity: CombatEntity, index: number, ctx: InitiativeContext): boolean {
    const { phase, hand, out } = ctx;

    const card = hand.useForInitiative(entity, index);
    if (!card) {
      out.notice('INITIATIVE_INVALID_CARD', 'Invalid card selection!');
      return false;
    }

    const result = phase.submitInitiative(entity, card);
    hand.clearSelection();
    if (!result.ok) {
      out.notice(
        'INITIATIVE_REJECTED',
        `Initiative submit failed for ${entity.name}: ${result.reason}`,
      );
      return false;
    }

    out.emit({ kind: 'INITIATIVE_SUBMITTED', entityId: entity.id });
    return true;
  }

  /**
   * 대기 중인 PC 전원: 로스터 순서대로 첫 번째 카드 제출
   * 손패가 빈 PC, 이미 제출한 PC는 건너뛴다
   */
  submitAllPending(ctx: InitiativeContext): number {
    const { phase, hand } = ctx;
    let submitted = 0;

    for (const pc of phase.getPcs()) {
      if (!phase.isAwaitingInitiative(pc.id)) continue;
      if (hand.getHand(pc).length === 0) continue;
      if (this.submitCard(pc, 0, ctx)) submitted++;
    }

    hand.clearSelection();
    return submitted;
  }

  private selectPC(pc: CombatEntity, ctx: InitiativeContext): void {
    const { phase, hand, out, config } = ctx;

    if (!phase.isAwaitingInitiative(pc.id)) {
      out.notice('INITIATIVE_ALREADY_SUBMITTED', `${pc.name} has already submitted initiative`);
      return;
    }

    const cards = hand.getHand(pc);
    if (cards.length === 0) {
      out.notice('INITIATIVE_NO_CARDS', `${pc.name} has no cards!`);
      return;
    }

    hand.selectPC(pc);
    out.notice(
      'INITIATIVE_SELECT_CARD',
      `Select a card for ${pc.name} (${cardKeyRange(config.initiativeHandSlots)})`,
      cards.map((card, i) => `${cardKeyLabel(i)}: ${card.name} (${card.value})`),
    );
  }
}
