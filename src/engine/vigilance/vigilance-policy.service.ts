// Vigilance: 적대 행동의 대상이 되면 발동하는 후속 행동 정책

import { Injectable } from '@nestjs/common';
import type {
  ActionDefinition,
  Card,
  FollowUpTargetPolicy,
  TriggerDescriptor,
} from '../../types/index.js';
import {
  ActionRegistryService,
  cardSuitToActionSuit,
} from '../actions/action-registry.service.js';

export type FollowUpCheck =
  | { ok: true }
  | { ok: false; reason: 'misc_follow_up' | 'misc_card' | 'suit_mismatch' };

@Injectable()
export class VigilancePolicyService {
  constructor(private readonly registry: ActionRegistryService) {}

  /**
   * 선언 시점에 한 번 결정 (발동 시점 아님)
   * - enemy → trigger_actor
   * - ally → self
   * - 그 외 대상 필요 → trigger_actor
   * - 대상 불필요 / 후속 없음 → none
   */
  resolveFollowUpTargetPolicy(
    followUp: ActionDefinition | null,
  ): FollowUpTargetPolicy {
    if (!followUp) return 'none';
    if (followUp.targetType === 'enemy') return 'trigger_actor';
    if (followUp.targetType === 'ally') return 'self';
    if (followUp.requiresTarget) return 'trigger_actor';
    return 'none';
  }

  buildTrigger(): TriggerDescriptor {
    return {
      mode: 'targeted_by_hostile_action',
      target: 'self',
      hostileOnly: true,
      excludeSelf: true,
    };
  }

  /** 커맨드 보드용: 카드와 같은 슈트의 후속 행동 후보 */
  listFollowUpOptions(card: Card): ActionDefinition[] {
    const suit = cardSuitToActionSuit(card.suit);
    if (suit === 'misc') return [];
    return this.registry
      .getActionsForSuit(suit)
      .filter((action) => action.id !== 'vigilance');
  }

  /** resolver가 거절할 조합을 미리 걸러낸다 (권고용) */
  checkFollowUp(card: Card, followUp: ActionDefinition): FollowUpCheck {
    if (followUp.suit === 'misc') return { ok: false, reason: 'misc_follow_up' };

    const cardSuit = cardSuitToActionSuit(card.suit);
    if (cardSuit === 'misc') return { ok: false, reason: 'misc_card' };
    if (followUp.suit !== cardSuit) return { ok: false, reason: 'suit_mismatch' };

    return { ok: true };
  }
}
