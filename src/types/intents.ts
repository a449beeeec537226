import type { ActionId, FollowUpTargetPolicy } from './enums.js';
import type { Card, CombatEntity, Weapon } from './entities.js';

export type TriggerDescriptor = {
  mode: 'targeted_by_hostile_action';
  target: 'self';
  hostileOnly: true;
  excludeSelf: true;
};

/** 풀 턴 선택 완료 시 resolver로 넘기는 계약 */
export type SubmittedActionIntent = {
  actor: CombatEntity;
  target: CombatEntity | null;
  card: Card;
  type: ActionId;
  destinationZone: string | null;
  weapon: Weapon;
  allEntities: readonly CombatEntity[];
  trigger?: TriggerDescriptor;
  followUpAction?: ActionId;
  followUpTargetPolicy?: FollowUpTargetPolicy;
};

export type MinorActionIntent = {
  actor: CombatEntity;
  card: Card;
  type: ActionId;
  target: CombatEntity | null;
  destinationZone: string | null;
  weapon: Weapon | null;
  allEntities: readonly CombatEntity[];
};

export type SubmitResult = { ok: true } | { ok: false; reason: string };
