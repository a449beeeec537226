import type { ActionId, ActionSuit, CardSuit, TargetType } from './enums.js';

export type ActionDefinition = {
  id: ActionId;
  name: string;
  suit: ActionSuit;
  /** 카드 값에 더해지는 능력치 (MISC는 없음) */
  attribute: CardSuit | null;
  description: string;
  requiresTarget: boolean;
  targetType?: TargetType;
  allowMinor?: boolean;
  requiresWeaponType?: string;
  requiresItem?: string;
  isRanged?: boolean;
  testOfFate?: boolean;
  autoSuccess?: boolean;
};
