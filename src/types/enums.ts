// 전투 입력 코어: Canonical Enums

export const ACTION_ID = [
  // SWORDS
  'melee',
  'missile',
  'riposte',
  // PENTACLES
  'avoid',
  'dash',
  'dodge',
  'trip',
  'disarm',
  'displace',
  'grapple',
  'pick_lock',
  'disarm_trap',
  // CUPS
  'heal',
  'parley',
  'rally',
  'aid',
  'pull_item',
  'use_item',
  // WANDS
  'cast',
  'banter',
  'investigate',
  'detect_magic',
  'recover',
  // MISC
  'move',
  'interact',
  'reload',
  'vigilance',
] as const;
export type ActionId = (typeof ACTION_ID)[number];

/** 입력 흐름이 분기하는 행동 분류 */
export const ACTION_KIND = ['MELEE', 'ZONE', 'REACTIVE', 'STANDARD'] as const;
export type ActionKind = (typeof ACTION_KIND)[number];

export const TARGET_TYPE = ['enemy', 'ally', 'any'] as const;
export type TargetType = (typeof TARGET_TYPE)[number];

export const CARD_SUIT = ['swords', 'pentacles', 'cups', 'wands', 'major'] as const;
export type CardSuit = (typeof CARD_SUIT)[number];

export const ACTION_SUIT = ['swords', 'pentacles', 'cups', 'wands', 'misc'] as const;
export type ActionSuit = (typeof ACTION_SUIT)[number];

export const CHALLENGE_PHASE = [
  'idle',
  'starting',
  'pre_round',
  'count_up',
  'awaiting_action',
  'resolving',
  'visual_sync',
  'minor_window',
  'ending',
] as const;
export type ChallengePhase = (typeof CHALLENGE_PHASE)[number];

export const FOLLOW_UP_TARGET_POLICY = ['self', 'trigger_actor', 'none'] as const;
export type FollowUpTargetPolicy = (typeof FOLLOW_UP_TARGET_POLICY)[number];

export const NOTICE_CODE = [
  'CARD_SELECTED',
  'NO_CARD_AT_POSITION',
  'HAND_LISTING',
  'PASS',
  'SELECTION_CANCELLED',
  'SELECT_TARGET',
  'SELECT_ZONE',
  'NO_ENEMIES_IN_ZONE',
  'NO_VALID_TARGETS',
  'NO_ADJACENT_ZONES',
  'AVOID_IN_PLACE',
  'FOLLOW_UP_REQUIRED',
  'INVALID_TARGET',
  'ZONE_NOT_AVAILABLE',
  'INVALID_ACTION_STATE',
  'ACTION_DECLARED',
  'SUBMIT_REJECTED',
  'MINOR_SELECT_CARD',
  'MINOR_NO_CARDS',
  'MINOR_PC_CANCELLED',
  'MINOR_DECLARE_REJECTED',
  'INITIATIVE_SELECT_CARD',
  'INITIATIVE_NO_CARDS',
  'INITIATIVE_ALREADY_SUBMITTED',
  'INITIATIVE_INVALID_CARD',
  'INITIATIVE_REJECTED',
] as const;
export type NoticeCode = (typeof NOTICE_CODE)[number];
