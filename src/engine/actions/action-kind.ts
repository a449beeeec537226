import type { ActionId, ActionKind } from '../../types/index.js';

/** ActionId마다 분류 필수 (누락 시 컴파일 에러) */
const ACTION_KIND_BY_ID: Record<ActionId, ActionKind> = {
  melee: 'MELEE',
  grapple: 'MELEE',
  trip: 'MELEE',
  disarm: 'MELEE',
  displace: 'MELEE',
  move: 'ZONE',
  dash: 'ZONE',
  avoid: 'ZONE',
  vigilance: 'REACTIVE',
  missile: 'STANDARD',
  riposte: 'STANDARD',
  dodge: 'STANDARD',
  pick_lock: 'STANDARD',
  disarm_trap: 'STANDARD',
  heal: 'STANDARD',
  parley: 'STANDARD',
  rally: 'STANDARD',
  aid: 'STANDARD',
  pull_item: 'STANDARD',
  use_item: 'STANDARD',
  cast: 'STANDARD',
  banter: 'STANDARD',
  investigate: 'STANDARD',
  detect_magic: 'STANDARD',
  recover: 'STANDARD',
  interact: 'STANDARD',
  reload: 'STANDARD',
};

export function classifyAction(id: ActionId): ActionKind {
  return ACTION_KIND_BY_ID[id];
}

/** 근접 행동은 같은 존의 대상만 고를 수 있다 */
export function isMeleeAction(id: ActionId): boolean {
  return ACTION_KIND_BY_ID[id] === 'MELEE';
}
