// 외부 협력자 계약: 코어는 이 인터페이스로만 접근한다

import type { ChallengePhase } from './enums.js';
import type { Card, CombatEntity, Zone } from './entities.js';
import type { FlowEvent } from './flow-events.js';
import type {
  MinorActionIntent,
  SubmitResult,
  SubmittedActionIntent,
} from './intents.js';

export interface PhaseAuthority {
  isActive(): boolean;
  getPhase(): ChallengePhase;
  getActiveEntity(): CombatEntity | null;
  getNpcs(): readonly CombatEntity[];
  getPcs(): readonly CombatEntity[];
  getAllCombatants(): readonly CombatEntity[];
  getZones(): readonly Zone[];
  isAwaitingInitiative(entityId: string): boolean;
  submitAction(intent: SubmittedActionIntent): SubmitResult;
  declareMinorAction(intent: MinorActionIntent): SubmitResult;
  submitInitiative(entity: CombatEntity, card: Card): SubmitResult;
  resumeFromMinorWindow(): SubmitResult;
}

export interface HandAuthority {
  getHand(entity: CombatEntity): readonly Card[];
  /** 0-based 위치의 카드를 손패에서 제거 */
  removeCard(entity: CombatEntity, index: number): Card | null;
  discard(card: Card): void;
  useForInitiative(entity: CombatEntity, index: number): Card | null;
  getSelectedPC(): CombatEntity | null;
  selectPC(entity: CombatEntity): void;
  clearSelection(): void;
}

export interface ZoneAdjacencyProvider {
  hasZone(zoneId: string): boolean;
  areZonesAdjacent(fromZoneId: string, toZoneId: string): boolean;
}

export interface LayoutProbe {
  plateAt(x: number, y: number): CombatEntity | null;
  /** 0-based 카드 위치, maxCards개까지만 판정 */
  handCardIndexAt(
    x: number,
    y: number,
    entity: CombatEntity,
    maxCards: number,
  ): number | null;
}

export interface NotificationSink {
  emit(event: FlowEvent): void;
}

export type CombatRoster = {
  npcs: readonly CombatEntity[];
  pcs: readonly CombatEntity[];
};
