import type { ActionDefinition } from './action-definition.js';
import type { Card, CombatEntity, Zone } from './entities.js';

export type SelectionState = {
  selectedEntity: CombatEntity | null;
  selectedCard: Card | null;
  selectedCardIndex: number | null;
  selectedAction: ActionDefinition | null;
  awaitingTarget: boolean;
  awaitingZone: boolean;
  availableZones: Zone[] | null;
  minorPC: CombatEntity | null;
  selectedVigilanceFollowUp: ActionDefinition | null;
};
