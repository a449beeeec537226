import type { SelectionState } from '../../types/index.js';

export function createIdleSelectionState(): SelectionState {
  return {
    selectedEntity: null,
    selectedCard: null,
    selectedCardIndex: null,
    selectedAction: null,
    awaitingTarget: false,
    awaitingZone: false,
    availableZones: null,
    minorPC: null,
    selectedVigilanceFollowUp: null,
  };
}

/** 한 번의 대입으로 전체 필드를 Idle 기본값으로 */
export function resetSelectionState(state: SelectionState): void {
  Object.assign(state, createIdleSelectionState());
}

export function isIdleSelectionState(state: Readonly<SelectionState>): boolean {
  return (
    state.selectedEntity === null &&
    state.selectedCard === null &&
    state.selectedCardIndex === null &&
    state.selectedAction === null &&
    !state.awaitingTarget &&
    !state.awaitingZone &&
    state.availableZones === null &&
    state.minorPC === null &&
    state.selectedVigilanceFollowUp === null
  );
}

/**
 * 불변식
 * - awaitingTarget / awaitingZone 동시 true 불가
 * - selectedCard는 selectedEntity 없이 존재 불가 (index와 함께)
 */
export function isConsistentSelectionState(state: Readonly<SelectionState>): boolean {
  if (state.awaitingTarget && state.awaitingZone) return false;
  if (state.selectedCard && !state.selectedEntity) return false;
  if ((state.selectedCard === null) !== (state.selectedCardIndex === null)) return false;
  return true;
}

export function snapshotSelectionState(state: Readonly<SelectionState>): Readonly<SelectionState> {
  return Object.freeze({
    ...state,
    availableZones: state.availableZones ? [...state.availableZones] : null,
  });
}
