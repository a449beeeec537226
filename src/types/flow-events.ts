import type { NoticeCode } from './enums.js';
import type { Card } from './entities.js';
import type { MinorActionIntent, SubmittedActionIntent } from './intents.js';

export type FlowEvent =
  | {
      kind: 'CARD_SELECTED';
      entityId: string;
      card: Card;
      /** 0-based 손패 위치 */
      cardIndex: number;
      isPrimaryTurn: boolean;
    }
  | { kind: 'CARD_DESELECTED' }
  | { kind: 'UI_SEQUENCE_COMPLETE' }
  | { kind: 'ACTION_SUBMITTED'; intent: SubmittedActionIntent }
  | { kind: 'MINOR_ACTION_DECLARED'; intent: MinorActionIntent }
  /** 이니셔티브 카드는 뒷면: 카드 정보 없음 */
  | { kind: 'INITIATIVE_SUBMITTED'; entityId: string }
  | { kind: 'NOTICE'; code: NoticeCode; text: string; lines?: string[] };

export type FlowStep = {
  handled: boolean;
  events: FlowEvent[];
};
