// 원시 입력 이벤트 → SelectionFlow 핸들러

import { Injectable } from '@nestjs/common';
import { InputEventSchema } from '../../types/index.js';
import type { ActionDefinition, ActionId, FlowStep } from '../../types/index.js';
import { parseWithSchema } from '../../common/validation/parse-with-schema.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import { ActionRegistryService } from '../actions/action-registry.service.js';
import type { SelectionFlow } from '../selection/selection-flow.js';
import { normalizeKey } from './input-keys.js';

@Injectable()
export class InputRouterService {
  constructor(private readonly registry: ActionRegistryService) {}

  /**
   * 스키마 검증 후 분배: 형식 오류 / 카탈로그에 없는 행동은 InvalidInputError
   * 게임플레이상 거절은 FlowStep의 NOTICE로만 나온다
   */
  dispatch(flow: SelectionFlow, raw: unknown): FlowStep {
    const event = parseWithSchema(InputEventSchema, raw, 'Invalid input event');

    switch (event.type) {
      case 'key_pressed':
        return flow.handleKeyPressed(normalizeKey(event.key));
      case 'pointer_pressed':
        return flow.handlePointerPressed(event.x, event.y, event.button);
      case 'action_selected': {
        const action = this.requireAction(event.actionId);
        const followUp = event.followUpActionId
          ? this.requireAction(event.followUpActionId)
          : null;
        return flow.handleActionSelected(action, followUp);
      }
      case 'entity_clicked':
        return flow.handleEntityClicked(event.entityId);
      case 'zone_clicked':
        return flow.handleZoneClicked(event.zoneId);
      case 'challenge_ended':
        return flow.handleChallengeEnded();
    }
  }

  private requireAction(id: ActionId): ActionDefinition {
    const action = this.registry.getAction(id);
    if (!action) {
      throw new InvalidInputError(`Action not in catalog: ${id}`, { actionId: id });
    }
    return action;
  }
}
