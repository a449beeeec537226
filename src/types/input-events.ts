import { z } from 'zod';
import { ACTION_ID } from './enums.js';

/** 입력 소스가 넘기는 원시 이벤트: 경계에서 검증 */
export const InputEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('key_pressed'),
    key: z.string().min(1).max(16),
  }),
  z.object({
    type: z.literal('pointer_pressed'),
    x: z.number().finite(),
    y: z.number().finite(),
    button: z.number().int().min(1),
  }),
  z.object({
    type: z.literal('action_selected'),
    actionId: z.enum(ACTION_ID),
    followUpActionId: z.enum(ACTION_ID).optional(),
  }),
  z.object({
    type: z.literal('entity_clicked'),
    entityId: z.string().min(1),
  }),
  z.object({
    type: z.literal('zone_clicked'),
    zoneId: z.string().min(1),
  }),
  z.object({
    type: z.literal('challenge_ended'),
  }),
]);

export type InputEvent = z.infer<typeof InputEventSchema>;
