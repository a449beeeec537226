import { z } from 'zod';
import { ACTION_ID, ACTION_SUIT, CARD_SUIT, TARGET_TYPE } from '../types/index.js';

export const ActionDefinitionSchema = z.object({
  id: z.enum(ACTION_ID),
  name: z.string().min(1),
  suit: z.enum(ACTION_SUIT),
  attribute: z.enum(CARD_SUIT).nullable(),
  description: z.string(),
  requiresTarget: z.boolean(),
  targetType: z.enum(TARGET_TYPE).optional(),
  allowMinor: z.boolean().optional(),
  requiresWeaponType: z.string().optional(),
  requiresItem: z.string().optional(),
  isRanged: z.boolean().optional(),
  testOfFate: z.boolean().optional(),
  autoSuccess: z.boolean().optional(),
});

export const ActionCatalogSchema = z.array(ActionDefinitionSchema).min(1);
