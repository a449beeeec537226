import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from './app.module.js';

export * from './types/index.js';
export * from './common/errors/game-errors.js';
export { parseWithSchema } from './common/validation/parse-with-schema.js';
export * from './config/combat-config.service.js';
export { CombatConfigModule } from './config/combat-config.module.js';
export { ActionDefinitionSchema, ActionCatalogSchema } from './content/content.types.js';
export { ContentLoaderService } from './content/content-loader.service.js';
export { ContentModule } from './content/content.module.js';
export { classifyAction, isMeleeAction } from './engine/actions/action-kind.js';
export {
  ActionRegistryService,
  cardSuitName,
  cardSuitToActionSuit,
} from './engine/actions/action-registry.service.js';
export { TargetingService } from './engine/targeting/targeting.service.js';
export {
  VigilancePolicyService,
  type FollowUpCheck,
} from './engine/vigilance/vigilance-policy.service.js';
export { InitiativeService } from './engine/initiative/initiative.service.js';
export {
  SelectionFlow,
  type SelectionFlowDeps,
} from './engine/selection/selection-flow.js';
export { SelectionFlowService } from './engine/selection/selection-flow.service.js';
export {
  createIdleSelectionState,
  isConsistentSelectionState,
} from './engine/selection/selection-state.js';
export {
  HandLayoutService,
  type PlateRegion,
  type Rect,
  type Viewport,
} from './engine/input/hand-layout.service.js';
export { InputRouterService } from './engine/input/input-router.service.js';
export { EngineModule } from './engine/engine.module.js';
export { AppModule } from './app.module.js';

/** DI 컨텍스트 생성: HTTP 없이 서비스만 (카탈로그는 onModuleInit에서 로드) */
export async function createCombatContext(): Promise<INestApplicationContext> {
  return NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });
}
