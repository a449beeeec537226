import { Module } from '@nestjs/common';
import { ActionRegistryService } from './actions/action-registry.service.js';
import { TargetingService } from './targeting/targeting.service.js';
import { VigilancePolicyService } from './vigilance/vigilance-policy.service.js';
import { InitiativeService } from './initiative/initiative.service.js';
import { SelectionFlowService } from './selection/selection-flow.service.js';
import { HandLayoutService } from './input/hand-layout.service.js';
import { InputRouterService } from './input/input-router.service.js';

const providers = [
  // 카탈로그
  ActionRegistryService,
  // 순수 판정
  TargetingService,
  VigilancePolicyService,
  // 입력 흐름
  InitiativeService,
  SelectionFlowService,
  HandLayoutService,
  InputRouterService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
