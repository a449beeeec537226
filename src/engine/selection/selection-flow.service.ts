import { Injectable, Logger } from '@nestjs/common';
import { CombatConfigService } from '../../config/combat-config.service.js';
import { TargetingService } from '../targeting/targeting.service.js';
import { VigilancePolicyService } from '../vigilance/vigilance-policy.service.js';
import { InitiativeService } from '../initiative/initiative.service.js';
import { SelectionFlow, type SelectionFlowDeps } from './selection-flow.js';

/** 전투마다 SelectionFlow 하나: 상태 없는 서비스는 공유 */
@Injectable()
export class SelectionFlowService {
  private readonly logger = new Logger(SelectionFlowService.name);

  constructor(
    private readonly targeting: TargetingService,
    private readonly vigilance: VigilancePolicyService,
    private readonly initiative: InitiativeService,
    private readonly config: CombatConfigService,
  ) {}

  create(deps: SelectionFlowDeps): SelectionFlow {
    this.logger.debug(
      `Selection flow created (adjacency=${deps.adjacency !== null}, layout=${deps.layout !== null})`,
    );
    return new SelectionFlow(deps, {
      targeting: this.targeting,
      vigilance: this.vigilance,
      initiative: this.initiative,
      config: this.config,
    });
  }
}
