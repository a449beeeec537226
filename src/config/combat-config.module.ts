import { Global, Module } from '@nestjs/common';
import { CombatConfigService } from './combat-config.service.js';

@Global()
@Module({
  providers: [CombatConfigService],
  exports: [CombatConfigService],
})
export class CombatConfigModule {}
