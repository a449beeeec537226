// 전투 입력 설정: .env 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import { join } from 'path';
import { z } from 'zod';
import { parseWithSchema } from '../common/validation/parse-with-schema.js';

const slotCount = z.coerce.number().int().min(1).max(9);
const pixels = z.coerce.number().int().min(0);

export const CombatConfigSchema = z.object({
  contentDir: z.string().min(1),
  /** 턴 행동에 쓰는 손패 슬롯 (Q/W/E) */
  actionHandSlots: slotCount,
  /** 이니셔티브 제출 시 손패 슬롯 (Q/W/E/R) */
  initiativeHandSlots: slotCount,
  /** 숫자키로 고를 수 있는 파티 인원 */
  partyKeySlots: slotCount,
  bareHandsWeapon: z.string().min(1),
  cardWidth: pixels.pipe(z.number().min(1)),
  cardHeight: pixels.pipe(z.number().min(1)),
  cardSpacing: pixels,
  handBottomMargin: pixels,
});

export type CombatConfig = z.infer<typeof CombatConfigSchema>;

export type CombatConfigPatch = Partial<CombatConfig>;

export function loadCombatConfig(env: NodeJS.ProcessEnv): CombatConfig {
  return parseWithSchema(
    CombatConfigSchema,
    {
      contentDir: env.COMBAT_CONTENT_DIR ?? join(process.cwd(), 'content'),
      actionHandSlots: env.COMBAT_ACTION_HAND_SLOTS ?? '3',
      initiativeHandSlots: env.COMBAT_INITIATIVE_HAND_SLOTS ?? '4',
      partyKeySlots: env.COMBAT_PARTY_KEY_SLOTS ?? '4',
      bareHandsWeapon: env.COMBAT_BARE_HANDS_WEAPON ?? 'Fists',
      cardWidth: env.COMBAT_CARD_WIDTH ?? '100',
      cardHeight: env.COMBAT_CARD_HEIGHT ?? '140',
      cardSpacing: env.COMBAT_CARD_SPACING ?? '20',
      handBottomMargin: env.COMBAT_HAND_BOTTOM_MARGIN ?? '70',
    },
    'Invalid combat configuration',
  );
}

@Injectable()
export class CombatConfigService {
  private readonly logger = new Logger(CombatConfigService.name);
  private config: CombatConfig;

  constructor() {
    this.config = loadCombatConfig(process.env);
  }

  get(): CombatConfig {
    return this.config;
  }

  /** 런타임 설정 변경: 다음 입력 이벤트부터 반영 */
  update(patch: CombatConfigPatch): CombatConfig {
    this.config = parseWithSchema(
      CombatConfigSchema,
      { ...this.config, ...patch },
      'Invalid combat configuration',
    );
    this.logger.log(`Combat config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
