// content/actions.json 로드 + 메모리 캐시

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { ActionDefinition, ActionId } from '../types/index.js';
import { ActionCatalogSchema } from './content.types.js';
import { ContentError } from '../common/errors/game-errors.js';
import { formatIssues } from '../common/validation/parse-with-schema.js';
import { CombatConfigService } from '../config/combat-config.service.js';

export const ACTIONS_FILE = 'actions.json';

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private actions: ActionDefinition[] = [];
  private actionsById = new Map<ActionId, ActionDefinition>();

  constructor(private readonly configService: CombatConfigService) {}

  async onModuleInit(): Promise<void> {
    await this.loadAll();
  }

  async loadAll(): Promise<void> {
    const path = join(this.configService.get().contentDir, ACTIONS_FILE);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      throw new ContentError(`Cannot read action catalog: ${path}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ContentError(`Action catalog is not valid JSON: ${path}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    }

    this.setActions(json);
    this.logger.log(`Loaded ${this.actions.length} actions from ${path}`);
  }

  /** 검증 후 카탈로그 교체 (중복 id 불가) */
  setActions(value: unknown): void {
    const parsed = ActionCatalogSchema.safeParse(value);
    if (!parsed.success) {
      throw new ContentError('Invalid action catalog', {
        issues: formatIssues(parsed.error.issues),
      });
    }

    const byId = new Map<ActionId, ActionDefinition>();
    for (const action of parsed.data) {
      if (byId.has(action.id)) {
        throw new ContentError(`Duplicate action id: ${action.id}`);
      }
      byId.set(action.id, action);
    }

    this.actions = parsed.data;
    this.actionsById = byId;
  }

  getActions(): readonly ActionDefinition[] {
    return this.actions;
  }

  getAction(id: ActionId): ActionDefinition | undefined {
    return this.actionsById.get(id);
  }
}
