// 대상 / 목적지 존 계산: 순수 함수, 선택 상태를 건드리지 않음

import { Injectable } from '@nestjs/common';
import type {
  ActionDefinition,
  CombatEntity,
  CombatRoster,
  Zone,
  ZoneAdjacencyProvider,
} from '../../types/index.js';
import { isMeleeAction } from '../actions/action-kind.js';

@Injectable()
export class TargetingService {
  /**
   * 행동의 합법 대상 목록 (로스터 순서 유지, any면 NPC → PC)
   * - 근접: 행위자와 같은 존만
   * - dead: 항상 제외
   * - 시야/면역 등은 resolver 몫
   */
  getValidTargets(
    action: ActionDefinition | null,
    actor: CombatEntity | null,
    roster: CombatRoster,
  ): CombatEntity[] {
    if (!action) return [];

    const melee = isMeleeAction(action.id);
    const actorZone = actor?.zone ?? null;
    const targetType = action.targetType ?? 'any';

    const pool: CombatEntity[] = [];
    if (targetType === 'enemy' || targetType === 'any') pool.push(...roster.npcs);
    if (targetType === 'ally' || targetType === 'any') pool.push(...roster.pcs);

    return pool.filter((entity) => {
      if (entity.conditions.dead) return false;
      if (melee) return entity.zone === actorZone;
      return true;
    });
  }

  /**
   * 이동 가능한 존 목록 (존 목록 순서, 현재 존 제외)
   * - provider 없음: 현재 존 외 전부
   * - 후보 존을 provider가 모름: 제외
   */
  getDestinationZones(
    actor: CombatEntity | null,
    zones: readonly Zone[],
    adjacency: ZoneAdjacencyProvider | null,
  ): Zone[] {
    const currentZone = actor?.zone ?? null;

    return zones.filter((zone) => {
      if (zone.id === currentZone) return false;
      if (!adjacency || currentZone === null) return true;
      return this.isReachable(adjacency, currentZone, zone.id);
    });
  }

  private isReachable(
    adjacency: ZoneAdjacencyProvider,
    fromZoneId: string,
    toZoneId: string,
  ): boolean {
    if (!adjacency.hasZone(toZoneId)) return false;
    // 현재 존을 provider가 모름 → 허용
    if (!adjacency.hasZone(fromZoneId)) return true;
    return adjacency.areZonesAdjacent(fromZoneId, toZoneId);
  }
}
