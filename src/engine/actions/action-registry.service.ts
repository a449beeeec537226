// 행동 카탈로그 조회: 카드/턴 종류별 사용 가능 행동

import { Injectable } from '@nestjs/common';
import type {
  ActionDefinition,
  ActionId,
  ActionSuit,
  Card,
  CardSuit,
  CombatEntity,
  Weapon,
} from '../../types/index.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';

const SUIT_DISPLAY_NAME: Record<CardSuit, string> = {
  swords: 'Swords',
  pentacles: 'Pentacles',
  cups: 'Cups',
  wands: 'Wands',
  major: 'Major Arcana',
};

export function cardSuitName(suit: CardSuit): string {
  return SUIT_DISPLAY_NAME[suit];
}

/** 메이저 아르카나는 MISC로 취급 */
export function cardSuitToActionSuit(suit: CardSuit): ActionSuit {
  return suit === 'major' ? 'misc' : suit;
}

/** "ranged" / "melee"는 카테고리 판정, 그 외는 weaponType 일치 */
export function hasRequiredWeapon(weapon: Weapon | null, required: string): boolean {
  if (!weapon) return false;
  if (required === 'ranged') return weapon.isRanged === true;
  if (required === 'melee') {
    return weapon.isMelee === true || (weapon.isWeapon === true && weapon.isRanged !== true);
  }
  return weapon.weaponType === required;
}

@Injectable()
export class ActionRegistryService {
  constructor(private readonly content: ContentLoaderService) {}

  getAction(id: ActionId): ActionDefinition | undefined {
    return this.content.getAction(id);
  }

  getActionsForSuit(suit: ActionSuit): ActionDefinition[] {
    return this.content.getActions().filter((a) => a.suit === suit);
  }

  /**
   * 카드 + 턴 종류 기준 사용 가능 행동
   * - 주 턴: 전부 (무기/아이템 요구 조건만 확인)
   * - 마이너: 카드와 같은 슈트, allowMinor !== false, MISC 제외
   */
  getAvailableActions(
    card: Card,
    isPrimaryTurn: boolean,
    entity: CombatEntity | null,
  ): ActionDefinition[] {
    const cardSuit = cardSuitToActionSuit(card.suit);

    return this.content.getActions().filter((action) => {
      if (!isPrimaryTurn) {
        if (action.suit === 'misc') return false;
        if (action.suit !== cardSuit || action.allowMinor === false) return false;
      }

      if (action.requiresWeaponType) {
        if (!hasRequiredWeapon(entity?.weapon ?? null, action.requiresWeaponType)) {
          return false;
        }
      }

      if (action.requiresItem) {
        if (!entity?.items?.includes(action.requiresItem)) return false;
      }

      return true;
    });
  }
}
