// 손패 카드 배치: 화면 하단 중앙 한 줄

import { Injectable } from '@nestjs/common';
import type { CombatEntity, HandAuthority, LayoutProbe } from '../../types/index.js';
import { CombatConfigService } from '../../config/combat-config.service.js';

export interface Viewport {
  width: number;
  height: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PlateRegion extends Rect {
  entity: CombatEntity;
}

function contains(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x <= rect.x + rect.width && y >= rect.y && y <= rect.y + rect.height;
}

@Injectable()
export class HandLayoutService {
  constructor(private readonly config: CombatConfigService) {}

  cardRects(cardCount: number, viewport: Viewport): Rect[] {
    if (cardCount <= 0) return [];
    const { cardWidth, cardHeight, cardSpacing, handBottomMargin } = this.config.get();

    const totalWidth = cardCount * cardWidth + (cardCount - 1) * cardSpacing;
    const startX = (viewport.width - totalWidth) / 2;
    const startY = viewport.height - cardHeight - handBottomMargin;

    return Array.from({ length: cardCount }, (_, i) => ({
      x: startX + i * (cardWidth + cardSpacing),
      y: startY,
      width: cardWidth,
      height: cardHeight,
    }));
  }

  /** 0-based, 앞에서부터 maxCards장까지만 판정 (경계 포함) */
  cardIndexAt(
    x: number,
    y: number,
    cardCount: number,
    maxCards: number,
    viewport: Viewport,
  ): number | null {
    const rects = this.cardRects(cardCount, viewport).slice(0, maxCards);
    const index = rects.findIndex((rect) => contains(rect, x, y));
    return index >= 0 ? index : null;
  }

  plateAt(plates: readonly PlateRegion[], x: number, y: number): CombatEntity | null {
    return plates.find((plate) => contains(plate, x, y))?.entity ?? null;
  }

  /** 렌더러가 넘기는 화면 크기 / 플레이트 위치로 LayoutProbe 구성 */
  createProbe(options: {
    hand: HandAuthority;
    viewport: () => Viewport;
    plates: () => readonly PlateRegion[];
  }): LayoutProbe {
    return {
      plateAt: (x, y) => this.plateAt(options.plates(), x, y),
      handCardIndexAt: (x, y, entity, maxCards) =>
        this.cardIndexAt(x, y, options.hand.getHand(entity).length, maxCards, options.viewport()),
    };
  }
}
