// 키 매핑: 카드 슬롯 (Q/W/E/R) / 숫자 선택 (1-9)

export const CARD_KEYS = ['q', 'w', 'e', 'r'] as const;

export const CONFIRM_KEYS = ['space', 'return'] as const;

export function isConfirmKey(key: string): boolean {
  return CONFIRM_KEYS.some((k) => k === key);
}

export function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

/** 0-based 카드 슬롯, slots 밖이면 null */
export function cardSlotForKey(key: string, slots: number): number | null {
  const index = CARD_KEYS.findIndex((k) => k === key);
  if (index < 0 || index >= slots) return null;
  return index;
}

/** 1-based 숫자키 */
export function numberForKey(key: string): number | null {
  return /^[1-9]$/.test(key) ? Number(key) : null;
}

export function cardKeyLabel(index: number): string {
  return CARD_KEYS[index]?.toUpperCase() ?? String(index + 1);
}

export function cardKeyRange(slots: number): string {
  return CARD_KEYS.slice(0, slots)
    .map((k) => k.toUpperCase())
    .join('/');
}
