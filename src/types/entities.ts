import type { CardSuit } from './enums.js';

export type Weapon = {
  name: string;
  isMelee?: boolean;
  isRanged?: boolean;
  isWeapon?: boolean;
  weaponType?: string;
};

export type EntityConditions = {
  dead?: boolean;
  [condition: string]: boolean | undefined;
};

/** 생명주기는 외부 소유: 코어는 읽기만 한다 */
export type CombatEntity = {
  readonly id: string;
  readonly name: string;
  readonly isPC: boolean;
  readonly zone: string | null;
  readonly conditions: Readonly<EntityConditions>;
  readonly weapon: Weapon | null;
  readonly items?: readonly string[];
};

export type Zone = {
  id: string;
  name: string;
  description?: string;
};

export type Card = {
  name: string;
  value: number;
  suit: CardSuit;
};
