/**
 * @module Entities/SugarScape
 * @layer Entities
 * @description Состояния, запись агента и постоянные сахарной экономики.
 */

import { StateCatalog } from '../shared/types';

export enum SugarState {
  EMPTY = 'EMPTY',
  SUGAR = 'SUGAR',
  AGENT = 'AGENT'
}

export const SUGAR_STATES: StateCatalog<SugarState> = {
  values: {
    [SugarState.EMPTY]: 0,
    [SugarState.SUGAR]: 1,
    [SugarState.AGENT]: 2
  },
  displayKeys: {
    [SugarState.EMPTY]: 'sugar-state-empty',
    [SugarState.SUGAR]: 'sugar-state-sugar',
    [SugarState.AGENT]: 'sugar-state-agent'
  },
  defaultState: SugarState.EMPTY
};

export enum Sex {
  MALE = 'MALE',
  FEMALE = 'FEMALE'
}

/** Битовая строка, например [0, 1, 1, 0] */
export type Pattern = readonly number[];

/**
 * Запись агента. Записи заменяются, а не изменяются, поэтому
 * зафиксированное поколение не затрагивается, пока готовится следующее.
 */
export type SugarAgent = {
  sugar: number;
  spice: number;
  vision: number;
  metabolism: number;
  /** Сахар при рождении; от него зависят плодовитость и кредиты */
  endowment: number;
  sex: Sex;
  age: number;
  immune: Pattern;
  diseases: readonly Pattern[];
};

/** Нагрузка клетки ландшафта */
export type SugarPatch = {
  sugar: number;
  capacity: number;
  agentId: string | null;
};

export type Loan = {
  lenderId: string;
  borrowerId: string;
  amount: number;
  issuedAt: number;
  interest: number;
};

/**
 * Постоянные модели. Настраиваемые значения живут в схеме параметров.
 */
export const SUGARSCAPE_CONSTANTS = {
  PEAK_CAPACITY: 15,
  VISION: { min: 1, max: 4 },
  METABOLISM: { min: 1, max: 3 },
  INITIAL_SUGAR: { min: 10, max: 29 },
  INITIAL_SPICE: { min: 10, max: 29 },
  FERTILITY: { from: 12, to: 50 },
  IMMUNE_LENGTH: 10,
  DISEASE_LENGTH: 8,
  // Minimum MRS gap worth trading over
  TRADE_THRESHOLD: 0.1
} as const;
