/**
 * @module Entities/Life
 * @layer Entities
 * @description Состояния автомата рождения/выживания.
 */

import { StateCatalog } from '../shared/types';

export enum LifeState {
  DEAD = 'DEAD',
  ALIVE = 'ALIVE'
}

export const LIFE_STATES: StateCatalog<LifeState> = {
  values: {
    [LifeState.DEAD]: 0,
    [LifeState.ALIVE]: 1
  },
  displayKeys: {
    [LifeState.DEAD]: 'life-state-dead',
    [LifeState.ALIVE]: 'life-state-alive'
  },
  defaultState: LifeState.DEAD
};

/** B3/S23: цифра рождения, за ней цифры выживания */
export const DEFAULT_LIFE_RULE = 323;
