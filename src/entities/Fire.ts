/**
 * @module Entities/Fire
 * @layer Entities
 * @description Состояния модели лесного пожара.
 */

import { StateCatalog } from '../shared/types';

export enum FireState {
  EMPTY = 'EMPTY',
  TREE = 'TREE',
  BURNING = 'BURNING',
  BURNT = 'BURNT'
}

export const FIRE_STATES: StateCatalog<FireState> = {
  values: {
    [FireState.EMPTY]: 0,
    [FireState.TREE]: 1,
    [FireState.BURNING]: 2,
    [FireState.BURNT]: 3
  },
  displayKeys: {
    [FireState.EMPTY]: 'fire-state-empty',
    [FireState.TREE]: 'fire-state-tree',
    [FireState.BURNING]: 'fire-state-burning',
    [FireState.BURNT]: 'fire-state-burnt'
  },
  defaultState: FireState.EMPTY
};
