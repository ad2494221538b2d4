/**
 * @module Entities/WaTor
 * @layer Entities
 * @description Состояния мира хищников и жертв.
 */

import { StateCatalog } from '../shared/types';

export enum WaTorState {
  EMPTY = 'EMPTY',
  FISH = 'FISH',
  SHARK = 'SHARK'
}

export const WATOR_STATES: StateCatalog<WaTorState> = {
  values: {
    [WaTorState.EMPTY]: 0,
    [WaTorState.FISH]: 1,
    [WaTorState.SHARK]: 2
  },
  displayKeys: {
    [WaTorState.EMPTY]: 'wator-state-empty',
    [WaTorState.FISH]: 'wator-state-fish',
    [WaTorState.SHARK]: 'wator-state-shark'
  },
  defaultState: WaTorState.EMPTY
};
