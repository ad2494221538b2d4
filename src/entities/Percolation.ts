/**
 * @module Entities/Percolation
 * @layer Entities
 * @description Состояния модели просачивания.
 */

import { StateCatalog } from '../shared/types';

export enum PercolationState {
  OPEN = 'OPEN',
  PERCOLATED = 'PERCOLATED',
  BLOCKED = 'BLOCKED'
}

export const PERCOLATION_STATES: StateCatalog<PercolationState> = {
  values: {
    [PercolationState.OPEN]: 0,
    [PercolationState.PERCOLATED]: 1,
    [PercolationState.BLOCKED]: 2
  },
  displayKeys: {
    [PercolationState.OPEN]: 'percolation-state-open',
    [PercolationState.PERCOLATED]: 'percolation-state-percolated',
    [PercolationState.BLOCKED]: 'percolation-state-blocked'
  },
  defaultState: PercolationState.OPEN
};
