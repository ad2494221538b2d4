/**
 * @module Entities/Sand
 * @layer Entities
 * @description Состояния модели сыпучих частиц (песок и вода).
 */

import { StateCatalog } from '../shared/types';

export enum SandState {
  EMPTY = 'EMPTY',
  SAND = 'SAND',
  WALL = 'WALL',
  WATER = 'WATER'
}

export const SAND_STATES: StateCatalog<SandState> = {
  values: {
    [SandState.EMPTY]: 0,
    [SandState.SAND]: 1,
    [SandState.WALL]: 2,
    [SandState.WATER]: 3
  },
  displayKeys: {
    [SandState.EMPTY]: 'sand-state-empty',
    [SandState.SAND]: 'sand-state-sand',
    [SandState.WALL]: 'sand-state-wall',
    [SandState.WATER]: 'sand-state-water'
  },
  defaultState: SandState.EMPTY
};
