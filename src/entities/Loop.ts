/**
 * @module Entities/Loop
 * @layer Entities
 * @description Состояния самовоспроизводящейся петли.
 */

import { StateCatalog } from '../shared/types';

export enum LoopState {
  EMPTY = 'EMPTY',
  SHEATH = 'SHEATH',
  CORE = 'CORE',
  TEMP = 'TEMP',
  TURN = 'TURN',
  EXTEND = 'EXTEND',
  INIT = 'INIT',
  ADVANCE = 'ADVANCE'
}

export const LOOP_STATES: StateCatalog<LoopState> = {
  values: {
    [LoopState.EMPTY]: 0,
    [LoopState.SHEATH]: 1,
    [LoopState.CORE]: 2,
    [LoopState.TEMP]: 3,
    [LoopState.TURN]: 4,
    [LoopState.EXTEND]: 5,
    [LoopState.INIT]: 6,
    [LoopState.ADVANCE]: 7
  },
  displayKeys: {
    [LoopState.EMPTY]: 'loop-state-empty',
    [LoopState.SHEATH]: 'loop-state-sheath',
    [LoopState.CORE]: 'loop-state-core',
    [LoopState.TEMP]: 'loop-state-temp',
    [LoopState.TURN]: 'loop-state-turn',
    [LoopState.EXTEND]: 'loop-state-extend',
    [LoopState.INIT]: 'loop-state-init',
    [LoopState.ADVANCE]: 'loop-state-advance'
  },
  defaultState: LoopState.EMPTY
};

export const LOOP_MINIMUM_SIZE = 5;
