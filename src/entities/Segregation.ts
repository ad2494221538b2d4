/**
 * @module Entities/Segregation
 * @layer Entities
 * @description Состояния модели сегрегации двух групп.
 */

import { StateCatalog } from '../shared/types';

export enum SegregationState {
  EMPTY = 'EMPTY',
  AGENT_A = 'AGENT_A',
  AGENT_B = 'AGENT_B'
}

export const SEGREGATION_STATES: StateCatalog<SegregationState> = {
  values: {
    [SegregationState.EMPTY]: 0,
    [SegregationState.AGENT_A]: 1,
    [SegregationState.AGENT_B]: 2
  },
  displayKeys: {
    [SegregationState.EMPTY]: 'segregation-state-empty',
    [SegregationState.AGENT_A]: 'segregation-state-agent-a',
    [SegregationState.AGENT_B]: 'segregation-state-agent-b'
  },
  defaultState: SegregationState.EMPTY
};

/**
 * Житель помнит только свою группу; где он живёт, знает клетка.
 */
export type Resident = {
  group: SegregationState.AGENT_A | SegregationState.AGENT_B;
};
