/**
 * @module Entities/Colonies
 * @layer Entities
 * @description Состояния конкурирующих колоний.
 * Колонии образуют цикл: колонию k вытесняет колония (k + 1) mod n.
 */

import { StateCatalog } from '../shared/types';

export enum ColonyState {
  COLONY_0 = 'COLONY_0',
  COLONY_1 = 'COLONY_1',
  COLONY_2 = 'COLONY_2',
  COLONY_3 = 'COLONY_3',
  COLONY_4 = 'COLONY_4',
  COLONY_5 = 'COLONY_5',
  COLONY_6 = 'COLONY_6',
  COLONY_7 = 'COLONY_7'
}

/**
 * Колонии в порядке цикла. Индекс совпадает с сериализованным значением.
 */
export const COLONY_ORDER: readonly ColonyState[] = [
  ColonyState.COLONY_0,
  ColonyState.COLONY_1,
  ColonyState.COLONY_2,
  ColonyState.COLONY_3,
  ColonyState.COLONY_4,
  ColonyState.COLONY_5,
  ColonyState.COLONY_6,
  ColonyState.COLONY_7
];

export const MAX_COLONIES = COLONY_ORDER.length;

export const COLONY_STATES: StateCatalog<ColonyState> = {
  values: {
    [ColonyState.COLONY_0]: 0,
    [ColonyState.COLONY_1]: 1,
    [ColonyState.COLONY_2]: 2,
    [ColonyState.COLONY_3]: 3,
    [ColonyState.COLONY_4]: 4,
    [ColonyState.COLONY_5]: 5,
    [ColonyState.COLONY_6]: 6,
    [ColonyState.COLONY_7]: 7
  },
  displayKeys: {
    [ColonyState.COLONY_0]: 'colony-state-0',
    [ColonyState.COLONY_1]: 'colony-state-1',
    [ColonyState.COLONY_2]: 'colony-state-2',
    [ColonyState.COLONY_3]: 'colony-state-3',
    [ColonyState.COLONY_4]: 'colony-state-4',
    [ColonyState.COLONY_5]: 'colony-state-5',
    [ColonyState.COLONY_6]: 'colony-state-6',
    [ColonyState.COLONY_7]: 'colony-state-7'
  },
  defaultState: ColonyState.COLONY_0
};
