/**
 * @module Entities/Simulations
 * @layer Entities
 * @description Реестр доступных наборов правил и их топологии по умолчанию.
 */

/**
 * Все наборы правил, которые умеет создавать фабрика.
 */
export enum SimulationKind {
  GAME_OF_LIFE = 'GAME_OF_LIFE',
  FIRE = 'FIRE',
  PERCOLATION = 'PERCOLATION',
  SEGREGATION = 'SEGREGATION',
  WATOR = 'WATOR',
  LOOP = 'LOOP',
  TEMPESTI = 'TEMPESTI',
  SUGARSCAPE = 'SUGARSCAPE',
  COLONIES = 'COLONIES',
  SAND = 'SAND'
}

/** Теги границы и окрестности */
export type TopologyDefaults = {
  boundary: string;
  neighborhood: string;
};

/**
 * Топология на случай, если входные данные её не задают.
 */
export const SIMULATION_DEFAULTS: Record<SimulationKind, TopologyDefaults> = {
  [SimulationKind.GAME_OF_LIFE]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_8' },
  [SimulationKind.FIRE]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_4' },
  [SimulationKind.PERCOLATION]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_4' },
  [SimulationKind.SEGREGATION]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_8' },
  [SimulationKind.WATOR]: { boundary: 'WRAPPED', neighborhood: 'NEIGH_4' },
  [SimulationKind.LOOP]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_4' },
  [SimulationKind.TEMPESTI]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_4' },
  [SimulationKind.SUGARSCAPE]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_4' },
  [SimulationKind.COLONIES]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_8' },
  [SimulationKind.SAND]: { boundary: 'BOUNDED', neighborhood: 'NEIGH_8' }
};
