/**
 * @module Core/Simulation/Factory
 * @layer Core
 * @description Создаёт набор правил по тегу вида.
 */

import { Simulation } from './Simulation';
import { GameOfLife } from '../rules/GameOfLife';
import { Fire } from '../rules/Fire';
import { Percolation } from '../rules/Percolation';
import { Segregation } from '../rules/Segregation';
import { WaTorWorld } from '../rules/WaTorWorld';
import { LoopAutomaton } from '../rules/LoopAutomaton';
import { TempestiLoop } from '../rules/TempestiLoop';
import { SugarScape } from '../rules/SugarScape';
import { CompetingColonies } from '../rules/CompetingColonies';
import { Sand } from '../rules/Sand';
import { SimulationKind } from '../../entities/Simulations';
import { SimulationInput } from '../../shared/types';
import { UnknownStrategyError } from '../../shared/lib/errors';

export type AnySimulation = Simulation<string>;

const BUILDERS: Record<SimulationKind, (input: SimulationInput) => AnySimulation> = {
  [SimulationKind.GAME_OF_LIFE]: input => new GameOfLife(input),
  [SimulationKind.FIRE]: input => new Fire(input),
  [SimulationKind.PERCOLATION]: input => new Percolation(input),
  [SimulationKind.SEGREGATION]: input => new Segregation(input),
  [SimulationKind.WATOR]: input => new WaTorWorld(input),
  [SimulationKind.LOOP]: input => new LoopAutomaton(input),
  [SimulationKind.TEMPESTI]: input => new TempestiLoop(input),
  [SimulationKind.SUGARSCAPE]: input => new SugarScape(input),
  [SimulationKind.COLONIES]: input => new CompetingColonies(input),
  [SimulationKind.SAND]: input => new Sand(input)
};

const isSimulationKind = (tag: string): tag is SimulationKind =>
  Object.prototype.hasOwnProperty.call(BUILDERS, tag);

export const parseSimulationKind = (tag: string): SimulationKind => {
  const normalized = tag.trim().toUpperCase();
  if (!isSimulationKind(normalized)) {
    throw new UnknownStrategyError('simulation kind', tag);
  }
  return normalized;
};

/**
 * @throws {UnknownStrategyError} for an unknown kind
 * @throws {ConstructionError} for invalid input
 */
export const createSimulation = (kind: SimulationKind | string, input: SimulationInput): AnySimulation =>
  BUILDERS[parseSimulationKind(kind)](input);
