/**
 * @module Core/Systems/SugarScape/World
 * @layer Core
 * @description Рабочее представление, общее для систем SugarScape в течение тика.
 *
 * Системы выполняются по очереди над подготовленным поколением: каждая читает
 * записи агентов и участков, подготовленные предыдущей, и готовит свои
 * изменения. Ничего не фиксируется до фиксации сетки в конце тика.
 */

import { Grid } from '../../grid/Grid';
import { AgentArena, AgentId } from '../../simulation/AgentArena';
import { RandomSource } from '../../utils/random';
import { SugarScapeParameters } from '../../config/parameters';
import { SugarAgent, SugarState } from '../../../entities/SugarScape';
import { Coordinates } from '../../../shared/types';
import { InvariantViolationError } from '../../../shared/lib/errors';
import { LoanBook } from './LoanBook';
import { SugarCell, sugarCellAt } from './SugarCell';

export interface SugarWorld {
  readonly grid: Grid<SugarState>;
  readonly agents: AgentArena<SugarAgent>;
  readonly loans: LoanBook;
  readonly random: RandomSource;
  readonly params: SugarScapeParameters;
  /** Номер вычисляемого тика, с единицы */
  readonly tick: number;
  /** Подготовленная позиция каждого живого агента */
  readonly positions: Map<AgentId, Coordinates>;
  readonly capacityAt: (row: number, col: number) => number;
}

export const patchAt = (world: SugarWorld, at: Coordinates): SugarCell =>
  sugarCellAt(world.grid, at.row, at.col, world.capacityAt);

export const positionOf = (world: SugarWorld, id: AgentId): Coordinates => {
  const position = world.positions.get(id);
  if (!position) {
    throw new InvariantViolationError(`Agent ${id} has no position`);
  }
  return position;
};

/** Агенты на соседних участках в порядке окрестности */
export const neighborAgents = (world: SugarWorld, id: AgentId): AgentId[] => {
  const { row, col } = positionOf(world, id);
  const found: AgentId[] = [];
  for (const coord of world.grid.getNeighborCoordinates(row, col)) {
    const other = patchAt(world, coord).getNextPayload().agentId;
    if (other !== null && other !== id && !found.includes(other)) {
      found.push(other);
    }
  }
  return found;
};

/** Первый соседний участок, на котором никого нет */
export const freeNeighbor = (world: SugarWorld, at: Coordinates): Coordinates | undefined =>
  world.grid.getNeighborCoordinates(at.row, at.col)
    .find(coord => patchAt(world, coord).getNextPayload().agentId === null);

/** Заменяет поля подготовленной записи агента */
export const updateAgent = (world: SugarWorld, id: AgentId, changes: Partial<SugarAgent>): SugarAgent => {
  const updated = { ...world.agents.getNext(id), ...changes };
  world.agents.stage(id, updated);
  return updated;
};
