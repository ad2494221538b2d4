/**
 * @module Core/Rules/CompetingColonies
 * @layer Core
 * @description Циклическая конкуренция колоний бактерий.
 *
 * Колонию k вытесняет колония (k + 1) mod `numStates`. Клетка переходит к
 * доминирующей колонии, когда её доля среди соседей достигает `threshold`
 * процентов и хотя бы один такой сосед есть. При трёх колониях это
 * «камень, ножницы, бумага».
 */

import { Simulation } from '../simulation/Simulation';
import { COLONY_ORDER, COLONY_STATES, ColonyState } from '../../entities/Colonies';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { ColonyParameters, colonyParametersSchema, parseParameters } from '../config/parameters';
import { SimulationInput } from '../../shared/types';
import { ConstructionError } from '../../shared/lib/errors';

export class CompetingColonies extends Simulation<ColonyState> {
  private readonly params: ColonyParameters;

  constructor(input: SimulationInput) {
    super(input, COLONY_STATES, SIMULATION_DEFAULTS[SimulationKind.COLONIES]);
    this.params = parseParameters(colonyParametersSchema, input.parameters, 'colonies');
    this.requireColonies(input.initialStates);
    this.finishLoad();
  }

  /** @throws {ConstructionError} для колоний вне 0..numStates-1 */
  private requireColonies(values: readonly number[]): void {
    const outside = [...new Set(values.filter(value => value >= this.params.numStates))];
    if (outside.length > 0) {
      throw new ConstructionError(
        `Colony states must lie in 0..${this.params.numStates - 1}`,
        outside.map(String)
      );
    }
  }

  public reset(initialStates: readonly number[]): void {
    this.requireColonies(initialStates);
    super.reset(initialStates);
  }

  /** Колония, которая вытесняет `state` */
  public dominatorOf(state: ColonyState): ColonyState {
    const index = this.stateValue(state);
    return COLONY_ORDER[(index + 1) % this.params.numStates];
  }

  protected applyRules(): void {
    for (const { row, col } of this.grid.coordinates()) {
      const cell = this.grid.cellAt(row, col);
      const dominator = this.dominatorOf(cell.getCurrent());
      const neighbors = this.grid.getNeighbors(row, col);
      const dominating = neighbors.filter(neighbor => neighbor.getCurrent() === dominator).length;

      if (dominating > 0 && dominating >= (this.params.threshold / 100) * neighbors.length) {
        cell.setNext(dominator);
      }
    }
  }
}
