/**
 * @module Core/Rules/Fire
 * @layer Core
 * @description Лесной пожар: горящие деревья выгорают, огонь переходит на
 * соседние деревья, деревья самовозгораются с вероятностью `probCatch` и
 * вырастают на пустой земле с вероятностью `probGrow`.
 */

import { Simulation } from '../simulation/Simulation';
import { FIRE_STATES, FireState } from '../../entities/Fire';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { FireParameters, fireParametersSchema, parseParameters } from '../config/parameters';
import { SimulationInput } from '../../shared/types';

export class Fire extends Simulation<FireState> {
  private readonly params: FireParameters;

  constructor(input: SimulationInput) {
    super(input, FIRE_STATES, SIMULATION_DEFAULTS[SimulationKind.FIRE]);
    this.params = parseParameters(fireParametersSchema, input.parameters, 'fire');
    this.finishLoad();
  }

  protected applyRules(): void {
    for (const { row, col } of this.grid.coordinates()) {
      const cell = this.grid.cellAt(row, col);
      cell.setNext(this.nextState(cell.getCurrent(), row, col));
    }
  }

  private nextState(state: FireState, row: number, col: number): FireState {
    switch (state) {
      case FireState.BURNING:
        return FireState.BURNT;
      case FireState.TREE: {
        const nearFire = this.grid.getNeighbors(row, col)
          .some(neighbor => neighbor.getCurrent() === FireState.BURNING);
        return nearFire || this.random.chance(this.params.probCatch) ? FireState.BURNING : FireState.TREE;
      }
      case FireState.EMPTY:
      case FireState.BURNT:
        return this.random.chance(this.params.probGrow) ? FireState.TREE : state;
    }
  }
}
