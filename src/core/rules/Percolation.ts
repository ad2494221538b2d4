/**
 * @module Core/Rules/Percolation
 * @layer Core
 * @description Открытые клетки рядом с просочившейся просачиваются с
 * вероятностью `probPercolate`. Заблокированные клетки не меняются.
 */

import { Simulation } from '../simulation/Simulation';
import { PERCOLATION_STATES, PercolationState } from '../../entities/Percolation';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { PercolationParameters, parseParameters, percolationParametersSchema } from '../config/parameters';
import { SimulationInput } from '../../shared/types';

export class Percolation extends Simulation<PercolationState> {
  private readonly params: PercolationParameters;

  constructor(input: SimulationInput) {
    super(input, PERCOLATION_STATES, SIMULATION_DEFAULTS[SimulationKind.PERCOLATION]);
    this.params = parseParameters(percolationParametersSchema, input.parameters, 'percolation');
    this.finishLoad();
  }

  protected applyRules(): void {
    for (const { row, col } of this.grid.coordinates()) {
      const cell = this.grid.cellAt(row, col);
      if (cell.getCurrent() !== PercolationState.OPEN) continue;

      const reached = this.grid.getNeighbors(row, col)
        .some(neighbor => neighbor.getCurrent() === PercolationState.PERCOLATED);
      if (reached && this.random.chance(this.params.probPercolate)) {
        cell.setNext(PercolationState.PERCOLATED);
      }
    }
  }

  /** true, как только просочилась любая клетка нижней строки */
  public hasPercolated(): boolean {
    const bottom = this.grid.rowStart + this.grid.rows - 1;
    for (let col = this.grid.colStart; col < this.grid.colStart + this.grid.cols; col++) {
      if (this.grid.cellAt(bottom, col).getCurrent() === PercolationState.PERCOLATED) return true;
    }
    return false;
  }
}
