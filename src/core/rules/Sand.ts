/**
 * @module Core/Rules/Sand
 * @layer Core
 * @description Сыпучие частицы под действием тяжести.
 *
 * Песок падает вниз, а если снизу занято, то по диагонали. Вода падает так же,
 * но сначала пытается растечься вбок на `waterSpread` клеток. Стены неподвижны.
 * Строки обходятся снизу вверх со сменой направления. Обе клетки хода
 * помечаются в охранной решётке тика, поэтому каждая частица сдвигается не
 * больше одного раза и две частицы не занимают одну клетку.
 */

import { Simulation } from '../simulation/Simulation';
import { VisitationGuard } from '../simulation/VisitationGuard';
import { SAND_STATES, SandState } from '../../entities/Sand';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { SandParameters, parseParameters, sandParametersSchema } from '../config/parameters';
import { Coordinates, SimulationInput } from '../../shared/types';

const isParticle = (state: SandState): boolean => state === SandState.SAND || state === SandState.WATER;

export class Sand extends Simulation<SandState> {
  private readonly params: SandParameters;

  constructor(input: SimulationInput) {
    super(input, SAND_STATES, SIMULATION_DEFAULTS[SimulationKind.SAND]);
    this.params = parseParameters(sandParametersSchema, input.parameters, 'sand');
    this.finishLoad();
  }

  /** Снизу вверх; чётные строки слева направо, нечётные справа налево */
  private scanOrder(): Coordinates[] {
    const { rows, cols, rowStart, colStart } = this.grid;
    const order: Coordinates[] = [];
    for (let r = rows - 1; r >= 0; r--) {
      for (let i = 0; i < cols; i++) {
        const c = r % 2 === 0 ? i : cols - 1 - i;
        order.push({ row: rowStart + r, col: colStart + c });
      }
    }
    return order;
  }

  protected applyRules(): void {
    const guard = new VisitationGuard(this.grid);
    for (const at of this.scanOrder()) {
      const state = this.grid.cellAt(at.row, at.col).getCurrent();
      if (!isParticle(state) || guard.isVisited(at.row, at.col)) continue;

      const to = this.destination(at, state, guard);
      if (to) {
        this.grid.cellAt(at.row, at.col).setNext(SandState.EMPTY);
        this.grid.cellAt(to.row, to.col).setNext(state);
        guard.markMove(at, to);
      }
    }
  }

  private destination(at: Coordinates, state: SandState, guard: VisitationGuard): Coordinates | null {
    const below = this.free(at.row + 1, at.col, guard);
    if (below) return below;

    const [first, second] = this.random.chance(0.5) ? [-1, 1] : [1, -1];
    if (state === SandState.WATER) {
      const sideways = this.slide(at, first, guard) ?? this.slide(at, second, guard);
      if (sideways) return sideways;
    }
    return this.free(at.row + 1, at.col + first, guard) ?? this.free(at.row + 1, at.col + second, guard);
  }

  /** Самая дальняя свободная клетка в строке, не дальше `waterSpread` */
  private slide(at: Coordinates, direction: number, guard: VisitationGuard): Coordinates | null {
    let reached: Coordinates | null = null;
    for (let distance = 1; distance <= this.params.waterSpread; distance++) {
      const next = this.free(at.row, at.col + direction * distance, guard);
      if (!next) break;
      reached = next;
    }
    return reached;
  }

  private free(row: number, col: number, guard: VisitationGuard): Coordinates | null {
    const at = this.grid.locate(row, col);
    if (!at || guard.isVisited(at.row, at.col)) return null;
    return this.grid.cellAt(at.row, at.col).getCurrent() === SandState.EMPTY ? at : null;
  }
}
