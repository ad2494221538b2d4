/**
 * @module Core/Rules/LoopAutomaton
 * @layer Core
 * @description Самовоспроизводящаяся петля на окрестности фон Неймана.
 *
 * Переходы заданы упорядоченной таблицей; срабатывает первое правило с
 * подходящим состоянием и истинным предикатом. Предикаты видят соседей в
 * порядке N, E, S, W. Соседи, отвергнутые границей, читаются как EMPTY.
 *
 * `sparkRate` вбрасывает сигналы INIT/EXTEND в спокойные клетки,
 * `mutationRate` заменяет результат сработавшего правила случайным состоянием.
 * Оба по умолчанию 0, и автомат остаётся детерминированным.
 */

import { Simulation } from '../simulation/Simulation';
import { ORTHOGONAL_OFFSETS } from '../neighborhood/OrthogonalNeighborhood';
import { LOOP_MINIMUM_SIZE, LOOP_STATES, LoopState } from '../../entities/Loop';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { LoopParameters, loopParametersSchema, parseParameters } from '../config/parameters';
import { SimulationInput } from '../../shared/types';
import { ConstructionError } from '../../shared/lib/errors';

/** [N, E, S, W] */
export type VonNeumannStates = readonly [LoopState, LoopState, LoopState, LoopState];

export interface LoopTransition {
  from: LoopState;
  to: LoopState;
  when: (neighbors: VonNeumannStates) => boolean;
}

export const count = (neighbors: VonNeumannStates, state: LoopState): number =>
  neighbors.filter(neighbor => neighbor === state).length;

const NORTH = 0;
const EAST = 1;
const SOUTH = 2;
const WEST = 3;

export const LOOP_TRANSITIONS: readonly LoopTransition[] = [
  // growth into empty space
  {
    from: LoopState.EMPTY,
    to: LoopState.SHEATH,
    when: n => count(n, LoopState.EXTEND) >= 1 || count(n, LoopState.CORE) >= 2
  },
  // signal propagation
  {
    from: LoopState.INIT,
    to: LoopState.ADVANCE,
    when: n => n[NORTH] === LoopState.CORE || n[SOUTH] === LoopState.CORE || count(n, LoopState.EXTEND) >= 1
  },
  {
    from: LoopState.ADVANCE,
    to: LoopState.EXTEND,
    when: n => count(n, LoopState.SHEATH) >= 1 || count(n, LoopState.CORE) >= 1 || count(n, LoopState.INIT) >= 1
  },
  {
    from: LoopState.EXTEND,
    to: LoopState.TEMP,
    when: n => count(n, LoopState.EMPTY) >= 2 || count(n, LoopState.ADVANCE) >= 1
  },
  {
    from: LoopState.EXTEND,
    to: LoopState.CORE,
    when: n => count(n, LoopState.SHEATH) >= 2 || count(n, LoopState.TEMP) >= 1
  },
  {
    from: LoopState.TEMP,
    to: LoopState.CORE,
    when: n => count(n, LoopState.CORE) >= 1 || count(n, LoopState.SHEATH) >= 2 || count(n, LoopState.EXTEND) >= 2
  },
  {
    from: LoopState.CORE,
    to: LoopState.TURN,
    when: n => count(n, LoopState.SHEATH) >= 3 ||
      (count(n, LoopState.EXTEND) >= 2 && count(n, LoopState.SHEATH) >= 1)
  },
  {
    from: LoopState.TURN,
    to: LoopState.INIT,
    when: n => (n[NORTH] === LoopState.CORE && n[WEST] === LoopState.SHEATH) ||
      (n[SOUTH] === LoopState.CORE && n[EAST] === LoopState.SHEATH) ||
      count(n, LoopState.EXTEND) >= 2
  },
  {
    from: LoopState.SHEATH,
    to: LoopState.CORE,
    when: n => count(n, LoopState.CORE) >= 2 || (count(n, LoopState.TURN) >= 1 && count(n, LoopState.CORE) >= 1)
  },
  {
    from: LoopState.SHEATH,
    to: LoopState.EXTEND,
    when: n => count(n, LoopState.EXTEND) >= 1 || count(n, LoopState.ADVANCE) >= 1
  },
  // keep quiet structures moving
  {
    from: LoopState.CORE,
    to: LoopState.ADVANCE,
    when: n => count(n, LoopState.INIT) >= 1 && count(n, LoopState.EMPTY) >= 2
  },
  {
    from: LoopState.SHEATH,
    to: LoopState.INIT,
    when: n => count(n, LoopState.EMPTY) >= 3 && count(n, LoopState.CORE) >= 1
  }
];

const ALL_STATES = Object.values(LoopState);

/** Семейство правил петли: вид в реестре и таблица переходов */
export interface LoopVariant {
  kind: SimulationKind.LOOP | SimulationKind.TEMPESTI;
  label: string;
  transitions: readonly LoopTransition[];
}

export const LANGTON_VARIANT: LoopVariant = {
  kind: SimulationKind.LOOP,
  label: 'loop',
  transitions: LOOP_TRANSITIONS
};

export class LoopAutomaton extends Simulation<LoopState> {
  private readonly params: LoopParameters;
  private readonly transitions: readonly LoopTransition[];

  constructor(input: SimulationInput, variant: LoopVariant = LANGTON_VARIANT) {
    if (input.width < LOOP_MINIMUM_SIZE || input.height < LOOP_MINIMUM_SIZE) {
      throw new ConstructionError(
        `Loop automaton needs at least ${LOOP_MINIMUM_SIZE}x${LOOP_MINIMUM_SIZE} cells, got ${input.height}x${input.width}`
      );
    }
    super(input, LOOP_STATES, SIMULATION_DEFAULTS[variant.kind]);
    this.transitions = variant.transitions;
    this.params = parseParameters(loopParametersSchema, input.parameters, variant.label);
    this.finishLoad();
  }

  protected applyRules(): void {
    for (const { row, col } of this.grid.coordinates()) {
      const cell = this.grid.cellAt(row, col);
      cell.setNext(this.nextState(cell.getCurrent(), this.neighborStates(row, col)));
    }
  }

  private neighborStates(row: number, col: number): VonNeumannStates {
    const [north, east, south, west] = ORTHOGONAL_OFFSETS.map(([dr, dc]) => {
      const cell = this.grid.findCell(row + dr, col + dc);
      return cell ? cell.getCurrent() : LoopState.EMPTY;
    });
    return [north, east, south, west];
  }

  protected nextState(state: LoopState, neighbors: VonNeumannStates): LoopState {
    if (this.random.chance(this.params.sparkRate)) {
      if (state === LoopState.EMPTY) return LoopState.INIT;
      if (state === LoopState.SHEATH) return LoopState.EXTEND;
    }

    const match = this.transitions.find(rule => rule.from === state && rule.when(neighbors));
    if (match) {
      return this.random.chance(this.params.mutationRate) ? this.randomState() : match.to;
    }
    return state;
  }

  private randomState(): LoopState {
    return this.random.pick(ALL_STATES) ?? LoopState.EMPTY;
  }
}
