/**
 * @module Core/Rules/TempestiLoop
 * @layer Core
 * @description Вариант самовоспроизводящейся петли по правилам Темпести.
 * Использует механизм таблицы переходов LoopAutomaton со своей таблицей.
 *
 * Сигналы INIT/ADVANCE проходят через оболочку, превращая её во временное
 * состояние TEMP; TEMP и EXTEND затем возвращаются в оболочку.
 * `extendRate` отправляет TEMP в EXTEND вместо SHEATH.
 */

import { LoopAutomaton, LoopTransition, LoopVariant, VonNeumannStates, count } from './LoopAutomaton';
import { LoopState } from '../../entities/Loop';
import { SimulationKind } from '../../entities/Simulations';
import { parseParameters, tempestiParametersSchema } from '../config/parameters';
import { SimulationInput } from '../../shared/types';

const always = (): boolean => true;

export const TEMPESTI_TRANSITIONS: readonly LoopTransition[] = [
  {
    from: LoopState.EMPTY,
    to: LoopState.SHEATH,
    when: n => count(n, LoopState.ADVANCE) >= 1 ||
      count(n, LoopState.SHEATH) >= 2 ||
      count(n, LoopState.TEMP) >= 2 ||
      count(n, LoopState.INIT) >= 1 ||
      count(n, LoopState.EXTEND) >= 1
  },
  {
    from: LoopState.SHEATH,
    to: LoopState.TEMP,
    when: n => count(n, LoopState.INIT) >= 1 || count(n, LoopState.ADVANCE) >= 1
  },
  { from: LoopState.CORE, to: LoopState.INIT, when: n => count(n, LoopState.SHEATH) >= 2 },
  { from: LoopState.INIT, to: LoopState.ADVANCE, when: n => count(n, LoopState.SHEATH) >= 1 },
  { from: LoopState.ADVANCE, to: LoopState.EXTEND, when: n => count(n, LoopState.EMPTY) >= 1 },
  { from: LoopState.TEMP, to: LoopState.SHEATH, when: always },
  { from: LoopState.TURN, to: LoopState.SHEATH, when: n => count(n, LoopState.EXTEND) >= 1 },
  { from: LoopState.EXTEND, to: LoopState.SHEATH, when: always }
];

export const TEMPESTI_VARIANT: LoopVariant = {
  kind: SimulationKind.TEMPESTI,
  label: 'tempesti',
  transitions: TEMPESTI_TRANSITIONS
};

export class TempestiLoop extends LoopAutomaton {
  private readonly extendRate: number;

  constructor(input: SimulationInput) {
    super(input, TEMPESTI_VARIANT);
    this.extendRate = parseParameters(tempestiParametersSchema, input.parameters, 'tempesti').extendRate;
  }

  protected nextState(state: LoopState, neighbors: VonNeumannStates): LoopState {
    const next = super.nextState(state, neighbors);
    if (state === LoopState.TEMP && next === LoopState.SHEATH && this.random.chance(this.extendRate)) {
      return LoopState.EXTEND;
    }
    return next;
  }
}
