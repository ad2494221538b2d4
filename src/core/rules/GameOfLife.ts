/**
 * @module Core/Rules/GameOfLife
 * @layer Core
 * @description Автомат рождения/выживания. Классическая игра: B3/S23.
 *
 * Правило задаётся числовым кодом (первая цифра рождение, остальные
 * выживание: 323 = B3/S23) или строкой B/S (`B36/S23`, `S23/B3`).
 */

import { Simulation } from '../simulation/Simulation';
import { LIFE_STATES, LifeState } from '../../entities/Life';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { lifeParametersSchema, parseParameters } from '../config/parameters';
import { SimulationInput } from '../../shared/types';
import { ConstructionError } from '../../shared/lib/errors';

export interface LifeRule {
  birth: ReadonlySet<number>;
  survival: ReadonlySet<number>;
}

const digitsOf = (text: string): Set<number> => new Set([...text].map(Number));

export const parseRuleCode = (code: number): LifeRule => {
  const text = String(code);
  return {
    birth: digitsOf(text.slice(0, 1)),
    survival: digitsOf(text.slice(1))
  };
};

const BIRTH_FIRST = /^B([0-8]*)\/?S([0-8]*)$/;
const SURVIVAL_FIRST = /^S([0-8]*)\/?B([0-8]*)$/;

/**
 * @throws {ConstructionError} for anything that is not a B/S rule string
 */
export const parseRuleString = (rule: string): LifeRule => {
  const normalized = rule.trim().toUpperCase();
  const birthFirst = BIRTH_FIRST.exec(normalized);
  if (birthFirst) {
    return { birth: digitsOf(birthFirst[1]), survival: digitsOf(birthFirst[2]) };
  }
  const survivalFirst = SURVIVAL_FIRST.exec(normalized);
  if (survivalFirst) {
    return { birth: digitsOf(survivalFirst[2]), survival: digitsOf(survivalFirst[1]) };
  }
  throw new ConstructionError(`Invalid rule string "${rule}"`);
};

export interface GameOfLifeOptions {
  /** Перекрывает числовой параметр `rule` */
  ruleString?: string;
}

export class GameOfLife extends Simulation<LifeState> {
  private readonly rule: LifeRule;

  constructor(input: SimulationInput, options: GameOfLifeOptions = {}) {
    super(input, LIFE_STATES, SIMULATION_DEFAULTS[SimulationKind.GAME_OF_LIFE]);
    const params = parseParameters(lifeParametersSchema, input.parameters, 'game of life');
    this.rule = options.ruleString !== undefined ? parseRuleString(options.ruleString) : parseRuleCode(params.rule);
    this.finishLoad();
  }

  public getRule(): LifeRule {
    return this.rule;
  }

  protected applyRules(): void {
    for (const { row, col } of this.grid.coordinates()) {
      const cell = this.grid.cellAt(row, col);
      const alive = this.grid.getNeighbors(row, col)
        .filter(neighbor => neighbor.getCurrent() === LifeState.ALIVE).length;

      if (cell.getCurrent() === LifeState.ALIVE) {
        cell.setNext(this.rule.survival.has(alive) ? LifeState.ALIVE : LifeState.DEAD);
      } else {
        cell.setNext(this.rule.birth.has(alive) ? LifeState.ALIVE : LifeState.DEAD);
      }
    }
  }
}
