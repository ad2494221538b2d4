/**
 * @module Core/Systems/SugarScape/Landscape
 * @layer Core
 * @description Ландшафт ёмкостей и создание агентов.
 */

import { RandomSource } from '../../utils/random';
import { Pattern, SUGARSCAPE_CONSTANTS, Sex, SugarAgent } from '../../../entities/SugarScape';

const { PEAK_CAPACITY, VISION, METABOLISM, INITIAL_SUGAR, INITIAL_SPICE, IMMUNE_LENGTH, FERTILITY } = SUGARSCAPE_CONSTANTS;

/**
 * Две вершины в противоположных углах: ёмкость падает на единицу с каждой
 * единицей расстояния до ближнего угла и не опускается ниже 1.
 */
export const capacityAt = (row: number, col: number, rows: number, cols: number): number => {
  const toOrigin = Math.hypot(row, col);
  const toFarCorner = Math.hypot(rows - row - 1, cols - col - 1);
  return Math.floor(Math.max(PEAK_CAPACITY - Math.min(toOrigin, toFarCorner), 1));
};

const between = (random: RandomSource, range: { min: number; max: number }): number =>
  range.min + random.nextInt(range.max - range.min + 1);

export const randomPattern = (random: RandomSource, length: number): Pattern =>
  Array.from({ length }, () => random.nextInt(2));

export const randomSex = (random: RandomSource): Sex => (random.chance(0.5) ? Sex.MALE : Sex.FEMALE);

export const createAgent = (random: RandomSource): SugarAgent => {
  const sugar = between(random, INITIAL_SUGAR);
  return {
    sugar,
    spice: between(random, INITIAL_SPICE),
    vision: between(random, VISION),
    metabolism: between(random, METABOLISM),
    endowment: sugar,
    sex: randomSex(random),
    age: 0,
    immune: randomPattern(random, IMMUNE_LENGTH),
    diseases: []
  };
};

export const isFertile = (agent: SugarAgent): boolean =>
  agent.age >= FERTILITY.from && agent.age <= FERTILITY.to;
