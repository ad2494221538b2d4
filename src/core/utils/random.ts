/**
 * @module Core/Utils/Random
 * @layer Core
 * @description Источник случайности с зерном. У каждой Simulation свой, поэтому
 * прогон воспроизводится по зерну.
 */

export interface RandomSource {
  /** Дробное число в [0, 1) */
  next(): number;
  /** Целое число в [0, bound) */
  nextInt(bound: number): number;
  /** true с вероятностью p */
  chance(p: number): boolean;
  /** Перемешивание Фишера-Йетса на месте; возвращает тот же массив */
  shuffle<T>(list: T[]): T[];
  /** Равновероятный элемент, undefined для пустого списка */
  pick<T>(list: readonly T[]): T | undefined;
}

/**
 * Генератор Mulberry32.
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = seed >>> 0;
  }

  public next(): number {
    let t = (this.state = (this.state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  public nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound <= 0) {
      throw new RangeError(`Bound must be a positive integer, got ${bound}`);
    }
    return Math.floor(this.next() * bound);
  }

  public chance(p: number): boolean {
    if (p <= 0) return false;
    if (p >= 1) return true;
    return this.next() < p;
  }

  public shuffle<T>(list: T[]): T[] {
    for (let i = list.length - 1; i > 0; i--) {
      const j = this.nextInt(i + 1);
      const tmp = list[i];
      list[i] = list[j];
      list[j] = tmp;
    }
    return list;
  }

  public pick<T>(list: readonly T[]): T | undefined {
    return list.length === 0 ? undefined : list[this.nextInt(list.length)];
  }
}
