/**
 * @module Core/Neighborhood/Extended
 * @layer Core
 * @description Все клетки на расстоянии Чебышёва не больше `radius`, построчно,
 * без центра. Радиус 1 даёт тот же список, что и 8-окрестность.
 */

import { NeighborhoodStrategy } from './types';
import { Coordinates } from '../../shared/types';

export class ExtendedNeighborhood implements NeighborhoodStrategy {
  public readonly type: string;
  private readonly radius: number;

  constructor(radius: number) {
    if (!Number.isInteger(radius) || radius < 1) {
      throw new RangeError(`Neighborhood radius must be a positive integer, got ${radius}`);
    }
    this.radius = radius;
    this.type = `NEIGH_EXT_${radius}`;
  }

  public getRadius(): number {
    return this.radius;
  }

  public offsets(row: number, col: number): Coordinates[] {
    const result: Coordinates[] = [];
    for (let dr = -this.radius; dr <= this.radius; dr++) {
      for (let dc = -this.radius; dc <= this.radius; dc++) {
        if (dr === 0 && dc === 0) continue;
        result.push({ row: row + dr, col: col + dc });
      }
    }
    return result;
  }
}
