/**
 * @module Core/Boundary/Bounded
 * @layer Core
 * @description Жёсткие края: всё за пределами решётки недопустимо.
 */

import { BaseBoundary, Lattice } from './types';
import { Coordinates } from '../../shared/types';

export class BoundedBoundary extends BaseBoundary {
  public readonly type = 'BOUNDED' as const;

  public isValid<S extends string>(grid: Lattice<S>, row: number, col: number): boolean {
    return grid.isInBounds(row, col);
  }

  public locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null {
    return grid.isInBounds(row, col) ? { row, col } : null;
  }
}
