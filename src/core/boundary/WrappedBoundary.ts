/**
 * @module Core/Boundary/Wrapped
 * @layer Core
 * @description Тороидальная топология. Любая координата допустима и сворачивается
 * на решётку по модулю.
 */

import { BaseBoundary, Lattice } from './types';
import { Coordinates } from '../../shared/types';

/** Остаток, неотрицательный и для отрицательного делимого. */
export const floorMod = (value: number, size: number): number => ((value % size) + size) % size;

export class WrappedBoundary extends BaseBoundary {
  public readonly type = 'WRAPPED' as const;

  public isValid<S extends string>(_grid: Lattice<S>, _row: number, _col: number): boolean {
    return true;
  }

  public locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null {
    if (grid.rows === 0 || grid.cols === 0) return null;
    return {
      row: grid.rowStart + floorMod(row - grid.rowStart, grid.rows),
      col: grid.colStart + floorMod(col - grid.colStart, grid.cols)
    };
  }
}
