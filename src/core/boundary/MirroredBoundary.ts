/**
 * @module Core/Boundary/Mirrored
 * @layer Core
 * @description Зеркальные края.
 *
 * Настоящее отражение с повтором крайней клетки: для стороны длины n индекс -1
 * переходит в 0, -2 в 1, n в n-1, n+1 в n-2. Отображение периодично с периодом
 * 2n, поэтому смещение на любое расстояние попадает на решётку
 * (2n переходит в 0, 3n в n-1).
 */

import { BaseBoundary, Lattice } from './types';
import { Coordinates } from '../../shared/types';
import { floorMod } from './WrappedBoundary';

/** Отражает индекс с нуля в [0, size). */
export const reflectIndex = (index: number, size: number): number => {
  const folded = floorMod(index, 2 * size);
  return folded < size ? folded : 2 * size - 1 - folded;
};

export class MirroredBoundary extends BaseBoundary {
  public readonly type = 'MIRRORED' as const;

  public isValid<S extends string>(_grid: Lattice<S>, _row: number, _col: number): boolean {
    return true;
  }

  public locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null {
    if (grid.rows === 0 || grid.cols === 0) return null;
    return {
      row: grid.rowStart + reflectIndex(row - grid.rowStart, grid.rows),
      col: grid.colStart + reflectIndex(col - grid.colStart, grid.cols)
    };
  }
}
