/**
 * @module Core/Boundary/Growable
 * @layer Core
 * @description Неограниченная топология. Запрос за пределами решётки расширяет
 * сетку ровно настолько, чтобы его вместить; новые клетки получают состояние
 * по умолчанию. Расширение происходит синхронно внутри `locate`/`resolve`.
 */

import { BaseBoundary, Lattice } from './types';
import { Coordinates } from '../../shared/types';

export class GrowableBoundary extends BaseBoundary {
  public readonly type = 'GROWABLE' as const;

  public isValid<S extends string>(_grid: Lattice<S>, _row: number, _col: number): boolean {
    return true;
  }

  public locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null {
    if (!grid.isInBounds(row, col)) {
      grid.expand(row, row, col, col);
    }
    return { row, col };
  }
}
