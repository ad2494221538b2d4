/**
 * @module Core/Boundary/Types
 * @layer Core
 * @description Контракт между Grid и её политикой границ.
 */

import type { Cell } from '../grid/Cell';
import type { BoundaryType, Coordinates } from '../../shared/types';

/**
 * Часть Grid, которую видит стратегия границ.
 * Координаты логические: решётка покрывает
 * `[rowStart, rowStart + rows) x [colStart, colStart + cols)`.
 */
export interface Lattice<S extends string> {
  readonly rows: number;
  readonly cols: number;
  readonly rowStart: number;
  readonly colStart: number;
  isInBounds(row: number, col: number): boolean;
  /** Прямой доступ к хранилищу без политики. */
  cellAt(row: number, col: number): Cell<S>;
  expand(rowMin: number, rowMax: number, colMin: number, colMax: number): void;
}

/**
 * Политика без состояния: переводит запрошенную координату в клетку, которая
 * за неё отвечает. `resolve` не возвращает клетку для координаты, отвергнутой `isValid`.
 */
export interface BoundaryStrategy {
  readonly type: BoundaryType;
  isValid<S extends string>(grid: Lattice<S>, row: number, col: number): boolean;
  /** Разрешённая логическая координата или null для недопустимого запроса. */
  locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null;
  resolve<S extends string>(grid: Lattice<S>, row: number, col: number): Cell<S> | null;
}

export abstract class BaseBoundary implements BoundaryStrategy {
  public abstract readonly type: BoundaryType;

  public abstract isValid<S extends string>(grid: Lattice<S>, row: number, col: number): boolean;

  public abstract locate<S extends string>(grid: Lattice<S>, row: number, col: number): Coordinates | null;

  public resolve<S extends string>(grid: Lattice<S>, row: number, col: number): Cell<S> | null {
    const target = this.locate(grid, row, col);
    return target ? grid.cellAt(target.row, target.col) : null;
  }
}
