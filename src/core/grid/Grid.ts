/**
 * @module Core/Grid
 * @layer Core
 * @description Двумерная решётка клеток с одной стратегией границ и одной
 * стратегией соседства. Варианты топологии внедряются как стратегии, а не как
 * подклассы Grid.
 *
 * СИСТЕМА КООРДИНАТ:
 * - Логические координаты видит вызывающий код. Новая сетка покрывает
 *   [0, rows) x [0, cols).
 * - Индексы хранения: [0..rows-1] x [0..cols-1].
 * - Перевод: storage = logical - start. `rowStart`/`colStart` сдвигаются только
 *   при расширении растущей сетки вверх или влево, поэтому логические
 *   координаты существующих клеток не меняются.
 *
 * ИСТОРИЯ:
 * - `commitAll()` заполняет единственный слот истории снимком до фиксации.
 * - `rollbackOnce()` его расходует. Более глубокой истории нет.
 */

import { Cell } from './Cell';
import { BoundaryStrategy, Lattice } from '../boundary/types';
import { BoundedBoundary } from '../boundary/BoundedBoundary';
import { NeighborhoodStrategy } from '../neighborhood/types';
import { SurroundingNeighborhood } from '../neighborhood/SurroundingNeighborhood';
import { Coordinates, Restore } from '../../shared/types';
import { InvariantViolationError, OutOfBoundsError } from '../../shared/lib/errors';
import { createLogger } from '../../shared/lib/logger';

const logger = createLogger('Grid');

interface GridSnapshot<S extends string> {
  cells: Cell<S>[][];
  rows: number;
  cols: number;
  rowStart: number;
  colStart: number;
  restorers: Restore[];
}

export class Grid<S extends string> implements Lattice<S> {
  private cells: Cell<S>[][];
  private rowCount: number;
  private colCount: number;
  private rowOrigin = 0;
  private colOrigin = 0;
  private boundary: BoundaryStrategy;
  private neighborhood: NeighborhoodStrategy;
  private history: GridSnapshot<S> | null = null;
  public readonly defaultState: S;

  constructor(
    rows: number,
    cols: number,
    defaultState: S,
    boundary: BoundaryStrategy = new BoundedBoundary(),
    neighborhood: NeighborhoodStrategy = new SurroundingNeighborhood()
  ) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
      throw new RangeError(`Grid dimensions must be non-negative integers: ${rows}x${cols}`);
    }
    this.rowCount = rows;
    this.colCount = cols;
    this.defaultState = defaultState;
    this.boundary = boundary;
    this.neighborhood = neighborhood;
    this.cells = Grid.fill(rows, cols, () => new Cell(defaultState));
  }

  private static fill<T>(rows: number, cols: number, make: (r: number, c: number) => T): T[][] {
    return Array.from({ length: rows }, (_, r) => Array.from({ length: cols }, (_, c) => make(r, c)));
  }

  // --- Dimensions ---

  public get rows(): number {
    return this.rowCount;
  }

  public get cols(): number {
    return this.colCount;
  }

  /** Логическая строка первой хранимой строки (0, пока сетка не выросла вверх) */
  public get rowStart(): number {
    return this.rowOrigin;
  }

  public get colStart(): number {
    return this.colOrigin;
  }

  public get area(): number {
    return this.rowCount * this.colCount;
  }

  public isInBounds(row: number, col: number): boolean {
    return row >= this.rowOrigin && row < this.rowOrigin + this.rowCount &&
      col >= this.colOrigin && col < this.colOrigin + this.colCount;
  }

  /**
   * Упорядоченный список всех логических координат на текущий момент. Обход идёт
   * по этому списку, и расширение сетки во время обхода его не сдвигает.
   */
  public coordinates(): Coordinates[] {
    const result: Coordinates[] = [];
    for (let r = 0; r < this.rowCount; r++) {
      for (let c = 0; c < this.colCount; c++) {
        result.push({ row: r + this.rowOrigin, col: c + this.colOrigin });
      }
    }
    return result;
  }

  // --- Access ---

  /**
   * Прямой доступ к хранилищу в логических координатах, без политики границ.
   * @throws {OutOfBoundsError}
   */
  public cellAt(row: number, col: number): Cell<S> {
    if (!this.isInBounds(row, col)) {
      throw new OutOfBoundsError(row, col);
    }
    return this.cells[row - this.rowOrigin][col - this.colOrigin];
  }

  /**
   * Поиск клетки через стратегию границ.
   * @throws {OutOfBoundsError}, если активная граница отвергает координату
   */
  public getCell(row: number, col: number): Cell<S> {
    const cell = this.boundary.resolve(this, row, col);
    if (!cell) {
      throw new OutOfBoundsError(row, col);
    }
    return cell;
  }

  /** Как getCell, но вместо исключения возвращает undefined. */
  public findCell(row: number, col: number): Cell<S> | undefined {
    return this.boundary.resolve(this, row, col) ?? undefined;
  }

  public isValidPosition(row: number, col: number): boolean {
    return this.boundary.isValid(this, row, col);
  }

  /** Разрешённая координата запроса или null, если граница её отвергает. */
  public locate(row: number, col: number): Coordinates | null {
    return this.boundary.locate(this, row, col);
  }

  /**
   * Разрешённые координаты соседей в порядке окрестности, неразрешённые
   * отбрасываются. При свёртке и отражении координата может повторяться.
   */
  public getNeighborCoordinates(row: number, col: number): Coordinates[] {
    this.requireCentre(row, col);
    const result: Coordinates[] = [];
    for (const candidate of this.neighborhood.offsets(row, col)) {
      const resolved = this.boundary.locate(this, candidate.row, candidate.col);
      if (resolved) result.push(resolved);
    }
    return result;
  }

  public getNeighbors(row: number, col: number): Cell<S>[] {
    return this.getNeighborCoordinates(row, col).map(({ row: r, col: c }) => this.cellAt(r, c));
  }

  private requireCentre(row: number, col: number): void {
    if (this.isInBounds(row, col)) return;
    if (this.boundary.type === 'GROWABLE') {
      this.boundary.locate(this, row, col);
      return;
    }
    throw new OutOfBoundsError(row, col);
  }

  // --- Mutation ---

  /**
   * Заменяет хранимый объект клетки, например простую клетку на клетку
   * с нагрузкой.
   */
  public setCellAt(row: number, col: number, cell: Cell<S>): void {
    if (!this.isInBounds(row, col)) {
      throw new OutOfBoundsError(row, col);
    }
    this.cells[row - this.rowOrigin][col - this.colOrigin] = cell;
  }

  /** Фиксирует все клетки. Состояние до фиксации становится слотом отмены. */
  public commitAll(): void {
    this.history = this.captureSnapshot();
    for (const row of this.cells) {
      for (const cell of row) {
        cell.commit();
      }
    }
  }

  /** @returns false, если отменять больше нечего */
  public rollbackOnce(): boolean {
    const snapshot = this.history;
    if (!snapshot) return false;

    this.cells = snapshot.cells;
    this.rowCount = snapshot.rows;
    this.colCount = snapshot.cols;
    this.rowOrigin = snapshot.rowStart;
    this.colOrigin = snapshot.colStart;
    snapshot.restorers.forEach(restore => restore());
    this.history = null;
    return true;
  }

  public hasHistory(): boolean {
    return this.history !== null;
  }

  public clearHistory(): void {
    this.history = null;
  }

  /** Все клетки в одно состояние, история сбрасывается. */
  public resetAll(state: S): void {
    for (const row of this.cells) {
      for (const cell of row) {
        cell.resetTo(state);
      }
    }
    this.history = null;
  }

  /**
   * Расширяет хранилище до логического прямоугольника и заполняет новые
   * координаты состоянием по умолчанию. Существующие клетки сохраняют
   * логические координаты. Никогда не сжимается.
   */
  public expand(rowMin: number, rowMax: number, colMin: number, colMax: number): void {
    if (rowMin > rowMax || colMin > colMax) {
      throw new InvariantViolationError(`Invalid expansion box rows ${rowMin}..${rowMax}, cols ${colMin}..${colMax}`);
    }
    const newRowStart = Math.min(this.rowOrigin, rowMin);
    const newColStart = Math.min(this.colOrigin, colMin);
    const newRowEnd = Math.max(this.rowOrigin + this.rowCount - 1, rowMax);
    const newColEnd = Math.max(this.colOrigin + this.colCount - 1, colMax);
    const newRows = newRowEnd - newRowStart + 1;
    const newCols = newColEnd - newColStart + 1;

    if (newRows === this.rowCount && newCols === this.colCount) return;

    this.cells = Grid.fill(newRows, newCols, (r, c) => {
      const row = r + newRowStart;
      const col = c + newColStart;
      return this.isInBounds(row, col) ? this.cellAt(row, col) : new Cell(this.defaultState);
    });
    this.rowCount = newRows;
    this.colCount = newCols;
    this.rowOrigin = newRowStart;
    this.colOrigin = newColStart;

    logger.debug(`Grid expanded to ${newRows}x${newCols} starting at (${newRowStart}, ${newColStart})`);
  }

  // --- Strategies ---

  public getBoundaryStrategy(): BoundaryStrategy {
    return this.boundary;
  }

  public setBoundaryStrategy(boundary: BoundaryStrategy): void {
    this.boundary = boundary;
  }

  public getNeighborhoodStrategy(): NeighborhoodStrategy {
    return this.neighborhood;
  }

  public setNeighborhoodStrategy(neighborhood: NeighborhoodStrategy): void {
    this.neighborhood = neighborhood;
  }

  // --- Iteration ---

  public forEachCell(visit: (cell: Cell<S>, row: number, col: number) => void): void {
    for (let r = 0; r < this.rowCount; r++) {
      for (let c = 0; c < this.colCount; c++) {
        visit(this.cells[r][c], r + this.rowOrigin, c + this.colOrigin);
      }
    }
  }

  private captureSnapshot(): GridSnapshot<S> {
    const restorers: Restore[] = [];
    const cells = this.cells.map(row => row.map(cell => {
      restorers.push(cell.snapshot());
      return cell;
    }));
    return {
      cells,
      rows: this.rowCount,
      cols: this.colCount,
      rowStart: this.rowOrigin,
      colStart: this.colOrigin,
      restorers
    };
  }
}
