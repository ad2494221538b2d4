/**
 * @module Core/Simulation/VisitationGuard
 * @layer Core
 * @description Отметки клеток, уже участвовавших в ходе за текущий тик.
 *
 * Создаётся в начале тика наборами правил, которые перемещают агентов, и
 * отбрасывается в конце. Клетка, помеченная как источник или цель, в этом
 * тике больше не трогается, поэтому агент ходит не больше одного раза и ни
 * одна цель не занимается дважды.
 */

import { Coordinates } from '../../shared/types';

interface Extent {
  rows: number;
  cols: number;
  rowStart: number;
  colStart: number;
}

export class VisitationGuard {
  private readonly extent: Extent;
  private readonly visited: Uint8Array;
  // Cells materialized after the guard was created (growable grids)
  private readonly overflow = new Set<string>();

  constructor(extent: Extent) {
    // Field by field: a Grid exposes its extent through getters
    this.extent = { rows: extent.rows, cols: extent.cols, rowStart: extent.rowStart, colStart: extent.colStart };
    this.visited = new Uint8Array(this.extent.rows * this.extent.cols);
  }

  private indexOf(row: number, col: number): number {
    const r = row - this.extent.rowStart;
    const c = col - this.extent.colStart;
    if (r < 0 || c < 0 || r >= this.extent.rows || c >= this.extent.cols) return -1;
    return r * this.extent.cols + c;
  }

  public isVisited(row: number, col: number): boolean {
    const index = this.indexOf(row, col);
    return index < 0 ? this.overflow.has(`${row},${col}`) : this.visited[index] === 1;
  }

  public mark(row: number, col: number): void {
    const index = this.indexOf(row, col);
    if (index < 0) {
      this.overflow.add(`${row},${col}`);
    } else {
      this.visited[index] = 1;
    }
  }

  public markMove(from: Coordinates, to: Coordinates): void {
    this.mark(from.row, from.col);
    this.mark(to.row, to.col);
  }
}
