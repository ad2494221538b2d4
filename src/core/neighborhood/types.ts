/**
 * @module Core/Neighborhood/Types
 * @layer Core
 * @description Политика соседства: координаты-кандидаты вокруг центра.
 * Допустимость и сворачивание решает стратегия границ, а не эта.
 */

import { Coordinates } from '../../shared/types';

export interface NeighborhoodStrategy {
  /** Стабильный тег для конфигурации, например `NEIGH_EXT_2` */
  readonly type: string;
  /** Координаты-кандидаты в стабильном порядке, без центра. */
  offsets(row: number, col: number): Coordinates[];
}

type Offset = readonly [number, number];

/** Применяет фиксированную таблицу смещений вокруг центра. */
export const applyOffsets = (table: readonly Offset[], row: number, col: number): Coordinates[] =>
  table.map(([dr, dc]) => ({ row: row + dr, col: col + dc }));
