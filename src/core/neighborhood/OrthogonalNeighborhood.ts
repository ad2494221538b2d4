/**
 * @module Core/Neighborhood/Orthogonal
 * @layer Core
 * @description 4-окрестность в порядке N, E, S, W. На этот порядок опираются
 * правила, которые различают соседей по позиции.
 */

import { NeighborhoodStrategy, applyOffsets } from './types';
import { Coordinates } from '../../shared/types';

export const ORTHOGONAL_OFFSETS = [
  [-1, 0], // N
  [0, 1],  // E
  [1, 0],  // S
  [0, -1]  // W
] as const;

export class OrthogonalNeighborhood implements NeighborhoodStrategy {
  public readonly type = 'NEIGH_4';

  public offsets(row: number, col: number): Coordinates[] {
    return applyOffsets(ORTHOGONAL_OFFSETS, row, col);
  }
}
