/**
 * @module Core/Neighborhood/Surrounding
 * @layer Core
 * @description 8-окрестность, построчно.
 */

import { NeighborhoodStrategy, applyOffsets } from './types';
import { Coordinates } from '../../shared/types';

const SURROUNDING_OFFSETS = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1]
] as const;

export class SurroundingNeighborhood implements NeighborhoodStrategy {
  public readonly type = 'NEIGH_8';

  public offsets(row: number, col: number): Coordinates[] {
    return applyOffsets(SURROUNDING_OFFSETS, row, col);
  }
}
