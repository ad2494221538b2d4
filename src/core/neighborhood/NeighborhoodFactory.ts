/**
 * @module Core/Neighborhood/Factory
 * @layer Core
 * @description Разбор тегов окрестности.
 *
 * Допустимые теги:
 * - `NEIGH_4`, `NEIGH_8`
 * - `NEIGH_EXT_<k>`, где k положительное целое
 * - `NEIGH_COMPOSITE` (пустое объединение) или `NEIGH_COMPOSITE:<tag>+<tag>...`
 */

import { NeighborhoodStrategy } from './types';
import { OrthogonalNeighborhood } from './OrthogonalNeighborhood';
import { SurroundingNeighborhood } from './SurroundingNeighborhood';
import { ExtendedNeighborhood } from './ExtendedNeighborhood';
import { CompositeNeighborhood } from './CompositeNeighborhood';
import { UnknownStrategyError } from '../../shared/lib/errors';

const EXTENDED_PATTERN = /^NEIGH_EXT_(\d+)$/;
const COMPOSITE_TAG = 'NEIGH_COMPOSITE';

export const createNeighborhoodStrategy = (tag: string): NeighborhoodStrategy => {
  const normalized = tag.trim().toUpperCase();

  if (normalized === 'NEIGH_4') return new OrthogonalNeighborhood();
  if (normalized === 'NEIGH_8') return new SurroundingNeighborhood();

  const extended = EXTENDED_PATTERN.exec(normalized);
  if (extended) {
    const radius = Number(extended[1]);
    if (radius < 1) throw new UnknownStrategyError('neighborhood strategy', tag);
    return new ExtendedNeighborhood(radius);
  }

  if (normalized === COMPOSITE_TAG) return new CompositeNeighborhood([]);

  if (normalized.startsWith(`${COMPOSITE_TAG}:`)) {
    const parts = normalized.slice(COMPOSITE_TAG.length + 1).split('+');
    if (parts.some(part => part.length === 0 || part.startsWith(COMPOSITE_TAG))) {
      throw new UnknownStrategyError('neighborhood strategy', tag);
    }
    return new CompositeNeighborhood(parts.map(createNeighborhoodStrategy));
  }

  throw new UnknownStrategyError('neighborhood strategy', tag);
};
