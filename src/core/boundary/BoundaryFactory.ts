/**
 * @module Core/Boundary/Factory
 * @layer Core
 * @description Преобразует тег границы (из конфигурации) в стратегию.
 */

import { BoundaryStrategy } from './types';
import { BoundedBoundary } from './BoundedBoundary';
import { WrappedBoundary } from './WrappedBoundary';
import { MirroredBoundary } from './MirroredBoundary';
import { GrowableBoundary } from './GrowableBoundary';
import { BoundaryType } from '../../shared/types';
import { UnknownStrategyError } from '../../shared/lib/errors';

const BOUNDARY_BUILDERS: Record<BoundaryType, () => BoundaryStrategy> = {
  BOUNDED: () => new BoundedBoundary(),
  WRAPPED: () => new WrappedBoundary(),
  MIRRORED: () => new MirroredBoundary(),
  GROWABLE: () => new GrowableBoundary()
};

const isBoundaryType = (tag: string): tag is BoundaryType =>
  Object.prototype.hasOwnProperty.call(BOUNDARY_BUILDERS, tag);

/**
 * @throws {UnknownStrategyError} for anything but BOUNDED, WRAPPED, MIRRORED, GROWABLE
 */
export const createBoundaryStrategy = (tag: string): BoundaryStrategy => {
  const normalized = tag.trim().toUpperCase();
  if (!isBoundaryType(normalized)) {
    throw new UnknownStrategyError('boundary strategy', tag);
  }
  return BOUNDARY_BUILDERS[normalized]();
};
