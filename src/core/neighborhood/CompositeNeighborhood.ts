/**
 * @module Core/Neighborhood/Composite
 * @layer Core
 * @description Объединение (не мультимножество) нескольких окрестностей.
 * Порядок следует подстратегиям по очереди; координата сохраняет первую позицию.
 */

import { NeighborhoodStrategy } from './types';
import { Coordinates } from '../../shared/types';

export class CompositeNeighborhood implements NeighborhoodStrategy {
  public readonly type = 'NEIGH_COMPOSITE';
  private readonly parts: readonly NeighborhoodStrategy[];

  constructor(parts: readonly NeighborhoodStrategy[]) {
    this.parts = [...parts];
  }

  public getParts(): readonly NeighborhoodStrategy[] {
    return this.parts;
  }

  public offsets(row: number, col: number): Coordinates[] {
    const seen = new Set<string>();
    const result: Coordinates[] = [];

    for (const part of this.parts) {
      for (const coord of part.offsets(row, col)) {
        const key = `${coord.row},${coord.col}`;
        if (seen.has(key)) continue;
        seen.add(key);
        result.push(coord);
      }
    }
    return result;
  }
}
