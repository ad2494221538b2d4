import { describe, it, expect } from 'vitest';
import { OrthogonalNeighborhood } from './OrthogonalNeighborhood';
import { SurroundingNeighborhood } from './SurroundingNeighborhood';
import { ExtendedNeighborhood } from './ExtendedNeighborhood';
import { CompositeNeighborhood } from './CompositeNeighborhood';
import { createNeighborhoodStrategy } from './NeighborhoodFactory';
import { UnknownStrategyError } from '../../shared/lib/errors';

describe('OrthogonalNeighborhood', () => {
  it('should list N, E, S, W', () => {
    expect(new OrthogonalNeighborhood().offsets(5, 5)).toEqual([
      { row: 4, col: 5 },
      { row: 5, col: 6 },
      { row: 6, col: 5 },
      { row: 5, col: 4 }
    ]);
  });
});

describe('SurroundingNeighborhood', () => {
  it('should list the 8 surrounding cells row-major', () => {
    expect(new SurroundingNeighborhood().offsets(0, 0)).toEqual([
      { row: -1, col: -1 },
      { row: -1, col: 0 },
      { row: -1, col: 1 },
      { row: 0, col: -1 },
      { row: 0, col: 1 },
      { row: 1, col: -1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 }
    ]);
  });
});

describe('ExtendedNeighborhood', () => {
  it('should match the 8-neighborhood at radius 1', () => {
    expect(new ExtendedNeighborhood(1).offsets(3, 7)).toEqual(new SurroundingNeighborhood().offsets(3, 7));
  });

  it('should hold (2k+1)^2 - 1 cells', () => {
    expect(new ExtendedNeighborhood(2).offsets(0, 0)).toHaveLength(24);
    expect(new ExtendedNeighborhood(3).offsets(0, 0)).toHaveLength(48);
  });

  it('should never include the centre', () => {
    const offsets = new ExtendedNeighborhood(2).offsets(4, 4);
    expect(offsets.some(({ row, col }) => row === 4 && col === 4)).toBe(false);
  });

  it('should reject a radius below 1', () => {
    expect(() => new ExtendedNeighborhood(0)).toThrow(RangeError);
    expect(() => new ExtendedNeighborhood(1.5)).toThrow(RangeError);
  });
});

describe('CompositeNeighborhood', () => {
  it('should union parts in order without duplicates', () => {
    const composite = new CompositeNeighborhood([new OrthogonalNeighborhood(), new SurroundingNeighborhood()]);
    expect(composite.offsets(5, 5)).toEqual([
      { row: 4, col: 5 },
      { row: 5, col: 6 },
      { row: 6, col: 5 },
      { row: 5, col: 4 },
      { row: 4, col: 4 },
      { row: 4, col: 6 },
      { row: 6, col: 4 },
      { row: 6, col: 6 }
    ]);
  });

  it('should yield nothing without parts', () => {
    expect(new CompositeNeighborhood([]).offsets(0, 0)).toEqual([]);
  });
});

describe('createNeighborhoodStrategy', () => {
  it('should resolve the fixed tags', () => {
    expect(createNeighborhoodStrategy('NEIGH_4')).toBeInstanceOf(OrthogonalNeighborhood);
    expect(createNeighborhoodStrategy('neigh_8')).toBeInstanceOf(SurroundingNeighborhood);
  });

  it('should parse the extended radius', () => {
    const strategy = createNeighborhoodStrategy('NEIGH_EXT_3');
    expect(strategy).toBeInstanceOf(ExtendedNeighborhood);
    expect(strategy.type).toBe('NEIGH_EXT_3');
  });

  it('should build composites from their parts', () => {
    expect(createNeighborhoodStrategy('NEIGH_COMPOSITE').offsets(0, 0)).toEqual([]);
    const composite = createNeighborhoodStrategy('NEIGH_COMPOSITE:NEIGH_4+NEIGH_EXT_2');
    expect(composite.type).toBe('NEIGH_COMPOSITE');
    expect(composite.offsets(0, 0)).toHaveLength(24);
  });

  it('should reject unknown or malformed tags', () => {
    for (const tag of ['NEIGH_6', 'NEIGH_EXT_0', 'NEIGH_COMPOSITE:', 'NEIGH_COMPOSITE:NEIGH_COMPOSITE', 'NEIGH_COMPOSITE:NEIGH_4+HEX']) {
      expect(() => createNeighborhoodStrategy(tag)).toThrow(UnknownStrategyError);
    }
  });
});
