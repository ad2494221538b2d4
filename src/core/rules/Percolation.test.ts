import { describe, it, expect } from 'vitest';
import { Percolation } from './Percolation';
import { PercolationState } from '../../entities/Percolation';

const { OPEN, PERCOLATED, BLOCKED } = PercolationState;

const states = (simulation: Percolation): PercolationState[] => {
  const result: PercolationState[] = [];
  simulation.getGrid().forEachCell(cell => result.push(cell.getCurrent()));
  return result;
};

describe('Percolation', () => {
  it('should advance the front one cell per tick', () => {
    const simulation = new Percolation({ width: 3, height: 1, initialStates: [1, 0, 0] });
    simulation.step();
    expect(states(simulation)).toEqual([PERCOLATED, PERCOLATED, OPEN]);
    simulation.step();
    expect(states(simulation)).toEqual([PERCOLATED, PERCOLATED, PERCOLATED]);
  });

  it('should never pass through blocked cells', () => {
    const simulation = new Percolation({ width: 3, height: 1, initialStates: [1, 2, 0] });
    simulation.step();
    simulation.step();
    expect(states(simulation)).toEqual([PERCOLATED, BLOCKED, OPEN]);
  });

  it('should not percolate when the probability is zero', () => {
    const simulation = new Percolation({ width: 2, height: 1, initialStates: [1, 0], parameters: { probPercolate: 0 } });
    simulation.step();
    expect(simulation.currentState(0, 1)).toBe(OPEN);
  });

  it('should report when the bottom row is reached', () => {
    const simulation = new Percolation({ width: 1, height: 3, initialStates: [1, 0, 0] });
    expect(simulation.hasPercolated()).toBe(false);
    simulation.step();
    expect(simulation.hasPercolated()).toBe(false);
    simulation.step();
    expect(simulation.hasPercolated()).toBe(true);
  });
});
