import { describe, it, expect } from 'vitest';
import { Fire } from './Fire';
import { FireState } from '../../entities/Fire';
import { ConstructionError } from '../../shared/lib/errors';

const row = (simulation: Fire): FireState[] => {
  const result: FireState[] = [];
  simulation.getGrid().forEachCell(cell => result.push(cell.getCurrent()));
  return result;
};

const { EMPTY, TREE, BURNING, BURNT } = FireState;

describe('Fire', () => {
  it('should spread exactly one cell per tick', () => {
    const simulation = new Fire({ width: 5, height: 1, initialStates: [2, 1, 1, 1, 1] });

    simulation.step();
    expect(row(simulation)).toEqual([BURNT, BURNING, TREE, TREE, TREE]);
    simulation.step();
    expect(row(simulation)).toEqual([BURNT, BURNT, BURNING, TREE, TREE]);
  });

  it('should leave trees alone without fire or ignition', () => {
    const simulation = new Fire({ width: 2, height: 2, initialStates: [1, 1, 1, 1] });
    simulation.step();
    expect(simulation.populationCounts().get(TREE)).toBe(4);
  });

  it('should ignite isolated trees when ignition is certain', () => {
    const simulation = new Fire({ width: 1, height: 1, initialStates: [1], parameters: { probCatch: 1 } });
    simulation.step();
    expect(simulation.currentState(0, 0)).toBe(BURNING);
  });

  it('should regrow on empty and burnt ground', () => {
    const simulation = new Fire({ width: 2, height: 1, initialStates: [0, 3], parameters: { probGrow: 1 } });
    simulation.step();
    expect(row(simulation)).toEqual([TREE, TREE]);
  });

  it('should keep bare ground bare without growth', () => {
    const simulation = new Fire({ width: 2, height: 1, initialStates: [0, 3] });
    simulation.step();
    expect(row(simulation)).toEqual([EMPTY, BURNT]);
  });

  it('should not spread diagonally with the default 4-neighborhood', () => {
    const simulation = new Fire({ width: 2, height: 2, initialStates: [2, 0, 0, 1] });
    simulation.step();
    expect(simulation.currentState(1, 1)).toBe(TREE);
  });

  it('should reject probabilities above 1', () => {
    expect(() => new Fire({ width: 1, height: 1, initialStates: [0], parameters: { probCatch: 1.5 } }))
      .toThrow(ConstructionError);
  });
});
