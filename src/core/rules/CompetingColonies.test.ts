import { describe, it, expect } from 'vitest';
import { CompetingColonies } from './CompetingColonies';
import { ColonyState } from '../../entities/Colonies';
import { ConstructionError } from '../../shared/lib/errors';

const { COLONY_0, COLONY_1, COLONY_2, COLONY_3 } = ColonyState;

const values = (simulation: CompetingColonies): number[] => {
  const result: number[] = [];
  simulation.getGrid().forEachCell(cell => result.push(simulation.stateValue(cell.getCurrent())));
  return result;
};

describe('CompetingColonies', () => {
  it('should let a surrounded colony fall to its dominator', () => {
    const simulation = new CompetingColonies({ width: 3, height: 3, initialStates: [1, 1, 1, 1, 0, 1, 1, 1, 1] });
    simulation.step();
    expect(values(simulation)).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 1]);
  });

  it('should close the cycle with the last colony', () => {
    const simulation = new CompetingColonies({ width: 3, height: 3, initialStates: [0, 0, 0, 0, 2, 0, 0, 0, 0] });
    simulation.step();
    expect(values(simulation)).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('should compare the dominating share with the threshold', () => {
    const simulation = new CompetingColonies({ width: 3, height: 3, initialStates: [0, 1, 0, 0, 0, 0, 0, 1, 0] });
    simulation.step();
    // centre: 2 of 8 stays; edges: 2 of 5 converts; corners: 1 of 3 stays
    expect(values(simulation)).toEqual([0, 1, 0, 1, 0, 1, 0, 1, 0]);
  });

  it('should need at least one dominating neighbour at threshold zero', () => {
    const simulation = new CompetingColonies({ width: 2, height: 1, initialStates: [0, 1], parameters: { threshold: 0 } });
    simulation.step();
    expect(values(simulation)).toEqual([1, 1]);
  });

  it('should size the cycle from numStates', () => {
    const simulation = new CompetingColonies({ width: 1, height: 1, initialStates: [3], parameters: { numStates: 4 } });
    expect(simulation.dominatorOf(COLONY_3)).toBe(COLONY_0);
    expect(simulation.dominatorOf(COLONY_2)).toBe(COLONY_3);
    expect(simulation.dominatorOf(COLONY_0)).toBe(COLONY_1);
  });

  it('should reject colonies beyond numStates', () => {
    expect(() => new CompetingColonies({ width: 2, height: 1, initialStates: [0, 3] })).toThrow(ConstructionError);
    expect(() => new CompetingColonies({ width: 1, height: 1, initialStates: [0], parameters: { numStates: 1 } }))
      .toThrow(ConstructionError);
    expect(() => new CompetingColonies({ width: 1, height: 1, initialStates: [0], parameters: { threshold: 101 } }))
      .toThrow(ConstructionError);
  });

  it('should leave the grid untouched when a reset names an unknown colony', () => {
    const simulation = new CompetingColonies({ width: 2, height: 1, initialStates: [2, 1] });
    expect(() => simulation.reset([0, 5])).toThrow(ConstructionError);
    expect(simulation.currentState(0, 0)).toBe(COLONY_2);
    expect(simulation.currentState(0, 1)).toBe(COLONY_1);
  });
});
