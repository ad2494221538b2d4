import { describe, it, expect } from 'vitest';
import { TEMPESTI_TRANSITIONS, TempestiLoop } from './TempestiLoop';
import { LoopState } from '../../entities/Loop';
import { ConstructionError } from '../../shared/lib/errors';

const { EMPTY, SHEATH, CORE, TEMP, EXTEND, INIT, ADVANCE } = LoopState;

const blank = (): number[] => new Array<number>(25).fill(0);

const withCells = (cells: ReadonlyArray<readonly [number, number, number]>): number[] => {
  const states = blank();
  for (const [row, col, value] of cells) states[row * 5 + col] = value;
  return states;
};

describe('TempestiLoop', () => {
  it('should refuse grids smaller than 5x5', () => {
    expect(() => new TempestiLoop({ width: 5, height: 3, initialStates: new Array<number>(15).fill(0) }))
      .toThrow(ConstructionError);
  });

  it('should reject an extend rate outside [0, 1]', () => {
    expect(() => new TempestiLoop({ width: 5, height: 5, initialStates: blank(), parameters: { extendRate: 1.5 } }))
      .toThrow(ConstructionError);
  });

  it('should grow a sheath block around an extending cell', () => {
    const simulation = new TempestiLoop({ width: 5, height: 5, initialStates: withCells([[2, 2, 5]]) });

    simulation.step();
    expect(simulation.currentState(2, 2)).toBe(SHEATH);
    expect(simulation.populationCounts().get(SHEATH)).toBe(5);

    simulation.step();
    for (let row = 1; row <= 3; row++) {
      for (let col = 1; col <= 3; col++) {
        expect(simulation.currentState(row, col)).toBe(SHEATH);
      }
    }
    expect(simulation.populationCounts().get(EMPTY)).toBe(16);
  });

  it('should pass a signal into the sheath', () => {
    const simulation = new TempestiLoop({ width: 5, height: 5, initialStates: withCells([[2, 2, 6], [2, 3, 1]]) });
    simulation.step();

    expect(simulation.currentState(2, 2)).toBe(ADVANCE);
    expect(simulation.currentState(2, 3)).toBe(TEMP);
    expect(simulation.currentState(1, 2)).toBe(SHEATH);
    expect(simulation.currentState(3, 2)).toBe(SHEATH);
    expect(simulation.currentState(2, 1)).toBe(SHEATH);
    expect(simulation.currentState(1, 3)).toBe(EMPTY);
    expect(simulation.populationCounts().get(EMPTY)).toBe(20);
  });

  it('should turn a core between two sheaths into a signal', () => {
    const simulation = new TempestiLoop({ width: 5, height: 5, initialStates: withCells([[2, 1, 1], [2, 2, 2], [2, 3, 1]]) });
    simulation.step();

    expect(simulation.currentState(2, 2)).toBe(INIT);
    expect(simulation.currentState(2, 1)).toBe(SHEATH);
    expect(simulation.currentState(2, 3)).toBe(SHEATH);
  });

  it('should send TEMP back to the sheath unless the extend draw succeeds', () => {
    const settled = new TempestiLoop({ width: 5, height: 5, initialStates: withCells([[2, 2, 3]]) });
    settled.step();
    expect(settled.currentState(2, 2)).toBe(SHEATH);

    const extended = new TempestiLoop({
      width: 5,
      height: 5,
      initialStates: withCells([[2, 2, 3]]),
      parameters: { extendRate: 1 }
    });
    extended.step();
    expect(extended.currentState(2, 2)).toBe(EXTEND);
    expect(extended.populationCounts().get(EMPTY)).toBe(24);
  });

  it('should keep a core without enough sheath', () => {
    const match = TEMPESTI_TRANSITIONS.find(rule => rule.from === CORE && rule.when([SHEATH, EMPTY, EMPTY, EMPTY]));
    expect(match).toBeUndefined();
  });
});
