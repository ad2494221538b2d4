import { describe, it, expect } from 'vitest';
import { GameOfLife, parseRuleCode, parseRuleString } from './GameOfLife';
import { LifeState } from '../../entities/Life';
import { ConstructionError } from '../../shared/lib/errors';

const { ALIVE, DEAD } = LifeState;

const aliveCells = (simulation: GameOfLife): string[] => {
  const result: string[] = [];
  simulation.getGrid().forEachCell((cell, row, col) => {
    if (cell.getCurrent() === ALIVE) result.push(`${row},${col}`);
  });
  return result;
};

describe('parseRuleCode', () => {
  it('should split the first digit off as birth', () => {
    const rule = parseRuleCode(323);
    expect([...rule.birth]).toEqual([3]);
    expect([...rule.survival].sort()).toEqual([2, 3]);
  });

  it('should allow an empty survival set', () => {
    expect(parseRuleCode(3).survival.size).toBe(0);
  });
});

describe('parseRuleString', () => {
  it('should read birth-first strings', () => {
    const rule = parseRuleString('B36/S23');
    expect([...rule.birth]).toEqual([3, 6]);
    expect([...rule.survival]).toEqual([2, 3]);
  });

  it('should read survival-first strings', () => {
    const rule = parseRuleString('s23/b3');
    expect([...rule.birth]).toEqual([3]);
    expect([...rule.survival]).toEqual([2, 3]);
  });

  it('should reject anything else', () => {
    expect(() => parseRuleString('B9/S23')).toThrow(ConstructionError);
    expect(() => parseRuleString('life')).toThrow(ConstructionError);
  });
});

describe('GameOfLife', () => {
  it('should keep a live centre with two live neighbours', () => {
    const simulation = new GameOfLife({ width: 3, height: 3, initialStates: [1, 1, 0, 0, 1, 0, 0, 0, 0] });
    simulation.step();
    expect(simulation.currentState(1, 1)).toBe(ALIVE);
  });

  it('should kill a live centre with four live neighbours', () => {
    const simulation = new GameOfLife({ width: 3, height: 3, initialStates: [1, 1, 1, 1, 1, 0, 0, 0, 0] });
    simulation.step();
    expect(simulation.currentState(1, 1)).toBe(DEAD);
  });

  it('should give birth to a dead centre with three live neighbours', () => {
    const simulation = new GameOfLife({ width: 3, height: 3, initialStates: [1, 1, 1, 0, 0, 0, 0, 0, 0] });
    simulation.step();
    expect(simulation.currentState(1, 1)).toBe(ALIVE);
  });

  it('should oscillate a blinker, which needs every cell to read the old generation', () => {
    const vertical = [
      0, 0, 0, 0, 0,
      0, 0, 1, 0, 0,
      0, 0, 1, 0, 0,
      0, 0, 1, 0, 0,
      0, 0, 0, 0, 0
    ];
    const simulation = new GameOfLife({ width: 5, height: 5, initialStates: vertical });

    simulation.step();
    expect(aliveCells(simulation)).toEqual(['2,1', '2,2', '2,3']);
    simulation.step();
    expect(aliveCells(simulation)).toEqual(['1,2', '2,2', '3,2']);
  });

  it('should see across the edges on a torus', () => {
    const simulation = new GameOfLife({
      width: 3,
      height: 3,
      initialStates: [0, 1, 0, 0, 1, 0, 0, 1, 0],
      boundary: 'WRAPPED'
    });
    simulation.step();
    // every cell on a 3x3 torus sees the whole column of three
    expect(aliveCells(simulation)).toHaveLength(9);
  });

  it('should honour a custom rule string', () => {
    const initialStates = [1, 1, 1, 1, 0, 1, 1, 0, 0];
    const classic = new GameOfLife({ width: 3, height: 3, initialStates });
    const highLife = new GameOfLife({ width: 3, height: 3, initialStates }, { ruleString: 'B36/S23' });

    classic.step();
    highLife.step();
    expect(classic.currentState(1, 1)).toBe(DEAD);
    expect(highLife.currentState(1, 1)).toBe(ALIVE);
  });

  it('should read the numeric rule parameter', () => {
    const simulation = new GameOfLife({ width: 1, height: 1, initialStates: [0], parameters: { rule: 36 } });
    expect([...simulation.getRule().birth]).toEqual([3]);
    expect([...simulation.getRule().survival]).toEqual([6]);
  });
});
