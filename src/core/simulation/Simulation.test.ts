import { describe, it, expect } from 'vitest';
import { Simulation } from './Simulation';
import { GameOfLife } from '../rules/GameOfLife';
import { LifeState } from '../../entities/Life';
import { ConstructionError, EngineError, UnknownStrategyError } from '../../shared/lib/errors';
import { SimulationInput, StateCatalog } from '../../shared/types';

const life = (width: number, height: number, initialStates: number[]): GameOfLife =>
  new GameOfLife({ width, height, initialStates });

const states = <S extends string>(simulation: Simulation<S>): S[] => {
  const result: S[] = [];
  simulation.getGrid().forEachCell(cell => result.push(cell.getCurrent()));
  return result;
};

const constructionFailure = (run: () => unknown): ConstructionError => {
  try {
    run();
  } catch (error) {
    if (error instanceof ConstructionError) return error;
    throw error;
  }
  throw new Error('expected a ConstructionError');
};

const { ALIVE, DEAD } = LifeState;

describe('Simulation', () => {
  describe('construction', () => {
    it('should load the initial states row-major', () => {
      const simulation = life(3, 2, [1, 0, 0, 0, 0, 1]);
      expect(simulation.currentState(0, 0)).toBe(ALIVE);
      expect(simulation.currentState(1, 2)).toBe(ALIVE);
      expect(simulation.currentState(0, 2)).toBe(DEAD);
      expect(simulation.getGrid().rows).toBe(2);
      expect(simulation.getGrid().cols).toBe(3);
      expect(simulation.getIteration()).toBe(0);
    });

    it('should reject non-positive dimensions', () => {
      const error = constructionFailure(() => life(0, 2, []));
      expect(error.issues).toEqual(['width must be a positive integer, got 0']);
    });

    it('should reject a state array of the wrong length', () => {
      const error = constructionFailure(() => life(2, 2, [0, 0, 0]));
      expect(error.message).toBe('Initial state array has 3 entries, expected 4');
    });

    it('should reject a missing state array', () => {
      const input: SimulationInput = JSON.parse('{"width":1,"height":1}');
      expect(() => new GameOfLife(input)).toThrow('Initial state array is missing');
    });

    it('should list unknown state values once each', () => {
      const error = constructionFailure(() => life(2, 2, [0, 5, 5, 7]));
      expect(error.issues).toEqual(['5', '7']);
    });

    it('should reject a catalog that maps two states to one value', () => {
      const clash: StateCatalog<'ON' | 'OFF'> = {
        values: { ON: 1, OFF: 1 },
        displayKeys: { ON: 'on', OFF: 'off' },
        defaultState: 'OFF'
      };
      class Clashing extends Simulation<'ON' | 'OFF'> {
        protected applyRules(): void {}
      }
      expect(() => new Clashing({ width: 1, height: 1, initialStates: [1] }, clash, {
        boundary: 'BOUNDED',
        neighborhood: 'NEIGH_8'
      })).toThrow(ConstructionError);
    });

    it('should apply topology tags from the input', () => {
      const simulation = new GameOfLife({ width: 3, height: 3, initialStates: new Array<number>(9).fill(0), boundary: 'wrapped', neighborhood: 'NEIGH_4' });
      expect(simulation.getGrid().getBoundaryStrategy().type).toBe('WRAPPED');
      expect(simulation.getGrid().getNeighborhoodStrategy().type).toBe('NEIGH_4');
    });

    it('should reject unknown topology tags', () => {
      expect(() => new GameOfLife({ width: 1, height: 1, initialStates: [0], boundary: 'KLEIN' })).toThrow(UnknownStrategyError);
    });
  });

  describe('state tables', () => {
    it('should map values to states and states to display keys', () => {
      const simulation = life(1, 1, [0]);
      expect(simulation.stateMap().get(1)).toBe(ALIVE);
      expect(simulation.stateMap().get(0)).toBe(DEAD);
      expect(simulation.displayMap().get(ALIVE)).toBe('life-state-alive');
      expect(simulation.stateValue(ALIVE)).toBe(1);
    });

    it('should count every state, including absent ones', () => {
      const counts = life(3, 3, new Array<number>(9).fill(0)).populationCounts();
      expect(counts.get(DEAD)).toBe(9);
      expect(counts.get(ALIVE)).toBe(0);
    });
  });

  describe('step', () => {
    it('should advance the iteration and commit every cell', () => {
      const simulation = life(3, 3, [1, 1, 1, 0, 0, 0, 0, 0, 0]);
      simulation.step();
      expect(simulation.getIteration()).toBe(1);
      simulation.getGrid().forEachCell(cell => expect(cell.getNext()).toBe(cell.getCurrent()));
    });

    it('should keep the population total equal to the cell count', () => {
      const simulation = life(4, 4, [0, 1, 0, 0, 1, 1, 1, 0, 0, 0, 1, 1, 0, 1, 0, 0]);
      for (let i = 0; i < 5; i++) {
        simulation.step();
        const total = [...simulation.populationCounts().values()].reduce((sum, count) => sum + count, 0);
        expect(total).toBe(16);
      }
    });

    it('should roll back staged work when a rule throws', () => {
      class Failing extends GameOfLife {
        protected applyRules(): void {
          this.grid.cellAt(0, 0).setNext(ALIVE);
          throw new Error('rule failure');
        }
      }
      const simulation = new Failing({ width: 1, height: 1, initialStates: [0] });
      expect(() => simulation.step()).toThrow('rule failure');
      expect(simulation.getIteration()).toBe(0);
      expect(simulation.getGrid().cellAt(0, 0).getNext()).toBe(DEAD);
    });
  });

  describe('rollbackOnce', () => {
    it('should undo exactly one step', () => {
      const simulation = life(1, 1, [1]);
      simulation.step();
      expect(simulation.currentState(0, 0)).toBe(DEAD);

      expect(simulation.rollbackOnce()).toBe(true);
      expect(simulation.getIteration()).toBe(0);
      expect(simulation.currentState(0, 0)).toBe(ALIVE);
      expect(simulation.populationCounts().get(ALIVE)).toBe(1);

      expect(simulation.rollbackOnce()).toBe(false);
      expect(simulation.currentState(0, 0)).toBe(ALIVE);
    });

    it('should refuse at iteration zero', () => {
      expect(life(1, 1, [0]).rollbackOnce()).toBe(false);
    });

    it('should keep only one level of history', () => {
      const simulation = life(3, 3, [0, 1, 0, 0, 1, 0, 0, 1, 0]);
      simulation.step();
      simulation.step();
      expect(simulation.rollbackOnce()).toBe(true);
      expect(simulation.getIteration()).toBe(1);
      expect(simulation.rollbackOnce()).toBe(false);
      expect(simulation.getIteration()).toBe(1);
    });
  });

  describe('reset', () => {
    it('should reload states and clear history', () => {
      const simulation = life(2, 2, [1, 1, 1, 1]);
      simulation.step();
      simulation.reset([0, 0, 0, 1]);

      expect(simulation.getIteration()).toBe(0);
      expect(states(simulation)).toEqual([DEAD, DEAD, DEAD, ALIVE]);
      expect(simulation.rollbackOnce()).toBe(false);
      expect(simulation.populationCounts().get(ALIVE)).toBe(1);
    });

    it('should leave the simulation untouched on bad input', () => {
      const simulation = life(2, 2, [1, 1, 1, 1]);
      simulation.step();
      expect(() => simulation.reset([0])).toThrow(ConstructionError);
      expect(simulation.getIteration()).toBe(1);
      expect(simulation.rollbackOnce()).toBe(true);
    });

    it('should keep the active topology', () => {
      const simulation = life(2, 2, [0, 0, 0, 0]);
      simulation.setBoundaryStrategy('MIRRORED');
      simulation.reset([0, 0, 0, 0]);
      expect(simulation.getGrid().getBoundaryStrategy().type).toBe('MIRRORED');
    });
  });

  describe('topology setters', () => {
    it('should swap strategies at runtime', () => {
      const simulation = life(5, 5, new Array<number>(25).fill(0));
      simulation.setBoundaryStrategy('WRAPPED');
      simulation.setNeighborhoodStrategy('NEIGH_EXT_2');
      expect(simulation.getGrid().getNeighbors(0, 0)).toHaveLength(24);
    });

    it('should reject unknown tags and keep the old strategy', () => {
      const simulation = life(2, 2, [0, 0, 0, 0]);
      expect(() => simulation.setNeighborhoodStrategy('NEIGH_5')).toThrow(EngineError);
      expect(simulation.getGrid().getNeighborhoodStrategy().type).toBe('NEIGH_8');
    });
  });
});
