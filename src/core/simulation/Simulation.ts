/**
 * @module Core/Simulation
 * @layer Core
 * @description Общий драйвер тиков для всех наборов правил.
 *
 * ЖИЗНЕННЫЙ ЦИКЛ `step()`:
 * 1. Вычисление: `applyRules()` читает зафиксированное состояние и готовит следующее.
 * 2. Фиксация: `grid.commitAll()`, затем `commitAuxiliary()` для побочных данных.
 * 3. Пересчёт популяций, `iteration += 1`.
 *
 * Отмена хранится в одном слоте: сетка хранит клетки до фиксации, набор правил
 * возвращает замыкание восстановления своих побочных данных.
 */

import { Grid } from '../grid/Grid';
import { createBoundaryStrategy } from '../boundary/BoundaryFactory';
import { createNeighborhoodStrategy } from '../neighborhood/NeighborhoodFactory';
import { RandomSource, SeededRandom } from '../utils/random';
import { PopulationCounts, Restore, SimulationInput, StateCatalog } from '../../shared/types';
import { ConstructionError } from '../../shared/lib/errors';
import { createLogger } from '../../shared/lib/logger';
import { TopologyDefaults } from '../../entities/Simulations';

export type { TopologyDefaults };

const logger = createLogger('Simulation');

const noop: Restore = () => undefined;

export abstract class Simulation<S extends string> {
  protected grid: Grid<S>;
  protected readonly random: RandomSource;
  private readonly catalog: StateCatalog<S>;
  private readonly states: ReadonlyMap<number, S>;
  private readonly display: ReadonlyMap<S, string>;
  private readonly rows: number;
  private readonly cols: number;
  private populations = new Map<S, number>();
  private iteration = 0;
  private restoreAuxiliary: Restore | null = null;

  constructor(input: SimulationInput, catalog: StateCatalog<S>, topology: TopologyDefaults) {
    Simulation.validateDimensions(input);
    this.catalog = catalog;
    this.states = Simulation.buildStateMap(catalog);
    this.display = new Map(Simulation.catalogStates(catalog).map(state => [state, catalog.displayKeys[state]]));
    this.rows = input.height;
    this.cols = input.width;
    this.random = new SeededRandom(input.seed);

    const boundary = createBoundaryStrategy(input.boundary ?? topology.boundary);
    const neighborhood = createNeighborhoodStrategy(input.neighborhood ?? topology.neighborhood);
    this.grid = new Grid(this.rows, this.cols, catalog.defaultState, boundary, neighborhood);
    this.load(input.initialStates);

    logger.debug(`${new.target.name} created: ${this.rows}x${this.cols}, ${boundary.type}/${neighborhood.type}`);
  }

  // --- Construction helpers ---

  private static validateDimensions(input: SimulationInput): void {
    const issues: string[] = [];
    if (!Number.isInteger(input.width) || input.width <= 0) issues.push(`width must be a positive integer, got ${input.width}`);
    if (!Number.isInteger(input.height) || input.height <= 0) issues.push(`height must be a positive integer, got ${input.height}`);
    if (issues.length > 0) {
      throw new ConstructionError('Invalid grid dimensions', issues);
    }
  }

  private static catalogStates<S extends string>(catalog: StateCatalog<S>): S[] {
    const isState = (key: string): key is S => Object.prototype.hasOwnProperty.call(catalog.values, key);
    return Object.keys(catalog.values).filter(isState);
  }

  private static buildStateMap<S extends string>(catalog: StateCatalog<S>): Map<number, S> {
    const map = new Map<number, S>();
    for (const state of Simulation.catalogStates(catalog)) {
      const value = catalog.values[state];
      const existing = map.get(value);
      if (existing !== undefined) {
        throw new ConstructionError(`State table is not bijective: ${existing} and ${state} share ${value}`);
      }
      map.set(value, state);
    }
    return map;
  }

  private decode(initialStates: readonly number[] | undefined): S[] {
    if (!initialStates) {
      throw new ConstructionError('Initial state array is missing');
    }
    const expected = this.rows * this.cols;
    if (initialStates.length !== expected) {
      throw new ConstructionError(`Initial state array has ${initialStates.length} entries, expected ${expected}`);
    }
    const unknown = new Set<number>();
    const decoded = initialStates.map(value => {
      const state = this.states.get(value);
      if (state === undefined) {
        unknown.add(value);
        return this.catalog.defaultState;
      }
      return state;
    });
    if (unknown.size > 0) {
      throw new ConstructionError('Unknown initial state values', [...unknown].map(String));
    }
    return decoded;
  }

  private load(initialStates: readonly number[] | undefined): void {
    const decoded = this.decode(initialStates);
    decoded.forEach((state, index) => {
      this.grid.cellAt(Math.floor(index / this.cols), index % this.cols).resetTo(state);
    });
    this.recount();
  }

  // --- Rule-set hooks ---

  /** Фаза вычисления: читает зафиксированное, готовит следующее. Не фиксирует. */
  protected abstract applyRules(): void;

  /** Вызывается, когда сетка получила загруженные состояния (создание и сброс). */
  protected afterLoad(): void {}

  /**
   * Вызывает `afterLoad()` и пересчитывает численности. Подклассы вызывают
   * его в конце конструктора, когда их поля уже заданы.
   */
  protected finishLoad(): void {
    this.afterLoad();
    this.recount();
  }

  /** Захватывает побочные данные перед тиком для отката. */
  protected captureAuxiliary(): Restore {
    return noop;
  }

  /** Фиксирует подготовленные побочные данные вместе с сеткой. */
  protected commitAuxiliary(): void {}

  /** Сбрасывает подготовленные побочные данные после сбоя вычисления. */
  protected discardAuxiliary(): void {}

  // --- Control surface ---

  public step(): void {
    const restore = this.captureAuxiliary();
    try {
      this.applyRules();
    } catch (error) {
      this.grid.forEachCell(cell => cell.resetNext());
      this.discardAuxiliary();
      throw error;
    }
    this.grid.commitAll();
    this.commitAuxiliary();
    this.restoreAuxiliary = restore;
    this.recount();
    this.iteration += 1;
  }

  /** @returns false, если нет шага для отмены */
  public rollbackOnce(): boolean {
    if (this.iteration === 0 || !this.grid.rollbackOnce()) {
      return false;
    }
    this.restoreAuxiliary?.();
    this.restoreAuxiliary = null;
    this.iteration -= 1;
    this.recount();
    logger.debug(`Rolled back to iteration ${this.iteration}`);
    return true;
  }

  /**
   * Перезагружает сетку исходного размера, сохраняя текущую топологию.
   * @throws {ConstructionError} для неверного массива состояний; симуляция не меняется
   */
  public reset(initialStates: readonly number[]): void {
    const decoded = this.decode(initialStates);
    this.grid = new Grid(
      this.rows,
      this.cols,
      this.catalog.defaultState,
      this.grid.getBoundaryStrategy(),
      this.grid.getNeighborhoodStrategy()
    );
    decoded.forEach((state, index) => {
      this.grid.cellAt(Math.floor(index / this.cols), index % this.cols).resetTo(state);
    });
    this.iteration = 0;
    this.restoreAuxiliary = null;
    this.finishLoad();
    logger.debug('Simulation reset');
  }

  // --- Topology ---

  public setBoundaryStrategy(tag: string): void {
    this.grid.setBoundaryStrategy(createBoundaryStrategy(tag));
    logger.debug(`Boundary strategy set to ${tag}`);
  }

  public setNeighborhoodStrategy(tag: string): void {
    this.grid.setNeighborhoodStrategy(createNeighborhoodStrategy(tag));
    logger.debug(`Neighborhood strategy set to ${tag}`);
  }

  // --- Queries ---

  public getIteration(): number {
    return this.iteration;
  }

  /** Зафиксированное состояние по координате хранения, без политики границ. */
  public currentState(row: number, col: number): S {
    return this.grid.cellAt(row, col).getCurrent();
  }

  public displayMap(): ReadonlyMap<S, string> {
    return this.display;
  }

  public stateMap(): ReadonlyMap<number, S> {
    return this.states;
  }

  /** Целое число, в которое сериализуется состояние */
  public stateValue(state: S): number {
    return this.catalog.values[state];
  }

  public populationCounts(): PopulationCounts<S> {
    return new Map(this.populations);
  }

  public getGrid(): Grid<S> {
    return this.grid;
  }

  public getRandom(): RandomSource {
    return this.random;
  }

  protected recount(): void {
    const counts = new Map<S, number>(Simulation.catalogStates(this.catalog).map(state => [state, 0]));
    this.grid.forEachCell(cell => {
      const state = cell.getCurrent();
      counts.set(state, (counts.get(state) ?? 0) + 1);
    });
    this.populations = counts;
  }
}
