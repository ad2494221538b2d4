/**
 * @module Infrastructure/Store
 * @layer Infrastructure
 * @description Поверхность управления для внешнего мира (UI, графики, кнопки).
 * Реализована как vanilla-хранилище zustand вокруг одной Simulation.
 *
 * Ошибки движка не покидают действие: они пишутся в лог и в `lastError`.
 * Всё остальное считается дефектом и пробрасывается дальше.
 */

import { createStore } from 'zustand/vanilla';
import { v4 as uuidv4 } from 'uuid';
import { AnySimulation, createSimulation, parseSimulationKind } from '../../core/simulation/SimulationFactory';
import { SimulationKind } from '../../entities/Simulations';
import { SimulationInput } from '../../shared/types';
import { EngineError, EngineErrorCode } from '../../shared/lib/errors';
import { createLogger } from '../../shared/lib/logger';

const logger = createLogger('simulationStore');

export interface PopulationSnapshot {
  iteration: number;
  populations: Record<string, number>;
}

export interface StoreError {
  code: EngineErrorCode;
  message: string;
}

export interface SimulationStoreState {
  // --- State ---
  runId: string;
  kind: SimulationKind | null;
  simulation: AnySimulation | null;
  iteration: number;
  populations: Record<string, number>;
  /** Одна запись на каждую зафиксированную итерацию, начиная с 0 */
  history: PopulationSnapshot[];
  lastError: StoreError | null;

  // --- Actions ---
  load: (kind: SimulationKind | string, input: SimulationInput) => void;
  /** Выполняет `count` тиков (по умолчанию 1); останавливается на первой ошибке */
  step: (count?: number) => void;
  /** @returns false, если отменять нечего */
  stepBack: () => boolean;
  reset: (initialStates: readonly number[]) => void;
  setBoundary: (tag: string) => void;
  setNeighborhood: (tag: string) => void;
  clearError: () => void;
}

const snapshotOf = (simulation: AnySimulation): PopulationSnapshot => ({
  iteration: simulation.getIteration(),
  populations: Object.fromEntries(simulation.populationCounts())
});

export const createSimulationStore = () =>
  createStore<SimulationStoreState>()((set, get) => {
    /** Выполняет действие, превращая ошибки движка в `lastError`. */
    const attempt = (label: string, action: () => void): boolean => {
      try {
        action();
        return true;
      } catch (error) {
        if (!(error instanceof EngineError)) throw error;
        logger.error(`${label} failed:`, error.message);
        set({ lastError: { code: error.code, message: error.message } });
        return false;
      }
    };

    /** Публикует итерацию и численности текущей симуляции. */
    const publish = (simulation: AnySimulation, history: PopulationSnapshot[]) => {
      const snapshot = snapshotOf(simulation);
      set({ iteration: snapshot.iteration, populations: snapshot.populations, history });
    };

    const requireSimulation = (action: string): AnySimulation | null => {
      const { simulation } = get();
      if (!simulation) {
        logger.warn(`${action} ignored: no simulation loaded`);
      }
      return simulation;
    };

    return {
      runId: uuidv4(),
      kind: null,
      simulation: null,
      iteration: 0,
      populations: {},
      history: [],
      lastError: null,

      load: (kind, input) => {
        attempt('load', () => {
          const parsed = parseSimulationKind(kind);
          const simulation = createSimulation(parsed, input);
          set({ runId: uuidv4(), kind: parsed, simulation, lastError: null });
          publish(simulation, [snapshotOf(simulation)]);
        });
      },

      step: (count = 1) => {
        const simulation = requireSimulation('step');
        if (!simulation) return;

        const history = [...get().history];
        for (let i = 0; i < count; i++) {
          const ok = attempt('step', () => {
            simulation.step();
            history.push(snapshotOf(simulation));
          });
          if (!ok) break;
        }
        publish(simulation, history);
      },

      stepBack: () => {
        const simulation = requireSimulation('stepBack');
        if (!simulation) return false;

        if (!simulation.rollbackOnce()) {
          logger.warn('Nothing to roll back');
          return false;
        }
        publish(simulation, get().history.slice(0, -1));
        return true;
      },

      reset: (initialStates) => {
        const simulation = requireSimulation('reset');
        if (!simulation) return;

        attempt('reset', () => {
          simulation.reset(initialStates);
          publish(simulation, [snapshotOf(simulation)]);
        });
      },

      setBoundary: (tag) => {
        const simulation = requireSimulation('setBoundary');
        if (!simulation) return;
        attempt('setBoundary', () => simulation.setBoundaryStrategy(tag));
      },

      setNeighborhood: (tag) => {
        const simulation = requireSimulation('setNeighborhood');
        if (!simulation) return;
        attempt('setNeighborhood', () => simulation.setNeighborhoodStrategy(tag));
      },

      clearError: () => set({ lastError: null })
    };
  });

export type SimulationStore = ReturnType<typeof createSimulationStore>;
