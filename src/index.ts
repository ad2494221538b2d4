// Public surface of the engine
export * from './shared/types';
export * from './shared/lib/errors';
export { createLogger, logger } from './shared/lib/logger';
export type { Logger } from './shared/lib/logger';

export { Cell } from './core/grid/Cell';
export { PayloadCell } from './core/grid/PayloadCell';
export { Grid } from './core/grid/Grid';

export type { BoundaryStrategy, Lattice } from './core/boundary/types';
export { BoundedBoundary } from './core/boundary/BoundedBoundary';
export { WrappedBoundary } from './core/boundary/WrappedBoundary';
export { MirroredBoundary } from './core/boundary/MirroredBoundary';
export { GrowableBoundary } from './core/boundary/GrowableBoundary';
export { createBoundaryStrategy } from './core/boundary/BoundaryFactory';

export type { NeighborhoodStrategy } from './core/neighborhood/types';
export { OrthogonalNeighborhood } from './core/neighborhood/OrthogonalNeighborhood';
export { SurroundingNeighborhood } from './core/neighborhood/SurroundingNeighborhood';
export { ExtendedNeighborhood } from './core/neighborhood/ExtendedNeighborhood';
export { CompositeNeighborhood } from './core/neighborhood/CompositeNeighborhood';
export { createNeighborhoodStrategy } from './core/neighborhood/NeighborhoodFactory';

export { Simulation } from './core/simulation/Simulation';
export { VisitationGuard } from './core/simulation/VisitationGuard';
export { StagedLayer } from './core/simulation/StagedLayer';
export { AgentArena } from './core/simulation/AgentArena';
export type { AgentId } from './core/simulation/AgentArena';
export { createSimulation, parseSimulationKind } from './core/simulation/SimulationFactory';
export type { AnySimulation } from './core/simulation/SimulationFactory';
export { SeededRandom } from './core/utils/random';
export type { RandomSource } from './core/utils/random';

export { GameOfLife, parseRuleCode, parseRuleString } from './core/rules/GameOfLife';
export type { GameOfLifeOptions, LifeRule } from './core/rules/GameOfLife';
export { Fire } from './core/rules/Fire';
export { Percolation } from './core/rules/Percolation';
export { Segregation, ResidentCell } from './core/rules/Segregation';
export { WaTorWorld } from './core/rules/WaTorWorld';
export { LoopAutomaton, LANGTON_VARIANT, LOOP_TRANSITIONS } from './core/rules/LoopAutomaton';
export type { LoopTransition, LoopVariant, VonNeumannStates } from './core/rules/LoopAutomaton';
export { TempestiLoop, TEMPESTI_TRANSITIONS, TEMPESTI_VARIANT } from './core/rules/TempestiLoop';
export { CompetingColonies } from './core/rules/CompetingColonies';
export { Sand } from './core/rules/Sand';
export { SugarScape } from './core/rules/SugarScape';
export type { SugarScapeStatistics } from './core/rules/SugarScape';

export * from './entities/Simulations';
export * from './entities/Life';
export * from './entities/Fire';
export * from './entities/Percolation';
export * from './entities/Segregation';
export * from './entities/WaTor';
export * from './entities/Loop';
export * from './entities/SugarScape';
export * from './entities/Colonies';
export * from './entities/Sand';

export { createSimulationStore } from './infrastructure/store/simulationStore';
export type { SimulationStore, SimulationStoreState } from './infrastructure/store/simulationStore';
