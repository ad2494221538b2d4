/**
 * @module Core/Rules/SugarScape
 * @layer Core
 * @description Экономика агентов на сахарном ландшафте.
 *
 * Клетки имеют тип SugarCell, их нагрузка хранит запас участка, его ёмкость и
 * дескриптор стоящего на нём агента. Агенты живут в арене, займы в книге
 * займов; и то и другое фиксируется вместе с сеткой.
 *
 * Порядок тика: движение, отрастание, размножение, торговля, кредиты,
 * болезни, смерть. Затем каждая клетка получает метку по своей нагрузке.
 *
 * Начальные состояния: EMPTY даёт бесплодный участок (ёмкость 0), SUGAR
 * полный участок, AGENT полный участок с новым агентом.
 */

import { Simulation } from '../simulation/Simulation';
import { AgentArena, AgentId } from '../simulation/AgentArena';
import { SugarCell, sugarCellAt } from '../systems/sugarscape/SugarCell';
import { LoanBook } from '../systems/sugarscape/LoanBook';
import { capacityAt, createAgent } from '../systems/sugarscape/landscape';
import { SugarWorld } from '../systems/sugarscape/world';
import { runMovement } from '../systems/sugarscape/MovementSystem';
import { runGrowback } from '../systems/sugarscape/GrowbackSystem';
import { runReproduction } from '../systems/sugarscape/ReproductionSystem';
import { runTrading } from '../systems/sugarscape/TradingSystem';
import { runLending } from '../systems/sugarscape/LendingSystem';
import { randomDisease, runDisease } from '../systems/sugarscape/DiseaseSystem';
import { runMortality } from '../systems/sugarscape/MortalitySystem';
import { Loan, SUGAR_STATES, SugarAgent, SugarState } from '../../entities/SugarScape';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { SugarScapeParameters, parseParameters, sugarScapeParametersSchema } from '../config/parameters';
import { Coordinates, Restore, SimulationInput } from '../../shared/types';

export interface SugarScapeStatistics {
  agents: number;
  loans: number;
  /** Сахар у агентов */
  agentSugar: number;
  agentSpice: number;
  /** Сахар, оставшийся на ландшафте */
  landscapeSugar: number;
  infectedAgents: number;
  infections: number;
}

export class SugarScape extends Simulation<SugarState> {
  private readonly params: SugarScapeParameters;
  private readonly agents = new AgentArena<SugarAgent>();
  private readonly loans = new LoanBook();
  private readonly height: number;
  private readonly width: number;

  constructor(input: SimulationInput) {
    super(input, SUGAR_STATES, SIMULATION_DEFAULTS[SimulationKind.SUGARSCAPE]);
    this.params = parseParameters(sugarScapeParametersSchema, input.parameters, 'sugarscape');
    this.height = input.height;
    this.width = input.width;
    this.finishLoad();
  }

  private readonly landscapeCapacity = (row: number, col: number): number =>
    capacityAt(row, col, this.height, this.width);

  protected afterLoad(): void {
    this.agents.clear();
    this.loans.clear();

    this.grid.forEachCell((cell, row, col) => {
      const state = cell.getCurrent();
      const capacity = state === SugarState.EMPTY ? 0 : this.landscapeCapacity(row, col);
      const agentId = state === SugarState.AGENT ? this.agents.seed(this.newcomer()) : null;
      this.grid.setCellAt(row, col, new SugarCell(state, { sugar: capacity, capacity, agentId }));
    });
  }

  private newcomer(): SugarAgent {
    const agent = createAgent(this.random);
    const diseases = Array.from({ length: this.params.initialDiseaseCount }, () => randomDisease(this.random));
    return { ...agent, diseases };
  }

  private patch(row: number, col: number): SugarCell {
    return sugarCellAt(this.grid, row, col, this.landscapeCapacity);
  }

  private locateAgents(): Map<AgentId, Coordinates> {
    const positions = new Map<AgentId, Coordinates>();
    for (const at of this.grid.coordinates()) {
      const { agentId } = this.patch(at.row, at.col).getPayload();
      if (agentId !== null) positions.set(agentId, at);
    }
    return positions;
  }

  protected applyRules(): void {
    const world: SugarWorld = {
      grid: this.grid,
      agents: this.agents,
      loans: this.loans,
      random: this.random,
      params: this.params,
      tick: this.getIteration() + 1,
      positions: this.locateAgents(),
      capacityAt: this.landscapeCapacity
    };

    runMovement(world);
    runGrowback(world);
    runReproduction(world);
    runTrading(world);
    runLending(world);
    runDisease(world);
    runMortality(world);

    for (const at of this.grid.coordinates()) {
      this.patch(at.row, at.col).labelNext();
    }
  }

  protected captureAuxiliary(): Restore {
    const restoreAgents = this.agents.snapshot();
    const restoreLoans = this.loans.snapshot();
    return () => {
      restoreAgents();
      restoreLoans();
    };
  }

  protected commitAuxiliary(): void {
    this.agents.commit();
    this.loans.commit();
  }

  protected discardAuxiliary(): void {
    this.agents.discard();
    this.loans.discard();
  }

  // --- Queries ---

  public getAgents(): AgentArena<SugarAgent> {
    return this.agents;
  }

  public getLoans(): readonly Loan[] {
    return this.loans.list();
  }

  public agentAt(row: number, col: number): AgentId | null {
    return this.patch(row, col).getPayload().agentId;
  }

  public sugarAt(row: number, col: number): number {
    return this.patch(row, col).getPayload().sugar;
  }

  public capacityOf(row: number, col: number): number {
    return this.patch(row, col).getPayload().capacity;
  }

  public statistics(): SugarScapeStatistics {
    const agents = this.agents.entries().map(([, agent]) => agent);
    let landscapeSugar = 0;
    for (const at of this.grid.coordinates()) {
      landscapeSugar += this.patch(at.row, at.col).getPayload().sugar;
    }

    return {
      agents: agents.length,
      loans: this.loans.list().length,
      agentSugar: agents.reduce((sum, agent) => sum + agent.sugar, 0),
      agentSpice: agents.reduce((sum, agent) => sum + agent.spice, 0),
      landscapeSugar,
      infectedAgents: agents.filter(agent => agent.diseases.length > 0).length,
      infections: agents.reduce((sum, agent) => sum + agent.diseases.length, 0)
    };
  }
}
