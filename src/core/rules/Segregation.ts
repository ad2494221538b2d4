/**
 * @module Core/Rules/Segregation
 * @layer Core
 * @description Модель переселения двух групп.
 *
 * Житель доволен, когда доля своей группы среди занятых соседей достигает
 * `tolerance` (без занятых соседей он тоже доволен). Недовольные обходятся в
 * случайном порядке, и каждый занимает свою пустую клетку. Клетка хранит
 * только дескриптор жителя, сам житель живёт в арене.
 */

import { Simulation } from '../simulation/Simulation';
import { AgentArena, AgentId } from '../simulation/AgentArena';
import { VisitationGuard } from '../simulation/VisitationGuard';
import { PayloadCell } from '../grid/PayloadCell';
import { Resident, SEGREGATION_STATES, SegregationState } from '../../entities/Segregation';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { SegregationParameters, parseParameters, segregationParametersSchema } from '../config/parameters';
import { Coordinates, Restore, SimulationInput } from '../../shared/types';
import { InvariantViolationError } from '../../shared/lib/errors';

export class ResidentCell extends PayloadCell<SegregationState, AgentId | null> {}

export class Segregation extends Simulation<SegregationState> {
  private readonly params: SegregationParameters;
  private readonly residents = new AgentArena<Resident>();

  constructor(input: SimulationInput) {
    super(input, SEGREGATION_STATES, SIMULATION_DEFAULTS[SimulationKind.SEGREGATION]);
    this.params = parseParameters(segregationParametersSchema, input.parameters, 'segregation');
    this.finishLoad();
  }

  /** Заменяет клетки и заводит по жителю на каждую занятую клетку. */
  protected afterLoad(): void {
    this.residents.clear();
    this.grid.forEachCell((cell, row, col) => {
      const state = cell.getCurrent();
      const handle = state === SegregationState.EMPTY ? null : this.residents.seed({ group: state });
      this.grid.setCellAt(row, col, new ResidentCell(state, handle));
    });
  }

  private residentCell(row: number, col: number): ResidentCell {
    const cell = this.grid.cellAt(row, col);
    if (!(cell instanceof ResidentCell)) {
      throw new InvariantViolationError(`Cell (${row}, ${col}) carries no resident payload`);
    }
    return cell;
  }

  public isSatisfied(row: number, col: number): boolean {
    const own = this.grid.cellAt(row, col).getCurrent();
    if (own === SegregationState.EMPTY) return true;

    const occupied = this.grid.getNeighbors(row, col)
      .map(neighbor => neighbor.getCurrent())
      .filter(state => state !== SegregationState.EMPTY);
    if (occupied.length === 0) return true;

    const same = occupied.filter(state => state === own).length;
    return same / occupied.length >= this.params.tolerance;
  }

  protected applyRules(): void {
    const coordinates = this.grid.coordinates();
    const movers = this.random.shuffle(coordinates.filter(({ row, col }) =>
      this.grid.cellAt(row, col).getCurrent() !== SegregationState.EMPTY && !this.isSatisfied(row, col)
    ));
    const vacancies = this.random.shuffle(coordinates.filter(({ row, col }) =>
      this.grid.cellAt(row, col).getCurrent() === SegregationState.EMPTY
    ));

    const guard = new VisitationGuard(this.grid);
    for (const from of movers) {
      if (guard.isVisited(from.row, from.col)) continue;
      const to = vacancies.find(candidate => !guard.isVisited(candidate.row, candidate.col));
      if (!to) break;
      this.move(from, to);
      guard.markMove(from, to);
    }
  }

  private move(from: Coordinates, to: Coordinates): void {
    const source = this.residentCell(from.row, from.col);
    const target = this.residentCell(to.row, to.col);
    const handle = source.getPayload();
    if (handle === null) {
      throw new InvariantViolationError(`Occupied cell (${from.row}, ${from.col}) has no resident`);
    }
    target.setNext(source.getCurrent());
    target.setNextPayload(handle);
    source.setNext(SegregationState.EMPTY);
    source.setNextPayload(null);
  }

  protected captureAuxiliary(): Restore {
    return this.residents.snapshot();
  }

  protected commitAuxiliary(): void {
    this.residents.commit();
  }

  protected discardAuxiliary(): void {
    this.residents.discard();
  }

  public getResidents(): AgentArena<Resident> {
    return this.residents;
  }

  /** Житель по координате, если он есть */
  public residentAt(row: number, col: number): AgentId | null {
    return this.residentCell(row, col).getPayload();
  }
}
