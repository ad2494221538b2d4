/**
 * @module Core/Rules/WaTorWorld
 * @layer Core
 * @description Мир хищников и жертв: рыбы и акулы.
 *
 * Каждое существо действует раз за тик в случайном порядке:
 * - Рыба переходит в случайную пустую ортогональную соседнюю клетку. Через
 *   `fishBreedTime` тиков движущаяся рыба оставляет за собой потомка.
 * - Акула теряет единицу энергии за тик и умирает на нуле. Она съедает
 *   случайную соседнюю рыбу (получая `sharkEnergyGain`) или движется как рыба
 *   и размножается через `sharkBreedTime` тиков.
 *
 * Таймеры размножения и энергия хранятся в подготовленных слоях по координате
 * и переезжают вместе с существом. Оба конца хода помечаются в охранной
 * решётке тика; помеченная клетка в этом тике больше не цель и не действующее
 * лицо, поэтому зафиксированное состояние вместе с охраной точно показывает,
 * что ещё свободно. Оставшееся на месте существо не помечается и может быть
 * съедено.
 */

import { Simulation } from '../simulation/Simulation';
import { StagedLayer } from '../simulation/StagedLayer';
import { VisitationGuard } from '../simulation/VisitationGuard';
import { ORTHOGONAL_OFFSETS } from '../neighborhood/OrthogonalNeighborhood';
import { WATOR_STATES, WaTorState } from '../../entities/WaTor';
import { SIMULATION_DEFAULTS, SimulationKind } from '../../entities/Simulations';
import { WaTorParameters, parseParameters, waTorParametersSchema } from '../config/parameters';
import { Coordinates, Restore, SimulationInput } from '../../shared/types';

export class WaTorWorld extends Simulation<WaTorState> {
  private readonly params: WaTorParameters;
  private readonly breedTimers = new StagedLayer(0);
  private readonly energy = new StagedLayer(0);

  constructor(input: SimulationInput) {
    super(input, WATOR_STATES, SIMULATION_DEFAULTS[SimulationKind.WATOR]);
    this.params = parseParameters(waTorParametersSchema, input.parameters, 'wa-tor');
    this.finishLoad();
  }

  protected afterLoad(): void {
    this.breedTimers.clear();
    this.energy.clear();
    this.grid.forEachCell((cell, row, col) => {
      if (cell.getCurrent() === WaTorState.SHARK) {
        this.energy.set(row, col, this.params.sharkInitialEnergy);
      }
    });
  }

  public getBreedTimer(row: number, col: number): number {
    return this.breedTimers.get(row, col);
  }

  public getEnergy(row: number, col: number): number {
    return this.energy.get(row, col);
  }

  protected applyRules(): void {
    const creatures = this.random.shuffle(this.grid.coordinates().filter(({ row, col }) =>
      this.grid.cellAt(row, col).getCurrent() !== WaTorState.EMPTY
    ));
    const guard = new VisitationGuard(this.grid);

    for (const position of creatures) {
      if (guard.isVisited(position.row, position.col)) continue;
      if (this.grid.cellAt(position.row, position.col).getCurrent() === WaTorState.FISH) {
        this.actFish(position, guard);
      } else {
        this.actShark(position, guard);
      }
    }
  }

  /** Свободные ортогональные соседи в состоянии `state` */
  private targets(from: Coordinates, state: WaTorState, guard: VisitationGuard): Coordinates[] {
    const result: Coordinates[] = [];
    for (const [dr, dc] of ORTHOGONAL_OFFSETS) {
      const target = this.grid.locate(from.row + dr, from.col + dc);
      if (!target || guard.isVisited(target.row, target.col)) continue;
      if (target.row === from.row && target.col === from.col) continue;
      if (this.grid.cellAt(target.row, target.col).getCurrent() === state) {
        result.push(target);
      }
    }
    return result;
  }

  private actFish(from: Coordinates, guard: VisitationGuard): void {
    const age = this.breedTimers.get(from.row, from.col) + 1;
    const to = this.random.pick(this.targets(from, WaTorState.EMPTY, guard));

    if (!to) {
      this.breedTimers.setNext(from.row, from.col, age);
      return;
    }

    const breeds = age >= this.params.fishBreedTime;
    this.place(to, WaTorState.FISH, breeds ? 0 : age, 0);
    if (breeds) {
      this.place(from, WaTorState.FISH, 0, 0);
    } else {
      this.place(from, WaTorState.EMPTY, 0, 0);
    }
    guard.markMove(from, to);
  }

  private actShark(from: Coordinates, guard: VisitationGuard): void {
    const energy = this.energy.get(from.row, from.col) - 1;
    const age = this.breedTimers.get(from.row, from.col) + 1;

    if (energy <= 0) {
      this.place(from, WaTorState.EMPTY, 0, 0);
      return;
    }

    const prey = this.random.pick(this.targets(from, WaTorState.FISH, guard));
    const to = prey ?? this.random.pick(this.targets(from, WaTorState.EMPTY, guard));
    if (!to) {
      this.place(from, WaTorState.SHARK, age, energy);
      return;
    }

    const fed = prey ? energy + this.params.sharkEnergyGain : energy;
    const breeds = age >= this.params.sharkBreedTime;
    this.place(to, WaTorState.SHARK, breeds ? 0 : age, fed);
    if (breeds) {
      this.place(from, WaTorState.SHARK, 0, this.params.sharkInitialEnergy);
    } else {
      this.place(from, WaTorState.EMPTY, 0, 0);
    }
    guard.markMove(from, to);
  }

  private place(at: Coordinates, state: WaTorState, breedTimer: number, energy: number): void {
    this.grid.cellAt(at.row, at.col).setNext(state);
    this.breedTimers.setNext(at.row, at.col, breedTimer);
    this.energy.setNext(at.row, at.col, energy);
  }

  protected captureAuxiliary(): Restore {
    const restoreTimers = this.breedTimers.snapshot();
    const restoreEnergy = this.energy.snapshot();
    return () => {
      restoreTimers();
      restoreEnergy();
    };
  }

  protected commitAuxiliary(): void {
    this.breedTimers.commit();
    this.energy.commit();
  }

  protected discardAuxiliary(): void {
    this.breedTimers.discard();
    this.energy.discard();
  }
}
