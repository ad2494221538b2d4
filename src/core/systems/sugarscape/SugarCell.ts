/**
 * @module Core/Systems/SugarScape/SugarCell
 * @layer Core
 * @description Участок ландшафта: запас сахара, ёмкость и дескриптор
 * стоящего на нём агента.
 */

import { PayloadCell } from '../../grid/PayloadCell';
import { Grid } from '../../grid/Grid';
import { SugarPatch, SugarState } from '../../../entities/SugarScape';

export class SugarCell extends PayloadCell<SugarState, SugarPatch> {
  /** Подготовленная нагрузка с заменёнными полями */
  public stagePatch(changes: Partial<SugarPatch>): void {
    this.setNextPayload({ ...this.getNextPayload(), ...changes });
  }

  /** Метка состояния, соответствующая подготовленной нагрузке */
  public labelNext(): void {
    const patch = this.getNextPayload();
    if (patch.agentId !== null) {
      this.setNext(SugarState.AGENT);
    } else {
      this.setNext(patch.sugar > 0 ? SugarState.SUGAR : SugarState.EMPTY);
    }
  }
}

/**
 * Участок по координате хранения. Клетки, созданные растущей границей,
 * появляются простыми и здесь превращаются в бесплодные участки.
 */
export const sugarCellAt = (
  grid: Grid<SugarState>,
  row: number,
  col: number,
  capacityAt: (row: number, col: number) => number
): SugarCell => {
  const cell = grid.cellAt(row, col);
  if (cell instanceof SugarCell) return cell;

  const upgraded = new SugarCell(cell.getCurrent(), { sugar: 0, capacity: capacityAt(row, col), agentId: null });
  grid.setCellAt(row, col, upgraded);
  return upgraded;
};
