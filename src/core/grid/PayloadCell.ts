/**
 * @module Core/Grid/PayloadCell
 * @layer Core
 * @description Клетка с дополнительными данными (дескриптор агента, запас
 * сахара...) рядом с меткой состояния. Полезная нагрузка буферизуется так же,
 * как состояние, поэтому подготовленный ход меняет метку и нагрузку за одну
 * фиксацию.
 */

import { Cell } from './Cell';
import { Restore } from '../../shared/types';

export class PayloadCell<S extends string, P> extends Cell<S> {
  private payload: P;
  private nextPayload: P;

  constructor(state: S, payload: P) {
    super(state);
    this.payload = payload;
    this.nextPayload = payload;
  }

  public getPayload(): P {
    return this.payload;
  }

  public getNextPayload(): P {
    return this.nextPayload;
  }

  public setNextPayload(payload: P): void {
    this.nextPayload = payload;
  }

  /** Пишет оба буфера. Только при подготовке, не во время тика. */
  public setPayload(payload: P): void {
    this.payload = payload;
    this.nextPayload = payload;
  }

  public commit(): void {
    super.commit();
    this.payload = this.nextPayload;
  }

  public resetNext(): void {
    super.resetNext();
    this.nextPayload = this.payload;
  }

  public snapshot(): Restore {
    const restoreState = super.snapshot();
    const saved = this.payload;
    return () => {
      restoreState();
      this.setPayload(saved);
    };
  }
}
