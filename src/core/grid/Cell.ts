/**
 * @module Core/Grid/Cell
 * @layer Core
 * @description Единица состояния с двойной буферизацией.
 *
 * В фазе вычисления правила читают `getCurrent()` и пишут `setNext()`.
 * `commit()` принадлежит Grid: код правил его не вызывает.
 */

import { InvariantViolationError } from '../../shared/lib/errors';
import { Restore } from '../../shared/types';

const requireState = <S>(state: S | null | undefined, label: string): S => {
  if (state === undefined || state === null) {
    throw new InvariantViolationError(`${label} cannot be absent`);
  }
  return state;
};

export class Cell<S extends string> {
  private current: S;
  private next: S;

  constructor(state: S) {
    this.current = requireState(state, 'Initial state');
    this.next = this.current;
  }

  public getCurrent(): S {
    return this.current;
  }

  public setCurrent(state: S): void {
    this.current = requireState(state, 'State');
  }

  public getNext(): S {
    return this.next;
  }

  public setNext(state: S): void {
    this.next = requireState(state, 'Next state');
  }

  /** current := next */
  public commit(): void {
    this.current = this.next;
  }

  /** next := current, подготовленное отбрасывается */
  public resetNext(): void {
    this.next = this.current;
  }

  public resetTo(state: S): void {
    this.current = requireState(state, 'State');
    this.next = this.current;
  }

  /**
   * Захватывает зафиксированное состояние. Возвращённая функция восстанавливает
   * его и сбрасывает подготовленное.
   */
  public snapshot(): Restore {
    const saved = this.current;
    return () => this.resetTo(saved);
  }

  public toString(): string {
    return this.current;
  }
}
