/**
 * @module Core/Systems/SugarScape/LoanBook
 * @layer Core
 * @description Непогашенные займы с двойной буферизацией, как арена агентов.
 */

import { Loan } from '../../../entities/SugarScape';
import { Restore } from '../../../shared/types';

export class LoanBook {
  private current: readonly Loan[] = [];
  private next: readonly Loan[] = [];

  public list(): readonly Loan[] {
    return this.current;
  }

  public staged(): readonly Loan[] {
    return this.next;
  }

  public setNext(loans: readonly Loan[]): void {
    this.next = [...loans];
  }

  public commit(): void {
    this.current = this.next;
  }

  public discard(): void {
    this.next = this.current;
  }

  public clear(): void {
    this.current = [];
    this.next = [];
  }

  public snapshot(): Restore {
    const saved = this.current;
    return () => {
      this.current = saved;
      this.next = saved;
    };
  }
}
