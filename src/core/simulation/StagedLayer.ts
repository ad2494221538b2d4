/**
 * @module Core/Simulation/StagedLayer
 * @layer Core
 * @description Числовой побочный канал по логической координате (таймеры
 * размножения, энергия...). Буферизуется как Cell: чтение видит
 * зафиксированный слой, запись идёт в следующий.
 */

import { Restore } from '../../shared/types';

const keyOf = (row: number, col: number): string => `${row},${col}`;

export class StagedLayer {
  private current = new Map<string, number>();
  private next = new Map<string, number>();
  private readonly fallback: number;

  constructor(fallback: number = 0) {
    this.fallback = fallback;
  }

  public get(row: number, col: number): number {
    return this.current.get(keyOf(row, col)) ?? this.fallback;
  }

  /** Подготовленное значение или зафиксированное, если ничего не готовилось */
  public getNext(row: number, col: number): number {
    const key = keyOf(row, col);
    return this.next.get(key) ?? this.current.get(key) ?? this.fallback;
  }

  public setNext(row: number, col: number, value: number): void {
    this.next.set(keyOf(row, col), value);
  }

  /** Пишет оба слоя. Только при подготовке. */
  public set(row: number, col: number, value: number): void {
    this.current.set(keyOf(row, col), value);
    this.next.delete(keyOf(row, col));
  }

  /** Подготовленные записи перекрывают зафиксированные, остальные переносятся. */
  public commit(): void {
    for (const [key, value] of this.next) {
      this.current.set(key, value);
    }
    this.next = new Map();
  }

  public discard(): void {
    this.next = new Map();
  }

  public clear(): void {
    this.current = new Map();
    this.next = new Map();
  }

  public snapshot(): Restore {
    const saved = new Map(this.current);
    return () => {
      this.current = new Map(saved);
      this.next = new Map();
    };
  }
}
