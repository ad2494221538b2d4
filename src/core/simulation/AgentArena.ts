/**
 * @module Core/Simulation/AgentArena
 * @layer Core
 * @description Агенты по дескриптору с двойной буферизацией.
 *
 * Клетки хранят только дескриптор (uuid). Записи заменяются, а не изменяются:
 * `stage` пишет следующее поколение агента, `commit` подставляет его вместе с
 * фиксацией сетки.
 */

import { v4 as uuidv4 } from 'uuid';
import { Restore } from '../../shared/types';
import { InvariantViolationError } from '../../shared/lib/errors';

export type AgentId = string;

export class AgentArena<A> {
  private current = new Map<AgentId, A>();
  private next = new Map<AgentId, A>();

  /** Зафиксированная запись. @throws {InvariantViolationError} для неизвестного дескриптора */
  public get(id: AgentId): A {
    const agent = this.current.get(id);
    if (agent === undefined) {
      throw new InvariantViolationError(`Unknown agent handle ${id}`);
    }
    return agent;
  }

  public has(id: AgentId): boolean {
    return this.current.has(id);
  }

  /** Запись в том виде, какой она станет после фиксации. */
  public getNext(id: AgentId): A {
    const agent = this.next.get(id);
    if (agent === undefined) {
      throw new InvariantViolationError(`Agent ${id} is not staged for the next generation`);
    }
    return agent;
  }

  public hasNext(id: AgentId): boolean {
    return this.next.has(id);
  }

  public stage(id: AgentId, agent: A): void {
    if (!this.next.has(id)) {
      throw new InvariantViolationError(`Cannot stage unknown agent ${id}`);
    }
    this.next.set(id, agent);
  }

  /** Заводит нового агента в следующем поколении и возвращает его дескриптор. */
  public spawn(agent: A): AgentId {
    const id = uuidv4();
    this.next.set(id, agent);
    return id;
  }

  /** Добавляет агента в оба поколения. Только при подготовке. */
  public seed(agent: A): AgentId {
    const id = uuidv4();
    this.current.set(id, agent);
    this.next.set(id, agent);
    return id;
  }

  public remove(id: AgentId): void {
    this.next.delete(id);
  }

  public commit(): void {
    this.current = new Map(this.next);
  }

  /** Сбрасывает всё подготовленное после последней фиксации. */
  public discard(): void {
    this.next = new Map(this.current);
  }

  public clear(): void {
    this.current = new Map();
    this.next = new Map();
  }

  public snapshot(): Restore {
    const saved = new Map(this.current);
    return () => {
      this.current = new Map(saved);
      this.next = new Map(saved);
    };
  }

  public size(): number {
    return this.current.size;
  }

  public ids(): AgentId[] {
    return [...this.current.keys()];
  }

  /** Живые дескрипторы подготовленного поколения */
  public nextIds(): AgentId[] {
    return [...this.next.keys()];
  }

  public entries(): [AgentId, A][] {
    return [...this.current.entries()];
  }
}
