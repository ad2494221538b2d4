/**
 * @module Shared/Errors
 * @layer Shared
 * @description Классы ошибок движка.
 *
 * - ConstructionError: неверные входные данные, полусобранный объект не утекает.
 * - OutOfBoundsError: координата отвергнута активной стратегией границ.
 * - InvariantViolationError: дефект в коде правил, движок его не перехватывает.
 * - UnknownStrategyError: неизвестный тег топологии или симуляции.
 */

export type EngineErrorCode = 'CONSTRUCTION' | 'OUT_OF_BOUNDS' | 'INVARIANT' | 'UNKNOWN_STRATEGY';

export class EngineError extends Error {
  public readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConstructionError extends EngineError {
  /** Отдельные проблемы, если их найдено несколько */
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super('CONSTRUCTION', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class OutOfBoundsError extends EngineError {
  public readonly row: number;
  public readonly col: number;

  constructor(row: number, col: number) {
    super('OUT_OF_BOUNDS', `Coordinate (${row}, ${col}) is out of bounds`);
    this.row = row;
    this.col = col;
  }
}

export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super('INVARIANT', message);
  }
}

export class UnknownStrategyError extends EngineError {
  public readonly tag: string;

  constructor(kind: string, tag: string) {
    super('UNKNOWN_STRATEGY', `Unknown ${kind}: "${tag}"`);
    this.tag = tag;
  }
}
