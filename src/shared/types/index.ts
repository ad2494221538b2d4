/**
 * @module Shared/Types
 * @layer Shared
 * @description Общие типы данных для всех слоёв движка.
 */

/**
 * Логические координаты решётки. Строка растёт вниз, столбец вправо.
 * На растущей сетке обе могут стать отрицательными.
 */
export interface Coordinates {
  row: number;
  col: number;
}

/**
 * Именованные числовые настройки из конфигурации
 * (вероятность возгорания, доля терпимости, пороги размножения...).
 */
export type NamedParameters = Readonly<Record<string, number>>;

/**
 * Общий контракт создания для всех наборов правил.
 * `initialStates` идёт по строкам, длина `width * height`.
 */
export interface SimulationInput {
  width: number;
  height: number;
  initialStates: readonly number[];
  parameters?: NamedParameters;
  /** Тег границы, например `BOUNDED` или `WRAPPED` */
  boundary?: string;
  /** Тег окрестности, например `NEIGH_8` или `NEIGH_EXT_2` */
  neighborhood?: string;
  /** Зерно источника случайности симуляции */
  seed?: number;
}

/**
 * Замкнутое множество состояний набора правил: целое число для сериализации
 * каждого состояния, ключ отображения и состояние новых клеток.
 */
export interface StateCatalog<S extends string> {
  values: Readonly<Record<S, number>>;
  displayKeys: Readonly<Record<S, string>>;
  defaultState: S;
}

export type BoundaryType = 'BOUNDED' | 'WRAPPED' | 'MIRRORED' | 'GROWABLE';

/** Численность каждого состояния на момент последней фиксации */
export type PopulationCounts<S extends string> = ReadonlyMap<S, number>;

/** Хук отмены: восстанавливает то, что было захвачено при его создании. */
export type Restore = () => void;
