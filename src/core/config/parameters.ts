/**
 * @module Core/Config/Parameters
 * @layer Core
 * @description Схемы именованных параметров, по одной на набор правил.
 * Отсутствующие ключи получают значение по умолчанию, неизвестные игнорируются,
 * значение вне диапазона срывает создание симуляции.
 */

import { z } from 'zod';
import { NamedParameters } from '../../shared/types';
import { ConstructionError } from '../../shared/lib/errors';
import { DEFAULT_LIFE_RULE } from '../../entities/Life';
import { MAX_COLONIES } from '../../entities/Colonies';

const probability = z.number().min(0).max(1);
const positiveInt = z.number().int().min(1);

// Each digit is a neighbour count, so 9 never makes sense
const ruleCode = z
  .number()
  .int()
  .min(0)
  .refine(code => !String(code).includes('9'), { message: 'rule digits must be in 0-8' });

export const lifeParametersSchema = z.object({
  rule: ruleCode.default(DEFAULT_LIFE_RULE)
});

export const fireParametersSchema = z.object({
  probCatch: probability.default(0),
  probGrow: probability.default(0)
});

export const percolationParametersSchema = z.object({
  probPercolate: probability.default(1)
});

export const segregationParametersSchema = z.object({
  tolerance: probability.default(0.3)
});

export const waTorParametersSchema = z.object({
  fishBreedTime: positiveInt.default(3),
  sharkBreedTime: positiveInt.default(6),
  sharkInitialEnergy: positiveInt.default(5),
  sharkEnergyGain: z.number().int().min(0).default(2)
});

export const loopParametersSchema = z.object({
  mutationRate: probability.default(0),
  sparkRate: probability.default(0)
});

// TEMP cells fall back to SHEATH unless this draw sends them to EXTEND
export const tempestiParametersSchema = loopParametersSchema.extend({
  extendRate: probability.default(0)
});

export const colonyParametersSchema = z.object({
  numStates: z.number().int().min(2).max(MAX_COLONIES).default(3),
  /** Процент соседей, которые должны принадлежать доминирующей колонии */
  threshold: z.number().min(0).max(100).default(37.5)
});

export const sandParametersSchema = z.object({
  /** Насколько далеко вода растекается вбок за тик */
  waterSpread: positiveInt.default(1)
});

export const sugarScapeParametersSchema = z.object({
  growBackRate: z.number().int().min(0).default(1),
  growBackInterval: positiveInt.default(1),
  loanInterest: z.number().min(0).default(0.1),
  loanDuration: positiveInt.default(10),
  initialDiseaseCount: z.number().int().min(0).default(1),
  diseaseMutation: probability.default(0.1),
  maxAge: positiveInt.default(100)
});

export type LifeParameters = z.infer<typeof lifeParametersSchema>;
export type FireParameters = z.infer<typeof fireParametersSchema>;
export type PercolationParameters = z.infer<typeof percolationParametersSchema>;
export type SegregationParameters = z.infer<typeof segregationParametersSchema>;
export type WaTorParameters = z.infer<typeof waTorParametersSchema>;
export type LoopParameters = z.infer<typeof loopParametersSchema>;
export type TempestiParameters = z.infer<typeof tempestiParametersSchema>;
export type ColonyParameters = z.infer<typeof colonyParametersSchema>;
export type SandParameters = z.infer<typeof sandParametersSchema>;
export type SugarScapeParameters = z.infer<typeof sugarScapeParametersSchema>;

/**
 * Проверяет сырые именованные параметры по схеме.
 * @throws {ConstructionError} со списком всех неверных ключей
 */
export const parseParameters = <T extends z.ZodTypeAny>(
  schema: T,
  raw: NamedParameters | undefined,
  label: string
): z.output<T> => {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConstructionError(`Invalid ${label} parameters`, issues);
  }
  return result.data;
};
