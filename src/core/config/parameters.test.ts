import { describe, it, expect } from 'vitest';
import {
  fireParametersSchema,
  lifeParametersSchema,
  parseParameters,
  sugarScapeParametersSchema,
  waTorParametersSchema
} from './parameters';
import { ConstructionError } from '../../shared/lib/errors';

const failure = (run: () => unknown): ConstructionError => {
  try {
    run();
  } catch (error) {
    if (error instanceof ConstructionError) return error;
    throw error;
  }
  throw new Error('expected a ConstructionError');
};

describe('parseParameters', () => {
  it('should fill in defaults for missing keys', () => {
    expect(parseParameters(fireParametersSchema, undefined, 'fire')).toEqual({ probCatch: 0, probGrow: 0 });
    expect(parseParameters(lifeParametersSchema, {}, 'life')).toEqual({ rule: 323 });
  });

  it('should keep supplied values and ignore unknown keys', () => {
    const params = parseParameters(waTorParametersSchema, { fishBreedTime: 2, colour: 7 }, 'wa-tor');
    expect(params).toEqual({ fishBreedTime: 2, sharkBreedTime: 6, sharkInitialEnergy: 5, sharkEnergyGain: 2 });
  });

  it('should name the offending key', () => {
    const error = failure(() => parseParameters(fireParametersSchema, { probCatch: 2 }, 'fire'));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^probCatch: /);
    expect(error.message).toMatch(/^Invalid fire parameters: probCatch: /);
  });

  it('should reject a life rule containing the digit 9', () => {
    const error = failure(() => parseParameters(lifeParametersSchema, { rule: 329 }, 'life'));
    expect(error.issues).toEqual(['rule: rule digits must be in 0-8']);
  });

  it('should report every bad key at once', () => {
    const error = failure(() => parseParameters(sugarScapeParametersSchema, { maxAge: 0, growBackRate: -1 }, 'sugarscape'));
    expect(error.issues).toHaveLength(2);
  });
});
