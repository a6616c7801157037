import { RandomSource } from '../core/random';
import { dot, FEATURE_COUNT, FeatureVector } from './features';

/**
 * What afterstate selection and learning need from a value function.
 */
export interface ValueFunction {
  value(features: FeatureVector): number;
  gradient(features: FeatureVector): number[];
  getParameters(): number[];
  /** Throws `ParameterDivergenceError` for non-finite values. */
  setParameters(parameters: readonly number[]): void;
}

/**
 * Raised when an update would store an infinite or NaN parameter. The
 * evaluator keeps its previous parameters.
 */
export class ParameterDivergenceError extends Error {
  readonly parameters: readonly number[];

  constructor(parameters: readonly number[]) {
    super('Parameters diverged: update produced non-finite values');
    this.name = 'ParameterDivergenceError';
    this.parameters = [...parameters];
  }
}

export interface EvaluatorConfig {
  parameters?: readonly number[];
  random?: RandomSource;
}

/**
 * Own open lines start out worth a random positive amount, the opponent's a
 * random negative amount.
 */
export function randomInitialParameters(random: RandomSource = Math.random): number[] {
  const half = FEATURE_COUNT / 2;
  return Array.from({ length: FEATURE_COUNT }, (_, index) =>
    index < half ? random() : -random(),
  );
}

export class LinearEvaluator implements ValueFunction {
  protected parameters: number[];

  constructor(config: EvaluatorConfig = {}) {
    this.parameters = config.parameters
      ? checkLength(config.parameters)
      : randomInitialParameters(config.random);
  }

  value(features: FeatureVector): number {
    return dot(checkLength(features), this.parameters);
  }

  /** The model is linear, so the gradient is the feature vector itself. */
  gradient(features: FeatureVector): number[] {
    return checkLength(features);
  }

  getParameters(): number[] {
    return [...this.parameters];
  }

  setParameters(parameters: readonly number[]): void {
    const next = checkLength(parameters);
    if (!next.every(Number.isFinite)) {
      throw new ParameterDivergenceError(next);
    }
    this.parameters = next;
  }
}

function checkLength(vector: readonly number[]): number[] {
  if (vector.length !== FEATURE_COUNT) {
    throw new Error(`Expected ${FEATURE_COUNT} values, got ${vector.length}`);
  }
  return [...vector];
}
