import { RandomSource, sampleWithoutReplacement } from '../core/random';
import { Disc, ReadonlyGrid } from '../core/types';
import { AfterstateAgent, Afterstate, AgentOptions } from './agent';
import { ValueFunction } from './evaluator';
import { computeFeatures } from './features';

export const DEFAULT_REPLAY_CAPACITY = 1000;
export const DEFAULT_EPISODE_SIZE = 100;
export const DEFAULT_LEARN_EVERY = 100;
// Batch gradients sum over the whole sample, so the step is much smaller
// than the online one.
export const DEFAULT_REPLAY_LEARNING_RATE = 0.00001;

export interface Experience {
  readonly before: ReadonlyGrid;
  readonly after: ReadonlyGrid;
  readonly reward: number;
  /** Colour the afterstates are valued for. */
  readonly color: Disc;
}

/**
 * FIFO store of experiences; `truncate` drops the oldest entries.
 */
export class ExperienceBuffer {
  private items: Experience[] = [];

  get length(): number {
    return this.items.length;
  }

  push(experience: Experience): void {
    this.items.push(experience);
  }

  truncate(capacity: number): void {
    if (this.items.length > capacity) {
      this.items = this.items.slice(this.items.length - capacity);
    }
  }

  sample(count: number, random: RandomSource): Experience[] {
    return sampleWithoutReplacement(this.items, count, random);
  }

  toArray(): readonly Experience[] {
    return [...this.items];
  }
}

export interface ReplayAgentOptions extends AgentOptions {
  capacity?: number;
  episodeSize?: number;
  learnEvery?: number;
}

/**
 * Afterstate player that stores transitions and, every `learnEvery`
 * experiences, takes one full-batch least-squares gradient step over a
 * random sample of them.
 */
export class ReplayAgent extends AfterstateAgent {
  private readonly buffer = new ExperienceBuffer();
  private readonly capacity: number;
  private readonly episodeSize: number;
  private readonly learnEvery: number;

  constructor(evaluator: ValueFunction, options: ReplayAgentOptions = {}) {
    super(evaluator, {
      ...options,
      learningRate: options.learningRate ?? DEFAULT_REPLAY_LEARNING_RATE,
    });
    this.capacity = options.capacity ?? DEFAULT_REPLAY_CAPACITY;
    this.episodeSize = options.episodeSize ?? DEFAULT_EPISODE_SIZE;
    this.learnEvery = options.learnEvery ?? DEFAULT_LEARN_EVERY;
    if (this.learnEvery < 1 || this.capacity < 1 || this.episodeSize < 1) {
      throw new Error('capacity, episodeSize and learnEvery must be positive');
    }
  }

  getBuffer(): ExperienceBuffer {
    return this.buffer;
  }

  protected learn(last: Afterstate, next: Afterstate, reward: number): void {
    this.buffer.push({ before: last.grid, after: next.grid, reward, color: this.getColor() });
    if (this.buffer.length % this.learnEvery !== 0) {
      return;
    }
    this.buffer.truncate(this.capacity);
    this.replay(this.buffer.sample(this.episodeSize, this.random));
  }

  /**
   * gradient = 2 * X^T (X p - y) with y = V(after) + reward, then
   * p -= learningRate * gradient.
   */
  replay(batch: readonly Experience[]): void {
    if (batch.length === 0) {
      return;
    }
    const parameters = this.evaluator.getParameters();
    const gradient = new Array<number>(parameters.length).fill(0);

    for (const experience of batch) {
      const features = computeFeatures(experience.before, experience.color);
      const target =
        this.evaluator.value(computeFeatures(experience.after, experience.color)) + experience.reward;
      const residual = this.evaluator.value(features) - target;
      const featureGradient = this.evaluator.gradient(features);
      for (let i = 0; i < gradient.length; i += 1) {
        gradient[i] = (gradient[i] ?? 0) + 2 * residual * (featureGradient[i] ?? 0);
      }
    }

    this.evaluator.setParameters(
      parameters.map((parameter, index) => parameter - this.learningRate * (gradient[index] ?? 0)),
    );
  }
}
