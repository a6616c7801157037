import { dropDisc, legalColumns } from '../core/grid';
import { RandomSource, randomChoice } from '../core/random';
import { Disc, Grid, Player, ReadonlyGrid } from '../core/types';
import { computeFeatures, FeatureVector } from './features';
import { ValueFunction } from './evaluator';

export const DEFAULT_EXPLORATION_RATE = 0.05;
export const DEFAULT_LEARNING_RATE = 0.001;

export interface Afterstate {
  readonly column: number;
  readonly grid: Grid;
  readonly features: FeatureVector;
  readonly value: number;
}

export interface AfterstateDecision {
  afterstate: Afterstate;
  explored: boolean;
}

/**
 * The two afterstates bridged by the next reward. `last` is null at the
 * start of a match and after an exploratory move.
 */
export interface AfterstateSession {
  last: Afterstate | null;
  next: Afterstate | null;
}

export interface AgentOptions {
  explorationRate?: number;
  learningRate?: number;
  learning?: boolean;
  random?: RandomSource;
}

/**
 * Epsilon-greedy player over afterstates that learns with one-step TD
 * updates after every reward.
 */
export class AfterstateAgent implements Player {
  protected readonly evaluator: ValueFunction;
  protected readonly explorationRate: number;
  protected readonly learningRate: number;
  protected readonly random: RandomSource;
  protected session: AfterstateSession = { last: null, next: null };
  private color: Disc | null = null;
  private learning: boolean;

  constructor(evaluator: ValueFunction, options: AgentOptions = {}) {
    this.evaluator = evaluator;
    this.explorationRate = options.explorationRate ?? DEFAULT_EXPLORATION_RATE;
    this.learningRate = options.learningRate ?? DEFAULT_LEARNING_RATE;
    this.learning = options.learning ?? true;
    this.random = options.random ?? Math.random;
  }

  setColor(color: Disc): void {
    this.color = color;
    this.session = { last: null, next: null };
  }

  getColor(): Disc {
    if (this.color === null) {
      throw new Error('Player colour has not been set');
    }
    return this.color;
  }

  setLearning(enabled: boolean): void {
    this.learning = enabled;
  }

  isLearning(): boolean {
    return this.learning;
  }

  getParameters(): number[] {
    return this.evaluator.getParameters();
  }

  getSession(): Readonly<AfterstateSession> {
    return this.session;
  }

  afterstateFor(grid: ReadonlyGrid, column: number): Afterstate {
    const color = this.getColor();
    const scratch = grid.clone();
    dropDisc(scratch, column, color);
    const features = computeFeatures(scratch, color);
    return {
      column,
      grid: scratch,
      features,
      value: this.evaluator.value(features),
    };
  }

  decide(grid: ReadonlyGrid): AfterstateDecision {
    const columns = legalColumns(grid);
    if (columns.length === 0) {
      throw new Error('No legal move available');
    }

    if (this.learning && this.random() < this.explorationRate) {
      const column = randomChoice(columns, this.random);
      return { afterstate: this.afterstateFor(grid, column), explored: true };
    }

    let best: Afterstate | null = null;
    for (const column of columns) {
      const candidate = this.afterstateFor(grid, column);
      if (best === null || candidate.value > best.value) {
        best = candidate;
      }
    }
    if (best === null) {
      throw new Error('No afterstate evaluated');
    }
    return { afterstate: best, explored: false };
  }

  proposeMove(grid: ReadonlyGrid): number {
    const decision = this.decide(grid);
    if (decision.explored) {
      this.session.last = null;
    }
    this.session.next = decision.afterstate;
    return decision.afterstate.column;
  }

  receiveReward(reward: number): void {
    const { last, next } = this.session;
    if (this.learning && last !== null && next !== null) {
      this.learn(last, next, reward);
    }
    this.session = { last: next, next: null };
  }

  protected learn(last: Afterstate, next: Afterstate, reward: number): void {
    const target = next.value + reward;
    const error = target - last.value;
    const gradient = this.evaluator.gradient(last.features);
    const parameters = this.evaluator.getParameters().map(
      (parameter, index) => parameter + this.learningRate * error * (gradient[index] ?? 0),
    );
    this.evaluator.setParameters(parameters);
  }
}
