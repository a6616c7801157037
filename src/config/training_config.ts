/**
 * Training configuration
 *
 * Defaults for player knobs and the training driver. Entry points load
 * `.env` through dotenv before reading these.
 */

import { DEFAULT_EXPLORATION_RATE, DEFAULT_LEARNING_RATE } from '../ai/agent';
import {
  DEFAULT_EPISODE_SIZE,
  DEFAULT_LEARN_EVERY,
  DEFAULT_REPLAY_CAPACITY,
  DEFAULT_REPLAY_LEARNING_RATE,
} from '../ai/replay';
import { DEFAULT_PROGRESS_INTERVAL } from '../training/engine';

export interface TrainingConfig {
  /** Probability of an exploratory move while learning */
  explorationRate: number;

  /** Step size of the online TD update */
  learningRate: number;

  /** Step size of the batched replay update */
  replayLearningRate: number;

  /** Experiences kept by a replay learner */
  replayCapacity: number;

  /** Experiences sampled per replay update */
  episodeSize: number;

  /** Experiences between replay updates */
  learnEvery: number;

  /** Matches between progress reports */
  progressInterval: number;

  /** Dashboard port */
  port: number;
}

export const DEFAULT_TRAINING_CONFIG: TrainingConfig = {
  explorationRate: DEFAULT_EXPLORATION_RATE,
  learningRate: DEFAULT_LEARNING_RATE,
  replayLearningRate: DEFAULT_REPLAY_LEARNING_RATE,
  replayCapacity: DEFAULT_REPLAY_CAPACITY,
  episodeSize: DEFAULT_EPISODE_SIZE,
  learnEvery: DEFAULT_LEARN_EVERY,
  progressInterval: DEFAULT_PROGRESS_INTERVAL,
  port: 5173,
};

const ENV_KEYS: Record<keyof TrainingConfig, string> = {
  explorationRate: 'CONNECT4_EPSILON',
  learningRate: 'CONNECT4_ALPHA',
  replayLearningRate: 'CONNECT4_REPLAY_ALPHA',
  replayCapacity: 'CONNECT4_REPLAY_CAPACITY',
  episodeSize: 'CONNECT4_EPISODE_SIZE',
  learnEvery: 'CONNECT4_LEARN_EVERY',
  progressInterval: 'CONNECT4_PROGRESS_INTERVAL',
  port: 'PORT',
};

const CONFIG_KEYS: ReadonlyArray<keyof TrainingConfig> = [
  'explorationRate',
  'learningRate',
  'replayLearningRate',
  'replayCapacity',
  'episodeSize',
  'learnEvery',
  'progressInterval',
  'port',
];

const INTEGER_KEYS: ReadonlySet<keyof TrainingConfig> = new Set<keyof TrainingConfig>([
  'replayCapacity',
  'episodeSize',
  'learnEvery',
  'progressInterval',
  'port',
]);

/**
 * Parses a knob value. Rates must lie in [0, 1]; counts must be positive
 * integers. Returns null for anything else.
 */
export function parseConfigValue(key: keyof TrainingConfig, raw: string): number | null {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return null;
  }
  const value = Number(trimmed);
  if (!Number.isFinite(value)) {
    return null;
  }
  if (INTEGER_KEYS.has(key)) {
    return Number.isInteger(value) && value > 0 ? value : null;
  }
  return value >= 0 && value <= 1 ? value : null;
}

export function loadTrainingConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): TrainingConfig {
  const config: TrainingConfig = { ...DEFAULT_TRAINING_CONFIG };
  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_KEYS[key]];
    if (raw === undefined) {
      continue;
    }
    const value = parseConfigValue(key, raw);
    if (value === null) {
      // eslint-disable-next-line no-console
      console.warn(`Ignoring invalid ${ENV_KEYS[key]}=${raw}`);
      continue;
    }
    config[key] = value;
  }
  return config;
}
