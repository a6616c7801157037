import { TrainingConfig } from '../config/training_config';

export type PlayerKind = 'random' | 'online' | 'replay' | 'human';

const PLAYER_KINDS: readonly PlayerKind[] = ['random', 'online', 'replay', 'human'];

export interface CliOptions {
  white: PlayerKind;
  red: PlayerKind;
  matches: number;
  explorationRate: number;
  learningRate: number;
  replayLearningRate: number;
  capacity: number;
  episodeSize: number;
  learnEvery: number;
  progressInterval: number;
  seed: number | null;
  render: boolean;
  play: boolean;
}

function parsePlayerKind(value: string, fallback: PlayerKind): PlayerKind {
  const normalised = value.toLowerCase();
  return PLAYER_KINDS.find((kind) => kind === normalised) ?? fallback;
}

export function parseOptions(args: readonly string[], defaults: TrainingConfig): CliOptions {
  const getNumber = (flag: string, fallback: number): number => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      const value = Number(args[index + 1]);
      if (!Number.isNaN(value)) {
        return value;
      }
    }
    return fallback;
  };
  const getString = (flag: string, fallback: string): string => {
    const index = args.indexOf(flag);
    if (index >= 0 && index + 1 < args.length) {
      return args[index + 1] ?? fallback;
    }
    return fallback;
  };
  const hasFlag = (flag: string): boolean => args.includes(flag);
  const seed = getNumber('--seed', Number.NaN);

  return {
    white: parsePlayerKind(getString('--white', 'online'), 'online'),
    red: parsePlayerKind(getString('--red', 'online'), 'online'),
    matches: Math.max(0, Math.floor(getNumber('--matches', 1000))),
    explorationRate: getNumber('--epsilon', defaults.explorationRate),
    learningRate: getNumber('--alpha', defaults.learningRate),
    replayLearningRate: getNumber('--replay-alpha', defaults.replayLearningRate),
    capacity: getNumber('--capacity', defaults.replayCapacity),
    episodeSize: getNumber('--episode-size', defaults.episodeSize),
    learnEvery: getNumber('--learn-every', defaults.learnEvery),
    progressInterval: getNumber('--progress-every', defaults.progressInterval),
    seed: Number.isNaN(seed) ? null : seed,
    render: hasFlag('--render'),
    play: hasFlag('--play'),
  };
}
