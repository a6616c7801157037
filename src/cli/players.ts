import { AfterstateAgent } from '../ai/agent';
import { LinearEvaluator } from '../ai/evaluator';
import { RandomAgent } from '../ai/random_agent';
import { ReplayAgent } from '../ai/replay';
import { RandomSource } from '../core/random';
import { Player } from '../core/types';
import { HumanPlayer, LineIO } from './human';
import { CliOptions, PlayerKind } from './options';

export function createPlayer(
  kind: PlayerKind,
  options: CliOptions,
  random: RandomSource,
  io?: LineIO,
): Player {
  switch (kind) {
    case 'random':
      return new RandomAgent(random);
    case 'human':
      return new HumanPlayer(io);
    case 'online':
      return new AfterstateAgent(new LinearEvaluator({ random }), {
        explorationRate: options.explorationRate,
        learningRate: options.learningRate,
        random,
      });
    case 'replay':
      return new ReplayAgent(new LinearEvaluator({ random }), {
        explorationRate: options.explorationRate,
        learningRate: options.replayLearningRate,
        capacity: options.capacity,
        episodeSize: options.episodeSize,
        learnEvery: options.learnEvery,
        random,
      });
    default: {
      const unknownKind: never = kind;
      throw new Error(`Unknown player kind ${String(unknownKind)}`);
    }
  }
}

export function setLearning(player: Player, enabled: boolean): void {
  if (player instanceof AfterstateAgent) {
    player.setLearning(enabled);
  }
}
