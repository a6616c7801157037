import { Player, RED, WHITE } from '../core/types';
import { ConnectFourMatch, MatchOptions, MatchResult } from './match';

export const DEFAULT_PROGRESS_INTERVAL = 100;

export interface TrainingSessionOptions {
  matches: number;
  progressInterval?: number;
  onProgress?: (summary: TrainingSummary) => void;
  matchOptions?: MatchOptions;
}

export interface TrainingSummary {
  matches: number;
  whiteWins: number;
  redWins: number;
  draws: number;
  illegalMoves: number;
  averageMoves: number;
  lastResult: MatchResult | null;
}

export function emptySummary(): TrainingSummary {
  return {
    matches: 0,
    whiteWins: 0,
    redWins: 0,
    draws: 0,
    illegalMoves: 0,
    averageMoves: 0,
    lastResult: null,
  };
}

export function recordResult(summary: TrainingSummary, result: MatchResult): TrainingSummary {
  const matches = summary.matches + 1;
  return {
    matches,
    whiteWins: summary.whiteWins + (result.winner === WHITE ? 1 : 0),
    redWins: summary.redWins + (result.winner === RED ? 1 : 0),
    draws: summary.draws + (result.winner === null ? 1 : 0),
    illegalMoves: summary.illegalMoves + (result.end === 'illegal-move' ? 1 : 0),
    averageMoves: summary.averageMoves + (result.moves - summary.averageMoves) / matches,
    lastResult: result,
  };
}

/**
 * Plays `matches` games between the same two players, so learners keep
 * improving from one game to the next.
 */
export function runTrainingSession(
  white: Player,
  red: Player,
  options: TrainingSessionOptions,
): TrainingSummary {
  const interval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
  const match = new ConnectFourMatch(white, red, options.matchOptions);
  let summary = emptySummary();
  for (let index = 1; index <= options.matches; index += 1) {
    summary = recordResult(summary, match.play());
    if (interval > 0 && index % interval === 0) {
      options.onProgress?.(summary);
    }
  }
  return summary;
}
