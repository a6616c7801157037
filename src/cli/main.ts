import 'dotenv/config';

import { loadTrainingConfigFromEnv } from '../config/training_config';
import { createSeededRandom } from '../core/random';
import { colorName, Player } from '../core/types';
import { runTrainingSession, TrainingSummary } from '../training/engine';
import { ConnectFourMatch, MatchResult, MoveEvent } from '../training/match';
import { createStdinLineIO, HumanPlayer, LineIO } from './human';
import { parseOptions } from './options';
import { createPlayer, setLearning } from './players';

function describeSummary(summary: TrainingSummary): string {
  return (
    `Has trained ${summary.matches} times ` +
    `(white=${summary.whiteWins} red=${summary.redWins} draws=${summary.draws} ` +
    `illegal=${summary.illegalMoves} avgMoves=${summary.averageMoves.toFixed(1)})`
  );
}

function describeResult(result: MatchResult): string {
  if (result.winner === null) {
    return `Draw after ${result.moves} moves`;
  }
  const reason = result.end === 'illegal-move' ? ' (illegal move by opponent)' : '';
  return `${colorName(result.winner)} wins after ${result.moves} moves${reason}`;
}

function logMove(event: MoveEvent): void {
  // eslint-disable-next-line no-console
  console.log(
    `Move ${event.moveNumber + 1}: ${colorName(event.color)} -> ${event.column}` +
      (event.legal ? '' : ' (illegal)'),
  );
  // eslint-disable-next-line no-console
  console.log(event.board.render());
}

function playAgainstHuman(white: Player, red: Player, io: LineIO): void {
  setLearning(white, false);
  setLearning(red, false);
  for (;;) {
    const human = new HumanPlayer(io);
    for (const [first, second] of [
      [human, red],
      [white, human],
    ] as const) {
      const result = new ConnectFourMatch(first, second).play();
      io.write(`${describeResult(result)}\n`);
    }
    io.write('Play again? (Y/N)\n');
    const answer = io.readLine();
    if (answer === null || answer.trim().toUpperCase() !== 'Y') {
      break;
    }
  }
}

function main(): void {
  const config = loadTrainingConfigFromEnv();
  const options = parseOptions(process.argv.slice(2), config);
  const random = options.seed === null ? Math.random : createSeededRandom(options.seed);
  const io = createStdinLineIO();

  const white = createPlayer(options.white, options, random, io);
  const red = createPlayer(options.red, options, random, io);

  // eslint-disable-next-line no-console
  console.log(`Training ${options.white} (white) against ${options.red} (red) for ${options.matches} matches`);
  const summary = runTrainingSession(white, red, {
    matches: options.matches,
    progressInterval: options.progressInterval,
    onProgress: (progress) => {
      // eslint-disable-next-line no-console
      console.log(describeSummary(progress));
    },
    matchOptions: options.render ? { onMove: logMove } : {},
  });
  // eslint-disable-next-line no-console
  console.log(describeSummary(summary));

  if (options.play) {
    playAgainstHuman(white, red, io);
  }
}

try {
  main();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
}
