import { ConnectFourBoard } from '../core/board';
import { DiscGrid } from '../core/grid';
import { COLUMNS, Disc, IllegalMoveError, Player, RED, ROWS, WHITE } from '../core/types';

export const REWARD_WIN = 1;
export const REWARD_LOSS = -1;
export const REWARD_DRAW = 0;
export const REWARD_LEGAL_MOVE = 0;
export const REWARD_ILLEGAL_MOVE = -2;

export type MatchEnd = 'win' | 'draw' | 'illegal-move';

export interface MoveEvent {
  moveNumber: number;
  color: Disc;
  column: number;
  legal: boolean;
  board: ConnectFourBoard;
}

export interface MatchOptions {
  onMove?: (event: MoveEvent) => void;
}

export interface MatchResult {
  winner: Disc | null;
  end: MatchEnd;
  /** Discs actually placed. */
  moves: number;
  finalGrid: DiscGrid;
}

interface Seat {
  player: Player;
  color: Disc;
}

/**
 * Plays white (first mover) against red. Each player sees strictly
 * alternating proposeMove / receiveReward calls, starting with a proposal
 * and ending with a reward.
 */
export class ConnectFourMatch {
  private readonly seats: readonly [Seat, Seat];
  private readonly options: MatchOptions;

  constructor(white: Player, red: Player, options: MatchOptions = {}) {
    this.seats = [
      { player: white, color: WHITE },
      { player: red, color: RED },
    ];
    this.options = options;
  }

  play(): MatchResult {
    for (const seat of this.seats) {
      seat.player.setColor(seat.color);
    }
    const board = new ConnectFourBoard();
    const maxMoves = ROWS * COLUMNS;

    for (let moveNumber = 0; moveNumber < maxMoves; moveNumber += 1) {
      const current = this.seats[moveNumber % 2];
      const other = this.seats[(moveNumber + 1) % 2];
      const otherHasMoved = moveNumber > 0;

      const column = current.player.proposeMove(board.snapshot());

      try {
        board.applyMove(column, current.color);
      } catch (error) {
        if (!(error instanceof IllegalMoveError)) {
          throw error;
        }
        this.options.onMove?.({ moveNumber, color: current.color, column, legal: false, board });
        current.player.receiveReward(REWARD_ILLEGAL_MOVE);
        if (otherHasMoved) {
          other.player.receiveReward(REWARD_WIN);
        }
        return this.result(other.color, 'illegal-move', moveNumber, board);
      }

      this.options.onMove?.({ moveNumber, color: current.color, column, legal: true, board });

      if (board.winner() !== null) {
        current.player.receiveReward(REWARD_WIN);
        other.player.receiveReward(REWARD_LOSS);
        return this.result(current.color, 'win', moveNumber + 1, board);
      }

      if (moveNumber === maxMoves - 1) {
        current.player.receiveReward(REWARD_DRAW);
        other.player.receiveReward(REWARD_DRAW);
        return this.result(null, 'draw', moveNumber + 1, board);
      }

      if (otherHasMoved) {
        other.player.receiveReward(REWARD_LEGAL_MOVE);
      }
    }

    throw new Error('Match ended without a result');
  }

  private result(
    winner: Disc | null,
    end: MatchEnd,
    moves: number,
    board: ConnectFourBoard,
  ): MatchResult {
    return { winner, end, moves, finalGrid: board.snapshot() };
  }
}

export function playMatch(white: Player, red: Player, options: MatchOptions = {}): MatchResult {
  return new ConnectFourMatch(white, red, options).play();
}
