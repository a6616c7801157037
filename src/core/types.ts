export const ROWS = 6;
export const COLUMNS = 7;
export const CONNECT_LENGTH = 4;

export const EMPTY = 0;
export const WHITE = 1;
export const RED = 2;

export type Disc = typeof WHITE | typeof RED;

export type Cell = typeof EMPTY | Disc;

export interface GridDimensions {
  rows: number;
  columns: number;
}

/**
 * Read-only view of a grid. Row 0 is the bottom row.
 */
export interface ReadonlyGrid {
  readonly rows: number;
  readonly columns: number;
  get(row: number, column: number): Cell | undefined;
  isInside(row: number, column: number): boolean;
  clone(): Grid;
}

export interface Grid extends ReadonlyGrid {
  set(row: number, column: number, value: Cell): void;
}

/**
 * One base-3 number per column; see `ConnectFourBoard.stateIdentifier`.
 */
export type StateIdentifier = readonly number[];

export interface Player {
  /** Called at the start of every match, before the first proposal. */
  setColor(color: Disc): void;
  proposeMove(grid: ReadonlyGrid): number;
  receiveReward(reward: number): void;
}

export type IllegalMoveReason = 'full' | 'out-of-range';

export class IllegalMoveError extends Error {
  readonly column: number;
  readonly reason: IllegalMoveReason;

  constructor(column: number, reason: IllegalMoveReason) {
    super(
      reason === 'full'
        ? `Column ${column} is full`
        : `Column ${column} is outside of the board`,
    );
    this.name = 'IllegalMoveError';
    this.column = column;
    this.reason = reason;
  }
}

export function opponentOf(color: Disc): Disc {
  return color === WHITE ? RED : WHITE;
}

export function colorName(color: Disc): 'white' | 'red' {
  return color === WHITE ? 'white' : 'red';
}
