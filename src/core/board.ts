import { DiscGrid, dropDisc, legalColumns, renderGrid, requireLandingRow } from './grid';
import {
  CONNECT_LENGTH,
  Disc,
  EMPTY,
  RED,
  ReadonlyGrid,
  StateIdentifier,
  WHITE,
} from './types';

const LINE_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

const IDENTIFIER_DIGITS: Record<Disc, number> = {
  [WHITE]: 1,
  [RED]: 2,
};

export class ConnectFourBoard {
  private readonly grid: DiscGrid;
  private readonly identifier: number[];
  private winnerValue: Disc | null = null;

  constructor() {
    this.grid = new DiscGrid();
    this.identifier = new Array<number>(this.grid.columns).fill(0);
  }

  legalMoves(): number[] {
    return legalColumns(this.grid);
  }

  /**
   * Drops `color` into `column`. The first move that completes a line sets
   * the winner; later moves never overwrite it.
   */
  applyMove(column: number, color: Disc): void {
    const row = dropDisc(this.grid, column, color);
    this.identifier[column] = (this.identifier[column] ?? 0) + identifierDigit(row, color);
    if (this.winnerValue === null && completesLine(this.grid, row, column)) {
      this.winnerValue = color;
    }
  }

  winner(): Disc | null {
    return this.winnerValue;
  }

  isFull(): boolean {
    return this.legalMoves().length === 0;
  }

  /**
   * Per column, a base-3 number whose digit at place `row` is 1 for white
   * and 2 for red, stopping at the first empty cell.
   */
  stateIdentifier(): StateIdentifier {
    return [...this.identifier];
  }

  nextStateIdentifier(column: number, color: Disc): StateIdentifier {
    const row = requireLandingRow(this.grid, column);
    const next = [...this.identifier];
    next[column] = (next[column] ?? 0) + identifierDigit(row, color);
    return next;
  }

  /** Copy of the current grid; mutating it does not affect the board. */
  snapshot(): DiscGrid {
    return this.grid.clone();
  }

  render(): string {
    return renderGrid(this.grid);
  }
}

function identifierDigit(row: number, color: Disc): number {
  return IDENTIFIER_DIGITS[color] * 3 ** row;
}

export function computeStateIdentifier(grid: ReadonlyGrid): StateIdentifier {
  const identifier: number[] = [];
  for (let column = 0; column < grid.columns; column += 1) {
    let value = 0;
    for (let row = 0; row < grid.rows; row += 1) {
      const cell = grid.get(row, column);
      if (cell === undefined || cell === EMPTY) {
        break;
      }
      value += identifierDigit(row, cell);
    }
    identifier.push(value);
  }
  return identifier;
}

export function stateKey(identifier: StateIdentifier): string {
  return identifier.join(',');
}

/**
 * True when the disc at (row, column) is part of a run of at least
 * CONNECT_LENGTH discs of its colour. Only lines through that cell are
 * scanned.
 */
export function completesLine(grid: ReadonlyGrid, row: number, column: number): boolean {
  const color = grid.get(row, column);
  if (color === undefined || color === EMPTY) {
    return false;
  }
  for (const [rowStep, columnStep] of LINE_DIRECTIONS) {
    let count = 1;
    for (const sense of [1, -1]) {
      let r = row + rowStep * sense;
      let c = column + columnStep * sense;
      while (grid.get(r, c) === color) {
        count += 1;
        r += rowStep * sense;
        c += columnStep * sense;
      }
    }
    if (count >= CONNECT_LENGTH) {
      return true;
    }
  }
  return false;
}
