import {
  COLUMNS,
  Cell,
  Disc,
  EMPTY,
  Grid,
  GridDimensions,
  IllegalMoveError,
  RED,
  ReadonlyGrid,
  ROWS,
  WHITE,
} from './types';

const CELL_CHARS: Record<Cell, string> = {
  [EMPTY]: '.',
  [WHITE]: 'W',
  [RED]: 'R',
};

const CELL_BY_CODE: readonly (Cell | undefined)[] = [EMPTY, WHITE, RED];

function toCell(value: number): Cell {
  const cell = CELL_BY_CODE[value];
  if (cell === undefined) {
    throw new Error(`Unknown grid entry ${value}`);
  }
  return cell;
}

export class DiscGrid implements Grid {
  public readonly rows: number;
  public readonly columns: number;
  private readonly cells: Uint8Array;

  constructor(dimensions: GridDimensions = STANDARD_GRID) {
    this.rows = dimensions.rows;
    this.columns = dimensions.columns;
    this.cells = new Uint8Array(this.rows * this.columns);
  }

  clone(): DiscGrid {
    const copy = new DiscGrid({ rows: this.rows, columns: this.columns });
    copy.cells.set(this.cells);
    return copy;
  }

  get(row: number, column: number): Cell | undefined {
    if (!this.isInside(row, column)) {
      return undefined;
    }
    return toCell(this.cells[row * this.columns + column] ?? EMPTY);
  }

  set(row: number, column: number, value: Cell): void {
    if (!this.isInside(row, column)) {
      throw new Error(`Coordinates (${row}, ${column}) are outside of the grid`);
    }
    this.cells[row * this.columns + column] = value;
  }

  isInside(row: number, column: number): boolean {
    return row >= 0 && row < this.rows && column >= 0 && column < this.columns;
  }

  equals(other: ReadonlyGrid): boolean {
    if (other.rows !== this.rows || other.columns !== this.columns) {
      return false;
    }
    for (let row = 0; row < this.rows; row += 1) {
      for (let column = 0; column < this.columns; column += 1) {
        if (this.get(row, column) !== other.get(row, column)) {
          return false;
        }
      }
    }
    return true;
  }

  /**
   * Builds a grid from text rows listed top row first, using the same
   * characters as `renderGrid`.
   */
  static fromRows(lines: readonly string[]): DiscGrid {
    const columns = lines[0]?.length ?? 0;
    const grid = new DiscGrid({ rows: lines.length, columns });
    lines.forEach((line, index) => {
      if (line.length !== columns) {
        throw new Error(`Row ${index} has ${line.length} cells, expected ${columns}`);
      }
      const row = lines.length - 1 - index;
      for (let column = 0; column < columns; column += 1) {
        grid.set(row, column, parseCellChar(line.charAt(column)));
      }
    });
    return grid;
  }
}

function parseCellChar(char: string): Cell {
  switch (char) {
    case '.':
      return EMPTY;
    case 'W':
      return WHITE;
    case 'R':
      return RED;
    default:
      throw new Error(`Unknown cell character '${char}'`);
  }
}

export const STANDARD_GRID: GridDimensions = {
  rows: ROWS,
  columns: COLUMNS,
};

/**
 * Lowest empty row of `column`, or null when the column is full or does not
 * exist.
 */
export function landingRow(grid: ReadonlyGrid, column: number): number | null {
  if (!Number.isInteger(column) || column < 0 || column >= grid.columns) {
    return null;
  }
  for (let row = 0; row < grid.rows; row += 1) {
    if (grid.get(row, column) === EMPTY) {
      return row;
    }
  }
  return null;
}

export function legalColumns(grid: ReadonlyGrid): number[] {
  const columns: number[] = [];
  for (let column = 0; column < grid.columns; column += 1) {
    if (grid.get(grid.rows - 1, column) === EMPTY) {
      columns.push(column);
    }
  }
  return columns;
}

export function requireLandingRow(grid: ReadonlyGrid, column: number): number {
  const row = landingRow(grid, column);
  if (row === null) {
    const inRange = Number.isInteger(column) && column >= 0 && column < grid.columns;
    throw new IllegalMoveError(column, inRange ? 'full' : 'out-of-range');
  }
  return row;
}

/**
 * Drops a disc into `column` and returns the row it landed on. The grid is
 * left untouched when the move is illegal.
 */
export function dropDisc(grid: Grid, column: number, color: Disc): number {
  const row = requireLandingRow(grid, column);
  grid.set(row, column, color);
  return row;
}

export function renderGrid(grid: ReadonlyGrid): string {
  const lines: string[] = [];
  for (let row = grid.rows - 1; row >= 0; row -= 1) {
    let line = '';
    for (let column = 0; column < grid.columns; column += 1) {
      line += CELL_CHARS[grid.get(row, column) ?? EMPTY];
    }
    lines.push(line);
  }
  return lines.join('\n');
}
