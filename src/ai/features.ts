import { CONNECT_LENGTH, Disc, ReadonlyGrid, opponentOf } from '../core/types';

/**
 * Eight numbers: open lines holding exactly 1..4 of the acting colour,
 * then the same counts for the opponent.
 */
export type FeatureVector = readonly number[];

export const FEATURE_NAMES = [
  'own_open_1',
  'own_open_2',
  'own_open_3',
  'own_open_4',
  'opponent_open_1',
  'opponent_open_2',
  'opponent_open_3',
  'opponent_open_4',
] as const;

export const FEATURE_COUNT = FEATURE_NAMES.length;

const WINDOW_DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [0, 1],
  [1, 0],
  [1, 1],
  [1, -1],
];

/**
 * Buckets every in-bounds window of CONNECT_LENGTH cells by how many discs of
 * `color` it holds. Windows containing an opposing disc are skipped.
 * Returns CONNECT_LENGTH + 1 counts indexed by disc count.
 */
export function countOpenPositions(grid: ReadonlyGrid, color: Disc): number[] {
  const other = opponentOf(color);
  const counts = new Array<number>(CONNECT_LENGTH + 1).fill(0);

  for (let row = 0; row < grid.rows; row += 1) {
    for (let column = 0; column < grid.columns; column += 1) {
      for (const [rowStep, columnStep] of WINDOW_DIRECTIONS) {
        const endRow = row + rowStep * (CONNECT_LENGTH - 1);
        const endColumn = column + columnStep * (CONNECT_LENGTH - 1);
        if (!grid.isInside(endRow, endColumn)) {
          continue;
        }
        let own = 0;
        let blocked = false;
        for (let step = 0; step < CONNECT_LENGTH; step += 1) {
          const cell = grid.get(row + rowStep * step, column + columnStep * step);
          if (cell === other) {
            blocked = true;
            break;
          }
          if (cell === color) {
            own += 1;
          }
        }
        if (!blocked) {
          counts[own] = (counts[own] ?? 0) + 1;
        }
      }
    }
  }

  return counts;
}

export function computeFeatures(grid: ReadonlyGrid, color: Disc): FeatureVector {
  const own = countOpenPositions(grid, color).slice(1);
  const opponent = countOpenPositions(grid, opponentOf(color)).slice(1);
  return [...own, ...opponent];
}

export function dot(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}
