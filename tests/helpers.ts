import { Disc, Player, ReadonlyGrid } from '../src/core/types';

export type PlayerCall = 'propose' | `reward:${number}`;

/** Moves taken from a fixed list, with every call recorded. */
export class ScriptedPlayer implements Player {
  readonly calls: PlayerCall[] = [];
  readonly colors: Disc[] = [];
  private readonly moves: readonly number[];
  private index = 0;

  constructor(moves: readonly number[]) {
    this.moves = moves;
  }

  setColor(color: Disc): void {
    this.colors.push(color);
    this.index = 0;
  }

  proposeMove(_grid: ReadonlyGrid): number {
    this.calls.push('propose');
    const move = this.moves[this.index];
    this.index += 1;
    if (move === undefined) {
      throw new Error('Script exhausted');
    }
    return move;
  }

  receiveReward(reward: number): void {
    this.calls.push(`reward:${reward}`);
  }
}

/** Wraps another player and records the order of calls made on it. */
export class RecordingPlayer implements Player {
  readonly calls: PlayerCall[] = [];
  private readonly inner: Player;

  constructor(inner: Player) {
    this.inner = inner;
  }

  setColor(color: Disc): void {
    this.inner.setColor(color);
  }

  proposeMove(grid: ReadonlyGrid): number {
    this.calls.push('propose');
    return this.inner.proposeMove(grid);
  }

  receiveReward(reward: number): void {
    this.calls.push(`reward:${reward}`);
    this.inner.receiveReward(reward);
  }
}

export function expectAlternating(calls: readonly PlayerCall[]): boolean {
  if (calls.length % 2 !== 0) {
    return false;
  }
  return calls.every((call, index) =>
    index % 2 === 0 ? call === 'propose' : call.startsWith('reward:'),
  );
}

/** Random numbers served from a list, for pinning exploration decisions. */
export function queuedRandom(values: readonly number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    if (value === undefined) {
      throw new Error('Random queue exhausted');
    }
    return value;
  };
}

// Alternating white/red columns that fill the board without any four in a row.
export const DRAW_SEQUENCE: readonly number[] = [
  5, 4, 5, 0, 6, 2, 4, 5, 5, 0, 4, 1, 1, 0, 4, 5, 6, 5, 3, 1, 1, 2, 2, 6, 2, 6, 6, 3, 6, 2, 0,
  3, 0, 3, 3, 4, 3, 1, 4, 2, 1, 0,
];

export const DRAW_ROWS: readonly string[] = [
  'RWRWWRW',
  'WRRWRRW',
  'WWWRWWR',
  'RRWRWRR',
  'RWRRWWW',
  'RRRWRWW',
];

export function whiteMoves(sequence: readonly number[]): number[] {
  return sequence.filter((_, index) => index % 2 === 0);
}

export function redMoves(sequence: readonly number[]): number[] {
  return sequence.filter((_, index) => index % 2 === 1);
}
