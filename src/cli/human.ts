import fs from 'fs';

import { renderGrid } from '../core/grid';
import { Disc, Player, ReadonlyGrid, colorName } from '../core/types';

export interface LineIO {
  /** Next input line, or null once input is exhausted. */
  readLine(): string | null;
  write(text: string): void;
}

export const STDIN_RETRY_DELAY_MS = 50;

export interface StdinReaderOptions {
  /** Reads up to `buffer.length` bytes; 0 means end of input. */
  read?: (buffer: Buffer) => number;
  /** Blocks the thread for `ms` milliseconds. */
  pause?: (ms: number) => void;
  retryDelayMs?: number;
}

function readStdin(buffer: Buffer): number {
  return fs.readSync(0, buffer, 0, buffer.length, null);
}

function pauseThread(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function isRetryable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EAGAIN';
}

/**
 * Blocking line reader over stdin; matches are synchronous, so the human
 * seat waits for input in place. A non-blocking stdin that has nothing to
 * read yet is polled every `retryDelayMs`.
 */
export function createStdinLineIO(options: StdinReaderOptions = {}): LineIO {
  const read = options.read ?? readStdin;
  const pause = options.pause ?? pauseThread;
  const retryDelayMs = options.retryDelayMs ?? STDIN_RETRY_DELAY_MS;
  let pending = '';
  const buffer = Buffer.alloc(1);
  return {
    readLine(): string | null {
      for (;;) {
        const newline = pending.indexOf('\n');
        if (newline >= 0) {
          const line = pending.slice(0, newline).replace(/\r$/, '');
          pending = pending.slice(newline + 1);
          return line;
        }
        let bytesRead: number;
        try {
          bytesRead = read(buffer);
        } catch (error) {
          if (isRetryable(error)) {
            pause(retryDelayMs);
            continue;
          }
          throw error;
        }
        if (bytesRead === 0) {
          if (pending === '') {
            return null;
          }
          const line = pending;
          pending = '';
          return line;
        }
        pending += buffer.toString('utf-8', 0, bytesRead);
      }
    },
    write(text: string): void {
      process.stdout.write(text);
    },
  };
}

export class HumanPlayer implements Player {
  private readonly io: LineIO;
  private color: Disc | null = null;

  constructor(io: LineIO = createStdinLineIO()) {
    this.io = io;
  }

  setColor(color: Disc): void {
    this.color = color;
  }

  /**
   * Asks until a number is typed. Out-of-range numbers are passed on so the
   * match treats them as an illegal move.
   */
  proposeMove(grid: ReadonlyGrid): number {
    if (this.color !== null) {
      this.io.write(`You are playing ${colorName(this.color)}\n`);
    }
    this.io.write(`${renderGrid(grid)}\n`);
    this.io.write(`Choose column (0 (left) to ${grid.columns - 1} (right)):\n`);
    for (;;) {
      const line = this.io.readLine();
      if (line === null) {
        throw new Error('Input closed while waiting for a move');
      }
      const trimmed = line.trim();
      if (/^-?\d+$/.test(trimmed)) {
        return Number(trimmed);
      }
    }
  }

  receiveReward(reward: number): void {
    if (reward > 0) {
      this.io.write('You win!\n');
    } else if (reward < 0) {
      this.io.write('You lose.\n');
    }
  }
}
