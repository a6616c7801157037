import { legalColumns } from '../core/grid';
import { RandomSource, randomChoice } from '../core/random';
import { Disc, Player, ReadonlyGrid } from '../core/types';

/** Plays a uniformly random legal column and ignores rewards. */
export class RandomAgent implements Player {
  private readonly random: RandomSource;

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  setColor(_color: Disc): void {}

  proposeMove(grid: ReadonlyGrid): number {
    return randomChoice(legalColumns(grid), this.random);
  }

  receiveReward(_reward: number): void {}
}
