import { describe, expect, it } from 'vitest';

import { LinearEvaluator, ParameterDivergenceError } from '../src/ai/evaluator';
import { Experience, ExperienceBuffer, ReplayAgent } from '../src/ai/replay';
import { DiscGrid } from '../src/core/grid';
import { createSeededRandom } from '../src/core/random';
import { WHITE } from '../src/core/types';

const OWN_SINGLES = [1, 0, 0, 0, 0, 0, 0, 0];

function centreGrid(): DiscGrid {
  const grid = new DiscGrid();
  grid.set(0, 3, WHITE);
  return grid;
}

function experience(reward: number): Experience {
  return { before: centreGrid(), after: centreGrid(), reward, color: WHITE };
}

describe('ExperienceBuffer', () => {
  it('keeps the most recent experiences when truncated', () => {
    const buffer = new ExperienceBuffer();
    for (let reward = 0; reward < 5; reward += 1) {
      buffer.push(experience(reward));
    }
    buffer.truncate(3);
    expect(buffer.length).toBe(3);
    expect(buffer.toArray().map((item) => item.reward)).toEqual([2, 3, 4]);

    buffer.truncate(10);
    expect(buffer.length).toBe(3);
  });

  it('samples without replacement and never more than it holds', () => {
    const buffer = new ExperienceBuffer();
    for (let reward = 0; reward < 6; reward += 1) {
      buffer.push(experience(reward));
    }
    const random = createSeededRandom(5);

    const some = buffer.sample(4, random).map((item) => item.reward);
    expect(some).toHaveLength(4);
    expect(new Set(some).size).toBe(4);
    some.forEach((reward) => expect(reward).toBeLessThan(6));

    const all = buffer.sample(100, random).map((item) => item.reward);
    expect([...all].sort()).toEqual([0, 1, 2, 3, 4, 5]);
  });
});

describe('ReplayAgent', () => {
  it('rejects non-positive sizes', () => {
    const evaluator = new LinearEvaluator({ parameters: OWN_SINGLES });
    expect(() => new ReplayAgent(evaluator, { learnEvery: 0 })).toThrow(/must be positive/);
    expect(() => new ReplayAgent(evaluator, { capacity: 0 })).toThrow(/must be positive/);
    expect(() => new ReplayAgent(evaluator, { episodeSize: -1 })).toThrow(/must be positive/);
  });

  it('takes one least-squares step over a batch', () => {
    const agent = new ReplayAgent(new LinearEvaluator({ parameters: OWN_SINGLES }), {
      learningRate: 0.01,
    });
    // residual = 7 - (7 + 1) = -1, gradient = 2 * -1 * [7, 0, ...]
    agent.replay([experience(1)]);
    expect(agent.getParameters()[0]).toBeCloseTo(1.14);
    expect(agent.getParameters().slice(1)).toEqual([0, 0, 0, 0, 0, 0, 0]);
  });

  it('sums the gradient over every experience in the batch', () => {
    const agent = new ReplayAgent(new LinearEvaluator({ parameters: OWN_SINGLES }), {
      learningRate: 0.01,
    });
    agent.replay([experience(1), experience(1)]);
    expect(agent.getParameters()[0]).toBeCloseTo(1.28);

    agent.replay([]);
    expect(agent.getParameters()[0]).toBeCloseTo(1.28);
  });

  it('refuses a step that overflows the parameters', () => {
    const agent = new ReplayAgent(new LinearEvaluator({ parameters: OWN_SINGLES }), {
      learningRate: 1e300,
    });
    // gradient = 2 * -1e10 * 7, so the step is far beyond the largest double
    expect(() => agent.replay([experience(1e10)])).toThrow(ParameterDivergenceError);
    expect(agent.getParameters()).toEqual(OWN_SINGLES);
  });

  it('learns only when the buffer length reaches a multiple of learnEvery', () => {
    const agent = new ReplayAgent(new LinearEvaluator({ parameters: OWN_SINGLES }), {
      explorationRate: 0,
      learningRate: 0.01,
      capacity: 3,
      episodeSize: 10,
      learnEvery: 2,
      random: createSeededRandom(1),
    });
    agent.setColor(WHITE);
    const step = (): void => {
      // Every afterstate is the centre disc on an empty board.
      agent.proposeMove(new DiscGrid());
      agent.receiveReward(1);
    };

    step();
    expect(agent.getBuffer().length).toBe(0);
    step();
    expect(agent.getBuffer().length).toBe(1);
    expect(agent.getParameters()).toEqual(OWN_SINGLES);

    step();
    expect(agent.getBuffer().length).toBe(2);
    expect(agent.getParameters()[0]).toBeCloseTo(1.28);

    step();
    expect(agent.getBuffer().length).toBe(3);
    expect(agent.getParameters()[0]).toBeCloseTo(1.28);

    // Four stored, truncated to three, all three sampled.
    step();
    expect(agent.getBuffer().length).toBe(3);
    expect(agent.getParameters()[0]).toBeCloseTo(1.7);
  });

  it('stores nothing while learning is off', () => {
    const agent = new ReplayAgent(new LinearEvaluator({ parameters: OWN_SINGLES }), {
      learnEvery: 1,
      learning: false,
    });
    agent.setColor(WHITE);
    for (let i = 0; i < 3; i += 1) {
      agent.proposeMove(new DiscGrid());
      agent.receiveReward(1);
    }
    expect(agent.getBuffer().length).toBe(0);
    expect(agent.getParameters()).toEqual(OWN_SINGLES);
  });
});
