import express from 'express';
import path from 'path';

import { AfterstateAgent } from '../ai/agent';
import { LinearEvaluator } from '../ai/evaluator';
import { ReplayAgent } from '../ai/replay';
import { TrainingConfig } from '../config/training_config';
import { renderGrid } from '../core/grid';
import { RandomSource } from '../core/random';
import { emptySummary, recordResult, TrainingSummary } from '../training/engine';
import { ConnectFourMatch } from '../training/match';

export type LearnerKind = 'online' | 'replay';

export interface TrainingStatus {
  running: boolean;
  cycle: number;
  batchSize: number;
  redKind: LearnerKind;
  matches: number;
  whiteWins: number;
  redWins: number;
  draws: number;
  averageMoves: number;
  parameters: { white: number[]; red: number[] };
  previewBoard: string[];
  updatedAt: string | null;
  message?: string;
}

export interface TrainingController {
  running: boolean;
  stopRequested: boolean;
  status: TrainingStatus;
  loopPromise: Promise<void> | null;
  white: AfterstateAgent;
  red: AfterstateAgent;
  summary: TrainingSummary;
}

export interface DashboardOptions {
  config: TrainingConfig;
  batchSize: number;
  random?: RandomSource;
}

function createLearner(
  kind: LearnerKind,
  config: TrainingConfig,
  random: RandomSource,
): AfterstateAgent {
  const evaluator = new LinearEvaluator({ random });
  if (kind === 'replay') {
    return new ReplayAgent(evaluator, {
      explorationRate: config.explorationRate,
      learningRate: config.replayLearningRate,
      capacity: config.replayCapacity,
      episodeSize: config.episodeSize,
      learnEvery: config.learnEvery,
      random,
    });
  }
  return new AfterstateAgent(evaluator, {
    explorationRate: config.explorationRate,
    learningRate: config.learningRate,
    random,
  });
}

export function createTrainingController(
  options: DashboardOptions,
  redKind: LearnerKind = 'online',
): TrainingController {
  const random = options.random ?? Math.random;
  const white = createLearner('online', options.config, random);
  const red = createLearner(redKind, options.config, random);
  return {
    running: false,
    stopRequested: false,
    loopPromise: null,
    white,
    red,
    summary: emptySummary(),
    status: {
      running: false,
      cycle: 0,
      batchSize: options.batchSize,
      redKind,
      matches: 0,
      whiteWins: 0,
      redWins: 0,
      draws: 0,
      averageMoves: 0,
      parameters: { white: white.getParameters(), red: red.getParameters() },
      previewBoard: [],
      updatedAt: null,
    },
  };
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function runTrainingBatch(controller: TrainingController, batchSize: number): void {
  const match = new ConnectFourMatch(controller.white, controller.red);
  for (let i = 0; i < batchSize; i += 1) {
    controller.summary = recordResult(controller.summary, match.play());
  }
  const { summary, status } = controller;
  status.cycle += 1;
  status.matches = summary.matches;
  status.whiteWins = summary.whiteWins;
  status.redWins = summary.redWins;
  status.draws = summary.draws;
  status.averageMoves = summary.averageMoves;
  status.parameters = {
    white: controller.white.getParameters(),
    red: controller.red.getParameters(),
  };
  status.previewBoard = summary.lastResult
    ? renderGrid(summary.lastResult.finalGrid).split('\n')
    : [];
  status.updatedAt = new Date().toISOString();
  delete status.message;
}

/**
 * Plays batches of self-play matches until a stop is requested, yielding to
 * the event loop between batches so status requests are served.
 */
export async function runTrainingLoop(controller: TrainingController): Promise<void> {
  controller.running = true;
  controller.stopRequested = false;
  controller.status.running = true;

  while (!controller.stopRequested) {
    try {
      runTrainingBatch(controller, controller.status.batchSize);
    } catch (error) {
      controller.status.message = error instanceof Error ? error.message : String(error);
      // eslint-disable-next-line no-console
      console.error('Training batch failed:', error);
      controller.stopRequested = true;
    }
    await yieldToEventLoop();
  }

  controller.running = false;
  controller.status.running = false;
  controller.loopPromise = null;
}

function parseLearnerKind(body: unknown): LearnerKind | null | undefined {
  if (typeof body !== 'object' || body === null || !('red' in body)) {
    return undefined;
  }
  const { red } = body;
  return red === 'online' || red === 'replay' ? red : null;
}

export function createServer(projectRoot: string, options: DashboardOptions) {
  let controller = createTrainingController(options);
  const app = express();
  const publicDir = path.resolve(projectRoot, 'public');
  const assetsDir = path.resolve(projectRoot, 'dist', 'gui');

  app.use(express.json());

  app.use('/assets', express.static(assetsDir, { fallthrough: true }));
  app.use(express.static(publicDir, { fallthrough: true }));

  app.post('/api/train/start', (req, res) => {
    const redKind = parseLearnerKind(req.body);
    if (redKind === null) {
      res.status(400).json({ error: "red must be 'online' or 'replay'" });
      return;
    }
    if (controller.running) {
      res.json({ status: controller.status });
      return;
    }
    if (redKind !== undefined && redKind !== controller.status.redKind) {
      controller = createTrainingController(options, redKind);
    }
    controller.loopPromise = runTrainingLoop(controller);
    res.json({ status: controller.status });
  });

  app.post('/api/train/stop', (_req, res) => {
    controller.stopRequested = true;
    res.json({ status: controller.status });
  });

  app.get('/api/train/status', (_req, res) => {
    res.json(controller.status);
  });

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  return {
    app,
    getController: (): TrainingController => controller,
  };
}
