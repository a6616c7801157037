import path from 'path';
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_TRAINING_CONFIG } from '../src/config/training_config';
import { createSeededRandom } from '../src/core/random';
import { createServer } from '../src/gui/app';

const projectRoot = path.resolve(__dirname, '..');

function createTestServer() {
  return createServer(projectRoot, {
    config: DEFAULT_TRAINING_CONFIG,
    batchSize: 2,
    random: createSeededRandom(31),
  });
}

describe('training dashboard', () => {
  it('reports an idle controller before training starts', async () => {
    const { app } = createTestServer();
    const res = await request(app).get('/api/train/status');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      running: false,
      cycle: 0,
      batchSize: 2,
      redKind: 'online',
      matches: 0,
      previewBoard: [],
      updatedAt: null,
    });
    expect(res.body.parameters.white).toHaveLength(8);
  });

  it('rejects an unknown red learner', async () => {
    const { app, getController } = createTestServer();
    const res = await request(app).post('/api/train/start').send({ red: 'minimax' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("red must be 'online' or 'replay'");
    expect(getController().running).toBe(false);
  });

  it('trains in batches until stopped', async () => {
    const { app, getController } = createTestServer();

    const started = await request(app).post('/api/train/start').send({ red: 'replay' });
    expect(started.status).toBe(200);
    expect(started.body.status.running).toBe(true);
    expect(started.body.status.redKind).toBe('replay');
    expect(started.body.status.cycle).toBeGreaterThanOrEqual(1);

    const loop = getController().loopPromise;
    expect(loop).not.toBeNull();
    await request(app).post('/api/train/stop');
    await loop;

    const res = await request(app).get('/api/train/status');
    expect(res.body.running).toBe(false);
    expect(res.body.matches).toBe(res.body.cycle * 2);
    expect(res.body.whiteWins + res.body.redWins + res.body.draws).toBe(res.body.matches);
    expect(res.body.previewBoard).toHaveLength(6);
    expect(res.body.updatedAt).not.toBeNull();
  });

  it('stops and reports when the learners diverge', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { app, getController } = createServer(projectRoot, {
      config: { ...DEFAULT_TRAINING_CONFIG, learningRate: 1e300 },
      batchSize: 5,
      random: createSeededRandom(31),
    });

    await request(app).post('/api/train/start').send({});
    await (getController().loopPromise ?? Promise.resolve());

    const res = await request(app).get('/api/train/status');
    expect(res.body.running).toBe(false);
    expect(res.body.cycle).toBe(0);
    expect(res.body.message).toBe('Parameters diverged: update produced non-finite values');
    expect([...res.body.parameters.white, ...res.body.parameters.red]).not.toContain(null);
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });

  it('serves the page and 404s unknown paths', async () => {
    const { app } = createTestServer();
    const page = await request(app).get('/');
    expect(page.status).toBe(200);
    expect(page.text).toContain('<title>Connect Four self-play</title>');

    const missing = await request(app).get('/api/unknown');
    expect(missing.status).toBe(404);
    expect(missing.text).toBe('Not Found');
  });
});
