import 'dotenv/config';
import { build, context, type BuildOptions } from 'esbuild';
import fs from 'fs';
import path from 'path';

import { loadTrainingConfigFromEnv } from '../config/training_config';
import { createServer } from './app';

const TRAIN_BATCH_SIZE = Number(process.env.GUI_TRAIN_BATCH ?? 50);

async function bundleClient(projectRoot: string, watch = false): Promise<void> {
  const outDir = path.resolve(projectRoot, 'dist', 'gui');
  await fs.promises.mkdir(outDir, { recursive: true });

  const clientOptions: BuildOptions = {
    entryPoints: [path.resolve(projectRoot, 'src', 'gui', 'client.ts')],
    outfile: path.join(outDir, 'client.js'),
    bundle: true,
    sourcemap: true,
    platform: 'browser',
    target: ['es2018'],
    format: 'esm',
    logLevel: 'info',
  };

  if (watch) {
    const ctx = await context(clientOptions);
    await ctx.watch();
  } else {
    await build(clientOptions);
  }
}

async function main(): Promise<void> {
  const projectRoot = path.resolve(__dirname, '..', '..');
  const config = loadTrainingConfigFromEnv();
  const watch = process.argv.includes('--watch');

  await bundleClient(projectRoot, watch);
  const { app } = createServer(projectRoot, {
    config,
    batchSize: Number.isInteger(TRAIN_BATCH_SIZE) && TRAIN_BATCH_SIZE > 0 ? TRAIN_BATCH_SIZE : 50,
  });
  app.listen(config.port, () => {
    // eslint-disable-next-line no-console
    console.log(
      `Connect Four training dashboard at http://localhost:${config.port} (watch=${watch})`,
    );
  });
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exit(1);
});
