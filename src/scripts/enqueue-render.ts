#!/usr/bin/env node
/**
 * Queue a script for the render worker.
 *
 * Usage:
 *   enqueue-render --story stories/night.txt [--ref Ruby=refs/ruby.wav]... [--assets-dir assets]
 *                  [--out-dir out] [--strict]
 *
 * Voice settings (--voicegen, --device) are the worker's: VOICEGEN_PATH, VOICEGEN_DEVICE.
 *
 * Environment:
 *   REDIS_URL (default redis://localhost:6379), RENDER_JOB_ATTEMPTS
 */

import { loadEnv } from '../config/env';
loadEnv();

import fs from 'fs';
import { parseEnqueueArgs, toRenderJobData } from '../cli/cli-args';
import redisConnection, { renderQueue } from '../config/redis';
import { errorMessage } from '../utils/errors';

async function main(): Promise<void> {
  const command = parseEnqueueArgs(process.argv.slice(2));

  const script = await fs.promises.readFile(command.story, 'utf8');
  const job = await renderQueue.add('render', toRenderJobData(command, script));

  console.log(`Queued render job ${job.id}`);
  await renderQueue.close();
  await redisConnection.quit();
}

main().catch((err: unknown) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
