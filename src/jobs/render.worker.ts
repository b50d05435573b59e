import { loadEnv } from '../config/env';
loadEnv();

import { Worker } from 'bullmq';
import { logger } from '../config/logger';
import { numberFromEnv } from '../config/env';
import { loadVoicegenConfig } from '../config/render.config';
import redisConnection, { QUEUE_NAMES, setupQueueEvents } from '../config/redis';
import { createRenderOrchestrator } from '../services/render.orchestrator';
import { errorMessage } from '../utils/errors';
import { createRenderProcessor, type RenderJobData, type RenderJobResult } from './render.processor';

/**
 * Create and start the story render worker
 */
export const createRenderWorker = () => {
  const processor = createRenderProcessor(createRenderOrchestrator(loadVoicegenConfig()));

  const worker = new Worker<RenderJobData, RenderJobResult>(QUEUE_NAMES.STORY_RENDER, processor, {
    connection: redisConnection,
    // Voice synthesis usually holds a GPU; one render at a time unless told otherwise
    concurrency: numberFromEnv('RENDER_WORKER_CONCURRENCY') || 1,
  });

  worker.on('completed', (job) => {
    logger.info(`Render job ${job.id} completed`, { outputPath: job.returnvalue.outputPath });
  });

  worker.on('failed', (job, err) => {
    logger.error(`Render job ${job?.id} failed`, {
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Render worker error', { error: err.message });
  });

  logger.info('Render worker started', { queue: QUEUE_NAMES.STORY_RENDER });
  return worker;
};

if (require.main === module) {
  const worker = createRenderWorker();
  const events = setupQueueEvents(QUEUE_NAMES.STORY_RENDER);

  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, closing render worker`);
    await worker.close();
    await events.close();
    await redisConnection.quit();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('Render worker shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
    });
  }
}
