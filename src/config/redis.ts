import { Queue, QueueEvents } from 'bullmq';
import Redis from 'ioredis';
import { logger } from './logger';
import { numberFromEnv } from './env';
import type { RenderJobData, RenderJobResult } from '../jobs/render.processor';

// Redis connection configuration
const redisConnection = new Redis(process.env.REDIS_URL || 'redis://localhost:6379', {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
});

redisConnection.on('connect', () => {
  logger.info('Redis connected successfully');
});

redisConnection.on('error', (error) => {
  logger.error('Redis connection error', { error: error.message });
});

export const QUEUE_NAMES = {
  STORY_RENDER: 'story-render',
} as const;

// A failed render is usually a bad script or a missing reference; retrying
// only helps for tool crashes, so retries are opt-in.
export const renderQueue = new Queue<RenderJobData, RenderJobResult>(QUEUE_NAMES.STORY_RENDER, {
  connection: redisConnection,
  defaultJobOptions: {
    attempts: numberFromEnv('RENDER_JOB_ATTEMPTS') || 1,
    backoff: {
      type: 'exponential',
      delay: 5000,
    },
    removeOnComplete: {
      count: 100, // Keep last 100 completed jobs
      age: 24 * 3600, // Keep for 24 hours
    },
    removeOnFail: {
      count: 200,
    },
  },
});

/** Log completion and failures for a queue. Returns the listener so callers can close it. */
export const setupQueueEvents = (queueName: string): QueueEvents => {
  const queueEvents = new QueueEvents(queueName, { connection: redisConnection });

  queueEvents.on('completed', ({ jobId }) => {
    logger.info(`Job ${jobId} in queue ${queueName} completed`);
  });

  queueEvents.on('failed', ({ jobId, failedReason }) => {
    logger.error(`Job ${jobId} in queue ${queueName} failed`, { failedReason });
  });

  queueEvents.on('progress', ({ jobId, data }) => {
    logger.debug(`Job ${jobId} in queue ${queueName} progress`, { progress: data });
  });

  return queueEvents;
};

export default redisConnection;
