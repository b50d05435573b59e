import { UnrecoverableError, type Job } from 'bullmq';
import { z } from 'zod';
import { logger } from '../config/logger';
import { loadProducerConfig } from '../config/render.config';
import { RenderError, errorMessage } from '../utils/errors';
import type { RenderOrchestrator } from '../services/render.orchestrator';

export const RenderJobDataSchema = z.object({
  /** Full script text */
  script: z.string().min(1),
  /** Merged over VOICE_REFS */
  speakerRefs: z.record(z.string(), z.string().min(1)).optional(),
  assetsDir: z.string().min(1).optional(),
  outDir: z.string().min(1).optional(),
  strict: z.boolean().optional(),
});

export type RenderJobData = z.infer<typeof RenderJobDataSchema>;

export interface RenderJobResult {
  outputPath: string;
  durationSeconds: number;
}

/** The parts of a BullMQ job the processor touches. */
export type RenderJob = Pick<Job<RenderJobData, RenderJobResult>, 'id' | 'data' | 'updateProgress'>;

/**
 * Only tool crashes are worth another attempt. Script, asset and
 * configuration errors fail the same way every time.
 */
function isRetryable(error: unknown): boolean {
  return !(error instanceof RenderError) || error.code === 'EXTERNAL_TOOL_FAILURE';
}

/**
 * Build the job handler around an orchestrator.
 */
export const createRenderProcessor =
  (orchestrator: Pick<RenderOrchestrator, 'render'>) =>
  async (job: RenderJob): Promise<RenderJobResult> => {
    const parsed = RenderJobDataSchema.safeParse(job.data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'data'}: ${issue.message}`);
      throw new UnrecoverableError(`Invalid render job payload: ${issues.join('; ')}`);
    }
    const data = parsed.data;

    logger.info(`Processing render job ${job.id}`, { chars: data.script.length, strict: data.strict ?? false });

    try {
      await job.updateProgress(10);

      const config = loadProducerConfig({
        assetsDir: data.assetsDir,
        outDir: data.outDir,
        speakerRefs: data.speakerRefs,
      });
      const result = await orchestrator.render(data.script, config, { strict: data.strict ?? false });

      await job.updateProgress(100);
      logger.info(`Render job ${job.id} finished`, { outputPath: result.outputPath, renderId: result.renderId });

      return { outputPath: result.outputPath, durationSeconds: result.durationSeconds };
    } catch (error) {
      logger.error(`Render job ${job.id} failed`, { error: errorMessage(error) });
      if (!isRetryable(error)) {
        throw new UnrecoverableError(errorMessage(error));
      }
      throw error;
    }
  };
