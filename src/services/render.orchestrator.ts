import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';
import { errorMessage } from '../utils/errors';
import { parseScript } from './script/script-parser.service';
import { TimelineBuilder, type TimelineTools } from './audio/timeline-builder.service';
import { compileMixGraph } from './audio/mix-graph.compiler';
import ffmpegService from './audio/ffmpeg.service';
import fileAssetResolver from './assets/file-asset-resolver';
import { CommandVoiceSynthesizer } from './tts/command-voice-synthesizer';
import type { MixingEngine } from './audio/audio-tools.interface';
import type { ParseOptions } from '../types/script.types';
import type { ProducerConfig, VoicegenConfig } from '../types/producer.types';
import type { Timeline } from '../types/timeline.types';

export interface RenderTools extends TimelineTools {
  mixer: MixingEngine;
}

export interface RenderResult {
  renderId: string;
  /** Final artifact in the configured output directory */
  outputPath: string;
  /** Narration bed length; beds are trimmed to this */
  durationSeconds: number;
  timeline: Timeline;
}

/**
 * Render entry point: script text -> one mixed file.
 *
 *   1. Parse (pure, fails on the first bad line)
 *   2. Build the timeline in a scoped working directory
 *   3. Compile the mix graph and run it once, staging the output inside
 *      the working directory
 *   4. Move the finished file into the output directory
 *
 * The working directory is removed on every exit path, and the output
 * directory only ever sees a complete file.
 */
export class RenderOrchestrator {
  private readonly timelineBuilder: TimelineBuilder;

  constructor(private readonly tools: RenderTools) {
    this.timelineBuilder = new TimelineBuilder(tools);
  }

  async render(scriptText: string, config: ProducerConfig, parseOptions: ParseOptions = {}): Promise<RenderResult> {
    const renderId = uuidv4().slice(0, 8);
    const startedAt = Date.now();
    logger.info(`[Render ${renderId}] Starting`, { chars: scriptText.length, outDir: config.outDir });

    let workDir: string | undefined;
    try {
      const events = parseScript(scriptText, parseOptions);
      logger.info(`[Render ${renderId}] Parsed ${events.length} events`);

      workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), `story-mixer-${renderId}-`));

      const timeline = await this.timelineBuilder.build(events, config, workDir);
      const graph = compileMixGraph(timeline, config);

      const stagedPath = path.join(workDir, graph.output.fileName);
      await this.tools.mixer.runMix(graph, stagedPath);

      const outputPath = await this.publish(stagedPath, config.outDir, graph.output.fileName, renderId);

      logger.info(`[Render ${renderId}] Completed`, {
        outputPath,
        duration: `${timeline.totalDuration.toFixed(2)}s`,
        elapsedMs: Date.now() - startedAt,
      });

      return { renderId, outputPath, durationSeconds: timeline.totalDuration, timeline };
    } catch (error) {
      logger.error(`[Render ${renderId}] Failed: ${errorMessage(error)}`);
      throw error;
    } finally {
      if (workDir) {
        await this.removeWorkDir(renderId, workDir);
      }
    }
  }

  /** Cleanup failures are logged, never thrown over the render's own outcome. */
  private async removeWorkDir(renderId: string, workDir: string): Promise<void> {
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(`[Render ${renderId}] Could not remove working directory`, { workDir, error: errorMessage(error) });
    }
  }

  /** Copy next to the destination, then rename, so readers never see a partial file. */
  private async publish(stagedPath: string, outDir: string, fileName: string, renderId: string): Promise<string> {
    await fs.promises.mkdir(outDir, { recursive: true });
    const outputPath = path.join(outDir, fileName);
    const partialPath = `${outputPath}.${renderId}.partial`;

    try {
      await fs.promises.copyFile(stagedPath, partialPath);
      await fs.promises.rename(partialPath, outputPath);
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true });
      throw error;
    }
    return outputPath;
  }
}

/** Orchestrator wired to ffmpeg, the local asset tree and the voicegen wrapper. */
export function createRenderOrchestrator(voicegen: VoicegenConfig): RenderOrchestrator {
  return new RenderOrchestrator({
    voice: new CommandVoiceSynthesizer(voicegen),
    probe: ffmpegService,
    silence: ffmpegService,
    assets: fileAssetResolver,
    mixer: ffmpegService,
  });
}
