import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../../config/logger';
import { ExternalToolError, errorMessage } from '../../utils/errors';
import type { MixGraph } from '../../types/mix.types';
import type { AudioProbe, MixingEngine, SilenceGenerator, SilenceOptions } from './audio-tools.interface';

/**
 * fluent-ffmpeg bindings for the media tool interfaces: ffprobe for
 * durations, an anullsrc input for silence, and one filter_complex run for
 * the final mix.
 */
class FFmpegService implements AudioProbe, SilenceGenerator, MixingEngine {
  /**
   * Get audio duration in seconds. A file ffprobe cannot measure is an
   * error, never a zero-length segment.
   */
  async getAudioDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          reject(new ExternalToolError('probe', `ffprobe failed for ${filePath}: ${errorMessage(err)}`, err));
          return;
        }
        const duration = metadata?.format?.duration;
        if (typeof duration !== 'number' || !Number.isFinite(duration) || duration < 0) {
          reject(new ExternalToolError('probe', `ffprobe reported no duration for ${filePath}`));
          return;
        }
        resolve(duration);
      });
    });
  }

  /**
   * Write a silent WAV of the given length.
   */
  async generateSilence(options: SilenceOptions): Promise<string> {
    const { seconds, sampleRate, channelLayout, outputPath } = options;

    return new Promise((resolve, reject) => {
      ffmpeg()
        .input(`anullsrc=r=${sampleRate}:cl=${channelLayout}`)
        .inputFormat('lavfi')
        .duration(seconds)
        .audioCodec('pcm_s16le')
        .output(outputPath)
        .on('end', () => {
          logger.debug(`Silence generated: ${seconds}s -> ${outputPath}`);
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = errorMessage(err);
          logger.error('FFmpeg silence error: %s', msg);
          reject(new ExternalToolError('silence', `Failed to generate ${seconds}s of silence: ${msg}`, err));
        })
        .run();
    });
  }

  /**
   * Run a compiled mix graph as a single ffmpeg invocation.
   */
  async runMix(graph: MixGraph, outputPath: string): Promise<string> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg();
      for (const input of graph.inputs) {
        command.input(input);
      }

      command.complexFilter(graph.filters, graph.outputLabel);
      command
        .audioCodec(graph.output.codec)
        .audioBitrate(graph.output.bitrate)
        .format(graph.output.format)
        .output(outputPath);

      command
        .on('start', (commandLine: string) => {
          logger.info('Mix: FFmpeg started', {
            inputs: graph.inputs.length,
            filters: graph.filters.length,
            durationSeconds: graph.durationSeconds,
          });
          logger.debug('FFmpeg filter_complex: %s', graph.filters.join(';'));
          logger.debug('FFmpeg command (first 500 chars): %s', commandLine.substring(0, 500));
        })
        .on('end', () => {
          logger.info('Mix: FFmpeg complete', { outputPath });
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = errorMessage(err);
          logger.error('Mix: FFmpeg error: %s', msg);
          reject(new ExternalToolError('mix', `Mixing failed: ${msg}`, err));
        });

      command.run();
    });
  }
}

export { FFmpegService };
export default new FFmpegService();
