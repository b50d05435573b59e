// ===========================================================================
// Media Tool Interfaces
//
// The timeline builder and render orchestrator only talk to media tooling
// through these interfaces. ffmpeg.service.ts is the production
// implementation; tests use in-process fakes.
// ===========================================================================

import type { MixGraph } from '../../types/mix.types';

export type ChannelLayout = 'mono' | 'stereo';

export interface AudioProbe {
  /** Duration in seconds. Rejects when the duration cannot be measured. */
  getAudioDuration(filePath: string): Promise<number>;
}

export interface SilenceOptions {
  seconds: number;
  sampleRate: number;
  channelLayout: ChannelLayout;
  outputPath: string;
}

export interface SilenceGenerator {
  /** Writes a silent file and resolves to its path. */
  generateSilence(options: SilenceOptions): Promise<string>;
}

export interface MixingEngine {
  /** Runs the whole graph as one invocation, writing outputPath. */
  runMix(graph: MixGraph, outputPath: string): Promise<string>;
}
