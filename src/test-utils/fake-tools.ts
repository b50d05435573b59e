import fs from 'fs';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import { AssetResolutionError, ExternalToolError } from '../utils/errors';
import { assetSearchPaths } from '../services/assets/file-asset-resolver';
import type { RenderTools } from '../services/render.orchestrator';
import type { MixGraph } from '../types/mix.types';
import type { SynthesisRequest } from '../services/tts/voice-synthesizer.interface';
import type { SilenceOptions } from '../services/audio/audio-tools.interface';

export interface FakeToolOptions {
  /** Narration text -> measured duration in seconds (default 1) */
  durations?: Record<string, number>;
  /** Asset id -> resolved path; anything else is "not found" */
  assets?: Record<string, string>;
  /** Synthesis of this text fails */
  failVoiceOn?: string;
  failMix?: boolean;
}

export interface FakeTools {
  tools: RenderTools;
  /** Every external call in order: voice:<text>, probe, silence:<s>, asset:<id>, mix */
  calls: string[];
  graphs: MixGraph[];
  /** Directories segment files were written to */
  workDirs: Set<string>;
}

/**
 * In-process stand-ins for the media tools. Voice and silence fakes write
 * small placeholder files so paths behave like real segment files.
 */
export function createFakeTools(options: FakeToolOptions = {}): FakeTools {
  const calls: string[] = [];
  const graphs: MixGraph[] = [];
  const workDirs = new Set<string>();
  const textByPath = new Map<string, string>();

  const tools: RenderTools = {
    voice: {
      synthesize: vi.fn(async (request: SynthesisRequest) => {
        calls.push(`voice:${request.text}`);
        workDirs.add(path.dirname(request.outputPath));
        if (request.text === options.failVoiceOn) {
          throw new ExternalToolError('voice', `synthesis failed for "${request.text}"`);
        }
        await fs.promises.writeFile(request.outputPath, `speech:${request.text}`);
        textByPath.set(request.outputPath, request.text);
        return request.outputPath;
      }),
    },
    probe: {
      getAudioDuration: vi.fn(async (filePath: string) => {
        calls.push('probe');
        const text = textByPath.get(filePath);
        if (text === undefined) {
          throw new ExternalToolError('probe', `unknown file ${filePath}`);
        }
        return options.durations?.[text] ?? 1;
      }),
    },
    silence: {
      generateSilence: vi.fn(async (silence: SilenceOptions) => {
        calls.push(`silence:${silence.seconds}`);
        workDirs.add(path.dirname(silence.outputPath));
        await fs.promises.writeFile(silence.outputPath, `silence:${silence.seconds}`);
        return silence.outputPath;
      }),
    },
    assets: {
      resolve: vi.fn(async (root: string, assetId: string) => {
        calls.push(`asset:${assetId}`);
        const found = options.assets?.[assetId];
        if (!found) {
          throw new AssetResolutionError(assetId, assetSearchPaths(root, assetId));
        }
        return found;
      }),
    },
    mixer: {
      runMix: vi.fn(async (graph: MixGraph, outputPath: string) => {
        calls.push('mix');
        graphs.push(graph);
        if (options.failMix) {
          throw new ExternalToolError('mix', 'ffmpeg exited with code 1');
        }
        await fs.promises.writeFile(outputPath, JSON.stringify(graph));
        return outputPath;
      }),
    },
  };

  return { tools, calls, graphs, workDirs };
}

/** Fresh directory under the OS temp dir. */
export async function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}
