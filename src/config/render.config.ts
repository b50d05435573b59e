import path from 'path';
import { numberFromEnv, stringFromEnv } from './env';
import { ConfigurationError } from '../utils/errors';
import {
  ProducerConfigSchema,
  type ProducerConfig,
  type ProducerConfigInput,
  type VoicegenConfig,
} from '../types/producer.types';

/**
 * Parse `SPEAKER=/path/to/ref.wav` entries into a speaker map.
 * `source` names the flag or variable in the error message.
 */
export function parseSpeakerRefs(items: readonly string[], source = '--ref'): Record<string, string> {
  const refs: Record<string, string> = {};
  for (const item of items) {
    const eq = item.indexOf('=');
    if (eq < 0) {
      throw new ConfigurationError(`${source} expects SPEAKER=/path/to/ref.wav, got: ${item}`);
    }
    refs[item.slice(0, eq)] = item.slice(eq + 1);
  }
  return refs;
}

function speakerRefsFromEnv(): Record<string, string> {
  const raw = process.env.VOICE_REFS;
  if (!raw || raw.trim() === '') return {};
  const items = raw.split(',').map((s) => s.trim()).filter(Boolean);
  return parseSpeakerRefs(items, 'VOICE_REFS');
}

/**
 * Build the producer config from the environment, with explicit overrides
 * taking priority. Paths are resolved against the working directory.
 */
export function loadProducerConfig(overrides: ProducerConfigInput = {}): ProducerConfig {
  const result = ProducerConfigSchema.safeParse({
    assetsDir: overrides.assetsDir ?? stringFromEnv('STORY_ASSETS_DIR'),
    outDir: overrides.outDir ?? stringFromEnv('STORY_OUT_DIR'),
    narrationGainDb: overrides.narrationGainDb ?? numberFromEnv('NARRATION_GAIN_DB'),
    musicGainDb: overrides.musicGainDb ?? numberFromEnv('MUSIC_GAIN_DB'),
    ambienceGainDb: overrides.ambienceGainDb ?? numberFromEnv('AMBIENCE_GAIN_DB'),
    speakerRefs: { ...speakerRefsFromEnv(), ...overrides.speakerRefs },
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid producer config: ${issues.join('; ')}`);
  }

  const config = result.data;
  return {
    ...config,
    assetsDir: path.resolve(config.assetsDir),
    outDir: path.resolve(config.outDir),
    speakerRefs: Object.fromEntries(
      Object.entries(config.speakerRefs).map(([speaker, ref]) => [speaker, path.resolve(ref)])
    ),
  };
}

export function loadVoicegenConfig(overrides: Partial<VoicegenConfig> = {}): VoicegenConfig {
  return {
    executable: path.resolve(overrides.executable || stringFromEnv('VOICEGEN_PATH') || 'tools/voicegen_xtts.sh'),
    device: overrides.device || stringFromEnv('VOICEGEN_DEVICE') || 'cuda',
  };
}
