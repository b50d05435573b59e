import { z } from 'zod';

// ===========================================================================
// Producer configuration: supplied once per render, read-only.
// ===========================================================================

export const DEFAULT_GAINS_DB = {
  narration: 0,
  music: -18,
  ambience: -22,
} as const;

export const ProducerConfigSchema = z.object({
  /** Root of the asset tree (sfx/, music/, ambience/ live beneath it) */
  assetsDir: z.string().min(1).default('assets'),
  /** Where the finished artifact is written */
  outDir: z.string().min(1).default('out'),
  /** Speaker name (exact match) -> voice reference path */
  speakerRefs: z.record(z.string(), z.string().min(1)).default({}),
  narrationGainDb: z.number().finite().default(DEFAULT_GAINS_DB.narration),
  musicGainDb: z.number().finite().default(DEFAULT_GAINS_DB.music),
  ambienceGainDb: z.number().finite().default(DEFAULT_GAINS_DB.ambience),
});

export type ProducerConfig = z.infer<typeof ProducerConfigSchema>;
export type ProducerConfigInput = z.input<typeof ProducerConfigSchema>;

export interface VoicegenConfig {
  /** Wrapper executable invoked as `<executable> --text --ref --out --device` */
  executable: string;
  device: string;
}
