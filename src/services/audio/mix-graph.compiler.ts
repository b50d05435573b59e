// ===========================================================================
// Mix Graph Compiler
//
// Turns a finished timeline into one filter_complex graph:
//
//   [0:a]..[K-1:a]  narration/silence segments -> concat -> narration gain  [narr]
//   [K:a]           music bed    -> aloop -> gain -> atrim to narration    [music]
//   [K+1:a]         ambience bed -> aloop -> gain -> atrim to narration    [amb]
//   [..:a]          each SFX     -> adelay on every channel                [sfxN]
//   [narr][music][amb][sfx1].. -> amix (normalize=0)                       [mix]
//
// Everything happens inside a single invocation, so relative timing is
// sample-exact and nothing is re-encoded between steps. The sum is not
// loudness-normalized: balance comes from the configured gains only.
// ===========================================================================

import { EmptyDocumentError } from '../../utils/errors';
import { sanitizeFileStem } from '../../utils/filename';
import type { ProducerConfig } from '../../types/producer.types';
import type { Timeline } from '../../types/timeline.types';
import type { MixGraph, MixOutputSpec } from '../../types/mix.types';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const MIX_SAMPLE_RATE = 48000;

/** Segments may come from different tools; bring them to one format before concat */
const SEGMENT_FORMAT = `aformat=channel_layouts=mono,aresample=${MIX_SAMPLE_RATE}`;

/** Loop a bed indefinitely (size is in samples, large enough for any bed file) */
const LOOP_FOREVER = 'aloop=loop=-1:size=2e+09';

export const OUTPUT_LABEL = 'mix';

const OUTPUT_SPEC: Omit<MixOutputSpec, 'fileName'> = {
  format: 'mp3',
  codec: 'libmp3lame',
  bitrate: '160k',
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Seconds for filter arguments: fixed to microseconds, trailing zeros dropped. */
export function formatSeconds(value: number): string {
  return value.toFixed(6).replace(/\.?0+$/, '');
}

export function toDelayMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function outputFileName(title: string): string {
  return `${sanitizeFileStem(title)}.${OUTPUT_SPEC.format}`;
}

function gain(db: number): string {
  return `volume=${db}dB`;
}

// ---------------------------------------------------------------------------
// Compiler
// ---------------------------------------------------------------------------

export function compileMixGraph(timeline: Timeline, config: ProducerConfig): MixGraph {
  if (timeline.segments.length === 0) {
    throw new EmptyDocumentError();
  }

  const inputs: string[] = [];
  const filters: string[] = [];
  const mixLabels: string[] = [];
  const trimTo = formatSeconds(timeline.totalDuration);

  // ── Narration bed ──────────────────────────────────────────────────────
  const segmentLabels = timeline.segments.map((segment, i) => {
    inputs.push(segment.filePath);
    filters.push(`[${i}:a]${SEGMENT_FORMAT}[seg${i}]`);
    return `[seg${i}]`;
  });
  filters.push(
    `${segmentLabels.join('')}concat=n=${segmentLabels.length}:v=0:a=1,${gain(config.narrationGainDb)}[narr]`
  );
  mixLabels.push('[narr]');

  // ── Background beds ───────────────────────────────────────────────────
  const beds: { label: string; filePath: string | undefined; gainDb: number }[] = [
    { label: 'music', filePath: timeline.beds.music, gainDb: config.musicGainDb },
    { label: 'amb', filePath: timeline.beds.ambience, gainDb: config.ambienceGainDb },
  ];
  for (const bed of beds) {
    if (!bed.filePath) continue;
    const index = inputs.push(bed.filePath) - 1;
    filters.push(`[${index}:a]${LOOP_FOREVER},${gain(bed.gainDb)},atrim=0:${trimTo}[${bed.label}]`);
    mixLabels.push(`[${bed.label}]`);
  }

  // ── Sound effects ─────────────────────────────────────────────────────
  timeline.sfx.forEach((placement, i) => {
    const index = inputs.push(placement.filePath) - 1;
    const label = `sfx${i + 1}`;
    filters.push(`[${index}:a]adelay=delays=${toDelayMs(placement.startTime)}:all=1[${label}]`);
    mixLabels.push(`[${label}]`);
  });

  // ── Sum ───────────────────────────────────────────────────────────────
  filters.push(
    `${mixLabels.join('')}amix=inputs=${mixLabels.length}:duration=longest:normalize=0[${OUTPUT_LABEL}]`
  );

  return {
    inputs,
    filters,
    outputLabel: OUTPUT_LABEL,
    output: { ...OUTPUT_SPEC, fileName: outputFileName(timeline.title) },
    durationSeconds: timeline.totalDuration,
  };
}
