// ===========================================================================
// Timeline Builder
//
// Walks the script events strictly in document order and places everything
// on one continuous timeline:
//
//   Narration: [ Ruby: Hello ][ PAUSE 0.5 ][ Onyx: Bye ]
//   SFX:                                  ♦ chime (at=last_end)
//              0             1.0          1.5          2.5
//
// Each utterance is synthesized and measured before the next event is
// looked at: segment N's duration decides segment N+1's start and every
// anchor that follows, so nothing here runs in parallel.
// ===========================================================================

import path from 'path';
import { logger } from '../../config/logger';
import { ConfigurationError, EmptyDocumentError } from '../../utils/errors';
import { sanitizeFileStem } from '../../utils/filename';
import { countUtterances, getDirective } from '../script/script-parser.service';
import {
  START_CLOCK,
  advanceForPause,
  advanceForUtterance,
  placeCue,
  type TimelineClock,
} from './timeline-clock';
import { DIRECTIVE_KEYS, type ScriptEvent } from '../../types/script.types';
import type { ProducerConfig } from '../../types/producer.types';
import type { BackgroundBeds, NarrationSegment, SfxPlacement, Timeline } from '../../types/timeline.types';
import type { AudioProbe, SilenceGenerator } from './audio-tools.interface';
import type { VoiceSynthesizer } from '../tts/voice-synthesizer.interface';
import type { AssetResolver } from '../assets/asset-resolver.interface';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_TITLE = 'story';

/** Silence segments are generated at this rate, mono */
export const SILENCE_SAMPLE_RATE = 48000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** External collaborators the builder drives. */
export interface TimelineTools {
  voice: VoiceSynthesizer;
  probe: AudioProbe;
  silence: SilenceGenerator;
  assets: AssetResolver;
}

// ---------------------------------------------------------------------------
// Service
// ---------------------------------------------------------------------------

export class TimelineBuilder {
  constructor(private readonly tools: TimelineTools) {}

  /**
   * Build the timeline for one render. Segment files are written into
   * `workDir`, which the caller owns and removes.
   */
  async build(events: readonly ScriptEvent[], config: ProducerConfig, workDir: string): Promise<Timeline> {
    if (countUtterances(events) === 0) {
      throw new EmptyDocumentError();
    }
    this.assertSpeakersConfigured(events, config);

    // Document-level directives are read once, before the walk
    const title = getDirective(events, DIRECTIVE_KEYS.TITLE) || DEFAULT_TITLE;
    const beds = await this.resolveBeds(events, config);

    let clock: TimelineClock = START_CLOCK;
    const segments: NarrationSegment[] = [];
    const sfx: SfxPlacement[] = [];
    let segmentNumber = 0;

    for (const event of events) {
      switch (event.kind) {
        case 'utterance': {
          segmentNumber += 1;
          const voiceReference = this.voiceReferenceFor(event.speaker, config);
          const outputPath = path.join(
            workDir,
            `seg_${pad(segmentNumber)}_${sanitizeFileStem(event.speaker)}.wav`
          );

          const filePath = await this.tools.voice.synthesize({ voiceReference, text: event.text, outputPath });
          const duration = await this.tools.probe.getAudioDuration(filePath);
          const next = advanceForUtterance(clock, duration);

          segments.push({
            kind: 'speech',
            filePath,
            startTime: clock.currentTime,
            endTime: next.currentTime,
            speaker: event.speaker,
          });
          logger.debug(`Timeline: ${event.speaker} ${clock.currentTime.toFixed(3)}s -> ${next.currentTime.toFixed(3)}s`);
          clock = next;
          break;
        }

        case 'pause': {
          segmentNumber += 1;
          const filePath = await this.tools.silence.generateSilence({
            seconds: event.seconds,
            sampleRate: SILENCE_SAMPLE_RATE,
            channelLayout: 'mono',
            outputPath: path.join(workDir, `sil_${pad(segmentNumber)}.wav`),
          });
          const next = advanceForPause(clock, event.seconds);

          segments.push({ kind: 'silence', filePath, startTime: clock.currentTime, endTime: next.currentTime });
          clock = next;
          break;
        }

        case 'sfx': {
          // Anchor first: an unknown anchor fails before any asset lookup
          const startTime = placeCue(clock, event.anchor, event.offsetSeconds);
          const filePath = await this.tools.assets.resolve(config.assetsDir, event.assetId);

          sfx.push({ assetId: event.assetId, filePath, startTime });
          logger.debug(`Timeline: SFX ${event.assetId} at ${startTime.toFixed(3)}s (${event.anchor}${formatOffset(event.offsetSeconds)})`);
          break;
        }

        case 'directive':
          break;
      }
    }

    logger.info('Timeline built', {
      title,
      segments: segments.length,
      sfx: sfx.length,
      music: beds.music ?? null,
      ambience: beds.ambience ?? null,
      totalDuration: clock.currentTime.toFixed(3),
    });

    return { title, segments, sfx, beds, totalDuration: clock.currentTime };
  }

  /**
   * Every speaker must have a voice reference. Checked up front so a typo in
   * the last line does not cost a full synthesis pass first.
   */
  private assertSpeakersConfigured(events: readonly ScriptEvent[], config: ProducerConfig): void {
    for (const event of events) {
      if (event.kind === 'utterance') {
        this.voiceReferenceFor(event.speaker, config);
      }
    }
  }

  private voiceReferenceFor(speaker: string, config: ProducerConfig): string {
    const ref = Object.hasOwn(config.speakerRefs, speaker) ? config.speakerRefs[speaker] : undefined;
    if (!ref) {
      throw new ConfigurationError(
        `No voice reference configured for speaker "${speaker}". Provide --ref ${speaker}=/path/to/ref.wav`
      );
    }
    return ref;
  }

  private async resolveBeds(events: readonly ScriptEvent[], config: ProducerConfig): Promise<BackgroundBeds> {
    const beds: BackgroundBeds = {};
    const music = getDirective(events, DIRECTIVE_KEYS.MUSIC);
    const ambience = getDirective(events, DIRECTIVE_KEYS.AMBIENCE);

    if (music) {
      beds.music = await this.tools.assets.resolve(config.assetsDir, music);
    }
    if (ambience) {
      beds.ambience = await this.tools.assets.resolve(config.assetsDir, ambience);
    }
    return beds;
  }
}

function pad(n: number): string {
  return String(n).padStart(4, '0');
}

function formatOffset(offset: number): string {
  if (offset === 0) return '';
  return offset > 0 ? `+${offset}` : `${offset}`;
}
