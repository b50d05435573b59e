// ===========================================================================
// Script Types
//
// A script is a line-oriented document; parsing yields an ordered list of
// events. Order is significant: the timeline is built by walking the events
// exactly as they appear.
// ===========================================================================

/** Timeline reference points an SFX cue can be positioned against. */
export const ANCHORS = ['now', 'last_start', 'last_end'] as const;
export type Anchor = (typeof ANCHORS)[number];

export const DEFAULT_ANCHOR: Anchor = 'last_end';

/** `@key: value` document metadata (title, music, ambience, lang, ...). */
export interface DirectiveEvent {
  kind: 'directive';
  key: string;
  value: string;
}

/** One narration line attributed to a speaker. */
export interface UtteranceEvent {
  kind: 'utterance';
  speaker: string;
  text: string;
}

export interface PauseEvent {
  kind: 'pause';
  seconds: number;
}

/** A sound effect cue, placed relative to an anchor. Never advances the clock. */
export interface SoundEffectEvent {
  kind: 'sfx';
  assetId: string;
  anchor: Anchor;
  offsetSeconds: number;
}

export type ScriptEvent = DirectiveEvent | UtteranceEvent | PauseEvent | SoundEffectEvent;

export interface ParseOptions {
  /** Reject SFX tokens other than at= and offset= instead of ignoring them. */
  strict?: boolean;
}

/** Directive keys read before the timeline walk. */
export const DIRECTIVE_KEYS = {
  TITLE: 'title',
  MUSIC: 'music',
  AMBIENCE: 'ambience',
} as const;
