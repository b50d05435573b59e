// ===========================================================================
// Script Parser
//
// Line-oriented grammar, one event per meaningful line:
//
//   # comment                      -> skipped (blank lines too)
//   @title: The Lantern Shop       -> directive
//   PAUSE: 0.5                     -> pause (seconds)
//   SFX: chime at=last_end offset=0.2
//                                  -> sound effect cue
//   Ruby: Once upon a time...      -> utterance
//
// Parsing is pure and fails on the first malformed line; no partial event
// list is ever returned.
// ===========================================================================

import { AnchorError, ParseError } from '../../utils/errors';
import {
  ANCHORS,
  DEFAULT_ANCHOR,
  type Anchor,
  type ParseOptions,
  type ScriptEvent,
  type SoundEffectEvent,
} from '../../types/script.types';

const PAUSE_PREFIX = 'PAUSE:';
const SFX_PREFIX = 'SFX:';

/** Decimal or scientific notation; no hex, no inf/nan. */
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseFloatStrict(raw: string): number | null {
  const value = raw.trim();
  if (!FLOAT_PATTERN.test(value)) return null;
  return Number(value);
}

function isAnchor(value: string): value is Anchor {
  return (ANCHORS as readonly string[]).includes(value);
}

/** Text after the first ':' of a line known to contain one. */
function afterColon(line: string): string {
  return line.slice(line.indexOf(':') + 1);
}

function parseSoundEffect(
  line: string,
  lineNumber: number,
  raw: string,
  options: ParseOptions
): SoundEffectEvent {
  const tokens = afterColon(line).trim().split(/\s+/).filter(Boolean);
  const [assetId, ...params] = tokens;
  if (!assetId) {
    throw new ParseError(lineNumber, raw, 'SFX missing asset id');
  }

  let anchor: Anchor = DEFAULT_ANCHOR;
  let offsetSeconds = 0;

  for (const token of params) {
    if (token.startsWith('at=')) {
      const value = token.slice('at='.length).toLowerCase();
      if (!isAnchor(value)) {
        throw new AnchorError(token.slice('at='.length), lineNumber);
      }
      anchor = value;
    } else if (token.startsWith('offset=')) {
      const value = parseFloatStrict(token.slice('offset='.length));
      if (value === null) {
        throw new ParseError(lineNumber, raw, `SFX offset is not a number`);
      }
      offsetSeconds = value;
    } else if (options.strict) {
      throw new ParseError(lineNumber, raw, `unknown SFX parameter "${token}"`);
    }
  }

  return { kind: 'sfx', assetId, anchor, offsetSeconds };
}

/**
 * Parse script text into an ordered list of events.
 * Throws ParseError (or AnchorError for a bad `at=` value) on the first bad line.
 */
export function parseScript(text: string, options: ParseOptions = {}): ScriptEvent[] {
  const events: ScriptEvent[] = [];
  const lines = text.split(/\r\n|\r|\n/);

  lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();

    if (!line || line.startsWith('#')) return;

    if (line.startsWith('@')) {
      if (!line.includes(':')) {
        throw new ParseError(lineNumber, raw, `directive missing ':'`);
      }
      const body = line.slice(1);
      const colon = body.indexOf(':');
      events.push({
        kind: 'directive',
        key: body.slice(0, colon).trim(),
        value: body.slice(colon + 1).trim(),
      });
      return;
    }

    const upper = line.toUpperCase();

    if (upper.startsWith(PAUSE_PREFIX)) {
      const seconds = parseFloatStrict(afterColon(line));
      if (seconds === null) {
        throw new ParseError(lineNumber, raw, 'PAUSE value is not a number');
      }
      if (seconds < 0) {
        throw new ParseError(lineNumber, raw, 'PAUSE value must not be negative');
      }
      events.push({ kind: 'pause', seconds });
      return;
    }

    if (upper.startsWith(SFX_PREFIX)) {
      events.push(parseSoundEffect(line, lineNumber, raw, options));
      return;
    }

    if (line.includes(':')) {
      const colon = line.indexOf(':');
      const speaker = line.slice(0, colon).trim();
      const spoken = line.slice(colon + 1).trim();
      if (!speaker || !spoken) {
        throw new ParseError(lineNumber, raw, 'bad utterance');
      }
      events.push({ kind: 'utterance', speaker, text: spoken });
      return;
    }

    throw new ParseError(lineNumber, raw, 'unrecognized line');
  });

  return events;
}

/** Value of the first directive whose key matches case-insensitively, or undefined. */
export function getDirective(events: readonly ScriptEvent[], key: string): string | undefined {
  const wanted = key.toLowerCase();
  for (const event of events) {
    if (event.kind === 'directive' && event.key.toLowerCase() === wanted) {
      return event.value;
    }
  }
  return undefined;
}

export function countUtterances(events: readonly ScriptEvent[]): number {
  return events.filter((e) => e.kind === 'utterance').length;
}
