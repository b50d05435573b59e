// ===========================================================================
// Timeline Clock
//
// The running clock and its two anchors, advanced by pure functions so the
// builder threads one value through the walk:
//
//   utterance:  lastStart = currentTime; currentTime += duration; lastEnd = currentTime
//   pause:      currentTime += seconds;  lastEnd = currentTime   (lastStart kept)
//   sfx:        no change
// ===========================================================================

import { AnchorError } from '../../utils/errors';
import type { Anchor } from '../../types/script.types';

export interface TimelineClock {
  readonly currentTime: number;
  /** Start of the most recent utterance */
  readonly lastStart: number;
  /** End of the most recent utterance or pause */
  readonly lastEnd: number;
}

export const START_CLOCK: TimelineClock = { currentTime: 0, lastStart: 0, lastEnd: 0 };

export function advanceForUtterance(clock: TimelineClock, durationSeconds: number): TimelineClock {
  const end = clock.currentTime + durationSeconds;
  return { currentTime: end, lastStart: clock.currentTime, lastEnd: end };
}

export function advanceForPause(clock: TimelineClock, seconds: number): TimelineClock {
  const end = clock.currentTime + seconds;
  return { currentTime: end, lastStart: clock.lastStart, lastEnd: end };
}

export function anchorTime(clock: TimelineClock, anchor: Anchor): number {
  switch (anchor) {
    case 'now':
      return clock.currentTime;
    case 'last_start':
      return clock.lastStart;
    case 'last_end':
      return clock.lastEnd;
    default:
      // Events built outside the parser (e.g. queue payloads) can carry anything
      throw new AnchorError(String(anchor));
  }
}

/** Absolute cue time: anchor + offset, clamped at zero. */
export function placeCue(clock: TimelineClock, anchor: Anchor, offsetSeconds: number): number {
  return Math.max(0, anchorTime(clock, anchor) + offsetSeconds);
}
