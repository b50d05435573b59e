import { describe, expect, it } from 'vitest';
import { START_CLOCK, advanceForPause, advanceForUtterance, anchorTime, placeCue } from './timeline-clock';
import { AnchorError } from '../../utils/errors';

describe('timeline clock', () => {
  it('moves both anchors on an utterance', () => {
    const clock = advanceForUtterance(advanceForUtterance(START_CLOCK, 1), 2);

    expect(clock).toEqual({ currentTime: 3, lastStart: 1, lastEnd: 3 });
  });

  it('keeps lastStart on a pause', () => {
    const clock = advanceForPause(advanceForUtterance(START_CLOCK, 1), 0.5);

    expect(clock).toEqual({ currentTime: 1.5, lastStart: 0, lastEnd: 1.5 });
  });

  it('resolves each anchor', () => {
    const clock = { currentTime: 4, lastStart: 2, lastEnd: 3 };

    expect(anchorTime(clock, 'now')).toBe(4);
    expect(anchorTime(clock, 'last_start')).toBe(2);
    expect(anchorTime(clock, 'last_end')).toBe(3);
  });

  it('adds the offset and clamps at zero', () => {
    const clock = { currentTime: 4, lastStart: 2, lastEnd: 3 };

    expect(placeCue(clock, 'last_end', 0.25)).toBe(3.25);
    expect(placeCue(clock, 'last_start', -5)).toBe(0);
  });

  it('rejects an anchor outside the known set', () => {
    expect(() => anchorTime(START_CLOCK, JSON.parse('"later"'))).toThrowError(
      'Unknown SFX anchor "later" (expected now, last_start or last_end)'
    );
    expect(() => anchorTime(START_CLOCK, JSON.parse('"later"'))).toThrowError(AnchorError);
  });
});
