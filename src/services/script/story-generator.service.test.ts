import { describe, expect, it } from 'vitest';
import { STORY_SFX, generateStoryScript } from './story-generator.service';
import { countUtterances, getDirective, parseScript } from './script-parser.service';

describe('generateStoryScript', () => {
  it('produces a script the parser accepts', () => {
    const script = generateStoryScript({ title: 'Night Walk', seed: 3 });
    const events = parseScript(script, { strict: true });

    expect(getDirective(events, 'title')).toBe('Night Walk');
    expect(getDirective(events, 'lang')).toBe('en');
    expect(countUtterances(events)).toBe(11);
    expect(events.filter((e) => e.kind === 'pause')).toHaveLength(10);
    expect(events.flatMap((e) => (e.kind === 'sfx' ? [e.assetId] : []))).toEqual([
      STORY_SFX.CHIME,
      STORY_SFX.CLICK,
      STORY_SFX.WIND,
      STORY_SFX.MELODY,
    ]);
  });

  it('anchors every cue to the end of the line before it', () => {
    const events = parseScript(generateStoryScript({ title: 'T' }));

    for (const event of events) {
      if (event.kind === 'sfx') {
        expect(event.anchor).toBe('last_end');
        expect(event.offsetSeconds).toBe(0);
      }
    }
  });

  it('is deterministic for a seed', () => {
    expect(generateStoryScript({ title: 'T', seed: 11 })).toBe(generateStoryScript({ title: 'T', seed: 11 }));
  });

  it('uses the narrator plus two characters', () => {
    const events = parseScript(generateStoryScript({ title: 'T', narrator: 'Sage', seed: 5 }));
    const speakers = new Set(events.flatMap((e) => (e.kind === 'utterance' ? [e.speaker] : [])));

    expect(speakers.size).toBe(3);
    expect(speakers.has('Sage')).toBe(true);
  });

  it('adds beds only when given and ends with a newline', () => {
    const plain = generateStoryScript({ title: 'T' });
    expect(plain.startsWith('@title: T\n@lang: en\n\n')).toBe(true);
    expect(plain.endsWith('let the quiet keep watch.\n')).toBe(true);

    const withBeds = generateStoryScript({ title: 'T', musicAsset: 'calm.mp3', ambienceAsset: 'rain.wav' });
    expect(withBeds.startsWith('@title: T\n@lang: en\n@music: calm.mp3\n@ambience: rain.wav\n\n')).toBe(true);
  });

  it('opens with the narrator', () => {
    const [first] = parseScript(generateStoryScript({ title: 'T' })).filter((e) => e.kind === 'utterance');

    expect(first).toMatchObject({ kind: 'utterance', speaker: 'Ruby' });
  });
});
