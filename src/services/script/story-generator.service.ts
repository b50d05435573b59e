// ===========================================================================
// Story Generator
//
// Deterministic bedtime-story scripts for trying out the renderer without
// writing one by hand. No language model involved: a fixed
// intro -> three beats -> outro shape with a seeded choice of setting,
// object and cast, and SFX cues at each beat.
// ===========================================================================

import { SeededRandom } from '../../utils/seeded-random';

export interface StoryOptions {
  title: string;
  /** Same seed, same story */
  seed?: number;
  /** Speaker used for the narration lines */
  narrator?: string;
  musicAsset?: string;
  ambienceAsset?: string;
}

const PLACES = [
  'a quiet lantern shop',
  'a sleepy library',
  'a warm kitchen at night',
  'a moonlit garden',
  'a tiny train station',
] as const;

const OBJECTS = [
  'a pocket watch',
  'a paper umbrella',
  'a small music box',
  'a wind-up bird',
  'a map with silver ink',
] as const;

const FEMALE_NAMES = ['Pearl', 'Violet', 'Opal', 'Iris', 'Jade', 'Rose', 'Amber'] as const;
const MALE_NAMES = ['Onyx', 'Slate', 'Moss', 'Copper', 'Ember'] as const;

export const STORY_SFX = {
  CHIME: 'sfx_soft_chime',
  CLICK: 'sfx_soft_click',
  WIND: 'sfx_gentle_wind',
  MELODY: 'sfx_musicbox_three_notes',
} as const;

export const DEFAULT_NARRATOR = 'Ruby';

/** "a pocket watch" -> "pocket watch" */
function withoutArticle(phrase: string): string {
  return phrase.replace(/^(a|an) /, '');
}

function cue(assetId: string): string {
  return `SFX: ${assetId} at=last_end offset=0.0`;
}

function pause(seconds: string): string {
  return `PAUSE: ${seconds}`;
}

export function generateStoryScript(options: StoryOptions): string {
  const rng = new SeededRandom(options.seed ?? 0);
  const narrator = options.narrator || DEFAULT_NARRATOR;

  const place = rng.pick(PLACES);
  const object = rng.pick(OBJECTS);
  const heroine = rng.pick(FEMALE_NAMES);
  const hero = rng.pick(MALE_NAMES);

  const theObject = `the ${withoutArticle(object)}`;
  const say = (speaker: string, text: string) => `${speaker}: ${text}`;

  const lines: string[] = [`@title: ${options.title}`, '@lang: en'];
  if (options.musicAsset) lines.push(`@music: ${options.musicAsset}`);
  if (options.ambienceAsset) lines.push(`@ambience: ${options.ambienceAsset}`);
  lines.push('');

  // Intro
  lines.push(
    say(narrator, `Tonight, we visit ${place}, where everything is soft and unhurried.`),
    pause('0.35'),
    say(narrator, `On the counter rests ${object}. It seems ordinary, until it makes the faintest, friendliest sound.`),
    cue(STORY_SFX.CHIME),
    pause('0.35'),
    say(heroine, 'Hello? I thought I heard something.'),
    pause('0.25'),
    say(hero, 'Me too. But it sounds... polite.'),
    pause('0.35')
  );

  // Beat 1
  lines.push(
    say(narrator, `Together, they lean closer. ${capitalize(theObject)} clicks once, as if asking permission.`),
    cue(STORY_SFX.CLICK),
    pause('0.30'),
    say(heroine, "You can help us fall asleep, can't you?"),
    pause('0.25')
  );

  // Beat 2
  lines.push(
    say(narrator, 'A gentle breeze moves through the room, though no windows are open.'),
    cue(STORY_SFX.WIND),
    pause('0.35'),
    say(hero, "If you tell us a story, we'll listen quietly."),
    pause('0.25')
  );

  // Beat 3
  lines.push(
    say(
      narrator,
      `${capitalize(theObject)} answers with a tiny melody, three notes and then a pause, like a lullaby learning your name.`
    ),
    cue(STORY_SFX.MELODY),
    pause('0.45')
  );

  // Outro
  lines.push(
    say(
      narrator,
      `And as the last note fades, the whole ${withoutArticle(place)} feels lighter. Breathing becomes easy. Eyes grow heavy.`
    ),
    pause('0.45'),
    say(narrator, 'Goodnight. Sleep deeply, and let the quiet keep watch.')
  );

  return `${lines.join('\n')}\n`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
