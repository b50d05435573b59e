import { ConfigurationError } from '../utils/errors';
import { parseSpeakerRefs } from '../config/render.config';
import type { RenderJobData } from '../jobs/render.processor';

export interface RenderCommand {
  command: 'render';
  story: string;
  assetsDir?: string;
  outDir?: string;
  voicegen?: string;
  device?: string;
  /** Raw `SPEAKER=PATH` values, in the order given */
  refs: string[];
  strict: boolean;
}

export interface GenerateCommand {
  command: 'generate';
  title: string;
  seed?: number;
  narrator?: string;
  music?: string;
  ambience?: string;
  /** Write here instead of stdout */
  out?: string;
}

/** A render handed to the queue. Voice settings live on the worker, so only job fields are accepted. */
export interface EnqueueCommand {
  command: 'enqueue';
  story: string;
  assetsDir?: string;
  outDir?: string;
  refs: string[];
  strict: boolean;
}

export interface HelpCommand {
  command: 'help';
}

export type CliCommand = RenderCommand | GenerateCommand | HelpCommand;

export const USAGE = `Usage:
  story-mixer render --story <file> [--assets-dir DIR] [--out-dir DIR]
                     [--voicegen PATH] [--device NAME] [--ref SPEAKER=PATH]... [--strict]
  story-mixer generate --title TITLE [--seed N] [--narrator NAME]
                       [--music ID] [--ambience ID] [--out FILE]

Environment:
  STORY_ASSETS_DIR, STORY_OUT_DIR, VOICE_REFS, VOICEGEN_PATH, VOICEGEN_DEVICE,
  NARRATION_GAIN_DB, MUSIC_GAIN_DB, AMBIENCE_GAIN_DB, LOG_LEVEL`;

const RENDER_VALUE_FLAGS = ['--story', '--assets-dir', '--out-dir', '--voicegen', '--device', '--ref'] as const;
const GENERATE_VALUE_FLAGS = ['--title', '--seed', '--narrator', '--music', '--ambience', '--out'] as const;

const ENQUEUE_VALUE_FLAGS = ['--story', '--assets-dir', '--out-dir', '--ref'] as const;

/** Render flags the worker reads from its own environment */
const WORKER_ONLY_FLAGS: Record<string, string> = {
  '--voicegen': 'VOICEGEN_PATH',
  '--device': 'VOICEGEN_DEVICE',
};

type RenderFlag = (typeof RENDER_VALUE_FLAGS)[number];
type EnqueueFlag = (typeof ENQUEUE_VALUE_FLAGS)[number];
type GenerateFlag = (typeof GENERATE_VALUE_FLAGS)[number];

/**
 * Collect `--flag value` pairs. Repeated flags keep every value; boolean
 * flags are returned separately.
 */
function collectFlags<F extends string>(
  args: readonly string[],
  valueFlags: readonly F[],
  booleanFlags: readonly string[] = []
): { values: Map<F, string[]>; switches: Set<string> } {
  const values = new Map<F, string[]>();
  const switches = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (booleanFlags.includes(arg)) {
      switches.add(arg);
      continue;
    }
    const flag = valueFlags.find((f) => f === arg);
    if (!flag) {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`${flag} requires a value`);
    }
    values.set(flag, [...(values.get(flag) ?? []), value]);
    i += 1;
  }

  return { values, switches };
}

function last<F>(values: Map<F, string[]>, flag: F): string | undefined {
  const all = values.get(flag);
  return all ? all[all.length - 1] : undefined;
}

function parseRender(args: readonly string[]): RenderCommand {
  const { values, switches } = collectFlags<RenderFlag>(args, RENDER_VALUE_FLAGS, ['--strict']);
  const story = last(values, '--story');
  if (!story) {
    throw new ConfigurationError('render requires --story <file>');
  }
  return {
    command: 'render',
    story,
    assetsDir: last(values, '--assets-dir'),
    outDir: last(values, '--out-dir'),
    voicegen: last(values, '--voicegen'),
    device: last(values, '--device'),
    refs: values.get('--ref') ?? [],
    strict: switches.has('--strict'),
  };
}

function parseGenerate(args: readonly string[]): GenerateCommand {
  const { values } = collectFlags<GenerateFlag>(args, GENERATE_VALUE_FLAGS);
  const title = last(values, '--title');
  if (!title) {
    throw new ConfigurationError('generate requires --title <title>');
  }

  const rawSeed = last(values, '--seed');
  let seed: number | undefined;
  if (rawSeed !== undefined) {
    seed = Number(rawSeed);
    if (!Number.isInteger(seed)) {
      throw new ConfigurationError(`--seed expects an integer, got: ${rawSeed}`);
    }
  }

  return {
    command: 'generate',
    title,
    seed,
    narrator: last(values, '--narrator'),
    music: last(values, '--music'),
    ambience: last(values, '--ambience'),
    out: last(values, '--out'),
  };
}

/** Parse the arguments of `enqueue-render`: the render flags a queued job can carry. */
export function parseEnqueueArgs(argv: readonly string[]): EnqueueCommand {
  const workerOnly = argv.find((arg) => Object.hasOwn(WORKER_ONLY_FLAGS, arg));
  if (workerOnly) {
    throw new ConfigurationError(
      `${workerOnly} cannot be set per job; set ${WORKER_ONLY_FLAGS[workerOnly]} in the worker's environment`
    );
  }

  const { values, switches } = collectFlags<EnqueueFlag>(argv, ENQUEUE_VALUE_FLAGS, ['--strict']);
  const story = last(values, '--story');
  if (!story) {
    throw new ConfigurationError('enqueue-render requires --story <file>');
  }
  return {
    command: 'enqueue',
    story,
    assetsDir: last(values, '--assets-dir'),
    outDir: last(values, '--out-dir'),
    refs: values.get('--ref') ?? [],
    strict: switches.has('--strict'),
  };
}

/** Job payload for a queued render of `script`. */
export function toRenderJobData(command: EnqueueCommand, script: string): RenderJobData {
  return {
    script,
    speakerRefs: parseSpeakerRefs(command.refs),
    assetsDir: command.assetsDir,
    outDir: command.outDir,
    strict: command.strict,
  };
}

/** Parse `process.argv.slice(2)`. */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  switch (command) {
    case 'render':
      return parseRender(rest);
    case 'generate':
      return parseGenerate(rest);
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' };
    default:
      throw new ConfigurationError(`Unknown command: ${command}`);
  }
}
