#!/usr/bin/env node
/**
 * Story mixer command line.
 *
 * Usage:
 *   story-mixer render --story stories/night.txt --ref Ruby=refs/ruby.wav --ref Onyx=refs/onyx.wav
 *   story-mixer render --story stories/night.txt --assets-dir assets --out-dir out --strict
 *   story-mixer generate --title "Night Walk" --seed 3 --music calm.mp3 --out stories/night.txt
 *
 * Environment:
 *   Read from .env (see .env.example). Flags win over environment values.
 */

import { loadEnv } from '../config/env';
loadEnv();

import fs from 'fs';
import path from 'path';
import { logger } from '../config/logger';
import { loadProducerConfig, loadVoicegenConfig, parseSpeakerRefs } from '../config/render.config';
import { USAGE, parseCliArgs, type GenerateCommand, type RenderCommand } from '../cli/cli-args';
import { createRenderOrchestrator } from '../services/render.orchestrator';
import { generateStoryScript } from '../services/script/story-generator.service';
import { errorMessage } from '../utils/errors';

async function runRender(args: RenderCommand): Promise<void> {
  const scriptText = await fs.promises.readFile(args.story, 'utf8');

  const config = loadProducerConfig({
    assetsDir: args.assetsDir,
    outDir: args.outDir,
    speakerRefs: parseSpeakerRefs(args.refs),
  });
  const voicegen = loadVoicegenConfig({ executable: args.voicegen, device: args.device });

  const result = await createRenderOrchestrator(voicegen).render(scriptText, config, { strict: args.strict });
  logger.info(`Rendered ${result.durationSeconds.toFixed(2)}s of narration`, { renderId: result.renderId });
  console.log(result.outputPath);
}

async function runGenerate(args: GenerateCommand): Promise<void> {
  const script = generateStoryScript({
    title: args.title,
    seed: args.seed,
    narrator: args.narrator,
    musicAsset: args.music,
    ambienceAsset: args.ambience,
  });

  if (!args.out) {
    process.stdout.write(script);
    return;
  }

  await fs.promises.mkdir(path.dirname(path.resolve(args.out)), { recursive: true });
  await fs.promises.writeFile(args.out, script, 'utf8');
  console.log(path.resolve(args.out));
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.command) {
    case 'render':
      await runRender(command);
      break;
    case 'generate':
      await runGenerate(command);
      break;
    case 'help':
      console.log(USAGE);
      break;
  }
}

main().catch((err: unknown) => {
  const name = err instanceof Error ? err.name : 'Error';
  console.error(`${name}: ${errorMessage(err)}`);
  process.exit(1);
});
