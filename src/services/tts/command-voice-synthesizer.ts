import fs from 'fs';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../../config/logger';
import { ExternalToolError, errorMessage } from '../../utils/errors';
import type { VoicegenConfig } from '../../types/producer.types';
import type { SynthesisRequest, VoiceSynthesizer } from './voice-synthesizer.interface';

const execFileAsync = promisify(execFile);

/** Voice-cloning runs print a lot of progress output */
const MAX_OUTPUT_BUFFER = 10 * 1024 * 1024;

// ===========================================================================
// Command Voice Synthesizer
//
// Wraps a voice-generation executable (e.g. an XTTS container script)
// behind the VoiceSynthesizer interface:
//
//   <executable> --text "<line>" --ref <reference.wav> --out <segment.wav> --device cuda
//
// Arguments are passed without a shell, so narration text needs no quoting.
// ===========================================================================

export function buildVoicegenArgs(request: SynthesisRequest, device: string): string[] {
  return ['--text', request.text, '--ref', request.voiceReference, '--out', request.outputPath, '--device', device];
}

export class CommandVoiceSynthesizer implements VoiceSynthesizer {
  constructor(private readonly config: VoicegenConfig) {}

  async synthesize(request: SynthesisRequest): Promise<string> {
    const args = buildVoicegenArgs(request, this.config.device);
    logger.info(`Voice synthesis: ref=${request.voiceReference}, text=${request.text.length} chars`);

    try {
      await execFileAsync(this.config.executable, args, { maxBuffer: MAX_OUTPUT_BUFFER });
    } catch (err) {
      throw new ExternalToolError('voice', `${this.config.executable} failed: ${errorMessage(err)}`, err);
    }

    if (!fs.existsSync(request.outputPath)) {
      throw new ExternalToolError('voice', `${this.config.executable} exited cleanly but wrote no audio to ${request.outputPath}`);
    }
    return request.outputPath;
  }
}
