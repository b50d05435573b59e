/** Speech synthesis request for one narration line. */
export interface SynthesisRequest {
  /** Voice reference (e.g. a reference wav for voice cloning) */
  voiceReference: string;
  text: string;
  /** Where the synthesized audio must be written */
  outputPath: string;
}

/**
 * Interface every voice backend implements.
 * Failures reject; there is no fallback voice.
 */
export interface VoiceSynthesizer {
  synthesize(request: SynthesisRequest): Promise<string>;
}
