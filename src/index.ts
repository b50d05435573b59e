export { parseScript, getDirective, countUtterances } from './services/script/script-parser.service';
export { generateStoryScript, type StoryOptions } from './services/script/story-generator.service';
export { TimelineBuilder, type TimelineTools } from './services/audio/timeline-builder.service';
export { compileMixGraph } from './services/audio/mix-graph.compiler';
export { placeCue, anchorTime, START_CLOCK, type TimelineClock } from './services/audio/timeline-clock';
export {
  RenderOrchestrator,
  createRenderOrchestrator,
  type RenderResult,
  type RenderTools,
} from './services/render.orchestrator';
export { FFmpegService } from './services/audio/ffmpeg.service';
export { FileAssetResolver } from './services/assets/file-asset-resolver';
export { CommandVoiceSynthesizer } from './services/tts/command-voice-synthesizer';
export { loadProducerConfig, loadVoicegenConfig, parseSpeakerRefs } from './config/render.config';
export { createRenderProcessor, RenderJobDataSchema, type RenderJobData, type RenderJobResult } from './jobs/render.processor';
export * from './utils/errors';
export * from './types/script.types';
export * from './types/timeline.types';
export * from './types/mix.types';
export * from './types/producer.types';
export type { AudioProbe, SilenceGenerator, MixingEngine, SilenceOptions } from './services/audio/audio-tools.interface';
export type { VoiceSynthesizer, SynthesisRequest } from './services/tts/voice-synthesizer.interface';
export type { AssetResolver } from './services/assets/asset-resolver.interface';
