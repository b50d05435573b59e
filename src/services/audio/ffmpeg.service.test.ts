import { beforeEach, describe, expect, it, vi } from 'vitest';

type Handler = (arg?: unknown) => void;

const ffmpegMock = vi.hoisted(() => {
  class FakeCommand {
    readonly inputs: string[] = [];
    readonly calls: [string, ...unknown[]][] = [];
    readonly handlers = new Map<string, Handler>();

    input(source: string): this {
      this.inputs.push(source);
      return this;
    }
    inputFormat(format: string): this {
      this.calls.push(['inputFormat', format]);
      return this;
    }
    duration(seconds: number): this {
      this.calls.push(['duration', seconds]);
      return this;
    }
    complexFilter(filters: string[], outputs: string): this {
      this.calls.push(['complexFilter', filters, outputs]);
      return this;
    }
    audioCodec(codec: string): this {
      this.calls.push(['audioCodec', codec]);
      return this;
    }
    audioBitrate(bitrate: string): this {
      this.calls.push(['audioBitrate', bitrate]);
      return this;
    }
    format(format: string): this {
      this.calls.push(['format', format]);
      return this;
    }
    output(target: string): this {
      this.calls.push(['output', target]);
      return this;
    }
    on(event: string, handler: Handler): this {
      this.handlers.set(event, handler);
      return this;
    }
    run(): void {
      this.handlers.get('start')?.('ffmpeg -i ...');
      if (state.failWith) {
        this.handlers.get('error')?.(new Error(state.failWith));
      } else {
        this.handlers.get('end')?.();
      }
    }
  }

  const state: { failWith?: string; commands: FakeCommand[] } = { commands: [] };
  const factory = vi.fn(() => {
    const command = new FakeCommand();
    state.commands.push(command);
    return command;
  });
  const ffprobe = vi.fn();
  return { state, factory, ffprobe };
});

vi.mock('fluent-ffmpeg', () => ({
  default: Object.assign(ffmpegMock.factory, { ffprobe: ffmpegMock.ffprobe }),
}));

import { FFmpegService } from './ffmpeg.service';
import { ExternalToolError } from '../../utils/errors';
import type { MixGraph } from '../../types/mix.types';

describe('FFmpegService', () => {
  const service = new FFmpegService();

  beforeEach(() => {
    ffmpegMock.state.failWith = undefined;
    ffmpegMock.state.commands.length = 0;
    ffmpegMock.ffprobe.mockReset();
  });

  describe('getAudioDuration', () => {
    it('returns the probed duration', async () => {
      ffmpegMock.ffprobe.mockImplementation((_file: string, cb: (err: unknown, data: unknown) => void) =>
        cb(null, { format: { duration: 1.75 } })
      );

      await expect(service.getAudioDuration('/w/seg.wav')).resolves.toBe(1.75);
      expect(ffmpegMock.ffprobe).toHaveBeenCalledWith('/w/seg.wav', expect.any(Function));
    });

    it('rejects when ffprobe reports no duration', async () => {
      ffmpegMock.ffprobe.mockImplementation((_file: string, cb: (err: unknown, data: unknown) => void) =>
        cb(null, { format: {} })
      );

      await expect(service.getAudioDuration('/w/seg.wav')).rejects.toThrowError(
        'probe failed: ffprobe reported no duration for /w/seg.wav'
      );
    });

    it('wraps ffprobe errors', async () => {
      ffmpegMock.ffprobe.mockImplementation((_file: string, cb: (err: unknown, data: unknown) => void) =>
        cb(new Error('Invalid data found'), undefined)
      );

      await expect(service.getAudioDuration('/w/bad.wav')).rejects.toBeInstanceOf(ExternalToolError);
    });
  });

  describe('generateSilence', () => {
    it('renders anullsrc for the requested length', async () => {
      await expect(
        service.generateSilence({ seconds: 0.5, sampleRate: 48000, channelLayout: 'mono', outputPath: '/w/sil.wav' })
      ).resolves.toBe('/w/sil.wav');

      const [command] = ffmpegMock.state.commands;
      expect(command.inputs).toEqual(['anullsrc=r=48000:cl=mono']);
      expect(command.calls).toEqual([
        ['inputFormat', 'lavfi'],
        ['duration', 0.5],
        ['audioCodec', 'pcm_s16le'],
        ['output', '/w/sil.wav'],
      ]);
    });

    it('rejects with the tool name when ffmpeg fails', async () => {
      ffmpegMock.state.failWith = 'lavfi unavailable';

      await expect(
        service.generateSilence({ seconds: 1, sampleRate: 48000, channelLayout: 'mono', outputPath: '/w/sil.wav' })
      ).rejects.toThrowError('silence failed: Failed to generate 1s of silence: lavfi unavailable');
    });
  });

  describe('runMix', () => {
    const graph: MixGraph = {
      inputs: ['/w/seg_0001_A.wav', '/assets/sfx/chime.wav'],
      filters: ['[0:a]aformat=channel_layouts=mono,aresample=48000[seg0]', '[seg0]concat=n=1:v=0:a=1,volume=0dB[narr]'],
      outputLabel: 'mix',
      output: { fileName: 'T.mp3', format: 'mp3', codec: 'libmp3lame', bitrate: '160k' },
      durationSeconds: 1,
    };

    it('runs the whole graph as one command', async () => {
      await expect(service.runMix(graph, '/w/T.mp3')).resolves.toBe('/w/T.mp3');

      expect(ffmpegMock.state.commands).toHaveLength(1);
      const [command] = ffmpegMock.state.commands;
      expect(command.inputs).toEqual(graph.inputs);
      expect(command.calls).toEqual([
        ['complexFilter', graph.filters, 'mix'],
        ['audioCodec', 'libmp3lame'],
        ['audioBitrate', '160k'],
        ['format', 'mp3'],
        ['output', '/w/T.mp3'],
      ]);
    });

    it('rejects with an ExternalToolError when the mix fails', async () => {
      ffmpegMock.state.failWith = 'Conversion failed!';

      const error = await service.runMix(graph, '/w/T.mp3').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExternalToolError);
      if (error instanceof ExternalToolError) {
        expect(error.tool).toBe('mix');
        expect(error.message).toBe('mix failed: Mixing failed: Conversion failed!');
      }
    });
  });
});
