import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RenderOrchestrator } from './render.orchestrator';
import { createFakeTools, makeTempDir, type FakeToolOptions } from '../test-utils/fake-tools';
import { EmptyDocumentError, ExternalToolError, ParseError } from '../utils/errors';
import type { ProducerConfig } from '../types/producer.types';
import type { MixGraph } from '../types/mix.types';

const SCRIPT = '@title: T\nA: Hello\nPAUSE: 0.5\nSFX: chime at=last_end offset=0.0\nB: Bye\n';

describe('RenderOrchestrator', () => {
  let outDir: string;
  let config: ProducerConfig;

  beforeEach(async () => {
    outDir = await makeTempDir('render-out');
    config = {
      assetsDir: '/assets',
      outDir,
      speakerRefs: { A: '/refs/a.wav', B: '/refs/b.wav' },
      narrationGainDb: 0,
      musicGainDb: -18,
      ambienceGainDb: -22,
    };
  });

  afterEach(async () => {
    await fs.promises.rm(outDir, { recursive: true, force: true });
  });

  function setup(options: FakeToolOptions = {}) {
    const fakes = createFakeTools({ assets: { chime: '/assets/sfx/chime.wav' }, ...options });
    return { ...fakes, orchestrator: new RenderOrchestrator(fakes.tools) };
  }

  it('renders a script into one file in the output directory', async () => {
    const { orchestrator, calls, graphs } = setup();

    const result = await orchestrator.render(SCRIPT, config);

    expect(result.outputPath).toBe(path.join(outDir, 'T.mp3'));
    expect(result.durationSeconds).toBe(2.5);
    expect(result.renderId).toMatch(/^[0-9a-f]{8}$/);
    expect(result.timeline.sfx[0].startTime).toBe(1.5);
    expect(calls.filter((c) => c === 'mix')).toHaveLength(1);

    const written: MixGraph = JSON.parse(await fs.promises.readFile(result.outputPath, 'utf8'));
    expect(written.filters).toEqual(graphs[0].filters);
    expect(await fs.promises.readdir(outDir)).toEqual(['T.mp3']);
  });

  it('removes the working directory after a successful render', async () => {
    const { orchestrator, workDirs } = setup();

    await orchestrator.render(SCRIPT, config);

    expect(workDirs.size).toBe(1);
    for (const dir of workDirs) {
      expect(fs.existsSync(dir)).toBe(false);
    }
  });

  it('uses a separate working directory per render', async () => {
    const { orchestrator, workDirs } = setup();

    await Promise.all([orchestrator.render(SCRIPT, config), orchestrator.render(SCRIPT, config)]);

    expect(workDirs.size).toBe(2);
  });

  it('surfaces parse errors before touching any tool', async () => {
    const { orchestrator, calls } = setup();

    await expect(orchestrator.render('A: Hello\nPAUSE: soon', config)).rejects.toBeInstanceOf(ParseError);
    expect(calls).toEqual([]);
  });

  it('rejects an empty document and writes nothing', async () => {
    const { orchestrator, calls } = setup();

    await expect(orchestrator.render('@title: Quiet\nPAUSE: 1\n', config)).rejects.toBeInstanceOf(
      EmptyDocumentError
    );
    expect(calls).toEqual([]);
    expect(await fs.promises.readdir(outDir)).toEqual([]);
  });

  it('cleans up and writes nothing when synthesis fails', async () => {
    const { orchestrator, calls, workDirs } = setup({ failVoiceOn: 'Bye' });

    await expect(orchestrator.render(SCRIPT, config)).rejects.toBeInstanceOf(ExternalToolError);

    expect(calls).not.toContain('mix');
    for (const dir of workDirs) {
      expect(fs.existsSync(dir)).toBe(false);
    }
    expect(await fs.promises.readdir(outDir)).toEqual([]);
  });

  it('leaves no partial artifact when the mix fails', async () => {
    const { orchestrator, workDirs } = setup({ failMix: true });

    await expect(orchestrator.render(SCRIPT, config)).rejects.toThrowError('mix failed: ffmpeg exited with code 1');

    for (const dir of workDirs) {
      expect(fs.existsSync(dir)).toBe(false);
    }
    expect(await fs.promises.readdir(outDir)).toEqual([]);
  });

  it('reports the render failure when the working directory cannot be removed', async () => {
    const { orchestrator, workDirs } = setup({ failVoiceOn: 'Bye' });
    const rm = vi.spyOn(fs.promises, 'rm').mockRejectedValueOnce(new Error('EBUSY: resource busy'));

    try {
      await expect(orchestrator.render(SCRIPT, config)).rejects.toThrowError(
        'voice failed: synthesis failed for "Bye"'
      );
      expect(rm).toHaveBeenCalledTimes(1);
    } finally {
      rm.mockRestore();
      for (const dir of workDirs) {
        await fs.promises.rm(dir, { recursive: true, force: true });
      }
    }
  });

  it('creates the output directory when it does not exist', async () => {
    const { orchestrator } = setup();
    const nested = path.join(outDir, 'nested', 'deeper');

    const result = await orchestrator.render(SCRIPT, { ...config, outDir: nested });

    expect(result.outputPath).toBe(path.join(nested, 'T.mp3'));
    expect(fs.existsSync(result.outputPath)).toBe(true);
  });

  it('passes strict parsing through', async () => {
    const { orchestrator } = setup();

    await expect(
      orchestrator.render('A: Hello\nSFX: chime volume=3', config, { strict: true })
    ).rejects.toThrowError('Parse error on line 2: unknown SFX parameter "volume=3" -> "SFX: chime volume=3"');
  });
});
