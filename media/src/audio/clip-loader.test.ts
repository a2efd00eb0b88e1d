import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { silentLogger } from '@tierline/core';
import { loadMonoClip } from './clip-loader.js';
import { encodeWav } from './wav.js';

describe('loadMonoClip', () => {
  let workDir: string;
  let tempRoot: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'tierline-clips-'));
    tempRoot = await mkdtemp(join(tmpdir(), 'tierline-clips-temp-'));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
    await rm(tempRoot, { recursive: true, force: true });
  });

  it('decodes clips already in the target format without ffmpeg', async () => {
    const path = join(workDir, 'clip.wav');
    await writeFile(path, encodeWav({ sampleRate: 16000, channels: 1, samples: Int16Array.from([1, 2]) }));
    const runner = vi.fn(async () => {});

    const audio = await loadMonoClip(path, { sampleRate: 16000, runner, logger: silentLogger });

    expect(Array.from(audio.samples)).toEqual([1, 2]);
    expect(runner).not.toHaveBeenCalled();
  });

  it('normalizes other formats through ffmpeg', async () => {
    const path = join(workDir, 'stereo.wav');
    await writeFile(path, encodeWav({ sampleRate: 44100, channels: 2, samples: Int16Array.from([1, 1]) }));
    const runner = vi.fn(async (args: readonly string[]) => {
      const outputPath = args[args.length - 1] ?? '';
      await writeFile(
        outputPath,
        encodeWav({ sampleRate: 16000, channels: 1, samples: Int16Array.from([7]) }),
      );
    });

    const audio = await loadMonoClip(path, { sampleRate: 16000, runner, logger: silentLogger, tempRoot });

    expect(Array.from(audio.samples)).toEqual([7]);
    expect(runner.mock.calls[0]?.[0].slice(0, 10)).toEqual([
      '-y', '-v', '0',
      '-i', path,
      '-ac', '1',
      '-ar', '16000',
      '-c:a',
    ]);
    expect(await readdir(tempRoot)).toEqual([]);
  });

  it('reports unreadable clips as missing media', async () => {
    await expect(
      loadMonoClip(join(workDir, 'absent.wav'), { sampleRate: 16000, logger: silentLogger }),
    ).rejects.toMatchObject({ code: 'I001' });
  });
});
