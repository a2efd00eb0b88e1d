import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { AnnotationStore, parseEaf, silentLogger, type Logger } from '@tierline/core';
import { decodeWav } from '@tierline/media';
import { buildCliConfig } from '../lib/cli-config.js';
import { oralOutputPaths, runExportOral } from './export-oral.js';
import { oralSessionTranscript, writeRampWav } from './__testutils__/session-files.js';

const SAMPLE_RATE = 1000;

const tmpDirs: string[] = [];

afterEach(async () => {
  while (tmpDirs.length) {
    const dir = tmpDirs.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'tierline-export-oral-test-'));
  tmpDirs.push(dir);
  return dir;
}

async function createSession(dir: string, withAnnotationDir = true): Promise<string> {
  const transcriptPath = join(dir, 'session.eaf');
  await writeFile(transcriptPath, oralSessionTranscript(), 'utf8');
  await writeRampWav(join(dir, 'session.wav'), 1500, SAMPLE_RATE);
  if (withAnnotationDir) {
    const annotationDir = join(dir, 'session.wav_Annotations');
    await mkdir(annotationDir);
    await writeRampWav(join(annotationDir, '0_to_0.5_Careful.wav'), 300, SAMPLE_RATE, 2000);
    await writeRampWav(join(annotationDir, '0_to_0.5_Translation.wav'), 200, SAMPLE_RATE, 3000);
  }
  return transcriptPath;
}

function exportSettings() {
  const config = buildCliConfig({ oralExport: { sampleRate: SAMPLE_RATE } }, {});
  return { settings: config.oralExport, ffmpeg: config.ffmpeg };
}

const noRunner = vi.fn(async () => {
  throw new Error('ffmpeg should not run for clips already at the target rate');
});

describe('oralOutputPaths', () => {
  it('names outputs after the session audio', () => {
    expect(oralOutputPaths('/data/session.wav')).toEqual({
      audio: '/data/session.wav.oralAnnotations.wav',
      transcript: '/data/session.wav.oralAnnotations.wav.annotations.eaf',
    });
  });

  it('uses the prefix and output directory when given', () => {
    expect(oralOutputPaths('/data/session.wav', { outputDir: '/out', outputPrefix: 'oral' })).toEqual({
      audio: '/out/oral.wav',
      transcript: '/out/oral.eaf',
    });
  });
});

describe('runExportOral', () => {
  it('writes a merged transcript with cross-referenced tiers', async () => {
    const dir = await createTempDir();
    const transcriptPath = await createSession(dir);
    const warn = vi.fn();
    const logger: Logger = { ...silentLogger, warn };

    const result = await runExportOral({
      transcriptPath,
      ...exportSettings(),
      logger,
      runner: noRunner,
      date: new Date(2024, 4, 1, 12, 0, 0),
    });

    expect(result).toEqual({
      sessionAudioPath: join(dir, 'session.wav'),
      transcriptOutputPath: join(dir, 'session.wav.oralAnnotations.wav.annotations.eaf'),
      utterances: 2,
      durationMs: 1500,
    });
    expect(warn).toHaveBeenCalledWith(
      '[W003] No oral annotation clips for segment 1 (1_to_1.5_Careful.wav, 1_to_1.5_Translation.wav).',
    );

    const written = await readFile(result.transcriptOutputPath, 'utf8');
    const store = new AnnotationStore(parseEaf(written));
    const values = (tier: string) => store.annotationsOf(tier).map((span) => span.value);
    expect(values('Original')).toEqual(['one', '[name]Placeholder[/name] two']);
    expect(values('Original-ID')).toEqual(['0', '1']);
    expect(values('Original-Source')).toEqual(['src-1', '']);
    expect(values('Repetition')).toEqual(['one again']);
    expect(values('Translation')).toEqual(['first']);
    expect(store.annotationsOf('Translation')[0]).toMatchObject({ start: 800, end: 1000 });
    expect(store.mediaDescriptors()[0]?.relativeMediaUrl).toBe('./session.wav.oralAnnotations.wav');
    expect(noRunner).not.toHaveBeenCalled();
    expect(await readdir(dir)).not.toContain('session.wav.oralAnnotations.wav');
  });

  it('writes three-channel audio that silences redacted clips', async () => {
    const dir = await createTempDir();
    const transcriptPath = await createSession(dir);

    const result = await runExportOral({
      transcriptPath,
      ...exportSettings(),
      logger: silentLogger,
      runner: noRunner,
      generateAudio: true,
      anonymize: true,
      outputDir: join(dir, 'out'),
      outputPrefix: 'oral',
    });

    expect(result.audioOutputPath).toBe(join(dir, 'out', 'oral.wav'));
    expect(result.transcriptOutputPath).toBe(join(dir, 'out', 'oral.eaf'));

    const audio = decodeWav(await readFile(join(dir, 'out', 'oral.wav')));
    expect(audio.channels).toBe(3);
    expect(audio.sampleRate).toBe(SAMPLE_RATE);
    expect(audio.samples.length).toBe(1500 * 3);

    const frame = (index: number) => Array.from(audio.samples.slice(index * 3, index * 3 + 3));
    expect(frame(0)).toEqual([1, 0, 0]);
    expect(frame(499)).toEqual([500, 0, 0]);
    expect(frame(500)).toEqual([0, 2000, 0]);
    expect(frame(800)).toEqual([0, 0, 3000]);
    expect(frame(1000)).toEqual([0, 0, 0]);

    const store = new AnnotationStore(parseEaf(await readFile(result.transcriptOutputPath, 'utf8')));
    expect(store.annotationsOf('Original').map((span) => span.value)).toEqual(['one', '(NAME) two']);
  });

  it('fails without the oral annotation directory and writes nothing', async () => {
    const dir = await createTempDir();
    const transcriptPath = await createSession(dir, false);

    await expect(
      runExportOral({ transcriptPath, ...exportSettings(), logger: silentLogger, runner: noRunner }),
    ).rejects.toMatchObject({ code: 'I002' });
    expect((await readdir(dir)).sort()).toEqual(['session.eaf', 'session.wav']);
  });

  it('fails when the session audio cannot be found', async () => {
    const dir = await createTempDir();
    const transcriptPath = join(dir, 'session.eaf');
    await writeFile(transcriptPath, oralSessionTranscript(), 'utf8');

    await expect(
      runExportOral({ transcriptPath, ...exportSettings(), logger: silentLogger, runner: noRunner }),
    ).rejects.toMatchObject({ code: 'I001' });
  });
});
