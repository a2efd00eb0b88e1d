import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findAssociatedMedia, findLocalMedia, transcriptBaseName } from './media-discovery.js';

describe('transcriptBaseName', () => {
  it('drops only the last extension', () => {
    expect(transcriptBaseName('/data/day.1.eaf')).toBe('day.1');
  });
});

describe('media discovery', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tierline-discovery-test-'));
    for (const name of ['s.1.eaf', 's.1.wav', 's.1-b.wav', 's.1.mp4', 'sx1.wav', 'other.wav']) {
      await writeFile(join(dir, name), '');
    }
    await mkdir(join(dir, 's.1.wav_Annotations'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('anchors the pattern right after the literal basename', async () => {
    const transcript = join(dir, 's.1.eaf');

    expect(await findAssociatedMedia(transcript, '\\.wav$')).toEqual([join(dir, 's.1.wav')]);
    expect(await findAssociatedMedia(transcript, '.*\\.wav$')).toEqual([
      join(dir, 's.1-b.wav'),
      join(dir, 's.1.wav'),
    ]);
  });

  it('resolves a MEDIA_URL relative to the transcript', async () => {
    expect(await findLocalMedia(join(dir, 's.1.eaf'), { mediaUrl: 's.1.mp4' })).toBe(join(dir, 's.1.mp4'));
  });

  it('resolves a file: URL', async () => {
    const mediaUrl = pathToFileURL(join(dir, 's.1.wav')).href;
    expect(await findLocalMedia('/elsewhere/t.eaf', { mediaUrl })).toBe(join(dir, 's.1.wav'));
  });

  it('falls back to RELATIVE_MEDIA_URL, then the bare file name', async () => {
    const transcript = join(dir, 's.1.eaf');

    expect(
      await findLocalMedia(transcript, {
        mediaUrl: 'file:///moved/away/s.1.wav',
        relativeMediaUrl: './s.1.wav',
      }),
    ).toBe(join(dir, 's.1.wav'));
    expect(await findLocalMedia(transcript, { mediaUrl: 'file:///moved/away/other.wav' })).toBe(
      join(dir, 'other.wav'),
    );
  });

  it('never treats a remote URL or a directory as found', async () => {
    const transcript = join(dir, 's.1.eaf');

    expect(await findLocalMedia(transcript, { mediaUrl: 'https://example.org/missing.wav' })).toBeUndefined();
    expect(await findLocalMedia(transcript, { mediaUrl: 's.1.wav_Annotations' })).toBeUndefined();
  });
});
