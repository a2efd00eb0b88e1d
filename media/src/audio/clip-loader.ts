import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createInputError,
  createLogger,
  describeError,
  InputErrorCode,
  isTierlineError,
  MediaErrorCode,
  type Logger,
} from '@tierline/core';
import { createFfmpegRunner, type FfmpegRunner } from '../ffmpeg/runner.js';
import { decodeWav, type PcmAudio } from './wav.js';

export interface ClipLoaderOptions {
  /** Sample rate every loaded clip is brought to */
  sampleRate: number;
  runner?: FfmpegRunner;
  logger?: Logger;
  tempRoot?: string;
}

function isTargetFormat(audio: PcmAudio, sampleRate: number): boolean {
  return audio.channels === 1 && audio.sampleRate === sampleRate;
}

/**
 * Load a clip as mono 16-bit PCM at the target sample rate. Files already in
 * that format are decoded directly; anything else goes through ffmpeg first.
 */
export async function loadMonoClip(path: string, options: ClipLoaderOptions): Promise<PcmAudio> {
  const logger = options.logger ?? createLogger();

  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (error) {
    throw createInputError(InputErrorCode.MISSING_MEDIA, `Cannot read audio file: ${describeError(error)}`, {
      filePath: path,
      cause: error,
    });
  }

  try {
    const audio = decodeWav(buffer);
    if (isTargetFormat(audio, options.sampleRate)) {
      return audio;
    }
  } catch (error) {
    const convertible =
      isTierlineError(error) &&
      (error.code === MediaErrorCode.UNSUPPORTED_AUDIO_FORMAT || error.code === MediaErrorCode.INVALID_WAV);
    if (!convertible) {
      throw error;
    }
  }

  logger.debug('media.normalize', { path, sampleRate: options.sampleRate });
  return normalizeClip(path, options, logger);
}

async function normalizeClip(
  path: string,
  options: ClipLoaderOptions,
  logger: Logger,
): Promise<PcmAudio> {
  const runner = options.runner ?? createFfmpegRunner({ logger });
  const tempDir = join(options.tempRoot ?? tmpdir(), `tierline-clip-${randomUUID()}`);

  try {
    await mkdir(tempDir, { recursive: true });
    const outputPath = join(tempDir, 'clip.wav');
    await runner([
      '-y',
      '-v', '0',
      '-i', path,
      '-ac', '1',
      '-ar', String(options.sampleRate),
      '-c:a', 'pcm_s16le',
      outputPath,
    ]);
    return decodeWav(await readFile(outputPath));
  } finally {
    await rm(tempDir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn(`Could not remove temporary directory ${tempDir}: ${describeError(error)}`);
    });
  }
}
