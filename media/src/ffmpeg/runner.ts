import { Buffer } from 'node:buffer';
import { spawn } from 'node:child_process';
import { createLogger, createMediaError, MediaErrorCode, type Logger } from '@tierline/core';

/** Runs one ffmpeg invocation to completion */
export type FfmpegRunner = (args: readonly string[]) => Promise<void>;

export interface FfmpegRunnerOptions {
  /** ffmpeg executable (default `ffmpeg` on the PATH) */
  binary?: string;
  logger?: Logger;
}

/**
 * Create a runner that spawns ffmpeg, collecting stderr for error reports.
 */
export function createFfmpegRunner(options: FfmpegRunnerOptions = {}): FfmpegRunner {
  const binary = options.binary ?? 'ffmpeg';
  const logger = options.logger ?? createLogger();

  return (args) =>
    new Promise((resolve, reject) => {
      const errorChunks: Buffer[] = [];
      logger.debug('media.ffmpeg', { binary, args: args.join(' ') });

      const ffmpeg = spawn(binary, [...args], { stdio: ['ignore', 'ignore', 'pipe'] });

      ffmpeg.stderr.on('data', (chunk: Buffer) => {
        errorChunks.push(chunk);
      });

      ffmpeg.on('close', (code) => {
        if (code === 0) {
          resolve();
          return;
        }
        const stderr = Buffer.concat(errorChunks).toString('utf8').trim();
        reject(
          createMediaError(
            MediaErrorCode.TRANSCODE_FAILED,
            `ffmpeg exited with code ${code}${stderr ? `: ${stderr}` : ''}`,
          ),
        );
      });

      ffmpeg.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code === 'ENOENT') {
          reject(
            createMediaError(
              MediaErrorCode.FFMPEG_NOT_FOUND,
              `${binary} was not found.`,
              {
                suggestion: 'Install FFmpeg or point FFMPEG_PATH at the ffmpeg executable.',
                cause: error,
              },
            ),
          );
          return;
        }
        reject(
          createMediaError(MediaErrorCode.TRANSCODE_FAILED, `Failed to spawn ${binary}: ${error.message}`, {
            cause: error,
          }),
        );
      });
    });
}
