import { randomUUID } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, describeError, type Logger } from '@tierline/core';
import { createFfmpegRunner, type FfmpegRunner } from './runner.js';

export interface TranscodeRequest {
  inputPath: string;
  outputPath: string;
  /** Filter graph text, written to a script file rather than the command line */
  filterProgram: string;
  /** Arguments placed between the input and the filter script, such as codecs */
  codecArgs?: readonly string[];
  /** Arguments placed between the filter script and the output */
  trailingArgs?: readonly string[];
}

export interface TranscodeOptions {
  runner?: FfmpegRunner;
  logger?: Logger;
  /** Parent directory for the temporary script directory (default: the OS temp dir) */
  tempRoot?: string;
}

export function buildTranscodeArgs(request: TranscodeRequest, scriptPath: string): string[] {
  return [
    '-y',
    '-v', '0',
    '-i', request.inputPath,
    ...(request.codecArgs ?? []),
    '-/filter_complex', scriptPath,
    ...(request.trailingArgs ?? []),
    request.outputPath,
  ];
}

/**
 * Run ffmpeg over one input with the given filter program. The program is
 * written to a temporary script, which is removed on every exit path.
 */
export async function transcodeWithFilterScript(
  request: TranscodeRequest,
  options: TranscodeOptions = {},
): Promise<string> {
  const logger = options.logger ?? createLogger();
  const runner = options.runner ?? createFfmpegRunner({ logger });
  const tempDir = join(options.tempRoot ?? tmpdir(), `tierline-filter-${randomUUID()}`);

  try {
    await mkdir(tempDir, { recursive: true });
    const scriptPath = join(tempDir, 'filter.txt');
    await writeFile(scriptPath, request.filterProgram, 'utf8');

    logger.debug('media.transcode', { input: request.inputPath, output: request.outputPath });
    await runner(buildTranscodeArgs(request, scriptPath));
    return request.outputPath;
  } finally {
    await rm(tempDir, { recursive: true, force: true }).catch((error: unknown) => {
      logger.warn(`Could not remove temporary directory ${tempDir}: ${describeError(error)}`);
    });
  }
}
