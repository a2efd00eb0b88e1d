import { basename, extname, join } from 'node:path';
import { createLogger, type Interval, type Logger } from '@tierline/core';
import { compileAudioFilter, compileVideoFilter } from './ffmpeg/filter-compiler.js';
import type { FfmpegRunner } from './ffmpeg/runner.js';
import { transcodeWithFilterScript } from './ffmpeg/transcoder.js';

export type MediaKind = 'audio' | 'video';

export interface CodecOptions {
  /** Output file extension, without the dot */
  extension: string;
  codecArgs: string[];
  trailingArgs: string[];
}

export const DEFAULT_CODECS: Record<MediaKind, CodecOptions> = {
  audio: { extension: 'wav', codecArgs: ['-c:a', 'pcm_s24le'], trailingArgs: [] },
  video: {
    extension: 'mp4',
    codecArgs: ['-c:v', 'libx264', '-preset', 'veryslow', '-crf', '17'],
    trailingArgs: ['-movflags', '+faststart'],
  },
};

export interface AnonymizeMediaRequest {
  kind: MediaKind;
  inputPath: string;
  outputDir: string;
  /** Inserted between the input's basename and the new extension */
  suffix: string;
  intervals: readonly Interval<unknown>[];
  codec?: CodecOptions;
}

export interface AnonymizeMediaOptions {
  runner?: FfmpegRunner;
  logger?: Logger;
  tempRoot?: string;
}

/**
 * `<outputDir>/<basename><suffix>.<extension>`, e.g. `anonymized/session-ANONYMIZED.wav`.
 */
export function anonymizedOutputPath(
  inputPath: string,
  outputDir: string,
  suffix: string,
  extension: string,
): string {
  const name = basename(inputPath, extname(inputPath));
  return join(outputDir, `${name}${suffix}.${extension}`);
}

/**
 * Write a copy of one media file with every interval muted (audio) or
 * blurred and muted (video). Returns the output path.
 */
export async function anonymizeMedia(
  request: AnonymizeMediaRequest,
  options: AnonymizeMediaOptions = {},
): Promise<string> {
  const logger = options.logger ?? createLogger();
  const codec = request.codec ?? DEFAULT_CODECS[request.kind];
  const outputPath = anonymizedOutputPath(
    request.inputPath,
    request.outputDir,
    request.suffix,
    codec.extension,
  );
  const filterProgram =
    request.kind === 'audio'
      ? compileAudioFilter(request.intervals)
      : compileVideoFilter(request.intervals);

  logger.info(`Anonymizing ${request.kind} ${request.inputPath} -> ${outputPath}`);
  return transcodeWithFilterScript(
    {
      inputPath: request.inputPath,
      outputPath,
      filterProgram,
      codecArgs: codec.codecArgs,
      trailingArgs: codec.trailingArgs,
    },
    { runner: options.runner, logger, tempRoot: options.tempRoot },
  );
}
