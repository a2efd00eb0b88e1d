import { mkdir } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  AnnotationStore,
  describeError,
  loadEaf,
  redactDocument,
  saveEaf,
  type Interval,
  type Logger,
} from '@tierline/core';
import {
  anonymizeMedia,
  createFfmpegRunner,
  createReviewClips,
  planReviewClips,
  probeDurationMs,
  type FfmpegRunner,
  type MediaKind,
  type ProbeExecutor,
} from '@tierline/media';
import type { AnonymizeSettings, FfmpegSettings } from '../lib/cli-config.js';
import { findAssociatedMedia, transcriptBaseName } from '../lib/media-discovery.js';

export interface AnonymizeCommandOptions {
  transcripts: string[];
  settings: AnonymizeSettings;
  ffmpeg: FfmpegSettings;
  logger: Logger;
  runner?: FfmpegRunner;
  probeExecutor?: ProbeExecutor;
  tempRoot?: string;
}

export interface AnonymizedMedia {
  kind: MediaKind;
  inputPath: string;
  outputPath: string;
}

export interface AnonymizeFailure {
  /** Transcript or media file the failure belongs to */
  target: string;
  message: string;
}

export interface TranscriptOutcome {
  transcriptPath: string;
  /** Written transcript, when text output is enabled and saving succeeded */
  outputPath?: string;
  redactedAnnotations: number;
  intervals: number;
  media: AnonymizedMedia[];
  reviewClips: string[];
}

export interface AnonymizeResult {
  outputDir: string;
  transcripts: TranscriptOutcome[];
  failures: AnonymizeFailure[];
}

/**
 * Anonymize each transcript and the media beside it. A failure on one file is
 * recorded and processing moves on to the next.
 */
export async function runAnonymize(options: AnonymizeCommandOptions): Promise<AnonymizeResult> {
  const { settings, logger } = options;
  const outputDir = resolve(settings.outputDir);
  const runner = options.runner ?? createFfmpegRunner({ binary: options.ffmpeg.ffmpegPath, logger });
  const failures: AnonymizeFailure[] = [];
  const transcripts: TranscriptOutcome[] = [];

  await mkdir(outputDir, { recursive: true });

  for (const transcriptPath of options.transcripts) {
    logger.info(`Anonymizing transcript ${transcriptPath}`);

    let store: AnnotationStore;
    try {
      store = new AnnotationStore(await loadEaf(transcriptPath));
    } catch (error) {
      logger.error(`Skipping ${transcriptPath}: ${describeError(error)}`);
      failures.push({ target: transcriptPath, message: describeError(error) });
      continue;
    }

    const { redacted, intervals } = redactDocument(store, {
      intervalTier: settings.intervalTier,
      logger,
    });
    const outcome: TranscriptOutcome = {
      transcriptPath,
      redactedAnnotations: redacted.length,
      intervals: intervals.length,
      media: [],
      reviewClips: [],
    };
    transcripts.push(outcome);

    const jobs: { kind: MediaKind; inputPath: string }[] = [];
    const kinds: [MediaKind, boolean, string][] = [
      ['audio', settings.audio, settings.audioPattern],
      ['video', settings.video, settings.videoPattern],
    ];
    for (const [kind, enabled, pattern] of kinds) {
      if (!enabled) continue;
      for (const inputPath of await findAssociatedMedia(transcriptPath, pattern)) {
        jobs.push({ kind, inputPath });
      }
    }

    for (const job of jobs) {
      try {
        const outputPath = await anonymizeMedia(
          {
            kind: job.kind,
            inputPath: job.inputPath,
            outputDir,
            suffix: settings.outputSuffix,
            intervals,
          },
          { runner, logger, tempRoot: options.tempRoot },
        );
        outcome.media.push({ ...job, outputPath });
      } catch (error) {
        logger.error(`Failed to anonymize ${job.inputPath}: ${describeError(error)}`);
        failures.push({ target: job.inputPath, message: describeError(error) });
      }
    }

    if (settings.review) {
      outcome.reviewClips = await cutReviewClips(outcome.media, intervals, options, runner, failures);
    }

    if (!settings.text) {
      continue;
    }
    for (const media of outcome.media) {
      store.relinkMedia(basename(media.inputPath), {
        mediaUrl: pathToFileURL(resolve(media.outputPath)).href,
        relativeMediaUrl: `./${basename(media.outputPath)}`,
      });
    }
    const outputPath = join(
      outputDir,
      `${transcriptBaseName(transcriptPath)}${settings.outputSuffix}.eaf`,
    );
    try {
      await saveEaf(outputPath, store.document);
      outcome.outputPath = outputPath;
      logger.info(`Wrote ${outputPath}`);
    } catch (error) {
      logger.error(`Failed to save ${outputPath}: ${describeError(error)}`);
      failures.push({ target: transcriptPath, message: describeError(error) });
    }
  }

  return { outputDir, transcripts, failures };
}

async function cutReviewClips(
  media: readonly AnonymizedMedia[],
  intervals: readonly Interval[],
  options: AnonymizeCommandOptions,
  runner: FfmpegRunner,
  failures: AnonymizeFailure[],
): Promise<string[]> {
  const { logger } = options;
  const written: string[] = [];
  for (const { outputPath } of media) {
    try {
      const duration = await probeDurationMs(outputPath, {
        binary: options.ffmpeg.ffprobePath,
        executor: options.probeExecutor,
        logger,
      });
      const plans = planReviewClips(outputPath, intervals, duration, {
        contextMs: options.settings.reviewContextMs,
      });
      written.push(...(await createReviewClips(plans, { runner, logger })));
    } catch (error) {
      logger.error(`Failed to cut review clips from ${outputPath}: ${describeError(error)}`);
      failures.push({ target: outputPath, message: describeError(error) });
    }
  }
  return written;
}
