import { basename, dirname, extname, join } from 'node:path';
import {
  createLogger,
  formatSeconds,
  formatTimestamp,
  type Interval,
  type Logger,
} from '@tierline/core';
import { createFfmpegRunner, type FfmpegRunner } from './ffmpeg/runner.js';

/** Context added before and after each redacted span in review clips */
export const DEFAULT_REVIEW_CONTEXT_MS = 1000;

export interface ReviewClipPlan {
  mediaPath: string;
  outputPath: string;
  /** Cut window: the interval widened by the context and clamped to the media */
  start: number;
  end: number;
}

export interface PlanReviewClipsOptions {
  contextMs?: number;
  /** Where clips are written (default: beside the media) */
  outputDir?: string;
}

/**
 * Plan one review clip per interval. Clips are named after the interval,
 * `<base>-<HHhMMmSSsmmm>_<HHhMMmSSsmmm><ext>`; the cut window is widened by
 * the context and clamped at 0 and, when known, at the media's duration.
 */
export function planReviewClips(
  mediaPath: string,
  intervals: readonly Interval<unknown>[],
  mediaDurationMs: number | undefined,
  options: PlanReviewClipsOptions = {},
): ReviewClipPlan[] {
  const contextMs = options.contextMs ?? DEFAULT_REVIEW_CONTEXT_MS;
  const extension = extname(mediaPath);
  const base = basename(mediaPath, extension);
  const outputDir = options.outputDir ?? dirname(mediaPath);

  return intervals.map((interval) => {
    const name = `${base}-${formatTimestamp(interval.start, 'filename')}_${formatTimestamp(interval.end, 'filename')}${extension}`;
    const start = Math.max(interval.start - contextMs, 0);
    const widenedEnd = interval.end + contextMs;
    const end = mediaDurationMs === undefined ? widenedEnd : Math.min(widenedEnd, mediaDurationMs);
    return { mediaPath, outputPath: join(outputDir, name), start, end: Math.max(start, end) };
  });
}

export function buildReviewClipArgs(plan: ReviewClipPlan): string[] {
  return [
    '-y',
    '-v', '0',
    '-fflags', '+genpts',
    '-i', plan.mediaPath,
    '-ss', formatTimestamp(plan.start),
    '-t', formatSeconds(plan.end - plan.start),
    '-acodec', 'copy',
    '-vcodec', 'libx264',
    '-preset', 'veryfast',
    '-avoid_negative_ts', '1',
    plan.outputPath,
  ];
}

export interface CreateReviewClipsOptions {
  runner?: FfmpegRunner;
  logger?: Logger;
}

/**
 * Cut the planned clips one after another. Returns the paths written.
 */
export async function createReviewClips(
  plans: readonly ReviewClipPlan[],
  options: CreateReviewClipsOptions = {},
): Promise<string[]> {
  const logger = options.logger ?? createLogger();
  const runner = options.runner ?? createFfmpegRunner({ logger });
  const written: string[] = [];
  for (const plan of plans) {
    logger.debug('media.review_clip', { output: plan.outputPath, start: plan.start, end: plan.end });
    await runner(buildReviewClipArgs(plan));
    written.push(plan.outputPath);
  }
  return written;
}
