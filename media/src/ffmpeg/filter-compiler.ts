import {
  createMediaError,
  formatSeconds,
  MediaErrorCode,
  type Span,
} from '@tierline/core';

/** Box blur radius applied to the whole frame inside redacted spans */
export const BLUR_RADIUS = 10;

/** Filter program that leaves the audio untouched */
export const AUDIO_PASSTHROUGH = 'anull';

function assertValidInterval(interval: Span, index: number): void {
  const { start, end } = interval;
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end < start) {
    throw createMediaError(
      MediaErrorCode.INVALID_INTERVAL,
      `Interval ${index} (${start}, ${end}) is not a valid media span.`,
      { suggestion: 'Intervals need finite, non-negative millisecond bounds with end >= start.' },
    );
  }
}

/**
 * Time gate active while the playback clock lies within the interval, in
 * seconds with exactly three decimals.
 *
 * @example
 * buildEnableExpression({ start: 216670, end: 219193 }) // 'between(t,216.670,219.193)'
 */
export function buildEnableExpression(interval: Span): string {
  return `between(t,${formatSeconds(interval.start)},${formatSeconds(interval.end)})`;
}

function muteClauses(intervals: readonly Span[]): string[] {
  return intervals.map(
    (interval) => `volume=enable='${buildEnableExpression(interval)}':volume=0`,
  );
}

function blurClauses(intervals: readonly Span[]): string[] {
  return intervals.map(
    (interval) => `boxblur=${BLUR_RADIUS}:enable='${buildEnableExpression(interval)}'`,
  );
}

/**
 * One mute clause per interval, in input order. Overlapping or repeated
 * intervals each keep their own clause.
 */
export function compileAudioFilter(intervals: readonly Span[]): string {
  intervals.forEach(assertValidInterval);
  if (intervals.length === 0) {
    return AUDIO_PASSTHROUGH;
  }
  return muteClauses(intervals).join(', ');
}

/**
 * Blur the video stream and mute the audio stream over the same intervals,
 * as one filter graph addressing input 0's streams.
 */
export function compileVideoFilter(intervals: readonly Span[]): string {
  intervals.forEach(assertValidInterval);
  const video = ['format=yuv420p', ...blurClauses(intervals)].join(', ');
  const audio = intervals.length === 0 ? AUDIO_PASSTHROUGH : muteClauses(intervals).join(', ');
  return `[0:v]${video};[0:a]${audio}`;
}
