/**
 * Millisecond formatting shared by filter programs, clip names and review cuts.
 */

export type TimestampStyle = 'ffmpeg' | 'filename';

function toWholeMilliseconds(ms: number): number {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Expected a non-negative millisecond value, received ${ms}`);
  }
  return Math.round(ms);
}

/**
 * Seconds with exactly three fractional digits, computed without floating point
 * division so that the same millisecond value always prints the same way.
 *
 * @example
 * formatSeconds(216670) // '216.670'
 */
export function formatSeconds(ms: number): string {
  const whole = toWholeMilliseconds(ms);
  const seconds = Math.floor(whole / 1000);
  const millis = whole % 1000;
  return `${seconds}.${String(millis).padStart(3, '0')}`;
}

/**
 * Like {@link formatSeconds} but without trailing zeros or a dangling point
 * (`1500` → `1.5`, `3000` → `3`).
 */
export function formatCompactSeconds(ms: number): string {
  return formatSeconds(ms).replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * `HH:MM:SS.mmm` for ffmpeg arguments, or `HHhMMmSSsmmm` for file names.
 */
export function formatTimestamp(ms: number, style: TimestampStyle = 'ffmpeg'): string {
  const whole = toWholeMilliseconds(ms);
  const millis = whole % 1000;
  const totalSeconds = Math.floor(whole / 1000);
  const secs = totalSeconds % 60;
  const totalMinutes = Math.floor(totalSeconds / 60);
  const mins = totalMinutes % 60;
  const hours = Math.floor(totalMinutes / 60);

  const hh = String(hours).padStart(2, '0');
  const mm = String(mins).padStart(2, '0');
  const ss = String(secs).padStart(2, '0');
  const mmm = String(millis).padStart(3, '0');

  if (style === 'ffmpeg') {
    return `${hh}:${mm}:${ss}.${mmm}`;
  }
  return `${hh}h${mm}m${ss}s${mmm}`;
}
