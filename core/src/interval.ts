/**
 * A span of media time in milliseconds carrying an arbitrary payload
 * (for redaction intervals, the value of the annotation that marked it).
 */
export interface Interval<T = string> {
  start: number;
  end: number;
  payload: T;
}

export function createInterval<T>(start: number, end: number, payload: T): Interval<T> {
  return { start, end, payload };
}
