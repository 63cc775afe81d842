import { InvalidRangeError } from './errors';

/** Half-open range [start, end) of pixels on one strip */
export interface StripSegment {
  readonly start: number;
  readonly end: number;
  length(): number;
}

export function createStripSegment(start: number, end: number): StripSegment {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end - start <= 0) {
    throw new InvalidRangeError(start, end);
  }
  return Object.freeze({
    start,
    end,
    length: () => end - start,
  });
}

export function describeSegment(strip: StripSegment): string {
  return `${strip.start}-${strip.end}`;
}
