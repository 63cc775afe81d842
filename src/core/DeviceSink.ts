// Write boundary between animations and whatever is on the other end of the strip
import type { Color } from './Color';
import type { VendorAnimation } from '../engine/vendor';
import { InvalidParameterError } from './errors';

export type RunMode = 'real' | 'simulation';

/** Byte order the physical strip expects */
export type StripType = 'RGB' | 'GRB' | 'BRG' | 'RBG' | 'GBR' | 'RGBW';

export const STRIP_TYPES: readonly StripType[] = ['RGB', 'GRB', 'BRG', 'RBG', 'GBR', 'RGBW'];

export interface DeviceSink {
  readonly pixelCount: number;
  /** Paint `count` pixels from `start`. Indices outside the strip are dropped. */
  writePixels(start: number, count: number, color: Color): void;
  writeAll(color: Color): void;
  /** Hand a vendor animation to the backend. Not rendered by the engine. */
  animate(animation: VendorAnimation): void;
}

export interface PixelRange {
  start: number;
  count: number;
}

/** Clip [start, start + count) to [0, pixelCount). Null when nothing is left. */
export function clipRange(start: number, count: number, pixelCount: number): PixelRange | null {
  if (!Number.isFinite(start) || !Number.isFinite(count)) return null;
  const from = Math.max(0, Math.trunc(start));
  const to = Math.min(pixelCount, Math.trunc(start) + Math.trunc(count));
  if (to <= from) return null;
  return { start: from, count: to - from };
}

export function assertPixelCount(pixelCount: number): void {
  if (!Number.isInteger(pixelCount) || pixelCount <= 0) {
    throw new InvalidParameterError('pixelCount', `must be a positive integer, got ${pixelCount}`);
  }
}
