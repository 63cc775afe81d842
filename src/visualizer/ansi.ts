// Terminal rendering of a frame: one truecolor block per LED
import type { Color } from '../core/Color';

function channel(v: number): number {
  return Math.max(0, Math.min(255, Math.round(v)));
}

export function renderAnsi(frame: readonly Color[]): string {
  const cells = frame.map((c) => `\x1b[38;2;${channel(c.r)};${channel(c.g)};${channel(c.b)}m●`);
  return cells.join('') + '\x1b[0m';
}
