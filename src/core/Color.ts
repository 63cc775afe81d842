// 8-bit RGB color values shared by every animation and device backend

export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Build a color without range checks. Out-of-range channels reach the device as-is. */
export function customColor(r: number, g: number, b: number): Color {
  return Object.freeze({ r, g, b });
}

export const Colors = {
  RED: customColor(255, 0, 0),
  GREEN: customColor(0, 255, 0),
  BLUE: customColor(0, 0, 255),
  YELLOW: customColor(255, 255, 0),
  PURPLE: customColor(128, 0, 128),
  ORANGE: customColor(255, 165, 0),
  WHITE: customColor(255, 255, 255),
  CYAN: customColor(0, 255, 255),
  MAGENTA: customColor(255, 0, 255),
  OFF: customColor(0, 0, 0),
} as const;

export type ColorName = keyof typeof Colors;

/** Scale every channel by a factor, truncating toward zero (used by breathing) */
export function scaleColor(c: Color, factor: number): Color {
  return customColor(Math.trunc(c.r * factor), Math.trunc(c.g * factor), Math.trunc(c.b * factor));
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b;
}

/** #rrggbb for display. Channels are clamped here only, never on the device path. */
export function toHex(c: Color): string {
  const hex = (v: number) =>
    Math.max(0, Math.min(255, Math.round(v)))
      .toString(16)
      .padStart(2, '0');
  return `#${hex(c.r)}${hex(c.g)}${hex(c.b)}`;
}
