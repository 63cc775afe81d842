// Parameter records for the controller's built-in animations.
// The engine never renders these; they are forwarded to the device as-is.
import type { Color } from '../core/Color';
import type { StripSegment } from '../core/StripSegment';
import { requireParams } from '../core/errors';

export type Direction = 'FORWARD' | 'BACKWARD';

export const TWINKLE_PERCENTS = [100, 88, 76, 64, 42, 30, 18, 6] as const;
export type TwinklePercent = (typeof TWINKLE_PERCENTS)[number];

export const VENDOR_ANIMATION_TYPES = [
  'ColorFlow',
  'Fire',
  'Larson',
  'Rainbow',
  'RgbFade',
  'SingleFade',
  'Strobe',
  'Twinkle',
  'TwinkleOff',
] as const;
export type VendorAnimationType = (typeof VENDOR_ANIMATION_TYPES)[number];

export interface AnimationConfig {
  readonly speed: number;
  readonly direction: Direction;
  readonly brightness: number;
  readonly size: number;
  readonly sparking: number;
  readonly cooling: number;
  readonly twinklePercent: TwinklePercent;
  readonly twinkleOffPercent: TwinklePercent;
}

const DEFAULT_ANIMATION_CONFIG: AnimationConfig = {
  speed: 0.5,
  direction: 'FORWARD',
  brightness: 1.0,
  size: 3,
  sparking: 0.7,
  cooling: 0.5,
  twinklePercent: 42,
  twinkleOffPercent: 100,
};

/** Copy a config with some fields replaced */
export function withConfig(config: AnimationConfig, changes: Partial<AnimationConfig>): AnimationConfig {
  return Object.freeze({ ...config, ...changes });
}

export const AnimationPresets = {
  defaults: (): AnimationConfig => withConfig(DEFAULT_ANIMATION_CONFIG, {}),
  fast: (): AnimationConfig => withConfig(DEFAULT_ANIMATION_CONFIG, { speed: 1.0 }),
  slow: (): AnimationConfig => withConfig(DEFAULT_ANIMATION_CONFIG, { speed: 0.2 }),
  dim: (): AnimationConfig => withConfig(DEFAULT_ANIMATION_CONFIG, { brightness: 0.3 }),
  bright: (): AnimationConfig => withConfig(DEFAULT_ANIMATION_CONFIG, { brightness: 1.0 }),
  intenseFire: (): AnimationConfig =>
    withConfig(DEFAULT_ANIMATION_CONFIG, { speed: 0.8, sparking: 0.9, cooling: 0.2, brightness: 0.7 }),
  calmFire: (): AnimationConfig =>
    withConfig(DEFAULT_ANIMATION_CONFIG, { speed: 0.3, sparking: 0.4, cooling: 0.7, brightness: 0.5 }),
} as const;

export type AnimationPresetName = keyof typeof AnimationPresets;

interface Placement {
  ledCount: number;
  ledOffset: number;
}

interface ColorChannels {
  r: number;
  g: number;
  b: number;
  w: number;
}

export type VendorAnimation =
  | ({ type: 'ColorFlow'; speed: number; direction: 'Forward' | 'Backward' } & ColorChannels & Placement)
  | ({ type: 'Fire'; brightness: number; speed: number; sparking: number; cooling: number; reverse: boolean } & Placement)
  | ({ type: 'Larson'; speed: number; bounceMode: 'Front' | 'Back'; size: number } & ColorChannels & Placement)
  | ({ type: 'Rainbow'; brightness: number; speed: number; reverse: boolean } & Placement)
  | ({ type: 'RgbFade'; brightness: number; speed: number } & Placement)
  | ({ type: 'SingleFade'; speed: number } & ColorChannels & Placement)
  | ({ type: 'Strobe'; speed: number } & ColorChannels & Placement)
  | ({ type: 'Twinkle'; speed: number; twinklePercent: TwinklePercent } & ColorChannels & Placement)
  | ({ type: 'TwinkleOff'; speed: number; twinkleOffPercent: TwinklePercent } & ColorChannels & Placement);

/** Map a strip, color and config onto the descriptor for one built-in animation */
export function createVendorAnimation(
  strip: StripSegment,
  color: Color,
  type: VendorAnimationType,
  config: AnimationConfig = AnimationPresets.defaults()
): VendorAnimation {
  requireParams({ strip, color, type, config });

  const placement: Placement = { ledCount: strip.length(), ledOffset: strip.start };
  const channels: ColorChannels = { r: color.r, g: color.g, b: color.b, w: 0 };
  const reverse = config.direction === 'BACKWARD';

  switch (type) {
    case 'ColorFlow':
      return {
        type,
        ...channels,
        speed: config.speed,
        direction: reverse ? 'Backward' : 'Forward',
        ...placement,
      };
    case 'Fire':
      return {
        type,
        brightness: config.brightness,
        speed: config.speed,
        sparking: config.sparking,
        cooling: config.cooling,
        reverse,
        ...placement,
      };
    case 'Larson':
      return {
        type,
        ...channels,
        speed: config.speed,
        bounceMode: reverse ? 'Back' : 'Front',
        size: config.size,
        ...placement,
      };
    case 'Rainbow':
      return { type, brightness: config.brightness, speed: config.speed, reverse, ...placement };
    case 'RgbFade':
      return { type, brightness: config.brightness, speed: config.speed, ...placement };
    case 'SingleFade':
      return { type, ...channels, speed: config.speed, ...placement };
    case 'Strobe':
      return { type, ...channels, speed: config.speed, ...placement };
    case 'Twinkle':
      return { type, ...channels, speed: config.speed, twinklePercent: config.twinklePercent, ...placement };
    case 'TwinkleOff':
      return {
        type,
        ...channels,
        speed: config.speed,
        twinkleOffPercent: config.twinkleOffPercent,
        ...placement,
      };
  }
}
