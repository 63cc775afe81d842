import { describe, expect, it } from 'vitest';
import { Colors } from '../core/Color';
import { MissingParameterError } from '../core/errors';
import { createStripSegment } from '../core/StripSegment';
import { AnimationPresets, VENDOR_ANIMATION_TYPES, createVendorAnimation, withConfig } from './vendor';

const strip = createStripSegment(30, 60);

describe('AnimationPresets', () => {
  it('has the documented defaults', () => {
    expect(AnimationPresets.defaults()).toEqual({
      speed: 0.5,
      direction: 'FORWARD',
      brightness: 1.0,
      size: 3,
      sparking: 0.7,
      cooling: 0.5,
      twinklePercent: 42,
      twinkleOffPercent: 100,
    });
  });

  it('derives the named presets from the defaults', () => {
    expect(AnimationPresets.fast().speed).toBe(1.0);
    expect(AnimationPresets.slow().speed).toBe(0.2);
    expect(AnimationPresets.dim().brightness).toBe(0.3);
    expect(AnimationPresets.bright().brightness).toBe(1.0);
    expect(AnimationPresets.intenseFire()).toMatchObject({ speed: 0.8, sparking: 0.9, cooling: 0.2, brightness: 0.7 });
    expect(AnimationPresets.calmFire()).toMatchObject({ speed: 0.3, sparking: 0.4, cooling: 0.7, brightness: 0.5 });
    expect(AnimationPresets.calmFire().size).toBe(3);
  });

  it('copies instead of mutating', () => {
    const base = AnimationPresets.defaults();
    const changed = withConfig(base, { speed: 0.8, size: 5 });
    expect(base.speed).toBe(0.5);
    expect(changed).toMatchObject({ speed: 0.8, size: 5, direction: 'FORWARD' });
  });
});

describe('createVendorAnimation', () => {
  it('places every type on the strip', () => {
    for (const type of VENDOR_ANIMATION_TYPES) {
      expect(createVendorAnimation(strip, Colors.RED, type)).toMatchObject({ type, ledCount: 30, ledOffset: 30 });
    }
  });

  it('maps direction onto color flow, larson and fire', () => {
    const backward = withConfig(AnimationPresets.defaults(), { direction: 'BACKWARD', speed: 0.6 });

    expect(createVendorAnimation(strip, Colors.PURPLE, 'ColorFlow', backward)).toEqual({
      type: 'ColorFlow',
      r: 128,
      g: 0,
      b: 128,
      w: 0,
      speed: 0.6,
      direction: 'Backward',
      ledCount: 30,
      ledOffset: 30,
    });
    expect(createVendorAnimation(strip, Colors.RED, 'Larson')).toMatchObject({ bounceMode: 'Front', size: 3 });
    expect(createVendorAnimation(strip, Colors.RED, 'Larson', backward)).toMatchObject({ bounceMode: 'Back' });
    expect(createVendorAnimation(strip, Colors.ORANGE, 'Fire', AnimationPresets.intenseFire())).toEqual({
      type: 'Fire',
      brightness: 0.7,
      speed: 0.8,
      sparking: 0.9,
      cooling: 0.2,
      reverse: false,
      ledCount: 30,
      ledOffset: 30,
    });
    expect(createVendorAnimation(strip, Colors.OFF, 'Rainbow', backward)).toMatchObject({ reverse: true });
  });

  it('carries twinkle percentages', () => {
    expect(createVendorAnimation(strip, Colors.WHITE, 'Twinkle')).toMatchObject({ twinklePercent: 42 });
    expect(createVendorAnimation(strip, Colors.WHITE, 'TwinkleOff')).toMatchObject({ twinkleOffPercent: 100 });
  });

  it('rejects missing parameters', () => {
    expect(() => createVendorAnimation(strip, JSON.parse('null'), 'Strobe')).toThrow(MissingParameterError);
  });
});
