import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
  it('returns the defaults for an empty environment', () => {
    const warnings: string[] = [];
    expect(loadConfig({}, (msg) => warnings.push(msg))).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG).toMatchObject({ mode: 'simulation', pixelCount: 60, tickMs: 20, stripType: 'RGB' });
    expect(warnings).toEqual([]);
  });

  it('reads LED_* overrides', () => {
    const config = loadConfig(
      {
        LED_MODE: 'REAL',
        LED_DEVICE_ID: '12',
        LED_PIXEL_COUNT: '144',
        LED_STRIP_TYPE: 'grb',
        LED_BROKER_URL: 'mqtt://controller.local:1883',
        LED_USERNAME: 'robot',
        LED_PASSWORD: 'test-secret',
        LED_TICK_MS: '25',
      },
      () => {}
    );

    expect(config).toEqual({
      mode: 'real',
      deviceId: 12,
      pixelCount: 144,
      stripType: 'GRB',
      brokerUrl: 'mqtt://controller.local:1883',
      username: 'robot',
      password: 'test-secret',
      tickMs: 25,
    });
  });

  it('keeps defaults for malformed values and says so', () => {
    const warnings: string[] = [];
    const config = loadConfig(
      { LED_MODE: 'hologram', LED_PIXEL_COUNT: '-4', LED_TICK_MS: 'fast', LED_STRIP_TYPE: 'XYZ' },
      (msg) => warnings.push(msg)
    );

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([
      '[Config] Unknown LED_MODE "hologram", using simulation',
      '[Config] Invalid LED_PIXEL_COUNT "-4", using 60',
      '[Config] Invalid LED_TICK_MS "fast", using 20',
      '[Config] Unknown LED_STRIP_TYPE "XYZ", using RGB',
    ]);
  });
});
