// Controller configuration: defaults, overridden from the environment
import { STRIP_TYPES, type RunMode, type StripType } from './core/DeviceSink';
import { DEFAULT_TICK_MS } from './engine/Scheduler';

export interface ControllerConfig {
  mode: RunMode;
  deviceId: number;
  pixelCount: number;
  stripType: StripType;
  brokerUrl: string;
  username: string;
  password: string;
  tickMs: number;
}

export const DEFAULT_CONFIG: ControllerConfig = {
  mode: 'simulation',
  deviceId: 1,
  pixelCount: 60,
  stripType: 'RGB',
  brokerUrl: 'mqtt://localhost:1883',
  username: '',
  password: '',
  tickMs: DEFAULT_TICK_MS,
};

export type ConfigEnv = Record<string, string | undefined>;

function positiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

function isRunMode(raw: string): raw is RunMode {
  return raw === 'real' || raw === 'simulation';
}

function isStripType(raw: string): raw is StripType {
  return STRIP_TYPES.some((t) => t === raw);
}

/**
 * Merge LED_* environment variables over the defaults.
 * A malformed value keeps the default and is reported through `warn`.
 */
export function loadConfig(
  env: ConfigEnv = process.env,
  warn: (msg: string) => void = (msg) => console.warn(msg)
): ControllerConfig {
  const config: ControllerConfig = { ...DEFAULT_CONFIG };

  const mode = env.LED_MODE?.trim().toLowerCase();
  if (mode !== undefined && mode !== '') {
    if (isRunMode(mode)) config.mode = mode;
    else warn(`[Config] Unknown LED_MODE "${env.LED_MODE}", using ${config.mode}`);
  }

  const ints = [
    ['LED_DEVICE_ID', 'deviceId'],
    ['LED_PIXEL_COUNT', 'pixelCount'],
    ['LED_TICK_MS', 'tickMs'],
  ] as const;
  for (const [name, key] of ints) {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') continue;
    const value = positiveInt(raw);
    if (value === undefined) warn(`[Config] Invalid ${name} "${raw}", using ${config[key]}`);
    else config[key] = value;
  }

  const stripType = env.LED_STRIP_TYPE?.trim().toUpperCase();
  if (stripType !== undefined && stripType !== '') {
    if (isStripType(stripType)) config.stripType = stripType;
    else warn(`[Config] Unknown LED_STRIP_TYPE "${env.LED_STRIP_TYPE}", using ${config.stripType}`);
  }

  if (env.LED_BROKER_URL) config.brokerUrl = env.LED_BROKER_URL;
  if (env.LED_USERNAME !== undefined) config.username = env.LED_USERNAME;
  if (env.LED_PASSWORD !== undefined) config.password = env.LED_PASSWORD;

  return config;
}
