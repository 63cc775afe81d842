import type { DeviceSink, RunMode, StripType } from './DeviceSink';
import { HardwareSink, type LedTransport } from './HardwareSink';
import { SimulatedSink, type FrameSink } from './SimulatedSink';
import { MissingParameterError } from './errors';

export interface DeviceOptions {
  mode: RunMode;
  pixelCount: number;
  stripType: StripType;
}

export interface DeviceBackends {
  transport?: LedTransport;
  visualizer?: FrameSink;
}

/** Pick the backend once from the run mode. Callers never see which one they got. */
export function createDevice(options: DeviceOptions, backends: DeviceBackends): DeviceSink {
  if (options.mode === 'real') {
    if (!backends.transport) throw new MissingParameterError('transport');
    return new HardwareSink(backends.transport, options.pixelCount, options.stripType);
  }
  if (!backends.visualizer) throw new MissingParameterError('visualizer');
  return new SimulatedSink(options.mode, options.pixelCount, backends.visualizer);
}
