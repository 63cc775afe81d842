// Entry point for robot code: builds the device, strips, animations and one-shot color commands
import type { Color } from '../core/Color';
import type { DeviceSink } from '../core/DeviceSink';
import { createStripSegment, describeSegment, type StripSegment } from '../core/StripSegment';
import { createDevice, type DeviceBackends, type DeviceOptions } from '../core/createDevice';
import { requireParams } from '../core/errors';
import type { Clock } from './Animation';
import type { Scheduler } from './Scheduler';
import { createAnimation, type AnimationSpec, type CoreAnimation } from './animations';
import {
  AnimationPresets,
  createVendorAnimation,
  type AnimationConfig,
  type VendorAnimationType,
} from './vendor';

/** Deferred action; nothing touches the device until it is invoked */
export type Command = () => void;

export class LedController {
  private options: DeviceOptions;
  private backends: DeviceBackends;
  private scheduler: Scheduler;
  private clock: Clock | undefined;

  onLog?: (msg: string) => void;

  constructor(options: DeviceOptions, backends: DeviceBackends, scheduler: Scheduler, clock?: Clock) {
    requireParams({ options, backends, scheduler });
    this.options = options;
    this.backends = backends;
    this.scheduler = scheduler;
    this.clock = clock;
  }

  private log(msg: string): void {
    this.onLog?.(msg);
    console.log(msg);
  }

  createDevice(): DeviceSink {
    const device = createDevice(this.options, this.backends);
    this.log(`[Device] Created ${this.options.mode} device, ${device.pixelCount} pixels (${this.options.stripType})`);
    return device;
  }

  createStrip(start: number, end: number): StripSegment {
    return createStripSegment(start, end);
  }

  createAnimation(device: DeviceSink, strip: StripSegment, spec: AnimationSpec): CoreAnimation {
    return createAnimation({ device, strip, scheduler: this.scheduler, clock: this.clock }, spec);
  }

  setColor(device: DeviceSink, color: Color): Command {
    requireParams({ device, color });
    return () => device.writeAll(color);
  }

  setStripColor(device: DeviceSink, strip: StripSegment, color: Color): Command {
    requireParams({ device, strip, color });
    return () => device.writePixels(strip.start, strip.length(), color);
  }

  animateStrip(
    device: DeviceSink,
    strip: StripSegment,
    color: Color,
    type: VendorAnimationType,
    config: AnimationConfig = AnimationPresets.defaults()
  ): Command {
    requireParams({ device, strip, color, type, config });
    return () => {
      device.animate(createVendorAnimation(strip, color, type, config));
      this.log(`[Device] ${type} on ${describeSegment(strip)}`);
    };
  }
}

/** Run commands one after another */
export function sequence(...commands: Command[]): Command {
  return () => {
    for (const command of commands) command();
  };
}
