// Run/stop/end state machine shared by the computed animation kinds
import { Colors, type Color } from '../core/Color';
import type { DeviceSink } from '../core/DeviceSink';
import type { StripSegment } from '../core/StripSegment';
import { requireParams } from '../core/errors';
import type { Scheduler, TaskHandle } from './Scheduler';

/** Milliseconds, read once per draw */
export type Clock = () => number;

export interface AnimationContext {
  device: DeviceSink;
  strip: StripSegment;
  scheduler: Scheduler;
  clock?: Clock;
}

export type AnimationKind = 'breathe' | 'countdown' | 'boolean' | 'state' | 'range';

export abstract class AnimationLifecycle {
  abstract readonly kind: AnimationKind;

  protected readonly device: DeviceSink;
  protected readonly strip: StripSegment;
  protected readonly clock: Clock;
  private readonly scheduler: Scheduler;
  private handle: TaskHandle | null = null;

  /** Set by draw() when the animation has nothing left to show */
  protected finished: boolean = false;

  constructor(context: AnimationContext) {
    requireParams({ context });
    const { device, strip, scheduler } = context;
    requireParams({ device, strip, scheduler });
    this.device = device;
    this.strip = strip;
    this.scheduler = scheduler;
    this.clock = context.clock ?? Date.now;
  }

  run(): void {
    if (this.isRunning()) return;
    this.finished = false;
    this.handle = this.scheduler.register({
      initialize: () => this.onStart(this.clock()),
      execute: () => this.draw(this.clock()),
      isFinished: () => this.finished,
    });
  }

  /** Cancel drawing and leave the last frame on the strip */
  stop(): void {
    if (this.handle === null) return;
    const handle = this.handle;
    this.handle = null;
    this.scheduler.cancel(handle);
  }

  /** Cancel drawing and blank the segment, whatever the prior state */
  end(): void {
    this.stop();
    this.fill(Colors.OFF);
  }

  isRunning(): boolean {
    return this.handle !== null && this.scheduler.isActive(this.handle);
  }

  getStrip(): StripSegment {
    return this.strip;
  }

  protected onStart(_now: number): void {}

  protected abstract draw(now: number): void;

  protected fill(color: Color): void {
    this.device.writePixels(this.strip.start, this.strip.length(), color);
  }

  /** First `lit` pixels in one color, the remainder in another */
  protected split(lit: number, litColor: Color, restColor: Color): void {
    const total = this.strip.length();
    this.device.writePixels(this.strip.start, lit, litColor);
    const remaining = total - lit;
    if (remaining > 0) {
      this.device.writePixels(this.strip.start + lit, remaining, restColor);
    }
  }
}

/** round(fraction * length), clamped to [0, length] */
export function litCountFor(fraction: number, length: number): number {
  if (Number.isNaN(fraction)) return 0;
  return Math.max(0, Math.min(length, Math.round(fraction * length)));
}
