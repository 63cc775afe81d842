import { Colors, type Color } from '../../core/Color';
import { InvalidParameterError, requireParams } from '../../core/errors';
import { AnimationLifecycle, litCountFor, type AnimationContext } from '../Animation';

export interface CountdownParams {
  /** Seconds from full to empty */
  time: number;
  color: Color;
}

// Shrinks from full to empty over `time` seconds, then stops itself.
// Every run() restarts the clock.
export class Countdown extends AnimationLifecycle {
  readonly kind = 'countdown' as const;

  private readonly time: number;
  private readonly color: Color;
  private startTimestamp: number = 0;

  constructor(context: AnimationContext, params: CountdownParams) {
    requireParams({ params });
    requireParams({ time: params.time, color: params.color });
    if (!(params.time > 0) || !Number.isFinite(params.time)) {
      throw new InvalidParameterError('time', `must be a positive number of seconds, got ${params.time}`);
    }
    super(context);
    this.time = params.time;
    this.color = params.color;
  }

  protected onStart(now: number): void {
    this.startTimestamp = now;
  }

  protected draw(now: number): void {
    const elapsed = (now - this.startTimestamp) / 1000;
    const remainingFraction = Math.max(0, (this.time - elapsed) / this.time);
    const lit = litCountFor(remainingFraction, this.strip.length());
    this.split(lit, this.color, Colors.OFF);
    this.finished = elapsed >= this.time;
  }
}
