import { scaleColor, type Color } from '../../core/Color';
import { InvalidParameterError, requireParams } from '../../core/errors';
import { AnimationLifecycle, type AnimationContext } from '../Animation';

export interface BreatheParams {
  color: Color;
  /** Breaths per second */
  frequency: number;
  /** Brightness floor as a fraction of full color, 0..1 */
  dimmness: number;
  /** Radians; offset adjacent segments to get a travelling wave */
  phaseShift?: number;
}

/** Brightness multiplier in [dimmness, 1] at time `now` (ms) */
export function breathScale(now: number, frequency: number, dimmness: number, phaseShift: number = 0): number {
  const periodMs = 1000 / frequency;
  const phase = ((now % periodMs) / periodMs) * 2 * Math.PI + phaseShift;
  const brightness = (Math.sin(phase) + 1) / 2;
  return dimmness + brightness * (1 - dimmness);
}

export class Breathe extends AnimationLifecycle {
  readonly kind = 'breathe' as const;

  private readonly color: Color;
  private readonly frequency: number;
  private readonly dimmness: number;
  private readonly phaseShift: number;

  constructor(context: AnimationContext, params: BreatheParams) {
    requireParams({ params });
    requireParams({ color: params.color, frequency: params.frequency, dimmness: params.dimmness });
    if (!(params.frequency > 0) || !Number.isFinite(params.frequency)) {
      throw new InvalidParameterError('frequency', `must be a positive number, got ${params.frequency}`);
    }
    if (!(params.dimmness >= 0 && params.dimmness <= 1)) {
      throw new InvalidParameterError('dimmness', `must be within [0, 1], got ${params.dimmness}`);
    }
    if (params.phaseShift !== undefined && !Number.isFinite(params.phaseShift)) {
      throw new InvalidParameterError('phaseShift', `must be a finite number, got ${params.phaseShift}`);
    }
    super(context);
    this.color = params.color;
    this.frequency = params.frequency;
    this.dimmness = params.dimmness;
    this.phaseShift = params.phaseShift ?? 0;
  }

  protected draw(now: number): void {
    const scale = breathScale(now, this.frequency, this.dimmness, this.phaseShift);
    this.fill(scaleColor(this.color, scale));
  }
}
