import type { Color } from '../../core/Color';
import { InvalidParameterError, requireParams } from '../../core/errors';
import { AnimationLifecycle, litCountFor, type AnimationContext } from '../Animation';

export interface RangeValueParams {
  min: number;
  max: number;
  supplier: () => number;
  fillColor: Color;
  emptyColor: Color;
}

/** Progress bar: the share of the segment lit tracks where the value sits in [min, max] */
export class RangeValue extends AnimationLifecycle {
  readonly kind = 'range' as const;

  private readonly min: number;
  private readonly max: number;
  private readonly supplier: () => number;
  private readonly fillColor: Color;
  private readonly emptyColor: Color;

  constructor(context: AnimationContext, params: RangeValueParams) {
    requireParams({ params });
    requireParams({
      min: params.min,
      max: params.max,
      supplier: params.supplier,
      fillColor: params.fillColor,
      emptyColor: params.emptyColor,
    });
    if (!Number.isFinite(params.min) || !Number.isFinite(params.max) || params.max <= params.min) {
      throw new InvalidParameterError('max', `must be greater than min (min=${params.min}, max=${params.max})`);
    }
    super(context);
    this.min = params.min;
    this.max = params.max;
    this.supplier = params.supplier;
    this.fillColor = params.fillColor;
    this.emptyColor = params.emptyColor;
  }

  /** Pixels lit for a raw reading; the reading is clamped first */
  litCount(reading: number): number {
    const value = Math.max(this.min, Math.min(this.max, reading));
    const fraction = (value - this.min) / (this.max - this.min);
    return litCountFor(fraction, this.strip.length());
  }

  protected draw(): void {
    this.split(this.litCount(this.supplier()), this.fillColor, this.emptyColor);
  }
}
