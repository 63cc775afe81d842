import type { Color } from '../../core/Color';
import { requireParams } from '../../core/errors';
import { AnimationLifecycle, type AnimationContext } from '../Animation';

export interface BooleanIndicatorParams {
  supplier: () => boolean;
  trueColor: Color;
  falseColor: Color;
}

export class BooleanIndicator extends AnimationLifecycle {
  readonly kind = 'boolean' as const;

  private readonly supplier: () => boolean;
  private readonly trueColor: Color;
  private readonly falseColor: Color;

  constructor(context: AnimationContext, params: BooleanIndicatorParams) {
    requireParams({ params });
    requireParams({ supplier: params.supplier, trueColor: params.trueColor, falseColor: params.falseColor });
    super(context);
    this.supplier = params.supplier;
    this.trueColor = params.trueColor;
    this.falseColor = params.falseColor;
  }

  protected draw(): void {
    this.fill(this.supplier() ? this.trueColor : this.falseColor);
  }
}
