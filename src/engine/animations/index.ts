import type { Color } from '../../core/Color';
import { requireParams } from '../../core/errors';
import type { AnimationContext } from '../Animation';
import { Breathe, type BreatheParams } from './Breathe';
import { Countdown, type CountdownParams } from './Countdown';
import { BooleanIndicator, type BooleanIndicatorParams } from './BooleanIndicator';
import { StateIndicator, type EnumState } from './StateIndicator';
import { RangeValue, type RangeValueParams } from './RangeValue';

export { Breathe, breathScale } from './Breathe';
export type { BreatheParams } from './Breathe';
export { Countdown } from './Countdown';
export type { CountdownParams } from './Countdown';
export { BooleanIndicator } from './BooleanIndicator';
export type { BooleanIndicatorParams } from './BooleanIndicator';
export { StateIndicator } from './StateIndicator';
export type { EnumState, StateIndicatorParams } from './StateIndicator';
export { RangeValue } from './RangeValue';
export type { RangeValueParams } from './RangeValue';

/** The computed animations. No other kind exists. */
export type CoreAnimation = Breathe | Countdown | BooleanIndicator | StateIndicator | RangeValue;

export type AnimationSpec =
  | ({ kind: 'breathe' } & BreatheParams)
  | ({ kind: 'countdown' } & CountdownParams)
  | ({ kind: 'boolean' } & BooleanIndicatorParams)
  | { kind: 'state'; supplier: () => EnumState; colors: readonly Color[]; states?: readonly EnumState[] }
  | ({ kind: 'range' } & RangeValueParams);

export function createAnimation(context: AnimationContext, spec: AnimationSpec): CoreAnimation {
  requireParams({ spec });
  switch (spec.kind) {
    case 'breathe':
      return new Breathe(context, spec);
    case 'countdown':
      return new Countdown(context, spec);
    case 'boolean':
      return new BooleanIndicator(context, spec);
    case 'state':
      return new StateIndicator(context, spec);
    case 'range':
      return new RangeValue(context, spec);
  }
}
