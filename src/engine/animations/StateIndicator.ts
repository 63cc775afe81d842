import { Colors, type Color } from '../../core/Color';
import { requireParams } from '../../core/errors';
import { AnimationLifecycle, type AnimationContext } from '../Animation';

/**
 * Anything with a position in an ordered set of states.
 * A numeric enum member is its own ordinal; string states are looked up in
 * the `states` list given to the indicator.
 */
export type EnumState = number | string | { readonly ordinal: number };

export interface StateIndicatorParams<S extends EnumState> {
  supplier: () => S;
  colors: readonly Color[];
  states?: readonly S[];
}

export class StateIndicator<S extends EnumState = EnumState> extends AnimationLifecycle {
  readonly kind = 'state' as const;

  private readonly supplier: () => S;
  private readonly colors: readonly Color[];
  private readonly states: readonly S[] | undefined;

  constructor(context: AnimationContext, params: StateIndicatorParams<S>) {
    requireParams({ params });
    requireParams({ supplier: params.supplier, colors: params.colors });
    super(context);
    this.supplier = params.supplier;
    this.colors = [...params.colors];
    this.states = params.states ? [...params.states] : undefined;
  }

  /** Color for a state: colors[ordinal mod length], OFF when there are no colors */
  colorFor(state: S): Color {
    const k = this.colors.length;
    if (k === 0) return Colors.OFF;
    const ordinal = this.ordinalOf(state);
    return this.colors[((ordinal % k) + k) % k];
  }

  protected draw(): void {
    this.fill(this.colorFor(this.supplier()));
  }

  private ordinalOf(state: S): number {
    const value: EnumState = state;
    if (typeof value === 'number' || typeof value === 'object') {
      const ordinal = typeof value === 'number' ? value : value.ordinal;
      if (!Number.isFinite(ordinal)) {
        throw new RangeError(`State ordinal must be a finite number, got ${ordinal}`);
      }
      return Math.trunc(ordinal);
    }

    const index = this.states ? this.states.indexOf(state) : -1;
    if (index < 0) {
      throw new RangeError(`Unknown state "${value}": pass the ordered state list to resolve it`);
    }
    return index;
  }
}
