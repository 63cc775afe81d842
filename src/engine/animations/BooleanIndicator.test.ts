import { describe, expect, it } from 'vitest';
import { Colors } from '../../core/Color';
import { createRig, pixelsOf, repeat } from '../../testing/fakes';
import { BooleanIndicator } from './BooleanIndicator';

describe('BooleanIndicator', () => {
  it('shows the color for the current reading', () => {
    const rig = createRig(5);
    let hasPiece = false;
    const indicator = new BooleanIndicator(rig.context, {
      supplier: () => hasPiece,
      trueColor: Colors.GREEN,
      falseColor: Colors.RED,
    });

    indicator.run();
    rig.scheduler.tick();
    expect(pixelsOf(rig.device)).toEqual(repeat('255,0,0', 5));

    hasPiece = true;
    rig.scheduler.tick();
    expect(pixelsOf(rig.device)).toEqual(repeat('0,255,0', 5));
    expect(indicator.isRunning()).toBe(true);
  });
});
