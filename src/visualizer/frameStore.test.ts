import { describe, expect, it } from 'vitest';
import { Colors } from '../core/Color';
import { asFrameSink, createFrameStore } from './frameStore';
import { renderAnsi } from './ansi';

describe('frameStore', () => {
  it('starts dark', () => {
    const store = createFrameStore(3);
    expect(store.getState().frame).toEqual([Colors.OFF, Colors.OFF, Colors.OFF]);
    expect(store.getState().frameCount).toBe(0);
    expect(store.getState().statusLabel).toBe('');
  });

  it('keeps the latest frame and label pushed through the sink', () => {
    const store = createFrameStore(2);
    const sink = asFrameSink(store);
    const seen: number[] = [];
    store.subscribe((state) => seen.push(state.frameCount));

    sink.pushFrame([Colors.RED, Colors.OFF]);
    sink.pushFrame([Colors.RED, Colors.BLUE]);
    sink.setStatusLabel('Fire @ 0-2');

    expect(store.getState().frame).toEqual([Colors.RED, Colors.BLUE]);
    expect(store.getState().statusLabel).toBe('Fire @ 0-2');
    expect(seen).toEqual([1, 2, 2]);
  });
});

describe('renderAnsi', () => {
  it('prints one truecolor dot per LED and resets', () => {
    expect(renderAnsi([Colors.RED, Colors.OFF])).toBe('\x1b[38;2;255;0;0m●\x1b[38;2;0;0;0m●\x1b[0m');
  });
});
