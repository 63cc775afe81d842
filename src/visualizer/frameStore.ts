/**
 * Frame Store
 * Latest simulated frame and status label, readable from React and from plain code
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { Colors, type Color } from '../core/Color';
import type { FrameSink } from '../core/SimulatedSink';

export interface FrameState {
  frame: readonly Color[];
  statusLabel: string;
  frameCount: number;

  // Actions
  pushFrame: (colors: readonly Color[]) => void;
  setStatusLabel: (text: string) => void;
}

export type FrameStore = StoreApi<FrameState>;

export function createFrameStore(pixelCount: number = 0): FrameStore {
  return createStore<FrameState>((set) => ({
    frame: new Array<Color>(pixelCount).fill(Colors.OFF),
    statusLabel: '',
    frameCount: 0,

    pushFrame: (colors: readonly Color[]) =>
      set((state) => ({
        frame: colors,
        frameCount: state.frameCount + 1,
      })),

    setStatusLabel: (text: string) => set({ statusLabel: text }),
  }));
}

/** Adapt a store to the sink interface the simulated device writes into */
export function asFrameSink(store: FrameStore): FrameSink {
  return {
    pushFrame: (colors) => store.getState().pushFrame(colors),
    setStatusLabel: (text) => store.getState().setStatusLabel(text),
  };
}
