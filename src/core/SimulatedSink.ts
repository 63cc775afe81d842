// In-memory strip standing in for the controller when running in simulation
import { Colors, type Color } from './Color';
import type { VendorAnimation } from '../engine/vendor';
import { assertPixelCount, clipRange, type DeviceSink, type RunMode } from './DeviceSink';
import { SimulationContextError } from './errors';

/** Receives rendered frames; the visualizer lives behind this */
export interface FrameSink {
  pushFrame(colors: readonly Color[]): void;
  setStatusLabel(text: string): void;
}

export class SimulatedSink implements DeviceSink {
  readonly pixelCount: number;
  private visualizer: FrameSink;

  // Current pixel state, one entry per LED
  private frame: Color[];

  constructor(mode: RunMode, pixelCount: number, visualizer: FrameSink) {
    if (mode !== 'simulation') {
      throw new SimulationContextError(mode);
    }
    assertPixelCount(pixelCount);
    this.pixelCount = pixelCount;
    this.visualizer = visualizer;
    this.frame = new Array<Color>(pixelCount).fill(Colors.OFF);
  }

  writePixels(start: number, count: number, color: Color): void {
    const range = clipRange(start, count, this.pixelCount);
    if (!range) return;
    this.frame.fill(color, range.start, range.start + range.count);
    // One frame per write, as the controller would show it; a split draw
    // pushes its lit part before the remainder
    this.render();
  }

  writeAll(color: Color): void {
    this.writePixels(0, this.pixelCount, color);
  }

  animate(animation: VendorAnimation): void {
    const end = animation.ledOffset + animation.ledCount;
    this.visualizer.setStatusLabel(`${animation.type} @ ${animation.ledOffset}-${end}`);
  }

  getPixel(index: number): Color {
    return this.frame[index] ?? Colors.OFF;
  }

  getFrame(): readonly Color[] {
    return this.frame.slice();
  }

  private render(): void {
    this.visualizer.pushFrame(this.frame.slice());
  }
}
