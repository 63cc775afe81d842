import type { Color } from './Color';
import type { VendorAnimation } from '../engine/vendor';
import { assertPixelCount, clipRange, type DeviceSink, type StripType } from './DeviceSink';

/** Whatever carries commands to the physical controller (MQTT bridge in production) */
export interface LedTransport {
  setLeds(color: Color, start: number, count: number): void;
  animate(animation: VendorAnimation): void;
  configure(stripType: StripType): void;
}

export class HardwareSink implements DeviceSink {
  readonly pixelCount: number;
  private transport: LedTransport;

  constructor(transport: LedTransport, pixelCount: number, stripType: StripType) {
    assertPixelCount(pixelCount);
    this.transport = transport;
    this.pixelCount = pixelCount;
    this.transport.configure(stripType);
  }

  writePixels(start: number, count: number, color: Color): void {
    const range = clipRange(start, count, this.pixelCount);
    if (!range) return;
    this.transport.setLeds(color, range.start, range.count);
  }

  writeAll(color: Color): void {
    this.writePixels(0, this.pixelCount, color);
  }

  animate(animation: VendorAnimation): void {
    this.transport.animate(animation);
  }
}
