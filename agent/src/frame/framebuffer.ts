import { ProtocolError } from '../lib/errors.js';
import type { FrameRegion } from '../rfb/types.js';

export interface FrameSnapshot {
  width: number;
  height: number;
  /** RGBA, row-major, `width * height * 4` bytes. */
  pixels: Uint8Array;
  version: number;
}

/** Fixed-size RGBA image. Dimensions never change after construction. */
export class Framebuffer {
  readonly pixels: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.pixels = new Uint8Array(width * height * 4);
  }

  /** Throws ProtocolError when the region cannot be applied to this image. */
  validate(region: FrameRegion): void {
    const { x, y, width, height, payload } = region;
    if (x + width > this.width || y + height > this.height) {
      throw new ProtocolError(`Region ${width}x${height}+${x}+${y} exceeds the ${this.width}x${this.height} framebuffer`);
    }
    if (payload.kind === 'pixels' && payload.rgba.byteLength !== width * height * 4) {
      throw new ProtocolError(`Region ${width}x${height} carries ${payload.rgba.byteLength} bytes of pixel data`);
    }
    if (payload.kind === 'copy' && (payload.srcX + width > this.width || payload.srcY + height > this.height)) {
      throw new ProtocolError(`Copy source ${payload.srcX},${payload.srcY} lies outside the framebuffer`);
    }
  }

  apply(region: FrameRegion): void {
    this.validate(region);
    const { x, y, width, height, payload } = region;
    const rowBytes = width * 4;

    if (payload.kind === 'pixels') {
      for (let row = 0; row < height; row += 1) {
        this.pixels.set(payload.rgba.subarray(row * rowBytes, (row + 1) * rowBytes), ((y + row) * this.width + x) * 4);
      }
      return;
    }

    const { srcX, srcY } = payload;
    // copyWithin handles overlap; walk rows in the direction that reads each source row before it is overwritten.
    const downward = srcY < y;
    for (let i = 0; i < height; i += 1) {
      const row = downward ? height - 1 - i : i;
      const from = ((srcY + row) * this.width + srcX) * 4;
      const to = ((y + row) * this.width + x) * 4;
      this.pixels.copyWithin(to, from, from + rowBytes);
    }
  }

  pixelAt(px: number, py: number): [number, number, number, number] {
    const offset = (py * this.width + px) * 4;
    return [this.pixels[offset], this.pixels[offset + 1], this.pixels[offset + 2], this.pixels[offset + 3]];
  }
}
