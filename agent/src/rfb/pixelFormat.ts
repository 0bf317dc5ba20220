import { ProtocolError } from '../lib/errors.js';
import type { ByteReader } from './byteReader.js';

export interface PixelFormat {
  bitsPerPixel: number;
  depth: number;
  bigEndian: boolean;
  trueColour: boolean;
  redMax: number;
  greenMax: number;
  blueMax: number;
  redShift: number;
  greenShift: number;
  blueShift: number;
}

export const PIXEL_FORMAT_LENGTH = 16;

/** 32bpp little-endian true colour, what the client asks every server for. */
export const CLIENT_PIXEL_FORMAT: Readonly<PixelFormat> = Object.freeze({
  bitsPerPixel: 32,
  depth: 24,
  bigEndian: false,
  trueColour: true,
  redMax: 255,
  greenMax: 255,
  blueMax: 255,
  redShift: 16,
  greenShift: 8,
  blueShift: 0,
});

export function readPixelFormat(reader: ByteReader): PixelFormat {
  const format: PixelFormat = {
    bitsPerPixel: reader.u8(),
    depth: reader.u8(),
    bigEndian: reader.u8() !== 0,
    trueColour: reader.u8() !== 0,
    redMax: reader.u16(),
    greenMax: reader.u16(),
    blueMax: reader.u16(),
    redShift: reader.u8(),
    greenShift: reader.u8(),
    blueShift: reader.u8(),
  };
  reader.skip(3);
  return format;
}

export function writePixelFormat(format: PixelFormat, target: Uint8Array, offset: number): void {
  const view = new DataView(target.buffer, target.byteOffset, target.byteLength);
  view.setUint8(offset, format.bitsPerPixel);
  view.setUint8(offset + 1, format.depth);
  view.setUint8(offset + 2, format.bigEndian ? 1 : 0);
  view.setUint8(offset + 3, format.trueColour ? 1 : 0);
  view.setUint16(offset + 4, format.redMax);
  view.setUint16(offset + 6, format.greenMax);
  view.setUint16(offset + 8, format.blueMax);
  view.setUint8(offset + 10, format.redShift);
  view.setUint8(offset + 11, format.greenShift);
  view.setUint8(offset + 12, format.blueShift);
}

export function assertSupportedPixelFormat(format: PixelFormat): void {
  if (![8, 16, 32].includes(format.bitsPerPixel)) {
    throw new ProtocolError(`Unsupported bits-per-pixel ${format.bitsPerPixel}`);
  }
  if (!format.trueColour) {
    throw new ProtocolError('Colour-map pixel formats are not supported');
  }
  if (format.redMax === 0 || format.greenMax === 0 || format.blueMax === 0) {
    throw new ProtocolError('Pixel format has a zero colour maximum');
  }
}

const scale = (value: number, max: number): number => (max === 255 ? value : Math.round((value * 255) / max));

/**
 * Converts wire pixels in the negotiated format to RGBA. Colours are passed
 * around packed as 0xRRGGBB.
 */
export class PixelDecoder {
  readonly bytesPerPixel: number;

  constructor(private readonly format: PixelFormat) {
    assertSupportedPixelFormat(format);
    this.bytesPerPixel = format.bitsPerPixel / 8;
  }

  readColour(reader: ByteReader): number {
    const raw = this.readRaw(reader.take(this.bytesPerPixel), 0);
    return this.toRgb(raw);
  }

  /** Decodes `count` consecutive pixels into `target` as RGBA starting at `targetOffset`. */
  readPixels(reader: ByteReader, count: number, target: Uint8Array, targetOffset: number): void {
    const source = reader.take(count * this.bytesPerPixel);
    let out = targetOffset;
    for (let i = 0; i < count; i += 1) {
      const rgb = this.toRgb(this.readRaw(source, i * this.bytesPerPixel));
      target[out] = (rgb >>> 16) & 0xff;
      target[out + 1] = (rgb >>> 8) & 0xff;
      target[out + 2] = rgb & 0xff;
      target[out + 3] = 0xff;
      out += 4;
    }
  }

  private readRaw(source: Uint8Array, offset: number): number {
    switch (this.bytesPerPixel) {
      case 1:
        return source[offset];
      case 2:
        return this.format.bigEndian
          ? (source[offset] << 8) | source[offset + 1]
          : source[offset] | (source[offset + 1] << 8);
      default:
        return this.format.bigEndian
          ? ((source[offset] << 24) | (source[offset + 1] << 16) | (source[offset + 2] << 8) | source[offset + 3]) >>> 0
          : (source[offset] | (source[offset + 1] << 8) | (source[offset + 2] << 16) | (source[offset + 3] << 24)) >>> 0;
    }
  }

  private toRgb(raw: number): number {
    const f = this.format;
    const r = scale((raw >>> f.redShift) & f.redMax, f.redMax);
    const g = scale((raw >>> f.greenShift) & f.greenMax, f.greenMax);
    const b = scale((raw >>> f.blueShift) & f.blueMax, f.blueMax);
    return (r << 16) | (g << 8) | b;
  }
}
