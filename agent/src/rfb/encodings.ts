import { ProtocolError } from '../lib/errors.js';
import type { ByteReader } from './byteReader.js';
import { Encoding, HEXTILE_SIZE, HextileFlag, type EncodingName } from './constants.js';
import type { PixelDecoder } from './pixelFormat.js';
import type { RegionPayload } from './types.js';

export interface RectHeader {
  x: number;
  y: number;
  width: number;
  height: number;
  encoding: number;
}

/**
 * Each decoder is used twice per message: `skip` walks a rectangle body
 * without converting pixels, to find out whether the whole message has
 * arrived, and `decode` then converts it.
 */
export interface RectDecoder {
  readonly name: EncodingName;
  skip(reader: ByteReader, rect: RectHeader, pixels: PixelDecoder): void;
  decode(reader: ByteReader, rect: RectHeader, pixels: PixelDecoder): RegionPayload;
}

const fill = (target: Uint8Array, stride: number, x: number, y: number, w: number, h: number, rgb: number): void => {
  const r = (rgb >>> 16) & 0xff;
  const g = (rgb >>> 8) & 0xff;
  const b = rgb & 0xff;
  for (let row = y; row < y + h; row += 1) {
    let offset = (row * stride + x) * 4;
    for (let col = 0; col < w; col += 1) {
      target[offset] = r;
      target[offset + 1] = g;
      target[offset + 2] = b;
      target[offset + 3] = 0xff;
      offset += 4;
    }
  }
};

const rawDecoder: RectDecoder = {
  name: 'raw',
  skip(reader, rect, pixels) {
    reader.skip(rect.width * rect.height * pixels.bytesPerPixel);
  },
  decode(reader, rect, pixels) {
    const rgba = new Uint8Array(rect.width * rect.height * 4);
    pixels.readPixels(reader, rect.width * rect.height, rgba, 0);
    return { kind: 'pixels', rgba };
  },
};

const copyRectDecoder: RectDecoder = {
  name: 'copy_rect',
  skip(reader) {
    reader.skip(4);
  },
  decode(reader) {
    const srcX = reader.u16();
    const srcY = reader.u16();
    return { kind: 'copy', srcX, srcY };
  },
};

const rreDecoder: RectDecoder = {
  name: 'rre',
  skip(reader, _rect, pixels) {
    const count = reader.u32();
    reader.skip(pixels.bytesPerPixel + count * (pixels.bytesPerPixel + 8));
  },
  decode(reader, rect, pixels) {
    const count = reader.u32();
    const background = pixels.readColour(reader);
    const rgba = new Uint8Array(rect.width * rect.height * 4);
    fill(rgba, rect.width, 0, 0, rect.width, rect.height, background);
    for (let i = 0; i < count; i += 1) {
      const colour = pixels.readColour(reader);
      const x = reader.u16();
      const y = reader.u16();
      const w = reader.u16();
      const h = reader.u16();
      if (x + w > rect.width || y + h > rect.height) {
        throw new ProtocolError(`RRE subrectangle ${w}x${h}+${x}+${y} exceeds its ${rect.width}x${rect.height} rectangle`);
      }
      fill(rgba, rect.width, x, y, w, h, colour);
    }
    return { kind: 'pixels', rgba };
  },
};

const forEachTile = (rect: RectHeader, visit: (tx: number, ty: number, tw: number, th: number) => void): void => {
  for (let ty = 0; ty < rect.height; ty += HEXTILE_SIZE) {
    const th = Math.min(HEXTILE_SIZE, rect.height - ty);
    for (let tx = 0; tx < rect.width; tx += HEXTILE_SIZE) {
      visit(tx, ty, Math.min(HEXTILE_SIZE, rect.width - tx), th);
    }
  }
};

const hextileDecoder: RectDecoder = {
  name: 'hextile',
  skip(reader, rect, pixels) {
    const bpp = pixels.bytesPerPixel;
    forEachTile(rect, (_tx, _ty, tw, th) => {
      const flags = reader.u8();
      if (flags & HextileFlag.Raw) {
        reader.skip(tw * th * bpp);
        return;
      }
      if (flags & HextileFlag.BackgroundSpecified) reader.skip(bpp);
      if (flags & HextileFlag.ForegroundSpecified) reader.skip(bpp);
      if (flags & HextileFlag.AnySubrects) {
        const count = reader.u8();
        reader.skip(count * ((flags & HextileFlag.SubrectsColoured ? bpp : 0) + 2));
      }
    });
  },
  decode(reader, rect, pixels) {
    const rgba = new Uint8Array(rect.width * rect.height * 4);
    let background: number | undefined;
    let foreground: number | undefined;

    forEachTile(rect, (tx, ty, tw, th) => {
      const flags = reader.u8();
      if (flags & HextileFlag.Raw) {
        const tile = new Uint8Array(tw * th * 4);
        pixels.readPixels(reader, tw * th, tile, 0);
        for (let row = 0; row < th; row += 1) {
          rgba.set(tile.subarray(row * tw * 4, (row + 1) * tw * 4), ((ty + row) * rect.width + tx) * 4);
        }
        return;
      }

      if (flags & HextileFlag.BackgroundSpecified) background = pixels.readColour(reader);
      if (flags & HextileFlag.ForegroundSpecified) foreground = pixels.readColour(reader);
      if (background === undefined) {
        throw new ProtocolError(`Hextile tile at ${tx},${ty} has no background colour`);
      }
      fill(rgba, rect.width, tx, ty, tw, th, background);

      if (!(flags & HextileFlag.AnySubrects)) return;
      const count = reader.u8();
      const coloured = (flags & HextileFlag.SubrectsColoured) !== 0;
      for (let i = 0; i < count; i += 1) {
        const colour = coloured ? pixels.readColour(reader) : foreground;
        if (colour === undefined) {
          throw new ProtocolError(`Hextile tile at ${tx},${ty} has subrectangles but no foreground colour`);
        }
        const xy = reader.u8();
        const wh = reader.u8();
        const sx = xy >> 4;
        const sy = xy & 0x0f;
        const sw = (wh >> 4) + 1;
        const sh = (wh & 0x0f) + 1;
        if (sx + sw > tw || sy + sh > th) {
          throw new ProtocolError(`Hextile subrectangle ${sw}x${sh}+${sx}+${sy} exceeds its ${tw}x${th} tile`);
        }
        fill(rgba, rect.width, tx + sx, ty + sy, sw, sh, colour);
      }
    });
    return { kind: 'pixels', rgba };
  },
};

const DECODERS = new Map<number, RectDecoder>([
  [Encoding.Raw, rawDecoder],
  [Encoding.CopyRect, copyRectDecoder],
  [Encoding.RRE, rreDecoder],
  [Encoding.Hextile, hextileDecoder],
]);

export function decoderFor(encoding: number): RectDecoder {
  const decoder = DECODERS.get(encoding);
  if (!decoder) {
    throw new ProtocolError(`Unsupported rectangle encoding ${encoding}`);
  }
  return decoder;
}

export const SUPPORTED_ENCODINGS: readonly number[] = Array.from(DECODERS.keys());
