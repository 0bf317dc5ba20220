import { ProtocolError } from '../lib/errors.js';
import { ByteReader, NeedMoreData } from './byteReader.js';
import { ServerMessageType } from './constants.js';
import { decoderFor, type RectHeader } from './encodings.js';
import type { PixelDecoder } from './pixelFormat.js';
import type { ColourMapEntry, DecodeResult, DecodedMessage, FrameRegion, ServerMessage } from './types.js';

export interface DecodeContext {
  width: number;
  height: number;
  pixels: PixelDecoder;
}

const RECT_HEADER_LENGTH = 12;

const readRectHeader = (reader: ByteReader): RectHeader => {
  reader.ensure(RECT_HEADER_LENGTH);
  return {
    x: reader.u16(),
    y: reader.u16(),
    width: reader.u16(),
    height: reader.u16(),
    encoding: reader.s32(),
  };
};

const assertWithinFramebuffer = (rect: RectHeader, ctx: DecodeContext): void => {
  if (rect.x + rect.width > ctx.width || rect.y + rect.height > ctx.height) {
    throw new ProtocolError(
      `Rectangle ${rect.width}x${rect.height}+${rect.x}+${rect.y} exceeds the ${ctx.width}x${ctx.height} framebuffer`,
    );
  }
};

function decodeFramebufferUpdate(bytes: Uint8Array, ctx: DecodeContext): DecodedMessage {
  // First pass only measures, so a partially received update costs no pixel conversion.
  const measure = new ByteReader(bytes, 2);
  const count = measure.u16();
  for (let i = 0; i < count; i += 1) {
    const rect = readRectHeader(measure);
    const decoder = decoderFor(rect.encoding);
    assertWithinFramebuffer(rect, ctx);
    decoder.skip(measure, rect, ctx.pixels);
  }

  const reader = new ByteReader(bytes, 4);
  const regions: FrameRegion[] = [];
  for (let i = 0; i < count; i += 1) {
    const rect = readRectHeader(reader);
    const decoder = decoderFor(rect.encoding);
    const payload = decoder.decode(reader, rect, ctx.pixels);
    if (payload.kind === 'copy' && (payload.srcX + rect.width > ctx.width || payload.srcY + rect.height > ctx.height)) {
      throw new ProtocolError(`CopyRect source ${payload.srcX},${payload.srcY} lies outside the framebuffer`);
    }
    regions.push({
      x: rect.x,
      y: rect.y,
      width: rect.width,
      height: rect.height,
      encoding: decoder.name,
      payload,
    });
  }
  return { message: { type: 'framebuffer_update', regions }, bytesRead: reader.offset };
}

function decodeColourMap(reader: ByteReader): ServerMessage {
  reader.skip(1);
  const firstColour = reader.u16();
  const count = reader.u16();
  reader.ensure(count * 6);
  const colours: ColourMapEntry[] = [];
  for (let i = 0; i < count; i += 1) {
    colours.push({ red: reader.u16(), green: reader.u16(), blue: reader.u16() });
  }
  return { type: 'set_colour_map_entries', firstColour, colours };
}

function decodeCutText(reader: ByteReader): ServerMessage {
  reader.skip(3);
  const length = reader.u32();
  const text = Buffer.from(reader.take(length)).toString('latin1');
  return { type: 'server_cut_text', text };
}

/**
 * Decodes one server-to-client message from the start of `bytes`. While the
 * message is incomplete the result says how long the span must grow before
 * another attempt can get further; throws ProtocolError on data that can
 * never become valid.
 */
export function readServerMessage(bytes: Uint8Array, ctx: DecodeContext): DecodeResult {
  if (bytes.byteLength === 0) {
    return { message: null, bytesNeeded: 1 };
  }
  try {
    const type = bytes[0];
    switch (type) {
      case ServerMessageType.FramebufferUpdate:
        return decodeFramebufferUpdate(bytes, ctx);
      case ServerMessageType.SetColourMapEntries: {
        const reader = new ByteReader(bytes, 1);
        return { message: decodeColourMap(reader), bytesRead: reader.offset };
      }
      case ServerMessageType.Bell:
        return { message: { type: 'bell' }, bytesRead: 1 };
      case ServerMessageType.ServerCutText: {
        const reader = new ByteReader(bytes, 1);
        return { message: decodeCutText(reader), bytesRead: reader.offset };
      }
      default:
        throw new ProtocolError(`Unknown server message type ${type}`);
    }
  } catch (error) {
    if (error instanceof NeedMoreData) {
      return { message: null, bytesNeeded: bytes.byteLength + error.needed };
    }
    throw error;
  }
}

/** Like `readServerMessage`, with null for an incomplete message. */
export function decodeServerMessage(bytes: Uint8Array, ctx: DecodeContext): DecodedMessage | null {
  const result = readServerMessage(bytes, ctx);
  return result.message === null ? null : result;
}
