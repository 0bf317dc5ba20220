import {
  encodeClientCutText,
  encodeFramebufferUpdateRequest,
  encodeInputEvent,
  encodeSetEncodings,
  encodeSetPixelFormat,
} from './clientMessages.js';
import { SUPPORTED_ENCODINGS } from './encodings.js';
import { PREFERRED_ENCODINGS } from './constants.js';
import { PixelDecoder, type PixelFormat } from './pixelFormat.js';
import { decodeServerMessage, readServerMessage, type DecodeContext } from './serverMessages.js';
import type { DecodeResult, DecodedMessage, InputEvent } from './types.js';

export interface CodecParameters {
  width: number;
  height: number;
  pixelFormat: PixelFormat;
  encodings?: readonly number[];
}

/**
 * Wire codec for one negotiated connection. Holds only the parameters fixed
 * at handshake time and performs no I/O.
 */
export class RfbCodec {
  readonly width: number;
  readonly height: number;
  readonly pixelFormat: Readonly<PixelFormat>;
  readonly encodings: readonly number[];
  private readonly pixels: PixelDecoder;

  constructor(params: CodecParameters) {
    this.width = params.width;
    this.height = params.height;
    this.pixelFormat = Object.freeze({ ...params.pixelFormat });
    this.encodings = (params.encodings ?? PREFERRED_ENCODINGS).filter((encoding) =>
      SUPPORTED_ENCODINGS.includes(encoding),
    );
    this.pixels = new PixelDecoder(this.pixelFormat);
  }

  decodeServerMessage(bytes: Uint8Array): DecodedMessage | null {
    return decodeServerMessage(bytes, this.context());
  }

  /** Like `decodeServerMessage`, but an incomplete message reports the span length it needs. */
  readServerMessage(bytes: Uint8Array): DecodeResult {
    return readServerMessage(bytes, this.context());
  }

  encodeSetPixelFormat(): Uint8Array {
    return encodeSetPixelFormat(this.pixelFormat);
  }

  encodeSetEncodings(): Uint8Array {
    return encodeSetEncodings(this.encodings);
  }

  encodeUpdateRequest(incremental: boolean): Uint8Array {
    return encodeFramebufferUpdateRequest(incremental, { x: 0, y: 0, width: this.width, height: this.height });
  }

  /** Pointer coordinates are clamped to the framebuffer. */
  encodeInput(event: InputEvent): Uint8Array {
    if (event.kind === 'pointer_move') {
      return encodeInputEvent({
        ...event,
        x: clamp(Math.round(event.x), 0, this.width - 1),
        y: clamp(Math.round(event.y), 0, this.height - 1),
      });
    }
    return encodeInputEvent(event);
  }

  encodeClipboard(text: string): Uint8Array {
    return encodeClientCutText(text);
  }

  private context(): DecodeContext {
    return { width: this.width, height: this.height, pixels: this.pixels };
  }
}

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));
