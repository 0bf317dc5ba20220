import { ClientMessageType } from './constants.js';
import { PIXEL_FORMAT_LENGTH, writePixelFormat, type PixelFormat } from './pixelFormat.js';
import type { InputEvent } from './types.js';

const message = (length: number): { bytes: Uint8Array; view: DataView } => {
  const bytes = new Uint8Array(length);
  return { bytes, view: new DataView(bytes.buffer) };
};

export function encodeSetPixelFormat(format: PixelFormat): Uint8Array {
  const { bytes } = message(4 + PIXEL_FORMAT_LENGTH);
  bytes[0] = ClientMessageType.SetPixelFormat;
  writePixelFormat(format, bytes, 4);
  return bytes;
}

export function encodeSetEncodings(encodings: readonly number[]): Uint8Array {
  const { bytes, view } = message(4 + encodings.length * 4);
  bytes[0] = ClientMessageType.SetEncodings;
  view.setUint16(2, encodings.length);
  encodings.forEach((encoding, index) => view.setInt32(4 + index * 4, encoding));
  return bytes;
}

export interface UpdateArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function encodeFramebufferUpdateRequest(incremental: boolean, area: UpdateArea): Uint8Array {
  const { bytes, view } = message(10);
  bytes[0] = ClientMessageType.FramebufferUpdateRequest;
  bytes[1] = incremental ? 1 : 0;
  view.setUint16(2, area.x);
  view.setUint16(4, area.y);
  view.setUint16(6, area.width);
  view.setUint16(8, area.height);
  return bytes;
}

export function encodeKeyEvent(keysym: number, down: boolean): Uint8Array {
  const { bytes, view } = message(8);
  bytes[0] = ClientMessageType.KeyEvent;
  bytes[1] = down ? 1 : 0;
  view.setUint32(4, keysym >>> 0);
  return bytes;
}

export function encodePointerEvent(x: number, y: number, buttonMask: number): Uint8Array {
  const { bytes, view } = message(6);
  bytes[0] = ClientMessageType.PointerEvent;
  bytes[1] = buttonMask & 0xff;
  view.setUint16(2, x);
  view.setUint16(4, y);
  return bytes;
}

export function encodeClientCutText(text: string): Uint8Array {
  const body = Buffer.from(text, 'latin1');
  const { bytes, view } = message(8 + body.byteLength);
  bytes[0] = ClientMessageType.ClientCutText;
  view.setUint32(4, body.byteLength);
  bytes.set(body, 8);
  return bytes;
}

export function encodeInputEvent(event: InputEvent): Uint8Array {
  switch (event.kind) {
    case 'pointer_move':
      return encodePointerEvent(event.x, event.y, event.buttonMask);
    case 'key':
      return encodeKeyEvent(event.keycode, event.down);
  }
}
