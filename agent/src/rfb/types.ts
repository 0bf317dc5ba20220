import type { EncodingName } from './constants.js';
import type { PixelFormat } from './pixelFormat.js';

export interface ProtocolVersion {
  major: number;
  minor: number;
}

export interface ServerInit {
  width: number;
  height: number;
  pixelFormat: PixelFormat;
  name: string;
}

export type RegionPayload =
  | { kind: 'pixels'; rgba: Uint8Array }
  | { kind: 'copy'; srcX: number; srcY: number };

/** One decoded rectangle, ready to be applied to the framebuffer. */
export interface FrameRegion {
  x: number;
  y: number;
  width: number;
  height: number;
  encoding: EncodingName;
  payload: RegionPayload;
}

export type InputEvent =
  | { kind: 'pointer_move'; x: number; y: number; buttonMask: number }
  | { kind: 'key'; keycode: number; down: boolean };

export interface ColourMapEntry {
  red: number;
  green: number;
  blue: number;
}

export type ServerMessage =
  | { type: 'framebuffer_update'; regions: FrameRegion[] }
  | { type: 'set_colour_map_entries'; firstColour: number; colours: ColourMapEntry[] }
  | { type: 'bell' }
  | { type: 'server_cut_text'; text: string };

export interface DecodedMessage {
  message: ServerMessage;
  bytesRead: number;
}

/** A message that has not fully arrived; `bytesNeeded` counts from the start of the span. */
export interface PartialMessage {
  message: null;
  bytesNeeded: number;
}

export type DecodeResult = DecodedMessage | PartialMessage;
