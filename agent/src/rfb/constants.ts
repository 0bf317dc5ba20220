export const ClientMessageType = {
  SetPixelFormat: 0,
  SetEncodings: 2,
  FramebufferUpdateRequest: 3,
  KeyEvent: 4,
  PointerEvent: 5,
  ClientCutText: 6,
} as const;

export const ServerMessageType = {
  FramebufferUpdate: 0,
  SetColourMapEntries: 1,
  Bell: 2,
  ServerCutText: 3,
} as const;

export const Encoding = {
  Raw: 0,
  CopyRect: 1,
  RRE: 2,
  Hextile: 5,
} as const;

export type EncodingName = 'raw' | 'copy_rect' | 'rre' | 'hextile';

export const SecurityType = {
  Invalid: 0,
  None: 1,
  VncAuthentication: 2,
} as const;

export const HextileFlag = {
  Raw: 1,
  BackgroundSpecified: 2,
  ForegroundSpecified: 4,
  AnySubrects: 8,
  SubrectsColoured: 16,
} as const;

export const HEXTILE_SIZE = 16;

export const ButtonMask = {
  Left: 1,
  Middle: 2,
  Right: 4,
  WheelUp: 8,
  WheelDown: 16,
} as const;

/** Encodings advertised in SetEncodings, most preferred first. */
export const PREFERRED_ENCODINGS: readonly number[] = [
  Encoding.CopyRect,
  Encoding.Hextile,
  Encoding.RRE,
  Encoding.Raw,
];
