import { HandshakeError } from '../lib/errors.js';
import { ByteReader } from './byteReader.js';
import { readPixelFormat } from './pixelFormat.js';
import type { ProtocolVersion, ServerInit } from './types.js';

export const PROTOCOL_VERSION_LENGTH = 12;
export const SERVER_INIT_HEADER_LENGTH = 24;

const VERSION_PATTERN = /^RFB (\d{3})\.(\d{3})\n$/;

export function parseProtocolVersion(bytes: Uint8Array): ProtocolVersion {
  const text = Buffer.from(bytes).toString('latin1');
  const match = VERSION_PATTERN.exec(text);
  if (!match) {
    throw new HandshakeError(`Not an RFB server: unexpected greeting ${JSON.stringify(text)}`);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

/**
 * Highest version this client speaks that does not exceed the server's.
 * 3.5 and other unofficial minors behave as 3.3.
 */
export function negotiateVersion(server: ProtocolVersion): ProtocolVersion {
  if (server.major > 3) {
    return { major: 3, minor: 8 };
  }
  if (server.major < 3 || server.minor < 3) {
    throw new HandshakeError(`Unsupported RFB version ${server.major}.${server.minor}`);
  }
  if (server.minor >= 8) return { major: 3, minor: 8 };
  if (server.minor === 7) return { major: 3, minor: 7 };
  return { major: 3, minor: 3 };
}

export function encodeProtocolVersion(version: ProtocolVersion): Uint8Array {
  const text = `RFB ${String(version.major).padStart(3, '0')}.${String(version.minor).padStart(3, '0')}\n`;
  return new Uint8Array(Buffer.from(text, 'latin1'));
}

export const versionAtLeast = (version: ProtocolVersion, minor: number): boolean =>
  version.major > 3 || (version.major === 3 && version.minor >= minor);

export function decodeU32(bytes: Uint8Array): number {
  return new ByteReader(bytes).u32();
}

export function decodeText(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('utf8');
}

export function encodeClientInit(shared: boolean): Uint8Array {
  return Uint8Array.of(shared ? 1 : 0);
}

/** Parses the fixed 24-byte ServerInit header; the desktop name follows. */
export function parseServerInitHeader(bytes: Uint8Array): { init: Omit<ServerInit, 'name'>; nameLength: number } {
  const reader = new ByteReader(bytes);
  const width = reader.u16();
  const height = reader.u16();
  const pixelFormat = readPixelFormat(reader);
  const nameLength = reader.u32();
  if (width === 0 || height === 0) {
    throw new HandshakeError(`Server announced an empty ${width}x${height} framebuffer`);
  }
  return { init: { width, height, pixelFormat }, nameLength };
}
