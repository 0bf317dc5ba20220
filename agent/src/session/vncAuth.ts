import des from 'des.js';
import { SecurityType } from '../rfb/constants.js';
import type { SecurityHandler } from './security.js';

export const VNC_CHALLENGE_LENGTH = 16;

const reverseBits = (byte: number): number => {
  let out = 0;
  for (let bit = 0; bit < 8; bit += 1) {
    out = (out << 1) | ((byte >> bit) & 1);
  }
  return out;
};

/** DES key for a VNC password: first 8 bytes, zero padded, each byte bit-reversed. */
export function vncKey(password: string): Uint8Array {
  const key = new Uint8Array(8);
  const bytes = Buffer.from(password, 'latin1');
  for (let i = 0; i < key.length && i < bytes.byteLength; i += 1) {
    key[i] = reverseBits(bytes[i]);
  }
  return key;
}

/** DES-ECB encryption of the server's 16-byte challenge. */
export function vncChallengeResponse(challenge: Uint8Array, password: string): Uint8Array {
  const cipher = des.DES.create({ type: 'encrypt', key: Array.from(vncKey(password)), padding: false });
  return Uint8Array.from(cipher.update(Array.from(challenge)));
}

/** Security type 2. Only the first 8 characters of the password take part. */
export function vncAuthSecurity(password: string): SecurityHandler {
  return {
    type: SecurityType.VncAuthentication,
    name: 'VNC Authentication',
    async authenticate({ read, write }) {
      const challenge = await read(VNC_CHALLENGE_LENGTH);
      await write(vncChallengeResponse(challenge, password));
    },
  };
}
