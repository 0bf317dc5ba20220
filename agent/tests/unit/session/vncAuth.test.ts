import { describe, expect, it } from 'vitest';
import { SecurityType } from '../../../src/rfb/constants.js';
import { vncAuthSecurity, vncChallengeResponse, vncKey } from '../../../src/session/vncAuth.js';

const hex = (bytes: Uint8Array): string => Buffer.from(bytes).toString('hex');

describe('vncKey', () => {
  it('reverses the bits of every password byte', () => {
    expect(Array.from(vncKey('a'))).toEqual([0x86, 0, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(vncKey('secret'))).toEqual([0xce, 0xa6, 0xc6, 0x4e, 0xa6, 0x2e, 0, 0]);
  });

  it('uses only the first 8 characters', () => {
    expect(vncKey('abcdefghij')).toEqual(vncKey('abcdefgh'));
  });
});

describe('vncChallengeResponse', () => {
  it('encrypts both challenge blocks with DES-ECB', () => {
    // The password bytes reverse to the DES key 0123456789abcdef.
    const password = '\x80\xc4\xa2\xe6\x91\xd5\xb3\xf7';
    const challenge = new Uint8Array(Buffer.from('Now is tNow is t', 'latin1'));

    expect(hex(vncKey(password))).toBe('0123456789abcdef');
    expect(hex(vncChallengeResponse(challenge, password))).toBe('3fa40e8a984d48153fa40e8a984d4815');
  });
});

describe('vncAuthSecurity', () => {
  it('answers the 16-byte challenge', async () => {
    const challenge = new Uint8Array(16).fill(7);
    const written: Uint8Array[] = [];
    const handler = vncAuthSecurity('secret');

    await handler.authenticate({
      version: { major: 3, minor: 8 },
      read: async (size) => challenge.subarray(0, size),
      write: async (bytes) => {
        written.push(bytes);
      },
    });

    expect(handler.type).toBe(SecurityType.VncAuthentication);
    expect(written).toEqual([vncChallengeResponse(challenge, 'secret')]);
  });
});
