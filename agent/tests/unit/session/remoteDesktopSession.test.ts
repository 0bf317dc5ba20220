import { afterEach, describe, expect, it, vi } from 'vitest';
import { HandshakeError, SessionLost, TransportError } from '../../../src/lib/errors.js';
import { RfbCodec } from '../../../src/rfb/codec.js';
import { RemoteDesktopSession, type SessionOptions } from '../../../src/session/remoteDesktopSession.js';
import { vncAuthSecurity } from '../../../src/session/vncAuth.js';
import { FakeRfbServer, flush } from '../../helpers/fakeRfbServer.js';
import { framebufferUpdate, rawRect, rgba } from '../../helpers/rfbWire.js';

const endpoint = { host: '127.0.0.1', port: 6400 };
const sessions: RemoteDesktopSession[] = [];

async function open(server: FakeRfbServer, options: Partial<SessionOptions> = {}): Promise<RemoteDesktopSession> {
  const session = await RemoteDesktopSession.connect(endpoint, {
    transport: server.factory,
    handshakeTimeoutMs: 200,
    reconnect: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 4 },
    ...options,
  });
  sessions.push(session);
  await flush();
  return session;
}

afterEach(async () => {
  await Promise.all(sessions.splice(0).map((session) => session.close()));
});

describe('RemoteDesktopSession', () => {
  describe('handshake', () => {
    it('negotiates 3.8, pixel format and encodings, then asks for a full frame', async () => {
      const server = new FakeRfbServer();

      const session = await open(server);

      expect(session.state).toBe('streaming');
      expect(session.desktopName).toBe('lab-desktop');
      expect(server.latest.clientVersion).toBe('RFB 003.008\n');
      expect(server.latest.shared).toBe(true);
      expect(server.latest.records).toEqual([
        { type: 'set_pixel_format', bitsPerPixel: 32 },
        { type: 'set_encodings', encodings: [1, 5, 2, 0] },
        { type: 'update_request', incremental: false, width: 32, height: 32 },
      ]);
    });

    it('speaks 3.3, where the server picks the security type', async () => {
      const server = new FakeRfbServer();
      server.version = '003.003';

      const session = await open(server);

      expect(session.state).toBe('streaming');
      expect(server.latest.clientVersion).toBe('RFB 003.003\n');
    });

    it('fails with HandshakeError and does not retry when no security type matches', async () => {
      const server = new FakeRfbServer();
      server.securityTypes = [2];

      await expect(open(server)).rejects.toBeInstanceOf(HandshakeError);
      expect(server.attempts).toBe(1);
    });

    it('authenticates with a VNC password', async () => {
      const server = new FakeRfbServer();
      server.securityTypes = [2];
      server.password = 'secret';

      const session = await open(server, { security: [vncAuthSecurity('secret')] });

      expect(session.state).toBe('streaming');
      expect(server.latest.authenticated).toBe(true);
    });

    it('authenticates with a VNC password on 3.3', async () => {
      const server = new FakeRfbServer();
      server.version = '003.003';
      server.securityTypes = [2];
      server.password = 'secret';

      const session = await open(server, { security: [vncAuthSecurity('secret')] });

      expect(session.state).toBe('streaming');
      expect(server.latest.authenticated).toBe(true);
    });

    it('fails with the server reason on a wrong password', async () => {
      const server = new FakeRfbServer();
      server.securityTypes = [2];
      server.password = 'secret';

      await expect(open(server, { security: [vncAuthSecurity('guessed')] })).rejects.toThrow(
        new HandshakeError('Security handshake rejected: Authentication failed'),
      );
      expect(server.latest.authenticated).toBe(false);
      expect(server.attempts).toBe(1);
    });

    it('refuses a desktop that offers only None when a password is configured', async () => {
      const server = new FakeRfbServer();

      await expect(open(server, { security: [vncAuthSecurity('secret')] })).rejects.toThrow(
        'No supported security type among [1]',
      );
    });

    it('rejects the connect when bytes sent with ServerInit are malformed', async () => {
      const server = new FakeRfbServer();
      server.afterInit = Uint8Array.of(42);
      const connecting = RemoteDesktopSession.connect(endpoint, { transport: server.factory, handshakeTimeoutMs: 200 });

      await expect(connecting).rejects.toMatchObject({ name: 'SessionLost', reason: 'protocol_error' });
      expect(server.latest.closed).toBe(true);
      expect(server.attempts).toBe(1);
    });

    it('surfaces a transport error when the server never greets', async () => {
      const server = new FakeRfbServer();
      server.silent = true;

      await expect(open(server, { handshakeTimeoutMs: 20 })).rejects.toBeInstanceOf(TransportError);
      expect(server.latest.closed).toBe(true);
    });
  });

  describe('streaming', () => {
    it('applies updates and keeps asking for incremental ones', async () => {
      const server = new FakeRfbServer();
      server.width = 2;
      server.height = 1;
      const session = await open(server);
      const frames = vi.fn();
      session.onFrame(frames);

      server.latest.send(framebufferUpdate(rawRect(0, 0, 2, 1, [0xff0000, 0x00ff00])));
      await flush();

      expect(frames).toHaveBeenCalledTimes(1);
      expect(Array.from(session.currentFrame().pixels)).toEqual(rgba(0xff0000, 0x00ff00));
      expect(server.latest.updateRequests()).toEqual([false, true]);
    });

    it('decodes an update split across several chunks', async () => {
      const server = new FakeRfbServer();
      server.width = 2;
      server.height = 1;
      const session = await open(server);
      const update = framebufferUpdate(rawRect(0, 0, 2, 1, [0x0000ff, 0x0000ff]));

      server.latest.send(update.subarray(0, 5));
      server.latest.send(update.subarray(5, 17));
      expect(session.currentFrame().version).toBe(0);
      server.latest.send(update.subarray(17));

      expect(session.currentFrame().version).toBe(1);
    });

    it('decodes a trickled update only when enough bytes for the next step have arrived', async () => {
      const server = new FakeRfbServer();
      server.width = 2;
      server.height = 1;
      const session = await open(server);
      const decode = vi.spyOn(RfbCodec.prototype, 'readServerMessage');
      const update = framebufferUpdate(rawRect(0, 0, 2, 1, [0x0000ff, 0x00ff00]));

      for (const byte of update) {
        server.latest.send(Uint8Array.of(byte));
      }

      // After 1, 4, 16 and 24 bytes: message header, rectangle header, pixels, done.
      expect(decode).toHaveBeenCalledTimes(4);
      expect(session.currentFrame().version).toBe(1);
    });

    it('delivers input in capture order around concurrent update requests', async () => {
      const server = new FakeRfbServer();
      const session = await open(server, { autoRequestUpdates: false });

      await Promise.all([
        session.sendInput({ kind: 'pointer_move', x: 10, y: 10, buttonMask: 0 }),
        session.requestUpdate(true),
        session.sendInput({ kind: 'key', keycode: 0x61, down: true }),
        session.requestUpdate(false),
        session.sendInput({ kind: 'key', keycode: 0x61, down: false }),
        session.requestUpdate(true),
        session.sendInput({ kind: 'pointer_move', x: 20, y: 20, buttonMask: 0 }),
      ]);

      expect(server.latest.inputs()).toEqual([
        { type: 'pointer', x: 10, y: 10, buttonMask: 0 },
        { type: 'key', keysym: 0x61, down: true },
        { type: 'key', keysym: 0x61, down: false },
        { type: 'pointer', x: 20, y: 20, buttonMask: 0 },
      ]);
    });

    it('forwards clipboard text and bells', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const clipboard = vi.fn();
      const bell = vi.fn();
      session.onClipboard(clipboard);
      session.onBell(bell);

      server.latest.send(Uint8Array.of(2, 3, 0, 0, 0, 0, 0, 0, 2, 0x68, 0x69));
      await session.sendClipboard('ok');

      expect(bell).toHaveBeenCalledTimes(1);
      expect(clipboard).toHaveBeenCalledWith('hi');
      expect(server.latest.records.at(-1)).toEqual({ type: 'cut_text', text: 'ok' });
    });

    it('tears the session down on malformed server data', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const lost = vi.fn();
      session.onLost(lost);
      const connection = server.latest;

      connection.send(Uint8Array.of(42));

      expect(session.state).toBe('closed');
      expect(lost).toHaveBeenCalledTimes(1);
      expect(lost.mock.calls[0][0]).toMatchObject({ reason: 'protocol_error' });
      expect(connection.closed).toBe(true);
      expect(server.attempts).toBe(1);
    });
  });

  describe('reconnect', () => {
    it('re-handshakes and issues exactly one full request before the next incremental', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const states: string[] = [];
      session.onStateChange((state) => states.push(state));

      server.latest.drop();
      await session.requestUpdate(true);
      await vi.waitFor(() => expect(session.state).toBe('streaming'));
      await flush();
      server.latest.send(framebufferUpdate(rawRect(0, 0, 1, 1, [0xffffff])));
      await flush();

      expect(server.connections).toHaveLength(2);
      expect(states).toEqual(['reconnecting', 'handshaking', 'negotiating', 'streaming']);
      expect(server.latest.updateRequests()).toEqual([false, true]);
    });

    it('delivers input captured during the outage after the full request', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);

      server.latest.drop();
      const typed = session.sendInput({ kind: 'key', keycode: 0x71, down: true });
      expect(session.pendingInputs).toBe(1);
      await typed;

      const records = server.latest.records;
      expect(records.map((record) => record.type)).toEqual([
        'set_pixel_format',
        'set_encodings',
        'update_request',
        'key',
      ]);
    });

    it('gives up with SessionLost after the last attempt', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const lost = vi.fn();
      session.onLost(lost);

      server.refuse = 10;
      server.latest.drop();
      const pendingInput = session.sendInput({ kind: 'key', keycode: 1, down: true });

      await expect(pendingInput).rejects.toMatchObject({ reason: 'reconnect_exhausted' });
      expect(session.state).toBe('closed');
      expect(lost).toHaveBeenCalledTimes(1);
      expect(server.attempts).toBe(1 + 3);
    });

    it('stops reconnecting when closed and never reports a loss', async () => {
      const server = new FakeRfbServer();
      const session = await open(server, { reconnect: { maxAttempts: 5, baseDelayMs: 60_000, maxDelayMs: 60_000 } });
      const lost = vi.fn();
      session.onLost(lost);

      server.latest.drop();
      expect(session.state).toBe('reconnecting');
      await session.close();

      expect(session.state).toBe('closed');
      expect(session.lost?.reason).toBe('closed');
      expect(lost).not.toHaveBeenCalled();
      expect(server.attempts).toBe(1);
      await expect(session.requestUpdate(true)).rejects.toBeInstanceOf(SessionLost);
    });

    it('cancels a handshake that is in flight', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);

      server.silent = true;
      server.latest.drop();
      await vi.waitFor(() => expect(server.connections).toHaveLength(2));
      await session.close();

      expect(server.latest.closed).toBe(true);
      expect(session.state).toBe('closed');
    });

    it('ends the session when the desktop comes back with another size', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const lost = vi.fn();
      session.onLost(lost);

      server.width = 64;
      server.latest.drop();

      await vi.waitFor(() => expect(lost).toHaveBeenCalledTimes(1));
      expect(lost.mock.calls[0][0]).toMatchObject({ reason: 'resized' });
      expect(server.latest.closed).toBe(true);
    });

    it('does not retry a handshake the server rejects', async () => {
      const server = new FakeRfbServer();
      const session = await open(server);
      const lost = vi.fn();
      session.onLost(lost);

      server.securityTypes = [2];
      server.latest.drop();

      await vi.waitFor(() => expect(lost).toHaveBeenCalledTimes(1));
      expect(lost.mock.calls[0][0]).toMatchObject({ reason: 'handshake_failed' });
      expect(server.attempts).toBe(2);
    });
  });
});
