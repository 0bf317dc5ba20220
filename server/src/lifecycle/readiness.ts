import net from 'node:net';
import type { NetworkEndpoint } from '../types.js';

export interface ReadinessCheck {
  check(endpoint: NetworkEndpoint): Promise<boolean>;
}

const GREETING_LENGTH = 12;
const GREETING = /^RFB \d{3}\.\d{3}\n$/;

/**
 * Ready once the endpoint sends the 12-byte `RFB xxx.yyy\n` greeting within
 * `timeoutMs`. An accepted connection alone does not count: the container's
 * port forward accepts before the VNC server inside is listening.
 */
export class RfbGreetingCheck implements ReadinessCheck {
  constructor(private readonly timeoutMs = 1_000) {}

  check(endpoint: NetworkEndpoint): Promise<boolean> {
    return new Promise((resolve) => {
      const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
      const chunks: Buffer[] = [];
      let received = 0;
      const finish = (ready: boolean) => {
        clearTimeout(timer);
        socket.removeAllListeners();
        socket.destroy();
        resolve(ready);
      };
      const timer = setTimeout(() => finish(false), this.timeoutMs);
      socket.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
        received += chunk.byteLength;
        if (received >= GREETING_LENGTH) {
          finish(GREETING.test(Buffer.concat(chunks, received).subarray(0, GREETING_LENGTH).toString('latin1')));
        }
      });
      socket.once('end', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}

export const delay = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Polls `readiness` until it reports ready or the deadline passes. Returns
 * whether the endpoint became ready.
 */
export async function waitUntilReady(
  readiness: ReadinessCheck,
  endpoint: NetworkEndpoint,
  options: { timeoutMs: number; pollMs: number },
): Promise<boolean> {
  const deadline = Date.now() + options.timeoutMs;
  for (;;) {
    if (await readiness.check(endpoint)) {
      return true;
    }
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return false;
    }
    await delay(Math.min(options.pollMs, remaining));
  }
}
