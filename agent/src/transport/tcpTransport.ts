import net from 'node:net';
import { TransportError, errorMessage } from '../lib/errors.js';
import type { Transport, TransportFactory } from './transport.js';

class TcpTransport implements Transport {
  constructor(private readonly socket: net.Socket) {}

  write(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.destroyed) {
        reject(new TransportError('Socket is closed'));
        return;
      }
      this.socket.write(bytes, (error) => {
        if (error) {
          reject(new TransportError(`Write failed: ${error.message}`, { cause: error }));
          return;
        }
        resolve();
      });
    });
  }

  close(): void {
    this.socket.destroy();
  }
}

export const openTcpTransport: TransportFactory = (endpoint, handlers, { signal, timeoutMs }) =>
  new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
    let settled = false;
    let lastError: Error | undefined;

    const settle = (error?: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
      if (error) {
        socket.destroy();
        reject(error);
      }
    };
    const onAbort = () => settle(new TransportError('Connection attempt cancelled', { cause: signal.reason }));
    const timer = setTimeout(
      () => settle(new TransportError(`Connecting to ${endpoint.host}:${endpoint.port} timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });

    socket.once('error', (error) => {
      settle(new TransportError(`Cannot reach ${endpoint.host}:${endpoint.port}: ${errorMessage(error)}`, { cause: error }));
    });

    socket.once('connect', () => {
      if (settled) return;
      settle();
      socket.setNoDelay(true);
      socket.on('data', (chunk: Buffer) => handlers.onData(chunk));
      socket.on('error', (error) => {
        lastError = error;
      });
      socket.once('close', () => {
        handlers.onClose(lastError ? new TransportError(errorMessage(lastError), { cause: lastError }) : undefined);
      });
      resolve(new TcpTransport(socket));
    });
  });
