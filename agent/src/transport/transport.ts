import type { NetworkEndpoint } from '@rangelab/server';

export interface TransportHandlers {
  onData(chunk: Uint8Array): void;
  /** Fires once, whether the peer closed, the link failed or `close()` was called. */
  onClose(error?: Error): void;
}

export interface Transport {
  /** Resolves once the bytes are handed to the OS (send-buffer space available). */
  write(bytes: Uint8Array): Promise<void>;
  close(): void;
}

export interface TransportOpenOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

export type TransportFactory = (
  endpoint: NetworkEndpoint,
  handlers: TransportHandlers,
  options: TransportOpenOptions,
) => Promise<Transport>;
