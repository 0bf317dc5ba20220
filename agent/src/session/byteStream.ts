import { TransportError } from '../lib/errors.js';

interface PendingRead {
  size: number;
  resolve: (bytes: Uint8Array) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const EMPTY = Buffer.alloc(0);

/**
 * Buffers inbound transport bytes as a list of chunks. The handshake pulls
 * exact sizes with `read`; once streaming, a listener is told whenever bytes
 * arrive and works off `peek`/`consume`. Chunks are only joined when `peek`
 * or `read` needs a contiguous span.
 */
export class ByteStream {
  private chunks: Buffer[] = [];
  private length = 0;
  private pending: PendingRead | null = null;
  private failure: Error | null = null;
  private listener: (() => void) | null = null;

  push(chunk: Uint8Array): void {
    if (this.failure || chunk.byteLength === 0) return;
    this.chunks.push(Buffer.from(chunk));
    this.length += chunk.byteLength;
    const pending = this.pending;
    if (pending) {
      if (this.length >= pending.size) {
        this.pending = null;
        clearTimeout(pending.timer);
        pending.resolve(this.take(pending.size));
      }
      return;
    }
    this.listener?.();
  }

  /** Bytes that arrived before a failure can still be read. */
  read(size: number, timeoutMs: number): Promise<Uint8Array> {
    if (this.pending) {
      return Promise.reject(new Error('ByteStream supports one pending read at a time'));
    }
    if (this.length >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TransportError(`Timed out after ${timeoutMs}ms waiting for ${size} byte(s)`));
      }, timeoutMs);
      this.pending = { size, resolve, reject, timer };
    });
  }

  /** Everything buffered, as one span. */
  peek(): Uint8Array {
    if (this.chunks.length > 1) {
      this.chunks = [Buffer.concat(this.chunks, this.length)];
    }
    return this.chunks[0] ?? EMPTY;
  }

  consume(size: number): void {
    let remaining = Math.min(size, this.length);
    this.length -= remaining;
    while (remaining > 0) {
      const head = this.chunks[0];
      if (head.byteLength <= remaining) {
        this.chunks.shift();
        remaining -= head.byteLength;
      } else {
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
  }

  get buffered(): number {
    return this.length;
  }

  /** Number of chunks currently held. */
  get chunkCount(): number {
    return this.chunks.length;
  }

  setListener(listener: (() => void) | null): void {
    this.listener = listener;
  }

  fail(error: Error): void {
    if (this.failure) return;
    this.failure = error;
    this.listener = null;
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
  }

  private take(size: number): Uint8Array {
    const bytes = Uint8Array.from(this.peek().subarray(0, size));
    this.consume(size);
    return bytes;
  }
}
