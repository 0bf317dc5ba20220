import { TransportError } from '../lib/errors.js';
import type { InputEvent } from '../rfb/types.js';

type Writer = (bytes: Uint8Array) => Promise<void>;
type Encoder = (event: InputEvent) => Uint8Array;

interface PendingInput {
  event: InputEvent;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Serializes captured input onto the session's writer strictly in capture
 * order. While detached (reconnecting) events wait in the queue; the head
 * event is only dropped from the queue once its write succeeded.
 */
export class InputForwarder {
  private pending: PendingInput[] = [];
  private writer: Writer | null = null;
  private encode: Encoder | null = null;
  private draining: Promise<void> | null = null;

  constructor(private readonly maxPending = 256) {}

  enqueue(event: InputEvent): Promise<void> {
    if (this.pending.length >= this.maxPending) {
      return Promise.reject(new TransportError(`Input queue is full (${this.maxPending} events)`));
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ event, resolve, reject });
      this.kick();
    });
  }

  attach(writer: Writer, encode: Encoder): void {
    this.writer = writer;
    this.encode = encode;
    this.kick();
  }

  detach(): void {
    this.writer = null;
    this.encode = null;
  }

  failAll(error: Error): void {
    this.detach();
    for (const item of this.pending.splice(0)) {
      item.reject(error);
    }
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  private kick(): void {
    if (this.draining || !this.writer) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.pending.length > 0 && this.writer) {
        this.kick();
      }
    });
  }

  private async drain(): Promise<void> {
    while (this.pending.length > 0) {
      const writer = this.writer;
      const encode = this.encode;
      if (!writer || !encode) return;
      const item = this.pending[0];
      try {
        await writer(encode(item.event));
      } catch {
        // The transport is gone; the event stays at the head until the session reattaches or fails it.
        if (this.writer === writer) this.detach();
        return;
      }
      if (this.pending[0] === item) {
        this.pending.shift();
        item.resolve();
      }
    }
  }
}
