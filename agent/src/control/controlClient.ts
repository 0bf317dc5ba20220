import {
  AsyncQueue,
  controlEventSchema,
  envelopeSchema,
  membershipSnapshotSchema,
} from '@rangelab/server';
import WebSocket from 'ws';
import { z } from 'zod';
import { silentLogger, type Logger } from '../lib/logger.js';
import type { ControlFeed, ControlMessage } from './controlFeed.js';

export interface ControlClientOptions {
  url: string;
  agentId: string;
  displayName: string;
  reconnectMs: number;
  logger?: Logger;
}

/**
 * WebSocket link to the controller. Says hello on every (re)connect, which
 * the controller answers with a snapshot, and fans inbound snapshots and
 * events out to every subscriber.
 */
export class ControlClient implements ControlFeed {
  private socket: WebSocket | null = null;
  private readonly subscribers = new Set<AsyncQueue<ControlMessage>>();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private closed = false;
  private resyncCount = 0;
  private readonly logger: Logger;

  constructor(private readonly options: ControlClientOptions) {
    this.logger = (options.logger ?? silentLogger).child({ agentId: options.agentId });
  }

  start(): void {
    if (this.closed || this.socket) return;
    this.connect();
  }

  get connected(): boolean {
    return this.socket?.readyState === WebSocket.OPEN;
  }

  subscribe(signal?: AbortSignal): AsyncIterableIterator<ControlMessage> {
    const queue: AsyncQueue<ControlMessage> = new AsyncQueue(() => {
      this.subscribers.delete(queue);
    });
    if (this.closed) {
      queue.close();
      return queue;
    }
    this.subscribers.add(queue);
    if (signal) {
      if (signal.aborted) {
        void queue.return();
      } else {
        signal.addEventListener('abort', () => void queue.return(), { once: true });
      }
    }
    return queue;
  }

  requestSnapshot(): void {
    this.resyncCount += 1;
    this.sendEnvelope('resync_request', {}, `resync-${this.resyncCount}`);
  }

  /** Forwards a line to the controller's log. */
  log(message: string): void {
    this.sendEnvelope('agent_log', { message });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.socket?.close();
    this.socket = null;
    for (const queue of this.subscribers) {
      queue.close();
    }
    this.subscribers.clear();
  }

  private connect(): void {
    const socket = new WebSocket(this.options.url);
    this.socket = socket;

    socket.on('open', () => {
      this.logger.info({ url: this.options.url }, 'control_connected');
      this.sendEnvelope('agent_hello', {
        agentId: this.options.agentId,
        displayName: this.options.displayName,
      });
    });

    socket.on('message', (raw) => {
      this.handleMessage(raw.toString());
    });

    socket.on('close', () => {
      if (this.socket === socket) {
        this.socket = null;
      }
      if (this.closed) return;
      this.logger.warn({ retryInMs: this.options.reconnectMs }, 'control_disconnected');
      this.reconnectTimer = setTimeout(() => {
        this.reconnectTimer = null;
        if (!this.closed) this.connect();
      }, this.options.reconnectMs);
    });

    socket.on('error', (err) => {
      // 'close' follows and schedules the retry.
      this.logger.warn({ err }, 'control_socket_error');
    });
  }

  private handleMessage(raw: string): void {
    let envelope: z.infer<typeof envelopeSchema>;
    try {
      envelope = envelopeSchema.parse(JSON.parse(raw));
    } catch (error) {
      this.logger.warn({ error }, 'control_invalid_message');
      return;
    }

    switch (envelope.type) {
      case 'snapshot': {
        const parsed = membershipSnapshotSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          this.logger.warn({ issues: parsed.error.issues }, 'control_invalid_snapshot');
          return;
        }
        this.broadcast({ type: 'snapshot', snapshot: parsed.data });
        return;
      }
      case 'control_event': {
        const parsed = controlEventSchema.safeParse(envelope.payload);
        if (!parsed.success) {
          this.logger.warn({ issues: parsed.error.issues }, 'control_invalid_event');
          return;
        }
        this.broadcast({ type: 'event', event: parsed.data });
        return;
      }
      case 'error':
        this.logger.warn({ message: raw }, 'control_server_error');
        return;
      default:
        this.logger.debug({ type: envelope.type }, 'control_unhandled_type');
    }
  }

  private broadcast(message: ControlMessage): void {
    for (const queue of this.subscribers) {
      queue.push(message);
    }
  }

  private sendEnvelope(type: string, payload: unknown, ref?: string): void {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify({ type, payload, ...(ref ? { ref } : {}) }));
  }
}
