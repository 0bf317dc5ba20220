import type { NetworkEndpoint } from '@rangelab/server';
import type { FrameListener } from '../frame/framePipeline.js';
import { FramePipeline } from '../frame/framePipeline.js';
import type { FrameSnapshot } from '../frame/framebuffer.js';
import { InputForwarder } from '../input/inputForwarder.js';
import {
  HandshakeError,
  ProtocolError,
  SessionLost,
  TransportError,
  errorMessage,
} from '../lib/errors.js';
import { silentLogger, type Logger } from '../lib/logger.js';
import { RfbCodec } from '../rfb/codec.js';
import { SecurityType } from '../rfb/constants.js';
import {
  PROTOCOL_VERSION_LENGTH,
  SERVER_INIT_HEADER_LENGTH,
  decodeText,
  decodeU32,
  encodeClientInit,
  encodeProtocolVersion,
  negotiateVersion,
  parseProtocolVersion,
  parseServerInitHeader,
  versionAtLeast,
} from '../rfb/handshake.js';
import { CLIENT_PIXEL_FORMAT, type PixelFormat } from '../rfb/pixelFormat.js';
import type { DecodeResult, InputEvent, ProtocolVersion, ServerInit, ServerMessage } from '../rfb/types.js';
import type { Transport, TransportFactory } from '../transport/transport.js';
import { DEFAULT_BACKOFF, backoffDelay, sleep, type BackoffPolicy } from './backoff.js';
import { ByteStream } from './byteStream.js';
import { noneSecurity, type SecurityHandler } from './security.js';

export type SessionState =
  | 'disconnected'
  | 'handshaking'
  | 'negotiating'
  | 'streaming'
  | 'reconnecting'
  | 'closed';

export interface SessionOptions {
  transport: TransportFactory;
  security?: readonly SecurityHandler[];
  /** ClientInit shared flag; other viewers stay connected when true. */
  shared?: boolean;
  pixelFormat?: PixelFormat;
  encodings?: readonly number[];
  handshakeTimeoutMs?: number;
  reconnect?: Partial<BackoffPolicy>;
  /** Send an incremental update request after every applied update. */
  autoRequestUpdates?: boolean;
  maxPendingInputs?: number;
  logger?: Logger;
}

interface Connection {
  transport: Transport;
  stream: ByteStream;
  codec: RfbCodec;
  /** Buffered length below which decoding cannot make progress. */
  awaiting: number;
}

interface HandshakeAttempt {
  stream: ByteStream;
  transport: Transport | null;
}

type Listener<T> = (value: T) => void;

/**
 * One agent's connection to one environment endpoint. Owns the codec, the
 * frame pipeline and the input forwarder, and runs the
 * disconnected → handshaking → negotiating → streaming → reconnecting → closed
 * state machine.
 */
export class RemoteDesktopSession {
  private stateValue: SessionState = 'disconnected';
  private connection: Connection | null = null;
  private attempt: HandshakeAttempt | null = null;
  private pipeline: FramePipeline | null = null;
  private serverName = '';
  private outbound: Promise<void> = Promise.resolve();
  private reconnecting: Promise<void> | null = null;
  private lostError: SessionLost | null = null;
  private readonly lifetime = new AbortController();
  private readonly forwarder: InputForwarder;
  private readonly policy: BackoffPolicy;
  private readonly logger: Logger;

  private readonly stateListeners = new Set<Listener<SessionState>>();
  private readonly frameListeners = new Set<FrameListener>();
  private readonly lostListeners = new Set<Listener<SessionLost>>();
  private readonly clipboardListeners = new Set<Listener<string>>();
  private readonly bellListeners = new Set<Listener<void>>();

  private constructor(
    readonly endpoint: NetworkEndpoint,
    private readonly options: SessionOptions,
  ) {
    this.forwarder = new InputForwarder(options.maxPendingInputs);
    this.policy = { ...DEFAULT_BACKOFF, ...options.reconnect };
    this.logger = (options.logger ?? silentLogger).child({ endpoint: `${endpoint.host}:${endpoint.port}` });
  }

  /**
   * Opens a session and completes the handshake. Rejects with
   * `HandshakeError` on a failed negotiation, `TransportError` when the
   * endpoint cannot be reached and `SessionLost` when the first server
   * message is already invalid; none of them is retried here.
   */
  static async connect(endpoint: NetworkEndpoint, options: SessionOptions): Promise<RemoteDesktopSession> {
    const session = new RemoteDesktopSession(endpoint, options);
    await session.open();
    return session;
  }

  get state(): SessionState {
    return this.stateValue;
  }

  get desktopName(): string {
    return this.serverName;
  }

  get pendingInputs(): number {
    return this.forwarder.pendingCount;
  }

  /** Set once the session is closed; `reason` is 'closed' after an explicit `close()`. */
  get lost(): SessionLost | null {
    return this.lostError;
  }

  currentFrame(): FrameSnapshot {
    if (!this.pipeline) {
      throw new Error('Session has not completed its handshake');
    }
    return this.pipeline.currentFrame();
  }

  /**
   * Asks the server for the next update. While reconnecting this is a no-op:
   * re-entering streaming always issues a full request on its own.
   */
  async requestUpdate(incremental: boolean): Promise<void> {
    if (this.stateValue === 'closed') {
      throw this.closedError();
    }
    const connection = this.connection;
    if (this.stateValue !== 'streaming' || !connection) return;
    await this.send(connection.codec.encodeUpdateRequest(incremental));
  }

  /** Resolves once the event is written; events queue up while reconnecting. */
  sendInput(event: InputEvent): Promise<void> {
    if (this.stateValue === 'closed') {
      return Promise.reject(this.closedError());
    }
    return this.forwarder.enqueue(event);
  }

  async sendClipboard(text: string): Promise<void> {
    if (this.stateValue === 'closed') {
      throw this.closedError();
    }
    const connection = this.connection;
    if (!connection) {
      throw new TransportError('Session is reconnecting');
    }
    await this.send(connection.codec.encodeClipboard(text));
  }

  /** Cancels any reconnect in progress and releases the transport. */
  async close(): Promise<void> {
    if (this.stateValue !== 'closed') {
      this.teardown(new SessionLost('closed', 'Session closed'));
      this.logger.info('session_closed');
    }
    await this.reconnecting;
  }

  onStateChange(listener: Listener<SessionState>): () => void {
    return subscribe(this.stateListeners, listener);
  }

  onFrame(listener: FrameListener): () => void {
    return subscribe(this.frameListeners, listener);
  }

  /** Fires once when the session ends for any reason other than `close()`. */
  onLost(listener: Listener<SessionLost>): () => void {
    return subscribe(this.lostListeners, listener);
  }

  onClipboard(listener: Listener<string>): () => void {
    return subscribe(this.clipboardListeners, listener);
  }

  onBell(listener: Listener<void>): () => void {
    return subscribe(this.bellListeners, listener);
  }

  private async open(): Promise<void> {
    try {
      const { connection, init } = await this.establish();
      this.startStreaming(connection, init);
    } catch (error) {
      this.teardown(new SessionLost('handshake_failed', errorMessage(error), { cause: error }));
      throw error;
    }
    // Bytes that arrived with ServerInit are decoded right away and can already end the session.
    if (this.lostError) {
      throw this.lostError;
    }
  }

  private async establish(): Promise<{ connection: Connection; init: ServerInit }> {
    this.setState('handshaking');
    const attempt: HandshakeAttempt = { stream: new ByteStream(), transport: null };
    this.attempt = attempt;
    const timeoutMs = this.options.handshakeTimeoutMs ?? 10_000;

    try {
      const transport = await this.options.transport(
        this.endpoint,
        {
          onData: (chunk) => attempt.stream.push(chunk),
          onClose: (error) => this.handleTransportClosed(attempt, error),
        },
        { signal: this.lifetime.signal, timeoutMs },
      );
      attempt.transport = transport;
      if (this.lifetime.signal.aborted) {
        throw this.closedError();
      }
      const { codec, init } = await this.handshake(attempt.stream, transport, timeoutMs);
      return { connection: { transport, stream: attempt.stream, codec, awaiting: 1 }, init };
    } catch (error) {
      attempt.stream.fail(error instanceof Error ? error : new TransportError(errorMessage(error)));
      attempt.transport?.close();
      throw error;
    } finally {
      if (this.attempt === attempt) {
        this.attempt = null;
      }
    }
  }

  private async handshake(
    stream: ByteStream,
    transport: Transport,
    timeoutMs: number,
  ): Promise<{ codec: RfbCodec; init: ServerInit }> {
    const read = (size: number) => stream.read(size, timeoutMs);
    const write = (bytes: Uint8Array) => transport.write(bytes);

    const version = negotiateVersion(parseProtocolVersion(await read(PROTOCOL_VERSION_LENGTH)));
    await write(encodeProtocolVersion(version));

    const handler = await this.chooseSecurity(version, read, write);
    await handler.authenticate({ version, read, write });
    // 3.3 and 3.7 skip SecurityResult for None.
    if (versionAtLeast(version, 8) || handler.type !== SecurityType.None) {
      const status = decodeU32(await read(4));
      if (status !== 0) {
        const reason = versionAtLeast(version, 8) ? await readReason(read) : 'authentication failed';
        throw new HandshakeError(`Security handshake rejected: ${reason}`);
      }
    }

    this.setState('negotiating');
    await write(encodeClientInit(this.options.shared ?? true));
    const { init, nameLength } = parseServerInitHeader(await read(SERVER_INIT_HEADER_LENGTH));
    const name = nameLength > 0 ? decodeText(await read(nameLength)) : '';

    const codec = new RfbCodec({
      width: init.width,
      height: init.height,
      pixelFormat: this.options.pixelFormat ?? CLIENT_PIXEL_FORMAT,
      encodings: this.options.encodings,
    });
    await write(codec.encodeSetPixelFormat());
    await write(codec.encodeSetEncodings());
    return { codec, init: { ...init, name } };
  }

  private async chooseSecurity(
    version: ProtocolVersion,
    read: (size: number) => Promise<Uint8Array>,
    write: (bytes: Uint8Array) => Promise<void>,
  ): Promise<SecurityHandler> {
    const handlers = this.options.security ?? [noneSecurity];

    if (!versionAtLeast(version, 7)) {
      const type = decodeU32(await read(4));
      if (type === SecurityType.Invalid) {
        throw new HandshakeError(`Server refused connection: ${await readReason(read)}`);
      }
      const handler = handlers.find((candidate) => candidate.type === type);
      if (!handler) {
        throw new HandshakeError(`Server requires unsupported security type ${type}`);
      }
      return handler;
    }

    const [count] = await read(1);
    if (count === 0) {
      throw new HandshakeError(`Server refused connection: ${await readReason(read)}`);
    }
    const offered = Array.from(await read(count));
    const handler = handlers.find((candidate) => offered.includes(candidate.type));
    if (!handler) {
      throw new HandshakeError(`No supported security type among [${offered.join(', ')}]`);
    }
    await write(Uint8Array.of(handler.type));
    return handler;
  }

  private startStreaming(connection: Connection, init: ServerInit): void {
    if (!this.pipeline) {
      this.pipeline = new FramePipeline(init.width, init.height);
      this.pipeline.onFrame((frame, regions) => {
        for (const listener of this.frameListeners) {
          listener(frame, regions);
        }
      });
    } else if (this.pipeline.width !== init.width || this.pipeline.height !== init.height) {
      connection.transport.close();
      throw new SessionLost(
        'resized',
        `Desktop changed from ${this.pipeline.width}x${this.pipeline.height} to ${init.width}x${init.height}`,
      );
    }

    this.connection = connection;
    this.serverName = init.name;
    this.setState('streaming');
    this.logger.info({ width: init.width, height: init.height, name: init.name }, 'session_streaming');

    // Full request goes out before any input queued during an outage.
    this.sendQuietly(connection.codec.encodeUpdateRequest(false));
    this.forwarder.attach(
      (bytes) => this.send(bytes),
      (event) => connection.codec.encodeInput(event),
    );
    connection.stream.setListener(() => this.drainMessages(connection));
    this.drainMessages(connection);
  }

  private drainMessages(connection: Connection): void {
    while (this.connection === connection) {
      if (connection.stream.buffered < connection.awaiting) return;
      let decoded: DecodeResult;
      try {
        decoded = connection.codec.readServerMessage(connection.stream.peek());
      } catch (error) {
        this.fail(new SessionLost('protocol_error', errorMessage(error), { cause: error }));
        return;
      }
      if (decoded.message === null) {
        connection.awaiting = decoded.bytesNeeded;
        return;
      }
      connection.awaiting = 1;
      connection.stream.consume(decoded.bytesRead);
      this.handleMessage(connection, decoded.message);
    }
  }

  private handleMessage(connection: Connection, message: ServerMessage): void {
    switch (message.type) {
      case 'framebuffer_update': {
        if (!this.pipeline) return;
        try {
          this.pipeline.applyUpdate(message.regions);
        } catch (error) {
          const cause = error instanceof ProtocolError ? error : new ProtocolError(errorMessage(error));
          this.fail(new SessionLost('protocol_error', cause.message, { cause }));
          return;
        }
        if (this.options.autoRequestUpdates ?? true) {
          this.sendQuietly(connection.codec.encodeUpdateRequest(true));
        }
        return;
      }
      case 'server_cut_text':
        for (const listener of this.clipboardListeners) {
          listener(message.text);
        }
        return;
      case 'bell':
        for (const listener of this.bellListeners) {
          listener();
        }
        return;
      case 'set_colour_map_entries':
        // Only true-colour formats are negotiated.
        this.logger.debug({ firstColour: message.firstColour, count: message.colours.length }, 'colour_map_ignored');
        return;
    }
  }

  private handleTransportClosed(attempt: HandshakeAttempt, error?: Error): void {
    const loss = error ?? new TransportError('Connection closed by server');
    attempt.stream.fail(loss);
    // Losses during a handshake surface through the pending read.
    if (this.stateValue !== 'streaming' || this.connection?.stream !== attempt.stream) return;

    this.connection = null;
    this.forwarder.detach();
    this.setState('reconnecting');
    this.logger.warn({ err: loss }, 'session_transport_lost');
    this.reconnecting = this.reconnectLoop(loss).finally(() => {
      this.reconnecting = null;
    });
  }

  private async reconnectLoop(cause: Error): Promise<void> {
    let lastError: unknown = cause;
    for (let attempt = 1; attempt <= this.policy.maxAttempts; attempt += 1) {
      try {
        await sleep(backoffDelay(attempt, this.policy), this.lifetime.signal);
      } catch {
        // Aborted by close(), which already settled the session.
        return;
      }
      this.logger.info({ attempt, maxAttempts: this.policy.maxAttempts }, 'session_reconnect_attempt');
      try {
        const { connection, init } = await this.establish();
        this.startStreaming(connection, init);
        return;
      } catch (error) {
        if (this.stateValue === 'closed') return;
        if (error instanceof SessionLost) {
          this.fail(error);
          return;
        }
        if (error instanceof HandshakeError || error instanceof ProtocolError) {
          this.fail(new SessionLost('handshake_failed', error.message, { cause: error }));
          return;
        }
        lastError = error;
        this.setState('reconnecting');
        this.logger.warn({ attempt, err: error }, 'session_reconnect_failed');
      }
    }
    this.fail(
      new SessionLost('reconnect_exhausted', `Gave up after ${this.policy.maxAttempts} reconnect attempt(s)`, {
        cause: lastError,
      }),
    );
  }

  private send(bytes: Uint8Array): Promise<void> {
    const connection = this.connection;
    if (!connection) {
      return Promise.reject(new TransportError('Session is not streaming'));
    }
    const next = this.outbound.then(() => connection.transport.write(bytes));
    // The chain only orders writes; each caller still sees its own failure.
    this.outbound = next.catch(() => undefined);
    return next;
  }

  /** For writes the session makes itself; a failed write also closes the transport, which drives reconnect. */
  private sendQuietly(bytes: Uint8Array): void {
    this.send(bytes).catch((error: unknown) => {
      this.logger.debug({ err: error }, 'session_write_failed');
    });
  }

  private fail(lost: SessionLost): void {
    if (this.stateValue === 'closed') return;
    this.teardown(lost);
    this.logger.warn({ reason: lost.reason, err: lost }, 'session_lost');
    for (const listener of this.lostListeners) {
      listener(lost);
    }
  }

  private teardown(lost: SessionLost): void {
    this.lostError = lost;
    this.lifetime.abort(lost);
    const connection = this.connection;
    this.connection = null;
    connection?.stream.fail(lost);
    connection?.transport.close();
    const attempt = this.attempt;
    this.attempt = null;
    attempt?.stream.fail(lost);
    attempt?.transport?.close();
    this.forwarder.failAll(lost);
    this.setState('closed');
  }

  private closedError(): SessionLost {
    return this.lostError ?? new SessionLost('closed', 'Session closed');
  }

  private setState(next: SessionState): void {
    if (this.stateValue === next) return;
    this.stateValue = next;
    for (const listener of this.stateListeners) {
      listener(next);
    }
  }
}

async function readReason(read: (size: number) => Promise<Uint8Array>): Promise<string> {
  const length = decodeU32(await read(4));
  return length > 0 ? decodeText(await read(length)) : 'no reason given';
}

function subscribe<T>(listeners: Set<T>, listener: T): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}
