import type { IncomingMessage, Server } from 'node:http';
import type WebSocket from 'ws';
import { WebSocketServer } from 'ws';
import { z } from 'zod';
import { v4 as uuid } from 'uuid';
import type { Logger } from '../lib/logger.js';
import type { ControlChannel } from '../control/controlChannel.js';
import type { ControlEvent, MembershipSnapshot } from '../control/events.js';
import { agentHelloSchema, agentLogSchema, envelopeSchema } from '../control/schemas.js';
import type { MembershipRegistry } from '../membership/membershipRegistry.js';
import type { ClientContext } from '../types.js';

/** Everything the controller sends down a control socket. */
type OutboundMessage =
  | { type: 'snapshot'; payload: MembershipSnapshot; ref?: string }
  | { type: 'control_event'; payload: ControlEvent }
  | { type: 'error'; message: string };

export interface ControlSocketOptions {
  registry: MembershipRegistry;
  channel: ControlChannel;
  logger: Logger;
  heartbeatMs: number;
  path?: string;
}

/**
 * Agent-facing side of the control channel. Each socket streams every
 * published control event; a `snapshot` is sent on hello and on every
 * `resync_request`.
 */
export function registerWebSocketServer(httpServer: Server, options: ControlSocketOptions): WebSocketServer {
  const { registry, channel, logger } = options;
  const wsPath = options.path ?? '/ws';
  const wss = new WebSocketServer({ noServer: true });
  const clients = new Set<ClientContext>();

  httpServer.on('upgrade', (request, socket, head) => {
    if (!request.url?.startsWith(wsPath)) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });

  wss.on('connection', (socket, request: IncomingMessage) => {
    const ctx: ClientContext = {
      id: uuid(),
      socket,
      lastHeartbeat: Date.now(),
      isAlive: true,
    };
    const subscription = new AbortController();
    clients.add(ctx);

    logger.info({ id: ctx.id, ip: request.socket.remoteAddress }, 'ws_connected');

    const events = channel.subscribe({ signal: subscription.signal });
    void (async () => {
      for await (const event of events) {
        send(socket, { type: 'control_event', payload: event });
      }
    })();

    socket.on('message', (raw) => {
      handleMessage(raw.toString(), ctx, options);
    });

    socket.on('pong', () => {
      ctx.isAlive = true;
      ctx.lastHeartbeat = Date.now();
    });

    socket.on('close', () => {
      subscription.abort();
      clients.delete(ctx);
      if (ctx.agentId) {
        registry.markOffline(ctx.agentId);
      }
      logger.info({ id: ctx.id, agentId: ctx.agentId, ip: request.socket.remoteAddress }, 'ws_disconnected');
    });

    socket.on('error', (err) => {
      logger.error({ err, clientId: ctx.id }, 'ws_error');
      socket.close();
    });
  });

  const heartbeatInterval = setInterval(() => {
    for (const client of clients) {
      if (!client.isAlive) {
        options.logger.warn({ id: client.id, agentId: client.agentId }, 'ws_heartbeat_timeout');
        client.socket.terminate();
        continue;
      }
      client.isAlive = false;
      client.socket.ping();
    }
  }, options.heartbeatMs);

  wss.on('close', () => clearInterval(heartbeatInterval));
  return wss;
}

function handleMessage(raw: string, ctx: ClientContext, options: ControlSocketOptions): void {
  let envelope: z.infer<typeof envelopeSchema>;
  try {
    envelope = envelopeSchema.parse(JSON.parse(raw));
  } catch (error) {
    options.logger.warn({ error, raw }, 'ws_invalid_message');
    send(ctx.socket, { type: 'error', message: 'Invalid envelope' });
    return;
  }

  switch (envelope.type) {
    case 'agent_hello':
      handleAgentHello(envelope.payload, ctx, options);
      break;
    case 'resync_request':
      sendSnapshot(ctx, options, envelope.ref);
      break;
    case 'agent_log':
      handleAgentLog(envelope.payload, ctx, options);
      break;
    default:
      options.logger.debug({ type: envelope.type }, 'ws_unhandled_type');
  }
}

function handleAgentHello(payload: unknown, ctx: ClientContext, options: ControlSocketOptions): void {
  const data = agentHelloSchema.safeParse(payload);
  if (!data.success) {
    send(ctx.socket, { type: 'error', message: 'Invalid hello payload' });
    return;
  }
  if (ctx.agentId && ctx.agentId !== data.data.agentId) {
    send(ctx.socket, { type: 'error', message: 'Already registered' });
    return;
  }

  ctx.agentId = data.data.agentId;
  const agent = options.registry.registerAgent(data.data.agentId, data.data.displayName.trim());
  options.logger.info({ agentId: agent.agentId, teamId: agent.assignedTeamId }, 'agent_registered');
  sendSnapshot(ctx, options);
}

function handleAgentLog(payload: unknown, ctx: ClientContext, options: ControlSocketOptions): void {
  const data = agentLogSchema.safeParse(payload);
  if (!data.success || !ctx.agentId) return;
  options.logger.info({ agentId: ctx.agentId, message: data.data.message }, 'agent_log');
}

function sendSnapshot(ctx: ClientContext, options: ControlSocketOptions, ref?: string): void {
  send(ctx.socket, {
    type: 'snapshot',
    payload: options.registry.snapshot(),
    ...(ref ? { ref } : {}),
  });
}

function send(socket: WebSocket, message: OutboundMessage): void {
  if (socket.readyState !== socket.OPEN) return;
  socket.send(JSON.stringify(message));
}
