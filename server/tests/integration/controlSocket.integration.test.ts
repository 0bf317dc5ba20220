import { once } from 'node:events';
import http from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import WebSocket, { type WebSocketServer } from 'ws';
import { z } from 'zod';
import { createApp } from '../../src/app.js';
import { ControlChannel } from '../../src/control/controlChannel.js';
import { envelopeSchema } from '../../src/control/schemas.js';
import { EndpointPool } from '../../src/engine/endpointPool.js';
import { EnvironmentController } from '../../src/lifecycle/environmentController.js';
import { MembershipRegistry } from '../../src/membership/membershipRegistry.js';
import { registerWebSocketServer } from '../../src/ws/server.js';
import { FakeContainerEngine, FakeReadinessCheck, testLogger } from '../unit/helpers/fakes.js';

type Envelope = z.infer<typeof envelopeSchema>;

function nextMessage(socket: WebSocket, type: string): Promise<Envelope> {
  return new Promise((resolve) => {
    const onMessage = (raw: WebSocket.RawData) => {
      const envelope = envelopeSchema.parse(JSON.parse(raw.toString()));
      if (envelope.type !== type) return;
      socket.off('message', onMessage);
      resolve(envelope);
    };
    socket.on('message', onMessage);
  });
}

describe('controller HTTP and control socket', () => {
  let server: http.Server;
  let wss: WebSocketServer;
  let registry: MembershipRegistry;
  let controller: EnvironmentController;
  let baseUrl: string;
  let sockets: WebSocket[];

  beforeEach(async () => {
    const channel = new ControlChannel();
    registry = new MembershipRegistry(channel);
    registry.defineTeams(['blue', 'red']);
    controller = new EnvironmentController({
      engine: new FakeContainerEngine(),
      endpoints: new EndpointPool('127.0.0.1', 6400, 6409),
      readiness: new FakeReadinessCheck(),
      registry,
      logger: testLogger,
      readinessTimeoutMs: 50,
      readinessPollMs: 5,
      livenessIntervalMs: 1_000,
    });
    server = http.createServer(createApp({ controller, registry, logger: testLogger, corsOrigins: [], scenarioDir: '.' }));
    wss = registerWebSocketServer(server, { registry, channel, logger: testLogger, heartbeatMs: 60_000 });
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `127.0.0.1:${address.port}`;
    sockets = [];
  });

  afterEach(async () => {
    for (const socket of sockets) {
      socket.terminate();
    }
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function connect(): Promise<WebSocket> {
    const socket = new WebSocket(`ws://${baseUrl}/ws`);
    sockets.push(socket);
    await once(socket, 'open');
    return socket;
  }

  it('answers hello with a snapshot that lists the agent online', async () => {
    const socket = await connect();
    const snapshot = nextMessage(socket, 'snapshot');

    socket.send(JSON.stringify({ type: 'agent_hello', payload: { agentId: 'a1', displayName: 'Ada' } }));

    expect((await snapshot).payload).toMatchObject({
      agents: [{ agentId: 'a1', displayName: 'Ada', online: true }],
      teams: [{ teamId: 'blue' }, { teamId: 'red' }],
    });
  });

  it('streams assignments made over HTTP', async () => {
    const socket = await connect();
    const event = nextMessage(socket, 'control_event');

    const response = await fetch(`http://${baseUrl}/api/agents/a1/team`, {
      method: 'PUT',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ teamId: 'blue' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'assigned' });
    expect((await event).payload).toEqual({
      scope: 'agent:a1',
      sequence: 1,
      kind: 'assigned',
      payload: { agentId: 'a1', teamId: 'blue' },
    });
  });

  it('echoes the ref on a resync snapshot', async () => {
    const socket = await connect();
    const snapshot = nextMessage(socket, 'snapshot');

    socket.send(JSON.stringify({ type: 'resync_request', payload: {}, ref: 'resync-7' }));

    expect((await snapshot).ref).toBe('resync-7');
  });

  it('rejects malformed envelopes', async () => {
    const socket = await connect();
    const error = nextMessage(socket, 'error');

    socket.send('not json');

    expect((await error).type).toBe('error');
  });

  it('marks the agent offline when its socket closes', async () => {
    const socket = await connect();
    const snapshot = nextMessage(socket, 'snapshot');
    socket.send(JSON.stringify({ type: 'agent_hello', payload: { agentId: 'a1', displayName: 'Ada' } }));
    await snapshot;

    socket.close();
    await expect.poll(() => registry.listAgents()[0]?.online).toBe(false);
  });

  it('refuses an unknown team and a missing body', async () => {
    const unknown = await fetch(`http://${baseUrl}/api/agents/a1/team`, {
      method: 'PUT',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ teamId: 'green' }),
    });
    const missing = await fetch(`http://${baseUrl}/api/agents/a1/team`, {
      method: 'PUT',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({}),
    });

    expect(unknown.status).toBe(404);
    expect(await unknown.json()).toMatchObject({ error: 'UNKNOWN_TEAM' });
    expect(missing.status).toBe(400);
  });

  it('lists environments and reports health', async () => {
    await controller.createEnvironment({ name: 'blue', image: 'lab/desktop:1', resources: {} });

    const environments = await fetch(`http://${baseUrl}/api/environments`);
    const health = await fetch(`http://${baseUrl}/health`);

    expect(await environments.json()).toMatchObject({
      environments: [{ teamId: 'blue', state: 'running', endpoint: { host: '127.0.0.1', port: 6400 } }],
    });
    expect(await health.json()).toMatchObject({ status: 'ok', environments: 1, running: 1 });
  });
});
