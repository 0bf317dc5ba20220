import { config } from './config.js';
import { ControlClient } from './control/controlClient.js';
import { SessionCoordinator } from './coordinator/sessionCoordinator.js';
import { logger } from './lib/logger.js';
import { RemoteDesktopSession } from './session/remoteDesktopSession.js';
import { noneSecurity } from './session/security.js';
import { vncAuthSecurity } from './session/vncAuth.js';
import { openTcpTransport } from './transport/tcpTransport.js';

logger.level = config.logLevel;

// With a password configured, a desktop that offers only None is refused.
const security = config.vncPassword ? [vncAuthSecurity(config.vncPassword)] : [noneSecurity];

const control = new ControlClient({
  url: config.controllerUrl,
  agentId: config.agentId,
  displayName: config.displayName,
  reconnectMs: config.controlReconnectMs,
  logger,
});

const coordinator = new SessionCoordinator({
  agentId: config.agentId,
  feed: control,
  connect: (endpoint) =>
    RemoteDesktopSession.connect(endpoint, {
      transport: openTcpTransport,
      security,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      reconnect: config.reconnect,
      logger,
    }),
  retry: config.reconnect,
  logger,
});

coordinator.onSessionChange((active) => {
  if (!active) return;
  const { session, teamId } = active;
  control.log(`session opened to team ${teamId} (${session.desktopName || 'unnamed desktop'})`);
  session.onFrame((frame) => {
    logger.debug({ teamId, version: frame.version }, 'frame_applied');
  });
});

coordinator.onIssue((issue) => {
  logger.warn({ err: issue }, 'session_issue');
  control.log(`${issue.name}: ${issue.message}`);
});

control.start();
coordinator.start();
logger.info({ agentId: config.agentId, controller: config.controllerUrl }, 'agent_started');

process.on('SIGINT', () => {
  logger.info('shutting_down');
  coordinator
    .stop()
    .catch((error: unknown) => logger.error({ err: error }, 'shutdown_failed'))
    .finally(() => {
      control.close();
      process.exit(0);
    });
});
