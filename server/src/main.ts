import http from 'node:http';
import { createApp } from './app.js';
import { config } from './config.js';
import { ControlChannel } from './control/controlChannel.js';
import { DockerCliEngine } from './engine/dockerCliEngine.js';
import { EndpointPool } from './engine/endpointPool.js';
import { EnvironmentController } from './lifecycle/environmentController.js';
import { RfbGreetingCheck } from './lifecycle/readiness.js';
import { logger } from './lib/logger.js';
import { MembershipRegistry } from './membership/membershipRegistry.js';
import { loadScenario } from './scenario/scenarioLoader.js';
import { registerWebSocketServer } from './ws/server.js';

logger.level = config.logLevel;

const channel = new ControlChannel();
const registry = new MembershipRegistry(channel);
const controller = new EnvironmentController({
  engine: new DockerCliEngine({
    binary: config.dockerBinary,
    containerPort: config.containerPort,
    endpointHost: config.endpointHost,
    containerEnv: config.vncPassword ? { VNC_PASSWORD: config.vncPassword } : undefined,
    logger,
  }),
  endpoints: new EndpointPool(config.endpointHost, config.portRange.start, config.portRange.end),
  readiness: new RfbGreetingCheck(),
  registry,
  logger,
  readinessTimeoutMs: config.readinessTimeoutMs,
  readinessPollMs: config.readinessPollMs,
  livenessIntervalMs: config.livenessIntervalMs,
  conflictPolicy: config.conflictPolicy,
});

const app = createApp({
  controller,
  registry,
  logger,
  corsOrigins: config.corsOrigins,
  scenarioDir: config.scenarioDir,
});
const server = http.createServer(app);
const wss = registerWebSocketServer(server, {
  registry,
  channel,
  logger,
  heartbeatMs: config.heartbeatMs,
});

server.listen(config.port, () => {
  logger.info({ port: config.port }, 'server_started');
});

controller.startLivenessMonitor();

if (config.scenarioPath) {
  loadScenario(config.scenarioPath)
    .then((scenario) => controller.startScenario(scenario))
    .then((result) => {
      for (const failure of result.failures) {
        logger.error({ teamId: failure.teamId, err: failure.error }, 'team_environment_unavailable');
      }
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'scenario_start_failed');
    });
}

process.on('SIGINT', () => {
  logger.info('shutting_down');
  controller.stopLivenessMonitor();
  controller
    .stopScenario()
    .catch((error: unknown) => logger.error({ err: error }, 'shutdown_stop_failed'))
    .finally(() => {
      wss.close();
      server.close(() => process.exit(0));
    });
});
