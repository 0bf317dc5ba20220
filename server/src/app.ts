import express, { type Express } from 'express';
import cors from 'cors';
import type { EnvironmentController } from './lifecycle/environmentController.js';
import type { Logger } from './lib/logger.js';
import type { MembershipRegistry } from './membership/membershipRegistry.js';
import { createEnvironmentRouter } from './routes/environmentRoutes.js';
import { createHealthRouter } from './routes/health.js';
import { createMembershipRouter } from './routes/membershipRoutes.js';
import { createScenarioRouter } from './routes/scenarioRoutes.js';

export interface AppDependencies {
  controller: EnvironmentController;
  registry: MembershipRegistry;
  logger: Logger;
  corsOrigins: string[];
  /** Where `POST /api/scenarios` looks up `<name>.json`. */
  scenarioDir: string;
}

export function createApp({ controller, registry, logger, corsOrigins, scenarioDir }: AppDependencies): Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Rangelab Controller',
      version: '0.1.0',
    });
  });

  app.use('/health', createHealthRouter(controller, registry));
  app.use('/api/environments', createEnvironmentRouter(controller, logger));
  app.use('/api/scenarios', createScenarioRouter(controller, scenarioDir, logger));
  app.use('/api', createMembershipRouter(registry, logger));

  return app;
}
