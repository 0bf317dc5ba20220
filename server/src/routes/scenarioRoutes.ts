import path from 'node:path';
import { Router } from 'express';
import { z } from 'zod';
import { EnvironmentConflictError } from '../lib/errors.js';
import type { EnvironmentController } from '../lifecycle/environmentController.js';
import { isLive } from '../lifecycle/environmentStates.js';
import type { Logger } from '../lib/logger.js';
import { loadScenario } from '../scenario/scenarioLoader.js';
import { errorCode, sendError } from './httpErrors.js';

// A bare file name: no separators, so requests cannot leave the scenario directory.
export const scenarioRequestSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/),
});

export function createScenarioRouter(controller: EnvironmentController, scenarioDir: string, logger: Logger): Router {
  const router = Router();

  router.post('/', async (req, res) => {
    const body = scenarioRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'SCENARIO_NAME_REQUIRED' });
      return;
    }
    try {
      const scenario = await loadScenario(path.join(scenarioDir, `${body.data.name}.json`));
      const result = await controller.startScenario(scenario);
      const failures = result.failures.map(({ teamId, error }) => ({
        teamId,
        error: errorCode(error),
        message: error.message,
      }));
      let status = 201;
      if (result.environments.length === 0) {
        status = result.failures.every(({ error }) => error instanceof EnvironmentConflictError) ? 409 : 502;
      }
      res.status(status).json({ scenarioId: scenario.id, environments: result.environments, failures });
    } catch (error) {
      sendError(res, error, logger, 'scenario_start_rejected');
    }
  });

  router.delete('/', async (_req, res) => {
    try {
      const stopped = controller.listEnvironments().filter((environment) => isLive(environment.state)).length;
      await controller.stopScenario();
      logger.info({ stopped }, 'scenario_stop_requested');
      res.json({ status: 'stopped', stopped });
    } catch (error) {
      sendError(res, error, logger, 'scenario_stop_failed');
    }
  });

  return router;
}
