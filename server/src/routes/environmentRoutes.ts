import { Router } from 'express';
import type { EnvironmentController } from '../lifecycle/environmentController.js';
import type { Logger } from '../lib/logger.js';
import { teamSpecSchema } from '../scenario/scenarioSchema.js';
import { sendError } from './httpErrors.js';

export function createEnvironmentRouter(controller: EnvironmentController, logger: Logger): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ environments: controller.listEnvironments() });
  });

  router.get('/:teamId', (req, res) => {
    const environment = controller.getEnvironment(req.params.teamId);
    if (!environment) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json(environment);
  });

  router.post('/', async (req, res) => {
    const body = teamSpecSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'INVALID_TEAM', issues: body.error.issues });
      return;
    }
    try {
      res.status(201).json(await controller.createEnvironment(body.data));
    } catch (error) {
      sendError(res, error, logger, 'environment_create_rejected');
    }
  });

  router.delete('/:teamId', async (req, res) => {
    const { teamId } = req.params;
    if (!controller.getEnvironment(teamId)) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    try {
      await controller.stopEnvironment(teamId);
      res.json({ status: 'stopped', environment: controller.getEnvironment(teamId) ?? null });
    } catch (error) {
      sendError(res, error, logger, 'environment_stop_failed');
    }
  });

  return router;
}
