import { Router } from 'express';
import { assignmentBodySchema } from '../control/schemas.js';
import { MembershipError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { MembershipRegistry } from '../membership/membershipRegistry.js';

export function createMembershipRouter(registry: MembershipRegistry, logger: Logger): Router {
  const router = Router();

  router.get('/membership', (_req, res) => {
    res.json(registry.snapshot());
  });

  router.put('/agents/:agentId/team', (req, res) => {
    const body = assignmentBodySchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: 'TEAM_REQUIRED' });
      return;
    }
    try {
      const event = registry.assign(req.params.agentId, body.data.teamId);
      logger.info({ agentId: req.params.agentId, teamId: body.data.teamId, changed: event !== null }, 'agent_assigned');
      res.json({ status: event ? 'assigned' : 'unchanged', event });
    } catch (error) {
      if (error instanceof MembershipError) {
        res.status(404).json({ error: error.code, message: error.message });
        return;
      }
      throw error;
    }
  });

  router.delete('/agents/:agentId/team', (req, res) => {
    const event = registry.unassign(req.params.agentId);
    logger.info({ agentId: req.params.agentId, changed: event !== null }, 'agent_unassigned');
    res.json({ status: event ? 'unassigned' : 'unchanged', event });
  });

  return router;
}
