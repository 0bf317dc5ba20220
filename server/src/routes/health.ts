import { Router } from 'express';
import os from 'node:os';
import type { EnvironmentController } from '../lifecycle/environmentController.js';
import type { MembershipRegistry } from '../membership/membershipRegistry.js';

export function createHealthRouter(controller: EnvironmentController, registry: MembershipRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    const environments = controller.listEnvironments();
    const agents = registry.listAgents();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      environments: environments.length,
      running: environments.filter((env) => env.state === 'running').length,
      agents: agents.length,
      online: agents.filter((agent) => agent.online).length,
      load: os.loadavg?.() ?? [],
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
