import { Router } from 'express';
import { createRequire } from 'module';
import type { ProjectRegistry } from '../services/registry/project-registry.js';
import type { QueueConsumer } from '../services/queue/queue-consumer.js';

const req = createRequire(import.meta.url);
const SERVER_VERSION = (req('@relaunch/server/package.json') as { version: string }).version;

/** What the health route reports on. */
export interface HealthDeps {
  registry: Pick<ProjectRegistry, 'size'>;
  consumer: Pick<QueueConsumer, 'state'>;
  sourceQueue: string;
  defaultTargetQueue: string;
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      version: SERVER_VERSION,
      uptime: process.uptime(),
      projects: deps.registry.size,
      sourceQueue: deps.sourceQueue,
      defaultTargetQueue: deps.defaultTargetQueue,
      consumer: deps.consumer.state,
    });
  });

  return router;
}
