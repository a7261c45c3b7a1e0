import { Hono } from 'hono';

import type { ApiDeps } from '../../types';
import { createStatusController } from '../controllers/status';

export function createStatusRouter(deps: ApiDeps): Hono {
  const controller = createStatusController(deps);
  const router = new Hono();

  router.get('/status', (c) => controller.status(c));

  return router;
}
