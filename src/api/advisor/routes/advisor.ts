import { Hono } from 'hono';

import type { ApiDeps } from '../../types';
import { createAdvisorController } from '../controllers/advisor';

export function createAdvisorRouter(deps: ApiDeps): Hono {
  const controller = createAdvisorController(deps);
  const router = new Hono();

  router.post('/rag-recommendations', (c) => controller.ragRecommendations(c));

  return router;
}
