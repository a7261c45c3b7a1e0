import { Hono } from 'hono';

import type { ApiDeps } from '../../types';
import { createEmailDraftController } from '../controllers/email-draft';

export function createEmailDraftRouter(deps: ApiDeps): Hono {
  const controller = createEmailDraftController(deps);
  const router = new Hono();

  router.post('/email-draft', (c) => controller.draft(c));

  return router;
}
