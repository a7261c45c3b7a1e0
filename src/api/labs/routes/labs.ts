/**
 * Lab Catalog Routes
 *
 * Mounted under /api:
 * - GET  /labs
 * - GET  /schools
 * - GET  /lab/:id
 * - POST /recommendations
 */

import { Hono } from 'hono';

import type { ApiDeps } from '../../types';
import { createLabsController } from '../controllers/labs';

export function createLabsRouter(deps: ApiDeps): Hono {
  const controller = createLabsController(deps);
  const router = new Hono();

  router.get('/labs', (c) => controller.list(c));
  router.get('/schools', (c) => controller.schools(c));
  router.get('/lab/:id', (c) => controller.detail(c));
  router.post('/recommendations', (c) => controller.recommendations(c));

  return router;
}
