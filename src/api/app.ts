/**
 * Research Outreach API
 *
 * Hono application serving the lab browser page and its JSON API.
 */

import * as path from 'path';
import { serveStatic } from '@hono/node-server/serve-static';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { logger as requestLogger } from 'hono/logger';

import { errorMessage } from '../ai';
import { createAdvisorRouter } from './advisor/routes/advisor';
import { createEmailDraftRouter } from './email-draft/routes/email-draft';
import { createLabsRouter } from './labs/routes/labs';
import { createStatusRouter } from './status/routes/status';
import type { ApiDeps } from './types';

const BYTES_PER_MB = 1024 * 1024;

export function createApp(deps: ApiDeps): Hono {
  const { config, logger } = deps;
  const app = new Hono();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use('*', requestLogger((message) => logger.info(message)));

  app.use(
    '/api/*',
    bodyLimit({
      maxSize: config.serverMaxMb * BYTES_PER_MB,
      onError: (c) => c.json({ error: `File too large. Max ${config.clientMaxMb}MB allowed.` }, 413),
    })
  );

  // ===========================================================================
  // STATIC FILES
  // ===========================================================================

  app.get('/', serveStatic({ path: path.join(config.publicDir, 'index.html') }));
  app.use('/static/*', serveStatic({ root: config.publicDir }));

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  app.route('/api', createStatusRouter(deps));
  app.route('/api', createLabsRouter(deps));
  app.route('/api', createAdvisorRouter(deps));
  app.route('/api', createEmailDraftRouter(deps));

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${errorMessage(err)}`);
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
