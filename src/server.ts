/**
 * Web server entry point.
 *
 * Usage: npm start
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { isGeminiConfigured, isOpenAIConfigured } from './ai';
import { createApp } from './api/app';
import { createDefaultApiDeps } from './api/deps';
import { loadServerConfig } from './config/server';
import { createPrefixedLogger } from './utils/logger';

const log = createPrefixedLogger('[Server]');

const config = loadServerConfig();
const app = createApp(createDefaultApiDeps(config));

serve({ fetch: app.fetch, port: config.port }, (info) => {
  log.info(`Research outreach app listening on http://localhost:${info.port}`);
  log.info(`Advisor provider: ${config.aiProvider}`);
  log.info(`Gemini RAG features: ${isGeminiConfigured() ? 'Enabled' : 'Disabled'}`);
  log.info(`OpenAI RAG features: ${isOpenAIConfigured() ? 'Enabled' : 'Disabled'}`);
});
