import type { Context } from 'hono';

import type { ApiDeps } from '../../types';

export function createStatusController(deps: ApiDeps) {
  return {
    /**
     * GET /api/status
     */
    status(c: Context) {
      const { config } = deps;
      const advisor = deps.advisorStatus(config.aiProvider);
      const ragAvailable = advisor.geminiAvailable || advisor.openaiAvailable;

      return c.json({
        status: 'running',
        ai_provider: config.aiProvider,
        gemini_available: advisor.geminiAvailable,
        openai_available: advisor.openaiAvailable,
        limits: { client_max_mb: config.clientMaxMb, server_max_mb: config.serverMaxMb },
        features: {
          lab_browsing: true,
          basic_recommendations: true,
          rag_analysis: ragAvailable,
          transcript_upload: ragAvailable,
          email_drafts: deps.isOutreachConfigured(),
        },
      });
    },
  };
}
