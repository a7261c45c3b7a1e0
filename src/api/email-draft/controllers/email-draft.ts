import type { Context } from 'hono';
import { z } from 'zod';

import { errorMessage, isOutreachError } from '../../../ai';
import type { ApiDeps } from '../../types';

const bodySchema = z
  .object({
    professor: z.string().trim().max(200).optional(),
    lab: z.string().trim().max(300).optional(),
    recipient_info: z.string().trim().max(5000).optional(),
  })
  .refine((v) => Boolean(v.professor || v.recipient_info), {
    message: 'Provide professor or recipient_info',
  });

type EmailDraftBody = z.infer<typeof bodySchema>;

/**
 * Free-text recipient info when given, otherwise "Professor: X, Lab: Y".
 */
export function buildRecipientInfo(body: EmailDraftBody): string {
  if (body.recipient_info) return body.recipient_info;
  return `Professor: ${body.professor || 'Unknown Professor'}, Lab: ${body.lab || 'Unknown Lab'}`;
}

export function createEmailDraftController(deps: ApiDeps) {
  return {
    /**
     * POST /api/email-draft
     * Body: { professor?: string, lab?: string, recipient_info?: string }
     *
     * Drafts (never sends) an outreach email written as the configured
     * student profile.
     */
    async draft(c: Context) {
      let payload: unknown;
      try {
        payload = await c.req.json();
      } catch {
        return c.json({ error: 'Request body must be valid JSON' }, 400);
      }

      const parsed = bodySchema.safeParse(payload);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
        return c.json({ error: 'Invalid request body', issues }, 400);
      }

      if (!deps.isOutreachConfigured()) {
        return c.json({ error: 'AI is not configured. Set OPENROUTER_API_KEY environment variable.' }, 503);
      }

      const character = deps.loadStudentProfile();
      if (!character) {
        return c.json({ error: 'Student profile not found' }, 500);
      }

      try {
        const result = await deps.draftEmail({ recipientInfo: buildRecipientInfo(parsed.data), character });
        return c.json({ email: result.email, approved: result.approved, iterations: result.iterations });
      } catch (error) {
        if (isOutreachError(error) && error.code === 'CONTEXT_INVALID') {
          return c.json({ error: error.message }, 400);
        }
        deps.logger.error(`Email draft failed: ${errorMessage(error)}`);
        return c.json({ error: errorMessage(error) }, 500);
      }
    },
  };
}
