import type { Context } from 'hono';
import { z } from 'zod';

import { errorMessage, isRecord } from '../../../ai';
import type { ApiDeps } from '../../types';
import { basicRecommendations, filterLabs, getLab, listSchools } from '../services/lab-catalog';

const LAB_ID_RE = /^\d+$/;

const recommendationsBodySchema = z.object({
  major: z.string().nullish(),
  interests: z.array(z.unknown()).nullish(),
});

export function createLabsController(deps: ApiDeps) {
  return {
    /**
     * GET /api/labs?school=&search=&professor=&professor_email=
     */
    list(c: Context) {
      const labs = deps.loadLabs();
      return c.json(
        filterLabs(labs, {
          school: c.req.query('school'),
          search: c.req.query('search'),
          professor: c.req.query('professor'),
          professor_email: c.req.query('professor_email'),
        })
      );
    },

    /**
     * GET /api/schools
     */
    schools(c: Context) {
      return c.json(listSchools(deps.loadLabs()));
    },

    /**
     * GET /api/lab/:id
     */
    detail(c: Context) {
      const rawId = c.req.param('id') ?? '';
      const lab = LAB_ID_RE.test(rawId) ? getLab(deps.loadLabs(), Number(rawId)) : undefined;
      if (!lab) {
        return c.json({ error: 'Lab not found' }, 404);
      }
      return c.json(lab);
    },

    /**
     * POST /api/recommendations
     * Body: { major?: string, interests?: unknown[] }
     */
    async recommendations(c: Context) {
      try {
        const payload: unknown = await c.req.json();
        if (!isRecord(payload)) {
          return c.json({ error: 'Request body must be a JSON object' }, 500);
        }
        const parsed = recommendationsBodySchema.safeParse(payload);
        if (!parsed.success) {
          return c.json({ error: parsed.error.issues.map((issue) => issue.message).join('; ') }, 500);
        }

        const major = (parsed.data.major ?? '').toLowerCase();
        return c.json(basicRecommendations(deps.loadLabs(), major, parsed.data.interests ?? []));
      } catch (error) {
        return c.json({ error: errorMessage(error) }, 500);
      }
    },
  };
}

export type LabsController = ReturnType<typeof createLabsController>;
