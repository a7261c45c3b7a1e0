import type { Context } from 'hono';

import {
  type AdvisorStudent,
  errorMessage,
  extractCourseworkHints,
  isAllowedTranscript,
  studentDataSchema,
} from '../../../ai';
import type { ApiDeps } from '../../types';

export function createAdvisorController(deps: ApiDeps) {
  const { config } = deps;

  return {
    /**
     * POST /api/rag-recommendations (multipart/form-data)
     * Fields: student_data (JSON string, required), transcript (PDF, optional)
     *
     * The transcript is read in memory and never written to disk.
     */
    async ragRecommendations(c: Context) {
      try {
        const body = await c.req.parseBody();

        const studentJson = body['student_data'];
        if (typeof studentJson !== 'string' || studentJson.length === 0) {
          return c.json({ error: 'Missing student data' }, 400);
        }

        let rawStudent: unknown;
        try {
          rawStudent = JSON.parse(studentJson);
        } catch {
          return c.json({ error: 'Invalid JSON in student_data' }, 400);
        }

        const parsedStudent = studentDataSchema.safeParse(rawStudent);
        if (!parsedStudent.success) {
          const details = parsedStudent.error.issues
            .map((issue) => `${issue.path.join('.') || 'student_data'}: ${issue.message}`)
            .join('; ');
          return c.json({ error: `Invalid student_data: ${details}` }, 400);
        }

        let transcriptText = '';
        const transcript = body['transcript'];
        if (transcript !== undefined && typeof transcript !== 'string' && transcript.name) {
          if (!isAllowedTranscript(transcript.name)) {
            return c.json({ error: `Only .pdf files are allowed (max ${config.clientMaxMb}MB).` }, 400);
          }
          transcriptText = await deps.extractTranscriptText(new Uint8Array(await transcript.arrayBuffer()));
        }

        const labs = deps.loadLabs();
        const student: AdvisorStudent = {
          ...parsedStudent.data,
          transcript_text: transcriptText,
          coursework: extractCourseworkHints(transcriptText),
        };

        const status = deps.advisorStatus(config.aiProvider);
        if (!status.available) {
          return c.json({ error: status.unavailableMessage ?? 'AI provider not available' }, 503);
        }

        const result = await deps.recommend(student, labs, config.aiProvider);
        return c.json({ recommendations: result.recommendations });
      } catch (error) {
        deps.logger.error(`RAG recommendations failed: ${errorMessage(error)}`);
        return c.json({ error: errorMessage(error) }, 500);
      }
    },
  };
}
