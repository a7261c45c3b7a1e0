/**
 * Advisor Types
 */

import { z } from 'zod';

/**
 * Student profile submitted from the web form. Only the fields the advisor
 * reads are typed; anything else is passed through to the prompt untouched.
 */
export const studentDataSchema = z
  .object({
    name: z.string().optional(),
    academic: z
      .object({
        major: z.string().optional(),
        gpa: z.union([z.string(), z.number()]).optional(),
        year: z.string().optional(),
      })
      .passthrough()
      .optional(),
    goals: z
      .object({
        interests: z.array(z.union([z.string(), z.number()])).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type StudentData = z.infer<typeof studentDataSchema>;

/**
 * Student profile enriched with transcript-derived data.
 */
export type AdvisorStudent = StudentData & {
  readonly transcript_text?: string;
  readonly coursework?: readonly string[];
};

export interface LabRecommendation {
  readonly name: string;
  readonly professor: string;
  readonly professor_email: string;
  readonly school: string;
  readonly url: string;
  readonly description: string;
  readonly relevance_score: number;
  readonly skills: readonly string[];
  readonly coursework: readonly string[];
}

export type AdvisorProviderName = 'gemini' | 'openai';
