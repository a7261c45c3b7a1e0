/**
 * Lab record types shared by discovery, the catalog API and the advisor.
 */

import { z } from 'zod';

/**
 * A research lab as stored in the labs JSON catalog.
 * Field names follow the catalog's on-disk format.
 */
export interface LabRecord {
  readonly name: string;
  readonly professor: string;
  readonly school: string;
  readonly description: string;
  readonly url: string;
  readonly professor_email: string;
  readonly department?: string;
}

export interface ScoredLabRecord extends LabRecord {
  readonly relevance_score: number;
}

/**
 * Lenient schema for catalog entries: missing or non-string fields become ''
 * so hand-edited catalogs still load. Unknown keys are kept.
 */
export const labRecordSchema = z
  .object({
    name: z.string().catch(''),
    professor: z.string().catch(''),
    school: z.string().catch(''),
    description: z.string().catch(''),
    url: z.string().catch(''),
    professor_email: z.string().catch(''),
    department: z.string().optional().catch(undefined),
  })
  .passthrough();
