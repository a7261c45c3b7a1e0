/**
 * Deterministic advisor fallback: keyword scoring over the labs catalog.
 */

import { ADVISOR_CONFIG } from '../config/pipeline';
import { scoreLabs } from '../labs/scoring';
import type { LabRecord } from '../labs/types';
import { inferEmail } from './email-inference';
import type { LabRecommendation, StudentData } from './types';

export function fallbackRecommendations(student: StudentData, labs: readonly LabRecord[]): LabRecommendation[] {
  const major = student.academic?.major;
  const interests = student.goals?.interests;

  return scoreLabs(labs, major, interests)
    .slice(0, ADVISOR_CONFIG.MAX_FALLBACK_ITEMS)
    .map((lab) => ({
      name: lab.name || ADVISOR_CONFIG.DEFAULT_LAB_NAME,
      professor: lab.professor,
      professor_email: lab.professor_email || inferEmail(lab.professor, lab.url, lab.school),
      school: lab.school,
      url: lab.url || '#',
      description: lab.description.slice(0, ADVISOR_CONFIG.FALLBACK_DESCRIPTION_LENGTH),
      relevance_score: lab.relevance_score,
      skills: [],
      coursework: [],
    }));
}
