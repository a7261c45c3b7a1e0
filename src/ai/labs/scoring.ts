/**
 * Keyword relevance scoring for labs.
 *
 * Used by the non-AI recommendations route and as the advisor's last-resort
 * fallback when the model output cannot be used.
 */

import type { LabRecord, ScoredLabRecord } from './types';

export const SCORE_WEIGHTS = {
  /** Major appears in the lab name or description */
  MAJOR_MATCH: 3,
  /** Each interest that appears in the lab name or description */
  INTEREST_MATCH: 2,
  /** Major appears in the school name */
  SCHOOL_MATCH: 1,
} as const;

/**
 * Scores one lab. `major` and `interests` must already be lower-cased.
 */
export function scoreLab(lab: LabRecord, major: string, interests: readonly string[]): number {
  const name = lab.name.toLowerCase();
  const description = lab.description.toLowerCase();
  const school = lab.school.toLowerCase();

  let score = 0;
  if (major && (name.includes(major) || description.includes(major))) {
    score += SCORE_WEIGHTS.MAJOR_MATCH;
  }
  for (const interest of interests) {
    if (interest && (name.includes(interest) || description.includes(interest))) {
      score += SCORE_WEIGHTS.INTEREST_MATCH;
    }
  }
  if (major && school.includes(major)) {
    score += SCORE_WEIGHTS.SCHOOL_MATCH;
  }
  return score;
}

/**
 * Returns labs with a positive score, highest first. Ties keep catalog order.
 */
export function scoreLabs(
  labs: readonly LabRecord[],
  major: string | undefined,
  interests: readonly unknown[] | undefined
): ScoredLabRecord[] {
  const normalizedMajor = (major ?? '').toLowerCase();
  const normalizedInterests = (interests ?? []).map((interest) => String(interest).toLowerCase());

  return labs
    .map((lab) => ({ ...lab, relevance_score: scoreLab(lab, normalizedMajor, normalizedInterests) }))
    .filter((lab) => lab.relevance_score > 0)
    .sort((a, b) => b.relevance_score - a.relevance_score);
}
