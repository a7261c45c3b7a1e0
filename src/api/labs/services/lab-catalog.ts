/**
 * Lab Catalog Service
 *
 * Reads the labs JSON file and answers the browsing queries of the web app.
 * The file is re-read on every call so a repopulated catalog shows up
 * without a restart.
 */

import * as fs from 'fs';

import {
  ADVISOR_CONFIG,
  errorMessage,
  type LabRecord,
  labRecordSchema,
  type ScoredLabRecord,
  scoreLabs,
} from '../../../ai';
import { createPrefixedLogger, type Logger } from '../../../utils/logger';

export interface LabFilters {
  readonly school?: string;
  readonly search?: string;
  readonly professor?: string;
  readonly professor_email?: string;
}

export interface BasicRecommendationsResult {
  readonly recommendations: ScoredLabRecord[];
  readonly total_labs: number;
  readonly matching_labs: number;
}

const defaultLog = createPrefixedLogger('[LabCatalog]');

/**
 * Returns [] when the file is missing, unreadable or not a JSON array.
 */
export function loadLabsData(filePath: string, log: Logger = defaultLog): LabRecord[] {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    log.warn(`Labs data not found at ${filePath}. Returning empty list. (${errorMessage(error)})`);
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    log.error(`Failed to parse labs JSON: ${errorMessage(error)}`);
    return [];
  }

  if (!Array.isArray(data)) {
    log.warn(`Labs data at ${filePath} is not an array. Returning empty list.`);
    return [];
  }

  const labs: LabRecord[] = [];
  for (const entry of data) {
    const parsed = labRecordSchema.safeParse(entry);
    if (parsed.success) {
      labs.push(parsed.data);
    } else {
      log.warn('Skipping malformed lab entry');
    }
  }
  return labs;
}

function normalizeFilter(value: string | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

/**
 * Case-insensitive substring filters. Every given filter must match.
 */
export function filterLabs(labs: readonly LabRecord[], filters: LabFilters): LabRecord[] {
  const school = normalizeFilter(filters.school);
  const search = normalizeFilter(filters.search);
  const professor = normalizeFilter(filters.professor);
  const professorEmail = normalizeFilter(filters.professor_email);

  if (!school && !search && !professor && !professorEmail) {
    return [...labs];
  }

  return labs.filter((lab) => {
    const name = lab.name.toLowerCase();
    const description = lab.description.toLowerCase();
    const prof = lab.professor.toLowerCase();
    const email = lab.professor_email.toLowerCase();
    const labSchool = lab.school.toLowerCase();

    if (school && !labSchool.includes(school)) return false;
    if (professor && !prof.includes(professor)) return false;
    if (professorEmail && !email.includes(professorEmail)) return false;
    if (
      search &&
      !(name.includes(search) || description.includes(search) || prof.includes(search) || labSchool.includes(search))
    ) {
      return false;
    }
    return true;
  });
}

export function listSchools(labs: readonly LabRecord[]): string[] {
  const schools = new Set(labs.map((lab) => lab.school).filter((school) => school.length > 0));
  return [...schools].sort();
}

export function getLab(labs: readonly LabRecord[], id: number): LabRecord | undefined {
  if (!Number.isInteger(id) || id < 0) return undefined;
  return labs[id];
}

export function basicRecommendations(
  labs: readonly LabRecord[],
  major: string | undefined,
  interests: readonly unknown[] | undefined
): BasicRecommendationsResult {
  const matching = scoreLabs(labs, major, interests);
  return {
    recommendations: matching.slice(0, ADVISOR_CONFIG.BASIC_RECOMMENDATION_LIMIT),
    total_labs: labs.length,
    matching_labs: matching.length,
  };
}
