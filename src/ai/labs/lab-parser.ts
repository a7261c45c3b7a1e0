/**
 * Lab Result Parser
 *
 * Turns the free-form lab-discovery output into LabRecord objects. The model
 * is asked for numbered entries with labelled fields, but in practice returns
 * any mix of markdown headings, bold bullets and plain "Field: value" lines,
 * so parsing is keyword based and tolerant.
 */

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { LAB_DISCOVERY_CONFIG } from '../config/pipeline';
import type { LabRecord } from './types';

// ============================================================================
// Constants
// ============================================================================

/** Splits on "### 1." headings or "\n1." numbered items */
const SECTION_SPLIT_RE = /###\s*\d+\.\s*|\n\d+\.\s*/;

/** "- **Field**: value" */
const BOLD_BULLET_RE = /^-\s*\*\*([^*]+)\*\*:?\s*(.+)/;

const PROPER_NAME_RE = /[A-Z][a-z]{2,}/;

/**
 * Professor values that are placeholders rather than people. A value is
 * rejected when it equals one of these, starts with it followed by a space,
 * or ends with a space followed by it.
 */
export const INVALID_PROFESSOR_NAMES: readonly string[] = [
  'not specified',
  'faculty member',
  'unknown',
  'tbd',
  'to be determined',
  'research team',
  'lab team',
  'multiple faculty',
  'various faculty',
  'staff',
  'researchers',
  'n/a',
  'none',
  'contact lab',
  'see website',
  'not explicitly named',
  'not provided',
  'associated with',
  'center for',
  'department of',
  'school of',
  'institute of',
  'laboratory',
  'group',
];

const CONTACT_PHRASES = ['contact', 'email', 'website', 'page'] as const;

/** Title words match in either case. Names must be capitalized. */
const PROFESSOR_IN_TEXT_PATTERNS: readonly RegExp[] = [
  /(?:[Dd]r\.|[Pp]rofessor|[Pp]rof\.)\s+([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)/,
  /([A-Z][a-z]+\s+[A-Z][a-z]+)(?:\s+is|\s+leads|\s+directs|\s+heads)/,
  /[Ll]ed by\s+(?:Dr\.|Professor|Prof\.)?\s*([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)/,
  /[Dd]irected by\s+(?:Dr\.|Professor|Prof\.)?\s*([A-Z][a-z]+(?:\s+[A-Z][a-z]+)*)/,
];

const ORGANIZATION_WORDS = ['lab', 'group', 'center', 'institute'] as const;

// ============================================================================
// Field Helpers
// ============================================================================

type LabField = 'name' | 'professor' | 'department' | 'description' | 'url' | 'professor_email';

type PartialLab = Partial<Record<LabField, string>>;

/**
 * Removes **bold**, *italic* and stray asterisks.
 */
export function cleanMarkdown(value: string): string {
  return value
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/\*([^*]+)\*/g, '$1')
    .replace(/\*/g, '')
    .trim();
}

const includesAny = (text: string, keywords: readonly string[]): boolean =>
  keywords.some((keyword) => text.includes(keyword));

/** Field mapping for "- **Field**: value" bullets. */
function bulletField(field: string): LabField | undefined {
  if (includesAny(field, ['lab name', 'laboratory'])) return 'name';
  if (includesAny(field, ['professor', 'faculty', 'director', 'pi', 'investigator'])) return 'professor';
  if (includesAny(field, ['department', 'school'])) return 'department';
  if (includesAny(field, ['research focus', 'focus', 'research'])) return 'description';
  if (includesAny(field, ['website', 'url'])) return 'url';
  if (includesAny(field, ['email', 'contact'])) return 'professor_email';
  return undefined;
}

/** Field mapping for plain "Field: value" lines; slightly broader than bullets. */
function colonField(field: string): LabField | undefined {
  if (includesAny(field, ['lab name', 'laboratory', 'group'])) return 'name';
  if (includesAny(field, ['professor', 'faculty', 'director', 'pi', 'investigator', 'lead', 'head'])) {
    return 'professor';
  }
  if (includesAny(field, ['department', 'school'])) return 'department';
  if (includesAny(field, ['research', 'focus'])) return 'description';
  if (includesAny(field, ['website', 'url'])) return 'url';
  if (includesAny(field, ['email', 'contact'])) return 'professor_email';
  return undefined;
}

/**
 * Reads one section (one lab) into its labelled fields. Later lines win.
 */
export function extractLabFields(section: string): PartialLab {
  const info: PartialLab = {};
  const lines = section.split('\n');

  const firstLine = (lines[0] ?? '').trim();
  if (firstLine) {
    info.name = cleanMarkdown(firstLine);
  }

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (!line) continue;

    const bullet = BOLD_BULLET_RE.exec(line);
    if (bullet) {
      const field = bulletField(bullet[1].trim().toLowerCase());
      if (field) info[field] = cleanMarkdown(bullet[2].trim());
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) continue;

    const field = colonField(line.slice(0, colon).trim().toLowerCase().replace(/-/g, '').replace(/\*/g, ''));
    if (field) info[field] = cleanMarkdown(line.slice(colon + 1).trim());
  }

  return info;
}

// ============================================================================
// Professor Validation
// ============================================================================

export function isPlaceholderProfessor(professor: string): boolean {
  const lower = professor.toLowerCase().trim();
  return INVALID_PROFESSOR_NAMES.some(
    (invalid) => lower === invalid || lower.startsWith(`${invalid} `) || lower.endsWith(` ${invalid}`)
  );
}

/**
 * A professor value is accepted when it is not a placeholder, is longer than
 * three characters, contains a capitalized word and does not point at a
 * contact page instead of a person.
 */
export function isValidProfessorName(professor: string): boolean {
  const name = professor.trim();
  const lower = name.toLowerCase();
  return (
    !isPlaceholderProfessor(name) &&
    name.length > 3 &&
    PROPER_NAME_RE.test(name) &&
    !includesAny(lower, CONTACT_PHRASES)
  );
}

/**
 * Looks for "Dr. Jane Smith", "led by Professor Jane Smith", "Jane Smith leads"
 * and similar in free text. Requires at least a first and last name.
 */
export function extractProfessorFromText(text: string): string | undefined {
  for (const pattern of PROFESSOR_IN_TEXT_PATTERNS) {
    const match = pattern.exec(text);
    if (!match) continue;

    const candidate = match[1].trim();
    const lower = candidate.toLowerCase();
    if (
      candidate.split(/\s+/).length >= 2 &&
      !includesAny(lower, ORGANIZATION_WORDS) &&
      !includesAny(lower, CONTACT_PHRASES)
    ) {
      return candidate;
    }
  }
  return undefined;
}

// ============================================================================
// Parser
// ============================================================================

function toLabRecord(info: PartialLab, name: string, professor: string, university: string): LabRecord {
  return {
    name,
    professor,
    school: university,
    description: info.description || LAB_DISCOVERY_CONFIG.DEFAULT_DESCRIPTION,
    url: info.url || '',
    professor_email: info.professor_email || '',
    ...(info.department ? { department: info.department } : {}),
  };
}

/**
 * Parses lab-discovery output for one university.
 *
 * Text before the first numbered entry is ignored. Entries without a
 * recognizable principal investigator are dropped.
 *
 * @example
 * parseLabResults('Labs:\n1. Vision Lab\n- Professor: Dr. Jane Smith', 'Example University');
 * // [{ name: 'Vision Lab', professor: 'Dr. Jane Smith', school: 'Example University', ... }]
 */
export function parseLabResults(raw: string, university: string, logger?: Logger): LabRecord[] {
  const log = logger ?? createPrefixedLogger('[LabParser]');
  const sections = raw.split(SECTION_SPLIT_RE);
  log.debug(`Found ${sections.length} sections for ${university}`);

  const labs: LabRecord[] = [];

  for (const section of sections.slice(1)) {
    if (!section.trim()) continue;

    const info = extractLabFields(section);
    const name = info.name;
    if (!name) continue;

    if (info.professor) {
      const professor = info.professor.trim();
      if (isValidProfessorName(professor)) {
        labs.push(toLabRecord(info, name, professor, university));
        log.debug(`Added lab: ${name} (Prof: ${professor})`);
      } else {
        log.debug(`Rejected lab ${name} - invalid professor name: ${professor}`);
      }
      continue;
    }

    const extracted = extractProfessorFromText(`${name} ${info.description ?? ''}`);
    if (extracted) {
      labs.push(toLabRecord(info, name, extracted, university));
      log.debug(`Added lab: ${name} (Prof: ${extracted}, from description)`);
    } else {
      log.debug(`Lab ${name} missing professor information`);
    }
  }

  log.info(`Parsed ${labs.length} valid lab(s) for ${university}`);
  return labs;
}
