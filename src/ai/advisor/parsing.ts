/**
 * Advisor output parsing
 *
 * The model is asked for strict JSON, but may wrap it in prose or code fences
 * or ignore the format entirely. Parsing therefore tries, in order: the whole
 * text as JSON, the outermost {...} span as JSON, and a markdown heuristic.
 */

import { ADVISOR_CONFIG } from '../config/pipeline';
import { cleanMarkdown } from '../labs/lab-parser';
import { isRecord } from '../tools/parse-utils';
import { EMAIL_RE, URL_RE, inferEmail } from './email-inference';
import type { LabRecommendation } from './types';

// ============================================================================
// Normalization
// ============================================================================

function trimmedString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function toInteger(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === 'string' && /^\s*[-+]?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return 0;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.map((item) => String(item).trim()).filter((item) => item.length > 0);
}

/**
 * Coerces raw recommendation objects into LabRecommendation, filling in
 * defaults and inferring a missing professor email (first from the
 * description text, then from the lab URL or school).
 */
export function normalizeRecommendations(items: readonly unknown[]): LabRecommendation[] {
  const out: LabRecommendation[] = [];

  for (const item of items) {
    if (!isRecord(item)) continue;

    const professor = trimmedString(item.professor);
    const url = trimmedString(item.url) || '#';
    const school = trimmedString(item.school);
    const description = trimmedString(item.description);

    let email = trimmedString(item.professor_email);
    if (!email) {
      email = EMAIL_RE.exec(description)?.[0] ?? '';
    }
    if (!email) {
      email = inferEmail(professor, url, school);
    }

    out.push({
      name: trimmedString(item.name) || ADVISOR_CONFIG.DEFAULT_LAB_NAME,
      professor,
      professor_email: email,
      school,
      url,
      description,
      relevance_score: toInteger(item.relevance_score),
      skills: toStringList(item.skills),
      coursework: toStringList(item.coursework),
    });
  }

  return out;
}

// ============================================================================
// JSON Extraction
// ============================================================================

function recommendationsFromJson(jsonText: string): LabRecommendation[] | null {
  let data: unknown;
  try {
    data = JSON.parse(jsonText);
  } catch {
    return null;
  }
  if (!isRecord(data)) return null;

  const items = data.recommendations;
  if (!Array.isArray(items) || items.length === 0) return null;

  const normalized = normalizeRecommendations(items);
  return normalized.length > 0 ? normalized : null;
}

/**
 * Reads `{"recommendations": [...]}` from the model output.
 *
 * @returns null when no usable recommendations are found
 */
export function extractJsonRecommendations(text: string): LabRecommendation[] | null {
  if (!text) return null;

  const direct = recommendationsFromJson(text);
  if (direct) return direct;

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return recommendationsFromJson(text.slice(start, end + 1));
  }
  return null;
}

// ============================================================================
// Markdown Heuristic
// ============================================================================

/** Splits before lines starting with "1. " or "## " / "### " */
const CHUNK_SPLIT_RE = /\n(?=\s*(?:\d+\. |#{2,3}\s))/;
const TITLE_RE = /^(?:\d+\.\s*|#{2,3}\s*)(.+)$/;

function findField(text: string, pattern: RegExp): string {
  const match = pattern.exec(text);
  return match ? cleanMarkdown(match[1].trim()) : '';
}

/**
 * Best-effort parse of a prose/markdown answer: one recommendation per
 * numbered item or heading, at most ADVISOR_CONFIG.MAX_HEURISTIC_ITEMS.
 */
export function heuristicParse(text: string): LabRecommendation[] | null {
  const items: LabRecommendation[] = [];

  for (const rawChunk of (text || '').split(CHUNK_SPLIT_RE)) {
    const chunk = rawChunk.trim();
    if (!chunk) continue;

    const titleMatch = TITLE_RE.exec(chunk.split('\n')[0]);
    const title = titleMatch ? cleanMarkdown(titleMatch[1].trim()) : '';
    const professor = findField(chunk, /Professor[:-]\s*([^\n]+)/i);
    const school = findField(chunk, /School[:-]\s*([^\n]+)/i);
    const url = URL_RE.exec(chunk)?.[0] ?? '';
    const email = EMAIL_RE.exec(chunk)?.[0] ?? inferEmail(professor, url, school);

    items.push({
      name: title || ADVISOR_CONFIG.DEFAULT_LAB_NAME,
      professor,
      professor_email: email,
      school,
      url: url || '#',
      description: chunk,
      relevance_score: 0,
      skills: [],
      coursework: [],
    });

    if (items.length >= ADVISOR_CONFIG.MAX_HEURISTIC_ITEMS) break;
  }

  return items.length > 0 ? items : null;
}
