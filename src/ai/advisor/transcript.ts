/**
 * Transcript helpers: PDF text extraction and coursework hints.
 */

import { extractText } from 'unpdf';

import { createPrefixedLogger } from '../../utils/logger';
import { ADVISOR_CONFIG } from '../config/pipeline';
import { errorMessage } from '../tools/parse-utils';

const log = createPrefixedLogger('[Transcript]');

/**
 * Matches course codes ("CS 1337", "MATH-2413") or short course titles,
 * optionally followed by a credit count.
 */
export const COURSE_TOKEN_RE =
  /([A-Z]{2,4})\s?-?\s?(\d{3,4})|([A-Za-z][\w\s&/-]{2,40})\s?(?:\(?\d+\)?\s*credits?)?/gi;

/**
 * Text of every page, joined by newlines. Returns '' for unreadable PDFs.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  try {
    const { text } = await extractText(new Uint8Array(data));
    return text.join('\n');
  } catch (error) {
    log.warn(`Could not read transcript PDF: ${errorMessage(error)}`);
    return '';
  }
}

/**
 * Unique course-like tokens in first-seen order, each cut to
 * COURSEWORK_TOKEN_MAX_LENGTH characters.
 */
export function extractCourseworkHints(text: string, limit: number = ADVISOR_CONFIG.COURSEWORK_HINT_LIMIT): string[] {
  if (!text) return [];
  const hints = new Set<string>();

  for (const match of text.matchAll(COURSE_TOKEN_RE)) {
    const token = match[0].trim();
    if (token.length >= 3) {
      hints.add(token.slice(0, ADVISOR_CONFIG.COURSEWORK_TOKEN_MAX_LENGTH));
    }
    if (hints.size >= limit) break;
  }

  return [...hints];
}

export function isAllowedTranscript(filename: string): boolean {
  const dot = filename.lastIndexOf('.');
  return dot !== -1 && filename.slice(dot + 1).toLowerCase() === 'pdf';
}
