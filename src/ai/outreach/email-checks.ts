/**
 * Deterministic email checks run before the LLM reviewer.
 */

import { OUTREACH_CONFIG } from '../config/pipeline';

export type EmailCheckOutcome = 'pass' | 'fail';

export interface EmailCheckResult {
  readonly result: EmailCheckOutcome;
  readonly wordCount: number;
  /** Present when the email is too short */
  readonly wordsNeeded?: number;
  /** Present when the email is too long */
  readonly wordsToRemove?: number;
  readonly message: string;
}

// emoticons, pictographs, transport, flags, dingbats, supplemental, extended-A
const EMOJI_RE =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2700}-\u{27BF}\u{1F900}-\u{1F9FF}\u{1FA70}-\u{1FAFF}]/u;

/** `[Your Name]`, `[Professor Last Name]`, `[insert lab]`; not markdown links. */
const PLACEHOLDER_RE = /\[[A-Za-z][A-Za-z'.\-]*(?: [A-Za-z'.\-\/]+){0,5}\](?!\()/g;

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function containsEmoji(text: string): boolean {
  return EMOJI_RE.test(text);
}

/**
 * Returns the unique fill-in-the-blank tokens left in a draft, in order.
 */
export function findPlaceholders(text: string): string[] {
  return [...new Set(text.match(PLACEHOLDER_RE) ?? [])];
}

/**
 * Length, hashtag and emoji checks. The first failing check decides the result.
 *
 * @example
 * checkEmail('Too short');
 * // { result: 'fail', wordCount: 2, wordsNeeded: 148, message: 'Email is too short. ...' }
 */
export function checkEmail(text: string): EmailCheckResult {
  const wordCount = countWords(text);
  const { MIN_WORDS, MAX_WORDS } = OUTREACH_CONFIG;

  if (wordCount < MIN_WORDS) {
    const wordsNeeded = MIN_WORDS - wordCount;
    return {
      result: 'fail',
      wordCount,
      wordsNeeded,
      message: `Email is too short. Add ${wordsNeeded} more words to reach minimum length of ${MIN_WORDS}.`,
    };
  }

  if (wordCount > MAX_WORDS) {
    const wordsToRemove = wordCount - MAX_WORDS;
    return {
      result: 'fail',
      wordCount,
      wordsToRemove,
      message: `Email is too long. Remove ${wordsToRemove} words to meet maximum length of ${MAX_WORDS}.`,
    };
  }

  if (text.includes('#')) {
    return { result: 'fail', wordCount, message: 'Email contains hashtags. Remove hashtags.' };
  }

  if (containsEmoji(text)) {
    return { result: 'fail', wordCount, message: 'Email contains emojis. Remove emojis.' };
  }

  return { result: 'pass', wordCount, message: `Email length is good (${wordCount} words).` };
}
