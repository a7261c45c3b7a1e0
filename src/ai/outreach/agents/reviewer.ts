/**
 * Reviewer Agent
 *
 * Gatekeeper of the outreach loop. Runs the deterministic checks first
 * (length, hashtags, emojis, placeholders), then asks the model to judge
 * the required elements and the style. The email is approved only when
 * every check passes and the model approves.
 */

import type { generateObject, LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { OUTREACH_CONFIG } from '../../config/pipeline';
import { withRetry } from '../../retry';
import { createTokenUsageFromResult, type TokenUsage } from '../../types';
import { checkEmail, findPlaceholders, type EmailCheckResult } from '../email-checks';
import { getReviewerSystemPrompt, getReviewerUserPrompt } from '../prompts';

// ============================================================================
// Types
// ============================================================================

export interface ReviewerDeps {
  readonly generateObject: typeof generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
}

export interface ReviewerOutput {
  readonly approved: boolean;
  /** Text written into review_feedback for the next iteration */
  readonly feedback: string;
  readonly missingElements: readonly string[];
  readonly check: EmailCheckResult;
  readonly placeholders: readonly string[];
  readonly tokenUsage: TokenUsage;
}

// Defaults keep a partially compliant model response usable
const ReviewerOutputSchema = z.object({
  approved: z.boolean(),
  feedback: z.string().default(''),
  missingElements: z.array(z.string()).default([]),
});

const GENERIC_REJECTION = 'Email does not meet all requirements yet.';

// ============================================================================
// Feedback
// ============================================================================

/**
 * Joins the failed check, leftover placeholders and the model's critique
 * into one feedback block, in that order.
 */
export function composeReviewFeedback(
  check: EmailCheckResult,
  placeholders: readonly string[],
  critique: string,
  missingElements: readonly string[]
): string {
  const parts: string[] = [];

  if (check.result === 'fail') {
    parts.push(check.message);
  }
  if (placeholders.length > 0) {
    parts.push(`Remove placeholders: ${placeholders.join(', ')}.`);
  }
  const trimmed = critique.trim();
  if (trimmed.length > 0) {
    parts.push(trimmed);
  }
  const missing = missingElements.map((item) => item.trim()).filter((item) => item.length > 0);
  if (missing.length > 0) {
    parts.push(`Missing elements: ${missing.join('; ')}.`);
  }

  return parts.length > 0 ? parts.join('\n') : GENERIC_REJECTION;
}

// ============================================================================
// Main Reviewer Function
// ============================================================================

export async function runReviewer(
  email: string,
  recipientInfo: string,
  deps: ReviewerDeps
): Promise<ReviewerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Reviewer]');

  const check = checkEmail(email);
  const placeholders = findPlaceholders(email);
  log.debug(`Checks: ${check.message}${placeholders.length > 0 ? `; placeholders: ${placeholders.join(', ')}` : ''}`);

  const result = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        schema: ReviewerOutputSchema,
        temperature: deps.temperature ?? OUTREACH_CONFIG.REVIEWER_TEMPERATURE,
        maxOutputTokens: OUTREACH_CONFIG.REVIEWER_MAX_OUTPUT_TOKENS,
        system: getReviewerSystemPrompt(),
        prompt: getReviewerUserPrompt(email, recipientInfo, check),
        abortSignal: deps.signal,
      }),
    { context: 'Email reviewer', signal: deps.signal, logger: log }
  );

  const { object } = result;
  const approved = check.result === 'pass' && placeholders.length === 0 && object.approved;

  const feedback = approved
    ? OUTREACH_CONFIG.APPROVED_FEEDBACK
    : composeReviewFeedback(check, placeholders, object.feedback, object.missingElements);

  log.info(`Review complete: ${approved ? 'APPROVED' : 'NEEDS REVISION'} (${check.wordCount} words)`);

  return {
    approved,
    feedback,
    missingElements: approved ? [] : object.missingElements,
    check,
    placeholders,
    tokenUsage: createTokenUsageFromResult(result),
  };
}
