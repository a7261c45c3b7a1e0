/**
 * Writer Agent
 *
 * Produces the first draft of the outreach email from the recipient info
 * and the student profile.
 */

import type { generateObject, LanguageModel } from 'ai';
import { z } from 'zod';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { OUTREACH_CONFIG } from '../../config/pipeline';
import { withRetry } from '../../retry';
import { createTokenUsageFromResult, type TokenUsage } from '../../types';
import { getWriterSystemPrompt, getWriterUserPrompt } from '../prompts';
import type { OutreachState } from '../types';

export interface WriterDeps {
  readonly generateObject: typeof generateObject;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  /** Optional temperature override (default: OUTREACH_CONFIG.WRITER_TEMPERATURE) */
  readonly temperature?: number;
}

export interface WriterOutput {
  readonly email: string;
  readonly tokenUsage: TokenUsage;
}

const WriterOutputSchema = z.object({
  email: z.string().describe('The complete email: subject line first, then the body'),
});

/**
 * @throws Error when the model returns an empty email
 */
export async function runWriter(state: OutreachState, deps: WriterDeps): Promise<WriterOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Writer]');

  const result = await withRetry(
    () =>
      deps.generateObject({
        model: deps.model,
        schema: WriterOutputSchema,
        temperature: deps.temperature ?? OUTREACH_CONFIG.WRITER_TEMPERATURE,
        maxOutputTokens: OUTREACH_CONFIG.WRITER_MAX_OUTPUT_TOKENS,
        system: getWriterSystemPrompt(),
        prompt: getWriterUserPrompt(state),
        abortSignal: deps.signal,
      }),
    { context: 'Email writer', signal: deps.signal, logger: log }
  );

  const email = result.object.email.trim();
  if (email.length === 0) {
    throw new Error('Writer returned an empty email');
  }

  log.debug(`Draft written (${email.length} chars)`);

  return { email, tokenUsage: createTokenUsageFromResult(result) };
}
