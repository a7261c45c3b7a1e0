/**
 * Refiner Agent
 *
 * Rewrites the current draft against the reviewer's feedback. Output is the
 * email text only.
 */

import type { generateText, LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../../utils/logger';
import { OUTREACH_CONFIG } from '../../config/pipeline';
import { withRetry } from '../../retry';
import { createTokenUsageFromResult, type TokenUsage } from '../../types';
import { getRefinerSystemPrompt, getRefinerUserPrompt } from '../prompts';
import type { OutreachState } from '../types';

export interface RefinerDeps {
  readonly generateText: typeof generateText;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
  readonly temperature?: number;
}

export interface RefinerOutput {
  readonly email: string;
  readonly tokenUsage: TokenUsage;
}

/**
 * @throws Error when there is no draft to refine or the model returns nothing
 */
export async function runRefiner(state: OutreachState, deps: RefinerDeps): Promise<RefinerOutput> {
  const log = deps.logger ?? createPrefixedLogger('[Refiner]');

  if (!state.email || state.email.trim().length === 0) {
    throw new Error('No draft email to refine');
  }

  const result = await withRetry(
    () =>
      deps.generateText({
        model: deps.model,
        temperature: deps.temperature ?? OUTREACH_CONFIG.REFINER_TEMPERATURE,
        maxOutputTokens: OUTREACH_CONFIG.REFINER_MAX_OUTPUT_TOKENS,
        system: getRefinerSystemPrompt(),
        prompt: getRefinerUserPrompt(state),
        abortSignal: deps.signal,
      }),
    { context: 'Email refiner', signal: deps.signal, logger: log }
  );

  const email = result.text.trim();
  if (email.length === 0) {
    throw new Error('Refiner returned an empty email');
  }

  log.debug(`Refined email (${email.length} chars)`);

  return { email, tokenUsage: createTokenUsageFromResult(result) };
}
