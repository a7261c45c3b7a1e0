/**
 * Web Research
 *
 * Answers a free-form research request (usually "tell me about professor X")
 * by searching the web and having a model synthesize the results. The output
 * is used verbatim as the recipient info for the outreach email pipeline.
 */

import { generateText, type LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { webResearchConfig } from '../config';
import { RESEARCH_CONFIG } from '../config/pipeline';
import { executeAITask } from '../service';
import type { TokenUsage } from '../types';
import { createDefaultSearchProviders, gatherSources, type WebSearchFn } from './sources';

export const RESEARCH_RESULT_HEADER = 'Web Search Results:';

export interface WebResearchDeps {
  readonly generateText: typeof generateText;
  /** Overrides the OpenRouter model from AI_MODEL_WEB_RESEARCH */
  readonly model?: LanguageModel;
  readonly search: readonly WebSearchFn[];
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

export interface WebResearchResult {
  /** "Web Search Results:\n<synthesis>" */
  readonly text: string;
  readonly sources: readonly string[];
  readonly tokenUsage: TokenUsage;
}

/**
 * Builds the standard recipient research request.
 */
export function buildRecipientResearchQuery(name: string, affiliation?: string): string {
  const who = affiliation?.trim() ? `${name.trim()} from ${affiliation.trim()}` : name.trim();
  return `Search for information about ${who}. Look for:
1. Professional profiles on GitHub, personal websites, or portfolios
2. Academic publications or research papers
3. News articles or press mentions
4. Social media profiles (Twitter, etc.)
5. Any public professional achievements or projects
Focus on publicly available information only.`;
}

/**
 * Runs web search for `query` and asks the research model to summarize it.
 *
 * @example
 * const { text } = await researchQuery(buildRecipientResearchQuery('Jane Smith', 'Example University'));
 */
export async function researchQuery(query: string, deps: Partial<WebResearchDeps> = {}): Promise<WebResearchResult> {
  const log = deps.logger ?? createPrefixedLogger('[Research]');
  const search = deps.search ?? createDefaultSearchProviders();

  const sources = await gatherSources(query, search, {
    limitPerProvider: RESEARCH_CONFIG.EXA_RESULTS,
  });
  log.info(`Collected ${sources.length} source(s) for research query`);

  const { text, tokenUsage } = await executeAITask(
    webResearchConfig,
    { query, sources },
    {
      generateText: deps.generateText ?? generateText,
      model: deps.model,
      signal: deps.signal,
      logger: log,
    }
  );

  return {
    text: `${RESEARCH_RESULT_HEADER}\n${text}`,
    sources: sources.map((s) => s.url),
    tokenUsage,
  };
}
