/**
 * RAG Lab Advisor
 *
 * Recommends 2-3 labs from the catalog for a student profile (and optional
 * transcript) using Gemini or OpenAI. Model output is parsed as JSON, then
 * as markdown, and if both fail or the provider errors, keyword scoring over
 * the catalog is used instead, so callers always get recommendations.
 */

import { generateText, type LanguageModel } from 'ai';

import { createPrefixedLogger, type Logger } from '../../utils/logger';
import { getModel } from '../config';
import { ADVISOR_CONFIG } from '../config/pipeline';
import type { LabRecord } from '../labs/types';
import { withRetry } from '../retry';
import { createGeminiModel, createOpenAIModel, isGeminiConfigured, isOpenAIConfigured } from '../service';
import { errorMessage } from '../tools/parse-utils';
import { fallbackRecommendations } from './fallback';
import { extractJsonRecommendations, heuristicParse } from './parsing';
import { buildAdvisorPrompt } from './prompts';
import type { AdvisorProviderName, AdvisorStudent, LabRecommendation } from './types';

// ============================================================================
// Providers
// ============================================================================

export interface AdvisorProviderStatus {
  readonly provider: AdvisorProviderName;
  readonly geminiAvailable: boolean;
  readonly openaiAvailable: boolean;
  /** Whether the selected provider can be used */
  readonly available: boolean;
  /** Explanation for clients when the selected provider is unavailable */
  readonly unavailableMessage?: string;
}

export function parseAdvisorProvider(value: string | undefined): AdvisorProviderName {
  return (value ?? '').trim().toLowerCase() === 'openai' ? 'openai' : 'gemini';
}

export function getAdvisorStatus(provider: AdvisorProviderName): AdvisorProviderStatus {
  const geminiAvailable = isGeminiConfigured();
  const openaiAvailable = isOpenAIConfigured();

  if (provider === 'openai') {
    return {
      provider,
      geminiAvailable,
      openaiAvailable,
      available: openaiAvailable,
      ...(openaiAvailable ? {} : { unavailableMessage: 'OpenAI provider not available. Set OPENAI_API_KEY.' }),
    };
  }

  return {
    provider,
    geminiAvailable,
    openaiAvailable,
    available: geminiAvailable,
    ...(geminiAvailable ? {} : { unavailableMessage: 'Gemini provider not available. Set GEMINI_API_KEY.' }),
  };
}

export function createAdvisorModel(provider: AdvisorProviderName): LanguageModel {
  return provider === 'openai'
    ? createOpenAIModel(getModel('ADVISOR_OPENAI'))
    : createGeminiModel(getModel('ADVISOR_GEMINI'));
}

// ============================================================================
// Recommendations
// ============================================================================

export interface AdvisorDeps {
  readonly generateText: typeof generateText;
  readonly model: LanguageModel;
  readonly logger?: Logger;
  readonly signal?: AbortSignal;
}

export type RecommendationSource = 'json' | 'heuristic' | 'fallback';

export interface AdvisorResult {
  readonly recommendations: LabRecommendation[];
  readonly source: RecommendationSource;
}

/**
 * Asks the advisor model for lab recommendations.
 *
 * Never throws for provider failures: they are logged and answered with
 * the scoring fallback.
 */
export async function getRagRecommendations(
  student: AdvisorStudent,
  labs: readonly LabRecord[],
  deps: AdvisorDeps
): Promise<AdvisorResult> {
  const log = deps.logger ?? createPrefixedLogger('[Advisor]');
  const genText = deps.generateText;

  try {
    const prompt = buildAdvisorPrompt(student, labs);
    const result = await withRetry(
      () =>
        genText({
          model: deps.model,
          prompt,
          temperature: ADVISOR_CONFIG.TEMPERATURE,
          topK: ADVISOR_CONFIG.TOP_K,
          topP: ADVISOR_CONFIG.TOP_P,
          maxOutputTokens: ADVISOR_CONFIG.MAX_OUTPUT_TOKENS,
          abortSignal: deps.signal,
        }),
      { context: 'Advisor recommendations', signal: deps.signal, logger: log }
    );

    const text = result.text.trim();

    const fromJson = extractJsonRecommendations(text);
    if (fromJson) {
      return { recommendations: fromJson, source: 'json' };
    }

    const fromText = heuristicParse(text);
    if (fromText) {
      log.warn('Advisor output was not JSON; used heuristic parsing');
      return { recommendations: fromText, source: 'heuristic' };
    }

    log.warn('Advisor returned no usable text; using scoring fallback');
  } catch (error) {
    log.error(`Advisor error: ${errorMessage(error)}`);
  }

  return { recommendations: fallbackRecommendations(student, labs), source: 'fallback' };
}
