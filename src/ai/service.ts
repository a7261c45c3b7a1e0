/**
 * AI Service
 *
 * Provider factories and the generic prompt-task runner. Prompts and model
 * IDs for each task live in the config folder.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { createOpenAI } from '@ai-sdk/openai';
import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { generateText, type LanguageModel } from 'ai';

import type { Logger } from '../utils/logger';
import type { AITaskConfig } from './config';
import { withRetry } from './retry';
import { createTokenUsageFromResult, type TokenUsage } from './types';

// ============================================================================
// Provider Availability
// ============================================================================

/**
 * Check if OpenRouter (research, lab discovery, email agents) is configured
 */
export function isAIConfigured(): boolean {
  return Boolean(process.env.OPENROUTER_API_KEY);
}

function geminiApiKey(): string | undefined {
  return process.env.GEMINI_API_KEY || process.env.GOOGLE_GENERATIVE_AI_API_KEY || undefined;
}

export function isGeminiConfigured(): boolean {
  return Boolean(geminiApiKey());
}

export function isOpenAIConfigured(): boolean {
  return Boolean(process.env.OPENAI_API_KEY);
}

// ============================================================================
// Provider Factories
// ============================================================================

/**
 * Resolves an OpenRouter model by ID.
 *
 * @throws Error when OPENROUTER_API_KEY is missing
 */
export function createOpenRouterModel(modelId: string): LanguageModel {
  const apiKey = process.env.OPENROUTER_API_KEY;
  if (!apiKey) {
    throw new Error('OpenRouter API key not configured');
  }
  return createOpenRouter({ apiKey })(modelId);
}

export function createGeminiModel(modelId: string): LanguageModel {
  const apiKey = geminiApiKey();
  if (!apiKey) {
    throw new Error('Gemini API key not configured (set GEMINI_API_KEY)');
  }
  return createGoogleGenerativeAI({ apiKey })(modelId);
}

export function createOpenAIModel(modelId: string): LanguageModel {
  const apiKey = process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('OpenAI API key not configured (set OPENAI_API_KEY)');
  }
  return createOpenAI({ apiKey })(modelId);
}

// ============================================================================
// Task Execution
// ============================================================================

export interface AITaskDeps {
  readonly generateText: typeof generateText;
  /** Overrides the OpenRouter model resolved from config.model */
  readonly model?: LanguageModel;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export interface AITaskResult {
  readonly text: string;
  readonly tokenUsage: TokenUsage;
}

/**
 * Execute any prompt-driven AI task with the given configuration.
 *
 * @example
 * const { text } = await executeAITask(webResearchConfig, { query, sources });
 */
export async function executeAITask<TContext>(
  config: AITaskConfig<TContext>,
  context: TContext,
  deps: Partial<AITaskDeps> = {}
): Promise<AITaskResult> {
  const genText = deps.generateText ?? generateText;
  const model = deps.model ?? createOpenRouterModel(config.model);
  const prompt = config.buildPrompt(context);

  deps.logger?.debug(`${config.name}: prompt ${prompt.length} chars`);

  const result = await withRetry(
    () =>
      genText({
        model,
        system: config.systemPrompt,
        prompt,
        temperature: config.temperature,
        maxOutputTokens: config.maxTokens,
        abortSignal: deps.signal,
      }),
    { context: config.name, signal: deps.signal, logger: deps.logger }
  );

  return {
    text: result.text.trim(),
    tokenUsage: createTokenUsageFromResult(result),
  };
}
