/**
 * Shared AI Types
 *
 * Token accounting and the clock abstraction used by every pipeline
 * (outreach, research, lab discovery, advisor).
 */

import { isRecord } from './tools/parse-utils';

// ============================================================================
// Token Usage
// ============================================================================

export interface TokenUsage {
  /** Number of input (prompt) tokens */
  readonly input: number;
  /** Number of output (completion) tokens */
  readonly output: number;
  /** Actual cost in USD reported by OpenRouter, when available */
  readonly actualCostUsd?: number;
}

export function createEmptyTokenUsage(): TokenUsage {
  return { input: 0, output: 0 };
}

/**
 * Adds two token usage objects together, summing actualCostUsd if either has one.
 */
export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  const hasCost = a.actualCostUsd !== undefined || b.actualCostUsd !== undefined;
  return {
    input: a.input + b.input,
    output: a.output + b.output,
    ...(hasCost ? { actualCostUsd: (a.actualCostUsd ?? 0) + (b.actualCostUsd ?? 0) } : {}),
  };
}

/**
 * Extracts actual cost from OpenRouter provider metadata
 * (providerMetadata.openrouter.usage.cost).
 */
export function extractOpenRouterCost(result: { providerMetadata?: Record<string, unknown> }): number | undefined {
  const openrouterMeta = result.providerMetadata?.openrouter;
  if (!isRecord(openrouterMeta)) return undefined;
  const usage = openrouterMeta.usage;
  if (!isRecord(usage)) return undefined;
  return typeof usage.cost === 'number' ? usage.cost : undefined;
}

/**
 * Creates a TokenUsage object from an AI SDK generateText/generateObject result.
 */
export function createTokenUsageFromResult(result: {
  usage?: { inputTokens?: number; outputTokens?: number };
  providerMetadata?: Record<string, unknown>;
}): TokenUsage {
  const actualCostUsd = extractOpenRouterCost(result);
  return {
    input: result.usage?.inputTokens ?? 0,
    output: result.usage?.outputTokens ?? 0,
    ...(actualCostUsd !== undefined ? { actualCostUsd } : {}),
  };
}

// ============================================================================
// Clock
// ============================================================================

export interface Clock {
  /** Returns current timestamp in milliseconds (like Date.now()) */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
