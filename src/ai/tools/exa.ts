/**
 * Exa search client
 *
 * Neural search over the web. Used next to Tavily for recipient research and
 * lab discovery, where queries are phrased as questions ("who directs the
 * robotics lab at Northfield University").
 *
 * @see https://docs.exa.ai/reference/search
 */

import { createPrefixedLogger } from '../../utils/logger';
import { clampInt, errorMessage, isRecord, safeString } from './parse-utils';

export type ExaCategory = 'research paper' | 'personal site' | 'news';

export interface ExaSearchOptions {
  /** 1-25, default 10 */
  readonly numResults?: number;
  readonly category?: ExaCategory;
  /** e.g. a university's domain when looking for its labs */
  readonly includeDomains?: readonly string[];
}

export interface ExaSearchResult {
  readonly title: string;
  readonly url: string;
  /** Page text, cut to EXA_TEXT_MAX_CHARS */
  readonly content?: string;
  readonly score?: number;
}

export interface ExaSearchResponse {
  readonly query: string;
  readonly results: readonly ExaSearchResult[];
  /** Cost reported by Exa, when present */
  readonly costUsd?: number;
}

const EXA_SEARCH_URL = 'https://api.exa.ai/search';
const EXA_TIMEOUT_MS = 20_000;
const EXA_TEXT_MAX_CHARS = 2000;
const EXA_RESULTS = { MIN: 1, MAX: 25, DEFAULT: 10 } as const;

const log = createPrefixedLogger('[Exa]');

export function isExaConfigured(): boolean {
  return Boolean(process.env.EXA_API_KEY);
}

function buildRequestBody(query: string, options: ExaSearchOptions): Record<string, unknown> {
  return {
    query,
    type: 'auto',
    numResults: clampInt(options.numResults ?? EXA_RESULTS.DEFAULT, EXA_RESULTS.MIN, EXA_RESULTS.MAX),
    contents: { text: { maxCharacters: EXA_TEXT_MAX_CHARS } },
    ...(options.category ? { category: options.category } : {}),
    ...(options.includeDomains?.length ? { includeDomains: [...options.includeDomains] } : {}),
  };
}

/**
 * Reads Exa's JSON response, dropping results without a title or URL.
 */
export function parseExaResponse(query: string, raw: unknown): ExaSearchResponse {
  if (!isRecord(raw) || !Array.isArray(raw.results)) {
    return { query, results: [] };
  }

  const results: ExaSearchResult[] = [];
  for (const item of raw.results) {
    if (!isRecord(item)) continue;
    const title = safeString(item.title);
    const url = safeString(item.url);
    if (!title || !url) continue;

    const content = safeString(item.text);
    results.push({
      title,
      url,
      ...(content ? { content } : {}),
      ...(typeof item.score === 'number' ? { score: item.score } : {}),
    });
  }

  const cost = raw.costDollars;
  return isRecord(cost) && typeof cost.total === 'number'
    ? { query, results, costUsd: cost.total }
    : { query, results };
}

/**
 * Searches Exa. Returns no results when the key is missing or the call fails.
 *
 * @example
 * const { results } = await exaSearch('machine learning labs at Carnegie Mellon University', {
 *   includeDomains: ['cmu.edu'],
 * });
 */
export async function exaSearch(query: string, options: ExaSearchOptions = {}): Promise<ExaSearchResponse> {
  const cleanedQuery = query.trim();
  const apiKey = process.env.EXA_API_KEY;
  if (!cleanedQuery || !apiKey) {
    return { query: cleanedQuery, results: [] };
  }

  try {
    const res = await fetch(EXA_SEARCH_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'x-api-key': apiKey },
      body: JSON.stringify(buildRequestBody(cleanedQuery, options)),
      signal: AbortSignal.timeout(EXA_TIMEOUT_MS),
    });

    if (!res.ok) {
      log.warn(`Search failed for "${cleanedQuery}": HTTP ${res.status}`);
      return { query: cleanedQuery, results: [] };
    }

    const json: unknown = await res.json();
    return parseExaResponse(cleanedQuery, json);
  } catch (error) {
    log.warn(`Search failed for "${cleanedQuery}": ${errorMessage(error)}`);
    return { query: cleanedQuery, results: [] };
  }
}
