/**
 * Tavily search client. Keyword search with an optional short answer,
 * paired with Exa for recipient research and lab discovery.
 *
 * @see https://docs.tavily.com/documentation/api-reference/endpoint/search
 */

import { createPrefixedLogger } from '../../utils/logger';
import { clampInt, errorMessage, isRecord, safeString } from './parse-utils';

export interface TavilySearchOptions {
  readonly searchDepth?: 'basic' | 'advanced';
  /** 1-20, default 8 */
  readonly maxResults?: number;
  readonly includeAnswer?: boolean;
  readonly includeDomains?: readonly string[];
}

export interface TavilySearchResult {
  readonly title: string;
  readonly url: string;
  readonly content?: string;
  readonly score?: number;
}

export interface TavilySearchResponse {
  readonly query: string;
  readonly answer: string | null;
  readonly results: readonly TavilySearchResult[];
  readonly credits?: number;
}

const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';
const TAVILY_TIMEOUT_MS = 15_000;
const TAVILY_RESULTS = { MIN: 1, MAX: 20, DEFAULT: 8 } as const;

const log = createPrefixedLogger('[Tavily]');

export function isTavilyConfigured(): boolean {
  return Boolean(process.env.TAVILY_API_KEY);
}

export function parseTavilyResponse(query: string, raw: unknown): TavilySearchResponse {
  if (!isRecord(raw)) return { query, answer: null, results: [] };

  const results: TavilySearchResult[] = [];
  for (const item of Array.isArray(raw.results) ? raw.results : []) {
    if (!isRecord(item)) continue;
    const title = safeString(item.title);
    const url = safeString(item.url);
    if (!title || !url) continue;

    const content = safeString(item.content);
    results.push({
      title,
      url,
      ...(content ? { content } : {}),
      ...(typeof item.score === 'number' ? { score: item.score } : {}),
    });
  }

  const answer = safeString(raw.answer) ?? null;
  const usage = raw.usage;
  return isRecord(usage) && typeof usage.credits === 'number'
    ? { query, answer, results, credits: usage.credits }
    : { query, answer, results };
}

/**
 * Searches Tavily. A missing key or failed call yields an empty response so
 * research can go on with the other provider.
 */
export async function tavilySearch(query: string, options: TavilySearchOptions = {}): Promise<TavilySearchResponse> {
  const cleanedQuery = query.trim();
  const empty: TavilySearchResponse = { query: cleanedQuery, answer: null, results: [] };
  const apiKey = process.env.TAVILY_API_KEY;
  if (!cleanedQuery || !apiKey) return empty;

  const body = {
    query: cleanedQuery,
    search_depth: options.searchDepth ?? 'basic',
    max_results: clampInt(options.maxResults ?? TAVILY_RESULTS.DEFAULT, TAVILY_RESULTS.MIN, TAVILY_RESULTS.MAX),
    include_answer: options.includeAnswer ?? true,
    include_usage: true,
    ...(options.includeDomains?.length ? { include_domains: [...options.includeDomains] } : {}),
  };

  try {
    const res = await fetch(TAVILY_SEARCH_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${apiKey}` },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(TAVILY_TIMEOUT_MS),
    });
    if (!res.ok) {
      log.warn(`Search failed for "${cleanedQuery}": HTTP ${res.status}`);
      return empty;
    }
    const json: unknown = await res.json();
    return parseTavilyResponse(cleanedQuery, json);
  } catch (error) {
    log.warn(`Search failed for "${cleanedQuery}": ${errorMessage(error)}`);
    return empty;
  }
}
