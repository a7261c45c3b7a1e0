/**
 * Web source gathering
 *
 * Runs the configured search providers for a query and merges their results
 * into a de-duplicated, size-capped digest for the model.
 */

import { createPrefixedLogger } from '../../utils/logger';
import type { SourceDigestEntry } from '../config';
import { RESEARCH_CONFIG } from '../config/pipeline';
import { exaSearch, type ExaSearchOptions } from '../tools/exa';
import { errorMessage } from '../tools/parse-utils';
import { tavilySearch, type TavilySearchOptions } from '../tools/tavily';

/**
 * A search provider returns sources for a query. Providers are expected to
 * degrade to an empty list rather than throw, but gatherSources tolerates
 * either.
 */
export type WebSearchFn = (query: string, limit: number) => Promise<readonly SourceDigestEntry[]>;

export interface GatherSourcesOptions {
  readonly limitPerProvider?: number;
  readonly maxSources?: number;
  readonly maxSnippetLength?: number;
}

const log = createPrefixedLogger('[Sources]');

export function createExaSource(options: ExaSearchOptions = {}): WebSearchFn {
  return async (query, limit) => {
    const response = await exaSearch(query, { ...options, numResults: limit });
    return response.results.map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content ?? '',
    }));
  };
}

export function createTavilySource(options: TavilySearchOptions = {}): WebSearchFn {
  return async (query, limit) => {
    const response = await tavilySearch(query, { ...options, maxResults: limit });
    return response.results.map((r) => ({
      title: r.title,
      url: r.url,
      snippet: r.content ?? '',
    }));
  };
}

export function createDefaultSearchProviders(): readonly WebSearchFn[] {
  return [createExaSource(), createTavilySource()];
}

/**
 * Normalizes a URL for de-duplication: lower-cased host, no fragment,
 * no trailing slash.
 */
export function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    parsed.hostname = parsed.hostname.toLowerCase();
    return parsed.toString().replace(/\/$/, '');
  } catch {
    return url.trim().replace(/\/$/, '');
  }
}

export function truncateSnippet(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > maxLength ? `${collapsed.slice(0, maxLength)}...` : collapsed;
}

/**
 * Merges provider result lists in order, keeping the first occurrence of each URL.
 */
export function mergeSources(
  lists: ReadonlyArray<readonly SourceDigestEntry[]>,
  maxSources: number = RESEARCH_CONFIG.MAX_SOURCES,
  maxSnippetLength: number = RESEARCH_CONFIG.MAX_SNIPPET_LENGTH
): SourceDigestEntry[] {
  const seen = new Set<string>();
  const merged: SourceDigestEntry[] = [];

  for (const list of lists) {
    for (const source of list) {
      const key = normalizeUrl(source.url);
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push({
        title: source.title.trim(),
        url: source.url.trim(),
        snippet: truncateSnippet(source.snippet, maxSnippetLength),
      });
      if (merged.length >= maxSources) return merged;
    }
  }

  return merged;
}

/**
 * Queries every provider in parallel and merges the results.
 */
export async function gatherSources(
  query: string,
  providers: readonly WebSearchFn[],
  options: GatherSourcesOptions = {}
): Promise<SourceDigestEntry[]> {
  const limit = options.limitPerProvider ?? RESEARCH_CONFIG.EXA_RESULTS;
  const settled = await Promise.allSettled(providers.map((provider) => provider(query, limit)));

  const lists: Array<readonly SourceDigestEntry[]> = [];
  for (const outcome of settled) {
    if (outcome.status === 'fulfilled') {
      lists.push(outcome.value);
    } else {
      log.warn(`Search provider failed for "${query}": ${errorMessage(outcome.reason)}`);
    }
  }

  return mergeSources(lists, options.maxSources, options.maxSnippetLength);
}
