/**
 * Unit tests for the Exa and Tavily wrappers
 *
 * Uses the global MSW server from tests/setup.ts, overriding handlers per test.
 */

import { afterEach, describe, it, expect, vi } from 'vitest';
import { http, HttpResponse } from 'msw';

import { exaSearch, isExaConfigured, parseExaResponse } from '../../../src/ai/tools/exa';
import { isTavilyConfigured, parseTavilyResponse, tavilySearch } from '../../../src/ai/tools/tavily';
import { server } from '../../mocks/server';

describe('Exa API Wrapper', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('isExaConfigured', () => {
    it('returns false when EXA_API_KEY is not set', () => {
      vi.stubEnv('EXA_API_KEY', '');
      expect(isExaConfigured()).toBe(false);
    });

    it('returns true when EXA_API_KEY is set', () => {
      vi.stubEnv('EXA_API_KEY', 'test-api-key');
      expect(isExaConfigured()).toBe(true);
    });
  });

  describe('exaSearch', () => {
    it('returns empty results when API key is not configured', async () => {
      vi.stubEnv('EXA_API_KEY', '');

      const result = await exaSearch('robotics labs');

      expect(result).toEqual({ query: 'robotics labs', results: [] });
    });

    it('returns empty results for empty query', async () => {
      const result = await exaSearch('   ');

      expect(result.query).toBe('');
      expect(result.results).toHaveLength(0);
    });

    it('performs search and returns parsed results', async () => {
      const result = await exaSearch('robotics labs at Northfield University');

      expect(result.query).toBe('robotics labs at Northfield University');
      expect(result.results).toHaveLength(2);
      expect(result.results[0]).toEqual({
        title: 'Human-Robot Interaction Lab | Northfield University',
        url: 'https://robotics.northfield.example.edu/hri',
        content: 'The HRI Lab, directed by Professor Dana Reyes, studies shared autonomy for assistive robots.',
        score: 0.93,
      });
      expect(result.costUsd).toBe(0.005);
    });

    it('passes options to API request', async () => {
      let capturedBody: unknown = null;
      let capturedKey: string | null = null;
      server.use(
        http.post('https://api.exa.ai/search', async ({ request }) => {
          capturedKey = request.headers.get('x-api-key');
          capturedBody = await request.json();
          return HttpResponse.json({ results: [] });
        })
      );

      await exaSearch('robotics labs', {
        numResults: 40,
        category: 'personal site',
        includeDomains: ['northfield.example.edu'],
      });

      expect(capturedKey).toBe('test-exa-api-key');
      expect(capturedBody).toMatchObject({
        query: 'robotics labs',
        numResults: 25,
        type: 'auto',
        category: 'personal site',
        includeDomains: ['northfield.example.edu'],
        contents: { text: { maxCharacters: 2000 } },
      });
    });

    it('returns empty results on an HTTP error', async () => {
      server.use(http.post('https://api.exa.ai/search', () => HttpResponse.json({ error: 'boom' }, { status: 500 })));

      const result = await exaSearch('test query');

      expect(result).toEqual({ query: 'test query', results: [] });
    });

    it('returns empty results on a network error', async () => {
      server.use(http.post('https://api.exa.ai/search', () => HttpResponse.error()));

      const result = await exaSearch('test query');

      expect(result).toEqual({ query: 'test query', results: [] });
    });
  });

  describe('parseExaResponse', () => {
    it('drops results with missing title or url', () => {
      const parsed = parseExaResponse('q', {
        results: [{ title: 'No URL' }, { url: 'https://a.example.edu' }, { title: 'Ok', url: 'https://b.example.edu' }],
      });

      expect(parsed.results).toEqual([{ title: 'Ok', url: 'https://b.example.edu' }]);
    });

    it('returns no results for a non-object payload', () => {
      expect(parseExaResponse('q', 'nope')).toEqual({ query: 'q', results: [] });
    });
  });
});

describe('Tavily API Wrapper', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reports configuration from TAVILY_API_KEY', () => {
    vi.stubEnv('TAVILY_API_KEY', '');
    expect(isTavilyConfigured()).toBe(false);
    vi.stubEnv('TAVILY_API_KEY', 'test-key');
    expect(isTavilyConfigured()).toBe(true);
  });

  it('returns empty results when API key is not configured', async () => {
    vi.stubEnv('TAVILY_API_KEY', '');

    const result = await tavilySearch('robotics labs');

    expect(result).toEqual({ query: 'robotics labs', answer: null, results: [] });
  });

  it('performs search and returns parsed results', async () => {
    const result = await tavilySearch('robotics labs');

    expect(result.answer).toBe('Northfield University hosts several robotics and systems labs.');
    expect(result.results).toHaveLength(2);
    expect(result.results[1]).toEqual({
      title: 'Computational Biology Lab',
      url: 'https://compbio.northfield.example.edu',
      content: 'Professor Priya Natarajan applies machine learning to genomics.',
      score: 0.74,
    });
    expect(result.credits).toBe(1);
  });

  it('sends the bearer token and clamps max_results', async () => {
    let capturedBody: unknown = null;
    let capturedAuth: string | null = null;
    server.use(
      http.post('https://api.tavily.com/search', async ({ request }) => {
        capturedAuth = request.headers.get('authorization');
        capturedBody = await request.json();
        return HttpResponse.json({ results: [] });
      })
    );

    await tavilySearch('robotics labs', { maxResults: 50, searchDepth: 'advanced' });

    expect(capturedAuth).toBe('Bearer test-tavily-api-key');
    expect(capturedBody).toMatchObject({
      query: 'robotics labs',
      search_depth: 'advanced',
      max_results: 20,
      include_answer: true,
      include_usage: true,
    });
  });

  it('returns empty results on an HTTP error', async () => {
    server.use(http.post('https://api.tavily.com/search', () => HttpResponse.json({}, { status: 429 })));

    const result = await tavilySearch('test query');

    expect(result).toEqual({ query: 'test query', answer: null, results: [] });
  });

  it('parses a response without answer or usage', () => {
    const parsed = parseTavilyResponse('q', { results: [{ title: 'T', url: 'https://t.example.edu' }] });

    expect(parsed).toEqual({ query: 'q', answer: null, results: [{ title: 'T', url: 'https://t.example.edu' }] });
  });
});
