import { describe, it, expect, vi } from 'vitest';

import {
  buildRecipientResearchQuery,
  researchQuery,
  RESEARCH_RESULT_HEADER,
} from '../../../src/ai/research/web-research';
import { webResearchConfig } from '../../../src/ai/config';
import type { WebSearchFn } from '../../../src/ai/research/sources';
import { createMockGenerateText, createMockLogger } from '../../utils/ai-mocks';

const SOURCES = [
  {
    title: 'Dana Reyes | Faculty',
    url: 'https://cs.northfield.example.edu/reyes',
    snippet: 'Associate Professor, directs the Human-Robot Interaction Lab.',
  },
];

describe('buildRecipientResearchQuery', () => {
  it('includes the affiliation when given', () => {
    expect(buildRecipientResearchQuery(' Dana Reyes ', 'Northfield University')).toMatch(
      /^Search for information about Dana Reyes from Northfield University\. Look for:\n1\. /
    );
  });

  it('uses the name alone without an affiliation', () => {
    expect(buildRecipientResearchQuery('Dana Reyes', '  ')).toMatch(/^Search for information about Dana Reyes\. Look for:/);
  });
});

describe('researchQuery', () => {
  it('prefixes the synthesis with the results header', async () => {
    const generateText = createMockGenerateText('  Dana Reyes directs the HRI Lab [1].  ');
    const search: WebSearchFn = vi.fn().mockResolvedValue(SOURCES);

    const result = await researchQuery('Tell me about Dana Reyes', {
      generateText,
      model: 'test-model',
      search: [search],
      logger: createMockLogger(),
    });

    expect(result.text).toBe(`${RESEARCH_RESULT_HEADER}\nDana Reyes directs the HRI Lab [1].`);
    expect(result.sources).toEqual(['https://cs.northfield.example.edu/reyes']);
    expect(result.tokenUsage).toEqual({ input: 100, output: 40 });
  });

  it('sends the numbered source digest to the model', async () => {
    const generateText = createMockGenerateText('brief');

    await researchQuery('Tell me about Dana Reyes', {
      generateText,
      model: 'test-model',
      search: [vi.fn().mockResolvedValue(SOURCES)],
      logger: createMockLogger(),
    });

    const call = generateText.mock.calls[0][0];
    expect(call.model).toBe('test-model');
    expect(call.system).toBe(webResearchConfig.systemPrompt);
    expect(call.temperature).toBe(0.2);
    expect(call.prompt).toContain('## Research Request\nTell me about Dana Reyes');
    expect(call.prompt).toContain(
      '[1] Dana Reyes | Faculty\nURL: https://cs.northfield.example.edu/reyes\nAssociate Professor, directs the Human-Robot Interaction Lab.'
    );
  });

  it('tells the model when no sources were found', async () => {
    const generateText = createMockGenerateText('Nothing found.');

    await researchQuery('Tell me about Nobody', {
      generateText,
      model: 'test-model',
      search: [vi.fn().mockResolvedValue([])],
      logger: createMockLogger(),
    });

    expect(generateText.mock.calls[0][0].prompt).toContain('No web sources were found for this query.');
  });

  it('propagates model errors', async () => {
    const generateText = vi.fn().mockRejectedValue(new Error('Invalid API key'));

    await expect(
      researchQuery('Tell me about Dana Reyes', {
        generateText,
        model: 'test-model',
        search: [],
        logger: createMockLogger(),
      })
    ).rejects.toThrow('Invalid API key');
    expect(generateText).toHaveBeenCalledTimes(1);
  });
});
