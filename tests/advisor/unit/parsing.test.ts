import { describe, it, expect } from 'vitest';

import {
  extractJsonRecommendations,
  heuristicParse,
  normalizeRecommendations,
} from '../../../src/ai/advisor/parsing';

describe('normalizeRecommendations', () => {
  it('trims fields and fills defaults', () => {
    const [rec] = normalizeRecommendations([
      {
        name: '  ',
        professor: ' Dr. Jane Doe ',
        school: 'Stanford University',
        description: 'Contact jdoe@stanford.edu for openings.',
        relevance_score: '8',
        skills: ['Python', ' ', 3],
        coursework: 'CS 1337',
      },
    ]);

    expect(rec).toEqual({
      name: 'Recommended Lab',
      professor: 'Dr. Jane Doe',
      professor_email: 'jdoe@stanford.edu',
      school: 'Stanford University',
      url: '#',
      description: 'Contact jdoe@stanford.edu for openings.',
      relevance_score: 8,
      skills: ['Python', '3'],
      coursework: [],
    });
  });

  it('keeps a provided email and truncates fractional scores', () => {
    const [rec] = normalizeRecommendations([
      { name: 'NLP Group', professor: 'Marcus Lindqvist', professor_email: ' ml@example.edu ', relevance_score: 7.9 },
    ]);

    expect(rec.professor_email).toBe('ml@example.edu');
    expect(rec.relevance_score).toBe(7);
  });

  it('scores non-numeric values as 0', () => {
    const [rec] = normalizeRecommendations([{ name: 'Lab', relevance_score: 'high' }]);

    expect(rec.relevance_score).toBe(0);
  });

  it('skips non-object items', () => {
    expect(normalizeRecommendations([1, 'lab', null])).toEqual([]);
  });
});

describe('extractJsonRecommendations', () => {
  it('parses a bare JSON answer', () => {
    const recs = extractJsonRecommendations(
      '{"recommendations":[{"name":"Vision Lab","professor":"Jane Doe","url":"https://vision.stanford.edu"}]}'
    );

    expect(recs?.map((r) => [r.name, r.professor_email])).toEqual([['Vision Lab', 'jane.doe@vision.stanford.edu']]);
  });

  it('finds JSON wrapped in prose and code fences', () => {
    const text = [
      'Here you go:',
      '```json',
      '{"recommendations":[{"name":"NLP Group","professor":"Marcus Lindqvist","school":"Westbrook University","url":"https://nlp.westbrook.example.edu","description":"Language models","relevance_score":9}]}',
      '```',
    ].join('\n');

    const recs = extractJsonRecommendations(text);

    expect(recs).toHaveLength(1);
    expect(recs?.[0].professor_email).toBe('marcus.lindqvist@nlp.westbrook.example.edu');
    expect(recs?.[0].relevance_score).toBe(9);
  });

  it('returns null without usable recommendations', () => {
    expect(extractJsonRecommendations('')).toBeNull();
    expect(extractJsonRecommendations('no json here')).toBeNull();
    expect(extractJsonRecommendations('{"recommendations": []}')).toBeNull();
    expect(extractJsonRecommendations('{"recommendations": [1, 2]}')).toBeNull();
    expect(extractJsonRecommendations('{"labs": [{"name": "X"}]}')).toBeNull();
  });
});

describe('heuristicParse', () => {
  const MARKDOWN = `1. **Vision Lab**
Professor: Dr. Jane Doe
School: Stanford University
https://vision.stanford.edu/

2. NLP Group
Professor: Marcus Lindqvist
School: Westbrook University`;

  it('builds one recommendation per numbered item', () => {
    const recs = heuristicParse(MARKDOWN);

    expect(recs).toHaveLength(2);
    expect(recs?.[0]).toEqual({
      name: 'Vision Lab',
      professor: 'Dr. Jane Doe',
      professor_email: 'jane.doe@vision.stanford.edu',
      school: 'Stanford University',
      url: 'https://vision.stanford.edu/',
      description:
        '1. **Vision Lab**\nProfessor: Dr. Jane Doe\nSchool: Stanford University\nhttps://vision.stanford.edu/',
      relevance_score: 0,
      skills: [],
      coursework: [],
    });
    expect(recs?.[1]).toMatchObject({
      name: 'NLP Group',
      professor_email: 'marcus.lindqvist@college.edu',
      url: '#',
    });
  });

  it('splits on markdown headings', () => {
    const recs = heuristicParse('## Vision Lab\nGreat fit.\n## NLP Group\nAlso good.');

    expect(recs?.map((r) => r.name)).toEqual(['Vision Lab', 'NLP Group']);
  });

  it('keeps at most three items', () => {
    const text = ['1. A Lab', '2. B Lab', '3. C Lab', '4. D Lab'].join('\n');

    expect(heuristicParse(text)?.map((r) => r.name)).toEqual(['A Lab', 'B Lab', 'C Lab']);
  });

  it('uses the default name for unstructured text', () => {
    const recs = heuristicParse('I recommend the vision lab.');

    expect(recs?.[0].name).toBe('Recommended Lab');
    expect(recs?.[0].professor_email).toBe('');
  });

  it('returns null for empty text', () => {
    expect(heuristicParse('')).toBeNull();
  });
});
