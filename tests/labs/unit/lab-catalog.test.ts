import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  basicRecommendations,
  filterLabs,
  getLab,
  listSchools,
  loadLabsData,
} from '../../../src/api/labs/services/lab-catalog';
import type { LabRecord } from '../../../src/ai/labs/types';
import { createMockLogger } from '../../utils/ai-mocks';

const LABS: LabRecord[] = [
  {
    name: 'Human-Robot Interaction Lab',
    professor: 'Dana Reyes',
    school: 'Northfield University',
    description: 'Assistive robots and machine learning',
    url: 'https://hri.example.edu',
    professor_email: 'dreyes@northfield.example.edu',
  },
  {
    name: 'Computational Biology Lab',
    professor: 'Priya Natarajan',
    school: 'Lakeshore Institute of Technology',
    description: 'Genomics',
    url: '',
    professor_email: 'pnatarajan@lakeshore.example.edu',
  },
  {
    name: 'Systems Group',
    professor: 'Samir Okafor',
    school: 'Northfield University',
    description: 'Storage',
    url: '',
    professor_email: '',
  },
];

describe('loadLabsData', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const writeCatalog = (content: string): string => {
    const file = path.join(tmpDir, 'labs.json');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  it('returns [] with a warning when the file is missing', () => {
    const log = createMockLogger();

    expect(loadLabsData(path.join(tmpDir, 'missing.json'), log)).toEqual([]);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('returns [] with an error for invalid JSON', () => {
    const log = createMockLogger();

    expect(loadLabsData(writeCatalog('{not json'), log)).toEqual([]);
    expect(log.error).toHaveBeenCalledTimes(1);
  });

  it('returns [] when the JSON is not an array', () => {
    const log = createMockLogger();
    const file = writeCatalog('{"labs": []}');

    expect(loadLabsData(file, log)).toEqual([]);
    expect(log.warn).toHaveBeenCalledWith(`Labs data at ${file} is not an array. Returning empty list.`);
  });

  it('fills missing fields and skips non-object entries', () => {
    const log = createMockLogger();
    const file = writeCatalog(JSON.stringify([{ name: 'Quantum Lab', professor: 5 }, 'not a lab']));

    expect(loadLabsData(file, log)).toEqual([
      { name: 'Quantum Lab', professor: '', school: '', description: '', url: '', professor_email: '' },
    ]);
    expect(log.warn).toHaveBeenCalledWith('Skipping malformed lab entry');
  });

  it('reads the bundled catalog', () => {
    const labs = loadLabsData(path.join('data', 'labs.json'), createMockLogger());

    expect(labs.length).toBeGreaterThan(0);
    expect(labs[0].name).toBe('Human-Robot Interaction Lab');
  });
});

describe('filterLabs', () => {
  it('returns a copy of every lab without filters', () => {
    const result = filterLabs(LABS, {});

    expect(result).toEqual(LABS);
    expect(result).not.toBe(LABS);
  });

  it('filters by school case-insensitively', () => {
    expect(filterLabs(LABS, { school: 'NORTHFIELD' }).map((lab) => lab.name)).toEqual([
      'Human-Robot Interaction Lab',
      'Systems Group',
    ]);
  });

  it('searches name, description, professor and school', () => {
    expect(filterLabs(LABS, { search: 'genomics' }).map((lab) => lab.name)).toEqual(['Computational Biology Lab']);
    expect(filterLabs(LABS, { search: 'okafor' }).map((lab) => lab.name)).toEqual(['Systems Group']);
  });

  it('requires every given filter to match', () => {
    expect(filterLabs(LABS, { school: 'northfield', professor: 'natarajan' })).toEqual([]);
    expect(filterLabs(LABS, { professor_email: 'dreyes@' }).map((lab) => lab.name)).toEqual([
      'Human-Robot Interaction Lab',
    ]);
  });
});

describe('listSchools', () => {
  it('returns sorted unique non-empty schools', () => {
    expect(listSchools([...LABS, { ...LABS[0], school: '' }])).toEqual([
      'Lakeshore Institute of Technology',
      'Northfield University',
    ]);
  });
});

describe('getLab', () => {
  it('returns the lab at the index', () => {
    expect(getLab(LABS, 1)?.name).toBe('Computational Biology Lab');
  });

  it('returns undefined out of range', () => {
    expect(getLab(LABS, 3)).toBeUndefined();
    expect(getLab(LABS, -1)).toBeUndefined();
    expect(getLab(LABS, 1.5)).toBeUndefined();
  });
});

describe('basicRecommendations', () => {
  it('scores labs and reports totals', () => {
    const result = basicRecommendations(LABS, 'robots', ['storage']);

    expect(result.total_labs).toBe(3);
    expect(result.matching_labs).toBe(2);
    expect(result.recommendations.map((lab) => [lab.name, lab.relevance_score])).toEqual([
      ['Human-Robot Interaction Lab', 3],
      ['Systems Group', 2],
    ]);
  });

  it('caps the list at ten labs', () => {
    const many = Array.from({ length: 12 }, (_, i) => ({ ...LABS[0], name: `Robot Lab ${i}` }));

    const result = basicRecommendations(many, '', ['robot']);

    expect(result.recommendations).toHaveLength(10);
    expect(result.matching_labs).toBe(12);
  });
});
