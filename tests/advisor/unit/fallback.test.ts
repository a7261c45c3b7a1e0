import { describe, it, expect } from 'vitest';

import { fallbackRecommendations } from '../../../src/ai/advisor/fallback';
import type { LabRecord } from '../../../src/ai/labs/types';

const lab = (overrides: Partial<LabRecord>): LabRecord => ({
  name: 'Lab',
  professor: '',
  school: 'Northfield University',
  description: '',
  url: '',
  professor_email: '',
  ...overrides,
});

const student = { academic: { major: 'Computer Science' }, goals: { interests: ['robotics'] } };

describe('fallbackRecommendations', () => {
  it('returns scored labs with inferred contact details', () => {
    const labs = [
      lab({ name: 'Art Studio', professor: 'Iris Vale', description: 'Painting and sculpture' }),
      lab({ name: 'Systems Group', professor: 'Dr. Samir Okafor', description: 'Computer science systems research' }),
      lab({
        name: 'Human-Robot Interaction Lab',
        professor: 'Dana Reyes',
        description: 'Robotics and computer science research',
        url: 'https://hri.northfield.example.edu',
      }),
    ];

    expect(fallbackRecommendations(student, labs)).toEqual([
      {
        name: 'Human-Robot Interaction Lab',
        professor: 'Dana Reyes',
        professor_email: 'dana.reyes@hri.northfield.example.edu',
        school: 'Northfield University',
        url: 'https://hri.northfield.example.edu',
        description: 'Robotics and computer science research',
        relevance_score: 5,
        skills: [],
        coursework: [],
      },
      {
        name: 'Systems Group',
        professor: 'Dr. Samir Okafor',
        professor_email: 'samir.okafor@college.edu',
        school: 'Northfield University',
        url: '#',
        description: 'Computer science systems research',
        relevance_score: 3,
        skills: [],
        coursework: [],
      },
    ]);
  });

  it('keeps a catalog email', () => {
    const [rec] = fallbackRecommendations(student, [
      lab({ name: 'Robotics Lab', professor: 'Dana Reyes', professor_email: 'dreyes@northfield.example.edu' }),
    ]);

    expect(rec.professor_email).toBe('dreyes@northfield.example.edu');
  });

  it('returns at most three labs with truncated descriptions', () => {
    const labs = ['A', 'B', 'C', 'D'].map((name) =>
      lab({ name: `${name} Robotics Lab`, description: 'x'.repeat(500) })
    );

    const recs = fallbackRecommendations(student, labs);

    expect(recs.map((r) => r.name)).toEqual(['A Robotics Lab', 'B Robotics Lab', 'C Robotics Lab']);
    expect(recs[0].description).toHaveLength(400);
  });

  it('returns nothing when no lab matches', () => {
    expect(fallbackRecommendations({}, [lab({ name: 'Art Studio' })])).toEqual([]);
  });
});
