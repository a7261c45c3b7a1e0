import { describe, it, expect } from 'vitest';

import {
  domainFromUrl,
  guessDomainFromSchool,
  inferEmail,
  slugifyNameForEmail,
} from '../../../src/ai/advisor/email-inference';

describe('domainFromUrl', () => {
  it('returns the lower-cased host with port', () => {
    expect(domainFromUrl('https://Vision.Stanford.edu:8080/people')).toBe('vision.stanford.edu:8080');
  });

  it('returns an empty string for empty or relative values', () => {
    expect(domainFromUrl('')).toBe('');
    expect(domainFromUrl('#')).toBe('');
  });
});

describe('slugifyNameForEmail', () => {
  it('uses the first and last name without titles', () => {
    expect(slugifyNameForEmail('Dr. Jane Q. Doe')).toBe('jane.doe');
    expect(slugifyNameForEmail('Prof. María López')).toBe('maría.lópez');
  });

  it('returns a single name alone', () => {
    expect(slugifyNameForEmail('Professor Ada')).toBe('ada');
  });

  it('returns an empty string for an empty name', () => {
    expect(slugifyNameForEmail('')).toBe('');
    expect(slugifyNameForEmail(' -- ')).toBe('');
  });
});

describe('guessDomainFromSchool', () => {
  it('maps known schools', () => {
    expect(guessDomainFromSchool('University of Texas at Dallas')).toBe('utdallas.edu');
    expect(guessDomainFromSchool('Massachusetts Institute of Technology')).toBe('mit.edu');
    expect(guessDomainFromSchool('Georgia Institute of Technology')).toBe('gatech.edu');
    expect(guessDomainFromSchool('Carnegie Mellon University')).toBe('cmu.edu');
  });

  it('matches short fragments only as whole words', () => {
    expect(guessDomainFromSchool('MIT')).toBe('mit.edu');
    expect(guessDomainFromSchool('Smith College')).toBe('college.edu');
    expect(guessDomainFromSchool('Dartmouth College')).toBe('college.edu');
    expect(guessDomainFromSchool('UC Berkeley')).toBe('berkeley.edu');
  });

  it('falls back to the default domain', () => {
    expect(guessDomainFromSchool('Northfield University')).toBe('college.edu');
    expect(guessDomainFromSchool('')).toBe('college.edu');
  });
});

describe('inferEmail', () => {
  it('prefers the lab website host', () => {
    expect(inferEmail('Dr. Jane Doe', 'https://vision.stanford.edu/', '')).toBe('jane.doe@vision.stanford.edu');
  });

  it('uses the school when the URL has no host', () => {
    expect(inferEmail('Dr. Jane Doe', '#', 'Harvard University')).toBe('jane.doe@harvard.edu');
  });

  it('returns an empty string without a professor name', () => {
    expect(inferEmail('', 'https://vision.stanford.edu/', 'Stanford University')).toBe('');
  });
});
