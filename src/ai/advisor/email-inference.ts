/**
 * Professor email inference
 *
 * When a lab has no contact email, guess `first.last@<domain>` from the lab
 * website's host or, failing that, from the school name.
 */

import { ADVISOR_CONFIG } from '../config/pipeline';

export const EMAIL_RE = /[\w.-]+@[\w.-]+\.\w+/i;
export const URL_RE = /https?:\/\/\S+/i;

/**
 * School-name fragments mapped to email domains, checked in order against
 * whole words, so "mit" does not match "Smith".
 */
const SCHOOL_DOMAINS: ReadonlyArray<readonly [fragment: string, domain: string]> = [
  ['ut dallas', 'utdallas.edu'],
  ['texas at dallas', 'utdallas.edu'],
  ['massachusetts institute of technology', 'mit.edu'],
  ['california institute of technology', 'caltech.edu'],
  ['caltech', 'caltech.edu'],
  ['georgia institute of technology', 'gatech.edu'],
  ['georgia tech', 'gatech.edu'],
  ['mit', 'mit.edu'],
  ['stanford', 'stanford.edu'],
  ['berkeley', 'berkeley.edu'],
  ['harvard', 'harvard.edu'],
  ['cmu', 'cmu.edu'],
  ['carnegie mellon', 'cmu.edu'],
  ['princeton', 'princeton.edu'],
  ['university of washington', 'uw.edu'],
];

/**
 * Lower-cased host (with port) of an absolute URL, or '' when it has none.
 */
export function domainFromUrl(url: string): string {
  if (!url) return '';
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * "Dr. Jane Q. Doe" → "jane.doe"; single names are returned alone.
 */
export function slugifyNameForEmail(fullName: string): string {
  if (!fullName) return '';
  const name = fullName.trim().replace(/^(professor|prof\.?|dr\.?)\s+/i, '');
  const parts = name
    .split(/[^\p{L}\p{N}_]+/u)
    .filter((part) => part.length > 0)
    .map((part) => part.toLowerCase());
  if (parts.length === 0) return '';
  return parts.length > 1 ? `${parts[0]}.${parts[parts.length - 1]}` : parts[0];
}

export function guessDomainFromSchool(school: string): string {
  const words = ` ${(school || '').toLowerCase().replace(/[^a-z0-9]+/g, ' ')} `;
  const match = SCHOOL_DOMAINS.find(([fragment]) => words.includes(` ${fragment} `));
  return match ? match[1] : ADVISOR_CONFIG.DEFAULT_EMAIL_DOMAIN;
}

/**
 * @example
 * inferEmail('Dr. Jane Doe', 'https://vision.stanford.edu/', '') // 'jane.doe@vision.stanford.edu'
 * inferEmail('Dr. Jane Doe', '#', 'Harvard University')           // 'jane.doe@harvard.edu'
 */
export function inferEmail(professor: string, url: string, school: string): string {
  const local = slugifyNameForEmail(professor);
  if (!local) return '';
  const domain = domainFromUrl(url) || guessDomainFromSchool(school);
  return `${local}@${domain}`;
}
