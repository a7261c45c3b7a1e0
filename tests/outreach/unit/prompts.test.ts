import { describe, it, expect } from 'vitest';

import {
  getRefinerSystemPrompt,
  getRefinerUserPrompt,
  getReviewerUserPrompt,
  getWriterSystemPrompt,
  getWriterUserPrompt,
} from '../../../src/ai/outreach/prompts';
import { checkEmail } from '../../../src/ai/outreach/email-checks';
import type { OutreachState } from '../../../src/ai/outreach/types';
import { makeWords } from '../../utils/ai-mocks';

const STATE: OutreachState = {
  user_name: 'Alex',
  recipient_info: 'Professor: Dana Reyes, Lab: Human-Robot Interaction Lab',
  character: { name: 'Alex Morgan' },
  email: 'Subject: Research\n\nDear Professor Reyes,',
  review_feedback: 'Mention a specific paper.',
};

describe('writer prompts', () => {
  it('states the word range', () => {
    expect(getWriterSystemPrompt()).toContain('- Be within 150-300 words');
  });

  it('renders the session state', () => {
    const prompt = getWriterUserPrompt(STATE);

    expect(prompt).toContain('## SENDER NAME\nAlex\n');
    expect(prompt).toContain('## RECIPIENT INFO\nProfessor: Dana Reyes, Lab: Human-Robot Interaction Lab\n');
    expect(prompt).toContain('## CHARACTER INFO\n{\n  "name": "Alex Morgan"\n}\n');
    expect(prompt).toContain('## REVIEW FEEDBACK\nMention a specific paper.\n');
  });
});

describe('refiner prompts', () => {
  it('forbids placeholders', () => {
    expect(getRefinerSystemPrompt()).toContain('Never output placeholders like "[Your Name]".');
  });

  it('starts with the draft', () => {
    expect(getRefinerUserPrompt(STATE).startsWith('## DRAFT EMAIL\nSubject: Research\n\nDear Professor Reyes,\n')).toBe(
      true
    );
  });
});

describe('getReviewerUserPrompt', () => {
  it('marks a failed check', () => {
    const prompt = getReviewerUserPrompt('Too short', STATE.recipient_info, checkEmail('Too short'));

    expect(prompt).toContain(
      'The automated length/style check FAILED: Email is too short. Add 148 more words to reach minimum length of 150.'
    );
  });

  it('reports a passed check', () => {
    const email = makeWords(200);

    expect(getReviewerUserPrompt(email, STATE.recipient_info, checkEmail(email))).toContain(
      'The automated length/style check passed: Email length is good (200 words).'
    );
  });
});
