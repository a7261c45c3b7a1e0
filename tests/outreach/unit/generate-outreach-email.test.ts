import { describe, it, expect, vi } from 'vitest';

import {
  createInitialState,
  generateOutreachEmail,
  runOutreachLoop,
  validateOutreachState,
} from '../../../src/ai/outreach/generate-outreach-email';
import type { OutreachContext } from '../../../src/ai/outreach/types';
import { createMockGenerateObject, createMockGenerateText, makeWords } from '../../utils/ai-mocks';

const CONTEXT: OutreachContext = {
  recipientInfo: 'Professor: Dana Reyes, Lab: Human-Robot Interaction Lab',
  character: { name: 'Alex Morgan', major: 'Computer Science' },
};

const GOOD = makeWords(200, 'Subject: Research opportunity');
const SHORT = makeWords(100);

const APPROVE = { approved: true, feedback: '', missingElements: [] };
const openrouter = (modelId: string) => modelId;

describe('createInitialState', () => {
  it('seeds the session state', () => {
    expect(createInitialState(CONTEXT)).toEqual({
      user_name: 'Alex',
      recipient_info: CONTEXT.recipientInfo,
      character: CONTEXT.character,
      review_feedback: 'Initial email generation - no feedback yet',
    });
  });

  it('keeps a provided user name', () => {
    expect(createInitialState({ ...CONTEXT, userName: ' Jordan ' }).user_name).toBe('Jordan');
    expect(createInitialState({ ...CONTEXT, userName: '  ' }).user_name).toBe('Alex');
  });
});

describe('validateOutreachState', () => {
  it('lists every problem', () => {
    expect(validateOutreachState(createInitialState({ recipientInfo: ' ', character: {} }))).toEqual([
      'recipient info is required',
      'character profile is empty',
    ]);
  });

  it('accepts a complete state', () => {
    expect(validateOutreachState(createInitialState(CONTEXT))).toEqual([]);
  });
});

describe('generateOutreachEmail', () => {
  it('stops after the first approved iteration', async () => {
    const generateObject = createMockGenerateObject({ email: 'draft' }, APPROVE);
    const generateText = createMockGenerateText(GOOD);
    const onProgress = vi.fn();

    const result = await generateOutreachEmail(
      CONTEXT,
      { openrouter, generateObject, generateText },
      { onProgress, correlationId: 'test-corr' }
    );

    expect(result.approved).toBe(true);
    expect(result.iterations).toBe(1);
    expect(result.email).toBe(GOOD);
    expect(result.correlationId).toBe('test-corr');
    expect(result.tokenUsage).toEqual({ input: 300, output: 120 });
    expect(result.history).toEqual([
      {
        iteration: 1,
        email: GOOD,
        wordCount: 200,
        approved: true,
        feedback: 'Email meets all requirements. Exiting the refinement loop.',
      },
    ]);
    expect(result.finalState.review_status).toBe('pass');
    expect(onProgress.mock.calls).toEqual([
      ['writer', 1, 'Drafting email'],
      ['refiner', 1, 'Refining email'],
      ['reviewer', 1, 'Reviewing email'],
    ]);
  });

  it('feeds review feedback into the next refinement', async () => {
    const generateObject = createMockGenerateObject(
      { email: 'draft' },
      { approved: false, feedback: 'Mention a specific paper.', missingElements: [] },
      APPROVE
    );
    const generateText = createMockGenerateText(SHORT, GOOD);

    const result = await generateOutreachEmail(CONTEXT, { openrouter, generateObject, generateText });

    expect(result.approved).toBe(true);
    expect(result.iterations).toBe(2);
    expect(result.history.map((h) => [h.wordCount, h.approved])).toEqual([
      [100, false],
      [200, true],
    ]);
    expect(generateObject).toHaveBeenCalledTimes(3);
    expect(generateText.mock.calls[1][0].prompt).toContain(
      '## REVIEW FEEDBACK\nEmail is too short. Add 50 more words to reach minimum length of 150.\nMention a specific paper.\n'
    );
    expect(generateText.mock.calls[1][0].prompt).toContain(`## DRAFT EMAIL\n${SHORT}\n`);
  });

  it('returns the last email when the iterations run out', async () => {
    const generateObject = createMockGenerateObject(
      { email: 'draft' },
      { approved: false, feedback: 'Not yet.', missingElements: [] }
    );
    const generateText = createMockGenerateText(GOOD);

    const result = await generateOutreachEmail(
      CONTEXT,
      { openrouter, generateObject, generateText },
      { maxIterations: 2 }
    );

    expect(result.approved).toBe(false);
    expect(result.iterations).toBe(2);
    expect(result.email).toBe(GOOD);
    expect(result.finalState.review_feedback).toBe('Not yet.');
    expect(result.finalState.review_status).toBe('pass');
    expect(generateText).toHaveBeenCalledTimes(2);
  });

  it('rejects an invalid context', async () => {
    await expect(
      generateOutreachEmail({ recipientInfo: '', character: {} }, { openrouter })
    ).rejects.toMatchObject({
      code: 'CONTEXT_INVALID',
      message: 'Invalid outreach context: recipient info is required; character profile is empty',
    });
  });

  it('rejects a non-positive iteration cap', async () => {
    await expect(generateOutreachEmail(CONTEXT, { openrouter }, { maxIterations: 0 })).rejects.toMatchObject({
      code: 'CONFIG_ERROR',
      message: 'maxIterations must be a positive integer (got 0)',
    });
  });

  it('maps writer failures', async () => {
    const generateObject = vi.fn().mockRejectedValue(new Error('Invalid API key'));

    await expect(
      generateOutreachEmail(CONTEXT, { openrouter, generateObject, generateText: createMockGenerateText(GOOD) })
    ).rejects.toMatchObject({
      code: 'WRITER_FAILED',
      message: 'Outreach email generation failed during writer: Invalid API key',
    });
  });

  it('maps refiner failures', async () => {
    const generateObject = createMockGenerateObject({ email: 'draft' }, APPROVE);

    await expect(
      generateOutreachEmail(CONTEXT, { openrouter, generateObject, generateText: createMockGenerateText('') })
    ).rejects.toMatchObject({
      code: 'REFINER_FAILED',
      message: 'Outreach email generation failed during refiner: Refiner returned an empty email',
    });
  });

  it('maps reviewer failures', async () => {
    const generateObject = vi
      .fn()
      .mockResolvedValueOnce({ object: { email: 'draft' }, usage: {} })
      .mockRejectedValue(new Error('Invalid API key'));

    await expect(
      generateOutreachEmail(CONTEXT, { openrouter, generateObject, generateText: createMockGenerateText(GOOD) })
    ).rejects.toMatchObject({ code: 'REVIEWER_FAILED' });
  });

  it('stops when cancelled between phases', async () => {
    const controller = new AbortController();
    const generateObject = createMockGenerateObject({ email: 'draft' }, APPROVE);
    const generateText = createMockGenerateText(GOOD);

    await expect(
      generateOutreachEmail(
        CONTEXT,
        { openrouter, generateObject, generateText },
        {
          signal: controller.signal,
          onProgress: (phase) => {
            if (phase === 'refiner') controller.abort();
          },
        }
      )
    ).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(generateText).not.toHaveBeenCalled();
  });

  it('times out when the budget is spent', async () => {
    let now = 0;
    const clock = {
      now: () => {
        const value = now;
        now += 5000;
        return value;
      },
    };

    await expect(
      runOutreachLoop(
        createInitialState(CONTEXT),
        { openrouter, generateObject: createMockGenerateObject({ email: 'draft' }, APPROVE) },
        { timeoutMs: 1000, clock }
      )
    ).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Outreach email generation timed out after 1000ms',
    });
  });
});
