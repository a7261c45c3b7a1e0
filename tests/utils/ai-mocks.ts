/**
 * AI SDK Test Utilities
 *
 * Stand-ins for generateText / generateObject. Only the fields the code
 * reads (text, object, usage) are returned.
 */

import { vi } from 'vitest';

export const MOCK_USAGE = { inputTokens: 100, outputTokens: 40 };

/**
 * generateText mock that resolves each text in turn, then repeats the last one.
 */
export const createMockGenerateText = (...texts: string[]) => {
  const fn = vi.fn();
  const last = texts[texts.length - 1] ?? '';
  fn.mockResolvedValue({ text: last, usage: MOCK_USAGE });
  for (const text of texts) {
    fn.mockResolvedValueOnce({ text, usage: MOCK_USAGE });
  }
  return fn;
};

/**
 * generateObject mock that resolves each object in turn, then repeats the last one.
 */
export const createMockGenerateObject = (...objects: Record<string, unknown>[]) => {
  const fn = vi.fn();
  const last = objects[objects.length - 1] ?? {};
  fn.mockResolvedValue({ object: last, usage: MOCK_USAGE });
  for (const object of objects) {
    fn.mockResolvedValueOnce({ object, usage: MOCK_USAGE });
  }
  return fn;
};

/**
 * A body of exactly `count` words, starting with `prefix` words when given.
 */
export function makeWords(count: number, prefix = ''): string {
  const head = prefix.split(/\s+/).filter((w) => w.length > 0);
  const filler = Array.from({ length: Math.max(0, count - head.length) }, (_, i) => `word${i}`);
  return [...head, ...filler].join(' ');
}

export const createMockLogger = () => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});
