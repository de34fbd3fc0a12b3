import { describe, expect, it } from 'vitest';

import { estimateTokens, SafeTokenCounter } from '../src/core/tokens';
import { recordingLogger } from './helpers';

describe('estimateTokens', () => {
  it('counts about four characters per token', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('SafeTokenCounter', () => {
  it('passes through a working counter and memoizes per text', () => {
    let calls = 0;
    const counter = new SafeTokenCounter((text) => {
      calls += 1;
      return text.split(' ').length;
    });

    expect(counter.count('a b c')).toBe(3);
    expect(counter.count('a b c')).toBe(3);
    expect(calls).toBe(1);
    expect(counter.degraded).toBe(false);
  });

  it('estimates when the counter throws and warns once', () => {
    const logger = recordingLogger();
    const counter = new SafeTokenCounter(() => {
      throw new Error('tokenizer offline');
    }, logger);

    expect(counter.count('12345678')).toBe(2);
    expect(counter.count('123')).toBe(1);
    expect(counter.degraded).toBe(true);
    expect(logger.warnings).toEqual(['token counter failed (tokenizer offline); estimating from text length']);
  });

  it('rejects results that are not a usable count', () => {
    const logger = recordingLogger();
    const results = [Number.NaN, -1, Number.POSITIVE_INFINITY];
    const counter = new SafeTokenCounter(() => results.shift() ?? 0, logger);

    expect(counter.count('abcd')).toBe(1);
    expect(counter.count('abcdefgh')).toBe(2);
    expect(counter.count('abcdefghijkl')).toBe(3);
    expect(logger.warnings).toEqual(['token counter failed (token counter returned NaN); estimating from text length']);
  });
});
