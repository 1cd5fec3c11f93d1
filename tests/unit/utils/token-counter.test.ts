import { describe, it, expect } from 'vitest';
import {
  countTokens,
  estimateTokens,
  fallbackTokenEstimate,
  getEncoder,
} from '../../../src/utils/token-counter';

describe('token-counter', () => {
  it('caches encoders per encoding', () => {
    expect(getEncoder('cl100k_base')).toBe(getEncoder('cl100k_base'));
  });

  it('counts nothing for blank text', () => {
    expect(countTokens('   ', getEncoder())).toBe(0);
    expect(estimateTokens(['', '\n'])).toBe(0);
  });

  it('counts tokens across texts', () => {
    const encoder = getEncoder();
    const expected = countTokens('Hello world', encoder) + countTokens('Second chunk', encoder);

    expect(expected).toBeGreaterThan(0);
    expect(estimateTokens(['Hello world', 'Second chunk'])).toBe(expected);
  });

  it('estimates about three characters per token', () => {
    expect(fallbackTokenEstimate('abcdefg')).toBe(3);
    expect(fallbackTokenEstimate(' ')).toBe(0);
  });
});
