/**
 * Token counting utility for dispatch summaries and parse statistics
 * Uses js-tiktoken, with a character-based fallback
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';

export type EncodingName = 'o200k_base' | 'cl100k_base';

export const DEFAULT_ENCODING: EncodingName = 'o200k_base';

// Cached encoder instances
const encoders = new Map<EncodingName, Tiktoken>();

/**
 * Get the tiktoken encoder for the given encoding
 * Uses caching to avoid repeated initialization
 */
export function getEncoder(encoding: EncodingName = DEFAULT_ENCODING): Tiktoken {
  const cached = encoders.get(encoding);
  if (cached) {
    return cached;
  }
  const encoder = getEncoding(encoding);
  encoders.set(encoding, encoder);
  return encoder;
}

/**
 * Count tokens in a text string
 */
export function countTokens(text: string, encoder: Tiktoken): number {
  if (!text || text.trim().length === 0) {
    return 0;
  }
  return encoder.encode(text).length;
}

/**
 * Count tokens for an array of texts
 */
export function countTokensForTexts(texts: readonly string[], encoder: Tiktoken): number {
  let total = 0;
  for (const text of texts) {
    total += countTokens(text, encoder);
  }
  return total;
}

/**
 * Fallback token estimation when tiktoken is unavailable
 * ~3 chars per token for mixed prose and markup
 */
export function fallbackTokenEstimate(text: string): number {
  if (!text || text.trim().length === 0) {
    return 0;
  }
  return Math.ceil(text.length / 3);
}

/**
 * Token estimate for a set of chunk texts, falling back to the
 * character-based estimate if the encoder fails
 */
export function estimateTokens(
  texts: readonly string[],
  encoding: EncodingName = DEFAULT_ENCODING
): number {
  try {
    return countTokensForTexts(texts, getEncoder(encoding));
  } catch (error) {
    console.warn('⚠️  Tiktoken encoding failed, using fallback estimation:', error);
    return texts.reduce((sum, text) => sum + fallbackTokenEstimate(text), 0);
  }
}
