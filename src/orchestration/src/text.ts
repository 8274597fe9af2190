/**
 * Text normalization helpers shared by segmentation and retrieval
 */

import { createHash } from 'crypto';

const TERM_PATTERN = /[\p{L}\p{N}_-]{3,}/gu;

export function normalizeSpace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(word => word.length > 0).length;
}

/**
 * Rough token estimate: 1.3 tokens per whitespace-separated word, at least one word
 */
export function estimateTokens(text: string): number {
  return Math.floor(Math.max(1, countWords(text)) * 1.3);
}

export function stableHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Case-folded set of word-like runs of three or more characters
 */
export function queryTerms(text: string): Set<string> {
  return new Set(text.toLowerCase().match(TERM_PATTERN) ?? []);
}

export function termOverlap(queryTermSet: Set<string>, text: string): number {
  let overlap = 0;
  for (const term of queryTerms(text)) {
    if (queryTermSet.has(term)) {
      overlap++;
    }
  }
  return overlap;
}

export function normalizeForDedup(text: string): string {
  return normalizeSpace(text.toLowerCase());
}
