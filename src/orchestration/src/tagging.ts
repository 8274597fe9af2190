/**
 * Chunk tagging module
 * Assigns each chunk a semantic type from keyword families and extracts
 * the capitalised terms used to link chunks during retrieval expansion.
 */

import { ChunkType } from './types';

const CLASSIFIER_WINDOW = 300;
const MAX_ENTITY_MENTIONS = 10;

/**
 * Keyword families, checked top to bottom; the first hit decides the type
 */
const TYPE_RULES: ReadonlyArray<{ type: ChunkType; keywords: readonly string[] }> = [
  { type: 'recommendation', keywords: ['recommend', 'рекомендац'] },
  { type: 'algorithm', keywords: ['algorithm', 'алгоритм'] },
  { type: 'table', keywords: ['table', 'таблиц'] },
  { type: 'definition', keywords: ['definition', 'определен'] },
  { type: 'evidence', keywords: ['evidence', 'доказатель'] },
  { type: 'appendix', keywords: ['appendix', 'appendices', 'приложени'] }
];

// Capitalised Latin or Cyrillic word of four or more characters
const CAPITALISED_TERM = /(?<![\p{L}\p{N}_])[A-ZА-ЯЁ][A-Za-zА-Яа-яЁё-]{3,}(?![\p{L}\p{N}_])/gu;

export function classifyChunkType(content: string, sectionPath: string): ChunkType {
  const source = `${sectionPath} ${content.slice(0, CLASSIFIER_WINDOW)}`.toLowerCase();

  for (const rule of TYPE_RULES) {
    if (rule.keywords.some(keyword => source.includes(keyword))) {
      return rule.type;
    }
  }

  return 'other';
}

export function isRecommendationLike(type: ChunkType): boolean {
  return type === 'recommendation' || type === 'algorithm';
}

/**
 * Capitalised terms in first-occurrence order, without repeats
 */
export function capitalisedTerms(text: string): string[] {
  return Array.from(new Set(text.match(CAPITALISED_TERM) ?? []));
}

/**
 * Most frequent capitalised terms of a chunk; ties keep first-occurrence order
 */
export function extractEntityMentions(text: string): string[] {
  const counts = new Map<string, number>();
  for (const term of text.match(CAPITALISED_TERM) ?? []) {
    counts.set(term, (counts.get(term) || 0) + 1);
  }

  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_ENTITY_MENTIONS)
    .map(([term]) => term);
}
