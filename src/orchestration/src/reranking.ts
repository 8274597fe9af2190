/**
 * Deterministic rescoring of hybrid search candidates
 */

import { ChunkRecord } from './types';
import { isRecommendationLike } from './tagging';
import { queryTerms, termOverlap } from './text';

export const TERM_OVERLAP_WEIGHT = 0.05;
export const RECOMMENDATION_BONUS = 0.2;

/**
 * score += 0.05 per shared query term, +0.2 for recommendations and algorithms.
 * Equal scores keep their incoming order. Inputs are not modified.
 */
export function rerank(query: string, candidates: ChunkRecord[], kTop: number): ChunkRecord[] {
  const terms = queryTerms(query);

  return candidates
    .map(candidate => {
      const overlap = termOverlap(terms, candidate.content);
      const bonus = isRecommendationLike(candidate.chunkType) ? RECOMMENDATION_BONUS : 0;
      return { ...candidate, score: candidate.score + overlap * TERM_OVERLAP_WEIGHT + bonus };
    })
    .sort((a, b) => b.score - a.score)
    .slice(0, kTop);
}
