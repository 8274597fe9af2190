/**
 * Retrieval filter matching, shared by the store's candidate queries and by
 * graph expansion
 */

import { Chunk, RetrievalFilters } from './types';

export type FilterableChunk = Pick<Chunk, 'sectionPath' | 'chunkType' | 'pageStart' | 'pageEnd'>;

/**
 * Every given filter must hold; page ranges match by overlap
 */
export function matchesFilters(chunk: FilterableChunk, filters?: RetrievalFilters): boolean {
  if (!filters) {
    return true;
  }
  if (filters.sectionPrefix && !chunk.sectionPath.startsWith(filters.sectionPrefix)) {
    return false;
  }
  if (filters.chunkTypes && filters.chunkTypes.length > 0 && !filters.chunkTypes.includes(chunk.chunkType)) {
    return false;
  }
  if (filters.pageRange) {
    const { start, end } = filters.pageRange;
    if (chunk.pageEnd < start || chunk.pageStart > end) {
      return false;
    }
  }
  return true;
}
