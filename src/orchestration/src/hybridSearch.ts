/**
 * Hybrid search module
 * Fuses the store's keyword (BM25) and vector candidate streams for one document
 */

import { ChunkRecord, RetrievalFilters } from './types';
import { ChunkQueries } from './storage';
import { EmbeddingProvider } from './embeddings';
import { logger } from './logger';

/**
 * Merge two ranked streams by chunk id. A chunk found by both keeps the
 * higher score and is tagged "hybrid".
 */
export function fuseCandidates(lexical: ChunkRecord[], vector: ChunkRecord[]): ChunkRecord[] {
  const merged = new Map<string, ChunkRecord>();

  for (const record of [...lexical, ...vector]) {
    const existing = merged.get(record.chunkId);
    if (!existing) {
      merged.set(record.chunkId, { ...record });
      continue;
    }
    merged.set(record.chunkId, {
      ...existing,
      score: Math.max(existing.score, record.score),
      source: existing.source === record.source ? existing.source : 'hybrid'
    });
  }

  return Array.from(merged.values()).sort((a, b) => b.score - a.score);
}

export class HybridSearcher {
  private store: ChunkQueries;
  private embeddings: EmbeddingProvider;

  constructor(store: ChunkQueries, embeddings: EmbeddingProvider) {
    this.store = store;
    this.embeddings = embeddings;
  }

  /**
   * Candidates for a query, scoped to one document.
   * Filters go into both underlying queries; nothing is filtered after fusion.
   */
  async search(
    docId: string,
    query: string,
    limit: number,
    filters?: RetrievalFilters
  ): Promise<ChunkRecord[]> {
    logger.debug(
      `Hybrid search: doc_id=${docId} query="${query}" limit=${limit} filters=${JSON.stringify(filters ?? {})}`
    );

    const vector = await this.embeddings.embed(query);
    const [lexical, semantic] = await Promise.all([
      this.store.keywordSearch(docId, query, limit, filters),
      this.store.vectorSearch(docId, vector, limit, filters)
    ]);

    const results = fuseCandidates(lexical, semantic).slice(0, limit);

    logger.debug(
      `Hybrid search returned ${results.length} results (lexical=${lexical.length}, vector=${semantic.length})`
    );
    return results;
  }
}
