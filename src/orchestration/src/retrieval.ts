/**
 * Retrieval service
 * query → hybrid candidates → rerank → graph expansion → fetch → packed context
 */

import { ChunkRecord, RetrievalConfig, RetrievalFilters } from './types';
import { ChunkQueries } from './storage';
import { EmbeddingProvider } from './embeddings';
import { HybridSearcher } from './hybridSearch';
import { rerank } from './reranking';
import { expandGraph } from './graphExpansion';
import { packContext } from './contextPacking';
import { matchesFilters } from './filters';
import { LoggingObserver, PipelineObserver } from './observer';

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  kInitial: 32,
  kTop: 12,
  kExpand: 8,
  packedMin: 6,
  packedMax: 12
};

export class RetrievalService {
  private store: ChunkQueries;
  private searcher: HybridSearcher;
  private config: RetrievalConfig;
  private observer: PipelineObserver;

  constructor(
    store: ChunkQueries,
    embeddings: EmbeddingProvider,
    config: RetrievalConfig = DEFAULT_RETRIEVAL_CONFIG,
    observer: PipelineObserver = new LoggingObserver()
  ) {
    this.store = store;
    this.searcher = new HybridSearcher(store, embeddings);
    this.config = config;
    this.observer = observer;
  }

  /**
   * Packed context for one query against one document, in document order.
   * Filters bound the expanded chunks as well as the candidates.
   */
  async retrieveContext(docId: string, query: string, filters?: RetrievalFilters): Promise<ChunkRecord[]> {
    const candidates = await this.searcher.search(docId, query, this.config.kInitial, filters);
    this.observer.retrievalStage(docId, 'candidates', candidates.length);
    if (candidates.length === 0) {
      this.observer.retrievalStage(docId, 'packed', 0);
      return [];
    }

    const ranked = rerank(query, candidates, this.config.kTop);
    this.observer.retrievalStage(docId, 'reranked', ranked.length);

    const expansion = await expandGraph(
      this.store,
      docId,
      ranked.map(r => r.chunkId),
      this.config.kExpand
    );
    const fetched = await this.store.fetchByIds(docId, expansion.chunkIds);
    const expanded = fetched
      .filter(record => matchesFilters(record, filters))
      .map((record): ChunkRecord => ({
        ...record,
        source: expansion.sources.get(record.chunkId) ?? record.source
      }));
    this.observer.retrievalStage(docId, 'expanded', expanded.length);

    const packed = this.packContext(query, [...ranked, ...expanded], this.config.packedMax);
    this.observer.retrievalStage(docId, 'packed', packed.length);
    return packed;
  }

  packContext(query: string, records: ChunkRecord[], targetN: number = this.config.packedMax): ChunkRecord[] {
    return packContext(query, records, targetN, {
      packedMin: this.config.packedMin,
      packedMax: this.config.packedMax
    });
  }
}
