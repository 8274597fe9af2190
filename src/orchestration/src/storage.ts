/**
 * Storage contract consumed by ingestion and retrieval.
 * Each capability is its own interface; one backend adapter implements them all.
 * Every call may reject with BackendUnavailableError.
 */

import {
  Chunk,
  ChunkRecord,
  DeletionSummary,
  GuidelineDocument,
  Recommendation,
  RetrievalFilters,
  Section,
  VerdictEvaluation
} from './types';

export interface DocumentWriter {
  findDocumentByContentHash(contentHash: string): Promise<GuidelineDocument | null>;
  upsertDocument(document: GuidelineDocument): Promise<string>;
  upsertSection(section: Section): Promise<string>;
  /**
   * Returns the id of an existing chunk with the same hash in the same document
   * instead of writing a second copy
   */
  upsertChunk(chunk: Chunk, embedding: number[] | null): Promise<string>;
  linkChunkToSection(chunkId: string, sectionId: string): Promise<void>;
  linkChunkToDocument(chunkId: string, docId: string): Promise<void>;
  upsertRecommendation(recommendation: Recommendation, docId: string): Promise<string>;
  linkRecommendationToChunk(recommendationId: string, chunkId: string): Promise<void>;
}

export interface ChunkQueries {
  /** Keyword scores normalised to [0, 1] by the best hit */
  keywordSearch(docId: string, query: string, limit: number, filters?: RetrievalFilters): Promise<ChunkRecord[]>;
  vectorSearch(docId: string, vector: number[], limit: number, filters?: RetrievalFilters): Promise<ChunkRecord[]>;
  fetchByIds(docId: string, chunkIds: string[]): Promise<ChunkRecord[]>;
  /** Chunks of one section ordered by distance from centerOrder */
  fetchSectionNeighbors(docId: string, sectionPath: string, centerOrder: number, limit: number): Promise<ChunkRecord[]>;
  fetchByEntityMentions(docId: string, terms: string[], limit: number): Promise<ChunkRecord[]>;
  /** Chunks linked to any recommendation that references one of seedIds */
  fetchRecommendationLinked(docId: string, seedIds: string[], limit: number): Promise<ChunkRecord[]>;
}

export interface DocumentDeletion {
  deleteChunksByDocId(docId: string): Promise<number>;
  /** Removes the document and everything it owns */
  deleteByDocId(docId: string): Promise<DeletionSummary>;
}

export interface EvaluationWriter {
  storeVerdictEvaluation(evaluation: VerdictEvaluation): Promise<string>;
}

export type GraphStore = DocumentWriter & ChunkQueries & DocumentDeletion & EvaluationWriter;
