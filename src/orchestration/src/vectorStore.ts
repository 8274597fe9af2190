/**
 * Vector store module
 * In-process GraphStore adapter: documents, sections, chunks with embeddings,
 * recommendations and verdict evaluations kept in maps.
 * - Keyword search: BM25 over the filtered chunks of one document
 * - Vector search: cosine similarity against stored embeddings
 * - Snapshots: the whole store can be written to and read from a JSON file
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  Chunk,
  ChunkRecord,
  ChunkSource,
  DeletionSummary,
  GuidelineDocument,
  Recommendation,
  RetrievalFilters,
  Section,
  StoredRecommendation,
  VerdictEvaluation
} from './types';
import { GraphStore } from './storage';
import { cosineSimilarity } from './embeddings';
import { matchesFilters } from './filters';
import { InvalidInputError } from './errors';
import { stableHash } from './text';
import { logger } from './logger';

type PersistedChunk = Chunk & { chunkId: string };
type PersistedSection = Section & { sectionId: string };

interface StoredChunk {
  chunk: PersistedChunk;
  embedding: number[] | null;
  sectionId: string | null;
}

interface GraphSnapshot {
  version: 1;
  documents: GuidelineDocument[];
  sections: PersistedSection[];
  chunks: StoredChunk[];
  recommendations: StoredRecommendation[];
  evaluations: VerdictEvaluation[];
}

function isSnapshot(value: unknown): value is GraphSnapshot {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: { [key: string]: unknown } = { ...value };
  return candidate.version === 1 &&
    ['documents', 'sections', 'chunks', 'recommendations', 'evaluations']
      .every(key => Array.isArray(candidate[key]));
}

/**
 * Okapi BM25 over a fixed set of texts
 */
class BM25 {
  private documents: string[][] = [];
  private avgDocLength: number = 0;
  private idf: Map<string, number> = new Map();
  private k1: number = 1.5;
  private b: number = 0.75;

  constructor(texts: string[]) {
    this.documents = texts.map(text => BM25.tokenize(text));
    const totalLength = this.documents.reduce((sum, doc) => sum + doc.length, 0);
    this.avgDocLength = this.documents.length > 0 ? totalLength / this.documents.length : 0;
    this.calculateIDF();
  }

  static tokenize(text: string): string[] {
    return text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? [];
  }

  private calculateIDF(): void {
    const N = this.documents.length;
    const termDocCount = new Map<string, number>();

    this.documents.forEach(doc => {
      new Set(doc).forEach(term => {
        termDocCount.set(term, (termDocCount.get(term) || 0) + 1);
      });
    });

    termDocCount.forEach((docCount, term) => {
      this.idf.set(term, Math.log((N - docCount + 0.5) / (docCount + 0.5) + 1));
    });
  }

  private score(queryTerms: string[], docIndex: number): number {
    const doc = this.documents[docIndex];
    if (doc.length === 0 || this.avgDocLength === 0) {
      return 0;
    }

    let score = 0;
    for (const term of queryTerms) {
      const tf = doc.filter(t => t === term).length;
      if (tf === 0) {
        continue;
      }
      const idf = this.idf.get(term) || 0;
      const denominator = tf + this.k1 * (1 - this.b + this.b * (doc.length / this.avgDocLength));
      score += idf * ((tf * (this.k1 + 1)) / denominator);
    }
    return score;
  }

  getScores(query: string): number[] {
    const queryTerms = Array.from(new Set(BM25.tokenize(query)));
    return this.documents.map((_, index) => this.score(queryTerms, index));
  }
}

function toRecord(chunk: PersistedChunk, score: number, source: ChunkSource): ChunkRecord {
  return {
    chunkId: chunk.chunkId,
    docId: chunk.docId,
    sectionPath: chunk.sectionPath,
    pageStart: chunk.pageStart,
    pageEnd: chunk.pageEnd,
    chunkType: chunk.chunkType,
    content: chunk.content,
    score,
    source,
    order: chunk.order
  };
}

export class InMemoryGraphStore implements GraphStore {
  private documents = new Map<string, GuidelineDocument>();
  private sections = new Map<string, PersistedSection>();
  private chunks = new Map<string, StoredChunk>();
  private recommendations = new Map<string, StoredRecommendation>();
  private evaluations = new Map<string, VerdictEvaluation>();

  private chunksOf(docId: string): PersistedChunk[] {
    return Array.from(this.chunks.values())
      .map(stored => stored.chunk)
      .filter(chunk => chunk.docId === docId)
      .sort((a, b) => a.order - b.order);
  }

  // ---- DocumentWriter -------------------------------------------------

  async findDocumentByContentHash(contentHash: string): Promise<GuidelineDocument | null> {
    for (const document of this.documents.values()) {
      if (document.contentHash === contentHash) {
        return { ...document };
      }
    }
    return null;
  }

  async upsertDocument(document: GuidelineDocument): Promise<string> {
    this.documents.set(document.docId, { ...document });
    logger.debug(`Upsert document doc_id=${document.docId}`);
    return document.docId;
  }

  async upsertSection(section: Section): Promise<string> {
    const sectionId = section.sectionId ?? stableHash(`${section.docId}|${section.path}`);
    this.sections.set(sectionId, { ...section, sectionId });
    logger.debug(`Upsert section doc_id=${section.docId} path=${section.path}`);
    return sectionId;
  }

  async upsertChunk(chunk: Chunk, embedding: number[] | null): Promise<string> {
    for (const stored of this.chunks.values()) {
      if (stored.chunk.docId === chunk.docId && stored.chunk.chunkHash === chunk.chunkHash) {
        return stored.chunk.chunkId;
      }
    }

    const chunkId = chunk.chunkId ??
      stableHash(`${chunk.docId}|${chunk.sectionPath}|${chunk.pageStart}|${chunk.chunkHash}`);

    this.chunks.set(chunkId, {
      chunk: { ...chunk, entityMentions: [...chunk.entityMentions], chunkId },
      embedding: embedding ? [...embedding] : null,
      sectionId: null
    });
    logger.debug(`Upsert chunk doc_id=${chunk.docId} chunk_id=${chunkId}`);
    return chunkId;
  }

  async linkChunkToSection(chunkId: string, sectionId: string): Promise<void> {
    const stored = this.chunks.get(chunkId);
    if (stored) {
      stored.sectionId = sectionId;
    }
  }

  async linkChunkToDocument(chunkId: string, docId: string): Promise<void> {
    const stored = this.chunks.get(chunkId);
    if (stored) {
      stored.chunk = { ...stored.chunk, docId };
    }
  }

  async upsertRecommendation(recommendation: Recommendation, docId: string): Promise<string> {
    const recommendationId = stableHash(`${docId}|${recommendation.statement}`);
    const existing = this.recommendations.get(recommendationId);

    this.recommendations.set(recommendationId, {
      ...recommendation,
      recommendationId,
      docId,
      chunkIds: existing ? existing.chunkIds : []
    });
    return recommendationId;
  }

  async linkRecommendationToChunk(recommendationId: string, chunkId: string): Promise<void> {
    const recommendation = this.recommendations.get(recommendationId);
    if (recommendation && !recommendation.chunkIds.includes(chunkId)) {
      recommendation.chunkIds = [...recommendation.chunkIds, chunkId];
    }
  }

  // ---- ChunkQueries ---------------------------------------------------

  async keywordSearch(
    docId: string,
    query: string,
    limit: number,
    filters?: RetrievalFilters
  ): Promise<ChunkRecord[]> {
    const candidates = this.chunksOf(docId).filter(chunk => matchesFilters(chunk, filters));
    if (candidates.length === 0) {
      return [];
    }

    const scores = new BM25(candidates.map(c => c.content)).getScores(query);
    const maxScore = Math.max(...scores);
    if (maxScore <= 0) {
      return [];
    }

    return candidates
      .map((chunk, index) => ({ chunk, score: scores[index] / maxScore }))
      .filter(hit => hit.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(hit => toRecord(hit.chunk, hit.score, 'lexical'));
  }

  async vectorSearch(
    docId: string,
    vector: number[],
    limit: number,
    filters?: RetrievalFilters
  ): Promise<ChunkRecord[]> {
    const hits: Array<{ chunk: PersistedChunk; score: number }> = [];
    let mismatched = 0;

    for (const stored of this.chunks.values()) {
      const { chunk, embedding } = stored;
      if (chunk.docId !== docId || !embedding) {
        continue;
      }
      if (embedding.length !== vector.length) {
        mismatched++;
        continue;
      }
      if (!matchesFilters(chunk, filters)) {
        continue;
      }
      hits.push({ chunk, score: cosineSimilarity(vector, embedding) });
    }

    if (mismatched > 0) {
      logger.warn(
        `Vector search doc_id=${docId}: ${mismatched} chunks have embeddings of another dimension ` +
        `than the query (${vector.length}); re-ingest after changing the embedding provider`
      );
    }

    return hits
      .sort((a, b) => b.score - a.score || a.chunk.order - b.chunk.order)
      .slice(0, limit)
      .map(hit => toRecord(hit.chunk, hit.score, 'vector'));
  }

  async fetchByIds(docId: string, chunkIds: string[]): Promise<ChunkRecord[]> {
    const records: ChunkRecord[] = [];
    for (const chunkId of new Set(chunkIds)) {
      const stored = this.chunks.get(chunkId);
      if (stored && stored.chunk.docId === docId) {
        records.push(toRecord(stored.chunk, 0, 'fetch'));
      }
    }
    return records;
  }

  async fetchSectionNeighbors(
    docId: string,
    sectionPath: string,
    centerOrder: number,
    limit: number
  ): Promise<ChunkRecord[]> {
    return this.chunksOf(docId)
      .filter(chunk => chunk.sectionPath === sectionPath)
      .sort((a, b) => Math.abs(a.order - centerOrder) - Math.abs(b.order - centerOrder))
      .slice(0, limit)
      .map(chunk => toRecord(chunk, 0, 'structural'));
  }

  async fetchByEntityMentions(docId: string, terms: string[], limit: number): Promise<ChunkRecord[]> {
    if (terms.length === 0) {
      return [];
    }
    const wanted = new Set(terms);
    return this.chunksOf(docId)
      .filter(chunk => chunk.entityMentions.some(term => wanted.has(term)))
      .slice(0, limit)
      .map(chunk => toRecord(chunk, 0, 'entity'));
  }

  async fetchRecommendationLinked(docId: string, seedIds: string[], limit: number): Promise<ChunkRecord[]> {
    if (seedIds.length === 0) {
      return [];
    }
    const seeds = new Set(seedIds);
    const linked = new Set<string>();

    for (const recommendation of this.recommendations.values()) {
      if (recommendation.docId !== docId) {
        continue;
      }
      if (recommendation.chunkIds.some(id => seeds.has(id))) {
        recommendation.chunkIds.forEach(id => linked.add(id));
      }
    }

    const records = await this.fetchByIds(docId, Array.from(linked).slice(0, limit));
    return records.map((record): ChunkRecord => ({ ...record, source: 'recommendation' }));
  }

  // ---- DocumentDeletion -----------------------------------------------

  async deleteChunksByDocId(docId: string): Promise<number> {
    let deleted = 0;
    for (const [chunkId, stored] of this.chunks) {
      if (stored.chunk.docId === docId) {
        this.chunks.delete(chunkId);
        deleted++;
      }
    }
    logger.info(`Deleted chunks doc_id=${docId} count=${deleted}`);
    return deleted;
  }

  async deleteByDocId(docId: string): Promise<DeletionSummary> {
    const removeWhere = <T>(map: Map<string, T>, owned: (value: T) => boolean): number => {
      let removed = 0;
      for (const [key, value] of map) {
        if (owned(value)) {
          map.delete(key);
          removed++;
        }
      }
      return removed;
    };

    const summary: DeletionSummary = {
      evaluations: removeWhere(this.evaluations, e => e.docId === docId),
      recommendations: removeWhere(this.recommendations, r => r.docId === docId),
      sections: removeWhere(this.sections, s => s.docId === docId),
      chunks: await this.deleteChunksByDocId(docId),
      documents: removeWhere(this.documents, d => d.docId === docId)
    };

    logger.info(`Deleted all objects by doc_id=${docId}`, summary);
    return summary;
  }

  // ---- EvaluationWriter -----------------------------------------------

  async storeVerdictEvaluation(evaluation: VerdictEvaluation): Promise<string> {
    this.evaluations.set(evaluation.evaluationId, evaluation);
    logger.info(`Stored verdict evaluation doc_id=${evaluation.docId} eval_id=${evaluation.evaluationId}`);
    return evaluation.evaluationId;
  }

  // ---- Inspection & snapshots -----------------------------------------

  getAllChunks(docId?: string): PersistedChunk[] {
    const all = Array.from(this.chunks.values()).map(stored => stored.chunk);
    return docId ? all.filter(chunk => chunk.docId === docId) : all;
  }

  getSections(docId: string): PersistedSection[] {
    return Array.from(this.sections.values())
      .filter(section => section.docId === docId)
      .sort((a, b) => a.order - b.order);
  }

  getRecommendations(docId: string): StoredRecommendation[] {
    return Array.from(this.recommendations.values()).filter(r => r.docId === docId);
  }

  getEvaluations(docId: string): VerdictEvaluation[] {
    return Array.from(this.evaluations.values()).filter(e => e.docId === docId);
  }

  getSectionIdOfChunk(chunkId: string): string | null {
    return this.chunks.get(chunkId)?.sectionId ?? null;
  }

  getCount(): number {
    return this.chunks.size;
  }

  saveSnapshot(filePath: string): void {
    const snapshot: GraphSnapshot = {
      version: 1,
      documents: Array.from(this.documents.values()),
      sections: Array.from(this.sections.values()),
      chunks: Array.from(this.chunks.values()),
      recommendations: Array.from(this.recommendations.values()),
      evaluations: Array.from(this.evaluations.values())
    };

    const directory = path.dirname(filePath);
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
    fs.writeFileSync(filePath, JSON.stringify(snapshot), 'utf-8');
    logger.debug(`Store snapshot written to ${filePath} (${this.chunks.size} chunks)`);
  }

  /**
   * Load a snapshot file; a missing file yields an empty store
   */
  static loadSnapshot(filePath: string): InMemoryGraphStore {
    const store = new InMemoryGraphStore();
    if (!fs.existsSync(filePath)) {
      return store;
    }

    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (!isSnapshot(parsed)) {
      throw new InvalidInputError(`Not a store snapshot: ${filePath}`);
    }

    parsed.documents.forEach(d => store.documents.set(d.docId, d));
    parsed.sections.forEach(s => store.sections.set(s.sectionId, s));
    parsed.chunks.forEach(c => store.chunks.set(c.chunk.chunkId, c));
    parsed.recommendations.forEach(r => store.recommendations.set(r.recommendationId, r));
    parsed.evaluations.forEach(e => store.evaluations.set(e.evaluationId, e));

    logger.debug(`Store snapshot loaded from ${filePath} (${store.chunks.size} chunks)`);
    return store;
  }
}
