/**
 * Type definitions for the guideline knowledge base
 */

export type ChunkType =
  | 'recommendation'
  | 'algorithm'
  | 'table'
  | 'definition'
  | 'evidence'
  | 'appendix'
  | 'other';

export const CHUNK_TYPES: readonly ChunkType[] = [
  'recommendation',
  'algorithm',
  'table',
  'definition',
  'evidence',
  'appendix',
  'other'
];

/** Which retrieval path produced a record */
export type ChunkSource =
  | 'lexical'
  | 'vector'
  | 'hybrid'
  | 'structural'
  | 'entity'
  | 'recommendation'
  | 'fetch';

export interface PageText {
  page: number;
  text: string;
}

export interface TocEntry {
  level: number;
  title: string;
  page: number;
}

export interface DocumentMetadata {
  docId: string;
  title?: string;
  year?: number | null;
  specialty?: string | null;
  sourceUrl?: string | null;
}

export interface GuidelineDocument {
  docId: string;
  title: string;
  year: number | null;
  specialty: string | null;
  sourceUrl: string | null;
  contentHash: string;
  createdAt: string;
}

export interface Section {
  docId: string;
  path: string;
  order: number;
  level: number;
  pageStart: number;
  pageEnd: number;
  sectionId?: string;
}

export interface Chunk {
  docId: string;
  sectionPath: string;
  pageStart: number;
  pageEnd: number;
  content: string;
  chunkType: ChunkType;
  tokenCount: number;
  chunkHash: string;
  order: number;
  entityMentions: string[];
  chunkId?: string;
}

export interface Recommendation {
  statement: string;
  strength?: string | null;
  evidenceLevel?: string | null;
  population?: string | null;
  contraindications?: string | null;
}

export interface StoredRecommendation extends Recommendation {
  recommendationId: string;
  docId: string;
  chunkIds: string[];
}

export interface ChunkRecord {
  chunkId: string;
  docId: string;
  sectionPath: string;
  pageStart: number;
  pageEnd: number;
  chunkType: ChunkType;
  content: string;
  score: number;
  source: ChunkSource;
  order: number;
}

export interface PageRange {
  start: number;
  end: number;
}

export interface RetrievalFilters {
  sectionPrefix?: string;
  chunkTypes?: ChunkType[];
  pageRange?: PageRange;
}

export interface ChunkingConfig {
  minTokens: number;
  maxTokens: number;
}

export interface RetrievalConfig {
  kInitial: number;
  kTop: number;
  kExpand: number;
  packedMin: number;
  packedMax: number;
}

export type IngestionStatus = 'ingested' | 'skipped_duplicate' | 'skipped_checkpoint' | 'failed';

export interface DocumentIngestionResult {
  docId: string;
  status: IngestionStatus;
  pages: number;
  sections: number;
  chunks: number;
  duplicateChunks: number;
  recommendations: number;
  avgTokens: number;
  runtimeSec: number;
  error?: string;
}

export interface BatchIngestionResult {
  docsTotal: number;
  docsIngested: number;
  docsSkipped: number;
  docsFailed: number;
  docs: DocumentIngestionResult[];
  runtimeSec: number;
}

export interface DeletionSummary {
  documents: number;
  sections: number;
  chunks: number;
  recommendations: number;
  evaluations: number;
}

export type VerdictLabel = 'correct' | 'partially_correct' | 'incorrect' | 'insufficient_info';

export interface Citation {
  chunkId: string;
  sectionPath: string;
  pages: string;
}

export interface JudgeResult {
  verdict: VerdictLabel;
  explanation: string;
  citations: Citation[];
  missingInfo: string[];
  recommendedAction: string | null;
  chunkIds: string[];
}

export interface VerdictEvaluation {
  evaluationId: string;
  docId: string;
  verdictText: string;
  retrievedChunkIds: string[];
  output: JudgeResult;
  modelName: string;
  createdAt: string;
}

export interface GroqConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens?: number;
}
