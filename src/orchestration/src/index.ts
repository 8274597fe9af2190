/**
 * Library entry point
 */

export * from './types';
export * from './errors';
export { Logger, LogLevel, logger } from './logger';
export { PipelineObserver, RetrievalStage, LoggingObserver, silentObserver } from './observer';
export { loadSettings, Settings, EmbeddingProviderName } from './config';
export { normalizeSpace, estimateTokens, stableHash } from './text';
export { detectSections, detectHeadingsFromText, WHOLE_DOCUMENT_PATH } from './sections';
export { splitIntoChunks, chunkSections, isStructuralStart, DEFAULT_CHUNKING_CONFIG } from './chunking';
export { classifyChunkType, extractEntityMentions, capitalisedTerms, isRecommendationLike } from './tagging';
export { DocumentWriter, ChunkQueries, DocumentDeletion, EvaluationWriter, GraphStore } from './storage';
export {
  EmbeddingProvider,
  LocalEmbeddingProvider,
  OllamaEmbeddingProvider,
  OllamaEmbeddingConfig,
  cosineSimilarity
} from './embeddings';
export { InMemoryGraphStore } from './vectorStore';
export { HybridSearcher, fuseCandidates } from './hybridSearch';
export { rerank } from './reranking';
export { expandGraph, ExpansionResult } from './graphExpansion';
export { packContext, PackingOptions } from './contextPacking';
export { RetrievalService, DEFAULT_RETRIEVAL_CONFIG } from './retrieval';
export { IngestionService, IngestionOptions, PdfReader } from './ingestion';
export { loadManifest, ManifestEntry } from './manifest';
export { readPdf, PdfContent } from './pdfExtraction';
export { matchesFilters, FilterableChunk } from './filters';
export { VerdictJudge, VerdictModel, GroqVerdictModel, ChatClient } from './judge';
