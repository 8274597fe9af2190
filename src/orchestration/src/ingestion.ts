/**
 * Ingestion service
 * Turns page texts into a stored section/chunk/recommendation graph, one
 * document at a time, and drives manifest-based batch runs.
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  BatchIngestionResult,
  ChunkingConfig,
  DocumentIngestionResult,
  DocumentMetadata,
  GuidelineDocument,
  PageText,
  TocEntry
} from './types';
import { DocumentWriter } from './storage';
import { EmbeddingProvider } from './embeddings';
import { detectSections } from './sections';
import { chunkSections, DEFAULT_CHUNKING_CONFIG } from './chunking';
import { isRecommendationLike } from './tagging';
import { loadManifest, ManifestEntry } from './manifest';
import { PdfContent, readPdf } from './pdfExtraction';
import { InvalidInputError } from './errors';
import { LoggingObserver, PipelineObserver } from './observer';
import { stableHash } from './text';
import { logger } from './logger';

export type PdfReader = (filePath: string) => Promise<PdfContent>;

export interface IngestionOptions {
  chunking: ChunkingConfig;
  /** Batch progress file; null disables checkpointing */
  checkpointFile: string | null;
}

type Checkpoint = { [docId: string]: string };

const DEFAULT_OPTIONS: IngestionOptions = {
  chunking: DEFAULT_CHUNKING_CONFIG,
  checkpointFile: null
};

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function secondsSince(startedAt: number): number {
  return round((Date.now() - startedAt) / 1000, 3);
}

function emptyResult(docId: string, status: DocumentIngestionResult['status'], pages: number): DocumentIngestionResult {
  return {
    docId,
    status,
    pages,
    sections: 0,
    chunks: 0,
    duplicateChunks: 0,
    recommendations: 0,
    avgTokens: 0,
    runtimeSec: 0
  };
}

export class IngestionService {
  private store: DocumentWriter;
  private embeddings: EmbeddingProvider;
  private options: IngestionOptions;
  private observer: PipelineObserver;
  private readPdf: PdfReader;

  constructor(
    store: DocumentWriter,
    embeddings: EmbeddingProvider,
    options: Partial<IngestionOptions> = {},
    observer: PipelineObserver = new LoggingObserver(),
    pdfReader: PdfReader = readPdf
  ) {
    this.store = store;
    this.embeddings = embeddings;
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.observer = observer;
    this.readPdf = pdfReader;
  }

  /**
   * Ingest one document's pages. Content already stored under any doc id is
   * reported as skipped_duplicate and nothing is written.
   */
  async ingestDocument(
    pages: PageText[],
    metadata: DocumentMetadata,
    toc?: TocEntry[]
  ): Promise<DocumentIngestionResult> {
    const startedAt = Date.now();
    const docId = (metadata.docId || '').trim();
    if (!docId) {
      throw new InvalidInputError('Document metadata has no doc_id');
    }
    if (pages.length === 0) {
      throw new InvalidInputError(`Document ${docId} has no pages`);
    }

    this.observer.ingestionStarted(docId, pages.length);

    const contentHash = stableHash(pages.map(p => p.text).join('\n'));
    const existing = await this.store.findDocumentByContentHash(contentHash);
    if (existing) {
      const skipped = { ...emptyResult(docId, 'skipped_duplicate', pages.length), runtimeSec: secondsSince(startedAt) };
      this.observer.ingestionFinished(skipped);
      return skipped;
    }

    const sections = detectSections(docId, pages, toc);
    const sectionIds = new Map<string, string>();
    for (const section of sections) {
      sectionIds.set(section.path, await this.store.upsertSection(section));
    }

    const chunks = chunkSections(docId, pages, sections, this.options.chunking);
    const storedIds = new Set<string>();
    const recommendationIds = new Set<string>();
    let duplicateChunks = 0;
    let totalTokens = 0;

    for (const chunk of chunks) {
      totalTokens += chunk.tokenCount;

      const embedding = await this.embeddings.embed(chunk.content);
      const chunkId = await this.store.upsertChunk(chunk, embedding);
      if (storedIds.has(chunkId)) {
        duplicateChunks++;
        continue;
      }
      storedIds.add(chunkId);

      const sectionId = sectionIds.get(chunk.sectionPath);
      if (sectionId) {
        await this.store.linkChunkToSection(chunkId, sectionId);
      }
      await this.store.linkChunkToDocument(chunkId, docId);

      if (isRecommendationLike(chunk.chunkType)) {
        const recommendationId = await this.store.upsertRecommendation({ statement: chunk.content }, docId);
        await this.store.linkRecommendationToChunk(recommendationId, chunkId);
        recommendationIds.add(recommendationId);
      }
    }

    // Written last: the content hash marks the document as complete
    const document: GuidelineDocument = {
      docId,
      title: metadata.title || docId,
      year: metadata.year ?? null,
      specialty: metadata.specialty ?? null,
      sourceUrl: metadata.sourceUrl ?? null,
      contentHash,
      createdAt: new Date().toISOString()
    };
    await this.store.upsertDocument(document);

    const result: DocumentIngestionResult = {
      docId,
      status: 'ingested',
      pages: pages.length,
      sections: sections.length,
      chunks: chunks.length,
      duplicateChunks,
      recommendations: recommendationIds.size,
      avgTokens: round(totalTokens / Math.max(1, chunks.length), 2),
      runtimeSec: secondsSince(startedAt)
    };
    this.observer.ingestionFinished(result);
    return result;
  }

  /**
   * Ingest every manifest row that has a PDF in inputDir, sequentially.
   * Rows with bad input are reported as failed; a backend failure stops the run.
   */
  async ingestBatch(inputDir: string, manifestPath: string): Promise<BatchIngestionResult> {
    const startedAt = Date.now();
    logger.section(`Ingestion started input_dir=${inputDir} manifest=${manifestPath}`);

    const manifest = loadManifest(manifestPath);
    const checkpoint = this.loadCheckpoint();
    const docs: DocumentIngestionResult[] = [];
    const usedFiles = new Set<string>();

    for (const entry of manifest) {
      const docId = entry.docId.trim();
      if (!docId) {
        logger.warn(`Skipping manifest record ${entry.key}: empty doc_id`);
        docs.push({ ...emptyResult(entry.key, 'failed', 0), error: 'empty doc_id' });
        continue;
      }

      const pdfFile = this.resolvePdfFile(inputDir, entry);
      if (!pdfFile) {
        logger.warn(`Skipping doc_id=${docId}: no matching PDF found in ${inputDir}`);
        docs.push({ ...emptyResult(docId, 'failed', 0), error: `no matching PDF found in ${inputDir}` });
        continue;
      }
      usedFiles.add(path.basename(pdfFile));

      if (checkpoint[docId] === 'done') {
        logger.info(`Skipping doc_id=${docId}: already marked done in checkpoint`);
        docs.push(emptyResult(docId, 'skipped_checkpoint', 0));
        continue;
      }

      try {
        const content = await this.readPdf(pdfFile);
        // A manifest table of contents overrides the PDF outline
        const toc = entry.toc && entry.toc.length > 0 ? entry.toc : content.toc;
        const result = await this.ingestDocument(
          content.pages,
          {
            docId,
            title: entry.title ?? path.basename(pdfFile, path.extname(pdfFile)),
            year: entry.year,
            specialty: entry.specialty,
            sourceUrl: entry.sourceUrl
          },
          toc
        );
        docs.push(result);

        if (result.status === 'ingested') {
          checkpoint[docId] = 'done';
          this.saveCheckpoint(checkpoint);
        }
      } catch (error) {
        if (!(error instanceof InvalidInputError)) {
          throw error;
        }
        logger.error(`Ingest failed doc_id=${docId}`, error);
        docs.push({ ...emptyResult(docId, 'failed', 0), error: error.message });
      }
    }

    for (const fileName of this.listPdfFiles(inputDir)) {
      if (!usedFiles.has(fileName)) {
        logger.warn(`Ignoring ${fileName}: no manifest record`);
      }
    }

    const summary: BatchIngestionResult = {
      docsTotal: docs.length,
      docsIngested: docs.filter(d => d.status === 'ingested').length,
      docsSkipped: docs.filter(d => d.status === 'skipped_duplicate' || d.status === 'skipped_checkpoint').length,
      docsFailed: docs.filter(d => d.status === 'failed').length,
      docs,
      runtimeSec: secondsSince(startedAt)
    };

    logger.success(
      `Ingestion finished docs_total=${summary.docsTotal} docs_ingested=${summary.docsIngested} ` +
      `docs_skipped=${summary.docsSkipped} docs_failed=${summary.docsFailed} runtime_sec=${summary.runtimeSec}`
    );
    return summary;
  }

  /**
   * First existing PDF among: <docId>.pdf, the row's file name, the manifest key, <key>.pdf
   */
  resolvePdfFile(inputDir: string, entry: ManifestEntry): string | null {
    const candidates: string[] = [];
    if (entry.docId.trim()) {
      candidates.push(`${entry.docId.trim()}.pdf`);
    }
    if (entry.filename) {
      candidates.push(entry.filename);
    }
    const key = entry.key.trim();
    if (key) {
      candidates.push(key);
      if (!key.toLowerCase().endsWith('.pdf')) {
        candidates.push(`${key}.pdf`);
      }
    }

    for (const candidate of new Set(candidates.map(c => c.trim()).filter(c => c.length > 0))) {
      const filePath = path.join(inputDir, candidate);
      if (path.extname(filePath).toLowerCase() === '.pdf' && fs.existsSync(filePath) && fs.statSync(filePath).isFile()) {
        return filePath;
      }
    }
    return null;
  }

  private listPdfFiles(inputDir: string): string[] {
    if (!fs.existsSync(inputDir)) {
      return [];
    }
    return fs.readdirSync(inputDir)
      .filter(name => name.toLowerCase().endsWith('.pdf'))
      .sort();
  }

  private loadCheckpoint(): Checkpoint {
    const file = this.options.checkpointFile;
    if (!file || !fs.existsSync(file)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
    } catch (error) {
      throw new InvalidInputError(`Checkpoint is not valid JSON: ${file}`, { cause: error });
    }
    const checkpoint: Checkpoint = {};
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      for (const [docId, state] of Object.entries(parsed)) {
        if (typeof state === 'string') {
          checkpoint[docId] = state;
        }
      }
    }
    return checkpoint;
  }

  private saveCheckpoint(checkpoint: Checkpoint): void {
    const file = this.options.checkpointFile;
    if (!file) {
      return;
    }
    const directory = path.dirname(file);
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }
    fs.writeFileSync(file, JSON.stringify(checkpoint, null, 2), 'utf-8');
  }
}
