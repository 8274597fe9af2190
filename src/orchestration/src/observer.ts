/**
 * Extension points the ingestion and retrieval services report to.
 * The services never log directly; they are handed an observer.
 */

import { DocumentIngestionResult } from './types';
import { logger } from './logger';

export type RetrievalStage = 'candidates' | 'reranked' | 'expanded' | 'packed';

export interface PipelineObserver {
  ingestionStarted(docId: string, pages: number): void;
  ingestionFinished(result: DocumentIngestionResult): void;
  retrievalStage(docId: string, stage: RetrievalStage, count: number): void;
}

export class LoggingObserver implements PipelineObserver {
  ingestionStarted(docId: string, pages: number): void {
    logger.info(`Ingest document started doc_id=${docId} pages=${pages}`);
  }

  ingestionFinished(result: DocumentIngestionResult): void {
    if (result.status === 'ingested') {
      logger.success(
        `Ingest document finished doc_id=${result.docId} sections=${result.sections} ` +
        `chunks=${result.chunks} runtime=${result.runtimeSec}s`
      );
    } else {
      logger.info(`Ingest document ${result.status} doc_id=${result.docId}`);
    }
  }

  retrievalStage(docId: string, stage: RetrievalStage, count: number): void {
    logger.info(`Retrieve context doc_id=${docId} ${stage}=${count}`);
  }
}

export const silentObserver: PipelineObserver = {
  ingestionStarted: () => undefined,
  ingestionFinished: () => undefined,
  retrievalStage: () => undefined
};
