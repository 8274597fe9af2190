/**
 * Error taxonomy shared by ingestion and retrieval
 */

export type PipelineErrorCode = 'INVALID_INPUT' | 'BACKEND_UNAVAILABLE';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A single item (manifest row, source file, document payload) cannot be processed.
 * Batch callers record it and move on.
 */
export class InvalidInputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
  }
}

/**
 * The store, embedding service or chat model could not be reached.
 * Fatal for the current call; never retried here.
 */
export class BackendUnavailableError extends PipelineError {
  readonly backend: string;

  constructor(backend: string, message: string, options?: { cause?: unknown }) {
    super('BACKEND_UNAVAILABLE', `${backend} unavailable: ${message}`, options);
    this.backend = backend;
  }
}
