/**
 * Error taxonomy shared by the ingestion, summarization, retrieval and
 * cleanup components. Every error carries the HTTP status the API layer
 * should answer with.
 */

export class AppError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export type FeedErrorClass = 'network' | 'http-status' | 'parse' | 'timeout';

/**
 * A single feed could not be fetched or parsed. Recovered per feed and
 * surfaced in the ingestion report, never thrown past the coordinator.
 */
export class FeedFetchError extends AppError {
  readonly feedUrl: string;
  readonly errorClass: FeedErrorClass;
  readonly httpStatus: number | null;

  constructor(
    feedUrl: string,
    errorClass: FeedErrorClass,
    message: string,
    options?: { cause?: unknown; httpStatus?: number }
  ) {
    super(message, 502, options);
    this.feedUrl = feedUrl;
    this.errorClass = errorClass;
    this.httpStatus = options?.httpStatus ?? null;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export type AnalysisErrorKind = 'generation-failed';

export class AnalysisError extends AppError {
  readonly kind: AnalysisErrorKind;

  constructor(kind: AnalysisErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.kind = kind;
  }
}

/**
 * The relational store cannot be reached at all. The only failure that
 * aborts a whole batch operation.
 */
export class StoreUnavailableError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, options);
  }
}

/**
 * Non-fatal drift between the relational store and the vector index.
 * Returned in reports and logged, never thrown.
 */
export interface ConsistencyWarning {
  kind: 'orphaned-vector-records';
  count: number;
  articleIds: string[];
  message: string;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
