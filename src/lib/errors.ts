export type PipelineErrorCode =
  | 'UNPARSABLE_QUERY'
  | 'NO_CANDIDATES'
  | 'RENDER_FAILED'
  | 'PUBLISH_FAILED'
  | 'SOURCE_UNAVAILABLE'
  | 'CANCELLED'
  | 'SELECTION_NOT_PENDING'
  | 'INVALID_SELECTION'
  | 'INTERNAL';

/**
 * Base class for every failure the pipeline reports upstream.
 * `code` is stable and safe to expose over the HTTP API.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly statusCode: number;

  constructor(code: PipelineErrorCode, message: string, statusCode = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class UnparsableQueryError extends PipelineError {
  constructor(readonly raw: string) {
    super('UNPARSABLE_QUERY', `No title could be extracted from "${raw}"`, 422);
  }
}

export class NoCandidatesError extends PipelineError {
  constructor(readonly title: string, readonly year?: number) {
    super('NO_CANDIDATES', `No movie found for "${title}"${year ? ` (${year})` : ''}`, 404);
  }
}

export class RenderFailedError extends PipelineError {
  constructor(readonly externalId: string, reason: string, options?: { cause?: unknown }) {
    super('RENDER_FAILED', `Poster render failed for ${externalId}: ${reason}`, 502, options);
  }
}

export class PublishFailedError extends PipelineError {
  constructor(readonly externalId: string, reason: string, options?: { cause?: unknown }) {
    super('PUBLISH_FAILED', `Publishing ${externalId} failed: ${reason}`, 502, options);
  }
}

export class MovieSourceError extends PipelineError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', message, 503, options);
  }
}

export class QueryCancelledError extends PipelineError {
  constructor(readonly queryId: string) {
    super('CANCELLED', `Query ${queryId} was cancelled`, 409);
  }
}

export class SelectionNotPendingError extends PipelineError {
  constructor(readonly queryId: string) {
    super('SELECTION_NOT_PENDING', `Query ${queryId} is not awaiting a selection`, 409);
  }
}

export class InvalidSelectionError extends PipelineError {
  constructor(readonly queryId: string, readonly candidateId: string) {
    super('INVALID_SELECTION', `Candidate ${candidateId} is not an option for query ${queryId}`, 400);
  }
}

export function toPipelineError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PipelineError('INTERNAL', message, 500, { cause: error });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
