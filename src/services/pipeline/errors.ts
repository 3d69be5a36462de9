/**
 * Error taxonomy for pipeline runs.
 *
 * Every error carries a stable `code` that ends up in the task handle.
 */

export type PipelineErrorCode =
  | 'INPUT_INVALID'
  | 'SOURCE_UNAVAILABLE'
  | 'STAGE_FAILED'
  | 'STORAGE_UNAVAILABLE'
  | 'NO_DOCUMENTS'
  | 'INVALID_TRANSITION'
  | 'CLUSTER_NOT_FOUND';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = 'PipelineError';
  }
}

export class InputInvalidError extends PipelineError {
  constructor(sourceRef: string) {
    super('INPUT_INVALID', `Could not resolve a document id from "${sourceRef}"`);
    this.name = 'InputInvalidError';
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(documentId: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `No content available for document ${documentId}`, options);
    this.name = 'SourceUnavailableError';
  }
}

export class StageFailedError extends PipelineError {
  readonly reason: string;

  constructor(stage: string, reason: string, message: string) {
    super('STAGE_FAILED', `${stage} stage failed (${reason}): ${message}`);
    this.reason = reason;
    this.name = 'StageFailedError';
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(operation: string, options?: { cause?: unknown }) {
    super('STORAGE_UNAVAILABLE', `Storage unavailable during ${operation}`, options);
    this.name = 'StorageUnavailableError';
  }
}

export class NoDocumentsError extends PipelineError {
  constructor(sessionId: string) {
    super('NO_DOCUMENTS', `Cluster ${sessionId} has no documents to synthesize`);
    this.name = 'NoDocumentsError';
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super('INVALID_TRANSITION', `Invalid status transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ClusterNotFoundError extends PipelineError {
  constructor(sessionId: string) {
    super('CLUSTER_NOT_FOUND', `Cluster ${sessionId} not found`);
    this.name = 'ClusterNotFoundError';
  }
}

export function errorCodeOf(error: unknown): string {
  return error instanceof PipelineError ? error.code : 'INTERNAL_ERROR';
}
