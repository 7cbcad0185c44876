import type { ValidationReport } from './types.js';

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ValidationError extends Error {
  readonly code: string;
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends ValidationError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class CatalogError extends ValidationError {
  constructor(message: string) {
    super('CATALOG_ERROR', message);
  }
}

export class SubmissionError extends ValidationError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super('SUBMISSION_ERROR', message, options);
  }
}

export class TaggingError extends ValidationError {
  constructor(message: string) {
    super('TAGGING_ERROR', message);
  }
}

export class RetrievalTimeoutError extends ValidationError {
  constructor(
    readonly token: string,
    readonly attempts: number,
  ) {
    super('RETRIEVAL_TIMEOUT', `token ${token} never indexed within deadline`);
  }
}

export class RetrievalTransportError extends ValidationError {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryable = false,
    options?: { cause?: unknown },
  ) {
    super('RETRIEVAL_TRANSPORT_ERROR', message, options);
  }
}

export class DuplicateTokenError extends ValidationError {
  constructor(readonly token: string) {
    super('DUPLICATE_TOKEN', `tracking token ${token} is already live`);
  }
}

export class TokenNotFoundError extends ValidationError {
  constructor(readonly token: string) {
    super('TOKEN_NOT_FOUND', `tracking token ${token} has no submission record`);
  }
}

export class BoundaryUnreachableError extends ValidationError {
  constructor(readonly report: ValidationReport) {
    super(
      'BOUNDARY_UNREACHABLE',
      `all ${report.entries.length} products failed to reach the ingestion or query boundary`,
    );
  }
}

export class UnknownProductError extends ValidationError {
  constructor(readonly names: string[]) {
    super('UNKNOWN_PRODUCT', `unknown product(s): ${names.join(', ')}`);
  }
}

export class RunInProgressError extends ValidationError {
  constructor() {
    super('RUN_IN_PROGRESS', 'a validation run is already in progress');
  }
}
