export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Timeout, connection reset, or a non-2xx status. Retried with backoff. */
export class TransientNetworkError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "TransientNetworkError";
    this.statusCode = options?.statusCode;
  }
}

/** Transferred bytes do not carry the expected format signature. Retried like a transport failure. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class DownloadExhaustedError extends Error {
  readonly url: string;
  readonly attempts: number;
  readonly lastCause: unknown;

  constructor(url: string, attempts: number, lastCause: unknown) {
    super(`download of ${url} failed after ${attempts} attempts: ${errorMessage(lastCause)}`, { cause: lastCause });
    this.name = "DownloadExhaustedError";
    this.url = url;
    this.attempts = attempts;
    this.lastCause = lastCause;
  }
}

export class SourceUnavailableError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SourceUnavailableError";
    this.sourceId = sourceId;
  }
}

export type AnalysisEngineErrorCode =
  | "rate_limited"
  | "timeout"
  | "http_error"
  | "malformed_response"
  | "stream_error"
  | "no_text"
  | "not_configured";

export class AnalysisEngineError extends Error {
  readonly code: AnalysisEngineErrorCode;

  constructor(code: AnalysisEngineErrorCode, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "AnalysisEngineError";
    this.code = code;
  }
}

/** Storage-layer failure. The record in doubt must be treated as unwritten. */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`ledger ${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}

export class OperationCancelledError extends Error {
  constructor(message = "operation cancelled") {
    super(message);
    this.name = "OperationCancelledError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
