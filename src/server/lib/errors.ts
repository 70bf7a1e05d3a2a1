export type QualityMetricsErrorCode =
  | 'validation'
  | 'config'
  | 'remote_request'
  | 'fetch_failed'
  | 'fetch_aborted'
  | 'storage_write'
  | 'storage_capacity'
  | 'storage_read';

export class QualityMetricsError extends Error {
  readonly code: QualityMetricsErrorCode;

  constructor(code: QualityMetricsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Input that can never be written: empty identity, unknown metric, key over the bound. */
export class ValidationError extends QualityMetricsError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class ConfigError extends QualityMetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

/** Non-retryable answer from the remote API (4xx other than 429, or a malformed body). */
export class RemoteRequestError extends QualityMetricsError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: { cause?: unknown }) {
    super('remote_request', message, options);
    this.status = status;
  }
}

/** Transient failures outlasted the retry ceiling. The caller may try again later. */
export class FetchFailedError extends QualityMetricsError {
  readonly recoverable = true;
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('fetch_failed', message, options);
    this.attempts = attempts;
  }
}

export class FetchAbortedError extends QualityMetricsError {
  constructor(message = 'Fetch aborted by caller') {
    super('fetch_aborted', message);
  }
}

export type WriteProgress = {
  /** Entities written (or deleted) before the failure. */
  completed: number;
  failedPartition: string;
};

export class StorageWriteError extends QualityMetricsError {
  readonly progress: WriteProgress;

  constructor(message: string, progress: WriteProgress, options?: { cause?: unknown }) {
    super('storage_write', message, options);
    this.progress = progress;
  }
}

/** The store refused a batch for its size. Chunking should prevent this; it is reported, not retried. */
export class StorageCapacityError extends QualityMetricsError {
  readonly progress: WriteProgress;

  constructor(message: string, progress: WriteProgress, options?: { cause?: unknown }) {
    super('storage_capacity', message, options);
    this.progress = progress;
  }
}

export class StorageReadError extends QualityMetricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_read', message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** HTTP status a route answers with when an operation throws `err`. */
export function httpStatusOf(err: unknown): number {
  if (!(err instanceof QualityMetricsError)) return 500;
  switch (err.code) {
    case 'validation':
      return 400;
    case 'remote_request':
    case 'fetch_failed':
    case 'fetch_aborted':
      return 502;
    default:
      return 500;
  }
}
