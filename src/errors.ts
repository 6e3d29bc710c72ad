export class SieveError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type CorpusErrorCode = "missing_column" | "missing_id" | "duplicate_id" | "empty_corpus" | "unreadable";

export class CorpusFormatError extends SieveError {
  declare readonly code: CorpusErrorCode;
  readonly details: string[];

  constructor(code: CorpusErrorCode, message: string, details: string[] = [], options?: { cause?: unknown }) {
    super(code, message, options);
    this.details = details;
  }
}

export class EmbeddingUnavailable extends SieveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_unavailable", message, options);
  }
}

export class CacheIOError extends SieveError {
  readonly operation: "read" | "write" | "open";

  constructor(operation: "read" | "write" | "open", message: string, options?: { cause?: unknown }) {
    super("cache_io", message, options);
    this.operation = operation;
  }
}

export class DetectionTimeout extends SieveError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("timeout", `embedding did not finish within ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends SieveError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config", message, options);
  }
}

export type FailureReason = "corpus_format" | "cache_io" | "invalid_request" | "aborted";

/** Terminal failure of a detect() call. `cause` holds the underlying error. */
export class DetectionError extends SieveError {
  declare readonly code: FailureReason;

  constructor(reason: FailureReason, message: string, options?: { cause?: unknown }) {
    super(reason, message, options);
  }

  get reason(): FailureReason {
    return this.code;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
