/**
 * Error Types
 * Structured errors shared by every fanout service
 *
 * Only two of these ever reach the caller of a research run:
 * ClassificationError (bad query) and StorageError (artifact could not be
 * persisted). Everything else stays local to the thread that raised it.
 */

/**
 * Base error class for all fanout errors
 */
export class FanoutError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "FanoutError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
      stack: this.stack,
    };
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends FanoutError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Validation errors (schemas, artifacts read back from storage)
 */
export class ValidationError extends FanoutError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * The query could not be classified. Fatal: no thread work starts.
 */
export class ClassificationError extends FanoutError {
  public readonly query: string;

  constructor(message: string, query: string) {
    super(message, "CLASSIFICATION_ERROR", {
      context: { query },
      retryable: false,
    });
    this.name = "ClassificationError";
    this.query = query;
  }
}

export type StorageErrorReason = "io" | "duplicate" | "foreign_key" | "mismatch" | "sealed";

/**
 * An artifact could not be persisted. Fatal: halts the whole run.
 */
export class StorageError extends FanoutError {
  public readonly key: string;
  public readonly reason: StorageErrorReason;

  constructor(
    message: string,
    key: string,
    options?: {
      cause?: Error;
      reason?: StorageErrorReason;
    }
  ) {
    super(message, "STORAGE_ERROR", {
      cause: options?.cause,
      context: { key, reason: options?.reason ?? "io" },
      retryable: false,
    });
    this.name = "StorageError";
    this.key = key;
    this.reason = options?.reason ?? "io";
  }
}

/**
 * A source capability call failed
 */
export class CapabilityError extends FanoutError {
  public readonly capability: string;

  constructor(
    message: string,
    capability: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "CAPABILITY_ERROR", {
      ...options,
      context: { capability, ...options?.context },
    });
    this.name = "CapabilityError";
    this.capability = capability;
  }
}

export function isFanoutError(error: unknown): error is FanoutError {
  return error instanceof FanoutError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isFanoutError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit") ||
      message.includes("overloaded")
    );
  }

  return false;
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
