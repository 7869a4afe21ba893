export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "EMBEDDING_ERROR"
  | "RETRIEVAL_ERROR"
  | "GENERATION_ERROR"
  | "INGESTION_ERROR";

/**
 * Base class for every failure the service knows how to classify.
 * `status` is the HTTP status the API maps the error to.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

/** Missing or invalid settings. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super("CONFIGURATION_ERROR", message, 500);
  }
}

/** Malformed client request. The message is safe to return to the client. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message, 400);
  }
}

export class EmbeddingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_ERROR", message, 500, options);
  }
}

export class RetrievalError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("RETRIEVAL_ERROR", message, 500, options);
  }
}

export class GenerationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("GENERATION_ERROR", message, 500, options);
  }
}

export class IngestionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INGESTION_ERROR", message, 500, options);
  }
}

/** One-line description for logs, including the cause chain. */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  for (let depth = 0; current != null && depth < 5; depth++) {
    if (current instanceof Error) {
      parts.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(" <- ");
}
