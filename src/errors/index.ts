export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly category: ErrorCategory;
  abstract readonly severity: ErrorSeverity;
  abstract readonly userMessage: string;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = this.constructor.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export enum ErrorCategory {
  USER = "user", // Caller input errors
  SYSTEM = "system", // Local infrastructure errors
  EXTERNAL = "external", // Capability / provider errors
}

export enum ErrorSeverity {
  LOW = "low", // Caller can continue, minor issue
  MEDIUM = "medium", // Operation degraded, retry possible
  HIGH = "high", // Operation failed, configuration or admin needed
}

export enum LLMErrorSubType {
  TIMEOUT = "timeout",
  RATE_LIMIT = "rate_limit",
  API_ERROR = "api_error",
  INVALID_RESPONSE = "invalid_response",
}

/** Errors raised by LLM / embedding providers */
export class LLMError extends AppError {
  readonly code = "LLM_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity: ErrorSeverity;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly subType: LLMErrorSubType,
    public readonly provider: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);

    switch (subType) {
      case LLMErrorSubType.TIMEOUT:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = "The model provider took too long to respond.";
        break;
      case LLMErrorSubType.RATE_LIMIT:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = "The model provider is rate limiting requests.";
        break;
      case LLMErrorSubType.API_ERROR:
        this.severity = ErrorSeverity.HIGH;
        this.userMessage = "The model provider returned an error.";
        break;
      case LLMErrorSubType.INVALID_RESPONSE:
        this.severity = ErrorSeverity.MEDIUM;
        this.userMessage = "The model provider returned an unexpected response.";
        break;
    }
  }
}

/** A source file could not be read or decoded; the file is skipped */
export class IngestError extends AppError {
  readonly code = "INGEST_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage = "A file could not be indexed and was skipped.";

  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: string,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** Embedding capability failure for a single text */
export class EmbeddingError extends AppError {
  readonly code = "EMBEDDING_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "Embeddings could not be computed for some content.";

  constructor(
    message: string,
    public readonly retryable: boolean,
    context?: Record<string, unknown>,
    originalError?: Error
  ) {
    super(message, context, originalError);
  }
}

/** Malformed retrieval call (bad k, bad filters, blank query) */
export class RetrievalError extends AppError {
  readonly code = "RETRIEVAL_ERROR";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
    this.userMessage = `Invalid retrieval request: ${message}`;
  }
}

export type SourceAccessReason =
  | "outside-root"
  | "not-found"
  | "not-a-file"
  | "unreadable";

/** A requested source path cannot be served from the indexed codebase */
export class SourceAccessError extends AppError {
  readonly code = "SOURCE_ACCESS_ERROR";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage: string;

  constructor(
    message: string,
    public readonly path: string,
    public readonly reason: SourceAccessReason,
    originalError?: Error
  ) {
    super(message, { path, reason }, originalError);
    this.userMessage = `Cannot read "${path}" from the indexed codebase.`;
  }
}

/** Planning capability failure */
export class PlanningError extends AppError {
  readonly code = "PLANNING_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "The research planner failed.";
}

/** Answer generation capability failure */
export class GenerationError extends AppError {
  readonly code = "GENERATION_ERROR";
  readonly category = ErrorCategory.EXTERNAL;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage = "The answer could not be generated.";
}

/** Session exceeded its time budget */
export class SessionTimeoutError extends AppError {
  readonly code = "SESSION_TIMEOUT";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.MEDIUM;
  readonly userMessage =
    "Research took too long. Try a more specific question.";

  constructor(
    public readonly timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(`Session timed out after ${timeoutMs}ms`, context);
  }
}

/** Session was cancelled by the caller */
export class SessionCancelledError extends AppError {
  readonly code = "SESSION_CANCELLED";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage = "Research was cancelled.";
}

export class SessionNotFoundError extends AppError {
  readonly code = "SESSION_NOT_FOUND";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage = "This conversation no longer exists.";

  constructor(public readonly sessionId: string) {
    super(`Session not found: ${sessionId}`, { sessionId });
  }
}

export class SessionBusyError extends AppError {
  readonly code = "SESSION_BUSY";
  readonly category = ErrorCategory.USER;
  readonly severity = ErrorSeverity.LOW;
  readonly userMessage =
    "A question is already being researched in this conversation.";

  constructor(public readonly sessionId: string) {
    super(`Session is already researching a question: ${sessionId}`, {
      sessionId,
    });
  }
}

/** Invalid configuration values */
export class ConfigurationError extends AppError {
  readonly code = "CONFIG_ERROR";
  readonly category = ErrorCategory.SYSTEM;
  readonly severity = ErrorSeverity.HIGH;
  readonly userMessage = "Configuration error. Check environment settings.";

  constructor(
    message: string,
    public readonly field: string,
    context?: Record<string, unknown>
  ) {
    super(message, context);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof LLMError;
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isSessionTimeoutError(
  error: unknown
): error is SessionTimeoutError {
  return error instanceof SessionTimeoutError;
}

export function isSessionCancelledError(
  error: unknown
): error is SessionCancelledError {
  return error instanceof SessionCancelledError;
}

/** True for errors that represent cooperative cancellation of a session */
export function isCancellation(error: unknown): boolean {
  return isSessionTimeoutError(error) || isSessionCancelledError(error);
}

/**
 * Convert an unknown thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export interface SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean };
}

export class DefaultErrorHandler implements SimpleErrorHandler {
  handle(error: unknown): { userMessage: string; shouldRetry: boolean } {
    if (isAppError(error)) {
      return {
        userMessage: error.userMessage,
        shouldRetry:
          error.severity === ErrorSeverity.LOW ||
          error.severity === ErrorSeverity.MEDIUM,
      };
    }

    if (error instanceof Error) {
      return {
        userMessage: "An error occurred. Please try again.",
        shouldRetry: true,
      };
    }

    return {
      userMessage: "Unknown error.",
      shouldRetry: false,
    };
  }
}

export function createDefaultErrorHandler(): SimpleErrorHandler {
  return new DefaultErrorHandler();
}
