import { describe, it, expect } from "vitest";
import {
  AppError,
  ConfigurationError,
  EmbeddingError,
  ErrorCategory,
  ErrorSeverity,
  GenerationError,
  IngestError,
  LLMError,
  LLMErrorSubType,
  PlanningError,
  RetrievalError,
  SessionBusyError,
  SessionCancelledError,
  SessionNotFoundError,
  SessionTimeoutError,
  SourceAccessError,
  DefaultErrorHandler,
  createDefaultErrorHandler,
  isAppError,
  isCancellation,
  isEmbeddingError,
  isLLMError,
  isRetrievalError,
  isSessionCancelledError,
  isSessionTimeoutError,
  toError,
} from "../errors/index.js";

// =============================================================================
// LLMError Tests
// =============================================================================

describe("LLMError", () => {
  it("creates TIMEOUT error with correct properties", () => {
    const error = new LLMError(
      "Completion timed out after 500ms",
      LLMErrorSubType.TIMEOUT,
      "openai"
    );

    expect(error.message).toBe("Completion timed out after 500ms");
    expect(error.code).toBe("LLM_ERROR");
    expect(error.category).toBe(ErrorCategory.EXTERNAL);
    expect(error.severity).toBe(ErrorSeverity.MEDIUM);
    expect(error.subType).toBe(LLMErrorSubType.TIMEOUT);
    expect(error.provider).toBe("openai");
    expect(error.userMessage).toBe("The model provider took too long to respond.");
    expect(error.name).toBe("LLMError");
  });

  it.each([
    [LLMErrorSubType.RATE_LIMIT, ErrorSeverity.MEDIUM, "rate limiting"],
    [LLMErrorSubType.API_ERROR, ErrorSeverity.HIGH, "returned an error"],
    [LLMErrorSubType.INVALID_RESPONSE, ErrorSeverity.MEDIUM, "unexpected response"],
  ])("maps %s to severity %s", (subType, severity, message) => {
    const error = new LLMError("failure", subType, "openai");

    expect(error.severity).toBe(severity);
    expect(error.userMessage).toContain(message);
  });

  it("keeps context and the original error", () => {
    const cause = new Error("socket hang up");
    const error = new LLMError(
      "request failed",
      LLMErrorSubType.API_ERROR,
      "openai",
      { model: "chat-mini" },
      cause
    );

    expect(error.context).toEqual({ model: "chat-mini" });
    expect(error.originalError).toBe(cause);
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });
});

// =============================================================================
// Indexing and retrieval errors
// =============================================================================

describe("IngestError", () => {
  it("carries the path and skip reason", () => {
    const error = new IngestError("Cannot read", "src/a.ts", "unreadable");

    expect(error.code).toBe("INGEST_ERROR");
    expect(error.category).toBe(ErrorCategory.SYSTEM);
    expect(error.severity).toBe(ErrorSeverity.LOW);
    expect(error.path).toBe("src/a.ts");
    expect(error.reason).toBe("unreadable");
  });
});

describe("EmbeddingError", () => {
  it("records whether the failure is retryable", () => {
    expect(new EmbeddingError("busy", true).retryable).toBe(true);
    expect(new EmbeddingError("too long", false).retryable).toBe(false);
    expect(new EmbeddingError("busy", true).category).toBe(ErrorCategory.EXTERNAL);
  });
});

describe("RetrievalError", () => {
  it("names the offending field in the user message", () => {
    const error = new RetrievalError("k must be an integer >= 1, got 0", "k");

    expect(error.code).toBe("RETRIEVAL_ERROR");
    expect(error.category).toBe(ErrorCategory.USER);
    expect(error.field).toBe("k");
    expect(error.userMessage).toBe(
      "Invalid retrieval request: k must be an integer >= 1, got 0"
    );
  });
});

describe("SourceAccessError", () => {
  it("carries the path and reason into its context", () => {
    const error = new SourceAccessError("Not a regular file: src", "src", "not-a-file");

    expect(error.code).toBe("SOURCE_ACCESS_ERROR");
    expect(error.category).toBe(ErrorCategory.USER);
    expect(error.severity).toBe(ErrorSeverity.LOW);
    expect(error.context).toEqual({ path: "src", reason: "not-a-file" });
    expect(error.userMessage).toBe('Cannot read "src" from the indexed codebase.');
  });
});

describe("PlanningError and GenerationError", () => {
  it("are external failures of medium severity", () => {
    const planning = new PlanningError("Planning failed: boom", { planner: "llm" });
    const generation = new GenerationError("empty completion");

    expect(planning.code).toBe("PLANNING_ERROR");
    expect(planning.context).toEqual({ planner: "llm" });
    expect(generation.code).toBe("GENERATION_ERROR");
    for (const error of [planning, generation]) {
      expect(error.category).toBe(ErrorCategory.EXTERNAL);
      expect(error.severity).toBe(ErrorSeverity.MEDIUM);
    }
  });
});

// =============================================================================
// Session errors
// =============================================================================

describe("session errors", () => {
  it("formats the timeout into the message", () => {
    const error = new SessionTimeoutError(1500, { sessionId: "s1" });

    expect(error.message).toBe("Session timed out after 1500ms");
    expect(error.timeoutMs).toBe(1500);
    expect(error.code).toBe("SESSION_TIMEOUT");
    expect(error.userMessage).toBe("Research took too long. Try a more specific question.");
  });

  it("creates a cancellation error", () => {
    const error = new SessionCancelledError("Research cancelled by caller");

    expect(error.code).toBe("SESSION_CANCELLED");
    expect(error.userMessage).toBe("Research was cancelled.");
  });

  it("names the session in not-found and busy errors", () => {
    const missing = new SessionNotFoundError("abc");
    const busy = new SessionBusyError("abc");

    expect(missing.message).toBe("Session not found: abc");
    expect(missing.sessionId).toBe("abc");
    expect(busy.message).toBe("Session is already researching a question: abc");
    expect(busy.context).toEqual({ sessionId: "abc" });
  });
});

describe("ConfigurationError", () => {
  it("is a high severity system error", () => {
    const error = new ConfigurationError("OPENAI_API_KEY is required", "OPENAI_API_KEY");

    expect(error.code).toBe("CONFIG_ERROR");
    expect(error.category).toBe(ErrorCategory.SYSTEM);
    expect(error.severity).toBe(ErrorSeverity.HIGH);
    expect(error.field).toBe("OPENAI_API_KEY");
  });
});

// =============================================================================
// Type guards
// =============================================================================

describe("type guards", () => {
  const llm = new LLMError("x", LLMErrorSubType.API_ERROR, "openai");
  const embedding = new EmbeddingError("x", true);
  const retrieval = new RetrievalError("x", "query");
  const timeout = new SessionTimeoutError(10);
  const cancelled = new SessionCancelledError("x");

  it("isAppError accepts only AppError instances", () => {
    expect(isAppError(llm)).toBe(true);
    expect(isAppError(new Error("plain"))).toBe(false);
    expect(isAppError("string")).toBe(false);
    expect(isAppError(null)).toBe(false);
  });

  it("narrow to their own class", () => {
    expect(isLLMError(llm)).toBe(true);
    expect(isLLMError(embedding)).toBe(false);
    expect(isEmbeddingError(embedding)).toBe(true);
    expect(isRetrievalError(retrieval)).toBe(true);
    expect(isRetrievalError(llm)).toBe(false);
    expect(isSessionTimeoutError(timeout)).toBe(true);
    expect(isSessionCancelledError(cancelled)).toBe(true);
  });

  it("isCancellation covers timeouts and caller cancellation", () => {
    expect(isCancellation(timeout)).toBe(true);
    expect(isCancellation(cancelled)).toBe(true);
    expect(isCancellation(llm)).toBe(false);
    expect(isCancellation(new Error("aborted"))).toBe(false);
  });
});

describe("toError", () => {
  it("returns Error instances unchanged", () => {
    const error = new Error("boom");
    expect(toError(error)).toBe(error);
  });

  it("wraps other values", () => {
    expect(toError("boom").message).toBe("boom");
    expect(toError(42).message).toBe("42");
  });
});

// =============================================================================
// DefaultErrorHandler
// =============================================================================

describe("DefaultErrorHandler", () => {
  const handler = new DefaultErrorHandler();

  it("uses the user message of app errors and retries low severity", () => {
    expect(handler.handle(new SessionCancelledError("stop"))).toEqual({
      userMessage: "Research was cancelled.",
      shouldRetry: true,
    });
  });

  it("does not retry high severity errors", () => {
    expect(handler.handle(new ConfigurationError("bad", "X"))).toEqual({
      userMessage: "Configuration error. Check environment settings.",
      shouldRetry: false,
    });
  });

  it("handles plain errors generically", () => {
    expect(handler.handle(new Error("boom"))).toEqual({
      userMessage: "An error occurred. Please try again.",
      shouldRetry: true,
    });
  });

  it("handles non-error values", () => {
    expect(handler.handle("boom")).toEqual({
      userMessage: "Unknown error.",
      shouldRetry: false,
    });
  });

  it("is created by the factory", () => {
    expect(createDefaultErrorHandler()).toBeInstanceOf(DefaultErrorHandler);
  });
});
