/**
 * Timeout and cancellation wrappers for capability calls
 * @module src/llm/timeout
 */

import { LLMError, LLMErrorSubType } from "../errors/index.js";

/**
 * Options for timeout wrapper
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;
  /** Context description for error message */
  readonly context?: string;
  /** Provider name for LLMError */
  readonly provider?: string;
}

/**
 * Wraps a promise with a timeout
 *
 * @typeParam T - Type of the promise result
 * @param promise - Promise to wrap with timeout
 * @param options - Timeout configuration options
 * @returns Promise that rejects with LLMError on timeout
 * @throws LLMError with TIMEOUT subtype if operation times out
 *
 * @example
 * ```typescript
 * const result = await withTimeout(
 *   planner.plan(input),
 *   { timeoutMs: 5000, context: "Planning", provider: "openai" }
 * );
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, context = "Operation", provider = "unknown" } = options;

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(
      `Invalid timeout value: ${timeoutMs}. Must be a positive finite number.`
    );
  }

  let timeoutId: NodeJS.Timeout | undefined;

  // Promise<never> only ever rejects, so Promise.race keeps the type of `promise`
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(
        new LLMError(
          `${context} timed out after ${timeoutMs}ms`,
          LLMErrorSubType.TIMEOUT,
          provider
        )
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Settle as soon as either the promise settles or the signal aborts
 *
 * @remarks
 * The abandoned promise keeps running but its outcome is ignored, so a
 * capability that ignores its signal cannot block the caller. The signal's
 * reason is the rejection value.
 */
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined
): Promise<T> {
  if (!signal) return promise;

  const reasonOf = (): Error => {
    const reason: unknown = signal.reason;
    return reason instanceof Error ? reason : new Error("Operation aborted");
  };

  if (signal.aborted) {
    // Detach the abandoned promise so its rejection is not reported as unhandled
    promise.catch(() => undefined);
    return Promise.reject(reasonOf());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      promise.catch(() => undefined);
      reject(reasonOf());
    };
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Default timeout values for different capability operations (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Timeout for embedding generation */
  embedding: 30000,
  /** Timeout for completion generation */
  completion: 60000,
  /** Timeout for query planning */
  planning: 30000,
} as const;
