import { z } from "zod";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import type {
  LLMCompletionProvider,
  LLMEmbeddingProvider,
  EmbeddingResult,
  CompletionResult,
  ModelConfig,
  RequestOptions,
} from "./types.js";

// =============================================================================
// Response Utilities
// =============================================================================

/**
 * Handle rate limit (429) response and extract retry-after header
 * @param response - Fetch Response object
 * @param providerName - Name of the LLM provider for error context
 * @throws LLMError with RATE_LIMIT subtype if response status is 429
 */
export function handleRateLimitResponse(
  response: Response,
  providerName: string
): void {
  if (response.status === 429) {
    const retryAfterHeader = response.headers.get("retry-after");
    let retryAfterSeconds: number | null = null;

    if (retryAfterHeader) {
      const parsed = parseInt(retryAfterHeader, 10);
      if (!isNaN(parsed)) {
        retryAfterSeconds = parsed;
      }
    }

    throw new LLMError(
      `429 Rate limit exceeded. Retry after ${retryAfterSeconds ?? "unknown"} seconds`,
      LLMErrorSubType.RATE_LIMIT,
      providerName,
      { retryAfterSeconds }
    );
  }
}

// =============================================================================
// Base Provider Configuration
// =============================================================================

/**
 * Schema for base provider configuration
 * @remarks Validates API key format and timeout constraints
 */
export const BaseProviderConfigSchema = z.object({
  /** API key for authentication */
  apiKey: z.string().min(1),
  /** Base URL for API requests */
  baseUrl: z.string().url(),
  /** Request timeout in milliseconds (1s - 5min) */
  timeout: z.number().min(1000).max(300000).default(30000),
});
export type BaseProviderConfig = z.infer<typeof BaseProviderConfigSchema>;

// =============================================================================
// Abstract Base Provider
// =============================================================================

/**
 * Abstract base class for HTTP providers offering completions and embeddings
 */
export abstract class BaseFullProvider
  implements LLMCompletionProvider, LLMEmbeddingProvider
{
  abstract readonly name: string;

  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly timeout: number;

  constructor(config: BaseProviderConfig) {
    const parsed = BaseProviderConfigSchema.parse(config);
    this.apiKey = parsed.apiKey;
    this.baseUrl = parsed.baseUrl.replace(/\/+$/, "");
    this.timeout = parsed.timeout;
  }

  /**
   * Fetch with timeout and caller cancellation
   * @param url - Request URL
   * @param init - Fetch options
   * @param signal - Caller cancellation, combined with the request timeout
   * @returns Response object
   * @throws Error on timeout, cancellation or network failure
   */
  protected async fetchWithTimeout(
    url: string,
    init: RequestInit,
    signal?: AbortSignal
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      return await fetch(url, {
        ...init,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  /**
   * Build authorization headers for API requests
   */
  protected buildAuthHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.apiKey}`,
      "Content-Type": "application/json",
    };
  }

  abstract embed(
    text: string,
    options?: RequestOptions
  ): Promise<EmbeddingResult>;
  abstract complete(
    prompt: string,
    config?: Partial<ModelConfig>,
    options?: RequestOptions
  ): Promise<CompletionResult>;
  abstract checkAvailability(): Promise<{ available: boolean; error?: string }>;
}
