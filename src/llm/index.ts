/**
 * Capability providers and call wrappers
 * @module src/llm/index
 */

// =============================================================================
// Re-exports
// =============================================================================

export * from "./types.js";
export {
  BaseFullProvider,
  BaseProviderConfigSchema,
  handleRateLimitResponse,
} from "./base.js";
export type { BaseProviderConfig } from "./base.js";
export { OpenAIProvider } from "./openai.js";
export type { OpenAIProviderOptions } from "./openai.js";
export {
  retryWithBackoff,
  isRetryableError,
  isTransientEmbeddingFailure,
  throwIfAborted,
} from "./retry.js";
export type { RetryOptions, RetryCallback } from "./retry.js";
export { withTimeout, abortable, DEFAULT_TIMEOUTS } from "./timeout.js";
export type { TimeoutOptions } from "./timeout.js";

import type { LLMFullProvider } from "./types.js";
import { OpenAIProvider } from "./openai.js";
import type { ProviderSettings } from "../utils.js";

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create the provider serving both embeddings and completions
 *
 * @param settings - Provider section of the loaded configuration
 * @returns OpenAI-compatible provider
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const provider = createProvider(config.provider);
 * const embedding = await provider.embed("function parseArgs");
 * ```
 */
export function createProvider(settings: ProviderSettings): LLMFullProvider {
  return new OpenAIProvider({
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    embeddingModel: settings.embeddingModel,
    chatModel: settings.chatModel,
    timeoutMs: settings.timeoutMs,
  });
}

/**
 * Check provider availability via API call
 *
 * @example
 * ```typescript
 * const status = await checkProviderAvailability(config.provider);
 * if (!status.available) {
 *   logger.error("Provider unavailable:", status.error);
 * }
 * ```
 */
export async function checkProviderAvailability(
  settings: ProviderSettings
): Promise<{ available: boolean; error?: string }> {
  try {
    return await createProvider(settings).checkAvailability();
  } catch (error) {
    return {
      available: false,
      error: error instanceof Error ? error.message : "Unknown error",
    };
  }
}
