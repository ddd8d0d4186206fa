import { z } from "zod";

// =============================================================================
// Model Configuration
// =============================================================================

export const ModelConfigSchema = z.object({
  model: z.string().min(1),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().positive().default(4096),
});
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

/** Per-call options shared by all capabilities */
export interface RequestOptions {
  /** Aborted when the owning session times out or is cancelled */
  readonly signal?: AbortSignal;
}

// =============================================================================
// Result Types
// =============================================================================

/** Result of embedding operation */
export interface EmbeddingResult {
  readonly values: readonly number[];
  readonly tokenCount: number;
  readonly model: string;
}

/**
 * Reason why completion finished
 * @remarks Extended to cover all common API responses
 */
export const FinishReasonSchema = z.enum([
  "stop",
  "length",
  "content_filter",
  "tool_use",
  "error",
  "unknown",
]);
export type FinishReason = z.infer<typeof FinishReasonSchema>;

/** Result of completion operation */
export interface CompletionResult {
  readonly text: string;
  readonly tokenCount: number;
  readonly model: string;
  readonly finishReason: FinishReason;
}

// =============================================================================
// Capability Interfaces
// =============================================================================

/**
 * Answer generation capability
 */
export interface LLMCompletionProvider {
  /** Provider label used in logs and errors */
  readonly name: string;

  /**
   * Generate text completion
   * @param prompt - Input prompt
   * @param config - Optional model configuration overrides
   * @param options - Cancellation
   */
  complete(
    prompt: string,
    config?: Partial<ModelConfig>,
    options?: RequestOptions
  ): Promise<CompletionResult>;

  /**
   * Check if provider is available and properly configured
   */
  checkAvailability(): Promise<{ available: boolean; error?: string }>;
}

/**
 * Embedding capability
 * @remarks Must be deterministic enough that equal texts map to close vectors
 */
export interface LLMEmbeddingProvider {
  /**
   * Generate embedding for a single text
   * @param text - Input text to embed
   * @param options - Cancellation
   */
  embed(text: string, options?: RequestOptions): Promise<EmbeddingResult>;
}

/**
 * Full provider with both completion and embedding capabilities
 */
export type LLMFullProvider = LLMCompletionProvider & LLMEmbeddingProvider;
