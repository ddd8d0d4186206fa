import { z } from "zod";
import { BaseFullProvider, handleRateLimitResponse } from "./base.js";
import { LLMError, LLMErrorSubType } from "../errors/index.js";
import type {
  EmbeddingResult,
  CompletionResult,
  ModelConfig,
  FinishReason,
  RequestOptions,
} from "./types.js";

// =============================================================================
// OpenAI API Response Schemas (Zod validation)
// =============================================================================

/** OpenAI embedding API response schema */
const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number(),
    })
  ),
  usage: z.object({
    total_tokens: z.number(),
  }),
  model: z.string(),
});

/** OpenAI chat completion API response schema */
const OpenAIChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
      finish_reason: z.string(),
    })
  ),
  usage: z.object({
    total_tokens: z.number(),
  }),
  model: z.string(),
});

/** OpenAI API error response schema */
const OpenAIErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string(),
    code: z.string().nullable(),
  }),
});

export interface OpenAIProviderOptions {
  readonly apiKey: string;
  /** Any OpenAI-compatible endpoint (default: https://api.openai.com/v1) */
  readonly baseUrl?: string;
  readonly embeddingModel?: string;
  readonly chatModel?: string;
  readonly timeoutMs?: number;
}

// =============================================================================
// OpenAI Provider Implementation
// =============================================================================

/**
 * OpenAI-compatible provider for embeddings and chat completions
 */
export class OpenAIProvider extends BaseFullProvider {
  readonly name = "openai" as const;

  private readonly embeddingModel: string;
  private readonly chatModel: string;

  constructor(options: OpenAIProviderOptions) {
    super({
      apiKey: options.apiKey,
      baseUrl: options.baseUrl ?? "https://api.openai.com/v1",
      timeout: options.timeoutMs ?? 60000,
    });
    this.embeddingModel = options.embeddingModel ?? "text-embedding-3-small";
    this.chatModel = options.chatModel ?? "gpt-4.1-mini";
  }

  /**
   * Generate embedding for a single text
   * @throws Error if embedding generation fails
   */
  async embed(text: string, options?: RequestOptions): Promise<EmbeddingResult> {
    const results = await this.embedBatch([text], options);
    const result = results[0];

    if (!result) {
      throw new LLMError(
        "OpenAI returned empty embedding result",
        LLMErrorSubType.INVALID_RESPONSE,
        this.name
      );
    }

    return result;
  }

  /**
   * Generate embeddings for multiple texts in a single API call
   * @throws Error on API failure
   */
  async embedBatch(
    texts: readonly string[],
    options?: RequestOptions
  ): Promise<readonly EmbeddingResult[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/embeddings`,
      {
        method: "POST",
        headers: this.buildAuthHeaders(),
        body: JSON.stringify({
          model: this.embeddingModel,
          input: texts,
        }),
      },
      options?.signal
    );

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      throw await this.toApiError(response, "Embedding");
    }

    const data = OpenAIEmbeddingResponseSchema.parse(await response.json());

    // Sort by index to maintain input order
    const sortedData = [...data.data].sort((a, b) => a.index - b.index);

    const tokensPerEmbedding = Math.ceil(
      data.usage.total_tokens / texts.length
    );

    return sortedData.map((item) => ({
      values: item.embedding,
      tokenCount: tokensPerEmbedding,
      model: data.model,
    }));
  }

  /**
   * Generate chat completion
   * @returns Completion result with text, token count, model, and finish reason
   */
  async complete(
    prompt: string,
    config?: Partial<ModelConfig>,
    options?: RequestOptions
  ): Promise<CompletionResult> {
    const temperature = config?.temperature ?? 0.7;
    const maxTokens = config?.maxTokens ?? 4096;
    const model = config?.model ?? this.chatModel;

    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/chat/completions`,
      {
        method: "POST",
        headers: this.buildAuthHeaders(),
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: prompt }],
          temperature,
          max_tokens: maxTokens,
        }),
      },
      options?.signal
    );

    handleRateLimitResponse(response, this.name);

    if (!response.ok) {
      throw await this.toApiError(response, "Chat");
    }

    const data = OpenAIChatResponseSchema.parse(await response.json());
    const choice = data.choices[0];

    if (!choice) {
      throw new LLMError(
        "OpenAI returned empty choices array",
        LLMErrorSubType.INVALID_RESPONSE,
        this.name
      );
    }

    return {
      text: choice.message.content ?? "",
      tokenCount: data.usage.total_tokens,
      model: data.model,
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  /**
   * Check if the API is reachable with the configured key
   */
  async checkAvailability(): Promise<{ available: boolean; error?: string }> {
    try {
      // Use models endpoint as a lightweight availability check
      const response = await this.fetchWithTimeout(`${this.baseUrl}/models`, {
        method: "GET",
        headers: this.buildAuthHeaders(),
      });

      handleRateLimitResponse(response, this.name);

      if (!response.ok) {
        const error = await this.toApiError(response, "Models");
        return { available: false, error: error.message };
      }

      return { available: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      return { available: false, error: message };
    }
  }

  /**
   * Build an LLMError from a non-OK response, preferring the API's own message
   * @remarks The HTTP status stays in the message so retry classification sees it
   */
  private async toApiError(
    response: Response,
    endpoint: string
  ): Promise<LLMError> {
    const errorText = await response.text();
    const prefix = `OpenAI ${endpoint} API error (${response.status})`;

    let parsedJson: unknown = null;
    try {
      parsedJson = JSON.parse(errorText);
    } catch {
      parsedJson = null;
    }

    const parsed = OpenAIErrorResponseSchema.safeParse(parsedJson);
    const message = parsed.success
      ? `${prefix}: ${parsed.data.error.message} (${parsed.data.error.type})`
      : `${prefix}: ${response.statusText}`;

    return new LLMError(message, LLMErrorSubType.API_ERROR, this.name, {
      status: response.status,
    });
  }

  /**
   * Map OpenAI finish_reason to our FinishReason type
   */
  private mapFinishReason(reason: string): FinishReason {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      case "tool_calls":
      case "function_call":
        return "tool_use";
      default:
        return "unknown";
    }
  }
}
