/**
 * LRU cache for query embeddings
 *
 * Identical queries (across sessions and iterations) reuse one embedding.
 * Concurrent misses for the same text share a single in-flight call.
 */
import { createHash } from "crypto";
import type {
  LLMEmbeddingProvider,
  EmbeddingResult,
  RequestOptions,
} from "../llm/types.js";
import { abortable } from "../llm/timeout.js";

/** A provider call shared by every caller waiting on the same text */
interface InFlight {
  readonly promise: Promise<EmbeddingResult>;
  readonly controller: AbortController;
  waiters: number;
}

export class EmbeddingCache {
  private readonly cache = new Map<string, EmbeddingResult>();
  private readonly pending = new Map<string, InFlight>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxSize = 500) {}

  private hash(text: string): string {
    return createHash("sha256").update(text).digest("hex");
  }

  /**
   * Get embedding from cache or compute it (with single-flight deduplication)
   *
   * @remarks
   * An aborted caller stops waiting while other waiters still get the result.
   * The provider call itself is aborted once every waiter has given up.
   * Failures are not cached.
   */
  async getOrEmbed(
    text: string,
    provider: LLMEmbeddingProvider,
    options: RequestOptions = {}
  ): Promise<EmbeddingResult> {
    const key = this.hash(text);

    const cached = this.cache.get(key);
    if (cached) {
      // LRU: move to end
      this.cache.delete(key);
      this.cache.set(key, cached);
      this.hits++;
      return cached;
    }

    let flight = this.pending.get(key);
    if (flight) {
      this.hits++;
    } else {
      this.misses++;
      flight = this.start(key, text, provider);
    }
    return this.join(key, flight, options.signal);
  }

  private start(
    key: string,
    text: string,
    provider: LLMEmbeddingProvider
  ): InFlight {
    const controller = new AbortController();
    const flight: InFlight = {
      promise: this.load(key, text, provider, controller.signal).finally(() => {
        if (this.pending.get(key) === flight) this.pending.delete(key);
      }),
      controller,
      waiters: 0,
    };
    this.pending.set(key, flight);
    return flight;
  }

  private async join(
    key: string,
    flight: InFlight,
    signal: AbortSignal | undefined
  ): Promise<EmbeddingResult> {
    flight.waiters++;
    try {
      return await abortable(flight.promise, signal);
    } finally {
      flight.waiters--;
      if (signal?.aborted && flight.waiters === 0) {
        flight.controller.abort(signal.reason);
        if (this.pending.get(key) === flight) this.pending.delete(key);
      }
    }
  }

  private async load(
    key: string,
    text: string,
    provider: LLMEmbeddingProvider,
    signal: AbortSignal
  ): Promise<EmbeddingResult> {
    const result = await provider.embed(text, { signal });

    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }

    this.cache.set(key, result);
    return result;
  }

  clear(): void {
    this.cache.clear();
    this.pending.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): { size: number; hits: number; misses: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  get size(): number {
    return this.cache.size;
  }
}
