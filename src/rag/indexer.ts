import type { Chunk, IndexDelta, IndexEntry, RAGConfig } from "./types.js";
import { IndexSnapshot, locationKey } from "./snapshot.js";
import { normalizeVector } from "./vector.js";
import type { LLMEmbeddingProvider } from "../llm/types.js";
import {
  retryWithBackoff,
  isTransientEmbeddingFailure,
  throwIfAborted,
} from "../llm/retry.js";
import { abortable } from "../llm/timeout.js";
import { EmbeddingError, toError } from "../errors/index.js";
import { logger } from "../utils.js";

export type IndexerConfig = Pick<
  RAGConfig,
  | "embeddingMaxAttempts"
  | "embeddingBaseDelayMs"
  | "embeddingMaxDelayMs"
  | "embeddingConcurrency"
>;

const DEFAULT_INDEXER_CONFIG: IndexerConfig = {
  embeddingMaxAttempts: 3,
  embeddingBaseDelayMs: 250,
  embeddingMaxDelayMs: 5000,
  embeddingConcurrency: 4,
};

export interface WriteOptions {
  readonly signal?: AbortSignal;
}

type EmbedOutcome =
  | { readonly ok: true; readonly values: readonly number[]; readonly attempts: number }
  | { readonly ok: false; readonly error: Error; readonly attempts: number };

type Classification = "added" | "updated" | "retry";

interface PendingWrite {
  readonly chunk: Chunk;
  readonly classification: Classification;
  readonly previousAttempts: number;
}

/**
 * Single-writer index over chunk embeddings
 *
 * @remarks
 * Writes run one at a time through an internal queue. Each write computes all
 * of its embeddings first, then builds the next {@link IndexSnapshot} from a
 * copy-on-write draft and publishes it with one reference swap. Readers call
 * {@link Indexer.current} and keep the snapshot they got for as long as they
 * need it.
 */
export class Indexer {
  private snapshot = IndexSnapshot.empty();
  private queue: Promise<void> = Promise.resolve();
  private readonly config: IndexerConfig;

  constructor(
    private readonly embedder: LLMEmbeddingProvider,
    config?: Partial<IndexerConfig>
  ) {
    this.config = { ...DEFAULT_INDEXER_CONFIG, ...config };
  }

  /** Latest published snapshot; never blocks */
  current(): IndexSnapshot {
    return this.snapshot;
  }

  /**
   * Insert chunks, skipping ones already present and ready
   * @remarks A chunk at a location held by a different id supersedes it
   */
  upsert(chunks: readonly Chunk[], options: WriteOptions = {}): Promise<IndexDelta> {
    return this.enqueue(() => this.write(chunks, [], options));
  }

  /**
   * Make `chunks` the complete content of `path`: upsert them and drop every
   * other chunk of that path in the same snapshot
   */
  replaceFile(
    path: string,
    chunks: readonly Chunk[],
    options: WriteOptions = {}
  ): Promise<IndexDelta> {
    return this.enqueue(() => this.write(chunks, [path], options));
  }

  /**
   * Drop every chunk of the given paths
   */
  remove(paths: readonly string[]): Promise<IndexDelta> {
    return this.enqueue(async () => {
      const draft = this.snapshot.edit();
      const removed: string[] = [];

      for (const path of paths) {
        for (const id of this.snapshot.idsForPath(path)) {
          if (draft.delete(id)) removed.push(id);
        }
      }

      this.snapshot = draft.commit();
      if (removed.length > 0) {
        logger.debug(
          `[Indexer] Removed ${removed.length} chunks (generation ${this.snapshot.generation})`
        );
      }
      return emptyDelta({ removed, generation: this.snapshot.generation });
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The queue only orders writes; each caller observes its own failure
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async write(
    chunks: readonly Chunk[],
    replacePaths: readonly string[],
    options: WriteOptions
  ): Promise<IndexDelta> {
    const { signal } = options;
    throwIfAborted(signal);

    const base = this.snapshot;
    const unchanged: string[] = [];
    const pending: PendingWrite[] = [];
    const incoming = dedupeChunks(chunks);

    for (const chunk of incoming) {
      const existing = base.get(chunk.id);
      if (existing?.status === "ready") {
        unchanged.push(chunk.id);
        continue;
      }
      if (existing) {
        pending.push({
          chunk,
          classification: "retry",
          previousAttempts: existing.attempts,
        });
        continue;
      }

      const occupant = base.idAt(chunk.path, chunk.startLine, chunk.endLine);
      pending.push({
        chunk,
        classification: occupant === undefined ? "added" : "updated",
        previousAttempts: 0,
      });
    }

    // Every embedding of the write is settled before anything is published
    const outcomes = await this.embedAll(
      pending.map((item) => item.chunk),
      signal
    );
    throwIfAborted(signal);

    const draft = base.edit();
    const added: string[] = [];
    const updated: string[] = [];
    const removed: string[] = [];
    const embeddingFailed: string[] = [];

    for (const [index, item] of pending.entries()) {
      const outcome = outcomes[index];
      if (!outcome) continue;

      const entry = this.toEntry(item, outcome, draft.embeddingDimension);
      // Supersedes any entry at the same location
      draft.put(entry);

      if (entry.status === "embedding_failed") {
        embeddingFailed.push(item.chunk.id);
      }

      if (item.classification === "added") {
        added.push(item.chunk.id);
      } else if (item.classification === "updated") {
        updated.push(item.chunk.id);
      } else if (entry.status === "ready") {
        // A previously failed chunk now has its embedding
        updated.push(item.chunk.id);
      }
    }

    if (replacePaths.length > 0) {
      const keep = new Set(incoming.map((chunk) => chunk.id));
      for (const path of replacePaths) {
        for (const id of base.idsForPath(path)) {
          if (!keep.has(id) && draft.delete(id)) removed.push(id);
        }
      }
    }

    this.snapshot = draft.commit();

    if (added.length + updated.length + removed.length > 0) {
      logger.debug(
        `[Indexer] generation ${this.snapshot.generation}: +${added.length} ~${updated.length} -${removed.length}`
      );
    }

    return {
      added,
      updated,
      unchanged,
      removed,
      embeddingFailed,
      generation: this.snapshot.generation,
    };
  }

  private toEntry(
    item: PendingWrite,
    outcome: EmbedOutcome,
    dimension: number | null
  ): IndexEntry {
    const attempts = item.previousAttempts + outcome.attempts;
    const failed = (error: Error): IndexEntry => {
      logger.warn(
        `[Indexer] Embedding failed for ${item.chunk.path}:${item.chunk.startLine}-${item.chunk.endLine}: ${error.message}`
      );
      return {
        chunk: item.chunk,
        embedding: null,
        status: "embedding_failed",
        attempts,
      };
    };

    if (!outcome.ok) return failed(outcome.error);

    if (dimension !== null && outcome.values.length !== dimension) {
      return failed(
        new EmbeddingError(
          `Embedding dimension mismatch: expected ${dimension}, got ${outcome.values.length}`,
          false,
          { chunkId: item.chunk.id }
        )
      );
    }

    const embedding = normalizeVector(outcome.values);
    if (!embedding) {
      return failed(
        new EmbeddingError("Embedding is a zero vector", false, {
          chunkId: item.chunk.id,
        })
      );
    }

    return { chunk: item.chunk, embedding, status: "ready", attempts };
  }

  /**
   * Embed texts on a bounded pool of `embeddingConcurrency` concurrent calls
   * @throws The cancellation reason when the signal aborts
   */
  private async embedAll(
    chunks: readonly Chunk[],
    signal: AbortSignal | undefined
  ): Promise<readonly EmbedOutcome[]> {
    const outcomes: EmbedOutcome[] = [];
    const batchSize = this.config.embeddingConcurrency;
    const totalBatches = Math.ceil(chunks.length / batchSize);

    for (let i = 0; i < chunks.length; i += batchSize) {
      throwIfAborted(signal);
      const batch = chunks.slice(i, i + batchSize);
      if (totalBatches > 1) {
        logger.debug(
          `[Indexer] Embedding batch ${Math.floor(i / batchSize) + 1}/${totalBatches}`
        );
      }
      outcomes.push(
        ...(await Promise.all(batch.map((chunk) => this.embedOne(chunk, signal))))
      );
    }

    return outcomes;
  }

  private async embedOne(
    chunk: Chunk,
    signal: AbortSignal | undefined
  ): Promise<EmbedOutcome> {
    const { embeddingMaxAttempts, embeddingBaseDelayMs, embeddingMaxDelayMs } =
      this.config;
    let attempts = 0;

    try {
      const result = await retryWithBackoff(
        () => {
          attempts++;
          return abortable(
            this.embedder.embed(chunk.text, signal ? { signal } : {}),
            signal
          );
        },
        {
          maxRetries: embeddingMaxAttempts - 1,
          baseDelayMs: embeddingBaseDelayMs,
          maxDelayMs: embeddingMaxDelayMs,
          shouldRetry: isTransientEmbeddingFailure,
          ...(signal ? { signal } : {}),
          onRetry: (attempt, error, delayMs) => {
            logger.debug(
              `[Indexer] Retrying embedding of ${chunk.path}:${chunk.startLine} (attempt ${attempt + 1}/${embeddingMaxAttempts}) in ${delayMs}ms: ${error.message}`
            );
          },
        }
      );
      return { ok: true, values: result.values, attempts };
    } catch (error) {
      // Cancellation aborts the whole write; only capability failures degrade
      throwIfAborted(signal);
      return { ok: false, error: toError(error), attempts };
    }
  }
}

/**
 * Keep one chunk per id and per location; later chunks win
 */
function dedupeChunks(chunks: readonly Chunk[]): readonly Chunk[] {
  const byLocation = new Map<string, Chunk>();
  for (const chunk of chunks) {
    byLocation.set(locationKey(chunk.path, chunk.startLine, chunk.endLine), chunk);
  }

  const seen = new Set<string>();
  const result: Chunk[] = [];
  for (const chunk of byLocation.values()) {
    if (seen.has(chunk.id)) continue;
    seen.add(chunk.id);
    result.push(chunk);
  }
  return result;
}

function emptyDelta(partial: Partial<IndexDelta> & { generation: number }): IndexDelta {
  return {
    added: [],
    updated: [],
    unchanged: [],
    removed: [],
    embeddingFailed: [],
    ...partial,
  };
}
