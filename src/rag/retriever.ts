import type { ZodError } from "zod";
import type {
  IndexEntry,
  RAGConfig,
  RetrievalFilters,
  RetrievalMode,
  SearchResult,
} from "./types.js";
import { RetrievalFiltersSchema, RetrievalModeSchema } from "./types.js";
import type { IndexSnapshot } from "./snapshot.js";
import { EmbeddingCache } from "./embedding-cache.js";
import { lexicalOverlap, tokenSet } from "./lexical.js";
import { dotProduct, normalizeVector } from "./vector.js";
import type { LLMEmbeddingProvider } from "../llm/types.js";
import {
  retryWithBackoff,
  isTransientEmbeddingFailure,
  throwIfAborted,
} from "../llm/retry.js";
import { RetrievalError } from "../errors/index.js";
import { logger } from "../utils.js";

export type RetrieverConfig = Pick<
  RAGConfig,
  | "vectorWeight"
  | "oversampling"
  | "queryCacheSize"
  | "embeddingMaxAttempts"
  | "embeddingBaseDelayMs"
  | "embeddingMaxDelayMs"
>;

const DEFAULT_RETRIEVER_CONFIG: RetrieverConfig = {
  vectorWeight: 0.7,
  oversampling: 4,
  queryCacheSize: 500,
  embeddingMaxAttempts: 3,
  embeddingBaseDelayMs: 250,
  embeddingMaxDelayMs: 5000,
};

/** Substring matches against the vocabulary need at least this many chars */
const MIN_SUBSTRING_TOKEN_LENGTH = 3;

export interface RetrieveOptions {
  readonly filters?: RetrievalFilters;
  readonly mode?: RetrievalMode;
  readonly signal?: AbortSignal;
}

/** Anything that hands out the current snapshot (usually the Indexer) */
export interface SnapshotSource {
  current(): IndexSnapshot;
}

interface Candidate {
  readonly entry: IndexEntry;
  readonly vectorScore: number;
  readonly lexicalScore: number;
  readonly score: number;
}

/**
 * Deterministic ordering: score, then shorter chunk (lines, characters), then
 * path, then start line
 */
export function compareResults(
  a: Pick<SearchResult, "chunk" | "score">,
  b: Pick<SearchResult, "chunk" | "score">
): number {
  if (a.score !== b.score) return b.score - a.score;

  const linesA = a.chunk.endLine - a.chunk.startLine;
  const linesB = b.chunk.endLine - b.chunk.startLine;
  if (linesA !== linesB) return linesA - linesB;

  if (a.chunk.text.length !== b.chunk.text.length) {
    return a.chunk.text.length - b.chunk.text.length;
  }

  if (a.chunk.path !== b.chunk.path) return a.chunk.path < b.chunk.path ? -1 : 1;
  if (a.chunk.startLine !== b.chunk.startLine) {
    return a.chunk.startLine - b.chunk.startLine;
  }
  return a.chunk.id < b.chunk.id ? -1 : a.chunk.id > b.chunk.id ? 1 : 0;
}

function describeZodError(error: ZodError): string {
  const issue = error.issues[0];
  if (!issue) return error.message;
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

function asList<T>(value: T | T[] | undefined): readonly T[] | null {
  if (value === undefined) return null;
  return Array.isArray(value) ? value : [value];
}

/**
 * Build the pre-ranking filter predicate
 */
function buildFilter(filters: RetrievalFilters): (entry: IndexEntry) => boolean {
  const languages = asList(filters.language)?.map((lang) => lang.toLowerCase());
  const kinds = asList(filters.kind);
  const symbol = filters.symbol?.toLowerCase();
  const { pathPrefix } = filters;

  return ({ chunk }) => {
    if (pathPrefix !== undefined && !chunk.path.startsWith(pathPrefix)) {
      return false;
    }
    if (languages && !languages.includes(chunk.language.toLowerCase())) {
      return false;
    }
    if (kinds && !kinds.includes(chunk.kind)) return false;
    if (symbol !== undefined) {
      if (!chunk.symbol?.toLowerCase().includes(symbol)) return false;
    }
    return true;
  };
}

/**
 * Hybrid chunk search over a pinned index snapshot
 *
 * @remarks
 * Scores blend cosine similarity and lexical overlap:
 * `score = α·vector + (1-α)·lexical`. The top `oversampling·k` vector
 * candidates and the top `oversampling·k` lexical candidates are re-ranked
 * together. When the query cannot be embedded the call falls back to lexical
 * ranking.
 */
export class Retriever {
  private readonly config: RetrieverConfig;
  private readonly queryCache: EmbeddingCache;

  constructor(
    private readonly source: SnapshotSource,
    private readonly embedder: LLMEmbeddingProvider,
    config?: Partial<RetrieverConfig>
  ) {
    this.config = { ...DEFAULT_RETRIEVER_CONFIG, ...config };
    this.queryCache = new EmbeddingCache(this.config.queryCacheSize);
  }

  /**
   * Retrieve the k best chunks for a query
   *
   * @param query - Natural-language or identifier query
   * @param k - Number of results (integer ≥ 1)
   * @param options - Filters, ranking mode and cancellation signal
   * @returns Up to k results; fewer only when fewer chunks pass the filters
   * @throws RetrievalError for a bad k, a blank query or malformed filters
   */
  async retrieve(
    query: string,
    k: number,
    options: RetrieveOptions = {}
  ): Promise<readonly SearchResult[]> {
    if (!Number.isInteger(k) || k < 1) {
      throw new RetrievalError(`k must be an integer >= 1, got ${k}`, "k", { k });
    }
    if (query.trim().length === 0) {
      throw new RetrievalError("query must not be blank", "query");
    }

    const filtersResult = RetrievalFiltersSchema.safeParse(options.filters ?? {});
    if (!filtersResult.success) {
      throw new RetrievalError(
        `invalid filters (${describeZodError(filtersResult.error)})`,
        "filters",
        { filters: options.filters }
      );
    }

    const modeResult = RetrievalModeSchema.safeParse(options.mode ?? "hybrid");
    if (!modeResult.success) {
      throw new RetrievalError(`unknown mode: ${String(options.mode)}`, "mode");
    }

    const { signal } = options;
    throwIfAborted(signal);

    // Pin the snapshot for the whole call
    const snapshot = this.source.current();
    const matches = buildFilter(filtersResult.data);
    const filtered: IndexEntry[] = [];
    for (const entry of snapshot.entries()) {
      if (matches(entry)) filtered.push(entry);
    }
    if (filtered.length === 0) return [];

    let mode = modeResult.data;
    let queryVector: readonly number[] | null = null;

    if (mode !== "lexical" && filtered.some((entry) => entry.embedding)) {
      queryVector = await this.embedQuery(query, snapshot, signal);
      if (!queryVector) {
        logger.warn(`[Retriever] Falling back to lexical ranking for "${query}"`);
        mode = "lexical";
      }
    }

    const queryTokens = tokenSet(query);
    const lexicalHits = this.lexicalHits(snapshot, queryTokens);
    const alpha = this.config.vectorWeight;

    const candidates: Candidate[] = [];
    for (const entry of filtered) {
      if (mode === "vector" && !entry.embedding) continue;

      const vectorScore =
        queryVector && entry.embedding ? dotProduct(queryVector, entry.embedding) : 0;
      const lexicalScore = lexicalHits.has(entry.chunk.id)
        ? lexicalOverlap(queryTokens, snapshot.tokensOf(entry.chunk.id))
        : 0;

      const score =
        mode === "vector"
          ? vectorScore
          : mode === "lexical"
            ? lexicalScore
            : alpha * vectorScore + (1 - alpha) * lexicalScore;

      candidates.push({ entry, vectorScore, lexicalScore, score });
    }

    const ranked =
      mode === "hybrid" ? this.hybridRank(candidates, k) : sortCandidates(candidates);

    return ranked.slice(0, k).map((candidate) => ({
      chunk: candidate.entry.chunk,
      score: candidate.score,
      vectorScore: candidate.vectorScore,
      lexicalScore: candidate.lexicalScore,
    }));
  }

  /**
   * Re-rank the union of the vector and lexical candidate pools, then top up
   * from the remaining candidates when the pool holds fewer than k
   */
  private hybridRank(candidates: readonly Candidate[], k: number): readonly Candidate[] {
    const poolSize = this.config.oversampling * k;

    const byVector = [...candidates]
      .filter((candidate) => candidate.entry.embedding)
      .sort((a, b) =>
        compareResults(
          { chunk: a.entry.chunk, score: a.vectorScore },
          { chunk: b.entry.chunk, score: b.vectorScore }
        )
      )
      .slice(0, poolSize);

    const byLexical = [...candidates]
      .filter((candidate) => candidate.lexicalScore > 0)
      .sort((a, b) =>
        compareResults(
          { chunk: a.entry.chunk, score: a.lexicalScore },
          { chunk: b.entry.chunk, score: b.lexicalScore }
        )
      )
      .slice(0, poolSize);

    const pool = new Set<Candidate>([...byVector, ...byLexical]);
    const ranked = sortCandidates([...pool]);

    if (ranked.length >= k) return ranked;

    const rest = sortCandidates(candidates.filter((candidate) => !pool.has(candidate)));
    return [...ranked, ...rest];
  }

  /**
   * Ids whose tokens match any query token exactly, or contain a query token
   * of at least three characters
   */
  private lexicalHits(
    snapshot: IndexSnapshot,
    queryTokens: ReadonlySet<string>
  ): ReadonlySet<string> {
    const hits = new Set<string>();
    if (queryTokens.size === 0) return hits;

    for (const [token, ids] of snapshot.postings()) {
      let matched = queryTokens.has(token);
      if (!matched) {
        for (const queryToken of queryTokens) {
          if (
            queryToken.length >= MIN_SUBSTRING_TOKEN_LENGTH &&
            token.includes(queryToken)
          ) {
            matched = true;
            break;
          }
        }
      }
      if (matched) {
        for (const id of ids) hits.add(id);
      }
    }
    return hits;
  }

  /**
   * Embed the query (cached, retried)
   * @returns Unit query vector, or null when it cannot be used
   * @throws The cancellation reason when the signal aborts
   */
  private async embedQuery(
    query: string,
    snapshot: IndexSnapshot,
    signal: AbortSignal | undefined
  ): Promise<readonly number[] | null> {
    const { embeddingMaxAttempts, embeddingBaseDelayMs, embeddingMaxDelayMs } =
      this.config;

    let values: readonly number[];
    try {
      const result = await retryWithBackoff(
        () =>
          this.queryCache.getOrEmbed(query, this.embedder, signal ? { signal } : {}),
        {
          maxRetries: embeddingMaxAttempts - 1,
          baseDelayMs: embeddingBaseDelayMs,
          maxDelayMs: embeddingMaxDelayMs,
          shouldRetry: isTransientEmbeddingFailure,
          ...(signal ? { signal } : {}),
        }
      );
      values = result.values;
    } catch (error) {
      throwIfAborted(signal);
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`[Retriever] Query embedding failed: ${message}`);
      return null;
    }

    if (snapshot.dimension !== null && values.length !== snapshot.dimension) {
      logger.warn(
        `[Retriever] Query embedding dimension ${values.length} does not match index dimension ${snapshot.dimension}`
      );
      return null;
    }

    return normalizeVector(values);
  }
}

function sortCandidates(candidates: readonly Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) =>
    compareResults(
      { chunk: a.entry.chunk, score: a.score },
      { chunk: b.entry.chunk, score: b.score }
    )
  );
}
