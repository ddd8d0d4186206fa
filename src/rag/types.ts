import { z } from "zod";

// Chunk kinds
export const ChunkKindSchema = z.enum([
  "code",
  "docstring",
  "comment",
  "markdown",
]);
export type ChunkKind = z.infer<typeof ChunkKindSchema>;

/**
 * Immutable unit of indexed content
 * @remarks `id` is derived from normalized text, path and line range only
 */
export interface Chunk {
  readonly id: string;
  readonly path: string;
  /** Function/class/module/heading name, absent for anonymous gap chunks */
  readonly symbol?: string;
  /** 1-indexed, inclusive */
  readonly startLine: number;
  /** 1-indexed, inclusive */
  readonly endLine: number;
  readonly text: string;
  readonly kind: ChunkKind;
  readonly language: string;
  readonly tokenCount: number;
}

/** Raw file handed to the chunker by a scanner */
export interface SourceFile {
  /** Path relative to the codebase root, `/`-separated */
  readonly path: string;
  readonly bytes: Uint8Array;
  readonly language: string;
}

/** File the scanner or chunker refused, with the reason */
export interface SkippedFile {
  readonly path: string;
  readonly reason: string;
}

// ============================================================================
// Index entries
// ============================================================================

export type EntryStatus = "ready" | "embedding_failed";

export interface IndexEntry {
  readonly chunk: Chunk;
  /** Unit-length vector, null while the embedding is failed */
  readonly embedding: readonly number[] | null;
  readonly status: EntryStatus;
  /** Embedding attempts made for this chunk across upserts */
  readonly attempts: number;
}

/** Result of one indexer write */
export interface IndexDelta {
  /** Chunk ids stored at a location that had no chunk before */
  readonly added: readonly string[];
  /** Chunk ids that superseded a different chunk at the same location */
  readonly updated: readonly string[];
  /** Chunk ids already present and ready */
  readonly unchanged: readonly string[];
  /** Chunk ids dropped from the index */
  readonly removed: readonly string[];
  /** Chunk ids stored as embedding_failed by this write */
  readonly embeddingFailed: readonly string[];
  /** Generation of the snapshot published by this write */
  readonly generation: number;
}

/** Result of indexing a codebase */
export interface IndexStats {
  readonly chunksAdded: number;
  readonly chunksUpdated: number;
  /** Chunks already present and unchanged */
  readonly chunksSkipped: number;
  readonly chunksRemoved: number;
  readonly embeddingFailures: number;
  readonly filesIndexed: number;
  readonly filesSkipped: readonly SkippedFile[];
  readonly generation: number;
}

// ============================================================================
// Retrieval
// ============================================================================

const oneOrMany = <T extends z.ZodTypeAny>(schema: T) =>
  z.union([schema, z.array(schema).min(1)]);

/** Filters applied before ranking */
export const RetrievalFiltersSchema = z
  .object({
    pathPrefix: z.string().min(1).optional(),
    language: oneOrMany(z.string().min(1)).optional(),
    kind: oneOrMany(ChunkKindSchema).optional(),
    /** Case-insensitive substring of the chunk symbol */
    symbol: z.string().min(1).optional(),
  })
  .strict();
export type RetrievalFilters = z.infer<typeof RetrievalFiltersSchema>;

export const RetrievalModeSchema = z.enum(["hybrid", "vector", "lexical"]);
export type RetrievalMode = z.infer<typeof RetrievalModeSchema>;

export interface SearchResult {
  readonly chunk: Chunk;
  /** Blended score used for ordering */
  readonly score: number;
  readonly vectorScore: number;
  readonly lexicalScore: number;
}

/**
 * Indexing and retrieval configuration
 *
 * Constraints:
 * - overlapFraction must leave at least one new line per window
 */
export const RAGConfigSchema = z
  .object({
    /** Maximum estimated tokens per structural chunk before it is split */
    chunkSize: z.number().int().positive().default(300),
    /** Lines per sliding window in fallback mode */
    windowLines: z.number().int().positive().default(40),
    /** Share of each fallback window repeated in the next one */
    overlapFraction: z.number().min(0).max(0.5).default(0.125),
    /** Weight of vector similarity in the blended score (lexical gets 1 - α) */
    vectorWeight: z.number().min(0).max(1).default(0.7),
    /** Candidates re-ranked per requested result */
    oversampling: z.number().int().min(1).default(4),
    /** Embedding attempts per chunk before it is marked embedding_failed */
    embeddingMaxAttempts: z.number().int().min(1).default(3),
    embeddingBaseDelayMs: z.number().nonnegative().default(250),
    embeddingMaxDelayMs: z.number().nonnegative().default(5000),
    /** Concurrent embedding calls during indexing */
    embeddingConcurrency: z.number().int().min(1).default(4),
    /** Cached query embeddings */
    queryCacheSize: z.number().int().min(1).default(500),
    /** File extensions to index, e.g. [".py", ".ts"]; all known when absent */
    extensions: z.array(z.string().min(1)).optional(),
  })
  .refine(
    (data) =>
      data.windowLines === 1 ||
      Math.round(data.windowLines * data.overlapFraction) < data.windowLines,
    { message: "overlapFraction must leave new lines in every window" }
  );
export type RAGConfig = z.infer<typeof RAGConfigSchema>;

/**
 * Progress callback for long-running indexing operations
 * @param current - Current item number
 * @param total - Total items to process (0 when unknown)
 * @param stage - Description of current stage
 */
export type ProgressCallback = (
  current: number,
  total: number,
  stage: string
) => void | Promise<void>;
