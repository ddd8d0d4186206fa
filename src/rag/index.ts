/**
 * Indexing and retrieval
 *
 * - Source scanning and language detection
 * - Structural chunking with sliding-window fallback
 * - Versioned in-memory index with a single writer
 * - Hybrid vector + lexical retrieval
 */

// Types
export type {
  Chunk,
  ChunkKind,
  SourceFile,
  SkippedFile,
  EntryStatus,
  IndexEntry,
  IndexDelta,
  IndexStats,
  RetrievalFilters,
  RetrievalMode,
  SearchResult,
  RAGConfig,
  ProgressCallback,
} from "./types.js";
export {
  ChunkKindSchema,
  RetrievalFiltersSchema,
  RetrievalModeSchema,
  RAGConfigSchema,
} from "./types.js";

// Scanner
export { scanCodebase, detectLanguage } from "./scanner.js";
export type { ScanEvent, ScanOptions } from "./scanner.js";

// Structural parsers
export {
  parseTypeScript,
  parsePython,
  parseMarkdown,
  getStructuralParser,
} from "./parser.js";
export type { StructuralUnit, StructuralParser } from "./parser.js";
export { extractMarkdownSections } from "./doc-parser.js";
export type { DocSection } from "./doc-parser.js";

// Chunker
export {
  ChunkSequence,
  chunkFile,
  chunkText,
  computeChunkId,
  estimateTokens,
  normalizeText,
} from "./chunker.js";
export type { ChunkerConfig } from "./chunker.js";

// Index
export { IndexSnapshot, SnapshotDraft } from "./snapshot.js";
export { Indexer } from "./indexer.js";
export type { IndexerConfig, WriteOptions } from "./indexer.js";

// Retrieval
export { tokenize, splitIdentifier, lexicalOverlap } from "./lexical.js";
export { Retriever, compareResults } from "./retriever.js";
export type { RetrieverConfig, RetrieveOptions, SnapshotSource } from "./retriever.js";

// Cache
export { EmbeddingCache } from "./embedding-cache.js";
