import { createHash } from "crypto";
import type { Chunk, ChunkKind, RAGConfig, SourceFile } from "./types.js";
import { getStructuralParser, isCommentLine } from "./parser.js";
import type { StructuralParser, StructuralUnit } from "./parser.js";
import { IngestError } from "../errors/index.js";
import { getConfigValue, logger } from "../utils.js";

export type ChunkerConfig = Pick<
  RAGConfig,
  "chunkSize" | "windowLines" | "overlapFraction"
>;

/** Default chunk configuration */
const DEFAULT_CHUNKER_CONFIG: ChunkerConfig = {
  chunkSize: 300,
  windowLines: 40,
  overlapFraction: 0.125,
};

/**
 * Estimate token count from text
 * Uses approximation based on configurable characters per token ratio
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / getConfigValue("TOKENS_CHARS_RATIO"));
}

/**
 * Normalize line endings to LF and strip trailing whitespace from every line
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n");
}

/**
 * Content-derived chunk id: identical text at the same location always
 * produces the same id
 */
export function computeChunkId(
  text: string,
  path: string,
  startLine: number,
  endLine: number
): string {
  return createHash("sha256")
    .update(`${normalizeText(text)}\0${path}\0${startLine}:${endLine}`)
    .digest("hex");
}

interface MutableUnit {
  symbol: string | undefined;
  kind: ChunkKind;
  startLine: number;
  endLine: number;
}

/**
 * Sort units, clamp them to the file and merge overlapping ones so that the
 * resulting ranges are disjoint
 */
function mergeUnits(
  units: readonly StructuralUnit[],
  lineCount: number
): readonly MutableUnit[] {
  const sorted = [...units].sort(
    (a, b) => a.startLine - b.startLine || b.endLine - a.endLine
  );

  const merged: MutableUnit[] = [];
  for (const unit of sorted) {
    const startLine = Math.max(1, unit.startLine);
    const endLine = Math.min(lineCount, unit.endLine);
    if (startLine > endLine) continue;

    const previous = merged[merged.length - 1];
    if (previous && startLine <= previous.endLine) {
      previous.endLine = Math.max(previous.endLine, endLine);
      if (previous.kind !== unit.kind) previous.kind = "code";
      continue;
    }

    merged.push({ symbol: unit.symbol, kind: unit.kind, startLine, endLine });
  }
  return merged;
}

/**
 * Lazy, restartable sequence of the chunks of one file
 *
 * @remarks
 * Nothing is split until the sequence is iterated, and every iteration
 * re-derives the same chunks. A file that could not be decoded yields nothing
 * and carries the reason in `skipReason`.
 */
export class ChunkSequence implements Iterable<Chunk> {
  constructor(
    readonly path: string,
    readonly language: string,
    private readonly lines: readonly string[],
    private readonly config: ChunkerConfig,
    readonly skip: IngestError | null = null
  ) {}

  get skipReason(): string | null {
    return this.skip?.reason ?? null;
  }

  [Symbol.iterator](): Iterator<Chunk> {
    return this.generate();
  }

  private *generate(): Generator<Chunk> {
    if (this.skip || this.lines.length === 0) return;

    const parser = getStructuralParser(this.language);
    if (parser) {
      yield* this.structural(parser);
    } else {
      yield* this.windows();
    }
  }

  private *structural(parser: StructuralParser): Generator<Chunk> {
    let units: readonly StructuralUnit[];
    try {
      units = parser(this.lines.join("\n"), this.path);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.debug(
        `[Chunker] Parser failed for ${this.path}, using windows: ${message}`
      );
      yield* this.windows();
      return;
    }

    const lineCount = this.lines.length;
    let cursor = 1;

    for (const unit of mergeUnits(units, lineCount)) {
      if (unit.startLine > cursor) {
        yield* this.emitRange(cursor, unit.startLine - 1, undefined, null);
      }
      yield* this.emitRange(
        unit.startLine,
        unit.endLine,
        unit.symbol,
        unit.kind
      );
      cursor = unit.endLine + 1;
    }

    if (cursor <= lineCount) {
      yield* this.emitRange(cursor, lineCount, undefined, null);
    }
  }

  /**
   * Fallback: overlapping windows of `windowLines` lines
   */
  private *windows(): Generator<Chunk> {
    const { windowLines, overlapFraction } = this.config;
    const overlap = Math.round(windowLines * overlapFraction);
    const step = Math.max(1, windowLines - overlap);
    const lineCount = this.lines.length;
    const emitted = new Set<string>();

    for (let start = 1; start <= lineCount; start += step) {
      const end = Math.min(start + windowLines - 1, lineCount);
      const range = this.trimBlankEdges(start, end);

      if (range) {
        const key = `${range[0]}:${range[1]}`;
        // Trimming can collapse neighbouring windows onto the same lines
        if (!emitted.has(key)) {
          emitted.add(key);
          yield this.createChunk(
            range[0],
            range[1],
            undefined,
            this.language === "markdown" ? "markdown" : "code"
          );
        }
      }

      if (end === lineCount) break;
    }
  }

  /**
   * Emit one structural range, split into disjoint pieces when it exceeds
   * chunkSize. A null kind marks a gap between units, classified by content.
   */
  private *emitRange(
    startLine: number,
    endLine: number,
    symbol: string | undefined,
    kind: ChunkKind | null
  ): Generator<Chunk> {
    const range = this.trimBlankEdges(startLine, endLine);
    if (!range) return;

    const [start, end] = range;
    const resolvedKind = kind ?? this.classifyGap(start, end);
    const text = this.slice(start, end);

    if (estimateTokens(text) <= this.config.chunkSize) {
      yield this.createChunk(start, end, symbol, resolvedKind);
      return;
    }

    const pieces: Array<[number, number]> = [];
    let pieceStart = start;
    let tokens = 0;

    for (let line = start; line <= end; line++) {
      const lineTokens = estimateTokens(`${this.lines[line - 1] ?? ""}\n`);
      if (tokens + lineTokens > this.config.chunkSize && line > pieceStart) {
        pieces.push([pieceStart, line - 1]);
        pieceStart = line;
        tokens = 0;
      }
      tokens += lineTokens;
    }
    pieces.push([pieceStart, end]);

    let index = 0;
    for (const [pieceFrom, pieceTo] of pieces) {
      const piece = this.trimBlankEdges(pieceFrom, pieceTo);
      if (!piece) continue;
      yield this.createChunk(
        piece[0],
        piece[1],
        symbol === undefined ? undefined : `${symbol}[${index}]`,
        resolvedKind
      );
      index++;
    }
  }

  private classifyGap(start: number, end: number): ChunkKind {
    if (this.language === "markdown") return "markdown";

    for (let line = start; line <= end; line++) {
      const text = this.lines[line - 1] ?? "";
      if (text.trim() !== "" && !isCommentLine(text, this.language)) {
        return "code";
      }
    }
    return "comment";
  }

  private trimBlankEdges(start: number, end: number): [number, number] | null {
    let from = start;
    let to = end;
    while (from <= to && (this.lines[from - 1] ?? "").trim() === "") from++;
    while (to >= from && (this.lines[to - 1] ?? "").trim() === "") to--;
    return from <= to ? [from, to] : null;
  }

  private slice(start: number, end: number): string {
    return this.lines.slice(start - 1, end).join("\n");
  }

  private createChunk(
    startLine: number,
    endLine: number,
    symbol: string | undefined,
    kind: ChunkKind
  ): Chunk {
    const text = this.slice(startLine, endLine);
    return {
      id: computeChunkId(text, this.path, startLine, endLine),
      path: this.path,
      ...(symbol !== undefined ? { symbol } : {}),
      startLine,
      endLine,
      text,
      kind,
      language: this.language,
      tokenCount: estimateTokens(text),
    };
  }
}

/**
 * Split decoded text into normalized lines; a trailing newline adds no line
 */
function toLines(text: string): readonly string[] {
  const lines = normalizeText(text).split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Chunk already-decoded text
 */
export function chunkText(
  path: string,
  text: string,
  language: string,
  config?: Partial<ChunkerConfig>
): ChunkSequence {
  const resolved = { ...DEFAULT_CHUNKER_CONFIG, ...config };

  if (text.includes("\0")) {
    return skipped(path, language, resolved, "binary content");
  }

  return new ChunkSequence(path, language, toLines(text), resolved);
}

/**
 * Decode a source file as UTF-8 and chunk it
 *
 * @returns Lazy chunk sequence; empty with a skip reason when the bytes are
 * binary or not valid UTF-8
 */
export function chunkFile(
  source: SourceFile,
  config?: Partial<ChunkerConfig>
): ChunkSequence {
  const resolved = { ...DEFAULT_CHUNKER_CONFIG, ...config };

  if (source.bytes.includes(0)) {
    return skipped(source.path, source.language, resolved, "binary content");
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(source.bytes);
  } catch {
    return skipped(source.path, source.language, resolved, "invalid UTF-8");
  }

  return chunkText(source.path, text, source.language, resolved);
}

function skipped(
  path: string,
  language: string,
  config: ChunkerConfig,
  reason: string
): ChunkSequence {
  logger.warn(`[Chunker] Skipping ${path}: ${reason}`);
  const error = new IngestError(`Cannot chunk ${path}: ${reason}`, path, reason);
  return new ChunkSequence(path, language, [], config, error);
}
