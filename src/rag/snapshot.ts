import type { IndexEntry } from "./types.js";
import { tokenSet } from "./lexical.js";

/** Key of the location index */
export function locationKey(
  path: string,
  startLine: number,
  endLine: number
): string {
  return `${path}:${startLine}:${endLine}`;
}

interface SnapshotState {
  readonly generation: number;
  readonly dimension: number | null;
  readonly entries: ReadonlyMap<string, IndexEntry>;
  readonly locations: ReadonlyMap<string, string>;
  readonly paths: ReadonlyMap<string, ReadonlySet<string>>;
  readonly postings: ReadonlyMap<string, ReadonlySet<string>>;
  readonly chunkTokens: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * Immutable, versioned view of the index
 *
 * @remarks
 * Holds the entries plus three side indexes: location (`path:start:end → id`),
 * path (`path → ids`) and the lexical inverted index (`token → ids`). A
 * snapshot never changes after it is published; writers build the next
 * generation through {@link IndexSnapshot.edit}.
 */
export class IndexSnapshot {
  private constructor(private readonly state: SnapshotState) {}

  static empty(): IndexSnapshot {
    return new IndexSnapshot({
      generation: 0,
      dimension: null,
      entries: new Map(),
      locations: new Map(),
      paths: new Map(),
      postings: new Map(),
      chunkTokens: new Map(),
    });
  }

  get generation(): number {
    return this.state.generation;
  }

  /** Embedding dimension, fixed by the first stored vector */
  get dimension(): number | null {
    return this.state.dimension;
  }

  get size(): number {
    return this.state.entries.size;
  }

  get(id: string): IndexEntry | undefined {
    return this.state.entries.get(id);
  }

  has(id: string): boolean {
    return this.state.entries.has(id);
  }

  entries(): IterableIterator<IndexEntry> {
    return this.state.entries.values();
  }

  idAt(path: string, startLine: number, endLine: number): string | undefined {
    return this.state.locations.get(locationKey(path, startLine, endLine));
  }

  idsForPath(path: string): ReadonlySet<string> {
    return this.state.paths.get(path) ?? new Set();
  }

  indexedPaths(): readonly string[] {
    return [...this.state.paths.keys()].sort();
  }

  /** Distinct lexical tokens of a stored chunk */
  tokensOf(id: string): ReadonlySet<string> {
    return this.state.chunkTokens.get(id) ?? new Set();
  }

  /** Inverted index vocabulary with its postings */
  postings(): IterableIterator<[string, ReadonlySet<string>]> {
    return this.state.postings.entries();
  }

  /**
   * Start a copy-on-write draft of the next generation
   */
  edit(): SnapshotDraft {
    return new SnapshotDraft(this, this.state, (state) => new IndexSnapshot(state));
  }
}

/**
 * Mutable draft of the next snapshot generation
 *
 * @remarks
 * Maps are copied when the draft is created; the sets inside them are copied
 * on first write, so the base snapshot is never touched. Discarding a draft
 * leaves no trace.
 */
export class SnapshotDraft {
  private readonly entries: Map<string, IndexEntry>;
  private readonly locations: Map<string, string>;
  private readonly paths: Map<string, ReadonlySet<string>>;
  private readonly postings: Map<string, ReadonlySet<string>>;
  private readonly chunkTokens: Map<string, ReadonlySet<string>>;
  private readonly ownedPaths = new Map<string, Set<string>>();
  private readonly ownedPostings = new Map<string, Set<string>>();
  private dimension: number | null;
  private changed = false;

  constructor(
    private readonly base: IndexSnapshot,
    state: SnapshotState,
    private readonly publish: (state: SnapshotState) => IndexSnapshot
  ) {
    this.entries = new Map(state.entries);
    this.locations = new Map(state.locations);
    this.paths = new Map(state.paths);
    this.postings = new Map(state.postings);
    this.chunkTokens = new Map(state.chunkTokens);
    this.dimension = state.dimension;
  }

  get hasChanges(): boolean {
    return this.changed;
  }

  get embeddingDimension(): number | null {
    return this.dimension;
  }

  get(id: string): IndexEntry | undefined {
    return this.entries.get(id);
  }

  /**
   * Insert or replace an entry, keeping every side index consistent
   * @remarks An entry at the same location under a different id is removed
   */
  put(entry: IndexEntry): void {
    const { chunk } = entry;
    const key = locationKey(chunk.path, chunk.startLine, chunk.endLine);
    const previousId = this.locations.get(key);
    if (previousId !== undefined && previousId !== chunk.id) {
      this.delete(previousId);
    }

    if (entry.embedding && this.dimension === null) {
      this.dimension = entry.embedding.length;
    }

    const isNew = !this.entries.has(chunk.id);
    this.entries.set(chunk.id, entry);
    this.changed = true;
    if (!isNew) return;

    this.locations.set(key, chunk.id);
    this.mutableSet(this.paths, this.ownedPaths, chunk.path).add(chunk.id);

    const tokens = tokenSet(
      chunk.symbol ? `${chunk.symbol}\n${chunk.text}` : chunk.text
    );
    this.chunkTokens.set(chunk.id, tokens);
    for (const token of tokens) {
      this.mutableSet(this.postings, this.ownedPostings, token).add(chunk.id);
    }
  }

  /**
   * Remove an entry and its side-index records
   * @returns True if the entry existed
   */
  delete(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;

    const { chunk } = entry;
    this.entries.delete(id);
    this.changed = true;

    const key = locationKey(chunk.path, chunk.startLine, chunk.endLine);
    if (this.locations.get(key) === id) {
      this.locations.delete(key);
    }

    this.removeFromSet(this.paths, this.ownedPaths, chunk.path, id);

    for (const token of this.chunkTokens.get(id) ?? []) {
      this.removeFromSet(this.postings, this.ownedPostings, token, id);
    }
    this.chunkTokens.delete(id);

    return true;
  }

  /**
   * Publish the draft as the next generation
   * @returns The base snapshot unchanged when nothing was written
   */
  commit(): IndexSnapshot {
    if (!this.changed) return this.base;

    return this.publish({
      generation: this.base.generation + 1,
      dimension: this.entries.size === 0 ? null : this.dimension,
      entries: this.entries,
      locations: this.locations,
      paths: this.paths,
      postings: this.postings,
      chunkTokens: this.chunkTokens,
    });
  }

  private mutableSet(
    map: Map<string, ReadonlySet<string>>,
    owned: Map<string, Set<string>>,
    key: string
  ): Set<string> {
    const existing = owned.get(key);
    if (existing) return existing;

    const copy = new Set<string>(map.get(key));
    owned.set(key, copy);
    map.set(key, copy);
    return copy;
  }

  private removeFromSet(
    map: Map<string, ReadonlySet<string>>,
    owned: Map<string, Set<string>>,
    key: string,
    id: string
  ): void {
    const existing = map.get(key);
    if (!existing?.has(id)) return;

    if (existing.size === 1) {
      map.delete(key);
      owned.delete(key);
      return;
    }
    this.mutableSet(map, owned, key).delete(id);
  }
}
