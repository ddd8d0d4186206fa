import type { SearchResult } from "../rag/types.js";
import { compareResults } from "../rag/retriever.js";
import type { EvidenceItem } from "./types.js";

/**
 * Append-only evidence of one session
 *
 * @remarks
 * A chunk enters once. Later retrievals of the same chunk only extend its
 * query provenance; its score stays the one it was first found with.
 */
export class EvidenceLog {
  private readonly items: EvidenceItem[] = [];
  private readonly positions = new Map<string, number>();

  get size(): number {
    return this.items.length;
  }

  has(chunkId: string): boolean {
    return this.positions.has(chunkId);
  }

  get(chunkId: string): EvidenceItem | undefined {
    const position = this.positions.get(chunkId);
    return position === undefined ? undefined : this.items[position];
  }

  /**
   * Record one retrieval round
   * @returns Number of chunks that were not in the evidence before
   */
  add(results: readonly SearchResult[], query: string, iteration: number): number {
    let added = 0;

    for (const result of results) {
      const position = this.positions.get(result.chunk.id);

      if (position !== undefined) {
        const existing = this.items[position];
        if (existing && !existing.queries.includes(query)) {
          this.items[position] = {
            ...existing,
            queries: [...existing.queries, query],
          };
        }
        continue;
      }

      this.positions.set(result.chunk.id, this.items.length);
      this.items.push({
        chunk: result.chunk,
        score: result.score,
        queries: [query],
        iteration,
      });
      added++;
    }

    return added;
  }

  /** Items in insertion order */
  list(): readonly EvidenceItem[] {
    return [...this.items];
  }

  /** Items best first, with the retrieval tie-break */
  ranked(): readonly EvidenceItem[] {
    return [...this.items].sort(compareResults);
  }
}
