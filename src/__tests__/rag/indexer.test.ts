import { describe, it, expect, beforeEach, vi } from "vitest";
import { Indexer } from "../../rag/indexer.js";
import { EmbeddingError, SessionCancelledError } from "../../errors/index.js";
import { FAKE_DIMENSION, FakeEmbedder, createChunk } from "../fakes.js";

const NO_DELAY = {
  embeddingMaxAttempts: 3,
  embeddingBaseDelayMs: 0,
  embeddingMaxDelayMs: 0,
};

describe("Indexer", () => {
  let embedder: FakeEmbedder;
  let indexer: Indexer;

  beforeEach(() => {
    embedder = new FakeEmbedder();
    indexer = new Indexer(embedder, NO_DELAY);
  });

  describe("upsert", () => {
    it("should embed new chunks and publish them as ready", async () => {
      const chunk = createChunk({ text: "function greet() {}" });

      const delta = await indexer.upsert([chunk]);

      expect(delta.added).toEqual([chunk.id]);
      expect(delta.generation).toBe(1);
      const entry = indexer.current().get(chunk.id);
      expect(entry?.status).toBe("ready");
      expect(entry?.attempts).toBe(1);
      expect(entry?.embedding).toHaveLength(FAKE_DIMENSION);
    });

    it("should store unit-length embeddings", async () => {
      const chunk = createChunk({ text: "alpha beta beta" });

      await indexer.upsert([chunk]);

      const embedding = indexer.current().get(chunk.id)?.embedding ?? [];
      const norm = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
      expect(norm).toBeCloseTo(1, 10);
    });

    it("should skip unchanged chunks without embedding them again", async () => {
      const chunks = [
        createChunk({ text: "const a = 1;", startLine: 1, endLine: 1 }),
        createChunk({ text: "const b = 2;", startLine: 2, endLine: 2 }),
      ];
      await indexer.upsert(chunks);
      const callsAfterFirst = embedder.calls.length;

      const delta = await indexer.upsert(chunks);

      expect(delta.added).toEqual([]);
      expect(delta.updated).toEqual([]);
      expect(delta.unchanged).toEqual(chunks.map((chunk) => chunk.id));
      expect(delta.generation).toBe(1);
      expect(embedder.calls.length).toBe(callsAfterFirst);
    });

    it("should supersede a different chunk at the same location", async () => {
      const before = createChunk({ text: "const value = 1;" });
      const after = createChunk({ text: "const value = 2;" });
      await indexer.upsert([before]);

      const delta = await indexer.upsert([after]);

      expect(delta.updated).toEqual([after.id]);
      expect(delta.removed).toEqual([]);
      expect(indexer.current().has(before.id)).toBe(false);
      expect(indexer.current().idAt(after.path, 1, 1)).toBe(after.id);
    });

    it("should keep one chunk per location when a batch repeats one", async () => {
      const first = createChunk({ text: "const x = 1;" });
      const second = createChunk({ text: "const x = 2;" });

      const delta = await indexer.upsert([first, second]);

      expect(delta.added).toEqual([second.id]);
      expect(indexer.current().size).toBe(1);
    });
  });

  describe("embedding failures", () => {
    it("should index a chunk normally after two transient failures", async () => {
      embedder.failTimes("flaky", 2);
      const chunk = createChunk({ text: "const flaky = 1;" });

      const delta = await indexer.upsert([chunk]);

      expect(delta.embeddingFailed).toEqual([]);
      expect(delta.added).toEqual([chunk.id]);
      const entry = indexer.current().get(chunk.id);
      expect(entry?.status).toBe("ready");
      expect(entry?.attempts).toBe(3);
      expect(embedder.calls.filter((text) => text.includes("flaky"))).toHaveLength(3);
    });

    it("should mark a chunk embedding_failed after the attempt limit and keep going", async () => {
      embedder.failTimes("flaky", 4);
      const flaky = createChunk({ text: "const flaky = 1;", startLine: 1, endLine: 1 });
      const stable = createChunk({ text: "const stable = 2;", startLine: 2, endLine: 2 });

      const delta = await indexer.upsert([flaky, stable]);

      expect(delta.added).toEqual([flaky.id, stable.id]);
      expect(delta.embeddingFailed).toEqual([flaky.id]);
      const snapshot = indexer.current();
      expect(snapshot.get(flaky.id)).toMatchObject({
        status: "embedding_failed",
        embedding: null,
        attempts: 3,
      });
      expect(snapshot.get(stable.id)?.status).toBe("ready");
    });

    it("should retry a failed chunk on the next upsert", async () => {
      embedder.failTimes("flaky", 4);
      const flaky = createChunk({ text: "const flaky = 1;", startLine: 1, endLine: 1 });
      const stable = createChunk({ text: "const stable = 2;", startLine: 2, endLine: 2 });
      await indexer.upsert([flaky, stable]);

      const delta = await indexer.upsert([flaky, stable]);

      expect(delta.unchanged).toEqual([stable.id]);
      expect(delta.updated).toEqual([flaky.id]);
      expect(delta.embeddingFailed).toEqual([]);
      expect(indexer.current().get(flaky.id)).toMatchObject({
        status: "ready",
        attempts: 5,
      });
    });

    it("should not retry a non-retryable EmbeddingError", async () => {
      embedder.failTimes("secret", 5, () => new EmbeddingError("rejected", false));
      const chunk = createChunk({ text: "const secret = 1;" });

      const delta = await indexer.upsert([chunk]);

      expect(delta.embeddingFailed).toEqual([chunk.id]);
      expect(embedder.calls).toHaveLength(1);
    });

    it("should reject embeddings whose dimension differs from the index", async () => {
      embedder.override("narrow", [1, 0]);
      const wide = createChunk({ text: "const wide = 1;", startLine: 1, endLine: 1 });
      const narrow = createChunk({ text: "const narrow = 2;", startLine: 2, endLine: 2 });

      const delta = await indexer.upsert([wide, narrow]);

      expect(delta.embeddingFailed).toEqual([narrow.id]);
      expect(indexer.current().dimension).toBe(FAKE_DIMENSION);
    });

    it("should reject zero vectors", async () => {
      embedder.override("zero", new Array<number>(FAKE_DIMENSION).fill(0));
      const chunk = createChunk({ text: "const zero = 0;" });

      const delta = await indexer.upsert([chunk]);

      expect(delta.embeddingFailed).toEqual([chunk.id]);
      expect(indexer.current().get(chunk.id)?.status).toBe("embedding_failed");
    });
  });

  describe("replaceFile and remove", () => {
    it("should drop chunks of the file that are no longer present", async () => {
      const kept = createChunk({ path: "src/a.ts", text: "const kept = 1;", startLine: 1, endLine: 1 });
      const gone = createChunk({ path: "src/a.ts", text: "const gone = 2;", startLine: 3, endLine: 3 });
      await indexer.upsert([kept, gone]);

      const delta = await indexer.replaceFile("src/a.ts", [kept]);

      expect(delta.unchanged).toEqual([kept.id]);
      expect(delta.removed).toEqual([gone.id]);
      expect([...indexer.current().idsForPath("src/a.ts")]).toEqual([kept.id]);
    });

    it("should not count a superseded chunk as removed", async () => {
      const before = createChunk({ path: "src/a.ts", text: "const v = 1;" });
      const after = createChunk({ path: "src/a.ts", text: "const v = 2;" });
      await indexer.upsert([before]);

      const delta = await indexer.replaceFile("src/a.ts", [after]);

      expect(delta.updated).toEqual([after.id]);
      expect(delta.removed).toEqual([]);
    });

    it("should empty a file replaced with no chunks", async () => {
      const chunk = createChunk({ path: "src/a.ts" });
      await indexer.upsert([chunk]);

      const delta = await indexer.replaceFile("src/a.ts", []);

      expect(delta.removed).toEqual([chunk.id]);
      expect(indexer.current().indexedPaths()).toEqual([]);
    });

    it("should remove every chunk of the given paths", async () => {
      const a = createChunk({ path: "src/a.ts" });
      const b = createChunk({ path: "src/b.ts" });
      await indexer.upsert([a, b]);

      const delta = await indexer.remove(["src/a.ts", "src/missing.ts"]);

      expect(delta.removed).toEqual([a.id]);
      expect(indexer.current().indexedPaths()).toEqual(["src/b.ts"]);
    });

    it("should not publish a generation when nothing was removed", async () => {
      await indexer.upsert([createChunk()]);

      const delta = await indexer.remove(["src/none.ts"]);

      expect(delta.generation).toBe(1);
    });
  });

  describe("snapshots and concurrency", () => {
    it("should leave snapshots held by readers unchanged", async () => {
      const pinned = indexer.current();

      await indexer.upsert([createChunk()]);

      expect(pinned.size).toBe(0);
      expect(pinned.generation).toBe(0);
      expect(indexer.current().size).toBe(1);
    });

    it("should apply concurrent writes one at a time", async () => {
      const [first, second] = await Promise.all([
        indexer.upsert([createChunk({ path: "src/a.ts" })]),
        indexer.upsert([createChunk({ path: "src/b.ts" })]),
      ]);

      expect(first.generation).toBe(1);
      expect(second.generation).toBe(2);
      expect(indexer.current().size).toBe(2);
    });

    it("should reject an already-cancelled write without publishing", async () => {
      const controller = new AbortController();
      controller.abort(new SessionCancelledError("stopped"));

      await expect(
        indexer.upsert([createChunk()], { signal: controller.signal })
      ).rejects.toThrow("stopped");
      expect(indexer.current().generation).toBe(0);
    });

    it("should release a write blocked on a hanging embedding when cancelled", async () => {
      embedder.hang("slow");
      const controller = new AbortController();

      const pending = indexer.upsert([createChunk({ text: "const slow = 1;" })], {
        signal: controller.signal,
      });
      await vi.waitFor(() => expect(embedder.calls).toHaveLength(1));
      controller.abort(new SessionCancelledError("cancelled"));

      await expect(pending).rejects.toThrow("cancelled");
      expect(indexer.current().size).toBe(0);

      // The queue keeps working after a failed write
      const delta = await indexer.upsert([createChunk({ text: "const fast = 1;" })]);
      expect(delta.generation).toBe(1);
    });
  });
});
