import { describe, it, expect } from "vitest";

describe("rag/index.ts re-exports", () => {
  describe("schemas", () => {
    it("should export RAGConfigSchema with defaults", async () => {
      const { RAGConfigSchema } = await import("../../rag/index.js");
      expect(RAGConfigSchema.parse({}).vectorWeight).toBe(0.7);
    });

    it("should export RetrievalModeSchema", async () => {
      const { RetrievalModeSchema } = await import("../../rag/index.js");
      expect(RetrievalModeSchema.options).toEqual(["hybrid", "vector", "lexical"]);
    });
  });

  describe("indexing", () => {
    it("should export the scanner, chunker and indexer", async () => {
      const rag = await import("../../rag/index.js");
      expect(typeof rag.scanCodebase).toBe("function");
      expect(typeof rag.chunkFile).toBe("function");
      expect(typeof rag.getStructuralParser).toBe("function");
      expect(typeof rag.Indexer).toBe("function");
    });
  });

  describe("retrieval", () => {
    it("should export the retriever and lexical helpers", async () => {
      const rag = await import("../../rag/index.js");
      expect(typeof rag.Retriever).toBe("function");
      expect(typeof rag.compareResults).toBe("function");
      expect(rag.tokenize("parseArgs")).toContain("parse");
    });
  });
});
