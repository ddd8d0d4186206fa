import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, writeFile, rm, unlink } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { CodeResearcher } from "../../research/researcher.js";
import type { CodeResearcherOptions } from "../../research/researcher.js";
import { INSUFFICIENT_EVIDENCE_TEXT } from "../../research/synthesizer.js";
import type { PlanDecision, PlanningCapability } from "../../research/types.js";
import {
  ConfigurationError,
  IngestError,
  RetrievalError,
  SessionBusyError,
  SessionCancelledError,
  SessionNotFoundError,
  SourceAccessError,
} from "../../errors/index.js";
import { FakeEmbedder, FakeGenerator } from "../fakes.js";

// =============================================================================
// Fixtures
// =============================================================================

const FOO_SOURCE = "export function foo() {\n  return compute();\n}\n";
const BAR_SOURCE = "export function bar() {\n  return other();\n}\n";

async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content);
  }
}

/** Planner that never answers, leaving the session to time out */
const stalledPlanner: PlanningCapability = {
  name: "stalled",
  plan: () => new Promise<PlanDecision>(() => undefined),
};

describe("CodeResearcher", () => {
  let root: string;
  let embedder: FakeEmbedder;
  let generator: FakeGenerator;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "researcher-"));
    embedder = new FakeEmbedder();
    generator = new FakeGenerator();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function createResearcher(
    overrides: Partial<CodeResearcherOptions> = {}
  ): CodeResearcher {
    return new CodeResearcher({ embedder, generator, ...overrides });
  }

  // ===========================================================================
  // Indexing
  // ===========================================================================

  describe("index()", () => {
    it("should index every chunk and report one generation per file", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const onProgress = vi.fn();

      const stats = await createResearcher().index(root, { onProgress });

      expect(stats).toEqual({
        chunksAdded: 2,
        chunksUpdated: 0,
        chunksSkipped: 0,
        chunksRemoved: 0,
        embeddingFailures: 0,
        filesIndexed: 2,
        filesSkipped: [],
        generation: 2,
      });
      expect(onProgress).toHaveBeenNthCalledWith(1, 1, 0, "Indexed src/bar.ts");
      expect(onProgress).toHaveBeenNthCalledWith(2, 2, 0, "Indexed src/foo.ts");
    });

    it("should skip unchanged chunks on re-index without embedding them", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);
      const embedded = embedder.calls.length;

      const stats = await researcher.index(root);

      expect(stats).toMatchObject({ chunksAdded: 0, chunksSkipped: 2, generation: 2 });
      expect(embedder.calls).toHaveLength(embedded);
    });

    it("should pick up modified and deleted files", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      await writeFiles(root, {
        "src/foo.ts": "export function foo() {\n  return compute() + 1;\n}\n",
      });
      await unlink(join(root, "src", "bar.ts"));
      const stats = await researcher.index(root);

      expect(stats).toMatchObject({
        chunksAdded: 0,
        chunksUpdated: 1,
        chunksSkipped: 0,
        chunksRemoved: 1,
        filesIndexed: 1,
      });
      expect(await researcher.readSource("src/foo.ts", { startLine: 2, endLine: 2 })).toBe(
        "  return compute() + 1;"
      );
    });

    it("should skip a file deleted while the codebase is being indexed", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const onProgress = vi.fn(async (_processed: number, _total: number, message: string) => {
        if (message === "Indexed src/bar.ts") await unlink(join(root, "src", "foo.ts"));
      });

      const stats = await createResearcher().index(root, { onProgress });

      expect(stats.filesIndexed).toBe(1);
      expect(stats.filesSkipped).toEqual([
        { path: "src/foo.ts", reason: expect.stringMatching(/^unreadable: ENOENT/) },
      ]);
    });

    it("should report files that cannot be decoded", async () => {
      await writeFiles(root, { "src/blob.ts": "const a = 1;\0\0", "src/foo.ts": FOO_SOURCE });

      const stats = await createResearcher().index(root);

      expect(stats.filesSkipped).toEqual([{ path: "src/blob.ts", reason: "binary content" }]);
      expect(stats.filesIndexed).toBe(1);
    });

    it("should count chunks whose embedding failed", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      embedder.failTimes("compute", 3);

      const stats = await createResearcher({
        rag: { embeddingBaseDelayMs: 0, embeddingMaxDelayMs: 0 },
      }).index(root);

      expect(stats).toMatchObject({ chunksAdded: 1, embeddingFailures: 1 });
    });

    it("should reject a root that is not a directory", async () => {
      const error = await createResearcher()
        .index(join(root, "missing"))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestError);
      expect(error).toMatchObject({ reason: "invalid root" });
    });

    it("should remove paths on request", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      expect(await researcher.removePaths(["src/bar.ts", "src/none.ts"])).toBe(1);
      expect(researcher.generation).toBe(3);
    });
  });

  // ===========================================================================
  // Research
  // ===========================================================================

  describe("ask()", () => {
    it("should answer with a citation of the defining chunk", async () => {
      // ARRANGE
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      // ACT
      const answer = await researcher.ask("what does foo do");

      // ASSERT
      expect(answer).toMatchObject({
        text: "The code does what it says [1].",
        status: "answered",
        iterations: 3,
        partialEvidence: false,
        degraded: false,
      });
      expect(answer.error).toBeUndefined();
      expect(answer.citations).toEqual([
        {
          chunkId: expect.any(String),
          path: "src/foo.ts",
          startLine: 1,
          endLine: 3,
          symbol: "foo",
        },
      ]);
      expect(researcher.getSession(answer.sessionId)?.status).toBe("answered");
    });

    it("should report insufficient evidence for an empty codebase", async () => {
      const researcher = createResearcher();
      await researcher.index(root);

      const answer = await researcher.ask("what does foo do");

      expect(answer).toMatchObject({
        text: INSUFFICIENT_EVIDENCE_TEXT,
        citations: [],
        status: "exhausted",
        iterations: 1,
      });
      expect(generator.prompts).toEqual([]);
    });

    it("should carry history into follow-up questions", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      const first = await researcher.ask("what does foo do");
      const second = await researcher.ask("and bar?", first.sessionId);

      expect(second.sessionId).toBe(first.sessionId);
      expect(
        researcher.getSession(first.sessionId)?.history.map((turn) => turn.question)
      ).toEqual(["what does foo do", "and bar?"]);
      expect(generator.prompts[1]).toContain(
        "CONVERSATION SO FAR:\nQ: what does foo do\nA: The code does what it says [1]."
      );
    });

    it("should reject a blank question", async () => {
      await expect(createResearcher().ask("   ")).rejects.toBeInstanceOf(RetrievalError);
    });

    it("should reject an unknown or closed session", async () => {
      const researcher = createResearcher();
      await researcher.index(root);
      const { sessionId } = await researcher.ask("anything");

      expect(researcher.closeSession(sessionId)).toBe(true);
      await expect(researcher.ask("again", sessionId)).rejects.toBeInstanceOf(
        SessionNotFoundError
      );
      await expect(researcher.ask("q", "no-such-id")).rejects.toThrow(
        "Session not found: no-such-id"
      );
    });

    it("should refuse a second question while one is in flight", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);
      const { sessionId } = await researcher.ask("what does foo do");
      generator.hang();
      const controller = new AbortController();

      const inFlight = researcher.ask("and then?", sessionId, { signal: controller.signal });
      await expect(researcher.ask("another", sessionId)).rejects.toBeInstanceOf(
        SessionBusyError
      );
      controller.abort();

      const cancelled = await inFlight;
      expect(cancelled).toMatchObject({
        status: "failed",
        partialEvidence: true,
        degraded: false,
        text: "Research was cancelled.",
        error: "Research cancelled by caller",
      });
    });

    it("should answer from partial evidence when the session times out", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE, "src/bar.ts": BAR_SOURCE });
      const researcher = createResearcher({ planner: stalledPlanner });
      await researcher.index(root);

      const answer = await researcher.ask("what does foo do", undefined, { timeoutMs: 50 });

      expect(answer).toMatchObject({
        text: "The code does what it says [1].",
        status: "failed",
        iterations: 1,
        partialEvidence: true,
        degraded: true,
        error: "Session timed out after 50ms",
      });
      expect(answer.citations.map((citation) => citation.path)).toEqual(["src/foo.ts"]);
    });

    it("should bound the degraded answer when the model hangs", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      generator.hang();
      const researcher = createResearcher({ planner: stalledPlanner });
      await researcher.index(root);

      const answer = await researcher.ask("what does foo do", undefined, { timeoutMs: 50 });

      expect(answer).toMatchObject({
        text: "Research took too long. Try a more specific question.",
        citations: [],
        status: "failed",
        degraded: false,
        error: "Session timed out after 50ms",
      });
      expect(generator.prompts).toHaveLength(1);
    });

    it("should stop the degraded answer as soon as the caller aborts", async () => {
      // ARRANGE
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      const controller = new AbortController();
      let generationSignal: AbortSignal | undefined;
      vi.spyOn(generator, "complete").mockImplementation((_prompt, _config, options) => {
        generationSignal = options?.signal;
        controller.abort();
        return new Promise<never>(() => undefined);
      });
      const researcher = createResearcher({ planner: stalledPlanner });
      await researcher.index(root);

      // ACT
      const answer = await researcher.ask("what does foo do", undefined, {
        timeoutMs: 50,
        signal: controller.signal,
      });

      // ASSERT
      expect(answer).toMatchObject({
        text: "Research took too long. Try a more specific question.",
        status: "failed",
        degraded: false,
        error: "Session timed out after 50ms",
      });
      expect(generationSignal?.reason).toBeInstanceOf(SessionCancelledError);
    });

    it("should explain the timeout when degraded answers are disabled", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      const researcher = createResearcher({
        planner: stalledPlanner,
        research: { degradedAnswers: false },
      });
      await researcher.index(root);

      const answer = await researcher.ask("what does foo do", undefined, { timeoutMs: 50 });

      expect(answer).toMatchObject({
        text: "Research took too long. Try a more specific question.",
        citations: [],
        status: "failed",
        degraded: false,
      });
      expect(generator.prompts).toEqual([]);
    });
  });

  // ===========================================================================
  // Source access
  // ===========================================================================

  describe("readSource()", () => {
    it("should refuse before a codebase is indexed", async () => {
      await expect(createResearcher().readSource("src/foo.ts")).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });

    it("should read whole files and line ranges", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      expect(await researcher.readSource("src/foo.ts")).toBe(FOO_SOURCE);
      expect(await researcher.readSource("src/foo.ts", { startLine: 1, endLine: 2 })).toBe(
        "export function foo() {\n  return compute();"
      );
    });

    it("should refuse paths outside the indexed root", async () => {
      const researcher = createResearcher();
      await researcher.index(root);

      await expect(researcher.readSource("../outside.txt")).rejects.toThrow(
        'Path "../outside.txt" resolves outside the codebase root'
      );
    });

    it("should report directories and missing files as source access errors", async () => {
      await writeFiles(root, { "src/foo.ts": FOO_SOURCE });
      const researcher = createResearcher();
      await researcher.index(root);

      const directory = await researcher.readSource("src").catch((e: unknown) => e);
      const missing = await researcher.readSource("src/gone.ts").catch((e: unknown) => e);

      expect(directory).toBeInstanceOf(SourceAccessError);
      expect(directory).toMatchObject({ path: "src", reason: "not-a-file" });
      expect(missing).toBeInstanceOf(SourceAccessError);
      expect(missing).toMatchObject({ path: "src/gone.ts", reason: "not-found" });
    });
  });
});
