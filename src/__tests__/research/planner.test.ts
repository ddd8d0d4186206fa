import { describe, it, expect } from "vitest";
import {
  HeuristicPlanner,
  LLMPlanner,
  findSymbolGaps,
  questionKeywords,
} from "../../research/planner.js";
import type { EvidenceItem, PlanningInput } from "../../research/types.js";
import { PlanningError, SessionCancelledError } from "../../errors/index.js";
import { FakeGenerator, createChunk } from "../fakes.js";

// =============================================================================
// Mock Factories
// =============================================================================

function createEvidence(text: string, symbol?: string, path = "src/app.ts"): EvidenceItem {
  return {
    chunk: createChunk({ path, text, ...(symbol !== undefined ? { symbol } : {}) }),
    score: 0.5,
    queries: ["initial"],
    iteration: 1,
  };
}

function createInput(overrides: Partial<PlanningInput> = {}): PlanningInput {
  return {
    question: "What does handle do?",
    history: [],
    evidence: [],
    previousQueries: [],
    ...overrides,
  };
}

const HANDLER = createEvidence(
  "function handle(req) {\n  const user = loadUser(req.id);\n  return render(user);\n}",
  "handle"
);

// =============================================================================
// Helpers
// =============================================================================

describe("findSymbolGaps", () => {
  it("should list called symbols the evidence does not define", () => {
    expect(findSymbolGaps([HANDLER])).toEqual(["loadUser", "render"]);
  });

  it("should order gaps by reference count", () => {
    const view = createEvidence(
      "function view() {\n  render(header);\n  render(body);\n}",
      "view",
      "src/view.ts"
    );

    expect(findSymbolGaps([HANDLER, view])).toEqual(["render", "loadUser"]);
  });

  it("should treat symbols defined in other evidence as known", () => {
    const loader = createEvidence("function loadUser(id) {}", "loadUser", "src/users.ts");

    expect(findSymbolGaps([HANDLER, loader])).toEqual(["render"]);
  });

  it("should pick up type references", () => {
    const cli = createEvidence("class Cli extends Command implements Runnable {}", "Cli");

    expect(findSymbolGaps([cli])).toEqual(["Command", "Runnable"]);
  });

  it("should ignore keywords, builtins and short names", () => {
    const noisy = createEvidence(
      "if (ok) {\n  console.log(fn(x));\n  print(len(items));\n}"
    );

    expect(findSymbolGaps([noisy])).toEqual([]);
  });
});

describe("questionKeywords", () => {
  it("should drop question words and punctuation", () => {
    expect(questionKeywords("What does parseArgs do?")).toBe("parseArgs");
  });

  it("should keep dotted names", () => {
    expect(questionKeywords("How is config.load used in main.ts?")).toBe(
      "config.load main.ts"
    );
  });

  it("should return an empty string for a question with no keywords", () => {
    expect(questionKeywords("what does it do?")).toBe("");
  });
});

// =============================================================================
// HeuristicPlanner
// =============================================================================

describe("HeuristicPlanner", () => {
  const planner = new HeuristicPlanner();

  it("should search the question keywords when there is no evidence", async () => {
    expect(await planner.plan(createInput())).toEqual({ type: "query", query: "handle" });
  });

  it("should be satisfied once the keywords were already searched", async () => {
    const input = createInput({ previousQueries: ["What does handle do?", "HANDLE"] });

    expect(await planner.plan(input)).toEqual({ type: "sufficient" });
  });

  it("should be satisfied when the question has no keywords", async () => {
    expect(await planner.plan(createInput({ question: "what is it?" }))).toEqual({
      type: "sufficient",
    });
  });

  it("should search the first symbol gap not yet searched", async () => {
    const input = createInput({
      evidence: [HANDLER],
      previousQueries: ["What does handle do?", "loaduser"],
    });

    expect(await planner.plan(input)).toEqual({ type: "query", query: "render" });
  });

  it("should be satisfied when every gap was searched", async () => {
    const input = createInput({
      evidence: [HANDLER],
      previousQueries: ["loadUser", "render"],
    });

    expect(await planner.plan(input)).toEqual({ type: "sufficient" });
  });
});

// =============================================================================
// LLMPlanner
// =============================================================================

describe("LLMPlanner", () => {
  it("should turn a search reply into a query", async () => {
    const generator = new FakeGenerator().reply('{"action":"search","query":" loadUser "}');

    const decision = await new LLMPlanner(generator).plan(createInput());

    expect(decision).toEqual({ type: "query", query: "loadUser" });
  });

  it("should find the JSON object inside surrounding prose", async () => {
    const generator = new FakeGenerator().reply('Sure.\n{"action":"answer"}\nDone.');

    expect(await new LLMPlanner(generator).plan(createInput())).toEqual({
      type: "sufficient",
    });
  });

  it("should describe the question, searches and evidence in the prompt", async () => {
    const generator = new FakeGenerator().reply('{"action":"answer"}');
    const planner = new LLMPlanner(generator);

    await planner.plan(
      createInput({
        evidence: [HANDLER],
        previousQueries: ["handle"],
        history: [
          { question: "Where is main?", answer: "In src/main.ts.", status: "answered", citations: [] },
        ],
      })
    );

    const prompt = generator.prompts[0] ?? "";
    expect(prompt).toContain("QUESTION: What does handle do?");
    expect(prompt).toContain("SEARCHES ALREADY MADE:\n- handle");
    expect(prompt).toContain("1. src/app.ts:1-1 (handle): function handle(req) {");
    expect(prompt).toContain("CONVERSATION SO FAR:\nQ: Where is main?\nA: In src/main.ts.");
  });

  it("should mark empty sections in the prompt", () => {
    const prompt = new LLMPlanner(new FakeGenerator()).buildPrompt(createInput());

    expect(prompt).toContain("SEARCHES ALREADY MADE:\n(none)");
    expect(prompt).toContain("CODE FOUND SO FAR:\n(nothing)");
    expect(prompt).not.toContain("CONVERSATION SO FAR");
  });

  it("should reject a reply that is not a plan", async () => {
    const generator = new FakeGenerator().reply('{"action":"search","query":""}');

    await expect(new LLMPlanner(generator).plan(createInput())).rejects.toThrow(
      "Planner returned an invalid plan"
    );
  });

  it("should wrap generator failures in PlanningError", async () => {
    const generator = new FakeGenerator().failTimes(1);

    const error = await new LLMPlanner(generator)
      .plan(createInput())
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PlanningError);
    expect(error).toMatchObject({ message: "Planner call failed: model unavailable" });
  });

  it("should stop with the abort reason when cancelled", async () => {
    const generator = new FakeGenerator().hang();
    const controller = new AbortController();
    const reason = new SessionCancelledError("stopped");

    const pending = new LLMPlanner(generator).plan(createInput(), {
      signal: controller.signal,
    });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });
});
