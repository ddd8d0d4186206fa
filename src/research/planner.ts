import { z } from "zod";
import type {
  EvidenceItem,
  PlanDecision,
  PlanningCapability,
  PlanningInput,
} from "./types.js";
import { formatHistory, formatLocation, sanitizeForPrompt } from "./prompt.js";
import type { GenerationCapability } from "./synthesizer.js";
import type { RequestOptions } from "../llm/types.js";
import { withTimeout, abortable, DEFAULT_TIMEOUTS } from "../llm/timeout.js";
import { PlanningError, isAppError, toError } from "../errors/index.js";
import { logger } from "../utils.js";

/** Identifiers that never name a gap worth searching for */
const IGNORED_IDENTIFIERS = new Set([
  "if", "for", "while", "switch", "catch", "return", "function", "def",
  "class", "new", "await", "async", "typeof", "super", "this", "self",
  "print", "len", "range", "str", "int", "dict", "list", "set", "map",
  "filter", "require", "import", "console", "log", "push", "join",
  "string", "number", "boolean", "promise", "error", "object", "array",
]);

const CALL_REGEX = /\b([A-Za-z_$][A-Za-z0-9_$]*)\s*\(/g;
const TYPE_REFERENCE_REGEX =
  /(?:\bnew\s+|\bextends\s+|\bimplements\s+|:\s*)([A-Z][A-Za-z0-9_]*)/g;
const DEFINITION_REGEX =
  /\b(?:function|def|class|interface|type|enum|const|let|var)\s+([A-Za-z_$][A-Za-z0-9_$]*)/g;

/** Words of a question that carry no search value */
const QUESTION_WORDS = new Set([
  "what", "does", "do", "how", "why", "where", "which", "who", "when", "is",
  "are", "the", "a", "an", "of", "in", "to", "and", "or", "it", "this",
  "that", "with", "for", "on", "work", "works", "used", "use",
]);

function baseSymbol(symbol: string): string {
  return symbol.replace(/\[\d+\]$/, "").toLowerCase();
}

/**
 * Symbols referenced by the evidence but not defined in it, most referenced
 * first (ties keep first-seen order)
 */
export function findSymbolGaps(evidence: readonly EvidenceItem[]): readonly string[] {
  const defined = new Set<string>();
  for (const { chunk } of evidence) {
    if (chunk.symbol) defined.add(baseSymbol(chunk.symbol));
    for (const match of chunk.text.matchAll(DEFINITION_REGEX)) {
      if (match[1]) defined.add(match[1].toLowerCase());
    }
  }

  const counts = new Map<string, { name: string; count: number; order: number }>();
  for (const { chunk } of evidence) {
    const references = [
      ...chunk.text.matchAll(CALL_REGEX),
      ...chunk.text.matchAll(TYPE_REFERENCE_REGEX),
    ];
    for (const match of references) {
      const name = match[1];
      if (!name || name.length < 3) continue;

      const key = name.toLowerCase();
      if (defined.has(key) || IGNORED_IDENTIFIERS.has(key)) continue;

      const existing = counts.get(key);
      if (existing) {
        existing.count++;
      } else {
        counts.set(key, { name, count: 1, order: counts.size });
      }
    }
  }

  return [...counts.values()]
    .sort((a, b) => b.count - a.count || a.order - b.order)
    .map((entry) => entry.name);
}

/**
 * Keywords of a question, without question words
 */
export function questionKeywords(question: string): string {
  return question
    .split(/[^A-Za-z0-9_$.]+/)
    .map((word) => word.replace(/^\.+|\.+$/g, ""))
    .filter((word) => word.length > 0 && !QUESTION_WORDS.has(word.toLowerCase()))
    .join(" ");
}

/**
 * Deterministic planner driven by symbol gaps
 *
 * @remarks
 * Asks for the most referenced symbol that the evidence uses but does not
 * define. With no evidence it tries the question's keywords once. When there
 * is nothing new to ask it signals sufficiency.
 */
export class HeuristicPlanner implements PlanningCapability {
  readonly name = "heuristic";

  async plan(input: PlanningInput): Promise<PlanDecision> {
    const asked = new Set(input.previousQueries.map((query) => query.toLowerCase()));

    if (input.evidence.length === 0) {
      const keywords = questionKeywords(input.question);
      if (keywords && !asked.has(keywords.toLowerCase())) {
        return { type: "query", query: keywords };
      }
      return { type: "sufficient" };
    }

    const gap = findSymbolGaps(input.evidence).find(
      (symbol) => !asked.has(symbol.toLowerCase())
    );

    return gap ? { type: "query", query: gap } : { type: "sufficient" };
  }
}

// =============================================================================
// LLM planner
// =============================================================================

const PlanResponseSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("search"), query: z.string().trim().min(1) }),
  z.object({ action: z.literal("answer") }),
]);

/** Evidence entries listed in the planning prompt */
const MAX_PLANNING_EVIDENCE = 20;

/**
 * Extract the first JSON object from model output
 */
function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
}

/**
 * Planner that asks a completion model for the next search
 */
export class LLMPlanner implements PlanningCapability {
  readonly name = "llm";

  constructor(
    private readonly generator: GenerationCapability,
    private readonly historyTurns = 3
  ) {}

  buildPrompt(input: PlanningInput): string {
    const evidence = input.evidence
      .slice(0, MAX_PLANNING_EVIDENCE)
      .map((item, index) => {
        const firstLine = item.chunk.text.split("\n")[0]?.trim() ?? "";
        return `${index + 1}. ${formatLocation(item.chunk)}: ${firstLine.slice(0, 120)}`;
      })
      .join("\n");
    const previous = input.previousQueries.map((query) => `- ${query}`).join("\n");
    const conversation = formatHistory(input.history, this.historyTurns);

    return `You plan searches over a code index to answer a question about a codebase.
${conversation ? `\nCONVERSATION SO FAR:\n${conversation}\n` : ""}
QUESTION: ${sanitizeForPrompt(input.question)}

SEARCHES ALREADY MADE:
${previous || "(none)"}

CODE FOUND SO FAR:
${evidence || "(nothing)"}

If the code found is enough to answer, reply {"action":"answer"}.
Otherwise reply {"action":"search","query":"<new search>"} naming a symbol, file or concept not yet searched.
Reply with the JSON object only.`;
  }

  /**
   * @throws PlanningError when the model fails or its reply is not a valid plan
   */
  async plan(input: PlanningInput, options: RequestOptions = {}): Promise<PlanDecision> {
    let text: string;
    try {
      const result = await withTimeout(
        abortable(
          this.generator.complete(
            this.buildPrompt(input),
            { temperature: 0, maxTokens: 200 },
            options
          ),
          options.signal
        ),
        { timeoutMs: DEFAULT_TIMEOUTS.planning, context: "Query planning" }
      );
      text = result.text;
    } catch (error) {
      if (options.signal?.aborted || isAppError(error)) throw error;
      throw new PlanningError(
        `Planner call failed: ${toError(error).message}`,
        undefined,
        toError(error)
      );
    }

    const parsed = PlanResponseSchema.safeParse(extractJsonObject(text));
    if (!parsed.success) {
      logger.warn(`[Planner] Unparseable plan: "${text.trim().slice(0, 80)}"`);
      throw new PlanningError("Planner returned an invalid plan", {
        response: text.slice(0, 500),
      });
    }

    return parsed.data.action === "search"
      ? { type: "query", query: parsed.data.query }
      : { type: "sufficient" };
  }
}
