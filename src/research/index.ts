/**
 * Research loop: sessions, planning, the state machine and answer synthesis
 */

export * from "./types.js";
export { EvidenceLog } from "./evidence.js";
export { Session, SessionStore } from "./session.js";
export {
  HeuristicPlanner,
  LLMPlanner,
  findSymbolGaps,
  questionKeywords,
} from "./planner.js";
export {
  Synthesizer,
  INSUFFICIENT_EVIDENCE_TEXT,
  extractCitations,
  jaccardSimilarity,
  selectEvidence,
} from "./synthesizer.js";
export type {
  GenerationCapability,
  PromptBlock,
  SynthesizerConfig,
} from "./synthesizer.js";
export { ResearchOrchestrator, evaluate } from "./orchestrator.js";
export type {
  EvaluationInput,
  OrchestratorConfig,
  RetrievalCapability,
  RunOptions,
  RunResult,
} from "./orchestrator.js";
export { CodeResearcher } from "./researcher.js";
export type {
  CodeResearcherOptions,
  CodebaseScanner,
  IndexOptions,
  SourceRange,
} from "./researcher.js";
export { sanitizeForPrompt } from "./prompt.js";

import type { PlannerType, PlanningCapability } from "./types.js";
import type { GenerationCapability } from "./synthesizer.js";
import { HeuristicPlanner, LLMPlanner } from "./planner.js";

/**
 * Create the configured planning capability
 * @param generator - Completion model used by the llm planner
 */
export function createPlanner(
  type: PlannerType,
  generator: GenerationCapability,
  historyTurns?: number
): PlanningCapability {
  switch (type) {
    case "heuristic":
      return new HeuristicPlanner();
    case "llm":
      return new LLMPlanner(generator, historyTurns);
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(`Unknown planner type: ${exhaustiveCheck}`);
    }
  }
}
