import { z } from "zod";
import type {
  Chunk,
  RetrievalFilters,
  RetrievalMode,
} from "../rag/types.js";
import type { RequestOptions } from "../llm/types.js";

// ============================================================================
// Configuration
// ============================================================================

export const PlannerTypeSchema = z.enum(["heuristic", "llm"]);
export type PlannerType = z.infer<typeof PlannerTypeSchema>;

/**
 * Research loop configuration
 *
 * Constraints:
 * - sessionTimeoutMs must leave room for at least one capability call
 */
export const ResearchConfigSchema = z.object({
  /** RETRIEVING passes per question before the loop stops */
  maxIterations: z.number().int().min(1).default(5),
  sessionTimeoutMs: z.number().int().positive().default(120_000),
  /** Results requested per retrieval */
  retrievalK: z.number().int().min(1).default(8),
  /** Estimated tokens of evidence placed in the answer prompt */
  evidenceTokenBudget: z.number().int().positive().default(3000),
  /** Token-set Jaccard similarity at which chunks count as duplicates */
  dedupThreshold: z.number().min(0).max(1).default(0.9),
  /** Previous turns included in prompts */
  historyTurns: z.number().int().min(0).default(3),
  /** Attempt an answer from partial evidence when a session times out */
  degradedAnswers: z.boolean().default(true),
});
export type ResearchConfig = z.infer<typeof ResearchConfigSchema>;

// ============================================================================
// State machine
// ============================================================================

export enum ResearchState {
  PLANNING = "planning",
  RETRIEVING = "retrieving",
  EVALUATING = "evaluating",
  SYNTHESIZING = "synthesizing",
  ANSWERED = "answered",
  EXHAUSTED = "exhausted",
  FAILED = "failed",
}

export type TerminalState =
  | ResearchState.ANSWERED
  | ResearchState.EXHAUSTED
  | ResearchState.FAILED;

export function isTerminalState(state: ResearchState): state is TerminalState {
  return (
    state === ResearchState.ANSWERED ||
    state === ResearchState.EXHAUSTED ||
    state === ResearchState.FAILED
  );
}

export type SessionStatus = "active" | "answered" | "exhausted" | "failed";

/** Entry of a session's append-only transition log */
export interface Transition {
  readonly from: ResearchState;
  readonly to: ResearchState;
  readonly reason: string;
  /** RETRIEVING passes completed when the transition happened */
  readonly iteration: number;
  readonly at: Date;
}

// ============================================================================
// Evidence and answers
// ============================================================================

export interface EvidenceItem {
  readonly chunk: Chunk;
  /** Score from the retrieval that first found the chunk */
  readonly score: number;
  /** Every query that returned the chunk, in order */
  readonly queries: readonly string[];
  /** Iteration that first found the chunk */
  readonly iteration: number;
}

export interface Citation {
  readonly chunkId: string;
  readonly path: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly symbol?: string;
}

export interface Answer {
  readonly text: string;
  readonly citations: readonly Citation[];
  /** True for the explicit no-evidence answer */
  readonly insufficientEvidence: boolean;
}

export interface Turn {
  readonly question: string;
  readonly answer: string;
  readonly status: SessionStatus;
  readonly citations: readonly Citation[];
}

// ============================================================================
// Capabilities
// ============================================================================

export type PlanDecision =
  | { readonly type: "query"; readonly query: string }
  | { readonly type: "sufficient" };

export interface PlanningInput {
  readonly question: string;
  readonly history: readonly Turn[];
  /** Evidence so far, best first */
  readonly evidence: readonly EvidenceItem[];
  /** Queries already issued for this question */
  readonly previousQueries: readonly string[];
}

/**
 * Query-planning capability: proposes the next retrieval query, or signals
 * that the evidence is sufficient
 */
export interface PlanningCapability {
  readonly name: string;
  plan(input: PlanningInput, options?: RequestOptions): Promise<PlanDecision>;
}

// ============================================================================
// Boundary surface
// ============================================================================

export interface AskOptions {
  readonly filters?: RetrievalFilters;
  readonly mode?: RetrievalMode;
  /** Caller cancellation */
  readonly signal?: AbortSignal;
  /** Overrides sessionTimeoutMs for this question */
  readonly timeoutMs?: number;
}

export interface ResearchAnswer {
  readonly sessionId: string;
  readonly text: string;
  readonly citations: readonly Citation[];
  readonly status: SessionStatus;
  /** RETRIEVING passes spent on this question */
  readonly iterations: number;
  /** The loop was cut short and the evidence may be incomplete */
  readonly partialEvidence: boolean;
  /** The text was generated from partial evidence after a timeout */
  readonly degraded: boolean;
  /** Cause of a failed session */
  readonly error?: string;
}
