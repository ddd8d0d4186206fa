import {
  ResearchState,
  isTerminalState,
} from "./types.js";
import type {
  Answer,
  PlanDecision,
  PlanningCapability,
  ResearchConfig,
  TerminalState,
} from "./types.js";
import type { Session } from "./session.js";
import type { Synthesizer } from "./synthesizer.js";
import type { RetrieveOptions } from "../rag/retriever.js";
import type { RetrievalFilters, RetrievalMode, SearchResult } from "../rag/types.js";
import { retryWithBackoff, throwIfAborted } from "../llm/retry.js";
import { abortable } from "../llm/timeout.js";
import {
  PlanningError,
  SessionCancelledError,
  SessionTimeoutError,
  isAppError,
  isCancellation,
  isRetrievalError,
  toError,
} from "../errors/index.js";
import { logger } from "../utils.js";

export type OrchestratorConfig = Pick<
  ResearchConfig,
  "maxIterations" | "sessionTimeoutMs" | "retrievalK" | "historyTurns"
>;

/** Retrieval as seen by the loop */
export interface RetrievalCapability {
  retrieve(
    query: string,
    k: number,
    options?: RetrieveOptions
  ): Promise<readonly SearchResult[]>;
}

export interface RunOptions {
  readonly filters?: RetrievalFilters;
  readonly mode?: RetrievalMode;
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
}

export interface RunResult {
  readonly state: TerminalState;
  /** Set when the loop reached ANSWERED */
  readonly answer: Answer | null;
  /** Cause of a FAILED run */
  readonly error: Error | null;
  /** The loop was cut short by a timeout or cancellation */
  readonly partialEvidence: boolean;
  readonly timedOut: boolean;
}

export interface EvaluationInput {
  readonly sufficient: boolean;
  readonly iterationCount: number;
  readonly maxIterations: number;
  /** Chunks added by the last retrieval round */
  readonly lastAdded: number;
  readonly evidenceSize: number;
}

/**
 * Stop conditions, checked in order: sufficiency, iteration budget, an empty
 * round with no evidence at all
 */
export function evaluate(input: EvaluationInput): ResearchState {
  const hasEvidence = input.evidenceSize > 0;

  if (input.sufficient) {
    return hasEvidence ? ResearchState.SYNTHESIZING : ResearchState.EXHAUSTED;
  }
  if (input.iterationCount >= input.maxIterations) {
    return hasEvidence ? ResearchState.SYNTHESIZING : ResearchState.EXHAUSTED;
  }
  if (input.lastAdded === 0 && !hasEvidence) {
    return ResearchState.EXHAUSTED;
  }
  return ResearchState.PLANNING;
}

/** A failed capability step is tried once more before the session fails */
const STEP_RETRIES = 1;

/**
 * Research state machine for one question
 *
 * @remarks
 * PLANNING → RETRIEVING → EVALUATING → {PLANNING | SYNTHESIZING | EXHAUSTED},
 * SYNTHESIZING → ANSWERED, and FAILED from any state. Steps run one at a
 * time. A session timeout or caller cancellation aborts the in-flight
 * capability call without waiting for it.
 */
export class ResearchOrchestrator {
  constructor(
    private readonly retriever: RetrievalCapability,
    private readonly planner: PlanningCapability,
    private readonly synthesizer: Synthesizer,
    private readonly config: OrchestratorConfig
  ) {}

  async run(
    session: Session,
    question: string,
    options: RunOptions = {}
  ): Promise<RunResult> {
    const timeoutMs = options.timeoutMs ?? this.config.sessionTimeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new SessionTimeoutError(timeoutMs, { sessionId: session.id }));
    }, timeoutMs);

    const onCallerAbort = (): void => {
      controller.abort(
        new SessionCancelledError("Research cancelled by caller", {
          sessionId: session.id,
        })
      );
    };
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    session.beginQuestion();
    let state = ResearchState.PLANNING;
    const move = (to: ResearchState, reason: string): void => {
      session.recordTransition(state, to, reason);
      logger.debug(`[Orchestrator] ${session.id} ${state} -> ${to}: ${reason}`);
      state = to;
    };

    const { signal } = controller;
    const queries: string[] = [];
    let pendingQuery = question;
    let sufficient = false;
    let lastAdded = 0;
    let answer: Answer | null = null;

    try {
      while (!isTerminalState(state)) {
        throwIfAborted(signal);

        switch (state) {
          case ResearchState.PLANNING: {
            sufficient = false;
            if (queries.length === 0) {
              pendingQuery = question;
              move(ResearchState.RETRIEVING, "initial query is the question");
              break;
            }

            const decision = await this.plan(session, question, queries, signal);
            if (decision.type === "sufficient") {
              sufficient = true;
              move(ResearchState.EVALUATING, "planner signalled sufficient evidence");
            } else {
              pendingQuery = decision.query;
              move(ResearchState.RETRIEVING, `next query: ${decision.query}`);
            }
            break;
          }

          case ResearchState.RETRIEVING: {
            const query = pendingQuery;
            const results = await this.step(
              "retrieval",
              () =>
                this.retriever.retrieve(query, this.config.retrievalK, {
                  ...(options.filters ? { filters: options.filters } : {}),
                  ...(options.mode ? { mode: options.mode } : {}),
                  signal,
                }),
              signal
            );
            throwIfAborted(signal);

            queries.push(query);
            session.incrementIteration();
            lastAdded = session.evidence.add(results, query, session.iterationCount);
            move(
              ResearchState.EVALUATING,
              `${results.length} results, ${lastAdded} new`
            );
            break;
          }

          case ResearchState.EVALUATING: {
            const next = evaluate({
              sufficient,
              iterationCount: session.iterationCount,
              maxIterations: this.config.maxIterations,
              lastAdded,
              evidenceSize: session.evidence.size,
            });
            move(next, describeEvaluation(next, sufficient, session.iterationCount));
            break;
          }

          case ResearchState.SYNTHESIZING: {
            answer = await this.step(
              "generation",
              () =>
                this.synthesizer.synthesize(
                  question,
                  session.history,
                  session.evidence.ranked(),
                  { signal }
                ),
              signal
            );
            move(ResearchState.ANSWERED, `${answer.citations.length} citations`);
            break;
          }
        }
      }
    } catch (error) {
      const cancelled = signal.aborted;
      const cause = cancelled ? toError(signal.reason) : toError(error);
      move(ResearchState.FAILED, cause.message);

      if (!cancelled) {
        logger.error(`[Orchestrator] Session ${session.id} failed: ${cause.message}`);
      }

      return {
        state: ResearchState.FAILED,
        answer: null,
        error: cause,
        partialEvidence: cancelled,
        timedOut: cancelled && cause instanceof SessionTimeoutError,
      };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }

    return {
      state: isTerminalState(state) ? state : ResearchState.FAILED,
      answer,
      error: null,
      partialEvidence: false,
      timedOut: false,
    };
  }

  private async plan(
    session: Session,
    question: string,
    queries: readonly string[],
    signal: AbortSignal
  ): Promise<PlanDecision> {
    try {
      return await this.step(
        "planning",
        () =>
          this.planner.plan(
            {
              question,
              history: session.history,
              evidence: session.evidence.ranked(),
              previousQueries: queries,
            },
            { signal }
          ),
        signal
      );
    } catch (error) {
      if (signal.aborted || isAppError(error)) throw error;
      throw new PlanningError(
        `Planning failed: ${toError(error).message}`,
        { planner: this.planner.name },
        toError(error)
      );
    }
  }

  /**
   * Run one capability step, retrying it once
   * @remarks Caller errors (bad retrieval arguments) and cancellation are not retried
   */
  private step<T>(
    name: string,
    fn: () => Promise<T>,
    signal: AbortSignal
  ): Promise<T> {
    return retryWithBackoff(() => abortable(fn(), signal), {
      maxRetries: STEP_RETRIES,
      baseDelayMs: 0,
      signal,
      shouldRetry: (error) => !isRetrievalError(error) && !isCancellation(error),
      onRetry: (_attempt, error) => {
        logger.warn(`[Orchestrator] ${name} step failed, retrying: ${error.message}`);
      },
    });
  }
}

function describeEvaluation(
  next: ResearchState,
  sufficient: boolean,
  iterationCount: number
): string {
  switch (next) {
    case ResearchState.SYNTHESIZING:
      return sufficient ? "evidence sufficient" : `iteration limit reached (${iterationCount})`;
    case ResearchState.EXHAUSTED:
      return "no evidence found";
    default:
      return "more evidence needed";
  }
}
