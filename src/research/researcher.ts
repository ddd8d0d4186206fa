import { readFile } from "fs/promises";
import { Indexer } from "../rag/indexer.js";
import { Retriever } from "../rag/retriever.js";
import { scanCodebase } from "../rag/scanner.js";
import type { ScanEvent, ScanOptions } from "../rag/scanner.js";
import { chunkFile } from "../rag/chunker.js";
import { RAGConfigSchema } from "../rag/types.js";
import type {
  IndexDelta,
  IndexStats,
  ProgressCallback,
  RAGConfig,
  SkippedFile,
} from "../rag/types.js";
import type { LLMEmbeddingProvider } from "../llm/types.js";
import { ResearchConfigSchema, ResearchState } from "./types.js";
import type {
  Answer,
  AskOptions,
  PlanningCapability,
  ResearchAnswer,
  ResearchConfig,
  SessionStatus,
} from "./types.js";
import { Session, SessionStore } from "./session.js";
import { Synthesizer } from "./synthesizer.js";
import type { GenerationCapability } from "./synthesizer.js";
import { HeuristicPlanner } from "./planner.js";
import { ResearchOrchestrator } from "./orchestrator.js";
import type { RunResult } from "./orchestrator.js";
import {
  resolveSourceFile,
  validateCodebaseRoot,
} from "../security/path-validator.js";
import { throwIfAborted } from "../llm/retry.js";
import {
  ConfigurationError,
  IngestError,
  RetrievalError,
  SessionCancelledError,
  SessionTimeoutError,
  SourceAccessError,
  createDefaultErrorHandler,
  toError,
} from "../errors/index.js";
import { formatDuration, logger } from "../utils.js";

/** Walks a codebase; `scanCodebase` unless a test injects another source */
export type CodebaseScanner = (
  root: string,
  options: ScanOptions
) => AsyncIterable<ScanEvent>;

export interface CodeResearcherOptions {
  readonly embedder: LLMEmbeddingProvider;
  readonly generator: GenerationCapability;
  /** Defaults to the {@link HeuristicPlanner} */
  readonly planner?: PlanningCapability;
  readonly rag?: Partial<RAGConfig>;
  readonly research?: Partial<ResearchConfig>;
  readonly scanner?: CodebaseScanner;
}

export interface IndexOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: ProgressCallback;
}

/** 1-indexed inclusive line range */
export interface SourceRange {
  readonly startLine: number;
  readonly endLine: number;
}

interface StatsAccumulator {
  added: number;
  updated: number;
  unchanged: number;
  removed: number;
  failed: number;
  filesIndexed: number;
  readonly filesSkipped: SkippedFile[];
}

function accumulate(stats: StatsAccumulator, delta: IndexDelta): void {
  stats.added += delta.added.length;
  stats.updated += delta.updated.length;
  stats.unchanged += delta.unchanged.length;
  stats.removed += delta.removed.length;
  stats.failed += delta.embeddingFailed.length;
}

function statusOf(state: RunResult["state"]): SessionStatus {
  switch (state) {
    case ResearchState.ANSWERED:
      return "answered";
    case ResearchState.EXHAUSTED:
      return "exhausted";
    case ResearchState.FAILED:
      return "failed";
  }
}

/**
 * Code research facade: indexes a codebase and answers questions about it in
 * conversational sessions
 *
 * @example
 * ```typescript
 * const provider = new OpenAIProvider({ apiKey });
 * const researcher = new CodeResearcher({ embedder: provider, generator: provider });
 * await researcher.index("./my-project");
 * const answer = await researcher.ask("How are sessions stored?");
 * ```
 */
export class CodeResearcher {
  private readonly ragConfig: RAGConfig;
  private readonly researchConfig: ResearchConfig;
  private readonly indexer: Indexer;
  private readonly retriever: Retriever;
  private readonly synthesizer: Synthesizer;
  private readonly orchestrator: ResearchOrchestrator;
  private readonly sessions = new SessionStore();
  private readonly scanner: CodebaseScanner;
  private readonly errorHandler = createDefaultErrorHandler();
  private indexRun: Promise<unknown> = Promise.resolve();
  private root: string | null = null;

  constructor(options: CodeResearcherOptions) {
    this.ragConfig = RAGConfigSchema.parse(options.rag ?? {});
    this.researchConfig = ResearchConfigSchema.parse(options.research ?? {});
    this.scanner = options.scanner ?? scanCodebase;

    this.indexer = new Indexer(options.embedder, this.ragConfig);
    this.retriever = new Retriever(this.indexer, options.embedder, this.ragConfig);
    this.synthesizer = new Synthesizer(options.generator, this.researchConfig);
    this.orchestrator = new ResearchOrchestrator(
      this.retriever,
      options.planner ?? new HeuristicPlanner(),
      this.synthesizer,
      this.researchConfig
    );
  }

  /** Root of the last indexed codebase */
  get codebaseRoot(): string | null {
    return this.root;
  }

  /** Generation of the published index snapshot */
  get generation(): number {
    return this.indexer.current().generation;
  }

  // ===========================================================================
  // Indexing
  // ===========================================================================

  /**
   * Scan, chunk and index a codebase, then drop files that are gone
   *
   * @remarks
   * Each file is published as one snapshot write, so readers never see a
   * file half-indexed. Re-indexing an unchanged tree embeds nothing and
   * reports every chunk as skipped. Runs are serialized.
   *
   * @throws IngestError if the root is not a readable directory
   */
  index(codebaseRoot: string, options: IndexOptions = {}): Promise<IndexStats> {
    const run = this.indexRun.then(() => this.runIndex(codebaseRoot, options));
    this.indexRun = run.catch(() => undefined);
    return run;
  }

  private async runIndex(
    codebaseRoot: string,
    options: IndexOptions
  ): Promise<IndexStats> {
    const { signal, onProgress } = options;
    const startTime = Date.now();

    let root: string;
    try {
      root = await validateCodebaseRoot(codebaseRoot);
    } catch (error) {
      throw new IngestError(
        `Cannot index ${codebaseRoot}: ${toError(error).message}`,
        codebaseRoot,
        "invalid root",
        undefined,
        toError(error)
      );
    }

    if (this.root !== null && this.root !== root) {
      logger.info(`[Researcher] Switching codebase root from ${this.root} to ${root}`);
    }
    this.root = root;
    logger.info(`[Researcher] Indexing codebase: ${root}`);

    const stats: StatsAccumulator = {
      added: 0,
      updated: 0,
      unchanged: 0,
      removed: 0,
      failed: 0,
      filesIndexed: 0,
      filesSkipped: [],
    };
    const seen = new Set<string>();
    let processed = 0;

    const scanOptions: ScanOptions = this.ragConfig.extensions
      ? { extensions: this.ragConfig.extensions }
      : {};

    for await (const event of this.scanner(root, scanOptions)) {
      throwIfAborted(signal);
      processed++;

      if (event.type === "skipped") {
        stats.filesSkipped.push({ path: event.path, reason: event.reason });
        continue;
      }

      const { file } = event;
      const sequence = chunkFile(file, this.ragConfig);
      if (sequence.skipReason !== null) {
        stats.filesSkipped.push({ path: file.path, reason: sequence.skipReason });
        continue;
      }

      const delta = await this.indexer.replaceFile(file.path, [...sequence], {
        ...(signal ? { signal } : {}),
      });
      accumulate(stats, delta);
      seen.add(file.path);
      stats.filesIndexed++;

      await onProgress?.(processed, 0, `Indexed ${file.path}`);
    }

    const stale = this.indexer
      .current()
      .indexedPaths()
      .filter((path) => !seen.has(path));
    if (stale.length > 0) {
      throwIfAborted(signal);
      accumulate(stats, await this.indexer.remove(stale));
      logger.info(`[Researcher] Removed ${stale.length} files no longer present`);
    }

    const result: IndexStats = {
      chunksAdded: stats.added,
      chunksUpdated: stats.updated,
      chunksSkipped: stats.unchanged,
      chunksRemoved: stats.removed,
      embeddingFailures: stats.failed,
      filesIndexed: stats.filesIndexed,
      filesSkipped: stats.filesSkipped,
      generation: this.indexer.current().generation,
    };

    logger.info(
      `[Researcher] Indexing complete in ${formatDuration(Date.now() - startTime)}: ` +
        `${result.filesIndexed} files, +${result.chunksAdded} ~${result.chunksUpdated} ` +
        `=${result.chunksSkipped} -${result.chunksRemoved}, ` +
        `${result.embeddingFailures} embedding failures, ${result.filesSkipped.length} files skipped`
    );

    return result;
  }

  /**
   * Drop every chunk of the given paths from the index
   * @returns Number of chunks removed
   */
  async removePaths(paths: readonly string[]): Promise<number> {
    const delta = await this.indexer.remove(paths);
    return delta.removed.length;
  }

  // ===========================================================================
  // Research
  // ===========================================================================

  /**
   * Research a question, in a new session or continuing an existing one
   *
   * @throws RetrievalError for a blank question
   * @throws SessionNotFoundError for an unknown session id
   * @throws SessionBusyError while the session is researching another question
   */
  async ask(
    question: string,
    sessionId?: string,
    options: AskOptions = {}
  ): Promise<ResearchAnswer> {
    if (question.trim().length === 0) {
      throw new RetrievalError("question must not be blank", "question");
    }

    const session =
      sessionId === undefined ? this.sessions.create() : this.sessions.require(sessionId);
    session.acquire();

    try {
      const startTime = Date.now();
      const result = await this.orchestrator.run(session, question, options);
      const answer = await this.toResearchAnswer(session, question, result, options);

      session.finishQuestion({
        question,
        answer: answer.text,
        status: answer.status,
        citations: answer.citations,
      });

      logger.info(
        `[Researcher] Session ${session.id}: ${answer.status} after ` +
          `${answer.iterations} iterations in ${formatDuration(Date.now() - startTime)}`
      );
      return answer;
    } finally {
      session.release();
    }
  }

  private async toResearchAnswer(
    session: Session,
    question: string,
    result: RunResult,
    options: AskOptions
  ): Promise<ResearchAnswer> {
    const base = {
      sessionId: session.id,
      status: statusOf(result.state),
      iterations: session.iterationCount,
      partialEvidence: result.partialEvidence,
    };

    if (result.state === ResearchState.ANSWERED && result.answer) {
      return { ...base, ...answerFields(result.answer), degraded: false };
    }

    if (result.state === ResearchState.EXHAUSTED) {
      return {
        ...base,
        ...answerFields(this.synthesizer.insufficientEvidence()),
        degraded: false,
      };
    }

    const cause = result.error ?? new Error("Research failed");

    if (
      result.timedOut &&
      this.researchConfig.degradedAnswers &&
      session.evidence.size > 0
    ) {
      const degraded = await this.degradedAnswer(session, question, options);
      if (degraded) {
        return {
          ...base,
          ...answerFields(degraded),
          degraded: true,
          error: cause.message,
        };
      }
    }

    return {
      ...base,
      text: this.errorHandler.handle(cause).userMessage,
      citations: [],
      degraded: false,
      error: cause.message,
    };
  }

  /**
   * One synthesis attempt over partial evidence; null when it fails
   *
   * @remarks
   * The attempt gets half of the session timeout and stops as soon as the
   * caller aborts.
   */
  private async degradedAnswer(
    session: Session,
    question: string,
    options: AskOptions
  ): Promise<Answer | null> {
    if (options.signal?.aborted) return null;

    const timeoutMs = options.timeoutMs ?? this.researchConfig.sessionTimeoutMs;
    const budgetMs = Math.max(1, Math.floor(timeoutMs / 2));
    logger.warn(
      `[Researcher] Session ${session.id} timed out, answering from ` +
        `${session.evidence.size} chunks within ${formatDuration(budgetMs)}`
    );

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new SessionTimeoutError(budgetMs)),
      budgetMs
    );
    const onCallerAbort = (): void =>
      controller.abort(new SessionCancelledError("Research cancelled by caller"));
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      return await this.synthesizer.synthesize(
        question,
        session.history,
        session.evidence.ranked(),
        { signal: controller.signal }
      );
    } catch (error) {
      logger.error(
        `[Researcher] Degraded answer failed for ${session.id}: ${toError(error).message}`
      );
      return null;
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Forget a session and its evidence
   * @returns false when the id is unknown
   */
  closeSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  // ===========================================================================
  // Source access
  // ===========================================================================

  /**
   * Read a file of the indexed codebase
   *
   * @param path - Path relative to the indexed root
   * @param range - Lines to return; the whole file when absent
   * @throws ConfigurationError before anything was indexed
   * @throws SourceAccessError when the path leaves the root, is missing, is
   * not a regular file or cannot be read
   */
  async readSource(path: string, range?: SourceRange): Promise<string> {
    if (this.root === null) {
      throw new ConfigurationError("No codebase has been indexed", "codebaseRoot");
    }

    const realPath = await resolveSourceFile(path, this.root);
    let content: string;
    try {
      content = await readFile(realPath, "utf-8");
    } catch (error) {
      throw new SourceAccessError(
        `Source file could not be read: ${path}`,
        path,
        "unreadable",
        toError(error)
      );
    }
    if (!range) return content;

    const start = Math.max(1, range.startLine);
    return content
      .split("\n")
      .slice(start - 1, Math.max(start - 1, range.endLine))
      .join("\n");
  }
}

function answerFields(answer: Answer): Pick<ResearchAnswer, "text" | "citations"> {
  return { text: answer.text, citations: answer.citations };
}
