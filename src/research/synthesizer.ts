import type { Answer, Citation, EvidenceItem, ResearchConfig, Turn } from "./types.js";
import { formatHistory, formatLocation, sanitizeForPrompt } from "./prompt.js";
import { tokenSet } from "../rag/lexical.js";
import { estimateTokens } from "../rag/chunker.js";
import { compareResults } from "../rag/retriever.js";
import type { LLMCompletionProvider, RequestOptions } from "../llm/types.js";
import { withTimeout, abortable, DEFAULT_TIMEOUTS } from "../llm/timeout.js";
import { GenerationError, isAppError, toError } from "../errors/index.js";
import { getConfigValue, logger } from "../utils.js";

export type SynthesizerConfig = Pick<
  ResearchConfig,
  "evidenceTokenBudget" | "dedupThreshold" | "historyTurns"
>;

const DEFAULT_SYNTHESIZER_CONFIG: SynthesizerConfig = {
  evidenceTokenBudget: 3000,
  dedupThreshold: 0.9,
  historyTurns: 3,
};

/** Answer-generation capability */
export type GenerationCapability = Pick<LLMCompletionProvider, "complete">;

export const INSUFFICIENT_EVIDENCE_TEXT =
  "I could not find enough evidence in the indexed codebase to answer this question.";

/** Evidence block placed in the prompt as `[number]` */
export interface PromptBlock {
  readonly number: number;
  readonly item: EvidenceItem;
  /** Chunk text, cut to the budget for an oversized best chunk */
  readonly text: string;
}

/**
 * Token-set Jaccard similarity
 */
export function jaccardSimilarity(
  a: ReadonlySet<string>,
  b: ReadonlySet<string>
): number {
  if (a.size === 0 && b.size === 0) return 1;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}

/**
 * Collapse near-duplicates to the best-scored representative, then fill the
 * token budget best first
 */
export function selectEvidence(
  evidence: readonly EvidenceItem[],
  config: Pick<SynthesizerConfig, "evidenceTokenBudget" | "dedupThreshold">
): readonly PromptBlock[] {
  const ranked = [...evidence].sort(compareResults);
  const representatives: Array<{ item: EvidenceItem; tokens: ReadonlySet<string> }> = [];

  for (const item of ranked) {
    const tokens = tokenSet(item.chunk.text);
    const duplicate = representatives.some(
      (kept) =>
        (tokens.size === 0 && kept.tokens.size === 0
          ? kept.item.chunk.text === item.chunk.text
          : jaccardSimilarity(tokens, kept.tokens) >= config.dedupThreshold)
    );
    if (!duplicate) representatives.push({ item, tokens });
  }

  const blocks: PromptBlock[] = [];
  let used = 0;

  for (const { item } of representatives) {
    const cost = estimateTokens(item.chunk.text);

    if (blocks.length === 0 && cost > config.evidenceTokenBudget) {
      // The best chunk always goes in, cut to the budget
      const maxChars =
        config.evidenceTokenBudget * getConfigValue("TOKENS_CHARS_RATIO");
      blocks.push({ number: 1, item, text: item.chunk.text.slice(0, maxChars) });
      break;
    }

    if (used + cost > config.evidenceTokenBudget) continue;

    blocks.push({ number: blocks.length + 1, item, text: item.chunk.text });
    used += cost;
  }

  return blocks;
}

function toCitation(block: PromptBlock): Citation {
  const { chunk } = block.item;
  return {
    chunkId: chunk.id,
    path: chunk.path,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    ...(chunk.symbol !== undefined ? { symbol: chunk.symbol } : {}),
  };
}

/**
 * Map `[n]` markers in generated text to the blocks they name
 *
 * @remarks
 * Markers with no matching block are ignored. When the text cites nothing,
 * every block is cited.
 */
export function extractCitations(
  text: string,
  blocks: readonly PromptBlock[]
): readonly Citation[] {
  const byNumber = new Map(
    blocks.map((block): [number, PromptBlock] => [block.number, block])
  );
  const cited: PromptBlock[] = [];
  const seen = new Set<number>();

  for (const match of text.matchAll(/\[(\d+)\]/g)) {
    const number = Number(match[1]);
    const block = byNumber.get(number);
    if (block && !seen.has(number)) {
      seen.add(number);
      cited.push(block);
    }
  }

  return (cited.length > 0 ? cited : blocks).map(toCitation);
}

/**
 * Builds grounded prompts from evidence and turns model output into cited
 * answers
 */
export class Synthesizer {
  private readonly config: SynthesizerConfig;

  constructor(
    private readonly generator: GenerationCapability,
    config?: Partial<SynthesizerConfig>
  ) {
    this.config = { ...DEFAULT_SYNTHESIZER_CONFIG, ...config };
  }

  /** The explicit answer for empty evidence */
  insufficientEvidence(): Answer {
    return {
      text: INSUFFICIENT_EVIDENCE_TEXT,
      citations: [],
      insufficientEvidence: true,
    };
  }

  buildPrompt(
    question: string,
    history: readonly Turn[],
    blocks: readonly PromptBlock[]
  ): string {
    const evidence = blocks
      .map((block) => {
        const fence = block.text.includes("```") ? "~~~~" : "```";
        return `[${block.number}] ${formatLocation(block.item.chunk)}\n${fence}${block.item.chunk.language}\n${block.text}\n${fence}`;
      })
      .join("\n\n");

    const conversation = formatHistory(history, this.config.historyTurns);

    return `You are a code research assistant. Answer the question using ONLY the numbered evidence from the codebase below.

Rules:
- Cite every claim with the evidence number in square brackets, e.g. [1].
- If the evidence does not answer the question, say so instead of guessing.
- Refer to code by file path and line numbers.
${conversation ? `\nCONVERSATION SO FAR:\n${conversation}\n` : ""}
EVIDENCE:
${evidence}

QUESTION: ${sanitizeForPrompt(question)}`;
  }

  /**
   * Produce a cited answer from the evidence
   * @returns The insufficient-evidence answer without calling the generator
   * when the evidence is empty
   * @throws GenerationError if the generator fails or returns nothing
   */
  async synthesize(
    question: string,
    history: readonly Turn[],
    evidence: readonly EvidenceItem[],
    options: RequestOptions = {}
  ): Promise<Answer> {
    if (evidence.length === 0) {
      return this.insufficientEvidence();
    }

    const blocks = selectEvidence(evidence, this.config);
    const prompt = this.buildPrompt(question, history, blocks);
    logger.debug(
      `[Synthesizer] Prompt with ${blocks.length}/${evidence.length} evidence blocks`
    );

    let text: string;
    try {
      const result = await withTimeout(
        abortable(
          this.generator.complete(
            prompt,
            { temperature: 0.2, maxTokens: 2048 },
            options
          ),
          options.signal
        ),
        { timeoutMs: DEFAULT_TIMEOUTS.completion, context: "Answer generation" }
      );
      text = result.text.trim();
    } catch (error) {
      if (options.signal?.aborted || isAppError(error)) throw error;
      throw new GenerationError(
        `Answer generation failed: ${toError(error).message}`,
        undefined,
        toError(error)
      );
    }

    if (!text) {
      throw new GenerationError("Answer generation returned empty text");
    }

    return {
      text,
      citations: extractCitations(text, blocks),
      insufficientEvidence: false,
    };
  }
}
