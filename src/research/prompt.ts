import type { Chunk } from "../rag/types.js";
import type { Turn } from "./types.js";

/** Maximum question length placed in a prompt */
const MAX_QUESTION_LENGTH = 2000;

/**
 * Remove control characters that could manipulate output
 */
function removeControlCharacters(text: string): string {
  // Keeps tab, newline and carriage return
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "")
    .replace(/[\u200B-\u200F\u2028-\u202F\uFEFF]/g, "");
}

/**
 * Sanitize user text before it is placed in a prompt
 *
 * @remarks
 * NFKC-normalizes homoglyphs, strips control characters, filters common
 * instruction-override phrases and role markers, caps the length and escapes
 * code fences.
 */
export function sanitizeForPrompt(
  text: string,
  maxLength = MAX_QUESTION_LENGTH
): string {
  let sanitized = removeControlCharacters(text.normalize("NFKC"));

  sanitized = sanitized
    .replace(
      /ignore\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?|context)/gi,
      "[filtered]"
    )
    .replace(
      /disregard\s+(all\s+)?(previous|above|prior)\s+(instructions?|prompts?)/gi,
      "[filtered]"
    )
    .replace(/you\s+are\s+now\s+/gi, "[filtered] ")
    .replace(/new\s+instructions?\s*:/gi, "[filtered]")
    .replace(/<\/?(system|human|assistant|user)>/gi, "[filtered]")
    .replace(/\b(Human|Assistant|System|User):\s*/g, "[filtered] ");

  sanitized = sanitized.substring(0, maxLength);

  return sanitized.replace(/```/g, "\\`\\`\\`").trim();
}

/**
 * `path:start-end (symbol)` label of a chunk
 */
export function formatLocation(chunk: Chunk): string {
  const range = `${chunk.path}:${chunk.startLine}-${chunk.endLine}`;
  return chunk.symbol ? `${range} (${chunk.symbol})` : range;
}

/**
 * Render the last `turns` turns of a conversation, oldest first
 */
export function formatHistory(history: readonly Turn[], turns: number): string {
  if (turns <= 0 || history.length === 0) return "";

  return history
    .slice(-turns)
    .map(
      (turn) =>
        `Q: ${sanitizeForPrompt(turn.question)}\nA: ${sanitizeForPrompt(turn.answer, 4000)}`
    )
    .join("\n\n");
}
