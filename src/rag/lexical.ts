/**
 * Identifier-aware tokenization and lexical overlap scoring
 * @module src/rag/lexical
 */

/** Minimum query-token length for substring matches against indexed tokens */
const MIN_SUBSTRING_TOKEN_LENGTH = 3;

const IDENTIFIER_REGEX = /[A-Za-z0-9_$]+/g;

/**
 * Split an identifier into its camelCase / snake_case parts
 * @example splitIdentifier("parseHTTPResponse_v2") // ["parse", "http", "response", "v2"]
 */
export function splitIdentifier(identifier: string): readonly string[] {
  return identifier
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .split(/[\s_$]+/)
    .map((part) => part.toLowerCase())
    .filter((part) => part.length > 0);
}

/**
 * Tokenize text into lowercase terms
 *
 * @remarks
 * Each identifier contributes itself (lowercased) and its parts, so `getUser`
 * matches queries for `getuser`, `get` and `user`.
 */
export function tokenize(text: string): readonly string[] {
  const tokens: string[] = [];
  for (const match of text.matchAll(IDENTIFIER_REGEX)) {
    const identifier = match[0];
    const whole = identifier.toLowerCase().replace(/^[_$]+|[_$]+$/g, "");
    if (whole.length === 0) continue;

    tokens.push(whole);
    const parts = splitIdentifier(identifier);
    if (parts.length > 1) {
      tokens.push(...parts);
    }
  }
  return tokens;
}

/**
 * Distinct tokens of a text
 */
export function tokenSet(text: string): ReadonlySet<string> {
  return new Set(tokenize(text));
}

/**
 * Share of distinct query tokens present in the document, in [0, 1]
 *
 * @remarks
 * A query token matches when the document has it exactly, or, for tokens of
 * at least three characters, when it is a substring of a document token.
 */
export function lexicalOverlap(
  queryTokens: ReadonlySet<string>,
  documentTokens: ReadonlySet<string>
): number {
  if (queryTokens.size === 0) return 0;

  let matched = 0;
  for (const token of queryTokens) {
    if (documentTokens.has(token)) {
      matched++;
      continue;
    }
    if (token.length < MIN_SUBSTRING_TOKEN_LENGTH) continue;
    for (const candidate of documentTokens) {
      if (candidate.includes(token)) {
        matched++;
        break;
      }
    }
  }

  return matched / queryTokens.size;
}
