// ===== Types =====

export interface DocSection {
  /** Heading text, null for content before the first heading */
  readonly heading: string | null;
  /** Heading level 1-6, 0 for the preamble */
  readonly level: number;
  /** 1-indexed, inclusive */
  readonly startLine: number;
  /** 1-indexed, inclusive; trailing blank lines are excluded */
  readonly endLine: number;
}

// ===== Helper Functions =====

const HEADING_REGEX = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const FENCE_REGEX = /^\s*(```|~~~)/;

/**
 * Find the last non-blank line in [start, end], or start - 1 when all are blank
 */
function lastContentLine(
  lines: readonly string[],
  start: number,
  end: number
): number {
  let last = end;
  while (last >= start && (lines[last - 1] ?? "").trim() === "") {
    last--;
  }
  return last;
}

/**
 * Length of a YAML frontmatter block at the top of the document, in lines
 */
function frontmatterLength(lines: readonly string[]): number {
  if (lines[0] !== "---") return 0;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i] === "---") return i + 1;
  }
  return 0;
}

// ===== Public Functions =====

/**
 * Split markdown into sections by ATX headings
 *
 * @remarks
 * Headings inside fenced code blocks do not start sections. Frontmatter stays
 * in the preamble. Sections with no content lines at all are dropped; a lone
 * heading is kept.
 */
export function extractMarkdownSections(content: string): readonly DocSection[] {
  const lines = content.split("\n");
  const sections: DocSection[] = [];

  let heading: string | null = null;
  let level = 0;
  let sectionStart = 1;
  let inFence = false;

  const close = (endLine: number): void => {
    const end = lastContentLine(lines, sectionStart, endLine);
    if (end < sectionStart) return;
    // Skip leading blank lines of the preamble
    let start = sectionStart;
    while (start < end && (lines[start - 1] ?? "").trim() === "") start++;
    sections.push({ heading, level, startLine: start, endLine: end });
  };

  const skip = frontmatterLength(lines);

  for (let i = skip; i < lines.length; i++) {
    const line = lines[i] ?? "";

    if (FENCE_REGEX.test(line)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const match = line.match(HEADING_REGEX);
    if (!match) continue;

    close(i);
    heading = match[2] ?? "";
    level = match[1]?.length ?? 1;
    sectionStart = i + 1;
  }

  close(lines.length);
  return sections;
}
