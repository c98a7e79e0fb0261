/**
 * Line classification for FASTA input
 *
 * Tree-shakeable helpers; every line maps to exactly one classification, so
 * nothing here can fail.
 */

import { PREFIX_COMMENT, PREFIX_DESCRIPTION, WHITESPACE } from "./constants";
import type { LineClassification } from "./types";

/**
 * Classify one input line.
 *
 * The line is trimmed first; the `>` or `;` marker is removed from metadata
 * text but nothing after it is trimmed again, so `> note` keeps its space.
 *
 * @example
 * ```typescript
 * classifyLine(">chr1 assembled");  // { kind: "description", text: "chr1 assembled" }
 * classifyLine("  ACGT  ");         // { kind: "code", text: "ACGT" }
 * ```
 */
function classifyLine(line: string): LineClassification {
  const trimmed = line.trim();

  if (trimmed.startsWith(PREFIX_DESCRIPTION)) {
    return { kind: "description", text: trimmed.slice(PREFIX_DESCRIPTION.length) };
  }
  if (trimmed.startsWith(PREFIX_COMMENT)) {
    return { kind: "comment", text: trimmed.slice(PREFIX_COMMENT.length) };
  }
  if (trimmed.length === 0) {
    return { kind: "blank" };
  }
  return { kind: "code", text: trimmed };
}

/**
 * Check if a classified line belongs to a metadata block
 */
function isMetadataLine(
  line: LineClassification
): line is Extract<LineClassification, { kind: "description" | "comment" }> {
  return line.kind === "description" || line.kind === "comment";
}

/**
 * Lazily yield the codes of a code line, skipping embedded whitespace
 */
function* extractCodes(text: string): Generator<string, void, undefined> {
  for (const char of text) {
    if (!WHITESPACE.test(char)) {
      yield char;
    }
  }
}

export { classifyLine, isMetadataLine, extractCodes };
