/**
 * Constructors for the FASTA code data model
 */

import { ValidationError } from "../../errors";
import type { Code, CodeRecord, Metadata } from "./types";

/**
 * Metadata of a record that never saw a description or comment line
 */
const EMPTY_METADATA: Metadata = Object.freeze({
  descriptions: Object.freeze([]),
  comments: Object.freeze([]),
  descriptionChanged: false,
  commentChanged: false,
});

function createCode(value: string, position: number): Code {
  if (value.length === 0) {
    throw new ValidationError("code value must not be empty");
  }
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new ValidationError(`read position must be a non-negative integer, got ${position}`);
  }
  return Object.freeze({ value, position });
}

/**
 * Copy of `code` at the same read position with a different character
 */
function withReplacedCode(code: Code, replacement: string): Code {
  return createCode(replacement, code.position);
}

function createCodeRecord(code: Code, metadata: Metadata = EMPTY_METADATA): CodeRecord {
  return Object.freeze({ code, metadata });
}

/**
 * Records for bare characters, numbered 0, 1, 2, ... with empty metadata
 */
function* recordsFromRaw(characters: Iterable<string>): Generator<CodeRecord, void, undefined> {
  let position = 0;
  for (const value of characters) {
    yield createCodeRecord(createCode(value, position++));
  }
}

/**
 * Records for existing codes, keeping their positions, with empty metadata
 */
async function* recordsFromCodes(
  codes: Iterable<Code> | AsyncIterable<Code>
): AsyncGenerator<CodeRecord, void, undefined> {
  for await (const code of codes) {
    yield createCodeRecord(code);
  }
}

export {
  EMPTY_METADATA,
  createCode,
  withReplacedCode,
  createCodeRecord,
  recordsFromRaw,
  recordsFromCodes,
};
