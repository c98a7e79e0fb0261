/**
 * Stream processing utilities for line-oriented text input
 *
 * Turns byte streams into lazy line sequences. Nothing is read from the
 * underlying stream until the consumer asks for the next line.
 */

import { StreamError } from "../errors";
import type { LineProcessingResult, TextEncoding } from "../types";

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * Handles line buffering so complete lines are yielded even when chunks
 * don't align with line boundaries. Lines end at `\n` or `\r\n`; the
 * terminator is not part of the yielded line.
 *
 * If the consumer stops early (`break`, `return()` or a thrown error), the
 * stream is cancelled so its underlying resource is released.
 *
 * @param stream Stream of binary data to process
 * @param encoding Text encoding to use (default: 'utf8')
 * @yields Complete lines of text
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream('/path/to/genome.fasta');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('>')) {
 *     console.log('Found header:', line);
 *   }
 * }
 * ```
 */
export async function* readLines(
  stream: ReadableStream<Uint8Array>,
  encoding: TextEncoding = "utf8"
): AsyncGenerator<string, void, undefined> {
  if (stream.locked) {
    throw new StreamError("Cannot read lines from a locked stream", "read");
  }

  const reader = stream.getReader();
  const decoder = new TextDecoder(encoding === "latin1" ? "latin1" : "utf-8");
  let buffer = "";
  let finished = false;

  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        // An errored stream has already released its source
        finished = true;
        throw error;
      }
      const { done, value } = chunk;

      if (done) {
        finished = true;
        buffer += decoder.decode();
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      const result = processBuffer(buffer);
      buffer = result.remainder;

      for (const line of result.lines) {
        yield line;
      }
    }

    if (buffer.length > 0) {
      yield buffer;
    }
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and an unterminated remainder
 *
 * @param buffer Text buffer to process
 * @returns Complete lines (without terminators) and the remainder
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;
  let newline = buffer.indexOf("\n", lineStart);

  while (newline !== -1) {
    const lineEnd = newline > lineStart && buffer[newline - 1] === "\r" ? newline - 1 : newline;
    lines.push(buffer.slice(lineStart, lineEnd));
    lineStart = newline + 1;
    newline = buffer.indexOf("\n", lineStart);
  }

  return {
    lines,
    remainder: buffer.slice(lineStart),
  };
}

/**
 * Split an in-memory string into lines, accepting `\n` and `\r\n`
 */
export function splitLines(data: string): string[] {
  return data.split(/\r?\n/);
}
