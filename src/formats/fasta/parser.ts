/**
 * FASTA code stream parser
 *
 * Turns lines of FASTA text into a lazy, single-pass sequence of
 * {@link CodeRecord}s: one record per sequence character, numbered from 0,
 * each carrying the metadata block that preceded it.
 *
 * Lines are pulled one at a time. Closing the returned iterator early
 * (`break` in a `for...of`) closes the underlying line source as well.
 */

import { type } from "arktype";
import { SourceReadError, ValidationError } from "../../errors";
import { createStream } from "../../io/file-reader";
import { readLines, splitLines } from "../../io/stream-utils";
import type { FileReaderOptions, TextEncoding } from "../../types";
import { TextEncodingSchema } from "../../types";
import { classifyLine, extractCodes } from "./classifier";
import { MetadataAccumulator } from "./state-machine";
import type { CodeRecord, FastaCodeParserOptions, LineSource, WarningHandler } from "./types";

const FastaCodeParserOptionsSchema = type({
  "encoding?": TextEncodingSchema,
});

/**
 * Streaming FASTA code parser
 *
 * @example Reading codes with their headers
 * ```typescript
 * const parser = new FastaCodeParser();
 * for (const { code, metadata } of parser.parseString(">chr1\nACGT")) {
 *   if (metadata.descriptionChanged) console.log(metadata.descriptions);
 *   console.log(code.position, code.value);
 * }
 * ```
 */
class FastaCodeParser {
  private readonly encoding: TextEncoding;
  private readonly onWarning: WarningHandler;

  constructor(options: FastaCodeParserOptions = {}) {
    const validationResult = FastaCodeParserOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA parser options: ${validationResult.summary}`);
    }

    this.encoding = options.encoding ?? "utf8";
    this.onWarning =
      options.onWarning ??
      ((warning: string, lineNumber?: number): void => {
        console.warn(`FASTA Warning (line ${lineNumber}): ${warning}`);
      });
  }

  /**
   * Parse a synchronous sequence of lines
   *
   * @throws {SourceReadError} When the line source fails; records already
   * yielded stay valid
   */
  *parseLines(lines: Iterable<string>): Generator<CodeRecord, void, undefined> {
    const accumulator = new MetadataAccumulator();
    let lineNumber = 0;
    let iterator: Iterator<string>;
    try {
      iterator = lines[Symbol.iterator]();
    } catch (error) {
      throw SourceReadError.fromCause(error, lineNumber);
    }
    let exhausted = false;

    try {
      while (true) {
        let next: IteratorResult<string>;
        try {
          next = iterator.next();
        } catch (error) {
          exhausted = true;
          throw SourceReadError.fromCause(error, lineNumber);
        }
        if (next.done === true) {
          exhausted = true;
          break;
        }
        lineNumber++;
        yield* recordsFromLine(accumulator, next.value);
      }
      this.warnOnPendingBlock(accumulator, lineNumber);
    } finally {
      if (!exhausted) {
        iterator.return?.();
      }
    }
  }

  /**
   * Parse a synchronous or asynchronous sequence of lines
   *
   * @throws {SourceReadError} When the line source fails
   */
  async *parseAsyncLines(lines: LineSource): AsyncGenerator<CodeRecord, void, undefined> {
    const accumulator = new MetadataAccumulator();
    let lineNumber = 0;
    let iterator: Iterator<string> | AsyncIterator<string>;
    try {
      iterator = isAsyncSource(lines) ? lines[Symbol.asyncIterator]() : lines[Symbol.iterator]();
    } catch (error) {
      throw SourceReadError.fromCause(error, lineNumber);
    }
    let exhausted = false;

    try {
      while (true) {
        let next: IteratorResult<string>;
        try {
          next = await iterator.next();
        } catch (error) {
          exhausted = true;
          throw SourceReadError.fromCause(error, lineNumber);
        }
        if (next.done === true) {
          exhausted = true;
          break;
        }
        lineNumber++;
        yield* recordsFromLine(accumulator, next.value);
      }
      this.warnOnPendingBlock(accumulator, lineNumber);
    } finally {
      if (!exhausted) {
        await iterator.return?.();
      }
    }
  }

  /**
   * Parse FASTA text held in memory
   *
   * @example
   * ```typescript
   * const values = [...parser.parseString(">seq\nAC\nGT")].map((r) => r.code.value);
   * // ['A', 'C', 'G', 'T']
   * ```
   */
  *parseString(data: string): Generator<CodeRecord, void, undefined> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse a byte stream, decoding it with the configured encoding
   *
   * @throws {SourceReadError} When the stream errors, including gzip failures
   */
  async *parse(stream: ReadableStream<Uint8Array>): AsyncGenerator<CodeRecord, void, undefined> {
    yield* this.parseAsyncLines(readLines(stream, this.encoding));
  }

  /**
   * Parse a FASTA file; `.gz` files are decompressed on the fly
   *
   * @throws {SourceReadError} When the file cannot be opened or read
   * @example
   * ```typescript
   * for await (const record of parser.parseFile('/data/genome.fasta.gz')) {
   *   process(record.code);
   * }
   * ```
   */
  async *parseFile(
    filePath: string,
    options: FileReaderOptions = {}
  ): AsyncGenerator<CodeRecord, void, undefined> {
    let stream: ReadableStream<Uint8Array>;
    try {
      stream = await createStream(filePath, options);
    } catch (error) {
      throw new SourceReadError(
        `Failed to open FASTA source ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        error,
        0
      );
    }
    yield* this.parseAsyncLines(readLines(stream, options.encoding ?? this.encoding));
  }

  private warnOnPendingBlock(accumulator: MetadataAccumulator, lineNumber: number): void {
    if (accumulator.hasPendingBlock) {
      this.onWarning(
        "Metadata block at end of input is not followed by any code and was dropped",
        lineNumber
      );
    }
  }
}

function isAsyncSource(lines: LineSource): lines is AsyncIterable<string> {
  return typeof lines !== "string" && Symbol.asyncIterator in lines;
}

/**
 * Feed one raw line to the accumulator, yielding a record per code character
 */
function* recordsFromLine(
  accumulator: MetadataAccumulator,
  line: string
): Generator<CodeRecord, void, undefined> {
  const classification = classifyLine(line);
  if (classification.kind === "blank") {
    return;
  }

  accumulator.accept(classification);
  if (classification.kind === "code") {
    for (const value of extractCodes(classification.text)) {
      yield accumulator.emit(value);
    }
  }
}

export { FastaCodeParser };
