/**
 * FASTA code stream writer
 *
 * Serializes {@link CodeRecord}s back into FASTA text. Metadata is written
 * only when a record's changed flags say a new block starts there, and codes
 * are packed into lines of a fixed width (80 by default). Wrapping is
 * counted across the whole stream; a new header does not restart the
 * column.
 */

import { type } from "arktype";
import { CompressionError, FileError, SinkWriteError, ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import type { WriteOptions } from "../../types";
import { DEFAULT_LINE_ENDING, DEFAULT_LINE_WIDTH, PREFIX_COMMENT, PREFIX_DESCRIPTION } from "./constants";
import type {
  CodeRecord,
  FastaCodeWriterOptions,
  FastaSink,
  RecordSource,
  WarningHandler,
} from "./types";

const FastaCodeWriterOptionsSchema = type({
  "lineWidth?": "number.integer>0",
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

/**
 * Column-tracking formatter for one write operation
 */
class RecordFormatter {
  private column = 0;

  constructor(
    private readonly lineWidth: number,
    private readonly lineEnding: string
  ) {}

  /**
   * Text for one record; ends with the line ending when the record fills a line
   */
  format(record: CodeRecord): string {
    const { code, metadata } = record;
    let text = "";

    if (metadata.descriptionChanged) {
      for (const description of metadata.descriptions) {
        text += `${this.lineEnding}${this.lineEnding}${PREFIX_DESCRIPTION}${description}${this.lineEnding}`;
      }
    }

    if (metadata.commentChanged) {
      const joined = metadata.comments.join(`${this.lineEnding}${PREFIX_COMMENT}`);
      if (joined.trim().length > 0) {
        text += `${this.lineEnding}${PREFIX_COMMENT}${joined}${this.lineEnding}`;
      }
    }

    text += code.value;
    this.column++;
    if (this.column % this.lineWidth === 0) {
      text += this.lineEnding;
    }

    return text;
  }
}

/**
 * FASTA code writer
 *
 * @example Writing parsed records back out
 * ```typescript
 * const parser = new FastaCodeParser();
 * const writer = new FastaCodeWriter();
 * const text = writer.formatRecords(parser.parseString(">seq\nACGT"));
 * // "\n\n>seq\nACGT"
 * ```
 */
class FastaCodeWriter {
  private readonly lineWidth: number;
  private readonly lineEnding: "\n" | "\r\n";
  private readonly onWarning: WarningHandler;

  constructor(options: FastaCodeWriterOptions = {}) {
    const validationResult = FastaCodeWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(`Invalid FASTA writer options: ${validationResult.summary}`);
    }

    this.lineWidth = options.lineWidth ?? DEFAULT_LINE_WIDTH;
    this.lineEnding = options.lineEnding ?? DEFAULT_LINE_ENDING;
    this.onWarning =
      options.onWarning ??
      ((warning: string): void => {
        console.warn(`FASTA Writer: ${warning}`);
      });
  }

  /**
   * Format a synchronous record sequence into one string
   */
  formatRecords(records: Iterable<CodeRecord>): string {
    const formatter = this.createFormatter();
    let text = "";
    for (const record of records) {
      text += formatter.format(record);
    }
    return text;
  }

  /**
   * Lazily format records into text chunks, one chunk per completed output line
   *
   * The last chunk holds whatever follows the final line break.
   */
  async *formatChunks(records: RecordSource): AsyncGenerator<string, void, undefined> {
    const formatter = this.createFormatter();
    let pending = "";

    for await (const record of records) {
      pending += formatter.format(record);
      if (pending.endsWith(this.lineEnding)) {
        yield pending;
        pending = "";
      }
    }

    if (pending.length > 0) {
      yield pending;
    }
  }

  /**
   * Write records to a sink, returning the number of characters written
   *
   * The sink is closed when writing completes. When writing stops on an
   * error it is aborted, or closed if it has no `abort`. Errors from the
   * record source propagate unchanged; sink failures become {@link SinkWriteError}.
   *
   * @throws {SinkWriteError} When the sink rejects a chunk or cannot be closed
   */
  async writeTo(records: RecordSource, sink: FastaSink): Promise<number> {
    let written = 0;

    try {
      for await (const chunk of this.formatChunks(records)) {
        try {
          await sink.write(chunk);
        } catch (error) {
          throw SinkWriteError.fromCause(error, written, "write");
        }
        written += chunk.length;
      }
    } catch (error) {
      await this.releaseAfterFailure(sink, written, error);
      throw error;
    }

    try {
      await sink.close();
    } catch (error) {
      throw SinkWriteError.fromCause(error, written, "close");
    }
    return written;
  }

  /**
   * Write records to a byte stream as UTF-8 text
   *
   * @throws {SinkWriteError} When the stream rejects a write
   */
  writeToStream(records: RecordSource, stream: WritableStream<Uint8Array>): Promise<number> {
    return this.writeTo(records, createStreamSink(stream));
  }

  /**
   * Write records to a file; `.gz` paths are gzip compressed
   *
   * @throws {SinkWriteError} When the file cannot be opened or written
   * @example
   * ```typescript
   * await writer.writeToFile(parser.parseFile('in.fasta'), 'out.fasta.gz');
   * ```
   */
  async writeToFile(
    records: RecordSource,
    filePath: string,
    options: WriteOptions = {}
  ): Promise<number> {
    try {
      return await openForWriting(
        filePath,
        (handle) =>
          this.writeTo(records, {
            write: (chunk) => handle.writeString(chunk),
            close: () => undefined,
          }),
        options
      );
    } catch (error) {
      if (!(error instanceof FileError || error instanceof CompressionError)) {
        throw error;
      }
      throw new SinkWriteError(
        `Failed to write FASTA file ${filePath}: ${error.message}`,
        error,
        0
      );
    }
  }

  private createFormatter(): RecordFormatter {
    return new RecordFormatter(this.lineWidth, this.lineEnding);
  }

  private async releaseAfterFailure(
    sink: FastaSink,
    written: number,
    reason: unknown
  ): Promise<void> {
    const action = sink.abort ? "abort" : "close";
    try {
      if (sink.abort) {
        await sink.abort(reason);
      } else {
        await sink.close();
      }
    } catch (releaseError) {
      this.onWarning(
        `Failed to ${action} FASTA sink after ${written} characters: ${releaseError instanceof Error ? releaseError.message : String(releaseError)}`
      );
    }
  }
}

/**
 * Sink collecting all written text in memory
 */
class StringSink implements FastaSink {
  private readonly chunks: string[] = [];
  private closed = false;

  write(chunk: string): void {
    if (this.closed) {
      throw new SinkWriteError("Cannot write to a closed string sink", undefined, this.text.length);
    }
    this.chunks.push(chunk);
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get text(): string {
    return this.chunks.join("");
  }
}

function createStringSink(): StringSink {
  return new StringSink();
}

/**
 * Sink encoding text as UTF-8 onto a web WritableStream
 *
 * The stream is closed together with the sink, or aborted with the failure
 * when writing stops on an error.
 */
function createStreamSink(stream: WritableStream<Uint8Array>): FastaSink {
  const writer = stream.getWriter();
  const encoder = new TextEncoder();

  return {
    write: (chunk) => writer.write(encoder.encode(chunk)),
    close: async () => {
      try {
        await writer.close();
      } finally {
        writer.releaseLock();
      }
    },
    abort: async (reason) => {
      try {
        await writer.abort(reason);
      } finally {
        writer.releaseLock();
      }
    },
  };
}

export { FastaCodeWriter, StringSink, createStringSink, createStreamSink };
