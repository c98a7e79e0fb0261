/**
 * Single-pass wrapper around a code record sequence
 *
 * A {@link FastaData} owns one record source and lets it be consumed exactly
 * once, in whichever shape the caller needs: records, characters, codes, a
 * string, or FASTA output.
 */

import { StreamError } from "../../errors";
import type { WriteOptions } from "../../types";
import type { Code, CodeRecord, FastaCodeWriterOptions, RecordSource } from "./types";
import { FastaCodeWriter } from "./writer";

/**
 * Terminal FASTA output operations of a {@link FastaData}
 */
export interface FastaDataWriter {
  /** Serialize all records into one string */
  toText(): Promise<string>;
  /** Serialize onto a byte stream; resolves to the number of characters written */
  toStream(stream: WritableStream<Uint8Array>): Promise<number>;
  /** Serialize into a file, gzip compressed for `.gz` paths */
  toFile(filePath: string, options?: WriteOptions): Promise<number>;
}

/**
 * @example
 * ```typescript
 * const data = load().fromString(">seq\nAC\nGT");
 * await data.asString(); // "ACGT"
 * ```
 */
export class FastaData {
  private consumed = false;

  constructor(
    private readonly source: RecordSource,
    private readonly writerOptions: FastaCodeWriterOptions = {}
  ) {}

  /**
   * The underlying records, in input order
   *
   * @throws {StreamError} If this data was already consumed
   */
  records(): AsyncGenerator<CodeRecord, void, undefined> {
    return iterate(this.claim("records"));
  }

  /**
   * Code characters only
   *
   * @throws {StreamError} If this data was already consumed
   */
  asCharacters(): AsyncGenerator<string, void, undefined> {
    return mapRecords(this.records(), (record) => record.code.value);
  }

  /**
   * Codes without their metadata
   *
   * @throws {StreamError} If this data was already consumed
   */
  asCodes(): AsyncGenerator<Code, void, undefined> {
    return mapRecords(this.records(), (record) => record.code);
  }

  /**
   * All code characters concatenated, without metadata or line breaks
   */
  async asString(): Promise<string> {
    let text = "";
    for await (const value of this.asCharacters()) {
      text += value;
    }
    return text;
  }

  /**
   * FASTA output of the records
   *
   * @throws {StreamError} If this data was already consumed
   */
  write(): FastaDataWriter {
    const source = this.claim("write");
    const writer = new FastaCodeWriter(this.writerOptions);

    return {
      toText: async () => {
        let text = "";
        for await (const chunk of writer.formatChunks(source)) {
          text += chunk;
        }
        return text;
      },
      toStream: (stream) => writer.writeToStream(source, stream),
      toFile: (filePath, options) => writer.writeToFile(source, filePath, options),
    };
  }

  /** True once any consuming operation has been started */
  get isConsumed(): boolean {
    return this.consumed;
  }

  private claim(operation: string): RecordSource {
    if (this.consumed) {
      throw new StreamError(
        `FASTA data can only be consumed once; '${operation}' called after it was already read`,
        "read"
      );
    }
    this.consumed = true;
    return this.source;
  }
}

async function* iterate(source: RecordSource): AsyncGenerator<CodeRecord, void, undefined> {
  yield* source;
}

async function* mapRecords<T>(
  records: AsyncIterable<CodeRecord>,
  project: (record: CodeRecord) => T
): AsyncGenerator<T, void, undefined> {
  for await (const record of records) {
    yield project(record);
  }
}
