/**
 * Entry points for obtaining {@link FastaData} from any input
 *
 * @example Reading a gzip file and re-wrapping it at 60 columns
 * ```typescript
 * const data = load({ writer: { lineWidth: 60 } }).fromFile("genome.fasta.gz");
 * await data.write().toFile("genome.60.fasta");
 * ```
 */

import { GzipCodec } from "../../compression";
import type { CompressionFormat, FileReaderOptions, TextEncoding } from "../../types";
import { recordsFromCodes, recordsFromRaw } from "./code";
import { FastaData } from "./data";
import { FastaCodeParser } from "./parser";
import type {
  Code,
  FastaCodeParserOptions,
  FastaCodeWriterOptions,
  LineSource,
  RecordSource,
} from "./types";

export interface LoadOptions {
  readonly parser?: FastaCodeParserOptions;
  readonly writer?: FastaCodeWriterOptions;
}

export interface StreamLoadOptions {
  /** Text encoding of the stream (default: the parser's encoding) */
  readonly encoding?: TextEncoding;
  /** Set to 'gzip' to decompress the stream (default: 'none') */
  readonly compressionFormat?: CompressionFormat;
}

export interface FastaLoader {
  /** Parse FASTA text held in memory */
  fromString(data: string): FastaData;
  /** Parse a sync or async sequence of lines */
  fromLines(lines: LineSource): FastaData;
  /** Parse a byte stream */
  fromStream(stream: ReadableStream<Uint8Array>, options?: StreamLoadOptions): FastaData;
  /** Parse a file; gzip is detected from the `.gz` suffix unless overridden */
  fromFile(filePath: string, options?: FileReaderOptions): FastaData;
  /** Wrap records that already exist */
  fromSequence(records: RecordSource): FastaData;
  /** Wrap codes as records with empty metadata, keeping their positions */
  fromCodeSequence(codes: Iterable<Code> | AsyncIterable<Code>): FastaData;
  /** Wrap bare characters, numbering them from 0 */
  fromRawSequence(characters: Iterable<string>): FastaData;
}

/**
 * Create a loader; all data it returns shares the given parser and writer options
 */
export function load(options: LoadOptions = {}): FastaLoader {
  const parserOptions = options.parser ?? {};
  const parser = new FastaCodeParser(parserOptions);
  const wrap = (records: RecordSource): FastaData => new FastaData(records, options.writer);

  return {
    fromString: (data) => wrap(parser.parseString(data)),

    fromLines: (lines) => wrap(parser.parseAsyncLines(lines)),

    fromStream: (stream, streamOptions = {}) => {
      const source =
        streamOptions.compressionFormat === "gzip" ? GzipCodec.wrapStream(stream) : stream;
      const streamParser =
        streamOptions.encoding === undefined
          ? parser
          : new FastaCodeParser({ ...parserOptions, encoding: streamOptions.encoding });
      return wrap(streamParser.parse(source));
    },

    fromFile: (filePath, fileOptions) => wrap(parser.parseFile(filePath, fileOptions)),

    fromSequence: (records) => wrap(records),

    fromCodeSequence: (codes) => wrap(recordsFromCodes(codes)),

    fromRawSequence: (characters) => wrap(recordsFromRaw(characters)),
  };
}
