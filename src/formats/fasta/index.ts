/**
 * FASTA Code Stream Module
 *
 * Reads FASTA text as a flat stream of single-character codes, each tagged
 * with its read position and the description/comment block it belongs to,
 * and writes such streams back as wrapped FASTA.
 *
 * @module fasta
 *
 * @example Counting codes per header
 * ```typescript
 * import { FastaCodeParser } from './formats/fasta';
 *
 * const counts = new Map<string, number>();
 * for await (const { metadata } of new FastaCodeParser().parseFile('genome.fa')) {
 *   const header = metadata.descriptions.join(' ');
 *   counts.set(header, (counts.get(header) ?? 0) + 1);
 * }
 * ```
 *
 * @example Re-wrapping a file
 * ```typescript
 * import { load } from './formats/fasta';
 *
 * await load({ writer: { lineWidth: 60 } }).fromFile('in.fa').write().toFile('out.fa.gz');
 * ```
 */

export { classifyLine, extractCodes, isMetadataLine } from "./classifier";
export {
  createCode,
  createCodeRecord,
  EMPTY_METADATA,
  recordsFromCodes,
  recordsFromRaw,
  withReplacedCode,
} from "./code";
export {
  DEFAULT_LINE_ENDING,
  DEFAULT_LINE_WIDTH,
  DEFAULT_RAW_HEAD_LENGTH,
  PREFIX_COMMENT,
  PREFIX_DESCRIPTION,
} from "./constants";
export { FastaData, type FastaDataWriter } from "./data";
export { type FastaLoader, load, type LoadOptions, type StreamLoadOptions } from "./loader";
export { FastaCodeParser } from "./parser";
export { MetadataAccumulator } from "./state-machine";
export type {
  Code,
  CodeRecord,
  FastaCodeParserOptions,
  FastaCodeWriterOptions,
  FastaSink,
  LineClassification,
  LineSource,
  Metadata,
  RecordSource,
  WarningHandler,
} from "./types";
export { MetadataState } from "./types";
export { createStreamSink, createStringSink, FastaCodeWriter, StringSink } from "./writer";
