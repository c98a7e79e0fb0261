/**
 * Type definitions for FASTA code stream reading and writing
 *
 * A parsed FASTA file is a flat sequence of {@link CodeRecord}s: one record per
 * sequence character, each carrying the description/comment block that preceded it.
 */

/**
 * One sequence character and its zero-based read position in the code stream.
 * Metadata and blank lines do not advance the position.
 */
export interface Code {
  readonly value: string;
  readonly position: number;
}

/**
 * Description (`>`) and comment (`;`) lines of the most recent metadata block.
 *
 * The changed flags are true only on the first record after the block; every
 * later record reports the same lists with both flags false.
 */
export interface Metadata {
  readonly descriptions: readonly string[];
  readonly comments: readonly string[];
  readonly descriptionChanged: boolean;
  readonly commentChanged: boolean;
}

/**
 * A code together with the metadata snapshot taken when it was read
 */
export interface CodeRecord {
  readonly code: Code;
  readonly metadata: Metadata;
}

/**
 * Role of one trimmed input line
 */
export type LineClassification =
  | { readonly kind: "description"; readonly text: string }
  | { readonly kind: "comment"; readonly text: string }
  | { readonly kind: "blank" }
  | { readonly kind: "code"; readonly text: string };

/**
 * Metadata accumulator states
 */
export enum MetadataState {
  IDLE, // Start of input, or the last line was code data
  IN_METADATA_BLOCK, // One or more description/comment lines just consumed
}

/**
 * Forward-only source of text lines
 */
export type LineSource = Iterable<string> | AsyncIterable<string>;

/**
 * Forward-only source of code records
 */
export type RecordSource = Iterable<CodeRecord> | AsyncIterable<CodeRecord>;

/**
 * Destination for serialized FASTA text.
 *
 * `close` is called exactly once per write, on success and on failure.
 */
export interface FastaSink {
  write(chunk: string): void | Promise<void>;
  close(): void | Promise<void>;
  /** Called instead of `close` when writing stops on an error */
  abort?(reason: unknown): void | Promise<void>;
}

/**
 * Warning callback shared by the parser and writer
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * FASTA code parser options
 */
export interface FastaCodeParserOptions {
  /** Encoding used when decoding byte streams (default: 'utf8') */
  readonly encoding?: "utf8" | "latin1";
  /** Receives non-fatal findings such as a dropped trailing metadata block */
  readonly onWarning?: WarningHandler;
}

/**
 * FASTA code writer options
 */
export interface FastaCodeWriterOptions {
  /** Codes per output line (default: 80) */
  readonly lineWidth?: number;
  /** Line terminator (default: '\n') */
  readonly lineEnding?: "\n" | "\r\n";
  /** Receives secondary failures, such as a sink that cannot be closed after an error */
  readonly onWarning?: WarningHandler;
}
