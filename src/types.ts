/**
 * Shared I/O types and ArkType validation schemas
 *
 * The FASTA data model (codes, metadata, records) lives beside its parser in
 * `formats/fasta/types.ts`; this module holds what the file, stream and
 * compression layers share.
 */

import { type } from "arktype";

/**
 * Compression formats the I/O layer understands
 */
export type CompressionFormat = "gzip" | "none";

/**
 * Text encodings accepted for FASTA input
 */
export type TextEncoding = "utf8" | "latin1";

/**
 * Gzip compression levels (0 = store, 9 = smallest output)
 */
export type GzipLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * File reading configuration options
 */
export interface FileReaderOptions {
  /** Chunk size for streaming reads (default: 65536) */
  readonly bufferSize?: number;
  /** Text encoding for file content (default: 'utf8') */
  readonly encoding?: TextEncoding;
  /** Whether to decompress gzip files automatically (default: true) */
  readonly autoDecompress?: boolean;
  /** Override compression detection (default: detected from the file extension) */
  readonly compressionFormat?: CompressionFormat;
}

/**
 * File writing configuration options
 *
 * Mirrors FileReaderOptions for symmetric read/write API design.
 */
export interface WriteOptions {
  /** Compress based on the file extension (default: true) */
  readonly autoCompress?: boolean;
  /** Override compression detection (default: detected from the file extension) */
  readonly compressionFormat?: CompressionFormat;
  /** Gzip compression level (default: 6) */
  readonly compressionLevel?: GzipLevel;
}

/**
 * Complete lines split out of a decoded text buffer
 */
export interface LineProcessingResult {
  readonly lines: string[];
  /** Trailing text without a line terminator yet */
  readonly remainder: string;
}

export const CompressionFormatSchema = type('"gzip"|"none"');

export const TextEncodingSchema = type('"utf8"|"latin1"');

export const FileReaderOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "encoding?": TextEncodingSchema,
  "autoDecompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
});

export const WriteOptionsSchema = type({
  "autoCompress?": "boolean",
  "compressionFormat?": CompressionFormatSchema,
  "compressionLevel?": "0<=number<=9",
}).narrow((options, ctx) => {
  if (options.compressionLevel !== undefined && !Number.isInteger(options.compressionLevel)) {
    return ctx.reject({
      expected: "an integer compression level between 0 and 9",
      actual: `${options.compressionLevel}`,
      path: ["compressionLevel"],
    });
  }
  return true;
});
