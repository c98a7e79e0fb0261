/**
 * fasta-codestream - streaming FASTA code reader and writer
 *
 * Reads FASTA files as a lazy stream of single-character codes with their
 * read positions and metadata, and writes such streams back as wrapped FASTA.
 */

// Compression infrastructure
export {
  type ChunkEncoder,
  CompressionDetector,
  CompressionService,
  type CompressionServiceShape,
  GzipCodec,
} from './compression';
// Error types
export {
  CodestreamError,
  CompressionError,
  FileError,
  SinkWriteError,
  SourceReadError,
  StreamError,
  ValidationError,
} from './errors';
// FASTA code streams
export * from './formats/fasta';
// File I/O infrastructure
export { createStream, exists, FileReader, readRawHead } from './io/file-reader';
export { type FileWriteHandle, openForWriting } from './io/file-writer';
export { readLines, splitLines } from './io/stream-utils';
// Core types
export type {
  CompressionFormat,
  FileReaderOptions,
  GzipLevel,
  LineProcessingResult,
  TextEncoding,
  WriteOptions,
} from './types';
export {
  CompressionFormatSchema,
  FileReaderOptionsSchema,
  TextEncodingSchema,
  WriteOptionsSchema,
} from './types';
