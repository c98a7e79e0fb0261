/**
 * Compression module for FASTA files
 *
 * @example Streaming decompression
 * ```typescript
 * import { GzipCodec } from './compression';
 *
 * const decompressed = GzipCodec.wrapStream(compressedStream);
 * ```
 */

export { CompressionDetector } from "./detector";
export { type ChunkEncoder, GzipCodec } from "./gzip";
export { CompressionService, type CompressionServiceShape } from "./service";
export { CompressionError } from "../errors";
export type { CompressionFormat, GzipLevel } from "../types";
