/**
 * Effect-based compression service for symmetric I/O
 *
 * The file reader and writer obtain their compressor/decompressor through this
 * service tag; `CompressionService.Live` is the fflate-backed implementation.
 *
 * @example Using the compression service with Effect
 * ```typescript
 * import { Effect } from "effect";
 *
 * const program = Effect.gen(function* () {
 *   const svc = yield* CompressionService;
 *   return svc.createEncoder("gzip", 6);
 * });
 *
 * const encoder = Effect.runSync(program.pipe(Effect.provide(CompressionService.Live)));
 * ```
 */

import { Context, Layer } from "effect";
import type { CompressionFormat, GzipLevel } from "../types";
import { type ChunkEncoder, createEncoder, createStream } from "./gzip";

// =============================================================================
// SERVICE SHAPE (Interface)
// =============================================================================

export interface CompressionServiceShape {
  /**
   * Create an incremental encoder; `none` passes chunks through unchanged
   */
  readonly createEncoder: (format: CompressionFormat, level: GzipLevel) => ChunkEncoder;

  /**
   * Create a decompression transform stream; `none` passes chunks through unchanged
   */
  readonly createDecompressionStream: (
    format: CompressionFormat
  ) => TransformStream<Uint8Array, Uint8Array>;
}

// =============================================================================
// SERVICE TAG (Effect 3.x Class-Based Pattern)
// =============================================================================

export class CompressionService extends Context.Tag("fasta-codestream/CompressionService")<
  CompressionService,
  CompressionServiceShape
>() {
  /**
   * Gzip compression service layer backed by fflate
   */
  static readonly Live: Layer.Layer<CompressionService> = Layer.succeed(
    CompressionService,
    createGzipService()
  );
}

// =============================================================================
// SERVICE IMPLEMENTATIONS
// =============================================================================

const passthroughEncoder: ChunkEncoder = {
  push: (chunk) => (chunk.length > 0 ? [chunk] : []),
};

function createGzipService(): CompressionServiceShape {
  return {
    createEncoder: (format, level) =>
      format === "gzip" ? createEncoder(level) : passthroughEncoder,

    createDecompressionStream: (format) =>
      format === "gzip" ? createStream() : new TransformStream<Uint8Array, Uint8Array>(),
  };
}
