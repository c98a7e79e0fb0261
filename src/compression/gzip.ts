/**
 * Gzip streaming compression and decompression
 *
 * Both directions are built on fflate's incremental `Gzip`/`Gunzip` classes,
 * so large FASTA files are processed chunk by chunk without being held in
 * memory.
 */

import { Gunzip, Gzip } from "fflate";
import { CompressionError } from "../errors";
import type { GzipLevel } from "../types";
import { CompressionDetector } from "./detector";

const EMPTY_CHUNK = new Uint8Array(0);

/**
 * Incremental compressor: every push returns the output produced so far
 */
export interface ChunkEncoder {
  push(chunk: Uint8Array, final: boolean): Uint8Array[];
}

/**
 * Create an incremental gzip encoder
 *
 * @example
 * ```typescript
 * const encoder = createEncoder(6);
 * const head = encoder.push(new TextEncoder().encode(">seq\nACGT"), false);
 * const tail = encoder.push(new Uint8Array(0), true);
 * ```
 */
export function createEncoder(level: GzipLevel = 6): ChunkEncoder {
  const gzip = new Gzip({ level });
  let output: Uint8Array[] = [];
  gzip.ondata = (data): void => {
    if (data.length > 0) {
      output.push(data);
    }
  };

  return {
    push(chunk: Uint8Array, final: boolean): Uint8Array[] {
      try {
        gzip.push(chunk, final);
      } catch (err) {
        throw CompressionError.fromSystemError("gzip", "compress", err);
      }
      const produced = output;
      output = [];
      return produced;
    },
  };
}

/**
 * Create gzip decompression transform stream
 *
 * The leading bytes are checked for the gzip magic bytes before any data is
 * inflated, however the input happens to be chunked.
 *
 * @example Transform stream for pipeline processing
 * ```typescript
 * const lines = readLines(compressedStream.pipeThrough(createStream()));
 * ```
 */
export function createStream(): TransformStream<Uint8Array, Uint8Array> {
  const gunzip = new Gunzip();
  let bytesProcessed = 0;
  // Leading bytes held back until the two magic bytes can be checked
  let header: Uint8Array | null = EMPTY_CHUNK;

  const invalidMagic = (): CompressionError =>
    new CompressionError(
      "Invalid gzip magic bytes - file may not be gzip compressed",
      "gzip",
      "decompress",
      0
    );

  const inflate = (
    chunk: Uint8Array,
    final: boolean,
    controller: TransformStreamDefaultController<Uint8Array>
  ): void => {
    bytesProcessed += chunk.length;
    try {
      gunzip.push(chunk, final);
    } catch (err) {
      controller.error(CompressionError.fromSystemError("gzip", "stream", err, bytesProcessed));
    }
  };

  return new TransformStream<Uint8Array, Uint8Array>({
    start(controller): void {
      gunzip.ondata = (data): void => {
        if (data.length > 0) {
          controller.enqueue(data);
        }
      };
    },
    transform(chunk, controller): void {
      if (chunk.length === 0) {
        return;
      }
      if (header === null) {
        inflate(chunk, false, controller);
        return;
      }

      const leading: Uint8Array = new Uint8Array(header.length + chunk.length);
      leading.set(header, 0);
      leading.set(chunk, header.length);
      if (leading.length < 2) {
        header = leading;
        return;
      }
      header = null;
      if (CompressionDetector.fromMagicBytes(leading) !== "gzip") {
        controller.error(invalidMagic());
        return;
      }
      inflate(leading, false, controller);
    },
    flush(controller): void {
      if (header !== null && header.length > 0) {
        controller.error(invalidMagic());
        return;
      }
      inflate(EMPTY_CHUNK, true, controller);
    },
  });
}

/**
 * Wrap compressed readable stream with gzip decompression
 */
export function wrapStream(input: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return input.pipeThrough(createStream());
}

/**
 * Namespace export of the gzip helpers
 */
export const GzipCodec = {
  createEncoder,
  createStream,
  wrapStream,
} as const;
