/**
 * File writing operations using Effect Platform
 *
 * All Effect plumbing stays behind a Promise-based API. Output is gzip
 * compressed incrementally when the path ends in `.gz` (or the caller asks
 * for it), so arbitrarily long code streams can be written without
 * buffering them.
 *
 * @module file-writer
 */

import { FileSystem, Path } from "@effect/platform";
import { type } from "arktype";
import { Effect } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, ValidationError } from "../errors";
import type { CompressionFormat, GzipLevel, WriteOptions } from "../types";
import { WriteOptionsSchema } from "../types";
import { getPlatform, runEffect } from "./runtime";

const EMPTY_CHUNK = new Uint8Array(0);

/**
 * Handle for writing to a file multiple times within a scope
 *
 * The file is automatically closed when the callback completes or throws.
 */
export interface FileWriteHandle {
  /**
   * Write string content to the file (UTF-8)
   */
  writeString(content: string): Promise<void>;

  /**
   * Write binary data to the file
   */
  writeBytes(content: Uint8Array): Promise<void>;
}

/**
 * Open file for writing and execute callback with write handle
 *
 * Parent directories are created as needed. The file is opened with 644
 * permissions, truncated, and closed through Effect's scope when the
 * callback settles. With gzip selected every write is pushed through one
 * incremental compressor whose trailer is written after the callback
 * succeeds.
 *
 * @param path - File path to open (creates if not exists, overwrites if exists)
 * @param callback - Function that receives write handle and returns result
 * @param options - Compression settings
 * @returns Promise resolving to callback's return value
 * @throws {FileError} When the file cannot be opened or written
 * @throws {ValidationError} When the options are rejected
 *
 * @example Streaming with automatic gzip compression
 * ```typescript
 * await openForWriting("codes.fasta.gz", async (handle) => {
 *   await handle.writeString(">chr1\n");
 *   await handle.writeString("ACGT\n");
 * });
 * ```
 */
export async function openForWriting<T>(
  path: string,
  callback: (handle: FileWriteHandle) => Promise<T>,
  options: WriteOptions = {}
): Promise<T> {
  const validatedOptions = validateOptions(options);
  const format = resolveCompression(path, validatedOptions);
  const level: GzipLevel = validatedOptions.compressionLevel ?? 6;
  const textEncoder = new TextEncoder();

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathService = yield* Path.Path;
    const compressionService = yield* CompressionService;

    const file = yield* Effect.gen(function* () {
      const parentDir = pathService.dirname(path);
      if (!(yield* fs.exists(parentDir))) {
        yield* fs.makeDirectory(parentDir, { recursive: true });
      }
      return yield* fs.open(path, { flag: "w", mode: 0o644 });
    }).pipe(Effect.mapError((error) => FileError.fromSystemError("open", path, error)));

    const encoder = compressionService.createEncoder(format, level);

    const writeEncoded = (chunk: Uint8Array, final: boolean): Effect.Effect<void, unknown> =>
      Effect.try({
        try: () => encoder.push(chunk, final),
        catch: (error) => error,
      }).pipe(
        Effect.flatMap((chunks) =>
          Effect.forEach(chunks, (encoded) => file.writeAll(encoded), { discard: true }).pipe(
            Effect.mapError((error) => FileError.fromSystemError("write", path, error))
          )
        )
      );

    const handle: FileWriteHandle = {
      writeString: (content) => runEffect(writeEncoded(textEncoder.encode(content), false)),
      writeBytes: (content) => runEffect(writeEncoded(content, false)),
    };

    const result = yield* Effect.tryPromise({
      try: () => callback(handle),
      catch: (error) => error,
    });

    yield* writeEncoded(EMPTY_CHUNK, true);

    return result;
  });

  return runEffect(
    program.pipe(
      Effect.scoped,
      Effect.provide(CompressionService.Live),
      Effect.provide(getPlatform())
    )
  );
}

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function validateOptions(options: WriteOptions): WriteOptions {
  const validationResult = WriteOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid write options: ${validationResult.summary}`);
  }
  return options;
}

function resolveCompression(filePath: string, options: WriteOptions): CompressionFormat {
  if (options.autoCompress === false) {
    return "none";
  }
  const format = options.compressionFormat ?? "none";
  return format === "none" ? CompressionDetector.fromExtension(filePath) : format;
}
