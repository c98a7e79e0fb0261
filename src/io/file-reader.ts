/**
 * File reading for FASTA input
 *
 * Opens files through `@effect/platform`'s FileSystem service and exposes
 * them as web `ReadableStream`s, decompressing gzip input on the fly.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, CompressionService } from "../compression";
import { FileError, ValidationError } from "../errors";
import { DEFAULT_RAW_HEAD_LENGTH } from "../formats/fasta/constants";
import type { CompressionFormat, FileReaderOptions } from "../types";
import { FileReaderOptionsSchema } from "../types";
import { runEffect, runPlatformEffect } from "./runtime";

const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  bufferSize: 65536,
  encoding: "utf8",
  autoDecompress: true,
  compressionFormat: "none",
};

const FilePathSchema = type("string>0");

const MaxCharactersSchema = type("number.integer>=0");

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If the path is invalid or cannot be inspected
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await runPlatformEffect(program);
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Gzip input is decompressed when `compressionFormat` is `"gzip"` or the
 * path ends in `.gz`/`.gzip`, unless `autoDecompress` is false.
 *
 * @throws {FileError} If the file does not exist or cannot be opened
 * @throws {ValidationError} If the options are rejected
 *
 * @example
 * ```typescript
 * const stream = await createStream('/data/genome.fasta.gz');
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `File does not exist or is not a regular file: ${validatedPath}`,
      validatedPath,
      "open"
    );
  }

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return Stream.toReadableStream(fs.stream(validatedPath, { bufferSize: mergedOptions.bufferSize }));
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await runPlatformEffect(program);
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) {
    return stream;
  }
  return applyDecompression(stream, resolveCompression(validatedPath, mergedOptions));
}

/**
 * Read the first characters of a file as raw text, without parsing
 *
 * Line terminators are part of the returned text. Reading stops as soon as
 * `maxCharacters` characters have been decoded.
 *
 * @throws {FileError} If the file cannot be opened
 * @throws {ValidationError} If `maxCharacters` is not a non-negative integer
 */
export async function readRawHead(
  path: string,
  maxCharacters: number = DEFAULT_RAW_HEAD_LENGTH,
  options: FileReaderOptions = {}
): Promise<string> {
  const limit = MaxCharactersSchema(maxCharacters);
  if (limit instanceof type.errors) {
    throw new ValidationError(`Invalid raw head length: ${limit.summary}`);
  }

  const stream = await createStream(path, options);
  const reader = stream.getReader();
  const decoder = new TextDecoder(options.encoding === "latin1" ? "latin1" : "utf-8");
  let text = "";

  try {
    while (text.length < limit) {
      const { done, value } = await reader.read();
      if (done) {
        text += decoder.decode();
        return text.slice(0, limit);
      }
      text += decoder.decode(value, { stream: true });
    }
    await reader.cancel();
    return text.slice(0, limit);
  } finally {
    reader.releaseLock();
  }
}

export const FileReader = {
  exists,
  createStream,
  readRawHead,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

function resolveCompression(
  filePath: string,
  options: Required<FileReaderOptions>
): CompressionFormat {
  return options.compressionFormat === "none"
    ? CompressionDetector.fromExtension(filePath)
    : options.compressionFormat;
}

async function applyDecompression(
  stream: ReadableStream<Uint8Array>,
  format: CompressionFormat
): Promise<ReadableStream<Uint8Array>> {
  if (format === "none") {
    return stream;
  }

  const program = Effect.gen(function* () {
    const compressionService = yield* CompressionService;
    return stream.pipeThrough(compressionService.createDecompressionStream(format));
  });

  return runEffect(program.pipe(Effect.provide(CompressionService.Live)));
}

function validatePath(path: string): string {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid file reader options: ${validationResult.summary}`);
  }

  return merged;
}
