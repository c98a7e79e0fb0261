/**
 * Tests for the error hierarchy
 */

import { describe, expect, test } from "vitest";
import {
  CodestreamError,
  CompressionError,
  FileError,
  SinkWriteError,
  SourceReadError,
  StreamError,
  ValidationError,
} from "../src/errors";

describe("CodestreamError", () => {
  test("renders line number and context", () => {
    const error = new CodestreamError("bad input", "TEST", 12, "while reading headers");

    expect(error.toString()).toBe(
      "CodestreamError: bad input (line 12)\nContext: while reading headers"
    );
  });

  test("all library errors share the base class", () => {
    const errors = [
      new ValidationError("v"),
      new SourceReadError("s", undefined),
      new SinkWriteError("w", undefined, 0),
      new FileError("f", "/tmp/x", "read"),
      new CompressionError("c", "gzip", "stream"),
      new StreamError("t", "read"),
    ];

    expect(errors.every((error) => error instanceof CodestreamError)).toBe(true);
    expect(errors.map((error) => error.code)).toEqual([
      "VALIDATION_ERROR",
      "SOURCE_READ_ERROR",
      "SINK_WRITE_ERROR",
      "FILE_ERROR",
      "COMPRESSION_ERROR",
      "STREAM_ERROR",
    ]);
  });
});

describe("SourceReadError.fromCause", () => {
  test("attaches the cause and the last good line", () => {
    const cause = new Error("EIO");
    const error = SourceReadError.fromCause(cause, 7);

    expect(error.message).toBe("Failed to read FASTA source after line 7: EIO");
    expect(error.cause).toBe(cause);
    expect(error.lineNumber).toBe(7);
  });

  test("does not wrap twice", () => {
    const original = SourceReadError.fromCause("gone", 1);

    expect(SourceReadError.fromCause(original, 5)).toBe(original);
    expect(original.message).toBe("Failed to read FASTA source after line 1: gone");
  });
});

describe("SinkWriteError.fromCause", () => {
  test("names the failed operation", () => {
    const error = SinkWriteError.fromCause(new Error("EPIPE"), 160, "close");

    expect(error.message).toBe("Failed to close FASTA sink after 160 characters: EPIPE");
    expect(error.charactersWritten).toBe(160);
  });
});

describe("FileError.fromSystemError", () => {
  test("adds a suggestion for missing files", () => {
    const error = FileError.fromSystemError("open", "/data/x.fa", new Error("ENOENT: no such file"));

    expect(error.message).toBe(
      "open operation failed: ENOENT: no such file. Check that the file path exists and is spelled correctly"
    );
    expect(error.filePath).toBe("/data/x.fa");
  });
});

describe("CompressionError", () => {
  test("includes the processed byte count in toString", () => {
    const error = CompressionError.fromSystemError("gzip", "stream", new Error("unexpected EOF"), 512);

    expect(error.message).toBe(
      "stream operation failed for gzip: unexpected EOF. File appears to be truncated or incomplete"
    );
    expect(error.toString()).toBe(
      `CompressionError: ${error.message}\nContext: System error: unexpected EOF\nBytes processed: 512`
    );
  });
});
