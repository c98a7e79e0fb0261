/**
 * Error handling for FASTA code stream reading and writing
 *
 * Every failure the library raises extends {@link CodestreamError}, so callers can
 * branch on `instanceof` or on the machine-readable `code`.
 */

/**
 * Base error class for all fasta-codestream errors
 */
export class CodestreamError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CodestreamError";
  }

  /**
   * Render the message with line and context details
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Rejected configuration or argument values
 */
export class ValidationError extends CodestreamError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Failure obtaining the next line from the input collaborator.
 *
 * `lineNumber` is the last line that was read successfully (0 when the
 * source failed before delivering anything).
 */
export class SourceReadError extends CodestreamError {
  constructor(message: string, cause: unknown, lineNumber?: number, context?: string) {
    super(message, "SOURCE_READ_ERROR", lineNumber, context, cause);
    this.name = "SourceReadError";
  }

  static fromCause(cause: unknown, lineNumber: number): SourceReadError {
    if (cause instanceof SourceReadError) {
      return cause;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SourceReadError(
      `Failed to read FASTA source after line ${lineNumber}: ${reason}`,
      cause,
      lineNumber
    );
  }
}

/**
 * Failure writing serialized FASTA text to the output sink
 */
export class SinkWriteError extends CodestreamError {
  constructor(
    message: string,
    cause: unknown,
    public readonly charactersWritten: number,
    context?: string
  ) {
    super(message, "SINK_WRITE_ERROR", undefined, context, cause);
    this.name = "SinkWriteError";
  }

  static fromCause(
    cause: unknown,
    charactersWritten: number,
    operation: "write" | "close"
  ): SinkWriteError {
    if (cause instanceof SinkWriteError) {
      return cause;
    }
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new SinkWriteError(
      `Failed to ${operation} FASTA sink after ${charactersWritten} characters: ${reason}`,
      cause,
      charactersWritten
    );
  }
}

/**
 * Gzip compression/decompression errors with detailed context
 */
export class CompressionError extends CodestreamError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string,
    cause?: unknown
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context, cause);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`,
      systemError
    );
  }

  private static getSuggestionForCompressionError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return "File may be corrupted or not actually gzip compressed";
    }
    if (msg.includes("unexpected eof") || msg.includes("truncated")) {
      return "File appears to be truncated or incomplete";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors
 */
export class FileError extends CodestreamError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close",
    systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context, systemError);
    this.name = "FileError";
  }

  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path exists and is spelled correctly";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir")) {
      return "Path points to a directory, not a file";
    }
    return undefined;
  }
}

/**
 * Misuse of a single-pass stream, such as consuming it twice
 */
export class StreamError extends CodestreamError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "transform",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}
