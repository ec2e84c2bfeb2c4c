/**
 * Error handling for annotation, read and table processing
 *
 * Every failure raised by the library derives from GeneFiltersError so the
 * CLI can map it to a single exit path, while callers that care can still
 * narrow on the concrete class.
 */

/**
 * Base error class for all genefilters errors
 */
export class GeneFiltersError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "GeneFiltersError";
  }

  /**
   * Create a user-friendly error message with context
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
 * Validation errors for malformed options or data
 */
export class ValidationError extends GeneFiltersError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends GeneFiltersError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Compression/decompression errors
 */
export class CompressionError extends GeneFiltersError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const lower = errorMessage.toLowerCase();
    const suggestion =
      lower.includes("header") || lower.includes("magic")
        ? `. File may be corrupted or not actually ${format} compressed`
        : lower.includes("unexpected end") || lower.includes("truncated")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
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
 * File I/O errors with the failing path and operation
 */
export class FileError extends GeneFiltersError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "mkdir",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = describeSystemError(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} failed for '${filePath}': ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file") || msg.includes("notfound")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for line reading
 */
export class StreamError extends GeneFiltersError {
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

/**
 * Buffer overflow while assembling lines
 */
export class BufferError extends GeneFiltersError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}

/**
 * Outer-join input violations: too few tables, duplicate keys, ragged rows
 */
export class JoinError extends ValidationError {
  constructor(
    message: string,
    public readonly source?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(source !== undefined ? `${source}: ${message}` : message, lineNumber, context);
    this.name = "JoinError";
  }
}

/**
 * Column-average input violations: tables that do not line up
 */
export class ColumnAverageError extends ValidationError {
  constructor(
    message: string,
    public readonly source?: string,
    lineNumber?: number
  ) {
    super(source !== undefined ? `${source}: ${message}` : message, lineNumber);
    this.name = "ColumnAverageError";
  }
}

/**
 * Sequence split errors with the offending record
 */
export class SplitError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    public readonly parts: number
  ) {
    super(`Sequence '${sequenceId}': ${message}`);
    this.name = "SplitError";
  }
}

/**
 * Pull a readable message out of whatever a platform call rejected with.
 * Effect's PlatformError carries its text on `message`; plain Node errors too.
 */
function describeSystemError(systemError: unknown): string {
  if (systemError instanceof Error) return systemError.message;
  if (typeof systemError === "object" && systemError !== null && "message" in systemError) {
    const { message } = systemError;
    if (typeof message === "string") return message;
  }
  return String(systemError);
}
