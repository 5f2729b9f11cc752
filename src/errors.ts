/**
 * Error handling for fixed-width record processing
 *
 * Every failure raised by the reader, the writer or the I/O layer is a
 * subclass of {@link FixedWidthError}, so callers can catch the whole
 * family with one `instanceof` check and branch on `code` or `kind`.
 */

/**
 * Base error class for all fixed-width errors
 */
export class FixedWidthError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FixedWidthError";
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
 * Invalid reader or writer options
 */
export class ValidationError extends FixedWidthError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends FixedWidthError {
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
 * The ways a fixed-width line can fail to decode or encode
 */
export type FixedWidthErrorKind =
  | "NO_FIELDS_CONFIGURED"
  | "INVALID_FIELD_WIDTH"
  | "INCORRECT_LINE_WIDTH"
  | "MALFORMED_LINE_ENDING"
  | "FIELD_COUNT_MISMATCH";

const KIND_DESCRIPTIONS: Record<FixedWidthErrorKind, string> = {
  NO_FIELDS_CONFIGURED: "no fields defined",
  INVALID_FIELD_WIDTH: "field width incorrect",
  INCORRECT_LINE_WIDTH: "incorrect line width",
  MALFORMED_LINE_ENDING: "CRLF not found at end of line",
  FIELD_COUNT_MISMATCH: "wrong number of fields in line",
};

/**
 * Position of a failure: 1-based line, and 1-based column where the
 * failure concerns a single field
 */
export interface RecordPosition {
  readonly line: number;
  readonly column?: number;
}

/**
 * Positioned record error raised by the reader and the writer
 *
 * @example
 * ```typescript
 * try {
 *   await reader.read();
 * } catch (error) {
 *   if (error instanceof FixedWidthParseError && error.kind === "INCORRECT_LINE_WIDTH") {
 *     console.error(`bad line ${error.line}`);
 *   }
 * }
 * ```
 */
export class FixedWidthParseError extends ParseError {
  public readonly line: number;
  public readonly column: number | undefined;

  constructor(
    public readonly kind: FixedWidthErrorKind,
    position: RecordPosition,
    detail?: string
  ) {
    const description = detail ? `${KIND_DESCRIPTIONS[kind]}: ${detail}` : KIND_DESCRIPTIONS[kind];
    super(
      `line ${position.line}, column ${position.column ?? 0}: ${description}`,
      "FixedWidth",
      position.line,
      detail
    );
    this.name = "FixedWidthParseError";
    this.line = position.line;
    this.column = position.column;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends FixedWidthError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write" | "flush",
    public readonly bytesProcessed?: number,
    lineNumber?: number
  ) {
    super(message, "STREAM_ERROR", lineNumber);
    this.name = "StreamError";
  }
}

/**
 * The byte source has no more data
 *
 * Ends `readAll()` and record iteration quietly; everywhere else it
 * reaches the caller like any other stream error.
 */
export class EndOfStreamError extends StreamError {
  constructor(message = "end of stream", bytesProcessed?: number, lineNumber?: number) {
    super(message, "read", bytesProcessed, lineNumber);
    this.name = "EndOfStreamError";
  }
}

/**
 * `readRows` stopped early; carries the records read before the failure
 */
export class IncompleteReadError extends FixedWidthError {
  constructor(
    public readonly records: string[][],
    public override readonly cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `read ${records.length} record(s) before failing: ${reason}`,
      "INCOMPLETE_READ",
      cause instanceof FixedWidthError ? cause.lineNumber : undefined
    );
    this.name = "IncompleteReadError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends FixedWidthError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    return undefined;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends FixedWidthError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open",
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
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }
    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Error recovery suggestions for record-level failures
 */
export const ERROR_SUGGESTIONS: Record<FixedWidthErrorKind, string> = {
  NO_FIELDS_CONFIGURED: "Set fieldLengths before reading or writing records",
  INVALID_FIELD_WIDTH:
    "Field widths must be positive integers; enable trimFields to truncate long values on write",
  INCORRECT_LINE_WIDTH:
    "Check skipStart, skipEnd and fieldLengths against the input, and that lineEnding matches the file",
  MALFORMED_LINE_ENDING: "The input may use LF or CR line endings; set lineEnding accordingly",
  FIELD_COUNT_MISMATCH: "Each record must have exactly one value per configured field",
};

/**
 * Get a recovery suggestion for a record-level error
 */
export function getErrorSuggestion(error: FixedWidthError): string | undefined {
  if (error instanceof FixedWidthParseError) {
    return ERROR_SUGGESTIONS[error.kind];
  }
  if (error instanceof IncompleteReadError && error.cause instanceof FixedWidthError) {
    return getErrorSuggestion(error.cause);
  }
  return undefined;
}
