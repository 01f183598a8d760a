/**
 * Error handling for SAM parsing and writing
 *
 * Every parse failure names the failing token: the line number comes from
 * the stream layer, the field or token index from the line parser.
 */

/**
 * Base error class for all sam-kit errors
 */
export class SamKitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SamKitError";
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
 * Validation errors for bad arguments, options, or caller-built records
 */
export class ValidationError extends SamKitError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SamKitError {
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
 * Kinds of SAM parse failure
 */
export type SamErrorKind =
  | "TruncatedRecord"
  | "MalformedField"
  | "InvalidCigar"
  | "InvalidArrayTag"
  | "InvalidHexTag"
  | "UnknownTagType"
  | "UnknownHeaderType"
  | "MissingRequiredTag"
  | "DuplicateTag"
  | "HeaderAfterAlignment";

/**
 * Where in a line a SAM error occurred
 */
export interface SamErrorLocation {
  /** 0-based index of the tab-separated field or token */
  readonly fieldIndex?: number;
  /** Field name (QNAME, FLAG, ...) or tag name */
  readonly fieldName?: string;
  /** Raw text of the offending token */
  readonly token?: string;
  /** Query name of the alignment, when known */
  readonly qname?: string;
}

/**
 * SAM format-specific errors
 *
 * `kind` identifies the failure; the static factories build each kind with
 * a consistent message.
 *
 * @example
 * ```typescript
 * try {
 *   parseAlignmentLine(line);
 * } catch (error) {
 *   if (error instanceof SamError && error.kind === "MalformedField") {
 *     console.error(`field ${error.fieldIndex}: ${error.token}`);
 *   }
 * }
 * ```
 */
export class SamError extends ParseError {
  public readonly fieldIndex?: number;
  public readonly fieldName?: string;
  public readonly token?: string;
  public readonly qname?: string;

  constructor(
    message: string,
    public readonly kind: SamErrorKind,
    location: SamErrorLocation = {},
    lineNumber?: number,
    context?: string
  ) {
    super(message, "SAM", lineNumber, context);
    this.name = "SamError";
    this.fieldIndex = location.fieldIndex;
    this.fieldName = location.fieldName;
    this.token = location.token;
    this.qname = location.qname;
  }

  /**
   * Copy of this error located on a line of the input
   */
  withLineNumber(lineNumber: number, context?: string): SamError {
    return new SamError(
      this.message,
      this.kind,
      {
        fieldIndex: this.fieldIndex,
        fieldName: this.fieldName,
        token: this.token,
        qname: this.qname,
      },
      lineNumber,
      context ?? this.context
    );
  }

  /**
   * Copy of this error attributed to an alignment's query name
   */
  withQname(qname: string): SamError {
    return new SamError(
      this.message,
      this.kind,
      {
        fieldIndex: this.fieldIndex,
        fieldName: this.fieldName,
        token: this.token,
        qname,
      },
      this.lineNumber,
      this.context
    );
  }

  static truncatedRecord(fieldCount: number, line: string): SamError {
    return new SamError(
      `Insufficient fields: expected 11, got ${fieldCount}`,
      "TruncatedRecord",
      { fieldIndex: fieldCount, token: line }
    );
  }

  static malformedField(
    fieldIndex: number,
    fieldName: string,
    token: string,
    reason: string
  ): SamError {
    return new SamError(
      `Malformed ${fieldName} (field ${fieldIndex}): '${token}' ${reason}`,
      "MalformedField",
      { fieldIndex, fieldName, token }
    );
  }

  static invalidCigar(token: string, reason: string, fieldIndex?: number): SamError {
    return new SamError(`Invalid CIGAR '${token}': ${reason}`, "InvalidCigar", {
      fieldIndex,
      fieldName: "CIGAR",
      token,
    });
  }

  static malformedTag(token: string, reason: string): SamError {
    return new SamError(`Malformed tag '${token}': ${reason}`, "MalformedField", { token });
  }

  static malformedTagValue(tag: string, tagType: string, token: string, reason: string): SamError {
    return new SamError(
      `Malformed ${tagType} value for tag ${tag}: ${reason}`,
      "MalformedField",
      { fieldName: tag, token }
    );
  }

  static invalidArrayTag(tag: string, token: string, reason: string): SamError {
    return new SamError(`Invalid array tag ${tag}: ${reason}`, "InvalidArrayTag", {
      fieldName: tag,
      token,
    });
  }

  static invalidHexTag(tag: string, token: string, reason: string): SamError {
    return new SamError(`Invalid hex tag ${tag}: ${reason}`, "InvalidHexTag", {
      fieldName: tag,
      token,
    });
  }

  static unknownTagType(tag: string, tagType: string, token: string): SamError {
    return new SamError(`Unknown type '${tagType}' for tag ${tag}`, "UnknownTagType", {
      fieldName: tag,
      token,
    });
  }

  static unknownHeaderType(code: string, line: string): SamError {
    return new SamError(`Invalid header type: @${code}`, "UnknownHeaderType", {
      fieldIndex: 0,
      fieldName: code,
      token: line,
    });
  }

  static missingRequiredTag(code: string, tag: string): SamError {
    return new SamError(`@${code} header must have ${tag} field`, "MissingRequiredTag", {
      fieldName: tag,
    });
  }

  static duplicateTag(code: string, tag: string, fieldIndex: number): SamError {
    return new SamError(`Duplicate ${tag} field in @${code} header`, "DuplicateTag", {
      fieldIndex,
      fieldName: tag,
    });
  }

  static duplicateOptionalTag(tag: string, token: string, fieldIndex: number): SamError {
    return new SamError(`Duplicate optional tag ${tag}`, "DuplicateTag", {
      fieldIndex,
      fieldName: tag,
      token,
    });
  }

  static headerAfterAlignment(line: string): SamError {
    return new SamError(
      "Header line found after the first alignment",
      "HeaderAfterAlignment",
      { fieldIndex: 0, token: line }
    );
  }

  /**
   * Copy of this error placed at a tab-separated field of its line
   */
  atField(fieldIndex: number): SamError {
    return new SamError(
      `${this.message} (field ${fieldIndex})`,
      this.kind,
      {
        fieldIndex,
        fieldName: this.fieldName,
        token: this.token,
        qname: this.qname,
      },
      this.lineNumber,
      this.context
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nKind: ${this.kind}`;
    if (this.fieldIndex !== undefined) {
      msg += `\nField: ${this.fieldIndex}${this.fieldName !== undefined ? ` (${this.fieldName})` : ""}`;
    }
    if (this.qname !== undefined) {
      msg += `\nRead: ${this.qname}`;
    }
    return msg;
  }
}

/**
 * CIGAR validation errors with detailed mismatch analysis
 */
export class CigarValidationError extends ValidationError {
  constructor(
    message: string,
    public readonly cigar: string,
    public readonly sequenceLength: number,
    public readonly consumedBases: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, lineNumber, context);
    this.name = "CigarValidationError";
  }

  /**
   * Create CIGAR error with detailed analysis
   */
  static withMismatchAnalysis(
    cigar: string,
    sequenceLength: number,
    consumedBases: number,
    lineNumber?: number
  ): CigarValidationError {
    return new CigarValidationError(
      `CIGAR/sequence length mismatch: CIGAR consumes ${consumedBases} bases, sequence has ${sequenceLength} bases`,
      cigar,
      sequenceLength,
      consumedBases,
      lineNumber,
      `CIGAR: ${cigar}, Expected: ${sequenceLength} bases, Actual: ${consumedBases} bases`
    );
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nCIGAR Analysis:`;
    msg += `\n  CIGAR String: ${this.cigar}`;
    msg += `\n  Sequence Length: ${this.sequenceLength} bases`;
    msg += `\n  CIGAR Consumption: ${this.consumedBases} bases`;
    return msg;
  }
}

/**
 * File I/O errors with system error context
 */
export class FileError extends SamKitError {
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
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }
}

/**
 * Stream processing errors for I/O operations
 */
export class StreamError extends SamKitError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

/**
 * Buffer management errors for streaming operations
 */
export class BufferError extends SamKitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    context?: string
  ) {
    super(message, "BUFFER_ERROR", undefined, context);
    this.name = "BufferError";
  }
}
