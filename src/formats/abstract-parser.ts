/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Provides consistent defaults and AbortSignal support to record parsers
 * without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Parser options once defaults are applied; only `signal` may stay unset
 */
export type ResolvedParserOptions = Required<Omit<ParserOptions, "signal">> &
  Pick<ParserOptions, "signal">;

/**
 * Default warning sink: `<FORMAT> Warning (line N): message` on stderr
 */
export function consoleWarning(formatName: string): (warning: string, lineNumber?: number) => void {
  return (warning, lineNumber) => {
    const location = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
    console.warn(`${formatName} Warning${location}: ${warning}`);
  };
}

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  protected readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    // Merge base defaults, format-specific defaults, and user options
    const baseDefaults: ResolvedParserOptions = {
      skipValidation: false,
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onWarning: consoleWarning(this.getFormatName()),
    };

    const formatDefaults = this.getDefaultOptions();

    // Merge in order: base -> format-specific -> user options
    this.options = { ...baseDefaults, ...formatDefaults, ...options };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Get format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Check if parsing operation should be aborted
   * Call this in parsing loops to enable Ctrl+C interruption
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  /**
   * Check abortion with format context
   */
  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Parse records from a string
   */
  abstract parseString(data: string): AsyncIterable<T>;

  /**
   * Parse records from a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): AsyncIterable<T>;

  /**
   * Parse records from a byte stream
   */
  abstract parse(stream: ReadableStream<Uint8Array>): AsyncIterable<T>;

  /**
   * Format identifier for error messages and logging (e.g., "SAM")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal checks shared by parsers and line readers
 */
export class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", "ABORTED");
    }
  }

  /**
   * @throws {ParseError} If operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, "ABORTED");
    }
  }
}
