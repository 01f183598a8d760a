/**
 * SAM stream reader
 *
 * A SAM stream is a header section (`@` lines) followed by an alignment
 * section. {@link SamLineReader} is the state machine behind every reading
 * surface in this module: it takes one line at a time and moves from the
 * header to the alignment section on the first line that does not start
 * with `@`. Any later `@` line is a `HeaderAfterAlignment` error.
 *
 * @module sam/reader
 */

import { type } from "arktype";
import { ParseError, SamError, SamKitError, ValidationError } from "../../errors";
import { readLines } from "../../io/stream-utils";
import type { FileReaderOptions } from "../../types";
import type { ResolvedParserOptions } from "../abstract-parser";
import { AbstractParser, consoleWarning, InterruptHandler } from "../abstract-parser";
import { parseAlignmentLine } from "./alignment";
import { parseHeaderLine, SAMFileHeader } from "./header";
import type { SAMAlignment, SAMHeader, SAMRecord, SamParserOptions } from "./types";

const SAM_DEFAULT_MAX_LINE_LENGTH = 10_000_000;

/**
 * ArkType schema for SAM parser options
 */
const SamParserOptionsSchema = type({
  "skipValidation?": "boolean",
  "maxLineLength?": "number>0",
  "trackLineNumbers?": "boolean",
  "skipInvalid?": "boolean",
}).narrow((options, ctx) => {
  if (options.maxLineLength !== undefined && !Number.isInteger(options.maxLineLength)) {
    return ctx.reject({
      expected: "an integer maxLineLength",
      actual: `${options.maxLineLength}`,
      path: ["maxLineLength"],
    });
  }
  return true;
});

function validateOptions(options: SamParserOptions): void {
  const result = SamParserOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(
      `Invalid SAM parser options: ${result.summary}`,
      undefined,
      "SAM parser configuration"
    );
  }
}

type SamLineReaderOptions = ResolvedParserOptions & { skipInvalid?: boolean };

function resolveOptions(options: SamParserOptions): SamLineReaderOptions {
  validateOptions(options);
  return {
    skipValidation: options.skipValidation ?? false,
    maxLineLength: options.maxLineLength ?? SAM_DEFAULT_MAX_LINE_LENGTH,
    trackLineNumbers: options.trackLineNumbers ?? true,
    skipInvalid: options.skipInvalid ?? false,
    signal: options.signal,
    onWarning: options.onWarning ?? consoleWarning("SAM"),
  };
}

type ReaderState = "InHeader" | "InAlignment";

/**
 * Line-at-a-time SAM state machine
 *
 * `accept` returns the record parsed from a line, or `undefined` for a
 * blank line or (with `skipInvalid`) a line that failed to parse.
 */
class SamLineReader {
  private state: ReaderState = "InHeader";
  private lineNumber = 0;
  private readonly interrupts: InterruptHandler;

  constructor(private readonly options: SamLineReaderOptions) {
    this.interrupts = new InterruptHandler(options.signal);
  }

  accept(rawLine: string): SAMRecord | undefined {
    this.lineNumber++;
    this.interrupts.throwIfAborted("SAM parsing");

    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
    if (line.trim() === "") {
      return undefined;
    }

    try {
      if (line.length > this.options.maxLineLength) {
        throw new ParseError(
          `Line too long (${line.length} > ${this.options.maxLineLength})`,
          "SAM",
          this.lineNumber
        );
      }
      return this.parseLine(line);
    } catch (error) {
      const located = error instanceof SamError ? error.withLineNumber(this.lineNumber, line) : error;
      if (this.options.skipInvalid === true && located instanceof SamKitError) {
        this.options.onWarning(located.message, this.lineNumber);
        return undefined;
      }
      throw located;
    }
  }

  private parseLine(line: string): SAMRecord {
    if (line.startsWith("@")) {
      if (this.state === "InAlignment") {
        throw SamError.headerAfterAlignment(line);
      }
      const header = parseHeaderLine(line);
      return this.options.trackLineNumbers ? { ...header, lineNumber: this.lineNumber } : header;
    }

    this.state = "InAlignment";
    const alignment = parseAlignmentLine(line, { skipValidation: this.options.skipValidation });
    return this.options.trackLineNumbers
      ? { ...alignment, lineNumber: this.lineNumber }
      : alignment;
  }
}

function splitLines(text: string): string[] {
  return text.split("\n");
}

/**
 * Read SAM records lazily from lines of text
 *
 * A string is split into lines first; any other iterable is consumed one
 * line at a time as records are pulled. Lines may keep a trailing `\r`.
 *
 * @throws {SamError} On the first invalid line, with its 1-based line number
 *
 * @example
 * ```typescript
 * for (const record of readSam(text)) {
 *   if (record.format === "sam") {
 *     console.log(record.qname, record.rname, record.pos);
 *   }
 * }
 * ```
 */
function* readSam(
  lines: string | Iterable<string>,
  options: SamParserOptions = {}
): Generator<SAMRecord, void, undefined> {
  const reader = new SamLineReader(resolveOptions(options));
  const source = typeof lines === "string" ? splitLines(lines) : lines;
  for (const line of source) {
    const record = reader.accept(line);
    if (record !== undefined) {
      yield record;
    }
  }
}

/**
 * Async variant of {@link readSam} for line sources such as {@link readLines}
 */
async function* readSamAsync(
  lines: AsyncIterable<string> | Iterable<string>,
  options: SamParserOptions = {}
): AsyncGenerator<SAMRecord, void, undefined> {
  const reader = new SamLineReader(resolveOptions(options));
  for await (const line of lines) {
    const record = reader.accept(line);
    if (record !== undefined) {
      yield record;
    }
  }
}

/**
 * Header dictionary plus the alignments that follow it
 */
interface SAMAlignmentStream {
  readonly header: SAMFileHeader;
  readonly alignments: AsyncIterable<SAMAlignment>;
}

/**
 * Streaming SAM parser
 *
 * Processes records one at a time without loading the input into memory.
 *
 * @example Basic usage
 * ```typescript
 * const parser = new SAMParser();
 * for await (const record of parser.parseString(samData)) {
 *   if (record.format === "sam-header") {
 *     console.log(`Header: ${record.type}`);
 *   } else {
 *     console.log(`Alignment: ${record.qname} -> ${record.rname}:${record.pos}`);
 *   }
 * }
 * ```
 *
 * @example Keep going past bad lines
 * ```typescript
 * const parser = new SAMParser({
 *   skipInvalid: true,
 *   onWarning: (warning, lineNumber) => log.push(`${lineNumber}: ${warning}`),
 * });
 * ```
 */
class SAMParser extends AbstractParser<SAMRecord, SamParserOptions> {
  protected getDefaultOptions(): Partial<SamParserOptions> {
    return {
      maxLineLength: SAM_DEFAULT_MAX_LINE_LENGTH,
      skipInvalid: false,
    };
  }

  constructor(options: SamParserOptions = {}) {
    validateOptions(options);
    super(options);
  }

  protected getFormatName(): string {
    return "SAM";
  }

  /**
   * Parse SAM records from a string
   * @throws {SamError} When SAM format is invalid
   */
  override async *parseString(data: string): AsyncIterable<SAMRecord> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse SAM records from a byte stream
   */
  override async *parse(stream: ReadableStream<Uint8Array>): AsyncIterable<SAMRecord> {
    yield* this.parseLines(readLines(stream, "utf8", this.options.maxLineLength));
  }

  /**
   * Parse SAM records from a file using streaming I/O
   *
   * @throws {FileError} When the file cannot be opened
   * @throws {SamError} When SAM format is invalid
   *
   * @example
   * ```typescript
   * const parser = new SAMParser();
   * for await (const record of parser.parseFile("alignments.sam")) {
   *   if (record.format === "sam") {
   *     console.log(`${record.qname} -> ${record.rname}:${record.pos}`);
   *   }
   * }
   * ```
   */
  override async *parseFile(
    filePath: string,
    options?: FileReaderOptions
  ): AsyncIterable<SAMRecord> {
    this.throwIfAborted("file open");
    const { createStream } = await import("../../io/file-reader");
    const stream = await createStream(filePath, options);
    yield* this.parseLines(
      readLines(stream, options?.encoding ?? "utf8", this.options.maxLineLength)
    );
  }

  /**
   * Parse SAM records from lines of text
   */
  async *parseLines(lines: AsyncIterable<string> | Iterable<string>): AsyncIterable<SAMRecord> {
    const reader = new SamLineReader(this.options);
    for await (const line of lines) {
      this.checkAborted();
      const record = reader.accept(line);
      if (record !== undefined) {
        yield record;
      }
    }
  }

  /**
   * Read the header section into a {@link SAMFileHeader}, leaving the
   * alignments to be pulled
   *
   * @example
   * ```typescript
   * const { header, alignments } = await parser.readHeader(lines);
   * console.log(header.referenceNames);
   * for await (const alignment of alignments) {
   *   validateAlignment(alignment, { header });
   * }
   * ```
   */
  async readHeader(
    source: string | AsyncIterable<string> | Iterable<string>
  ): Promise<SAMAlignmentStream> {
    const lines = typeof source === "string" ? splitLines(source) : source;
    const iterator = this.parseLines(lines)[Symbol.asyncIterator]();
    const headers: SAMHeader[] = [];
    let first: SAMAlignment | undefined;

    for (;;) {
      const next = await iterator.next();
      if (next.done === true) break;
      if (next.value.format === "sam") {
        first = next.value;
        break;
      }
      headers.push(next.value);
    }

    const head = first;
    async function* remaining(): AsyncIterable<SAMAlignment> {
      if (head === undefined) return;
      yield head;
      for (;;) {
        const next = await iterator.next();
        if (next.done === true) return;
        if (next.value.format === "sam") {
          yield next.value;
        }
      }
    }

    return { header: SAMFileHeader.fromRecords(headers), alignments: remaining() };
  }
}

/**
 * Synchronous reader holding the parsed header and handing out alignments
 * one at a time
 *
 * The header section is read when the reader is constructed.
 *
 * @example
 * ```typescript
 * const reader = new SAMReader(text);
 * console.log(reader.header.version);
 * let alignment = reader.readAlignment();
 * while (alignment !== undefined) {
 *   console.log(alignment.qname);
 *   alignment = reader.readAlignment();
 * }
 * ```
 */
class SAMReader implements Iterable<SAMAlignment> {
  readonly header: SAMFileHeader;
  private readonly records: Generator<SAMRecord, void, undefined>;
  private pending: SAMAlignment | undefined;
  private closed = false;

  constructor(source: string | Iterable<string>, options: SamParserOptions = {}) {
    this.records = readSam(source, options);

    const headers: SAMHeader[] = [];
    for (;;) {
      const next = this.records.next();
      if (next.done === true) break;
      if (next.value.format === "sam") {
        this.pending = next.value;
        break;
      }
      headers.push(next.value);
    }
    this.header = SAMFileHeader.fromRecords(headers);
  }

  /**
   * Next alignment, or `undefined` at the end of input or after `close`
   */
  readAlignment(): SAMAlignment | undefined {
    if (this.closed) {
      return undefined;
    }
    if (this.pending !== undefined) {
      const alignment = this.pending;
      this.pending = undefined;
      return alignment;
    }

    for (;;) {
      const next = this.records.next();
      if (next.done === true) {
        this.closed = true;
        return undefined;
      }
      // headers past the first alignment never get here: the line reader rejects them
      if (next.value.format === "sam") {
        return next.value;
      }
    }
  }

  /**
   * All remaining alignments
   */
  readAlignments(): SAMAlignment[] {
    return [...this];
  }

  /**
   * Stop reading; later reads return `undefined`
   */
  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.pending = undefined;
      this.records.return(undefined);
    }
  }

  *[Symbol.iterator](): Iterator<SAMAlignment> {
    let alignment = this.readAlignment();
    while (alignment !== undefined) {
      yield alignment;
      alignment = this.readAlignment();
    }
  }
}

export { readSam, readSamAsync, SamLineReader, SAMParser, SAMReader, SamParserOptionsSchema };
export type { SAMAlignmentStream, ReaderState, SamLineReaderOptions };
