/**
 * SAM stream writer
 *
 * Records are written in the order given: header lines first, then
 * alignments. A header record after an alignment is rejected with
 * `HeaderAfterAlignment`, matching what the reader would do with the output.
 *
 * @module sam/writer
 */

import { type } from "arktype";
import { SamError, ValidationError } from "../../errors";
import { openForWriting } from "../../io/file-writer";
import { consoleWarning } from "../abstract-parser";
import { formatAlignmentLine } from "./alignment";
import { formatHeaderLine, SAMFileHeader } from "./header";
import type { LineSink, SAMAlignment, SAMHeader, SAMRecord, SamWriterOptions } from "./types";
import { UNAVAILABLE } from "./types";
import { assertValidAlignment, assertValidHeader } from "./validation";

/**
 * ArkType schema for SAM writer options
 */
const SamWriterOptionsSchema = type({
  "validate?": "boolean",
  "lineEnding?": type.enumerated("\n", "\r\n"),
});

/**
 * Tracks header/alignment order across one output
 */
class EmissionOrder {
  private inAlignments = false;
  private readonly references = new Set<string>();

  constructor(private readonly warn: (warning: string) => void) {}

  check(record: SAMRecord, line: string): void {
    if (record.format === "sam-header") {
      if (this.inAlignments) {
        throw SamError.headerAfterAlignment(line);
      }
      if (record.type === "SQ") {
        this.references.add(record.fields["SN"] ?? "");
      }
      return;
    }

    this.inAlignments = true;
    if (
      this.references.size > 0 &&
      record.rname !== UNAVAILABLE &&
      !this.references.has(record.rname)
    ) {
      this.warn(`Alignment ${record.qname} refers to undeclared reference ${record.rname}`);
    }
  }
}

/**
 * SAM format writer
 *
 * @example Format records to text
 * ```typescript
 * const writer = new SAMWriter();
 * const text = writer.writeString([...headers, ...alignments]);
 * ```
 *
 * @example Stream to a file
 * ```typescript
 * const parser = new SAMParser();
 * const writer = new SAMWriter({ lineEnding: "\n" });
 * await writer.writeFile("copy.sam", parser.parseFile("input.sam"));
 * ```
 */
class SAMWriter {
  private readonly validate: boolean;
  private readonly lineEnding: "\n" | "\r\n";
  private readonly onWarning: (warning: string) => void;

  constructor(options: SamWriterOptions = {}) {
    const validationResult = SamWriterOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid SAM writer options: ${validationResult.summary}`,
        undefined,
        "SAM writer configuration"
      );
    }

    this.validate = options.validate ?? true;
    this.lineEnding = options.lineEnding ?? "\n";
    this.onWarning = options.onWarning ?? consoleWarning("SAM");
  }

  /**
   * Format a header line, validating it first unless validation is off
   */
  formatHeader(header: SAMHeader): string {
    if (this.validate) {
      assertValidHeader(header);
    }
    return formatHeaderLine(header);
  }

  /**
   * Format an alignment line, validating it first unless validation is off
   */
  formatAlignment(alignment: SAMAlignment): string {
    if (this.validate) {
      assertValidAlignment(alignment);
    }
    return formatAlignmentLine(alignment);
  }

  /**
   * Format any record as one line without a terminator
   *
   * @throws {ValidationError} When validation is on and the record is invalid
   */
  formatRecord(record: SAMRecord): string {
    return record.format === "sam" ? this.formatAlignment(record) : this.formatHeader(record);
  }

  /**
   * Format records as SAM text, every line terminated
   *
   * @example
   * ```typescript
   * new SAMWriter().writeString(SAMFileHeader.fromRecords(headers)); // header section only
   * ```
   */
  writeString(records: Iterable<SAMRecord> | SAMFileHeader): string {
    let text = "";
    for (const line of this.lines(toRecords(records))) {
      text += line + this.lineEnding;
    }
    return text;
  }

  /**
   * Send records to a line sink, one unterminated line per record
   */
  writeLines(sink: LineSink, records: Iterable<SAMRecord> | SAMFileHeader): void {
    for (const line of this.lines(toRecords(records))) {
      sink.writeLine(line);
    }
  }

  /**
   * Write records to a WritableStream as UTF-8
   *
   * The stream's lock is released when done; the stream is left open.
   */
  async writeStream(
    stream: WritableStream<Uint8Array>,
    records: AsyncIterable<SAMRecord> | Iterable<SAMRecord>
  ): Promise<void> {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();
    const order = new EmissionOrder(this.onWarning);

    try {
      for await (const record of records) {
        const line = this.formatRecord(record);
        order.check(record, line);
        await writer.write(encoder.encode(line + this.lineEnding));
      }
    } finally {
      writer.releaseLock();
    }
  }

  /**
   * Write records to a file, replacing it if it exists
   *
   * @throws {FileError} When the file cannot be opened or written
   */
  async writeFile(
    path: string,
    records: AsyncIterable<SAMRecord> | Iterable<SAMRecord> | SAMFileHeader
  ): Promise<void> {
    const source = records instanceof SAMFileHeader ? records.toRecords() : records;
    const order = new EmissionOrder(this.onWarning);

    await openForWriting(path, async (handle) => {
      for await (const record of source) {
        const line = this.formatRecord(record);
        order.check(record, line);
        await handle.writeString(line + this.lineEnding);
      }
    });
  }

  private *lines(records: Iterable<SAMRecord>): Generator<string, void, undefined> {
    const order = new EmissionOrder(this.onWarning);
    for (const record of records) {
      const line = this.formatRecord(record);
      order.check(record, line);
      yield line;
    }
  }
}

function toRecords(records: Iterable<SAMRecord> | SAMFileHeader): Iterable<SAMRecord> {
  return records instanceof SAMFileHeader ? records.toRecords() : records;
}

/**
 * Write records to a line sink in call order
 *
 * @throws {SamError} `HeaderAfterAlignment` when a header record follows an
 *   alignment
 * @throws {ValidationError} When validation is on and a record is invalid
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * writeSam({ writeLine: (line) => lines.push(line) }, records);
 * ```
 */
function writeSam(
  sink: LineSink,
  records: Iterable<SAMRecord>,
  options: SamWriterOptions = {}
): void {
  new SAMWriter(options).writeLines(sink, records);
}

export { SAMWriter, writeSam, SamWriterOptionsSchema };
