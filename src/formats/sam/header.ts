/**
 * SAM header lines and the header dictionary
 *
 * Each header line is `@XX` followed by tab-separated `TAG:VALUE` pairs,
 * except `@CO`, whose remainder is freeform text. {@link SAMFileHeader}
 * gathers a whole header section into lookup tables.
 *
 * @module sam/header
 */

import { SamError, ValidationError } from "../../errors";
import type {
  SAMCommentHeader,
  SAMFileMetadataHeader,
  SAMHeader,
  SAMHeaderType,
  SAMProgramHeader,
  SAMReadGroupHeader,
  SAMReferenceSequenceHeader,
  SAMTaggedHeader,
} from "./types";
import { HEADER_TYPES, REQUIRED_HEADER_TAGS } from "./types";

const HEADER_TAG_PATTERN = /^[A-Za-z][A-Za-z0-9]$/;
const REFERENCE_LENGTH_PATTERN = /^[0-9]+$/;
const MAX_REFERENCE_LENGTH = 2_147_483_647;

const HEADER_TYPE_SET: ReadonlySet<string> = new Set(HEADER_TYPES);

function isHeaderType(code: string): code is SAMHeaderType {
  return HEADER_TYPE_SET.has(code);
}

/**
 * Parse one header line
 *
 * @throws {SamError} `UnknownHeaderType`, `MalformedField`, `DuplicateTag`
 *   or `MissingRequiredTag`
 *
 * @example
 * ```typescript
 * const sq = parseHeaderLine("@SQ\tSN:chr1\tLN:248956422");
 * // { format: "sam-header", type: "SQ", fields: { SN: "chr1", LN: "248956422" } }
 * ```
 */
function parseHeaderLine(text: string): SAMHeader {
  if (!text.startsWith("@")) {
    throw SamError.malformedField(0, "header", text, "does not start with '@'");
  }

  const tab = text.indexOf("\t");
  const code = tab === -1 ? text.slice(1) : text.slice(1, tab);
  if (!isHeaderType(code)) {
    throw SamError.unknownHeaderType(code, text);
  }

  if (code === "CO") {
    return {
      format: "sam-header",
      type: "CO",
      comment: tab === -1 ? "" : text.slice(tab + 1),
    };
  }

  const tokens = tab === -1 ? [] : text.slice(tab + 1).split("\t");
  const fields: Record<string, string> = {};

  tokens.forEach((token, i) => {
    const fieldIndex = i + 1;
    if (!token.includes(":")) {
      throw SamError.malformedField(fieldIndex, `@${code} field`, token, "is not TAG:VALUE");
    }
    const key = token.slice(0, 2);
    if (token.charAt(2) !== ":" || !HEADER_TAG_PATTERN.test(key)) {
      throw SamError.malformedField(fieldIndex, `@${code} field`, token, "has an invalid tag key");
    }
    if (Object.hasOwn(fields, key)) {
      throw SamError.duplicateTag(code, key, fieldIndex);
    }
    fields[key] = token.slice(3);
  });

  for (const required of REQUIRED_HEADER_TAGS[code]) {
    if (!Object.hasOwn(fields, required)) {
      throw SamError.missingRequiredTag(code, required);
    }
  }

  if (code === "SQ") {
    validateReferenceLength(fields["LN"] ?? "", tokens.findIndex((t) => t.startsWith("LN:")) + 1);
  }

  return { format: "sam-header", type: code, fields };
}

function validateReferenceLength(text: string, fieldIndex: number): void {
  const length = Number(text);
  if (
    !REFERENCE_LENGTH_PATTERN.test(text) ||
    length < 1 ||
    length > MAX_REFERENCE_LENGTH
  ) {
    throw SamError.malformedField(
      fieldIndex,
      "LN",
      text,
      `is not a reference length in 1..${MAX_REFERENCE_LENGTH}`
    );
  }
}

/**
 * Format a header record as one line without a terminator
 *
 * Required tags are written first in their schema order (`VN`; `SN`, `LN`;
 * `ID`), then the remaining tags in the order they were parsed.
 *
 * @throws {SamError} `MissingRequiredTag` when a caller-built record lacks one
 */
function formatHeaderLine(record: SAMHeader): string {
  if (record.type === "CO") {
    return record.comment === "" ? "@CO" : `@CO\t${record.comment}`;
  }

  const required = REQUIRED_HEADER_TAGS[record.type];
  const parts = [`@${record.type}`];

  for (const tag of required) {
    const value = record.fields[tag];
    if (value === undefined) {
      throw SamError.missingRequiredTag(record.type, tag);
    }
    parts.push(`${tag}:${value}`);
  }
  for (const [tag, value] of Object.entries(record.fields)) {
    if (!required.includes(tag)) {
      parts.push(`${tag}:${value}`);
    }
  }

  return parts.join("\t");
}

/**
 * Header section of a SAM file, indexed by record type
 *
 * `records` keeps every header line in its original order; the typed
 * accessors index the same records.
 *
 * @example
 * ```typescript
 * const header = SAMFileHeader.fromRecords(headers);
 * header.version;                 // "1.6"
 * header.referenceLength("chr1"); // 248956422
 * ```
 */
class SAMFileHeader {
  readonly hd: SAMFileMetadataHeader | undefined;
  readonly sq: readonly SAMReferenceSequenceHeader[];
  readonly rg: readonly SAMReadGroupHeader[];
  readonly pg: readonly SAMProgramHeader[];
  readonly co: readonly SAMCommentHeader[];

  private readonly references = new Map<string, SAMReferenceSequenceHeader>();
  private readonly readGroups = new Map<string, SAMReadGroupHeader>();
  private readonly programs = new Map<string, SAMProgramHeader>();

  private constructor(readonly records: readonly SAMHeader[]) {
    let hd: SAMFileMetadataHeader | undefined;
    const sq: SAMReferenceSequenceHeader[] = [];
    const rg: SAMReadGroupHeader[] = [];
    const pg: SAMProgramHeader[] = [];
    const co: SAMCommentHeader[] = [];

    for (const record of records) {
      switch (record.type) {
        case "HD":
          if (hd !== undefined) {
            throw new ValidationError("Duplicate @HD header", record.lineNumber);
          }
          hd = record;
          break;
        case "SQ":
          addUnique(this.references, record, "SN");
          sq.push(record);
          break;
        case "RG":
          addUnique(this.readGroups, record, "ID");
          rg.push(record);
          break;
        case "PG":
          addUnique(this.programs, record, "ID");
          pg.push(record);
          break;
        case "CO":
          co.push(record);
          break;
      }
    }

    this.hd = hd;
    this.sq = sq;
    this.rg = rg;
    this.pg = pg;
    this.co = co;
  }

  /**
   * Build a header from parsed header records
   *
   * @throws {ValidationError} On a second `@HD`, or a repeated reference
   *   name, read group ID or program ID
   */
  static fromRecords(records: Iterable<SAMHeader>): SAMFileHeader {
    return new SAMFileHeader([...records]);
  }

  static empty(): SAMFileHeader {
    return new SAMFileHeader([]);
  }

  /** Header lines in their original order */
  toRecords(): SAMHeader[] {
    return [...this.records];
  }

  /** Format version from `@HD VN` */
  get version(): string | undefined {
    return this.hd?.fields["VN"];
  }

  /** Sort order from `@HD SO` */
  get sortOrder(): string | undefined {
    return this.hd?.fields["SO"];
  }

  /** Reference names in header order */
  get referenceNames(): string[] {
    return [...this.references.keys()];
  }

  get isEmpty(): boolean {
    return this.records.length === 0;
  }

  reference(name: string): SAMReferenceSequenceHeader | undefined {
    return this.references.get(name);
  }

  referenceLength(name: string): number | undefined {
    const ln = this.references.get(name)?.fields["LN"];
    return ln === undefined ? undefined : Number(ln);
  }

  readGroup(id: string): SAMReadGroupHeader | undefined {
    return this.readGroups.get(id);
  }

  program(id: string): SAMProgramHeader | undefined {
    return this.programs.get(id);
  }

  /**
   * Header section as SAM text, one terminated line per record
   */
  toString(): string {
    return this.records.map((record) => `${formatHeaderLine(record)}\n`).join("");
  }
}

function addUnique<T extends SAMTaggedHeader>(index: Map<string, T>, record: T, key: string): void {
  const value = record.fields[key];
  if (value === undefined) {
    throw new ValidationError(`@${record.type} header must have ${key} field`, record.lineNumber);
  }
  if (index.has(value)) {
    throw new ValidationError(`Duplicate @${record.type} ${key}: ${value}`, record.lineNumber);
  }
  index.set(value, record);
}

export { parseHeaderLine, formatHeaderLine, isHeaderType, SAMFileHeader };
