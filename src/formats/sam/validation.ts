/**
 * Record schemas and cross-field consistency checks
 *
 * The schemas check caller-built records before they are written: every
 * value must format to text its column's grammar accepts. The consistency
 * checks in {@link validateAlignment} go further than the format requires
 * and are never run by the reader on its own.
 *
 * @module sam/validation
 */

import { type } from "arktype";
import { CigarValidationError, ValidationError } from "../../errors";
import { checkSequenceQuality } from "./alignment";
import { formatCigar, queryLength, referenceSpan } from "./cigar";
import type { FieldCodec } from "./fields";
import { FLAG, MAPQ, PNEXT, POS, QNAME, RNAME, RNEXT, SEQ, TLEN, QUAL } from "./fields";
import type { SAMFileHeader } from "./header";
import {
  CHAR_PATTERN,
  INTEGER_MAX,
  INTEGER_MIN,
  isValidTagName,
  STRING_PATTERN,
} from "./tags";
import type { SAMAlignment, SAMArraySubtype, SAMHeader } from "./types";
import { ARRAY_SUBTYPE_RANGES, REQUIRED_HEADER_TAGS, UNAVAILABLE } from "./types";

const MAX_INT32 = 2_147_483_647;
const HEADER_VALUE_PATTERN = /^[^\t\n\r]*$/;
const COMMENT_PATTERN = /^[^\n\r]*$/;

type ColumnCheck = Pick<FieldCodec<unknown>, "name" | "isValid">;

// =============================================================================
// SCHEMAS
// =============================================================================

/**
 * One CIGAR run: positive integer length and a known operation
 */
export const CigarOpSchema = type({
  length: "number>=1",
  operation: '"M"|"I"|"D"|"N"|"S"|"H"|"P"|"="|"X"',
}).narrow((op, ctx) => {
  if (!Number.isInteger(op.length) || op.length > MAX_INT32) {
    return ctx.reject({
      expected: `an integer run length in 1..${MAX_INT32}`,
      actual: `${op.length}`,
      path: ["length"],
    });
  }
  return true;
});

function arrayElementProblem(subtype: SAMArraySubtype, element: number): string | undefined {
  if (subtype === "f") {
    return Number.isFinite(element) ? undefined : "a finite number";
  }
  const [min, max] = ARRAY_SUBTYPE_RANGES[subtype];
  if (!Number.isInteger(element) || element < min || element > max) {
    return `an integer in ${min}..${max}`;
  }
  return undefined;
}

/**
 * Optional field: tag name, type code and a value of the matching kind
 */
export const SAMTagSchema = type({
  tag: "string",
  type: '"A"|"i"|"f"|"Z"|"H"|"B"',
  value: "unknown",
  "subtype?": '"c"|"C"|"s"|"S"|"i"|"I"|"f"',
}).narrow((tag, ctx) => {
  if (!isValidTagName(tag.tag)) {
    return ctx.reject({
      expected: "a tag name matching [A-Za-z][A-Za-z0-9]",
      actual: tag.tag,
      path: ["tag"],
    });
  }

  const value = tag.value;
  const reject = (expected: string): false =>
    ctx.reject({ expected, actual: String(value), path: ["value"] });

  switch (tag.type) {
    case "A":
      return typeof value === "string" && CHAR_PATTERN.test(value)
        ? true
        : reject("one printable character");
    case "i":
      return typeof value === "number" &&
        Number.isInteger(value) &&
        value >= INTEGER_MIN &&
        value <= INTEGER_MAX
        ? true
        : reject(`an integer in ${INTEGER_MIN}..${INTEGER_MAX}`);
    case "f":
      return typeof value === "number" && Number.isFinite(value)
        ? true
        : reject("a finite number");
    case "Z":
      return typeof value === "string" && STRING_PATTERN.test(value)
        ? true
        : reject("printable text");
    case "H":
      return value instanceof Uint8Array ? true : reject("a Uint8Array");
    case "B": {
      const subtype = tag.subtype;
      if (subtype === undefined) {
        return ctx.reject({ expected: "an array subtype", actual: "undefined", path: ["subtype"] });
      }
      if (!Array.isArray(value)) {
        return reject("an array of numbers");
      }
      const elements: readonly unknown[] = value;
      for (const [index, element] of elements.entries()) {
        const problem =
          typeof element === "number" ? arrayElementProblem(subtype, element) : "a number";
        if (problem !== undefined) {
          return ctx.reject({
            expected: problem,
            actual: String(element),
            path: ["value", index],
          });
        }
      }
      return true;
    }
  }
});

/**
 * Alignment record whose fields all format to valid column text
 */
export const SAMAlignmentSchema = type({
  format: '"sam"',
  qname: "string",
  flag: "number",
  rname: "string",
  pos: "number",
  mapq: "number",
  cigar: CigarOpSchema.array(),
  rnext: "string",
  pnext: "number",
  tlen: "number",
  seq: "string",
  qual: "string",
  tags: SAMTagSchema.array(),
  "lineNumber?": "number>0",
}).narrow((record, ctx) => {
  const columns: ReadonlyArray<readonly [ColumnCheck, string, string]> = [
    [QNAME, "qname", record.qname],
    [FLAG, "flag", String(record.flag)],
    [RNAME, "rname", record.rname],
    [POS, "pos", String(record.pos)],
    [MAPQ, "mapq", String(record.mapq)],
    [RNEXT, "rnext", record.rnext],
    [PNEXT, "pnext", String(record.pnext)],
    [TLEN, "tlen", String(record.tlen)],
    [SEQ, "seq", record.seq],
    [QUAL, "qual", record.qual],
  ];

  for (const [codec, key, text] of columns) {
    if (!codec.isValid(text)) {
      return ctx.reject({
        expected: `a valid ${codec.name}`,
        actual: text,
        path: [key],
      });
    }
  }

  const mismatch = checkSequenceQuality(record.seq, record.qual);
  if (mismatch !== undefined) {
    return ctx.reject({
      expected: "QUAL matching SEQ",
      actual: `SEQ length ${record.seq.length}, QUAL '${record.qual}'`,
      path: ["qual"],
      message: mismatch.message,
    });
  }

  const seen = new Set<string>();
  for (const [index, tag] of record.tags.entries()) {
    if (seen.has(tag.tag)) {
      return ctx.reject({
        expected: "unique optional tags",
        actual: `${tag.tag} repeated`,
        path: ["tags", index, "tag"],
      });
    }
    seen.add(tag.tag);
  }

  return true;
});

/**
 * Header record: tagged lines need their required tags, TAG:VALUE keys and
 * single-line values; a comment must fit on one line
 */
export const SAMHeaderSchema = type({
  format: '"sam-header"',
  type: '"HD"|"SQ"|"RG"|"PG"',
  fields: "Record<string, string>",
  "lineNumber?": "number>0",
})
  .or({
    format: '"sam-header"',
    type: '"CO"',
    comment: "string",
    "lineNumber?": "number>0",
  })
  .narrow((header, ctx) => {
    if (header.type === "CO") {
      return COMMENT_PATTERN.test(header.comment)
        ? true
        : ctx.reject({ expected: "a single-line comment", actual: header.comment, path: ["comment"] });
    }

    for (const [key, value] of Object.entries(header.fields)) {
      if (!isValidTagName(key)) {
        return ctx.reject({
          expected: "a tag key matching [A-Za-z][A-Za-z0-9]",
          actual: key,
          path: ["fields", key],
        });
      }
      if (!HEADER_VALUE_PATTERN.test(value)) {
        return ctx.reject({
          expected: "a value without tabs or line breaks",
          actual: JSON.stringify(value),
          path: ["fields", key],
        });
      }
    }

    for (const required of REQUIRED_HEADER_TAGS[header.type]) {
      if (!Object.hasOwn(header.fields, required)) {
        return ctx.reject({
          expected: `@${header.type} with a ${required} field`,
          actual: "missing",
          path: ["fields", required],
        });
      }
    }

    if (header.type === "SQ") {
      const ln = header.fields["LN"] ?? "";
      const length = Number(ln);
      if (!/^[0-9]+$/.test(ln) || length < 1 || length > MAX_INT32) {
        return ctx.reject({
          expected: `a reference length in 1..${MAX_INT32}`,
          actual: ln,
          path: ["fields", "LN"],
        });
      }
    }

    return true;
  });

// =============================================================================
// RECORD CHECKS
// =============================================================================

/**
 * Check a caller-built alignment against {@link SAMAlignmentSchema}
 *
 * @throws {ValidationError} With the schema's summary
 */
export function assertValidAlignment(record: SAMAlignment): void {
  const result = SAMAlignmentSchema(record);
  if (result instanceof type.errors) {
    throw new ValidationError(
      `Invalid SAM alignment${record.qname === UNAVAILABLE ? "" : ` ${record.qname}`}: ${result.summary}`,
      record.lineNumber
    );
  }
}

/**
 * Check a caller-built header record against {@link SAMHeaderSchema}
 *
 * @throws {ValidationError} With the schema's summary
 */
export function assertValidHeader(record: SAMHeader): void {
  const result = SAMHeaderSchema(record);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid @${record.type} header: ${result.summary}`, record.lineNumber);
  }
}

/**
 * Options for {@link validateAlignment}
 */
export interface AlignmentConsistencyOptions {
  /** Header to resolve RNAME, RNEXT and RG against */
  header?: SAMFileHeader;
  /** Require the CIGAR query length to equal the SEQ length (default: true) */
  checkCigar?: boolean;
}

/**
 * Cross-field consistency checks beyond the line grammar
 *
 * - CIGAR query length equals the SEQ length (when both are present)
 * - with a header: RNAME and RNEXT name declared references, the
 *   alignment ends within its reference, and an `RG` tag names a declared
 *   read group
 *
 * @throws {CigarValidationError} On a CIGAR/SEQ length mismatch
 * @throws {ValidationError} On a header inconsistency
 *
 * @example
 * ```typescript
 * const header = SAMFileHeader.fromRecords(headers);
 * for (const record of alignments) {
 *   validateAlignment(record, { header });
 * }
 * ```
 */
export function validateAlignment(
  record: SAMAlignment,
  options: AlignmentConsistencyOptions = {}
): void {
  const checkCigar = options.checkCigar ?? true;

  if (checkCigar && record.cigar.length > 0 && record.seq !== UNAVAILABLE) {
    const consumed = queryLength(record.cigar);
    if (consumed !== record.seq.length) {
      throw CigarValidationError.withMismatchAnalysis(
        formatCigar(record.cigar),
        record.seq.length,
        consumed,
        record.lineNumber
      );
    }
  }

  const header = options.header;
  if (header === undefined) {
    return;
  }

  if (record.rname !== UNAVAILABLE) {
    const length = header.referenceLength(record.rname);
    if (length === undefined) {
      throw new ValidationError(
        `Reference '${record.rname}' of ${record.qname} is not declared in the header`,
        record.lineNumber
      );
    }
    if (record.pos > 0 && record.cigar.length > 0) {
      const end = record.pos + referenceSpan(record.cigar) - 1;
      if (end > length) {
        throw new ValidationError(
          `Alignment ${record.qname} ends at ${end}, past the end of ${record.rname} (length ${length})`,
          record.lineNumber
        );
      }
    }
  }

  if (
    record.rnext !== UNAVAILABLE &&
    record.rnext !== "=" &&
    header.reference(record.rnext) === undefined
  ) {
    throw new ValidationError(
      `Mate reference '${record.rnext}' of ${record.qname} is not declared in the header`,
      record.lineNumber
    );
  }

  const readGroup = record.tags.find((tag) => tag.tag === "RG");
  if (
    readGroup !== undefined &&
    readGroup.type === "Z" &&
    header.rg.length > 0 &&
    header.readGroup(readGroup.value) === undefined
  ) {
    throw new ValidationError(
      `Read group '${readGroup.value}' of ${record.qname} is not declared in the header`,
      record.lineNumber
    );
  }
}
