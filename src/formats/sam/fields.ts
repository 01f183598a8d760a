/**
 * Field grammar for the 11 mandatory SAM alignment columns
 *
 * Each column has a codec with a validity predicate, a parser that returns
 * a {@link ParseResult}, and a formatter. Parsers never coerce: text that
 * does not match the column's grammar is a `MalformedField` error carrying
 * the column index and the raw text.
 *
 * @module sam/fields
 */

import { SamError, ValidationError } from "../../errors";
import { parseCigar, formatCigar } from "./cigar";
import type { CigarOp, MAPQScore, SAMFlag } from "./types";

/**
 * Result type for parsing operations that may fail
 *
 * @example
 * ```ts
 * const result = FLAG.parse("99");
 * if (result.success) {
 *   console.log(result.value); // 99
 * } else {
 *   console.error(result.error.kind); // "MalformedField"
 * }
 * ```
 */
export type ParseResult<T, E = SamError> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

/**
 * Codec for one mandatory column
 */
export interface FieldCodec<T> {
  /** Column name as written in SAM documentation */
  readonly name: string;
  /** 0-based column index */
  readonly index: number;
  /** Whether `text` is a valid value for this column */
  isValid(text: string): boolean;
  parse(text: string): ParseResult<T>;
  format(value: T): string;
}

const MAX_POSITION = 2_147_483_647;

const QNAME_PATTERN = /^[!-?A-~]{1,254}$/;
const RNAME_BODY = "[0-9A-Za-z!#$%&+./:;?@^_|~-][0-9A-Za-z!#$%&*+./:;=?@^_|~-]*";
const RNAME_PATTERN = new RegExp(`^(?:\\*|${RNAME_BODY})$`);
const RNEXT_PATTERN = new RegExp(`^(?:\\*|=|${RNAME_BODY})$`);
const UNSIGNED_PATTERN = /^[0-9]+$/;
const SIGNED_PATTERN = /^-?[0-9]+$/;
const SEQ_PATTERN = /^(?:\*|[A-Za-z=.]+)$/;
const QUAL_PATTERN = /^[!-~]+$/;

function ok<T>(value: T): ParseResult<T> {
  return { success: true, value };
}

function malformed(
  codec: { name: string; index: number },
  text: string,
  reason: string
): { readonly success: false; readonly error: SamError } {
  return {
    success: false,
    error: SamError.malformedField(codec.index, codec.name, text, reason),
  };
}

function textField(
  name: string,
  index: number,
  pattern: RegExp,
  expected: string
): FieldCodec<string> {
  const codec: FieldCodec<string> = {
    name,
    index,
    isValid: (text) => pattern.test(text),
    parse: (text) => (pattern.test(text) ? ok(text) : malformed(codec, text, `is not ${expected}`)),
    format: (value) => value,
  };
  return codec;
}

function integerField<T extends number>(
  name: string,
  index: number,
  pattern: RegExp,
  min: number,
  max: number,
  brand: (value: number) => T
): FieldCodec<T> {
  const inRange = (text: string): boolean => {
    if (!pattern.test(text)) return false;
    const value = Number(text);
    return value >= min && value <= max;
  };

  const codec: FieldCodec<T> = {
    name,
    index,
    isValid: inRange,
    parse: (text) => {
      if (!pattern.test(text)) {
        return malformed(codec, text, "is not an integer");
      }
      if (!inRange(text)) {
        return malformed(codec, text, `is outside ${min}..${max}`);
      }
      return ok(brand(Number(text)));
    },
    format: (value) => value.toString(),
  };
  return codec;
}

const plainNumber = (value: number): number => value;

/**
 * Brand a number as a SAM flag; callers must have range-checked it
 */
function asFlag(value: number): SAMFlag {
  return value as SAMFlag;
}

/**
 * Brand a number as a mapping quality; callers must have range-checked it
 */
function asMapq(value: number): MAPQScore {
  return value as MAPQScore;
}

/**
 * Checked constructor for a SAM flag
 *
 * @throws {ValidationError} If `value` is not an integer in 0..65535
 */
export function createFlag(value: number): SAMFlag {
  if (!Number.isInteger(value) || value < 0 || value > 65_535) {
    throw new ValidationError(`FLAG must be an integer in 0..65535, got ${value}`);
  }
  return asFlag(value);
}

/**
 * Checked constructor for a mapping quality
 *
 * @throws {ValidationError} If `value` is not an integer in 0..255
 */
export function createMapq(value: number): MAPQScore {
  if (!Number.isInteger(value) || value < 0 || value > 255) {
    throw new ValidationError(`MAPQ must be an integer in 0..255, got ${value}`);
  }
  return asMapq(value);
}

export const QNAME = textField("QNAME", 0, QNAME_PATTERN, "a query name of 1-254 printable characters");
export const FLAG = integerField("FLAG", 1, UNSIGNED_PATTERN, 0, 65_535, asFlag);
export const RNAME = textField("RNAME", 2, RNAME_PATTERN, "a reference name or '*'");
export const POS = integerField("POS", 3, UNSIGNED_PATTERN, 0, MAX_POSITION, plainNumber);
export const MAPQ = integerField("MAPQ", 4, UNSIGNED_PATTERN, 0, 255, asMapq);

export const CIGAR: FieldCodec<readonly CigarOp[]> = {
  name: "CIGAR",
  index: 5,
  isValid: (text) => CIGAR.parse(text).success,
  parse: (text) => {
    try {
      return ok(parseCigar(text));
    } catch (error) {
      if (error instanceof SamError) {
        return { success: false, error: error.atField(5) };
      }
      throw error;
    }
  },
  format: (value) => formatCigar(value),
};

export const RNEXT = textField("RNEXT", 6, RNEXT_PATTERN, "a reference name, '=' or '*'");
export const PNEXT = integerField("PNEXT", 7, UNSIGNED_PATTERN, 0, MAX_POSITION, plainNumber);
export const TLEN = integerField("TLEN", 8, SIGNED_PATTERN, -MAX_POSITION, MAX_POSITION, plainNumber);
export const SEQ = textField("SEQ", 9, SEQ_PATTERN, "a sequence of letters, '=' and '.' or '*'");
export const QUAL = textField("QUAL", 10, QUAL_PATTERN, "a string of printable Phred+33 characters or '*'");

/** Number of mandatory columns in an alignment line */
export const MANDATORY_FIELD_COUNT = 11;

/**
 * Column names in line order
 */
export const MANDATORY_FIELD_NAMES = [
  QNAME.name,
  FLAG.name,
  RNAME.name,
  POS.name,
  MAPQ.name,
  CIGAR.name,
  RNEXT.name,
  PNEXT.name,
  TLEN.name,
  SEQ.name,
  QUAL.name,
] as const;
