/**
 * SAM record types and format tables
 *
 * Records are plain readonly objects, built fresh for each parsed line.
 * Sentinel values ("*" for an unavailable name, sequence or quality, 0 for
 * an unavailable position, 255 for an unavailable mapping quality, an empty
 * CIGAR for "*") are stored explicitly rather than as absent properties.
 *
 * @module sam/types
 */

import type { ParserOptions } from "../../types";

// =============================================================================
// BRANDED FIELD TYPES
// =============================================================================

export type SAMFlag = number & {
  readonly __brand: "SAMFlag";
};

export type MAPQScore = number & {
  readonly __brand: "MAPQ";
};

// =============================================================================
// CIGAR
// =============================================================================

/**
 * CIGAR operation alphabet in BAM numeric order
 */
export const CIGAR_OPERATIONS = ["M", "I", "D", "N", "S", "H", "P", "=", "X"] as const;

export type CigarOperation = (typeof CIGAR_OPERATIONS)[number];

/**
 * One run of a CIGAR string
 */
export interface CigarOp {
  readonly length: number;
  readonly operation: CigarOperation;
}

/**
 * Operations that advance along the query / the reference
 */
export const QUERY_CONSUMING_OPERATIONS: ReadonlySet<CigarOperation> = new Set([
  "M",
  "I",
  "S",
  "=",
  "X",
]);
export const REFERENCE_CONSUMING_OPERATIONS: ReadonlySet<CigarOperation> = new Set([
  "M",
  "D",
  "N",
  "=",
  "X",
]);

// =============================================================================
// OPTIONAL TAGS
// =============================================================================

export const TAG_TYPES = ["A", "i", "f", "Z", "H", "B"] as const;

export type SAMTagType = (typeof TAG_TYPES)[number];

export const ARRAY_SUBTYPES = ["c", "C", "s", "S", "i", "I", "f"] as const;

export type SAMArraySubtype = (typeof ARRAY_SUBTYPES)[number];

/**
 * Value range of each array subtype (inclusive); `f` is unbounded
 */
export const ARRAY_SUBTYPE_RANGES: Readonly<
  Record<Exclude<SAMArraySubtype, "f">, readonly [number, number]>
> = {
  c: [-128, 127],
  C: [0, 255],
  s: [-32_768, 32_767],
  S: [0, 65_535],
  i: [-2_147_483_648, 2_147_483_647],
  I: [0, 4_294_967_295],
};

interface SAMTagBase {
  /** Two character tag (e.g., "NM", "MD") */
  readonly tag: string;
}

export interface SAMCharTag extends SAMTagBase {
  readonly type: "A";
  readonly value: string;
}

export interface SAMIntegerTag extends SAMTagBase {
  readonly type: "i";
  readonly value: number;
}

export interface SAMFloatTag extends SAMTagBase {
  readonly type: "f";
  readonly value: number;
}

export interface SAMStringTag extends SAMTagBase {
  readonly type: "Z";
  readonly value: string;
}

export interface SAMHexTag extends SAMTagBase {
  readonly type: "H";
  readonly value: Uint8Array;
}

export interface SAMArrayTag extends SAMTagBase {
  readonly type: "B";
  readonly subtype: SAMArraySubtype;
  readonly value: readonly number[];
}

/**
 * SAM optional tag, discriminated by `type`
 */
export type SAMTag =
  | SAMCharTag
  | SAMIntegerTag
  | SAMFloatTag
  | SAMStringTag
  | SAMHexTag
  | SAMArrayTag;

// =============================================================================
// HEADER RECORDS
// =============================================================================

export const HEADER_TYPES = ["HD", "SQ", "RG", "PG", "CO"] as const;

export type SAMHeaderType = (typeof HEADER_TYPES)[number];

export type SAMTaggedHeaderType = Exclude<SAMHeaderType, "CO">;

/**
 * Tags each header type must carry, in the order they are written
 */
export const REQUIRED_HEADER_TAGS: Readonly<Record<SAMTaggedHeaderType, readonly string[]>> = {
  HD: ["VN"],
  SQ: ["SN", "LN"],
  RG: ["ID"],
  PG: ["ID"],
};

interface SAMHeaderBase {
  readonly format: "sam-header";
  readonly lineNumber?: number;
}

/**
 * Header line made of TAG:VALUE pairs; `fields` keeps parse order
 */
export interface SAMTaggedHeader<T extends SAMTaggedHeaderType = SAMTaggedHeaderType>
  extends SAMHeaderBase {
  readonly type: T;
  readonly fields: Readonly<Record<string, string>>;
}

/** @HD file-level metadata */
export type SAMFileMetadataHeader = SAMTaggedHeader<"HD">;
/** @SQ reference sequence */
export type SAMReferenceSequenceHeader = SAMTaggedHeader<"SQ">;
/** @RG read group */
export type SAMReadGroupHeader = SAMTaggedHeader<"RG">;
/** @PG program */
export type SAMProgramHeader = SAMTaggedHeader<"PG">;

/** @CO freeform comment */
export interface SAMCommentHeader extends SAMHeaderBase {
  readonly type: "CO";
  readonly comment: string;
}

/**
 * One header line, discriminated by `type`
 */
export type SAMHeader =
  | SAMFileMetadataHeader
  | SAMReferenceSequenceHeader
  | SAMReadGroupHeader
  | SAMProgramHeader
  | SAMCommentHeader;

// =============================================================================
// ALIGNMENT RECORDS
// =============================================================================

/**
 * SAM alignment record with validated fields and branded types
 */
export interface SAMAlignment {
  readonly format: "sam";
  /** Query template name, "*" when unavailable */
  readonly qname: string;
  /** Bitwise flag */
  readonly flag: SAMFlag;
  /** Reference name, "*" when unmapped */
  readonly rname: string;
  /** 1-based leftmost position, 0 when unavailable */
  readonly pos: number;
  /** Mapping quality, 255 when unavailable */
  readonly mapq: MAPQScore;
  /** Alignment operations, empty when "*" */
  readonly cigar: readonly CigarOp[];
  /** Reference name of the mate, "=" for same as rname, "*" when unavailable */
  readonly rnext: string;
  /** Position of the mate, 0 when unavailable */
  readonly pnext: number;
  /** Observed template length */
  readonly tlen: number;
  /** Segment sequence, "*" when unavailable */
  readonly seq: string;
  /** Phred+33 base qualities, "*" when unavailable */
  readonly qual: string;
  /** Optional fields in line order */
  readonly tags: readonly SAMTag[];
  readonly lineNumber?: number;
}

export type SAMRecord = SAMHeader | SAMAlignment;

/** Marker for unavailable string fields */
export const UNAVAILABLE = "*";
/** Mapping quality meaning "unavailable" */
export const MAPQ_UNAVAILABLE = 255;

// =============================================================================
// PARSER / WRITER OPTIONS
// =============================================================================

/**
 * SAM-specific parser options
 */
export interface SamParserOptions extends ParserOptions {
  /**
   * Report invalid lines through `onWarning` and continue with the next line
   * instead of stopping at the first error (default: false)
   */
  skipInvalid?: boolean;
}

/**
 * SAM writer options
 */
export interface SamWriterOptions {
  /** Validate caller-built records before writing (default: true) */
  validate?: boolean;
  /** Line terminator appended after every line (default: "\n") */
  lineEnding?: "\n" | "\r\n";
  /** Custom warning handler */
  onWarning?: (warning: string) => void;
}

/**
 * Output collaborator: accepts one line of text at a time
 */
export interface LineSink {
  writeLine(line: string): void;
}
