/**
 * Alignment line parser and serializer
 *
 * @module sam/alignment
 */

import { SamError } from "../../errors";
import { parseCigar } from "./cigar";
import type { FieldCodec, ParseResult } from "./fields";
import {
  CIGAR,
  createFlag,
  createMapq,
  FLAG,
  MANDATORY_FIELD_COUNT,
  MAPQ,
  PNEXT,
  POS,
  QNAME,
  QUAL,
  RNAME,
  RNEXT,
  SEQ,
  TLEN,
} from "./fields";
import { formatTag, parseTag } from "./tags";
import type { CigarOp, MAPQScore, SAMAlignment, SAMFlag, SAMTag } from "./types";
import { MAPQ_UNAVAILABLE, UNAVAILABLE } from "./types";

/**
 * The 11 mandatory columns, parsed
 *
 * Building this type proves every column was present and valid, so the
 * record can be assembled without further checks.
 */
interface SamMandatoryFields {
  readonly qname: string;
  readonly flag: SAMFlag;
  readonly rname: string;
  readonly pos: number;
  readonly mapq: MAPQScore;
  readonly cigar: readonly CigarOp[];
  readonly rnext: string;
  readonly pnext: number;
  readonly tlen: number;
  readonly seq: string;
  readonly qual: string;
}

/**
 * Options for {@link parseAlignmentLine}
 */
interface AlignmentLineOptions {
  /**
   * Skip the SEQ/QUAL length check and the duplicate tag check; the
   * per-field grammar still applies
   */
  readonly skipValidation?: boolean;
}

/**
 * Parse the first 11 fields of a split alignment line
 *
 * Fails on the first column that does not match its grammar.
 */
function parseMandatoryFields(fields: readonly string[]): ParseResult<SamMandatoryFields> {
  const column = <T>(codec: FieldCodec<T>): ParseResult<T> =>
    codec.parse(fields[codec.index] ?? "");

  const qname = column(QNAME);
  if (!qname.success) return qname;
  const flag = column(FLAG);
  if (!flag.success) return flag;
  const rname = column(RNAME);
  if (!rname.success) return rname;
  const pos = column(POS);
  if (!pos.success) return pos;
  const mapq = column(MAPQ);
  if (!mapq.success) return mapq;
  const cigar = column(CIGAR);
  if (!cigar.success) return cigar;
  const rnext = column(RNEXT);
  if (!rnext.success) return rnext;
  const pnext = column(PNEXT);
  if (!pnext.success) return pnext;
  const tlen = column(TLEN);
  if (!tlen.success) return tlen;
  const seq = column(SEQ);
  if (!seq.success) return seq;
  const qual = column(QUAL);
  if (!qual.success) return qual;

  return {
    success: true,
    value: {
      qname: qname.value,
      flag: flag.value,
      rname: rname.value,
      pos: pos.value,
      mapq: mapq.value,
      cigar: cigar.value,
      rnext: rnext.value,
      pnext: pnext.value,
      tlen: tlen.value,
      seq: seq.value,
      qual: qual.value,
    },
  };
}

/**
 * SEQ and QUAL must agree: same length when both are present, and no
 * qualities without a sequence
 */
function checkSequenceQuality(seq: string, qual: string): SamError | undefined {
  if (qual === UNAVAILABLE) {
    return undefined;
  }
  if (seq === UNAVAILABLE) {
    return SamError.malformedField(QUAL.index, QUAL.name, qual, "is present but SEQ is '*'");
  }
  if (seq.length !== qual.length) {
    return SamError.malformedField(
      QUAL.index,
      QUAL.name,
      qual,
      `has ${qual.length} characters but SEQ has ${seq.length}`
    );
  }
  return undefined;
}

function parseOptionalFields(
  tokens: readonly string[],
  qname: string,
  skipValidation: boolean
): SAMTag[] {
  const tags: SAMTag[] = [];
  const seen = new Set<string>();

  tokens.forEach((token, k) => {
    const fieldIndex = MANDATORY_FIELD_COUNT + k;
    if (token === "") {
      throw SamError.malformedField(fieldIndex, "optional field", token, "is empty").withQname(
        qname
      );
    }

    let tag: SAMTag;
    try {
      tag = parseTag(token);
    } catch (error) {
      if (error instanceof SamError) {
        throw error.atField(fieldIndex).withQname(qname);
      }
      throw error;
    }

    if (!skipValidation && seen.has(tag.tag)) {
      throw SamError.duplicateOptionalTag(tag.tag, token, fieldIndex).withQname(qname);
    }
    seen.add(tag.tag);
    tags.push(tag);
  });

  return tags;
}

/**
 * Parse one alignment line (without its terminator)
 *
 * @throws {SamError} `TruncatedRecord` for fewer than 11 fields, otherwise the
 *   error of the first failing field or tag
 *
 * @example
 * ```typescript
 * const record = parseAlignmentLine(
 *   "r001\t99\tchr1\t7\t30\t8M\t=\t37\t39\tTTAGATAA\t*\tNM:i:0"
 * );
 * record.cigar; // [{ length: 8, operation: "M" }]
 * ```
 */
function parseAlignmentLine(text: string, options: AlignmentLineOptions = {}): SAMAlignment {
  const fields = text.split("\t");
  if (fields.length < MANDATORY_FIELD_COUNT) {
    throw SamError.truncatedRecord(fields.length, text);
  }

  const mandatory = parseMandatoryFields(fields);
  if (!mandatory.success) {
    throw mandatory.error;
  }
  const { qname, seq, qual } = mandatory.value;
  const skipValidation = options.skipValidation ?? false;

  if (!skipValidation) {
    const mismatch = checkSequenceQuality(seq, qual);
    if (mismatch !== undefined) {
      throw mismatch.withQname(qname);
    }
  }

  const tags = parseOptionalFields(fields.slice(MANDATORY_FIELD_COUNT), qname, skipValidation);

  return {
    format: "sam",
    ...mandatory.value,
    tags,
  };
}

/**
 * Format an alignment record as one line without a terminator
 */
function formatAlignmentLine(record: SAMAlignment): string {
  const columns = [
    QNAME.format(record.qname),
    FLAG.format(record.flag),
    RNAME.format(record.rname),
    POS.format(record.pos),
    MAPQ.format(record.mapq),
    CIGAR.format(record.cigar),
    RNEXT.format(record.rnext),
    PNEXT.format(record.pnext),
    TLEN.format(record.tlen),
    SEQ.format(record.seq),
    QUAL.format(record.qual),
  ];
  for (const tag of record.tags) {
    columns.push(formatTag(tag));
  }
  return columns.join("\t");
}

/**
 * Fields accepted by {@link createAlignment}; anything left out takes its
 * "unavailable" value
 */
interface SAMAlignmentInit {
  qname?: string;
  flag?: number;
  rname?: string;
  pos?: number;
  mapq?: number;
  /** Operation runs, or CIGAR text */
  cigar?: readonly CigarOp[] | string;
  rnext?: string;
  pnext?: number;
  tlen?: number;
  seq?: string;
  qual?: string;
  tags?: readonly SAMTag[];
}

/**
 * Build an alignment record from plain values
 *
 * FLAG and MAPQ are range-checked and a CIGAR string is parsed; the other
 * fields are checked when the record is written with validation on.
 *
 * @example
 * ```typescript
 * const unmapped = createAlignment({ qname: "read1", flag: 4, seq: "ACGT", qual: "IIII" });
 * formatAlignmentLine(unmapped);
 * // "read1\t4\t*\t0\t255\t*\t*\t0\t0\tACGT\tIIII"
 * ```
 */
function createAlignment(init: SAMAlignmentInit = {}): SAMAlignment {
  const cigar = init.cigar ?? [];
  return {
    format: "sam",
    qname: init.qname ?? UNAVAILABLE,
    flag: createFlag(init.flag ?? 0),
    rname: init.rname ?? UNAVAILABLE,
    pos: init.pos ?? 0,
    mapq: createMapq(init.mapq ?? MAPQ_UNAVAILABLE),
    cigar: typeof cigar === "string" ? parseCigar(cigar) : cigar,
    rnext: init.rnext ?? UNAVAILABLE,
    pnext: init.pnext ?? 0,
    tlen: init.tlen ?? 0,
    seq: init.seq ?? UNAVAILABLE,
    qual: init.qual ?? UNAVAILABLE,
    tags: init.tags ?? [],
  };
}

export {
  parseAlignmentLine,
  formatAlignmentLine,
  parseMandatoryFields,
  checkSequenceQuality,
  createAlignment,
};
export type { AlignmentLineOptions, SamMandatoryFields, SAMAlignmentInit };
