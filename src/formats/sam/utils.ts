/**
 * SAM helpers that sit above the codecs: flag decoding, format detection and
 * reference coordinates
 */

import { parseCigar, referenceSpan } from "./cigar";
import type { SAMAlignment } from "./types";
import { MAPQ_UNAVAILABLE } from "./types";

/**
 * FLAG bits
 */
const SAM_FLAGS = {
  PAIRED: 0x1,
  PROPER_PAIR: 0x2,
  UNMAPPED: 0x4,
  MATE_UNMAPPED: 0x8,
  REVERSE: 0x10,
  MATE_REVERSE: 0x20,
  FIRST_IN_PAIR: 0x40,
  SECOND_IN_PAIR: 0x80,
  SECONDARY: 0x100,
  QC_FAIL: 0x200,
  DUPLICATE: 0x400,
  SUPPLEMENTARY: 0x800,
} as const;

type SAMFlagName = keyof typeof SAM_FLAGS;

interface DecodedFlag {
  isPaired: boolean;
  isProperPair: boolean;
  isUnmapped: boolean;
  isMateUnmapped: boolean;
  isReverse: boolean;
  isMateReverse: boolean;
  isFirstInPair: boolean;
  isSecondInPair: boolean;
  isSecondary: boolean;
  isQCFail: boolean;
  isDuplicate: boolean;
  isSupplementary: boolean;
}

const SAMUtils = {
  /**
   * Detect if string contains SAM format data
   */
  detectFormat(data: string): boolean {
    const lines = data.trim().split(/\r?\n/);

    if (lines.some((line) => /^@(HD|SQ|RG|PG|CO)(\t|$)/.test(line))) {
      return true;
    }

    return lines.some((line) => {
      if (line.startsWith("@")) return false;
      const fields = line.split("\t");
      return (
        fields.length >= 11 &&
        /^\d+$/.test(fields[1] ?? "") && // FLAG
        /^\d+$/.test(fields[3] ?? "") && // POS
        /^\d+$/.test(fields[4] ?? "") // MAPQ
      );
    });
  },

  /**
   * Decode SAM flag into human-readable components
   */
  decodeFlag(flag: number): DecodedFlag {
    return {
      isPaired: (flag & SAM_FLAGS.PAIRED) !== 0,
      isProperPair: (flag & SAM_FLAGS.PROPER_PAIR) !== 0,
      isUnmapped: (flag & SAM_FLAGS.UNMAPPED) !== 0,
      isMateUnmapped: (flag & SAM_FLAGS.MATE_UNMAPPED) !== 0,
      isReverse: (flag & SAM_FLAGS.REVERSE) !== 0,
      isMateReverse: (flag & SAM_FLAGS.MATE_REVERSE) !== 0,
      isFirstInPair: (flag & SAM_FLAGS.FIRST_IN_PAIR) !== 0,
      isSecondInPair: (flag & SAM_FLAGS.SECOND_IN_PAIR) !== 0,
      isSecondary: (flag & SAM_FLAGS.SECONDARY) !== 0,
      isQCFail: (flag & SAM_FLAGS.QC_FAIL) !== 0,
      isDuplicate: (flag & SAM_FLAGS.DUPLICATE) !== 0,
      isSupplementary: (flag & SAM_FLAGS.SUPPLEMENTARY) !== 0,
    };
  },

  /**
   * Combine named flag bits into a FLAG value
   *
   * @example
   * ```typescript
   * SAMUtils.encodeFlag(["PAIRED", "PROPER_PAIR", "MATE_REVERSE", "FIRST_IN_PAIR"]); // 99
   * ```
   */
  encodeFlag(names: readonly SAMFlagName[]): number {
    return names.reduce((flag, name) => flag | SAM_FLAGS[name], 0);
  },

  hasFlag(flag: number, name: SAMFlagName): boolean {
    return (flag & SAM_FLAGS[name]) !== 0;
  },

  /**
   * Parse CIGAR string into operations
   */
  parseCIGAROperations: parseCigar,

  /**
   * Calculate alignment span on reference
   */
  calculateReferenceSpan(cigar: string): number {
    return referenceSpan(parseCigar(cigar));
  },

  /**
   * 1-based inclusive end of the alignment on the reference, or undefined
   * when the record has no position or CIGAR
   */
  alignmentEnd(record: SAMAlignment): number | undefined {
    if (record.pos === 0 || record.cigar.length === 0) {
      return undefined;
    }
    return record.pos + referenceSpan(record.cigar) - 1;
  },

  /**
   * Whether the record is mapped (FLAG 0x4 unset and a reference named)
   */
  isMapped(record: SAMAlignment): boolean {
    return (record.flag & SAM_FLAGS.UNMAPPED) === 0 && record.rname !== "*";
  },

  hasMappingQuality(record: SAMAlignment): boolean {
    return record.mapq !== MAPQ_UNAVAILABLE;
  },
};

export { SAMUtils, SAM_FLAGS };
export type { SAMFlagName, DecodedFlag };
