/**
 * SAM (Sequence Alignment/Map) module exports
 *
 * Text SAM reading and writing: header lines, the eleven mandatory alignment
 * columns, CIGAR strings and typed optional tags.
 *
 * @example Stream a file
 * ```typescript
 * import { SAMParser } from "sam-kit";
 *
 * const parser = new SAMParser({ skipInvalid: true });
 * for await (const record of parser.parseFile("reads.sam")) {
 *   if (record.format === "sam") {
 *     console.log(`${record.qname} ${record.rname}:${record.pos}`);
 *   }
 * }
 * ```
 *
 * @example Round-trip text
 * ```typescript
 * import { readSam, SAMWriter } from "sam-kit";
 *
 * const text = new SAMWriter().writeString(readSam(input));
 * ```
 *
 * @module sam
 */

import { formatCigar, mergeCigarRuns, parseCigar, queryLength, referenceSpan } from "./cigar";
import { findTag, formatTag, parseTag } from "./tags";

const CigarUtils = {
  parseCigar,
  formatCigar,
  referenceSpan,
  queryLength,
  mergeCigarRuns,
} as const;

const TagUtils = {
  parseTag,
  formatTag,
  findTag,
} as const;

// =============================================================================
// EXPORTS
// =============================================================================

// Line codecs
export {
  checkSequenceQuality,
  createAlignment,
  formatAlignmentLine,
  parseAlignmentLine,
  parseMandatoryFields,
} from "./alignment";
export type { AlignmentLineOptions, SAMAlignmentInit, SamMandatoryFields } from "./alignment";
export { formatCigar, isCigarOperation, mergeCigarRuns, parseCigar, queryLength, referenceSpan } from "./cigar";
export {
  CIGAR,
  createFlag,
  createMapq,
  FLAG,
  MANDATORY_FIELD_COUNT,
  MANDATORY_FIELD_NAMES,
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
export type { FieldCodec, ParseResult } from "./fields";
export { formatHeaderLine, isHeaderType, parseHeaderLine, SAMFileHeader } from "./header";
export { findTag, formatTag, isArraySubtype, isTagType, isValidTagName, parseTag } from "./tags";

// Reading and writing
export { readSam, readSamAsync, SamLineReader, SAMParser, SAMReader, SamParserOptionsSchema } from "./reader";
export type { ReaderState, SAMAlignmentStream, SamLineReaderOptions } from "./reader";
export { SAMWriter, SamWriterOptionsSchema, writeSam } from "./writer";

// Validation
export {
  assertValidAlignment,
  assertValidHeader,
  CigarOpSchema,
  SAMAlignmentSchema,
  SAMHeaderSchema,
  SAMTagSchema,
  validateAlignment,
} from "./validation";
export type { AlignmentConsistencyOptions } from "./validation";

// Types and constants
export {
  ARRAY_SUBTYPE_RANGES,
  ARRAY_SUBTYPES,
  CIGAR_OPERATIONS,
  HEADER_TYPES,
  MAPQ_UNAVAILABLE,
  QUERY_CONSUMING_OPERATIONS,
  REFERENCE_CONSUMING_OPERATIONS,
  REQUIRED_HEADER_TAGS,
  TAG_TYPES,
  UNAVAILABLE,
} from "./types";
export type {
  CigarOp,
  CigarOperation,
  LineSink,
  MAPQScore,
  SAMAlignment,
  SAMArraySubtype,
  SAMArrayTag,
  SAMCharTag,
  SAMCommentHeader,
  SAMFileMetadataHeader,
  SAMFlag,
  SAMFloatTag,
  SAMHeader,
  SAMHeaderType,
  SAMHexTag,
  SAMIntegerTag,
  SAMProgramHeader,
  SAMReadGroupHeader,
  SAMRecord,
  SAMReferenceSequenceHeader,
  SAMStringTag,
  SAMTag,
  SAMTaggedHeader,
  SAMTaggedHeaderType,
  SAMTagType,
  SamParserOptions,
  SamWriterOptions,
} from "./types";

// Namespace exports
export { SAM_FLAGS, SAMUtils } from "./utils";
export type { DecodedFlag, SAMFlagName } from "./utils";
export { CigarUtils, TagUtils };
