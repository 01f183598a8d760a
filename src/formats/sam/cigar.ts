/**
 * CIGAR string codec
 *
 * A CIGAR string is one or more `<length><operation>` runs, or `*` when the
 * alignment has none. Runs are kept exactly as written: adjacent runs of the
 * same operation are never merged on parse or format.
 *
 * @module sam/cigar
 */

import { SamError } from "../../errors";
import type { CigarOp, CigarOperation } from "./types";
import {
  CIGAR_OPERATIONS,
  QUERY_CONSUMING_OPERATIONS,
  REFERENCE_CONSUMING_OPERATIONS,
  UNAVAILABLE,
} from "./types";

const MAX_RUN_LENGTH = 2_147_483_647;

const OPERATION_SET: ReadonlySet<string> = new Set(CIGAR_OPERATIONS);

function isCigarOperation(char: string): char is CigarOperation {
  return OPERATION_SET.has(char);
}

function isDigit(char: string): boolean {
  return char >= "0" && char <= "9";
}

/**
 * Parse a CIGAR string into its operation runs
 *
 * @throws {SamError} `InvalidCigar` naming the offending text
 *
 * @example
 * ```typescript
 * parseCigar("8M2I4M");
 * // [{ length: 8, operation: "M" }, { length: 2, operation: "I" }, { length: 4, operation: "M" }]
 * parseCigar("*"); // []
 * ```
 */
function parseCigar(text: string): CigarOp[] {
  if (text === UNAVAILABLE) {
    return [];
  }
  if (text.length === 0) {
    throw SamError.invalidCigar(text, "empty CIGAR string");
  }

  const ops: CigarOp[] = [];
  let position = 0;

  while (position < text.length) {
    const start = position;
    while (position < text.length && isDigit(text.charAt(position))) {
      position++;
    }

    if (position === start) {
      throw SamError.invalidCigar(
        text,
        `expected a run length at position ${start}, found '${text.charAt(start)}'`
      );
    }
    if (position === text.length) {
      throw SamError.invalidCigar(text, `run length '${text.slice(start)}' has no operation`);
    }

    const operation = text.charAt(position);
    if (!isCigarOperation(operation)) {
      throw SamError.invalidCigar(text, `unknown operation '${operation}' at position ${position}`);
    }

    const length = Number(text.slice(start, position));
    if (length === 0) {
      throw SamError.invalidCigar(text, `zero-length ${operation} run at position ${start}`);
    }
    if (length > MAX_RUN_LENGTH) {
      throw SamError.invalidCigar(text, `run length ${length} exceeds ${MAX_RUN_LENGTH}`);
    }

    ops.push({ length, operation });
    position++;
  }

  return ops;
}

/**
 * Format operation runs as a CIGAR string; an empty list is `*`
 */
function formatCigar(ops: readonly CigarOp[]): string {
  if (ops.length === 0) {
    return UNAVAILABLE;
  }
  return ops.map((op) => `${op.length}${op.operation}`).join("");
}

/**
 * Number of reference bases covered (M, D, N, =, X)
 */
function referenceSpan(ops: readonly CigarOp[]): number {
  let span = 0;
  for (const op of ops) {
    if (REFERENCE_CONSUMING_OPERATIONS.has(op.operation)) {
      span += op.length;
    }
  }
  return span;
}

/**
 * Number of query bases consumed (M, I, S, =, X); must equal the SEQ length
 */
function queryLength(ops: readonly CigarOp[]): number {
  let length = 0;
  for (const op of ops) {
    if (QUERY_CONSUMING_OPERATIONS.has(op.operation)) {
      length += op.length;
    }
  }
  return length;
}

/**
 * Collapse adjacent runs of the same operation
 *
 * Formatting never does this on its own; callers that build CIGARs
 * incrementally can use it before writing.
 *
 * @example
 * ```typescript
 * formatCigar(mergeCigarRuns(parseCigar("3M2M1I"))); // "5M1I"
 * ```
 */
function mergeCigarRuns(ops: readonly CigarOp[]): CigarOp[] {
  const merged: CigarOp[] = [];
  for (const op of ops) {
    const last = merged[merged.length - 1];
    if (last !== undefined && last.operation === op.operation) {
      merged[merged.length - 1] = { length: last.length + op.length, operation: op.operation };
    } else {
      merged.push(op);
    }
  }
  return merged;
}

export { parseCigar, formatCigar, referenceSpan, queryLength, mergeCigarRuns, isCigarOperation };
