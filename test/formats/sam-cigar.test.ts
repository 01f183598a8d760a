/**
 * Tests for the CIGAR codec
 */

import { describe, expect, test } from 'vitest';
import { SamError } from '../../src/errors';
import {
  formatCigar,
  isCigarOperation,
  mergeCigarRuns,
  parseCigar,
  queryLength,
  referenceSpan,
} from '../../src/formats/sam/cigar';

function cigarError(text: string): SamError {
  try {
    parseCigar(text);
  } catch (error) {
    if (error instanceof SamError) return error;
    throw error;
  }
  throw new Error(`expected '${text}' to be rejected`);
}

describe('CIGAR codec', () => {
  describe('parseCigar', () => {
    test('parses every operation', () => {
      expect(parseCigar('1M2I3D4N5S6H7P8=9X')).toEqual([
        { length: 1, operation: 'M' },
        { length: 2, operation: 'I' },
        { length: 3, operation: 'D' },
        { length: 4, operation: 'N' },
        { length: 5, operation: 'S' },
        { length: 6, operation: 'H' },
        { length: 7, operation: 'P' },
        { length: 8, operation: '=' },
        { length: 9, operation: 'X' },
      ]);
    });

    test("'*' is an empty list", () => {
      expect(parseCigar('*')).toEqual([]);
    });

    test('keeps adjacent runs of the same operation', () => {
      expect(parseCigar('3M2M')).toEqual([
        { length: 3, operation: 'M' },
        { length: 2, operation: 'M' },
      ]);
    });

    test('rejects an empty string', () => {
      const error = cigarError('');
      expect(error.kind).toBe('InvalidCigar');
      expect(error.message).toBe("Invalid CIGAR '': empty CIGAR string");
    });

    test('rejects a missing run length', () => {
      expect(cigarError('M').message).toBe(
        "Invalid CIGAR 'M': expected a run length at position 0, found 'M'"
      );
      expect(cigarError('5M*').message).toBe(
        "Invalid CIGAR '5M*': expected a run length at position 2, found '*'"
      );
    });

    test('rejects trailing digits', () => {
      expect(cigarError('10').message).toBe("Invalid CIGAR '10': run length '10' has no operation");
      expect(cigarError('5M3').message).toBe("Invalid CIGAR '5M3': run length '3' has no operation");
    });

    test('rejects unknown operations', () => {
      const error = cigarError('4M2Z');
      expect(error.message).toBe("Invalid CIGAR '4M2Z': unknown operation 'Z' at position 3");
      expect(error.token).toBe('4M2Z');
      expect(error.fieldName).toBe('CIGAR');
    });

    test('rejects zero-length runs', () => {
      expect(cigarError('0M').message).toBe("Invalid CIGAR '0M': zero-length M run at position 0");
      expect(cigarError('4M0I').message).toBe(
        "Invalid CIGAR '4M0I': zero-length I run at position 2"
      );
    });

    test('rejects run lengths past 2^31-1', () => {
      expect(parseCigar('2147483647M')).toEqual([{ length: 2_147_483_647, operation: 'M' }]);
      expect(cigarError('2147483648M').message).toBe(
        "Invalid CIGAR '2147483648M': run length 2147483648 exceeds 2147483647"
      );
    });
  });

  describe('formatCigar', () => {
    test('writes runs in order', () => {
      expect(
        formatCigar([
          { length: 3, operation: 'S' },
          { length: 10, operation: 'M' },
          { length: 1, operation: 'D' },
        ])
      ).toBe('3S10M1D');
    });

    test("writes an empty list as '*'", () => {
      expect(formatCigar([])).toBe('*');
    });

    test('does not merge adjacent runs', () => {
      expect(formatCigar(parseCigar('3M2M'))).toBe('3M2M');
    });
  });

  describe('spans', () => {
    const ops = parseCigar('3S5M2I4D6N1M2S');

    test('referenceSpan counts M, D, N, = and X', () => {
      expect(referenceSpan(ops)).toBe(16);
      expect(referenceSpan(parseCigar('4=1X3H2P'))).toBe(5);
    });

    test('queryLength counts M, I, S, = and X', () => {
      expect(queryLength(ops)).toBe(13);
      expect(queryLength(parseCigar('2H4=1X'))).toBe(5);
    });

    test("both are zero for '*'", () => {
      expect(referenceSpan([])).toBe(0);
      expect(queryLength([])).toBe(0);
    });
  });

  test('mergeCigarRuns collapses adjacent runs of one operation', () => {
    expect(formatCigar(mergeCigarRuns(parseCigar('3M2M1I1I4M')))).toBe('5M2I4M');
    expect(mergeCigarRuns([])).toEqual([]);
  });

  test('isCigarOperation', () => {
    expect(isCigarOperation('=')).toBe(true);
    expect(isCigarOperation('B')).toBe(false);
  });
});
