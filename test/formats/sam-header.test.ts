/**
 * Tests for header line parsing, formatting and the header dictionary
 */

import { describe, expect, test } from 'vitest';
import { SamError, ValidationError } from '../../src/errors';
import { formatHeaderLine, parseHeaderLine, SAMFileHeader } from '../../src/formats/sam/header';
import type { SAMHeader } from '../../src/formats/sam/types';

function headerError(line: string): SamError {
  try {
    parseHeaderLine(line);
  } catch (error) {
    if (error instanceof SamError) return error;
    throw error;
  }
  throw new Error(`expected '${line}' to be rejected`);
}

const HEADER_LINES = [
  '@HD\tVN:1.6\tSO:coordinate',
  '@SQ\tSN:chr1\tLN:1000\tAS:test',
  '@SQ\tSN:chr2\tLN:500',
  '@RG\tID:grp1\tSM:sample1',
  '@PG\tID:aligner\tPN:aligner\tVN:0.1',
  '@CO\tcomment text',
];

describe('parseHeaderLine', () => {
  test('parses tagged lines into fields in order', () => {
    const record = parseHeaderLine('@HD\tVN:1.6\tSO:coordinate');
    expect(record).toEqual({
      format: 'sam-header',
      type: 'HD',
      fields: { VN: '1.6', SO: 'coordinate' },
    });
    if (record.type !== 'CO') {
      expect(Object.keys(record.fields)).toEqual(['VN', 'SO']);
    }
  });

  test('keeps colons after the first in a value', () => {
    expect(parseHeaderLine('@PG\tID:run:1\tCL:tool -x a:b')).toEqual({
      format: 'sam-header',
      type: 'PG',
      fields: { ID: 'run:1', CL: 'tool -x a:b' },
    });
  });

  test('keeps the whole comment, tabs included', () => {
    expect(parseHeaderLine('@CO\tfree text\twith tab')).toEqual({
      format: 'sam-header',
      type: 'CO',
      comment: 'free text\twith tab',
    });
    expect(parseHeaderLine('@CO')).toEqual({ format: 'sam-header', type: 'CO', comment: '' });
  });

  test('rejects unknown record types', () => {
    const error = headerError('@XY\tID:1');
    expect(error.kind).toBe('UnknownHeaderType');
    expect(error.message).toBe('Invalid header type: @XY');
  });

  test("rejects a line without '@'", () => {
    expect(headerError('HD\tVN:1.6').kind).toBe('MalformedField');
  });

  test("requires the schema's tags", () => {
    const hd = headerError('@HD\tSO:coordinate');
    expect(hd.kind).toBe('MissingRequiredTag');
    expect(hd.message).toBe('@HD header must have VN field');
    expect(headerError('@SQ\tSN:chr1').message).toBe('@SQ header must have LN field');
    expect(headerError('@RG\tSM:x').message).toBe('@RG header must have ID field');
    expect(headerError('@PG').message).toBe('@PG header must have ID field');
  });

  test('rejects a repeated tag', () => {
    const error = headerError('@SQ\tSN:chr1\tSN:chr2\tLN:5');
    expect(error.kind).toBe('DuplicateTag');
    expect(error.message).toBe('Duplicate SN field in @SQ header');
    expect(error.fieldIndex).toBe(2);
  });

  test('rejects pairs without a valid TAG:', () => {
    const missing = headerError('@RG\tIDfoo');
    expect(missing.kind).toBe('MalformedField');
    expect(missing.message).toBe("Malformed @RG field (field 1): 'IDfoo' is not TAG:VALUE");
    expect(headerError('@RG\tI:x').message).toBe(
      "Malformed @RG field (field 1): 'I:x' has an invalid tag key"
    );
    expect(headerError('@RG\tID:x\t1D:y').fieldIndex).toBe(2);
  });

  test('requires a positive reference length', () => {
    const error = headerError('@SQ\tSN:chr1\tLN:0');
    expect(error.kind).toBe('MalformedField');
    expect(error.message).toBe(
      "Malformed LN (field 2): '0' is not a reference length in 1..2147483647"
    );
    expect(headerError('@SQ\tLN:abc\tSN:chr1').fieldIndex).toBe(1);
    expect(headerError('@SQ\tSN:chr1\tLN:2147483648').kind).toBe('MalformedField');
  });
});

describe('formatHeaderLine', () => {
  test('round-trips canonical lines', () => {
    for (const line of HEADER_LINES) {
      expect(formatHeaderLine(parseHeaderLine(line))).toBe(line);
    }
  });

  test('writes required tags first', () => {
    const record: SAMHeader = {
      format: 'sam-header',
      type: 'SQ',
      fields: { LN: '100', M5: 'abc', SN: 'chr1' },
    };
    expect(formatHeaderLine(record)).toBe('@SQ\tSN:chr1\tLN:100\tM5:abc');
  });

  test('rejects a record missing a required tag', () => {
    const record: SAMHeader = { format: 'sam-header', type: 'RG', fields: { SM: 'x' } };
    expect(() => formatHeaderLine(record)).toThrow('@RG header must have ID field');
  });

  test('writes an empty comment as a bare @CO', () => {
    expect(formatHeaderLine({ format: 'sam-header', type: 'CO', comment: '' })).toBe('@CO');
  });
});

describe('SAMFileHeader', () => {
  const header = SAMFileHeader.fromRecords(HEADER_LINES.map((line) => parseHeaderLine(line)));

  test('exposes @HD values', () => {
    expect(header.version).toBe('1.6');
    expect(header.sortOrder).toBe('coordinate');
  });

  test('indexes references in header order', () => {
    expect(header.referenceNames).toEqual(['chr1', 'chr2']);
    expect(header.referenceLength('chr1')).toBe(1000);
    expect(header.referenceLength('chr3')).toBeUndefined();
    expect(header.reference('chr2')?.fields['LN']).toBe('500');
  });

  test('indexes read groups and programs', () => {
    expect(header.readGroup('grp1')?.fields['SM']).toBe('sample1');
    expect(header.program('aligner')?.fields['VN']).toBe('0.1');
    expect(header.readGroup('grp2')).toBeUndefined();
  });

  test('keeps typed lists and the original order', () => {
    expect(header.sq).toHaveLength(2);
    expect(header.co).toEqual([{ format: 'sam-header', type: 'CO', comment: 'comment text' }]);
    expect(header.toRecords().map((record) => record.type)).toEqual([
      'HD',
      'SQ',
      'SQ',
      'RG',
      'PG',
      'CO',
    ]);
  });

  test('formats back to the header section', () => {
    expect(header.toString()).toBe(`${HEADER_LINES.join('\n')}\n`);
  });

  test('rejects duplicate identifiers', () => {
    const sq = parseHeaderLine('@SQ\tSN:chr1\tLN:10');
    expect(() => SAMFileHeader.fromRecords([sq, sq])).toThrow(ValidationError);
    expect(() => SAMFileHeader.fromRecords([sq, sq])).toThrow('Duplicate @SQ SN: chr1');

    const hd = parseHeaderLine('@HD\tVN:1.6');
    expect(() => SAMFileHeader.fromRecords([hd, hd])).toThrow('Duplicate @HD header');
  });

  test('empty header', () => {
    const empty = SAMFileHeader.empty();
    expect(empty.isEmpty).toBe(true);
    expect(empty.version).toBeUndefined();
    expect(empty.referenceNames).toEqual([]);
    expect(empty.toString()).toBe('');
  });
});
