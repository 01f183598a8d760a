/**
 * Tests for record schemas and consistency checks
 */

import { type } from 'arktype';
import { describe, expect, test } from 'vitest';
import { CigarValidationError, ValidationError } from '../../src/errors';
import { createAlignment } from '../../src/formats/sam/alignment';
import { parseHeaderLine, SAMFileHeader } from '../../src/formats/sam/header';
import { parseTag } from '../../src/formats/sam/tags';
import type { SAMAlignment, SAMHeader } from '../../src/formats/sam/types';
import {
  assertValidAlignment,
  assertValidHeader,
  CigarOpSchema,
  SAMTagSchema,
  validateAlignment,
} from '../../src/formats/sam/validation';

const header = SAMFileHeader.fromRecords(
  ['@SQ\tSN:chr1\tLN:100', '@SQ\tSN:chr2\tLN:50', '@RG\tID:grp1\tSM:s1'].map((line) =>
    parseHeaderLine(line)
  )
);

function mapped(overrides: Partial<SAMAlignment> = {}): SAMAlignment {
  return {
    ...createAlignment({
      qname: 'r1',
      rname: 'chr1',
      pos: 1,
      mapq: 60,
      cigar: '4M',
      seq: 'ACGT',
      qual: 'IIII',
    }),
    ...overrides,
  };
}

describe('assertValidAlignment', () => {
  test('accepts a well-formed record', () => {
    expect(() => assertValidAlignment(mapped())).not.toThrow();
    expect(() => assertValidAlignment(createAlignment())).not.toThrow();
  });

  test('rejects text a column would not parse', () => {
    expect(() => assertValidAlignment(mapped({ qname: 'bad name' }))).toThrow(
      /^Invalid SAM alignment bad name: /
    );
    expect(() => assertValidAlignment(mapped({ rname: '=' }))).toThrow(ValidationError);
    expect(() => assertValidAlignment(mapped({ pos: -1 }))).toThrow(ValidationError);
    expect(() => assertValidAlignment(mapped({ tlen: 0.5 }))).toThrow(ValidationError);
    expect(() => assertValidAlignment(mapped({ seq: 'AC GT', qual: '*' }))).toThrow(
      ValidationError
    );
  });

  test('leaves the read name out when it is unavailable', () => {
    expect(() => assertValidAlignment(mapped({ qname: '*', rname: '' }))).toThrow(
      /^Invalid SAM alignment: /
    );
  });

  test('rejects SEQ/QUAL disagreement', () => {
    expect(() => assertValidAlignment(mapped({ qual: 'III' }))).toThrow(ValidationError);
    expect(() => assertValidAlignment(mapped({ seq: '*' }))).toThrow(ValidationError);
  });

  test('rejects bad CIGAR runs', () => {
    expect(() => assertValidAlignment(mapped({ cigar: [{ length: 0, operation: 'M' }] }))).toThrow(
      ValidationError
    );
    expect(() =>
      assertValidAlignment(mapped({ cigar: [{ length: 1.5, operation: 'M' }], seq: '*', qual: '*' }))
    ).toThrow(ValidationError);
  });

  test('rejects bad or repeated tags', () => {
    expect(() =>
      assertValidAlignment(mapped({ tags: [{ tag: 'NM', type: 'i', value: 1.5 }] }))
    ).toThrow(ValidationError);
    expect(() =>
      assertValidAlignment(mapped({ tags: [{ tag: 'NM', type: 'i', value: 0 }, parseTag('NM:i:1')] }))
    ).toThrow(ValidationError);
    expect(() =>
      assertValidAlignment(mapped({ tags: [{ tag: 'X', type: 'Z', value: 'a' }] }))
    ).toThrow(ValidationError);
  });
});

describe('SAMTagSchema', () => {
  test('accepts values of the declared type', () => {
    for (const token of ['XA:A:q', 'NM:i:2', 'XF:f:0.5', 'XZ:Z:text', 'XH:H:0AFF', 'ZB:B:s,-5,5']) {
      expect(SAMTagSchema(parseTag(token)) instanceof type.errors).toBe(false);
    }
  });

  test('rejects values of another kind', () => {
    expect(SAMTagSchema({ tag: 'XH', type: 'H', value: '0AFF' }) instanceof type.errors).toBe(true);
    expect(SAMTagSchema({ tag: 'XA', type: 'A', value: 'ab' }) instanceof type.errors).toBe(true);
    expect(SAMTagSchema({ tag: 'XF', type: 'f', value: Number.NaN }) instanceof type.errors).toBe(
      true
    );
  });

  test('checks array elements against the subtype', () => {
    expect(
      SAMTagSchema({ tag: 'ZB', type: 'B', subtype: 'c', value: [1, 200] }) instanceof type.errors
    ).toBe(true);
    expect(SAMTagSchema({ tag: 'ZB', type: 'B', value: [1] }) instanceof type.errors).toBe(true);
  });
});

test('CigarOpSchema', () => {
  expect(CigarOpSchema({ length: 3, operation: 'X' }) instanceof type.errors).toBe(false);
  expect(CigarOpSchema({ length: 3, operation: 'Q' }) instanceof type.errors).toBe(true);
});

describe('assertValidHeader', () => {
  test('accepts parsed header lines', () => {
    for (const line of ['@HD\tVN:1.6', '@SQ\tSN:chr1\tLN:1', '@CO\tnote\twith tab']) {
      expect(() => assertValidHeader(parseHeaderLine(line))).not.toThrow();
    }
  });

  test('rejects missing tags and bad values', () => {
    const noLength: SAMHeader = { format: 'sam-header', type: 'SQ', fields: { SN: 'chr1' } };
    const zeroLength: SAMHeader = {
      format: 'sam-header',
      type: 'SQ',
      fields: { SN: 'chr1', LN: '0' },
    };
    const tabbed: SAMHeader = { format: 'sam-header', type: 'RG', fields: { ID: 'a\tb' } };
    const badKey: SAMHeader = { format: 'sam-header', type: 'PG', fields: { ID: 'p', '1X': 'v' } };

    expect(() => assertValidHeader(noLength)).toThrow(/^Invalid @SQ header: /);
    expect(() => assertValidHeader(zeroLength)).toThrow(ValidationError);
    expect(() => assertValidHeader(tabbed)).toThrow(/^Invalid @RG header: /);
    expect(() => assertValidHeader(badKey)).toThrow(ValidationError);
  });

  test('rejects a multi-line comment', () => {
    expect(() =>
      assertValidHeader({ format: 'sam-header', type: 'CO', comment: 'one\ntwo' })
    ).toThrow(/^Invalid @CO header: /);
  });
});

describe('validateAlignment', () => {
  test('accepts a consistent record', () => {
    expect(() => validateAlignment(mapped(), { header })).not.toThrow();
    expect(() => validateAlignment(mapped({ pos: 97 }), { header })).not.toThrow();
  });

  test('CIGAR query length must match SEQ', () => {
    const record = mapped({ cigar: [{ length: 5, operation: 'M' }], qual: '*' });
    expect(() => validateAlignment(record)).toThrow(CigarValidationError);
    expect(() => validateAlignment(record)).toThrow(
      'CIGAR/sequence length mismatch: CIGAR consumes 5 bases, sequence has 4 bases'
    );
    expect(() => validateAlignment(record, { checkCigar: false })).not.toThrow();
    expect(() => validateAlignment(mapped({ seq: '*', qual: '*', cigar: [] }))).not.toThrow();
  });

  test('RNAME must be declared', () => {
    expect(() => validateAlignment(mapped({ rname: 'chr3' }), { header })).toThrow(
      "Reference 'chr3' of r1 is not declared in the header"
    );
    expect(() => validateAlignment(mapped({ rname: 'chr3' }))).not.toThrow();
  });

  test('alignment must end within its reference', () => {
    expect(() => validateAlignment(mapped({ pos: 98 }), { header })).toThrow(
      'Alignment r1 ends at 101, past the end of chr1 (length 100)'
    );
  });

  test('RNEXT must be declared', () => {
    expect(() => validateAlignment(mapped({ rnext: 'chr9' }), { header })).toThrow(
      "Mate reference 'chr9' of r1 is not declared in the header"
    );
    expect(() => validateAlignment(mapped({ rnext: '=' }), { header })).not.toThrow();
    expect(() => validateAlignment(mapped({ rnext: 'chr2' }), { header })).not.toThrow();
  });

  test('RG tag must name a declared read group', () => {
    expect(() =>
      validateAlignment(mapped({ tags: [parseTag('RG:Z:grp2')] }), { header })
    ).toThrow("Read group 'grp2' of r1 is not declared in the header");
    expect(() =>
      validateAlignment(mapped({ tags: [parseTag('RG:Z:grp1')] }), { header })
    ).not.toThrow();
  });
});
