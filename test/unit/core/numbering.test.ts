import {
  DEFAULT_NUMBERING,
  checkNumberingRange,
  chooseName,
  formatNumber,
  resolveConflict,
  sanitizeSubject,
} from '../../../src/core/numbering.js';
import { PatchErrorCode } from '../../../src/shared/errors.js';
import type { NumberingSpec } from '../../../src/types/patch.js';

const numbered = (overrides: Partial<NumberingSpec> = {}): NumberingSpec => ({
  ...DEFAULT_NUMBERING,
  enabled: true,
  ...overrides,
});

describe('sanitizeSubject', () => {
  it('replaces punctuation and collapses runs of dashes', () => {
    expect(sanitizeSubject('scsi: st: fix  a leak (again)')).toBe('scsi-st-fix-a-leak-again');
  });

  it('drops reply and [PATCH] prefixes', () => {
    expect(sanitizeSubject('Re: [PATCH v2 3/7] mm: tidy up')).toBe('mm-tidy-up');
  });

  it('collapses dots and trims separators at both ends', () => {
    expect(sanitizeSubject('...bump to 1..2.')).toBe('bump-to-1.2');
  });
});

describe('formatNumber', () => {
  it('zero-pads to the width', () => {
    expect(formatNumber(7, 4)).toBe('0007');
    expect(formatNumber(999, 3)).toBe('999');
  });

  it('refuses a number wider than the width', () => {
    expect(() => formatNumber(1000, 3)).toThrow(expect.objectContaining({ code: PatchErrorCode.NUMBER_OUT_OF_RANGE }));
  });

  it('refuses negative numbers and widths below one', () => {
    expect(() => formatNumber(-1, 4)).toThrow(expect.objectContaining({ code: PatchErrorCode.NUMBER_OUT_OF_RANGE }));
    expect(() => formatNumber(1, 0)).toThrow(expect.objectContaining({ code: PatchErrorCode.NUMBER_OUT_OF_RANGE }));
  });
});

describe('checkNumberingRange', () => {
  it('accepts a batch that ends exactly at the widest number', () => {
    expect(() => checkNumberingRange(numbered({ start: 998, width: 3 }), 2)).not.toThrow();
  });

  it('rejects a batch whose last number overflows', () => {
    expect(() => checkNumberingRange(numbered({ start: 998, width: 3 }), 3)).toThrow(
      expect.objectContaining({ code: PatchErrorCode.NUMBER_OUT_OF_RANGE })
    );
  });

  it('ignores the range when numbering is off', () => {
    expect(() => checkNumberingRange({ ...DEFAULT_NUMBERING, start: 5000, width: 1 }, 3)).not.toThrow();
  });
});

describe('chooseName', () => {
  it('derives an unnumbered name from the subject', () => {
    const choice = chooseName({ subject: 'Fix a.c', spec: DEFAULT_NUMBERING, existingNames: new Set() });
    expect(choice).toEqual({ name: 'Fix-a.c', requested: 'Fix-a.c', outcome: 'new', number: undefined });
  });

  it('numbers by batch position and appends the suffix', () => {
    const choice = chooseName({
      subject: 'Fix a.c',
      spec: numbered({ start: 998, width: 3, suffix: '.patch' }),
      position: 1,
      existingNames: new Set(),
    });
    expect(choice.name).toBe('999-Fix-a.c.patch');
    expect(choice.number).toBe(999);
  });

  it('truncates long subjects to the maximum name length', () => {
    const choice = chooseName({
      subject: 'a'.repeat(30) + ' ' + 'b'.repeat(30),
      spec: numbered({ width: 4, suffix: '.patch' }),
      existingNames: new Set(),
      maxLength: 20,
    });
    // 20 - "0001-".length - ".patch".length = 9 characters of subject
    expect(choice.name).toBe('0001-aaaaaaaaa.patch');
  });

  it('falls back to a fixed stem for subjects with no usable characters', () => {
    const choice = chooseName({ subject: '!!!', spec: DEFAULT_NUMBERING, existingNames: new Set() });
    expect(choice.name).toBe('patch');
  });

  it('renames on conflict using the disambiguator', () => {
    const choice = chooseName({
      subject: 'Fix a.c',
      spec: DEFAULT_NUMBERING,
      existingNames: new Set(['Fix-a.c']),
      disambiguator: '1234567890abcdef',
    });
    expect(choice).toEqual({ name: 'Fix-a.c-12345678', requested: 'Fix-a.c', outcome: 'renamed', number: undefined });
  });
});

describe('resolveConflict', () => {
  it('keeps a free name', () => {
    expect(resolveConflict('fix', '.patch', new Set(['other.patch']), false)).toEqual({
      name: 'fix.patch',
      requested: 'fix.patch',
      outcome: 'new',
    });
  });

  it('keeps the name with force', () => {
    expect(resolveConflict('fix', '.patch', new Set(['fix.patch']), true).outcome).toBe('overwrite');
  });

  it('counts upward while the alternate name is taken too', () => {
    const taken = new Set(['fix.patch', 'fix-deadbeef.patch', 'fix-deadbeef-2.patch']);
    expect(resolveConflict('fix', '.patch', taken, false, 'deadbeefcafe').name).toBe('fix-deadbeef-3.patch');
  });
});
