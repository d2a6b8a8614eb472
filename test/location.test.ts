import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import {
  decodeLocation,
  parseIndexNumeral,
  resolveLocations,
} from '../src/semantics/location.js';
import { declarationsOf as declarations } from './test-helpers.js';

describe('decodeLocation', () => {
  it('decodes compiler symbols', () => {
    expect(decodeLocation('__IX0_1')).toEqual({
      ok: true,
      address: {
        direction: 'IN',
        size: 'BIT',
        directionFlag: 'I',
        sizeFlag: 'X',
        majorIndex: 0,
        minorIndex: 1,
        hasMinor: true,
        symbol: '__IX0_1',
        malformedNumerals: false,
      },
    });
  });

  it('decodes IEC addresses into compiler symbols', () => {
    const res = decodeLocation('%QB3');
    expect(res.ok && res.address).toMatchObject({
      direction: 'OUT',
      size: 'BYTE',
      majorIndex: 3,
      minorIndex: 0,
      hasMinor: false,
      symbol: '__QB3',
    });
    const bit = decodeLocation('%IX0.1');
    expect(bit.ok && bit.address.symbol).toBe('__IX0_1');
  });

  it('maps every size flag', () => {
    const sizes = ['__MX1', '__MB1', '__MW1', '__MD1', '__ML1'].map((n) => {
      const r = decodeLocation(n);
      return r.ok ? r.address.size : r.message;
    });
    expect(sizes).toEqual(['BIT', 'BYTE', 'WORD', 'DOUBLEWORD', 'LONGWORD']);
  });

  it('keeps long-word memory indices above the buffer range', () => {
    const r = decodeLocation('__ML1025');
    expect(r.ok && [r.address.direction, r.address.size, r.address.majorIndex]).toEqual([
      'MEM',
      'LONGWORD',
      1025,
    ]);
  });

  it('rejects names without a location prefix or with unknown flags', () => {
    expect(decodeLocation('IX0')).toEqual({
      ok: false,
      message: '"IX0" is not a located address (expected a "__" or "%" prefix)',
    });
    expect(decodeLocation('__ZX0')).toEqual({
      ok: false,
      message: 'Unknown location direction "Z" in "__ZX0" (expected I|Q|M)',
    });
    expect(decodeLocation('__IG0')).toEqual({
      ok: false,
      message: 'Unknown location size "G" in "__IG0" (expected X|B|W|D|L)',
    });
    expect(decodeLocation('%IX0.1.2')).toEqual({
      ok: false,
      message: '"%IX0.1.2" does not map to a C identifier',
    });
  });

  it('reads malformed numerals like atoi and flags them', () => {
    const r = decodeLocation('__IXabc');
    expect(r.ok && [r.address.majorIndex, r.address.malformedNumerals]).toEqual([0, true]);
  });
});

describe('parseIndexNumeral', () => {
  it('takes the leading digits and wraps at 16 bits', () => {
    expect(parseIndexNumeral('12')).toEqual({ value: 12, wellFormed: true });
    expect(parseIndexNumeral('12ab')).toEqual({ value: 12, wellFormed: false });
    expect(parseIndexNumeral('')).toEqual({ value: 0, wellFormed: false });
    expect(parseIndexNumeral('70000')).toEqual({ value: 4464, wellFormed: true });
  });
});

describe('resolveLocations', () => {
  const warn = { addressPolicy: 'warn' as const, verbose: false };

  it('leaves out bit indices past 7 with a warning', () => {
    const diagnostics: Diagnostic[] = [];
    const resolved = resolveLocations(declarations('(BOOL,__IX0_9)\n'), diagnostics, warn);
    expect(resolved).toEqual([]);
    expect(diagnostics).toEqual([
      {
        id: 'GLU202',
        severity: 'warning',
        message:
          'Invalid addressing on located variable "__IX0_9": bit index 9 is out of range 0..7',
        file: 'vars.h',
        line: 1,
        column: 7,
      },
    ]);
  });

  it('raises bit indices past 7 to errors under the strict policy', () => {
    const diagnostics: Diagnostic[] = [];
    resolveLocations(declarations('(BOOL,__IX0_9)\n'), diagnostics, {
      addressPolicy: 'error',
      verbose: false,
    });
    expect(diagnostics.map((d) => [d.id, d.severity])).toEqual([['GLU202', 'error']]);
  });

  it('tags unknown value types as UNASSIGNED', () => {
    const diagnostics: Diagnostic[] = [];
    const [r] = resolveLocations(declarations('(STRING,__MW1)\n'), diagnostics, warn);
    expect(r?.valueType).toBe('UNASSIGNED');
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      ['GLU203', 'Value type "STRING" of "__MW1" has no runtime tag; using UNASSIGNED'],
    ]);
  });

  it('drops the minor index of non-bit locations', () => {
    const diagnostics: Diagnostic[] = [];
    const [r] = resolveLocations(declarations('(BYTE,__QB3_1)\n'), diagnostics, warn);
    expect(r?.address.minorIndex).toBe(0);
    expect(diagnostics.map((d) => [d.id, d.message])).toEqual([
      ['GLU201', 'Minor index of non-bit location "__QB3_1" is ignored'],
    ]);
  });

  it('warns about malformed index numerals and keeps the atoi value', () => {
    const diagnostics: Diagnostic[] = [];
    const [r] = resolveLocations(declarations('(INT,__IW1x)\n'), diagnostics, warn);
    expect(r?.address.majorIndex).toBe(1);
    expect(diagnostics).toEqual([
      {
        id: 'GLU201',
        severity: 'warning',
        message: 'Malformed index numeral in "__IW1x"; read as 1.0',
        file: 'vars.h',
        line: 1,
        column: 6,
      },
    ]);
  });

  it('reports undecodable names as errors', () => {
    const diagnostics: Diagnostic[] = [];
    expect(resolveLocations(declarations('(BOOL,IX0)\n'), diagnostics, warn)).toEqual([]);
    expect(diagnostics.map((d) => [d.id, d.severity])).toEqual([['GLU200', 'error']]);
  });

  it('traces each declaration in verbose mode', () => {
    const diagnostics: Diagnostic[] = [];
    resolveLocations(declarations('(BOOL,__IX0_0)\n'), diagnostics, {
      addressPolicy: 'warn',
      verbose: true,
    });
    expect(diagnostics).toEqual([
      {
        id: 'GLU900',
        severity: 'info',
        message: 'varName: __IX0_0\tvarType: BOOL',
        file: 'vars.h',
        line: 1,
        column: 7,
      },
    ]);
  });
});
