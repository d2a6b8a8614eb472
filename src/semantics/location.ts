import type { Diagnostic, DiagnosticId, DiagnosticSeverity } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { LocatedVarNode } from '../frontend/ast.js';

export type Direction = 'IN' | 'OUT' | 'MEM';
export type SizeClass = 'BIT' | 'BYTE' | 'WORD' | 'DOUBLEWORD' | 'LONGWORD';

export type DirectionFlag = 'I' | 'Q' | 'M';
export type SizeFlag = 'X' | 'B' | 'W' | 'D' | 'L';

export type AddressPolicyMode = 'warn' | 'error';

export const DirectionFlags = {
  I: 'IN',
  Q: 'OUT',
  M: 'MEM',
} as const satisfies Record<DirectionFlag, Direction>;

export const SizeFlags = {
  X: 'BIT',
  B: 'BYTE',
  W: 'WORD',
  D: 'DOUBLEWORD',
  L: 'LONGWORD',
} as const satisfies Record<SizeFlag, SizeClass>;

export const FlagOfDirection = {
  IN: 'I',
  OUT: 'Q',
  MEM: 'M',
} as const satisfies Record<Direction, DirectionFlag>;

/** Emission order for anything grouped by direction. */
export const DirectionOrder: readonly Direction[] = ['IN', 'OUT', 'MEM'];

/** Size flag of the synthetic boolean-group symbols (`__IG0`). Never valid on input. */
export const GROUP_SIZE_FLAG = 'G';

/** Bits per boolean group; also the exclusive bound of a bit location's minor index. */
export const BOOL_GROUP_SLOTS = 8;

/**
 * Value types the runtime has a tag for, in `IecGlueValueType` order.
 */
export const IecValueTypes = [
  'BOOL',
  'BYTE',
  'SINT',
  'USINT',
  'INT',
  'UINT',
  'WORD',
  'DINT',
  'UDINT',
  'DWORD',
  'REAL',
  'LREAL',
  'LWORD',
  'LINT',
  'ULINT',
] as const;

export type IecValueType = (typeof IecValueTypes)[number];

/** Value-type tag as emitted; `UNASSIGNED` stands in for types the runtime cannot tag. */
export type ValueTypeTag = IecValueType | 'UNASSIGNED';

const valueTypeSet: ReadonlySet<string> = new Set(IecValueTypes);

export function isIecValueType(s: string): s is IecValueType {
  return valueTypeSet.has(s);
}

export function isValueTypeTag(s: string): s is ValueTypeTag {
  return s === 'UNASSIGNED' || isIecValueType(s);
}

export function isDirectionFlag(c: string): c is DirectionFlag {
  return c === 'I' || c === 'Q' || c === 'M';
}

export function isSizeFlag(c: string): c is SizeFlag {
  return c === 'X' || c === 'B' || c === 'W' || c === 'D' || c === 'L';
}

export function isDirection(s: string): s is Direction {
  return s === 'IN' || s === 'OUT' || s === 'MEM';
}

export function isSizeClass(s: string): s is SizeClass {
  return s === 'BIT' || s === 'BYTE' || s === 'WORD' || s === 'DOUBLEWORD' || s === 'LONGWORD';
}

/**
 * Decoded location of a declaration name.
 */
export interface LocatedAddress {
  direction: Direction;
  size: SizeClass;
  directionFlag: DirectionFlag;
  sizeFlag: SizeFlag;
  /** Index before the separator (16-bit). */
  majorIndex: number;
  /** Index after the separator, 0 when absent (16-bit). */
  minorIndex: number;
  hasMinor: boolean;
  /** C identifier the generated code refers to. */
  symbol: string;
  /** A numeral was empty or had trailing non-digits. */
  malformedNumerals: boolean;
}

export type DecodeResult = { ok: true; address: LocatedAddress } | { ok: false; message: string };

type Spelling = { prefix: string; separator: string };

/**
 * Accepted name spellings: compiler symbols (`__IX0_1`) and IEC addresses (`%IX0.1`).
 */
const Spellings: readonly Spelling[] = [
  { prefix: '__', separator: '_' },
  { prefix: '%', separator: '.' },
];

const C_IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Parse an index numeral the way `atoi` reads it: the leading digits are the value, no digits
 * reads as 0. The value is reduced to 16 bits.
 */
export function parseIndexNumeral(text: string): { value: number; wellFormed: boolean } {
  let value = 0;
  let i = 0;
  while (i < text.length) {
    const digit = text.charCodeAt(i) - 48;
    if (digit < 0 || digit > 9) break;
    value = (value * 10 + digit) % 0x10000;
    i++;
  }
  return { value, wellFormed: i > 0 && i === text.length };
}

/**
 * Decode a declaration name into direction, size and major/minor indices.
 */
export function decodeLocation(name: string): DecodeResult {
  const spelling = Spellings.find((s) => name.startsWith(s.prefix));
  if (!spelling) {
    return {
      ok: false,
      message: `"${name}" is not a located address (expected a "__" or "%" prefix)`,
    };
  }

  const at = spelling.prefix.length;
  const directionFlag = name.charAt(at);
  if (!isDirectionFlag(directionFlag)) {
    return {
      ok: false,
      message: `Unknown location direction "${directionFlag}" in "${name}" (expected I|Q|M)`,
    };
  }
  const sizeFlag = name.charAt(at + 1);
  if (!isSizeFlag(sizeFlag)) {
    return {
      ok: false,
      message: `Unknown location size "${sizeFlag}" in "${name}" (expected X|B|W|D|L)`,
    };
  }

  const indices = name.slice(at + 2);
  const sep = indices.indexOf(spelling.separator);
  const major = parseIndexNumeral(sep < 0 ? indices : indices.slice(0, sep));
  const minor = sep < 0 ? undefined : parseIndexNumeral(indices.slice(sep + 1));

  const symbol =
    spelling.prefix === '__' ? name : `__${name.slice(at).replace(spelling.separator, '_')}`;
  if (!C_IDENTIFIER_RE.test(symbol)) {
    return { ok: false, message: `"${name}" does not map to a C identifier` };
  }

  return {
    ok: true,
    address: {
      direction: DirectionFlags[directionFlag],
      size: SizeFlags[sizeFlag],
      directionFlag,
      sizeFlag,
      majorIndex: major.value,
      minorIndex: minor?.value ?? 0,
      hasMinor: minor !== undefined,
      symbol,
      malformedNumerals: !major.wellFormed || (minor !== undefined && !minor.wellFormed),
    },
  };
}

/**
 * A declaration paired with its decoded location and runtime value-type tag.
 */
export interface ResolvedDeclaration {
  declaration: LocatedVarNode;
  address: LocatedAddress;
  valueType: ValueTypeTag;
}

export interface ResolveOptions {
  addressPolicy: AddressPolicyMode;
  verbose: boolean;
}

export function policySeverity(policy: AddressPolicyMode): DiagnosticSeverity {
  return policy === 'error' ? 'error' : 'warning';
}

function report(
  diagnostics: Diagnostic[],
  decl: LocatedVarNode,
  id: DiagnosticId,
  severity: DiagnosticSeverity,
  message: string,
): void {
  diagnostics.push({
    id,
    severity,
    message,
    file: decl.span.file,
    line: decl.span.start.line,
    column: decl.span.start.column,
  });
}

/**
 * Decode every declaration.
 *
 * Declarations that cannot be decoded are reported as errors. A bit location whose minor index
 * does not fit a boolean group is reported at address-policy severity and left out of the result.
 */
export function resolveLocations(
  declarations: LocatedVarNode[],
  diagnostics: Diagnostic[],
  options: ResolveOptions,
): ResolvedDeclaration[] {
  const out: ResolvedDeclaration[] = [];

  for (const decl of declarations) {
    if (options.verbose) {
      report(
        diagnostics,
        decl,
        DiagnosticIds.DeclarationTrace,
        'info',
        `varName: ${decl.name}\tvarType: ${decl.valueType}`,
      );
    }

    const decoded = decodeLocation(decl.name);
    if (!decoded.ok) {
      report(diagnostics, decl, DiagnosticIds.InvalidLocation, 'error', decoded.message);
      continue;
    }
    const address = decoded.address;

    if (address.malformedNumerals) {
      report(
        diagnostics,
        decl,
        DiagnosticIds.AddressWarning,
        'warning',
        `Malformed index numeral in "${decl.name}"; read as ${address.majorIndex}.${address.minorIndex}`,
      );
    }

    if (address.size !== 'BIT' && address.hasMinor) {
      report(
        diagnostics,
        decl,
        DiagnosticIds.AddressWarning,
        'warning',
        `Minor index of non-bit location "${decl.name}" is ignored`,
      );
      address.minorIndex = 0;
    }

    if (address.size === 'BIT' && address.minorIndex >= BOOL_GROUP_SLOTS) {
      report(
        diagnostics,
        decl,
        DiagnosticIds.AddressOutOfRange,
        policySeverity(options.addressPolicy),
        `Invalid addressing on located variable "${decl.name}": bit index ${address.minorIndex} is out of range 0..${BOOL_GROUP_SLOTS - 1}`,
      );
      continue;
    }

    let valueType: ValueTypeTag;
    if (isIecValueType(decl.valueType)) {
      valueType = decl.valueType;
    } else {
      report(
        diagnostics,
        decl,
        DiagnosticIds.UnknownValueType,
        'warning',
        `Value type "${decl.valueType}" of "${decl.name}" has no runtime tag; using UNASSIGNED`,
      );
      valueType = 'UNASSIGNED';
    }

    out.push({ declaration: decl, address, valueType });
  }

  return out;
}
