import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { GlueEntry } from '../semantics/groups.js';
import type {
  Direction,
  LocatedAddress,
  ResolvedDeclaration,
  SizeClass,
  ValueTypeTag,
} from '../semantics/location.js';

/** Capacity of every runtime buffer (`BUFFER_SIZE` in the generated header). */
export const BUFFER_SIZE = 1024;

/** Long-word memory locations at or past this index go to `special_functions`. */
export const SPECIAL_FUNCTIONS_BASE = 1024;

type LegacyBuffer = {
  name: string;
  /** `[major][minor]` instead of `[major]`. */
  bits: boolean;
  /** Pointer cast applied to the target, when the buffer element type differs. */
  cast?: string;
};

/**
 * Buffers the legacy `glueVars()` function assigns into, by direction and size.
 *
 * Combinations absent here have no legacy buffer.
 */
const LegacyBuffers: Record<Direction, Partial<Record<SizeClass, LegacyBuffer>>> = {
  IN: {
    BIT: { name: 'bool_input', bits: true },
    BYTE: { name: 'byte_input', bits: false },
    WORD: { name: 'int_input', bits: false },
  },
  OUT: {
    BIT: { name: 'bool_output', bits: true },
    BYTE: { name: 'byte_output', bits: false },
    WORD: { name: 'int_output', bits: false },
  },
  MEM: {
    WORD: { name: 'int_memory', bits: false },
    DOUBLEWORD: { name: 'dint_memory', bits: false, cast: 'IEC_DINT *' },
    LONGWORD: { name: 'lint_memory', bits: false, cast: 'IEC_LINT *' },
  },
};

const SpecialFunctions: LegacyBuffer = { name: 'special_functions', bits: false, cast: 'IEC_LINT *' };

/**
 * One statement of the legacy `glueVars()` function.
 */
export interface LegacyAssignment {
  buffer: string;
  index: number;
  /** Second subscript for bit buffers. */
  bit?: number;
  cast?: string;
  target: string;
}

/**
 * Pick the legacy buffer slot for an address, or `undefined` when the direction/size pair has
 * no buffer. Capacity is not checked here.
 */
export function legacyAssignment(address: LocatedAddress): LegacyAssignment | undefined {
  const { direction, size, majorIndex, minorIndex, symbol } = address;
  const special =
    direction === 'MEM' && size === 'LONGWORD' && majorIndex >= SPECIAL_FUNCTIONS_BASE;
  const buffer = special ? SpecialFunctions : LegacyBuffers[direction][size];
  if (!buffer) return undefined;

  return {
    buffer: buffer.name,
    index: special ? majorIndex - SPECIAL_FUNCTIONS_BASE : majorIndex,
    ...(buffer.bits ? { bit: minorIndex } : {}),
    ...(buffer.cast ? { cast: buffer.cast } : {}),
    target: symbol,
  };
}

export function renderAssignment(a: LegacyAssignment): string {
  const subscript = a.bit === undefined ? `[${a.index}]` : `[${a.index}][${a.bit}]`;
  const value = a.cast ? `(${a.cast})${a.target}` : a.target;
  return `\t${a.buffer}${subscript} = ${value};`;
}

/**
 * Build the legacy assignment statements, one per declaration, in input order.
 *
 * Runs before boolean grouping, so every bit location gets its own statement.
 */
export function lowerLegacyAssignments(
  resolved: ResolvedDeclaration[],
  diagnostics: Diagnostic[],
): LegacyAssignment[] {
  const out: LegacyAssignment[] = [];

  for (const { declaration, address } of resolved) {
    const where = {
      file: declaration.span.file,
      line: declaration.span.start.line,
      column: declaration.span.start.column,
    };

    const assignment = legacyAssignment(address);
    if (!assignment) {
      diagnostics.push({
        id: DiagnosticIds.NoLegacyBuffer,
        severity: 'warning',
        message: `No legacy buffer for ${address.direction} ${address.size} location "${declaration.name}"; it is only reachable through the glue table`,
        ...where,
      });
      continue;
    }

    if (assignment.index >= BUFFER_SIZE) {
      diagnostics.push({
        id: DiagnosticIds.BufferOverflow,
        severity: 'error',
        message: `Location "${declaration.name}" needs ${assignment.buffer}[${assignment.index}], past the buffer size of ${BUFFER_SIZE}`,
        ...where,
      });
      continue;
    }

    out.push(assignment);
  }

  return out;
}

/**
 * One row of the unified glue table (`GlueVariable`).
 */
export interface GlueRow {
  direction: Direction;
  size: SizeClass;
  /** Most significant index. */
  msi: number;
  /** Least significant index; 0 for everything but bare bit locations. */
  lsi: number;
  valueType: ValueTypeTag;
  /** Symbol the row points at. */
  target: string;
}

/**
 * Derive the unified table rows, one per entry and in entry order.
 */
export function glueRows(entries: GlueEntry[]): GlueRow[] {
  return entries.map((entry): GlueRow => {
    if (entry.kind === 'group') {
      const g = entry.group;
      return {
        direction: g.direction,
        size: 'BIT',
        msi: g.majorIndex,
        lsi: 0,
        valueType: g.valueType,
        target: g.symbol,
      };
    }
    const { address, valueType } = entry.resolved;
    return {
      direction: address.direction,
      size: address.size,
      msi: address.majorIndex,
      lsi: address.minorIndex,
      valueType,
      target: address.symbol,
    };
  });
}
