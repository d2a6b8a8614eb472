import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import {
  BOOL_GROUP_SLOTS,
  DirectionOrder,
  FlagOfDirection,
  GROUP_SIZE_FLAG,
  policySeverity,
} from './location.js';
import type {
  AddressPolicyMode,
  Direction,
  DirectionFlag,
  ResolvedDeclaration,
  ValueTypeTag,
} from './location.js';

/**
 * Up to eight bit locations sharing a direction and major index.
 *
 * `slots[i]` holds the symbol of minor index `i`, or `undefined` when nothing is located there.
 */
export interface BoolGroup {
  /** `<direction flag>G<major index>`, e.g. `IG0`. */
  id: string;
  /** Pointer symbol the glue table refers to (`__IG0`). */
  symbol: string;
  /** Backing `GlueBoolGroup` constant (`___IG0`). */
  storage: string;
  direction: Direction;
  directionFlag: DirectionFlag;
  majorIndex: number;
  /** Value type of the first member; emitted on the group's table row. */
  valueType: ValueTypeTag;
  slots: Array<string | undefined>;
}

/**
 * One row-to-be of the unified glue table, in first-occurrence order.
 */
export type GlueEntry =
  | { kind: 'variable'; resolved: ResolvedDeclaration }
  | { kind: 'group'; group: BoolGroup };

export interface GroupedDeclarations {
  entries: GlueEntry[];
  /** All groups, ordered by direction (IN, OUT, MEM) then major index. */
  groups: BoolGroup[];
}

export function boolGroupId(directionFlag: DirectionFlag, majorIndex: number): string {
  return `${directionFlag}${GROUP_SIZE_FLAG}${majorIndex}`;
}

function makeGroup(first: ResolvedDeclaration): BoolGroup {
  const { direction, majorIndex } = first.address;
  const directionFlag = FlagOfDirection[direction];
  const id = boolGroupId(directionFlag, majorIndex);
  return {
    id,
    symbol: `__${id}`,
    storage: `___${id}`,
    direction,
    directionFlag,
    majorIndex,
    valueType: first.valueType,
    slots: new Array<string | undefined>(BOOL_GROUP_SLOTS).fill(undefined),
  };
}

/**
 * Collapse bit locations into boolean groups keyed by `(direction, majorIndex)`.
 *
 * The first member of a group takes the group's place in `entries`; later members only fill
 * slots. When two declarations claim one slot the later one wins, reported at address-policy
 * severity. Non-bit declarations pass through unchanged.
 */
export function groupBooleans(
  resolved: ResolvedDeclaration[],
  diagnostics: Diagnostic[],
  options: { addressPolicy: AddressPolicyMode },
): GroupedDeclarations {
  const byDirection: Record<Direction, Map<number, BoolGroup>> = {
    IN: new Map(),
    OUT: new Map(),
    MEM: new Map(),
  };
  const entries: GlueEntry[] = [];

  for (const r of resolved) {
    const { address, declaration } = r;
    if (address.size !== 'BIT') {
      entries.push({ kind: 'variable', resolved: r });
      continue;
    }

    const groups = byDirection[address.direction];
    let group = groups.get(address.majorIndex);
    if (!group) {
      group = makeGroup(r);
      groups.set(address.majorIndex, group);
      entries.push({ kind: 'group', group });
    }

    const previous = group.slots[address.minorIndex];
    if (previous !== undefined) {
      diagnostics.push({
        id: DiagnosticIds.SlotCollision,
        severity: policySeverity(options.addressPolicy),
        message: `Boolean group ${group.id} slot ${address.minorIndex} is claimed by both "${previous}" and "${address.symbol}"; keeping "${address.symbol}"`,
        file: declaration.span.file,
        line: declaration.span.start.line,
        column: declaration.span.start.column,
      });
    }
    group.slots[address.minorIndex] = address.symbol;
  }

  const groups = DirectionOrder.flatMap((direction) =>
    [...byDirection[direction].values()].sort((a, b) => a.majorIndex - b.majorIndex),
  );

  return { entries, groups };
}
