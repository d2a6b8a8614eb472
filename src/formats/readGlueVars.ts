import type { GlueRow } from '../lowering/glue.js';
import { isDirection, isSizeClass, isValueTypeTag } from '../semantics/location.js';

/**
 * A `GlueBoolGroup` constant read back from generated text.
 */
export interface ReadBoolGroup {
  /** Group id without underscores, e.g. `IG0`. */
  id: string;
  index: number;
  /** Eight entries; `null` where the slot is `nullptr`. */
  slots: Array<string | null>;
}

/**
 * What can be recovered from a generated `glueVars.cpp`.
 */
export interface GlueVarsSummary {
  /** Value of `OPLCGLUE_GLUE_SIZE`, when present. */
  size?: number;
  rows: GlueRow[];
  groups: ReadBoolGroup[];
  /** Hex digest spelled by `OPLCGLUE_MD5_DIGEST`, when present. */
  digest?: string;
}

const SIZE_RE = /^extern std::size_t const OPLCGLUE_GLUE_SIZE\((\d+)\);$/;
const ROW_RE =
  /^\s*\{ IECLDT_([A-Z]+), IECLST_([A-Z]+), (\d+), (\d+), IECVT_([A-Z]+), ([A-Za-z_][A-Za-z0-9_]*) \},$/;
const GROUP_RE = /^GlueBoolGroup ___([A-Za-z0-9_]+) \{ \.index=(\d+), \.values=\{ (.*)\} \};$/;
const DIGEST_RE = /^extern const char OPLCGLUE_MD5_DIGEST\[\] = \{(.*)\};$/;

function parseRow(line: string): GlueRow | undefined {
  const m = ROW_RE.exec(line);
  if (!m) return undefined;
  const [, direction = '', size = '', msi = '', lsi = '', valueType = '', target = ''] = m;
  if (!isDirection(direction) || !isSizeClass(size) || !isValueTypeTag(valueType)) {
    return undefined;
  }
  return {
    direction,
    size,
    msi: Number.parseInt(msi, 10),
    lsi: Number.parseInt(lsi, 10),
    valueType,
    target,
  };
}

function parseGroup(line: string): ReadBoolGroup | undefined {
  const m = GROUP_RE.exec(line);
  if (!m) return undefined;
  const [, id = '', index = '', values = ''] = m;
  const slots = values
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0)
    .map((v) => (v === 'nullptr' ? null : v));
  return { id, index: Number.parseInt(index, 10), slots };
}

function parseDigest(line: string): string | undefined {
  const m = DIGEST_RE.exec(line);
  if (!m) return undefined;
  const body = m[1] ?? '';
  return [...body.matchAll(/'([0-9A-Fa-f])'/g)].map((c) => c[1] ?? '').join('');
}

/**
 * Read the glue table, boolean groups and digest back out of generated text.
 *
 * Rows are only taken from inside the `oplc_glue_vars` initializer.
 */
export function readGlueVars(text: string): GlueVarsSummary {
  const summary: GlueVarsSummary = { rows: [], groups: [] };
  let inTable = false;

  for (const raw of text.split('\n')) {
    const line = raw.replace(/\r$/, '');

    if (inTable) {
      if (line === '};') {
        inTable = false;
        continue;
      }
      const row = parseRow(line);
      if (row) summary.rows.push(row);
      continue;
    }

    if (line.startsWith('extern const GlueVariable oplc_glue_vars[]')) {
      inTable = true;
      continue;
    }

    const size = SIZE_RE.exec(line);
    if (size) {
      summary.size = Number.parseInt(size[1] ?? '0', 10);
      continue;
    }

    const group = parseGroup(line);
    if (group) {
      summary.groups.push(group);
      continue;
    }

    const digest = parseDigest(line);
    if (digest !== undefined) summary.digest = digest;
  }

  return summary;
}

/**
 * Count the located points a summary describes: one per non-group row, plus every filled slot
 * of every group.
 */
export function countAddressablePoints(summary: GlueVarsSummary): number {
  const groupSymbols = new Set(summary.groups.map((g) => `__${g.id}`));
  let points = 0;
  for (const row of summary.rows) {
    if (!groupSymbols.has(row.target)) points++;
  }
  for (const g of summary.groups) {
    points += g.slots.filter((s) => s !== null).length;
  }
  return points;
}
