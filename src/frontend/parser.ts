import type { LocatedVarFileNode, LocatedVarNode } from './ast.js';
import { sourceLines, span } from './source.js';
import type { SourceFile } from './source.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { RunningChecksum } from '../formats/checksum.js';

function diag(
  diagnostics: Diagnostic[],
  file: string,
  message: string,
  where?: { line: number; column: number },
): void {
  diagnostics.push({
    id: DiagnosticIds.InvalidDeclaration,
    severity: 'error',
    message,
    file,
    ...(where ? { line: where.line, column: where.column } : {}),
  });
}

const VALUE_TYPE_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Result of scanning one declaration line.
 *
 * Offsets and columns are relative to the line: offsets 0-based, columns 1-based.
 */
export type DeclarationScan =
  | { ok: true; valueType: string; name: string; typeOffset: number; nameOffset: number }
  | { ok: false; message: string; column: number };

function leadingSpace(s: string): number {
  return s.length - s.trimStart().length;
}

/**
 * Scan `<macro>(<type>,<name>[,...])`.
 *
 * The type runs from the first `(` to the first `,`; the name runs from there to the next `,` or
 * `)`. Further arguments are ignored.
 */
export function parseDeclarationLine(text: string): DeclarationScan {
  const open = text.indexOf('(');
  if (open < 0) {
    return {
      ok: false,
      message: 'Invalid declaration syntax: expected "(" opening the argument list',
      column: 1,
    };
  }

  const typeEnd = text.indexOf(',', open + 1);
  if (typeEnd < 0) {
    return {
      ok: false,
      message: 'Invalid declaration syntax: expected "," after the value type',
      column: text.length + 1,
    };
  }

  let nameEnd = -1;
  for (let i = typeEnd + 1; i < text.length; i++) {
    const c = text[i];
    if (c === ',' || c === ')') {
      nameEnd = i;
      break;
    }
  }
  if (nameEnd < 0) {
    return {
      ok: false,
      message: 'Invalid declaration syntax: unterminated argument list',
      column: text.length + 1,
    };
  }

  const rawType = text.slice(open + 1, typeEnd);
  const valueType = rawType.trim();
  const typeOffset = open + 1 + leadingSpace(rawType);
  if (valueType.length === 0) {
    return { ok: false, message: 'Invalid declaration syntax: empty value type', column: open + 2 };
  }
  if (!VALUE_TYPE_RE.test(valueType)) {
    return {
      ok: false,
      message: `Invalid declaration syntax: "${valueType}" is not a value type name`,
      column: typeOffset + 1,
    };
  }

  const rawName = text.slice(typeEnd + 1, nameEnd);
  const name = rawName.trim();
  if (name.length === 0) {
    return { ok: false, message: 'Invalid declaration syntax: empty name', column: typeEnd + 2 };
  }

  return {
    ok: true,
    valueType,
    name,
    typeOffset,
    nameOffset: typeEnd + 1 + leadingSpace(rawName),
  };
}

/**
 * Parse a located-variables file into declarations, in file order.
 *
 * Every line is appended to `checksum` before it is looked at, so the digest covers blank and
 * malformed lines too. Malformed lines are reported as errors; parsing continues so that all of
 * them are reported in one run.
 */
export function parseLocatedVariables(
  file: SourceFile,
  diagnostics: Diagnostic[],
  checksum: RunningChecksum,
): LocatedVarFileNode {
  const declarations: LocatedVarNode[] = [];

  for (const line of sourceLines(file)) {
    checksum.append(line.raw);
    if (line.text.trim().length === 0) continue;

    const scan = parseDeclarationLine(line.text);
    if (!scan.ok) {
      diag(diagnostics, file.path, scan.message, { line: line.number, column: scan.column });
      continue;
    }

    const nameStart = line.offset + scan.nameOffset;
    declarations.push({
      kind: 'LocatedVar',
      span: span(file, nameStart, nameStart + scan.name.length),
      valueType: scan.valueType,
      name: scan.name,
      line: line.text,
    });
  }

  return {
    kind: 'LocatedVarFile',
    span: span(file, 0, file.text.length),
    path: file.path,
    declarations,
  };
}
