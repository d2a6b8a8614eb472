import { expect } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { createMd5Checksum } from '../src/formats/checksum.js';
import type { LocatedVarNode } from '../src/frontend/ast.js';
import { parseLocatedVariables } from '../src/frontend/parser.js';
import { makeSourceFile } from '../src/frontend/source.js';
import type { ResolvedDeclaration } from '../src/semantics/location.js';
import { resolveLocations } from '../src/semantics/location.js';

/**
 * Parse located-variable text from `vars.h`, expecting no parse diagnostics.
 */
export function declarationsOf(text: string): LocatedVarNode[] {
  const diagnostics: Diagnostic[] = [];
  const file = parseLocatedVariables(
    makeSourceFile('vars.h', text),
    diagnostics,
    createMd5Checksum(),
  );
  expect(diagnostics).toEqual([]);
  return file.declarations;
}

/**
 * Parse and resolve under the default policy. Resolution diagnostics are discarded.
 */
export function resolvedOf(text: string): ResolvedDeclaration[] {
  return resolveLocations(declarationsOf(text), [], { addressPolicy: 'warn', verbose: false });
}
