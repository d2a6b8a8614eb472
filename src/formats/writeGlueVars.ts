import { defaultBoilerplate } from './boilerplate.js';
import { formatDigest } from './checksum.js';
import type { GlueProgram, GlueVarsArtifact, WriteGlueVarsOptions } from './types.js';
import { renderAssignment } from '../lowering/glue.js';
import type { GlueRow } from '../lowering/glue.js';
import type { BoolGroup } from '../semantics/groups.js';

function renderGroup(group: BoolGroup): string[] {
  const values = group.slots.map((slot) => `${slot ?? 'nullptr'}, `).join('');
  return [
    `GlueBoolGroup ${group.storage} { .index=${group.majorIndex}, .values={ ${values}} };`,
    `GlueBoolGroup* ${group.symbol}(&${group.storage});`,
  ];
}

function renderRow(row: GlueRow): string {
  return `    { IECLDT_${row.direction}, IECLST_${row.size}, ${row.msi}, ${row.lsi}, IECVT_${row.valueType}, ${row.target} },`;
}

function renderDigest(digest: Uint8Array): string {
  const chars = [...formatDigest(digest)].map((c) => `'${c}'`).join(', ');
  return `extern const char OPLCGLUE_MD5_DIGEST[] = {${chars}};`;
}

/**
 * Create the `glueVars.cpp` artifact.
 *
 * Layout: header, `glueVars()`, boolean groups, unified table with its size, digest, footer.
 */
export function writeGlueVars(
  program: GlueProgram,
  opts?: WriteGlueVarsOptions,
): GlueVarsArtifact {
  const { header, footer } = opts?.boilerplate ?? defaultBoilerplate;

  const lines: string[] = [];
  lines.push('void glueVars()');
  lines.push('{');
  for (const a of program.assignments) lines.push(renderAssignment(a));
  lines.push('}');
  lines.push('');

  for (const g of program.groups) lines.push(...renderGroup(g));

  lines.push('/// The size of the array of glue variables.');
  lines.push(`extern std::size_t const OPLCGLUE_GLUE_SIZE(${program.rows.length});`);
  lines.push('/// The packed glue variables.');
  lines.push('extern const GlueVariable oplc_glue_vars[] = {');
  for (const row of program.rows) lines.push(renderRow(row));
  lines.push('};');
  lines.push('');

  lines.push('/// MD5 checksum of the located variables.');
  lines.push('/// WARNING: this must not be used to trust file contents.');
  lines.push(renderDigest(program.digest));
  lines.push('');
  lines.push('');

  return { kind: 'glue', text: header + lines.join('\n') + '\n' + footer };
}
