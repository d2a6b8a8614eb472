import { readFile } from 'node:fs/promises';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type {
  GenerateFn,
  GenerateResult,
  GeneratorOptions,
  PipelineDeps,
} from './pipeline.js';

import { defaultBoilerplate } from './formats/boilerplate.js';
import { DIGEST_LENGTH, createMd5Checksum, formatDigest } from './formats/checksum.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact, GlueProgram } from './formats/types.js';
import { parseLocatedVariables } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import type { SourceFile } from './frontend/source.js';
import { glueRows, lowerLegacyAssignments } from './lowering/glue.js';
import { groupBooleans } from './semantics/groups.js';
import { resolveLocations } from './semantics/location.js';

/**
 * Standard writers, boilerplate and MD5 checksum.
 */
export const defaultPipelineDeps: PipelineDeps = {
  formats: defaultFormatWriters,
  boilerplate: defaultBoilerplate,
  createChecksum: createMd5Checksum,
};

/**
 * Generate glue from an in-memory located-variables file.
 *
 * Stages run in order (parse, resolve, legacy lowering, grouping, writing) and the run stops
 * after the first stage that reports an error.
 */
export function generateFromSource(
  file: SourceFile,
  options: GeneratorOptions,
  deps: PipelineDeps,
): GenerateResult {
  const diagnostics: Diagnostic[] = [];
  const addressPolicy = options.addressPolicy ?? 'warn';

  const checksum = deps.createChecksum();
  const parsed = parseLocatedVariables(file, diagnostics, checksum);
  const digest = checksum.finish();
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }
  if (digest.length !== DIGEST_LENGTH) {
    diagnostics.push({
      id: DiagnosticIds.InternalError,
      severity: 'error',
      message: `Checksum produced ${digest.length} bytes; expected ${DIGEST_LENGTH}`,
      file: file.path,
    });
    return { diagnostics, artifacts: [] };
  }

  const resolved = resolveLocations(parsed.declarations, diagnostics, {
    addressPolicy,
    verbose: options.verbose ?? false,
  });
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const assignments = lowerLegacyAssignments(resolved, diagnostics);
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const { entries, groups } = groupBooleans(resolved, diagnostics, { addressPolicy });
  if (hasErrors(diagnostics)) {
    return { diagnostics, artifacts: [] };
  }

  const program: GlueProgram = { assignments, groups, rows: glueRows(entries), digest };
  const artifacts: Artifact[] = [];

  if (options.emitGlue ?? true) {
    artifacts.push(deps.formats.writeGlueVars(program, { boilerplate: deps.boilerplate }));
  }
  if (options.emitMap) {
    if (deps.formats.writeGlueMap) {
      artifacts.push(deps.formats.writeGlueMap(program, { source: file.path }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitMap=true but no glue map writer is configured; skipping glue map artifact.',
        file: file.path,
      });
    }
  }

  return {
    diagnostics,
    artifacts,
    summary: {
      declarations: parsed.declarations.length,
      groups: groups.length,
      rows: program.rows.length,
      digest: formatDigest(digest),
    },
  };
}

/**
 * Generate glue from a located-variables file on disk.
 *
 * A read failure is reported as an `IoReadFailed` diagnostic; nothing is written to disk.
 */
export const generate: GenerateFn = async (
  inputFile: string,
  options: GeneratorOptions,
  deps: PipelineDeps,
): Promise<GenerateResult> => {
  let bytes: Buffer;
  try {
    bytes = await readFile(inputFile);
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.IoReadFailed,
          severity: 'error',
          message: `Error opening located variables file at ${inputFile}: ${String(err)}`,
          file: inputFile,
        },
      ],
      artifacts: [],
    };
  }

  try {
    return generateFromSource(makeSourceFile(inputFile, bytes), options, deps);
  } catch (err) {
    return {
      diagnostics: [
        {
          id: DiagnosticIds.InternalError,
          severity: 'error',
          message: `Internal error during generation: ${String(err)}`,
          file: inputFile,
        },
      ],
      artifacts: [],
    };
  }
};
