#!/usr/bin/env node
import { existsSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { defaultPipelineDeps, generate } from './generate.js';
import type { Artifact } from './formats/types.js';
import type { AddressPolicyMode } from './pipeline.js';

type CliExit = { code: number };

type CliOptions = {
  inputPath: string;
  outputPath: string;
  mapPath?: string;
  addressPolicy: AddressPolicyMode;
  verbose: boolean;
};

export const ExitCodes = {
  Ok: 0,
  Usage: -1,
  InputFailed: 1,
  OutputFailed: 2,
  GenerationFailed: 3,
} as const;

export const DEFAULT_INPUT = 'LOCATED_VARIABLES.h';
export const DEFAULT_OUTPUT = 'glueVars.cpp';

const PACKAGE_NAME = 'located-glue';

function usage(): string {
  return [
    'glue-gen [options] [<located-variables.h> <glue-vars.cpp>]',
    '',
    'Reads the located variables list written by the structured-text compiler and',
    'produces the glue source for the runtime. Without paths, reads',
    `${DEFAULT_INPUT} and writes ${DEFAULT_OUTPUT} in the current directory.`,
    '',
    'Options:',
    '  -m, --map <file>      Also write a JSON glue map',
    '      --strict          Fail on out-of-range bit indices and boolean slot collisions',
    '  -v, --verbose         Report every located variable',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Exit codes: 0 ok, -1 bad arguments, 1 input unreadable, 2 output unwritable,',
    '            3 generation failed.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function isCliError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'CliError';
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const here = dirname(fileURLToPath(import.meta.url));
  // Source runs sit one level below the package root, built runs two (dist/src).
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg = require(candidate) as { name?: unknown; version?: unknown };
    if (pkg.name === PACKAGE_NAME) return String(pkg.version ?? '0.0.0');
  }
  return '0.0.0';
}

function parseArgs(argv: string[], cwd: string): CliOptions | CliExit {
  let mapPath: string | undefined;
  let addressPolicy: AddressPolicyMode = 'warn';
  let verbose = false;
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: ExitCodes.Ok };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: ExitCodes.Ok };
    }
    if (a === '-m' || a === '--map' || a.startsWith('--map=')) {
      const v = a.startsWith('--map=') ? a.slice('--map='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--map=') ? '--map' : a} expects a value`);
      mapPath = v;
      continue;
    }
    if (a === '--strict') {
      addressPolicy = 'error';
      continue;
    }
    if (a === '-v' || a === '--verbose') {
      verbose = true;
      continue;
    }
    if (a.startsWith('-') && a !== '-') {
      fail(`Unknown option "${a}"`);
    }
    positionals.push(a);
  }

  if (positionals.length !== 0 && positionals.length !== 2) {
    fail(`Expected no paths or both <located-variables.h> and <glue-vars.cpp> (got ${positionals.length})`);
  }

  const [inputPath = DEFAULT_INPUT, outputPath = DEFAULT_OUTPUT] = positionals;
  return {
    inputPath: resolve(cwd, inputPath),
    outputPath: resolve(cwd, outputPath),
    ...(mapPath ? { mapPath: resolve(cwd, mapPath) } : {}),
    addressPolicy,
    verbose,
  };
}

async function writeArtifacts(
  artifacts: Artifact[],
  paths: { outputPath: string; mapPath?: string },
): Promise<void> {
  const ensureDir = async (p: string) => mkdir(dirname(p), { recursive: true });

  for (const a of artifacts) {
    if (a.kind === 'glue') {
      await ensureDir(paths.outputPath);
      await writeFile(paths.outputPath, a.text, 'utf8');
    } else if (a.kind === 'glue-map' && paths.mapPath) {
      await ensureDir(paths.mapPath);
      await writeFile(paths.mapPath, JSON.stringify(a.json, null, 2) + '\n', 'utf8');
    }
  }
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file).localeCompare(normalizeDiagnosticPath(b.file));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0) return colCmp;

  const sevRank = (severity: Diagnostic['severity']): number => {
    if (severity === 'error') return 0;
    if (severity === 'warning') return 1;
    return 2;
  };
  const sevCmp = sevRank(a.severity) - sevRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

/**
 * Run the generator with command-line arguments (without `node` and the script path).
 *
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], opts?: { cwd?: string }): Promise<number> {
  try {
    const parsed = parseArgs(argv, opts?.cwd ?? process.cwd());
    if ('code' in parsed) return parsed.code;

    const res = await generate(
      parsed.inputPath,
      {
        emitGlue: true,
        emitMap: parsed.mapPath !== undefined,
        addressPolicy: parsed.addressPolicy,
        verbose: parsed.verbose,
      },
      defaultPipelineDeps,
    );

    for (const d of [...res.diagnostics].sort(compareDiagnosticsForCli)) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (res.diagnostics.some((d) => d.id === DiagnosticIds.IoReadFailed)) {
      return ExitCodes.InputFailed;
    }
    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return ExitCodes.GenerationFailed;
    }

    try {
      await writeArtifacts(res.artifacts, parsed);
    } catch (err) {
      process.stderr.write(
        `${parsed.outputPath}: error: [${DiagnosticIds.IoWriteFailed}] Error opening glue variables file: ${String(err)}\n`,
      );
      return ExitCodes.OutputFailed;
    }

    process.stdout.write(`${parsed.outputPath}\n`);
    return ExitCodes.Ok;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`glue-gen: ${msg}\n`);
    if (isCliError(err)) {
      process.stderr.write(`${usage()}\n`);
      return ExitCodes.Usage;
    }
    return ExitCodes.GenerationFailed;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = existsSync(resolved) ? realpathSync.native(resolved) : resolved;
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(self);
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
