import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli } from '../src/cli.js';
import { defaultBoilerplate } from '../src/formats/boilerplate.js';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function spyOnWrites(stream: NodeJS.WriteStream) {
  return vi.spyOn(stream, 'write').mockImplementation(() => true);
}

type WriteSpy = ReturnType<typeof spyOnWrites>;

function written(spy: WriteSpy): string {
  return spy.mock.calls.map((c) => String(c[0])).join('');
}

describe('glue-gen cli', () => {
  let work: string;
  let stdout: WriteSpy;
  let stderr: WriteSpy;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'glue-gen-cli-'));
    stdout = spyOnWrites(process.stdout);
    stderr = spyOnWrites(process.stderr);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(work, { recursive: true, force: true });
  });

  it('prints usage for --help and exits 0', async () => {
    expect(await runCli(['--help'])).toBe(0);
    expect(written(stdout).startsWith('glue-gen [options] [<located-variables.h> <glue-vars.cpp>]\n')).toBe(
      true,
    );
  });

  it('prints the package version', async () => {
    expect(await runCli(['-V'])).toBe(0);
    expect(written(stdout)).toBe('0.1.0\n');
  });

  it('exits -1 when only one path is given', async () => {
    expect(await runCli([join(work, 'in.h')])).toBe(-1);
    expect(written(stderr)).toContain(
      'glue-gen: Expected no paths or both <located-variables.h> and <glue-vars.cpp> (got 1)\n',
    );
  });

  it('exits -1 on an unknown option', async () => {
    expect(await runCli(['--frobnicate'])).toBe(-1);
    expect(written(stderr)).toContain('glue-gen: Unknown option "--frobnicate"\n');
  });

  it('exits 1 when the input cannot be read', async () => {
    const out = join(work, 'glueVars.cpp');
    expect(await runCli([join(work, 'missing.h'), out])).toBe(1);
    expect(written(stderr)).toContain('[GLU001] Error opening located variables file at');
    expect(await exists(out)).toBe(false);
  });

  it('exits 2 when the output cannot be written', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'taken');
    await writeFile(input, '__LOCATED_VAR(BYTE,__QB3,Q,B,3)\n', 'utf8');
    await mkdir(out);
    expect(await runCli([input, out])).toBe(2);
    expect(written(stderr)).toContain('[GLU002] Error opening glue variables file');
  });

  it('writes the glue file and prints its path', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'gen', 'glueVars.cpp');
    await writeFile(input, '__LOCATED_VAR(BYTE,__QB3,Q,B,3)\n', 'utf8');

    expect(await runCli([input, out])).toBe(0);
    expect(written(stdout)).toBe(`${out}\n`);
    expect(written(stderr)).toBe('');

    const text = await readFile(out, 'utf8');
    expect(text.startsWith(defaultBoilerplate.header)).toBe(true);
    expect(text).toContain('\tbyte_output[3] = __QB3;\n');
  });

  it('defaults to LOCATED_VARIABLES.h and glueVars.cpp in the working directory', async () => {
    await writeFile(join(work, 'LOCATED_VARIABLES.h'), '__LOCATED_VAR(INT,__IW1,I,W,1)\n', 'utf8');
    expect(await runCli([], { cwd: work })).toBe(0);
    expect(await exists(join(work, 'glueVars.cpp'))).toBe(true);
  });

  it('exits 3 with line diagnostics on malformed declarations', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'glueVars.cpp');
    await writeFile(input, '__LOCATED_VAR(BOOL,__IX0_0,I,X,0,0)\ngarbage\n', 'utf8');

    expect(await runCli([input, out])).toBe(3);
    expect(written(stderr)).toBe(
      `${input}:2:1: error: [GLU100] Invalid declaration syntax: expected "(" opening the argument list\n`,
    );
    expect(await exists(out)).toBe(false);
  });

  it('warns on out-of-range bits by default and fails under --strict', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'glueVars.cpp');
    await writeFile(input, '__LOCATED_VAR(BOOL,__IX0_9,I,X,0,9)\n', 'utf8');
    const message =
      '[GLU202] Invalid addressing on located variable "__IX0_9": bit index 9 is out of range 0..7\n';

    expect(await runCli([input, out])).toBe(0);
    expect(written(stderr)).toBe(`${input}:1:20: warning: ${message}`);

    stderr.mockClear();
    await rm(out);
    expect(await runCli(['--strict', input, out])).toBe(3);
    expect(written(stderr)).toBe(`${input}:1:20: error: ${message}`);
    expect(await exists(out)).toBe(false);
  });

  it('writes the glue map next to the glue file with --map', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'glueVars.cpp');
    const map = join(work, 'glue.json');
    await writeFile(input, '__LOCATED_VAR(BOOL,__QX1_4,Q,X,1,4)\n', 'utf8');

    expect(await runCli(['--map', map, input, out])).toBe(0);
    const json = JSON.parse(await readFile(map, 'utf8')) as { size: number; groups: unknown[] };
    expect(json.size).toBe(1);
    expect(json.groups).toEqual([
      {
        id: 'QG1',
        symbol: '__QG1',
        direction: 'OUT',
        index: 1,
        slots: [null, null, null, null, '__QX1_4', null, null, null],
      },
    ]);
  });

  it('prints a trace line per declaration with --verbose', async () => {
    const input = join(work, 'in.h');
    const out = join(work, 'glueVars.cpp');
    await writeFile(input, '__LOCATED_VAR(INT,__IW1,I,W,1)\n', 'utf8');

    expect(await runCli(['-v', input, out])).toBe(0);
    expect(written(stderr)).toBe(`${input}:1:19: info: [GLU900] varName: __IW1\tvarType: INT\n`);
  });
});
