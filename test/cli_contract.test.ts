import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { formatDiagnostic, runCli } from '../src/cli.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';

const PROGRAM = 'main {\n  x = 0x05;\n  reg D = 0x10;\n}\n';

describe('c85c cli', () => {
  let dir: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'c85c-cli-'));
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  async function source(name: string, text: string): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, text, 'utf8');
    return path;
  }

  it('writes <entry>.asm next to the entry file', async () => {
    const entry = await source('prog.c85', PROGRAM);
    expect(await runCli([entry])).toBe(0);

    const asmPath = join(dir, 'prog.asm');
    expect(stdout.join('')).toBe(`${asmPath}\n`);
    expect(stderr).toEqual([]);
    expect(await readFile(asmPath, 'utf8')).toBe('MVI A,05H;\nSTA 8000H;\nMVI D,10H;\n');
  });

  it('writes sidecar artifacts beside an explicit output path', async () => {
    const entry = await source('prog.c85', PROGRAM);
    const out = join(dir, 'build', 'app.asm');
    expect(await runCli(['-o', out, '--listing', '-s', '--crlf', entry])).toBe(0);

    expect(await readFile(out, 'utf8')).toBe('MVI A,05H;\r\nSTA 8000H;\r\nMVI D,10H;\r\n');
    const lst = await readFile(join(dir, 'build', 'app.lst'), 'utf8');
    expect(lst.split('\r\n').slice(0, 2)).toEqual(['; c85c listing', `; source: ${entry}`]);
    const sym: unknown = JSON.parse(await readFile(join(dir, 'build', 'app.sym.json'), 'utf8'));
    expect(sym).toEqual({
      format: 'c85-symbols',
      version: 1,
      arch: '8085',
      variables: [{ name: 'x', register: 'A', address: '8000H', file: 'prog.c85', line: 2 }],
      labels: [],
    });
  });

  it('prints diagnostics and exits 1 on compile errors', async () => {
    const entry = await source('bad.c85', 'main { A + C; }\n');
    expect(await runCli([entry])).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.join('')).toBe(
      `${entry}:1:12: error: [C85200] ParseError: Second operand must be register B, got C.\n`,
    );
    await expect(readFile(join(dir, 'bad.asm'), 'utf8')).rejects.toThrow();
  });

  it('reports an unreadable entry file', async () => {
    const entry = join(dir, 'missing.c85');
    expect(await runCli([entry])).toBe(1);
    expect(stderr.join('').startsWith(`${entry}: error: [C85001] IoError: Failed to read entry file:`)).toBe(
      true,
    );
  });

  it('exits 2 on usage errors', async () => {
    expect(await runCli([])).toBe(2);
    expect(stderr[0]).toBe('c85c: Expected exactly one <entry.c85> argument (and it must be last)\n');

    stderr = [];
    expect(await runCli(['--bogus', 'x.c85'])).toBe(2);
    expect(stderr[0]).toBe('c85c: Unknown option "--bogus"\n');

    stderr = [];
    expect(await runCli(['-o', 'out.txt', 'x.c85'])).toBe(2);
    expect(stderr[0]).toBe('c85c: --output must end with ".asm"\n');

    stderr = [];
    expect(await runCli(['x.c85', '-l'])).toBe(2);
    expect(stderr[0]).toBe('c85c: Expected exactly one <entry.c85> argument (and it must be last)\n');
  });

  it('prints the version and help', async () => {
    expect(await runCli(['-V'])).toBe(0);
    expect(stdout).toEqual(['0.1.0\n']);

    stdout = [];
    expect(await runCli(['--help'])).toBe(0);
    expect(stdout.join('').startsWith('c85c [options] <entry.c85>\n')).toBe(true);
  });
});

describe('formatDiagnostic', () => {
  it('omits the position when it is unknown', () => {
    expect(
      formatDiagnostic({
        id: DiagnosticIds.CodegenError,
        severity: 'error',
        message: 'boom',
        file: 'a.c85',
      }),
    ).toBe('a.c85: error: [C85300] CodegenError: boom');
    expect(
      formatDiagnostic({
        id: DiagnosticIds.LexError,
        severity: 'error',
        message: 'Unexpected character "@".',
        file: 'a.c85',
        line: 2,
        column: 5,
      }),
    ).toBe('a.c85:2:5: error: [C85100] LexError: Unexpected character "@".');
  });
});
