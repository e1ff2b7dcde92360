import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { compile } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact, AsmArtifact } from '../src/formats/types.js';
import { compileText, linesOf } from './helpers/compile.js';

const fixturesDir = fileURLToPath(new URL('./fixtures/', import.meta.url));
const fixture = (name: string): string => join(fixturesDir, name);

function isAsm(a: Artifact): a is AsmArtifact {
  return a.kind === 'asm';
}

const CANONICAL = [
  'MVI A,00H;',
  'STA 8000H;',
  'MVI A,FFH;',
  'STA 8001H;',
  'MOV B,A;',
  'MVI A,05H;',
  'STA 8002H;',
  'MOV C,A;',
  'CMP B;',
  'JZ SKIP_0;',
  'JNC SKIP_0;',
  'MVI D,AAH;',
  'SKIP_0:',
  'MOV A,C;',
  'CMP B;',
  'JZ SKIP_1;',
  'JC SKIP_1;',
  'MVI E,BBH;',
  'SKIP_1:',
  'CMP B;',
  'JNZ SKIP_2;',
  'MVI H,CCH;',
  'SKIP_2:',
];

describe('compile (end to end)', () => {
  it('compiles the canonical program', async () => {
    const res = await compile(fixture('canonical.c85'), {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.lines).toEqual(CANONICAL);

    const asm = res.artifacts.find(isAsm);
    expect(asm?.text).toBe(CANONICAL.map((l) => `${l}\n`).join(''));
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
  });

  it('is deterministic across runs', async () => {
    const text = await readFile(fixture('canonical.c85'), 'utf8');
    const first = compileText(text);
    const second = compileText(text);
    expect(second).toEqual(first);
  });

  it('compiles register pairs and accumulator arithmetic', async () => {
    const res = await compile(fixture('pointers.c85'), {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.lines).toEqual([
      'LXI H,6000H;',
      'LXI D,7000H;',
      'INX H;',
      'INX H;',
      'DCX D;',
      'MVI A,10H;',
      'MVI B,20H;',
      'ADD B;',
      'XRA B;',
    ]);
  });

  it('reports an unterminated if block at end of input', async () => {
    const path = fixture('unterminated_if.c85');
    const res = await compile(path, {}, { formats: defaultFormatWriters });
    expect(res.lines).toEqual([]);
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.ParseError,
        severity: 'error',
        message: 'Expected "}" to close the if block, found end of input.',
        file: path,
        line: 5,
        column: 1,
      },
    ]);
  });

  it('reports a missing entry file as an I/O error', async () => {
    const path = fixture('does_not_exist.c85');
    const res = await compile(path, {}, { formats: defaultFormatWriters });
    expect(res.lines).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
    expect(res.diagnostics[0]?.file).toBe(path);
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file: ')).toBe(true);
  });

  it('stops at the first stage that reports an error', () => {
    const res = compileText('main { x = 0x01; @ }');
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.LexError]);
    expect(res.lines).toEqual([]);
  });

  it('produces no output for an empty main block', () => {
    expect(linesOf('')).toEqual({ lines: [], diagnostics: [] });
  });

  it('honours CRLF line endings and skips asm on request', () => {
    const crlf = compileText('main { reg C = 0x01; }', { lineEnding: '\r\n' });
    expect(crlf.artifacts).toEqual([{ kind: 'asm', text: 'MVI C,01H;\r\n' }]);

    const none = compileText('main { reg C = 0x01; }', { emitAsm: false });
    expect(none.artifacts).toEqual([]);
    expect(none.lines).toEqual(['MVI C,01H;']);
  });

  it('warns when a requested artifact has no writer', async () => {
    const res = await compile(
      fixture('pointers.c85'),
      { emitListing: true, emitSymbols: true },
      { formats: { writeAsm: defaultFormatWriters.writeAsm } },
    );
    expect(res.artifacts.map((a) => a.kind)).toEqual(['asm']);
    expect(res.diagnostics.map((d) => [d.id, d.severity])).toEqual([
      [DiagnosticIds.Unknown, 'warning'],
      [DiagnosticIds.Unknown, 'warning'],
    ]);
  });
});
