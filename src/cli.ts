#!/usr/bin/env node
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from './compile.js';
import type { Diagnostic } from './diagnostics/types.js';
import { diagnosticKind } from './diagnostics/types.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  entryFile: string;
  outputPath?: string;
  emitListing: boolean;
  emitSymbols: boolean;
  lineEnding: '\n' | '\r\n';
};

function usage(): string {
  return [
    'c85c [options] <entry.c85>',
    '',
    'Options:',
    '  -o, --output <file>   Output .asm path (default: <entry>.asm next to the entry file)',
    '  -l, --listing         Also write <base>.lst',
    '  -s, --symbols         Also write <base>.sym.json',
    '      --crlf            Write text artifacts with CRLF line endings',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - <entry.c85> must be the last argument.',
    '  - Sidecar artifacts are written next to the .asm output using its base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function readVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = resolve(dir, 'package.json');
    if (existsSync(candidate)) {
      const pkg = JSON.parse(readFileSync(candidate, 'utf8')) as { version?: unknown };
      return typeof pkg.version === 'string' ? pkg.version : '0.0.0';
    }
    const parent = dirname(dir);
    if (parent === dir) return '0.0.0';
    dir = parent;
  }
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let outputPath: string | undefined;
  let emitListing = false;
  let emitSymbols = false;
  let lineEnding: '\n' | '\r\n' = '\n';
  let entryFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${readVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      const v = a.startsWith('--output=') ? a.slice('--output='.length) : argv[++i];
      if (!v) fail(`${a.startsWith('--output=') ? '--output' : a} expects a value`);
      outputPath = v;
      continue;
    }
    if (a === '-l' || a === '--listing') {
      emitListing = true;
      continue;
    }
    if (a === '-s' || a === '--symbols') {
      emitSymbols = true;
      continue;
    }
    if (a === '--crlf') {
      lineEnding = '\r\n';
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one <entry.c85> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.c85> argument (and it must be last)`);
  }

  if (outputPath !== undefined && extname(outputPath).toLowerCase() !== '.asm') {
    fail(`--output must end with ".asm"`);
  }

  return {
    entryFile,
    ...(outputPath !== undefined ? { outputPath } : {}),
    emitListing,
    emitSymbols,
    lineEnding,
  };
}

function artifactBase(entryFile: string, outputPath?: string): string {
  const primary = resolve(outputPath ?? entryFile);
  const ext = extname(primary);
  return ext.length > 0 ? primary.slice(0, -ext.length) : primary;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<string> {
  const asmPath = `${base}.asm`;
  const lstPath = `${base}.lst`;
  const symPath = `${base}.sym.json`;

  await mkdir(dirname(asmPath), { recursive: true });

  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    switch (artifact.kind) {
      case 'asm':
        writes.push(writeFile(asmPath, artifact.text, 'utf8'));
        break;
      case 'lst':
        writes.push(writeFile(lstPath, artifact.text, 'utf8'));
        break;
      case 'sym':
        writes.push(writeFile(symPath, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
        break;
    }
  }
  await Promise.all(writes);
  return asmPath;
}

function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
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

  return a.message.localeCompare(b.message);
}

/**
 * Format one diagnostic as `file:line:col: severity: [ID] Kind: message`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  return `${loc}: ${d.severity}: [${d.id}] ${diagnosticKind(d.id)}: ${d.message}`;
}

/**
 * Run the command line. Resolves to the process exit code: 0 on success, 1 when compilation
 * reports errors, 2 on usage errors.
 */
export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const base = artifactBase(parsed.entryFile, parsed.outputPath);

    const res = await compile(
      parsed.entryFile,
      {
        emitAsm: true,
        emitListing: parsed.emitListing,
        emitSymbols: parsed.emitSymbols,
        lineEnding: parsed.lineEnding,
      },
      { formats: defaultFormatWriters },
    );

    for (const d of [...res.diagnostics].sort(compareDiagnosticsForCli)) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }

    if (res.diagnostics.some((d) => d.severity === 'error')) {
      return 1;
    }

    const asmPath = await writeArtifacts(base, res.artifacts);
    process.stdout.write(`${asmPath}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`c85c: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
