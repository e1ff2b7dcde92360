import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds, hasErrors } from './diagnostics/types.js';
import type { Artifact } from './formats/types.js';
import { tokenize } from './frontend/lexer.js';
import { parseProgram } from './frontend/parser.js';
import { makeSourceFile } from './frontend/source.js';
import { emitProgram } from './lowering/emit.js';
import type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';

function withDefaults(
  options: CompilerOptions,
): Required<Pick<CompilerOptions, 'emitAsm' | 'emitListing' | 'emitSymbols' | 'lineEnding'>> {
  return {
    emitAsm: options.emitAsm ?? true,
    emitListing: options.emitListing ?? false,
    emitSymbols: options.emitSymbols ?? false,
    lineEnding: options.lineEnding ?? '\n',
  };
}

function failed(diagnostics: Diagnostic[]): CompileResult {
  return { diagnostics, lines: [], artifacts: [] };
}

/**
 * Compile c85 source text that is already in memory.
 *
 * Runs lexer, parser and lowering in order; each stage sees the complete output of the previous
 * one and the first stage to report an error ends the run with no lines and no artifacts.
 * All allocation state lives in this call, so concurrent compilations do not interact.
 */
export function compileSource(
  path: string,
  text: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): CompileResult {
  const diagnostics: Diagnostic[] = [];
  const file = makeSourceFile(path, text);

  const tokens = tokenize(file, diagnostics);
  if (!tokens || hasErrors(diagnostics)) return failed(diagnostics);

  const program = parseProgram(file, tokens, diagnostics);
  if (!program || hasErrors(diagnostics)) return failed(diagnostics);

  const emitted = emitProgram(program, diagnostics);
  if (!emitted || hasErrors(diagnostics)) return failed(diagnostics);

  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];

  if (emit.emitAsm) {
    artifacts.push(deps.formats.writeAsm(emitted, { lineEnding: emit.lineEnding }));
  }
  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(
        deps.formats.writeListing(emitted, { lineEnding: emit.lineEnding, sourceText: text }),
      );
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitListing=true but no listing writer is configured; skipping .lst artifact.',
        file: path,
      });
    }
  }
  if (emit.emitSymbols) {
    if (deps.formats.writeSymbols) {
      artifacts.push(deps.formats.writeSymbols(emitted, { rootDir: dirname(resolve(path)) }));
    } else {
      diagnostics.push({
        id: DiagnosticIds.Unknown,
        severity: 'warning',
        message: 'emitSymbols=true but no symbol writer is configured; skipping .sym.json artifact.',
        file: path,
      });
    }
  }

  return { diagnostics, lines: emitted.lines.map((l) => l.text), artifacts };
}

/**
 * Compile a c85 program from its entry file.
 *
 * Reads the file as UTF-8 and hands it to {@link compileSource}. Artifacts are returned in memory;
 * writing them to disk is the caller's job.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  let text: string;
  try {
    text = await readFile(entryPath, 'utf8');
  } catch (err) {
    return failed([
      {
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read entry file: ${String(err)}`,
        file: entryPath,
      },
    ]);
  }
  return compileSource(entryPath, text, options, deps);
};
