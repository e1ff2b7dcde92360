import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';

/**
 * Options that influence which artifacts a compilation produces.
 */
export interface CompilerOptions {
  /** Emit the assembly text (`.asm`). Defaults to `true`. */
  emitAsm?: boolean;
  /** Emit a listing (`.lst`) that maps source lines to output lines. Defaults to `false`. */
  emitListing?: boolean;
  /** Emit a symbol map (`.sym.json`). Defaults to `false`. */
  emitSymbols?: boolean;
  /** Line ending for text artifacts. Defaults to `'\n'`. */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Result of a compilation run: diagnostics, the generated assembly lines and any produced artifacts.
 *
 * `lines` and `artifacts` are empty whenever `diagnostics` contains an error.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  /** Generated assembly, one instruction or label per entry. */
  lines: string[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline stays in-memory.
 */
export interface PipelineDeps {
  formats: FormatWriters;
}

/**
 * Top-level compile function signature for file-based compilation.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;
