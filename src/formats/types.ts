import type { SourceSpan } from '../frontend/ast.js';
import type { Reg8Name } from '../semantics/registers.js';

/**
 * One line of generated assembly, attributed to the statement that produced it.
 */
export interface EmittedLine {
  kind: 'instruction' | 'label';
  /** Final text of the line, e.g. `MVI A,05H;` or `SKIP_0:`. */
  text: string;
  span: SourceSpan;
}

/**
 * Output of the lowering pass: ordered assembly lines plus the symbols they reference.
 */
export interface EmittedProgram {
  /** Path of the source file the program was parsed from. */
  file: string;
  lines: EmittedLine[];
  symbols: SymbolEntry[];
}

/**
 * A symbol entry for listings and symbol maps.
 */
export type SymbolEntry =
  | {
      kind: 'var';
      name: string;
      register: Reg8Name;
      /** Static address of the variable. */
      address: number;
      file: string;
      line: number;
    }
  | {
      kind: 'label';
      name: string;
      file: string;
      /** Line of the `if` statement the label closes. */
      line: number;
    };

/**
 * Options shared by the text writers.
 */
export interface WriteTextOptions {
  /**
   * Line ending to use when emitting text formats.
   */
  lineEnding?: '\n' | '\r\n';
}

/**
 * Options for `.asm` emission.
 */
export interface WriteAsmOptions extends WriteTextOptions {}

/**
 * Options for listing writing.
 */
export interface WriteListingOptions extends WriteTextOptions {
  /**
   * Source text of `program.file`. When given, each listing block is headed by the source line that
   * produced it.
   */
  sourceText?: string;
}

/**
 * Options for symbol-map writing.
 */
export interface WriteSymbolsOptions {
  /**
   * Base directory used to normalize file paths in symbol entries.
   * When provided, file paths are made project-relative and use `/` separators.
   */
  rootDir?: string;
}

/**
 * In-memory `.asm` artifact: the generated lines, one per line.
 */
export interface AsmArtifact {
  kind: 'asm';
  text: string;
}

/**
 * In-memory listing artifact.
 */
export interface ListingArtifact {
  kind: 'lst';
  text: string;
}

/**
 * In-memory symbol map artifact.
 */
export interface SymbolsArtifact {
  kind: 'sym';
  json: SymbolsJson;
}

/**
 * Union of all artifact kinds produced by the compiler.
 */
export type Artifact = AsmArtifact | ListingArtifact | SymbolsArtifact;

/**
 * Symbol map JSON (`.sym.json`).
 */
export interface SymbolsJson {
  format: 'c85-symbols';
  version: 1;
  arch: '8085';
  variables: Array<{
    name: string;
    register: Reg8Name;
    /** Address as a `XXXXH` string. */
    address: string;
    file: string;
    line: number;
  }>;
  labels: Array<{ name: string; file: string; line: number }>;
}

/**
 * Format writers used by the pipeline to turn an emitted program into artifacts.
 */
export interface FormatWriters {
  writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact;
  writeListing?(program: EmittedProgram, opts?: WriteListingOptions): ListingArtifact;
  writeSymbols?(program: EmittedProgram, opts?: WriteSymbolsOptions): SymbolsArtifact;
}
