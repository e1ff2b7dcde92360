/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A compiler diagnostic with an optional source location.
 *
 * Diagnostics have stable IDs so tests and tooling can match on them instead of message text.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `C85200`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
}

/**
 * Known diagnostic IDs, grouped by the pipeline stage that raises them.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic (e.g., a requested artifact with no writer configured).
   */
  Unknown: 'C85000',

  /** Failed to read the entry file from disk. */
  IoReadFailed: 'C85001',

  /** Unrecognized character or malformed literal. */
  LexError: 'C85100',

  /**
   * Grammar error or a semantic check done while parsing: missing/duplicate `main`, redeclaration,
   * undeclared variable, width mismatch, binary operand restriction.
   */
  ParseError: 'C85200',

  /** Unresolved operand or register allocator exhaustion. */
  CodegenError: 'C85300',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

/**
 * Error kind reported to users alongside the diagnostic ID.
 */
export type DiagnosticKind = 'Unknown' | 'IoError' | 'LexError' | 'ParseError' | 'CodegenError';

export function diagnosticKind(id: DiagnosticId): DiagnosticKind {
  switch (id) {
    case DiagnosticIds.Unknown:
      return 'Unknown';
    case DiagnosticIds.IoReadFailed:
      return 'IoError';
    case DiagnosticIds.LexError:
      return 'LexError';
    case DiagnosticIds.ParseError:
      return 'ParseError';
    case DiagnosticIds.CodegenError:
      return 'CodegenError';
  }
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
