export { compile, compileSource } from './compile.js';
export { runCli, formatDiagnostic } from './cli.js';
export type { Diagnostic, DiagnosticId, DiagnosticKind } from './diagnostics/types.js';
export { DiagnosticIds, diagnosticKind, hasErrors } from './diagnostics/types.js';
export { defaultFormatWriters } from './formats/index.js';
export type * from './formats/types.js';
export type { ProgramNode, StatementNode } from './frontend/ast.js';
export { tokenize } from './frontend/lexer.js';
export { parseProgram } from './frontend/parser.js';
export { makeSourceFile } from './frontend/source.js';
export type { Token } from './frontend/tokens.js';
export { emitProgram } from './lowering/emit.js';
export type { CompileFn, CompilerOptions, CompileResult, PipelineDeps } from './pipeline.js';
