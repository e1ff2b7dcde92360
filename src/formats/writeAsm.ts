import type { AsmArtifact, EmittedProgram, WriteAsmOptions } from './types.js';

/**
 * Create the `.asm` artifact: every emitted line in order, one per line, newline-terminated.
 */
export function writeAsm(program: EmittedProgram, opts?: WriteAsmOptions): AsmArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const text = program.lines.map((l) => `${l.text}${lineEnding}`).join('');
  return { kind: 'asm', text };
}
