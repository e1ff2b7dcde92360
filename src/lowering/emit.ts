import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { EmittedLine, EmittedProgram, SymbolEntry } from '../formats/types.js';
import type {
  BinaryOperator,
  Comparator,
  IfNode,
  OperandNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from '../frontend/ast.js';
import type { AluMnemonic, Instruction } from '../i8085/instructions.js';
import { formatInstruction, formatLabel } from '../i8085/instructions.js';
import type { Reg8Name } from '../semantics/registers.js';
import { ALLOCATION_ORDER } from '../semantics/registers.js';
import { SymbolTable } from '../semantics/symbols.js';
import { AllocatorState } from './allocator.js';

function diagAt(diagnostics: Diagnostic[], span: SourceSpan, message: string): void {
  diagnostics.push({
    id: DiagnosticIds.CodegenError,
    severity: 'error',
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
  });
}

function aluMnemonic(op: BinaryOperator): AluMnemonic {
  switch (op) {
    case '+':
      return 'ADD';
    case '-':
      return 'SUB';
    case '&':
      return 'ANA';
    case '|':
      return 'ORA';
    case '^':
      return 'XRA';
  }
}

function mirror(comparator: Comparator): Comparator {
  switch (comparator) {
    case '<':
      return '>';
    case '>':
      return '<';
    case '==':
      return '==';
  }
}

/**
 * Lower a parsed program to 8085 assembly lines in a single walk.
 *
 * Implementation notes:
 * - Every variable declaration goes through the accumulator (`MVI A` + `STA`) and is then parked in
 *   the next free register; a variable allocated to A stays there.
 * - `reg` statements claim their register (or both halves of a `malloc` pair) for the rest of the
 *   walk, so later variables skip it.
 * - Each `if` takes the next `SKIP_n` label before its body is lowered, which keeps label numbers in
 *   textual order for nested conditions too.
 *
 * Returns `undefined` on the first error; no partial output is produced.
 */
export function emitProgram(
  program: ProgramNode,
  diagnostics: Diagnostic[],
): EmittedProgram | undefined {
  const alloc = new AllocatorState();
  const table = new SymbolTable();
  const lines: EmittedLine[] = [];
  const labels: SymbolEntry[] = [];

  const emit = (ins: Instruction, span: SourceSpan): void => {
    lines.push({ kind: 'instruction', text: formatInstruction(ins), span });
  };

  const resolve = (operand: OperandNode): Reg8Name | undefined => {
    if (operand.kind === 'RegRef') return operand.register;
    const symbol = table.lookup(operand.name);
    if (!symbol) {
      diagAt(diagnostics, operand.span, `Operand "${operand.name}" does not resolve to a register.`);
      return undefined;
    }
    return symbol.register;
  };

  const lowerIf = (node: IfNode): boolean => {
    const label = alloc.allocateLabel();
    labels.push({ kind: 'label', name: label, file: node.span.file, line: node.span.start.line });

    let left = resolve(node.left);
    let right = resolve(node.right);
    if (left === undefined || right === undefined) return false;
    let comparator = node.comparator;

    // Loading the left operand into A would overwrite a right operand that lives in A.
    if (right === 'A' && left !== 'A') {
      [left, right] = [right, left];
      comparator = mirror(comparator);
    }

    if (left !== 'A') emit({ mnemonic: 'MOV', dst: 'A', src: left }, node.span);
    emit({ mnemonic: 'CMP', src: right }, node.span);
    switch (comparator) {
      case '<':
        emit({ mnemonic: 'JZ', target: label }, node.span);
        emit({ mnemonic: 'JNC', target: label }, node.span);
        break;
      case '>':
        emit({ mnemonic: 'JZ', target: label }, node.span);
        emit({ mnemonic: 'JC', target: label }, node.span);
        break;
      case '==':
        emit({ mnemonic: 'JNZ', target: label }, node.span);
        break;
    }

    if (!lowerBlock(node.body)) return false;
    const closing: SourceSpan = { file: node.span.file, start: node.span.end, end: node.span.end };
    lines.push({ kind: 'label', text: formatLabel(label), span: closing });
    return true;
  };

  const lowerStatement = (stmt: StatementNode): boolean => {
    switch (stmt.kind) {
      case 'VarAssign': {
        const register = alloc.allocateRegister();
        if (register === undefined) {
          diagAt(
            diagnostics,
            stmt.span,
            `Cannot allocate a register for variable "${stmt.name}": all ${ALLOCATION_ORDER.length} registers are in use.`,
          );
          return false;
        }
        const address = alloc.allocateAddress();
        emit({ mnemonic: 'MVI', dst: 'A', value: stmt.value }, stmt.span);
        emit({ mnemonic: 'STA', address }, stmt.span);
        if (register !== 'A') emit({ mnemonic: 'MOV', dst: register, src: 'A' }, stmt.span);
        if (!table.declare({ name: stmt.name, register, address, span: stmt.span })) {
          diagAt(diagnostics, stmt.span, `Variable "${stmt.name}" is allocated twice.`);
          return false;
        }
        return true;
      }
      case 'RegAssign':
        alloc.claim(stmt.register);
        emit({ mnemonic: 'MVI', dst: stmt.register, value: stmt.value }, stmt.span);
        return true;
      case 'BinaryOp':
        if (stmt.left !== 'A') emit({ mnemonic: 'MOV', dst: 'A', src: stmt.left }, stmt.span);
        emit({ mnemonic: aluMnemonic(stmt.op), src: stmt.right }, stmt.span);
        if (stmt.left !== 'A') emit({ mnemonic: 'MOV', dst: stmt.left, src: 'A' }, stmt.span);
        return true;
      case 'PointerStep':
        emit({ mnemonic: stmt.direction === 'inc' ? 'INX' : 'DCX', pair: stmt.pair }, stmt.span);
        return true;
      case 'MallocAssign':
        alloc.claimPair(stmt.pair);
        emit({ mnemonic: 'LXI', pair: stmt.pair, value: stmt.address }, stmt.span);
        return true;
      case 'If':
        return lowerIf(stmt);
    }
  };

  function lowerBlock(body: StatementNode[]): boolean {
    for (const stmt of body) {
      if (!lowerStatement(stmt)) return false;
    }
    return true;
  }

  if (!lowerBlock(program.body)) return undefined;

  const symbols: SymbolEntry[] = [
    ...table.list().map(
      (v): SymbolEntry => ({
        kind: 'var',
        name: v.name,
        register: v.register,
        address: v.address,
        file: v.span.file,
        line: v.span.start.line,
      }),
    ),
    ...labels,
  ];

  return { file: program.file, lines, symbols };
}
