/**
 * Frontend AST contracts for c85 programs.
 *
 * Types only; parsing lives in `parser.ts` and lowering in `../lowering/emit.ts`.
 */
import type { Reg16Name, Reg8Name } from '../semantics/registers.js';

export interface SourcePosition {
  /** 1-based line number. */
  line: number;
  /** 1-based column number. */
  column: number;
  /** 0-based offset in the file text. */
  offset: number;
}

/**
 * Source span with inclusive start and exclusive end positions.
 */
export interface SourceSpan {
  /** User-facing file path (as provided on input). */
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

/**
 * Base shape for all AST nodes.
 */
export interface BaseNode {
  kind: string;
  span: SourceSpan;
}

/**
 * Root node: the statements of the single `main { ... }` block, in source order.
 */
export interface ProgramNode extends BaseNode {
  kind: 'Program';
  file: string;
  body: StatementNode[];
}

/**
 * Statements permitted inside `main` and inside `if` bodies.
 *
 * Closed union: the lowering pass switches over `kind` exhaustively.
 */
export type StatementNode =
  | VarAssignNode
  | RegAssignNode
  | BinaryOpNode
  | PointerStepNode
  | MallocAssignNode
  | IfNode;

/**
 * `counter = 0x06;` declares a static byte variable.
 */
export interface VarAssignNode extends BaseNode {
  kind: 'VarAssign';
  name: string;
  value: number;
}

/**
 * `reg D = 0xAA;` loads a literal straight into a register.
 */
export interface RegAssignNode extends BaseNode {
  kind: 'RegAssign';
  register: Reg8Name;
  value: number;
}

export type BinaryOperator = '+' | '-' | '&' | '|' | '^';

/**
 * `A + B;` combines the accumulator with B, leaving the result in A.
 */
export interface BinaryOpNode extends BaseNode {
  kind: 'BinaryOp';
  left: Reg8Name;
  op: BinaryOperator;
  right: Reg8Name;
}

/**
 * `HL++;` / `HL--;`
 */
export interface PointerStepNode extends BaseNode {
  kind: 'PointerStep';
  pair: Reg16Name;
  direction: 'inc' | 'dec';
}

/**
 * `reg HL = malloc(0x6000);` loads an address into a register pair.
 */
export interface MallocAssignNode extends BaseNode {
  kind: 'MallocAssign';
  pair: Reg16Name;
  address: number;
}

export type Comparator = '<' | '>' | '==';

/**
 * Condition operand: a declared variable or a raw 8-bit register.
 */
export type OperandNode =
  | { kind: 'VarRef'; span: SourceSpan; name: string }
  | { kind: 'RegRef'; span: SourceSpan; register: Reg8Name };

/**
 * `if (left cmp right) { ... }`
 */
export interface IfNode extends BaseNode {
  kind: 'If';
  left: OperandNode;
  comparator: Comparator;
  right: OperandNode;
  body: StatementNode[];
}
