import type {
  BinaryOperator,
  Comparator,
  IfNode,
  OperandNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
} from './ast.js';
import type { SourceFile } from './source.js';
import { joinSpans, span } from './source.js';
import type { Keyword, OperatorText, PunctText, Token } from './tokens.js';
import { describeToken } from './tokens.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isReg16, isReg8 } from '../semantics/registers.js';

type HexLiteralToken = Extract<Token, { kind: 'HexLiteral' }>;
type RegisterToken = Extract<Token, { kind: 'Register' }>;

const BINARY_OPERATORS: readonly BinaryOperator[] = ['+', '-', '&', '|', '^'];
const COMPARATORS: readonly Comparator[] = ['<', '>', '=='];

const BYTE_MAX = 0xff;

function toHex(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

function isPunct(token: Token | undefined, text: PunctText): boolean {
  return token?.kind === 'Punct' && token.text === text;
}

function isOperator(token: Token | undefined, text: OperatorText): boolean {
  return token?.kind === 'Operator' && token.text === text;
}

function isKeyword(token: Token | undefined, keyword: Keyword): boolean {
  return token?.kind === 'Keyword' && token.keyword === keyword;
}

function asBinaryOperator(token: Token | undefined): BinaryOperator | undefined {
  if (token?.kind !== 'Operator') return undefined;
  return BINARY_OPERATORS.find((op) => op === token.text);
}

function asComparator(token: Token | undefined): Comparator | undefined {
  if (token?.kind !== 'Operator') return undefined;
  return COMPARATORS.find((c) => c === token.text);
}

/**
 * Parse the token stream of one source file into a {@link ProgramNode}.
 *
 * Grammar (one statement per `;`, `if` bodies may nest):
 *
 *     program   := 'main' '{' statement* '}'
 *     statement := IDENT '=' HEX ';'
 *                | 'reg' REG8 '=' HEX ';'
 *                | 'reg' REG16 '=' 'malloc' '(' HEX ')' ';'
 *                | REG16 ('++' | '--') ';'
 *                | REG8 ('+' | '-' | '&' | '|' | '^') 'B' ';'
 *                | 'if' '(' operand ('<' | '>' | '==') operand ')' '{' statement* '}'
 *     operand   := IDENT | REG8
 *
 * Declarations are checked as they are read: a name may be declared once, and a condition may only
 * name variables declared earlier in the text. Width rules (8-bit registers vs 16-bit pairs, byte
 * vs word literals) are enforced here too.
 *
 * Fails fast: the first error is reported and `undefined` is returned.
 */
export function parseProgram(
  file: SourceFile,
  tokens: Token[],
  diagnostics: Diagnostic[],
): ProgramNode | undefined {
  const declared = new Map<string, SourceSpan>();
  const eofSpan = span(file, file.text.length, file.text.length);
  let pos = 0;

  const peek = (ahead = 0): Token | undefined => tokens[pos + ahead];

  const fail = (at: Token | SourceSpan | undefined, message: string): undefined => {
    const where = at === undefined ? eofSpan : 'kind' in at ? at.span : at;
    diagnostics.push({
      id: DiagnosticIds.ParseError,
      severity: 'error',
      message,
      file: file.path,
      line: where.start.line,
      column: where.start.column,
    });
    return undefined;
  };

  const expected = (what: string): undefined => {
    const found = peek();
    return fail(found, `Expected ${what}, found ${describeToken(found)}.`);
  };

  const expectPunct = (text: PunctText, what = `"${text}"`): Token | undefined => {
    const t = peek();
    if (!t || !isPunct(t, text)) return expected(what);
    pos++;
    return t;
  };

  const expectOperator = (text: OperatorText, what = `"${text}"`): Token | undefined => {
    const t = peek();
    if (!t || !isOperator(t, text)) return expected(what);
    pos++;
    return t;
  };

  const expectLiteral = (what: string): HexLiteralToken | undefined => {
    const t = peek();
    if (t?.kind !== 'HexLiteral') return expected(what);
    pos++;
    return t;
  };

  const endStatement = (): Token | undefined => expectPunct(';', '";" at the end of the statement');

  function parseVarAssign(name: Extract<Token, { kind: 'Identifier' }>): StatementNode | undefined {
    pos++;
    if (!expectOperator('=', `"=" after identifier "${name.name}"`)) return undefined;
    const value = expectLiteral(`a hex literal after "=" for variable "${name.name}"`);
    if (!value) return undefined;
    if (value.value > BYTE_MAX) {
      return fail(
        value,
        `Value ${toHex(value.value)} does not fit in 8-bit variable "${name.name}" (max 0xFF).`,
      );
    }
    const prev = declared.get(name.name);
    if (prev) {
      return fail(
        name,
        `Variable "${name.name}" is already declared (line ${prev.start.line}, column ${prev.start.column}).`,
      );
    }
    const end = endStatement();
    if (!end) return undefined;
    declared.set(name.name, name.span);
    return {
      kind: 'VarAssign',
      span: joinSpans(name.span, end.span),
      name: name.name,
      value: value.value,
    };
  }

  function parseRegStatement(start: Token): StatementNode | undefined {
    pos++;
    const target = peek();
    if (target?.kind !== 'Register') return expected('a register name after "reg"');
    pos++;
    if (!expectOperator('=', `"=" after register ${target.name}`)) return undefined;

    const name = target.name;
    const rhs = peek();
    if (isKeyword(rhs, 'malloc')) {
      if (!isReg16(name)) {
        return fail(target, `malloc() requires a 16-bit register pair, got 8-bit register ${name}.`);
      }
      pos++;
      if (!expectPunct('(', '"(" after malloc')) return undefined;
      const address = expectLiteral('a hex address inside malloc()');
      if (!address) return undefined;
      if (!expectPunct(')', '")" to close malloc()')) return undefined;
      const end = endStatement();
      if (!end) return undefined;
      return {
        kind: 'MallocAssign',
        span: joinSpans(start.span, end.span),
        pair: name,
        address: address.value,
      };
    }

    const value = expectLiteral(`a hex literal or malloc(...) after "reg ${name} ="`);
    if (!value) return undefined;
    if (!isReg8(name)) {
      return fail(
        value,
        `Register pair ${name} can only be loaded with malloc(...); a plain literal needs an 8-bit register.`,
      );
    }
    if (value.value > BYTE_MAX) {
      return fail(
        value,
        `Value ${toHex(value.value)} does not fit in 8-bit register ${name} (max 0xFF).`,
      );
    }
    const end = endStatement();
    if (!end) return undefined;
    return {
      kind: 'RegAssign',
      span: joinSpans(start.span, end.span),
      register: name,
      value: value.value,
    };
  }

  function parseRegisterStatement(reg: RegisterToken): StatementNode | undefined {
    pos++;
    const next = peek();

    if (isOperator(next, '++') || isOperator(next, '--')) {
      if (!isReg16(reg.name)) {
        return fail(
          reg,
          `Increment/decrement requires a 16-bit register pair, got 8-bit register ${reg.name}.`,
        );
      }
      pos++;
      const end = endStatement();
      if (!end) return undefined;
      return {
        kind: 'PointerStep',
        span: joinSpans(reg.span, end.span),
        pair: reg.name,
        direction: isOperator(next, '++') ? 'inc' : 'dec',
      };
    }

    const op = asBinaryOperator(next);
    if (!op) {
      if (isOperator(next, '=')) {
        return expected(`an operator after register ${reg.name} (use "reg ${reg.name} = ..." to load a register)`);
      }
      return expected(`an operator after register ${reg.name}`);
    }
    if (!isReg8(reg.name)) {
      return fail(reg, `Binary operations take 8-bit registers; ${reg.name} is a 16-bit register pair.`);
    }
    pos++;

    const right = peek();
    if (right?.kind !== 'Register') return expected(`register B after "${op}"`);
    if (!isReg8(right.name)) {
      return fail(right, `Binary operations take 8-bit registers; ${right.name} is a 16-bit register pair.`);
    }
    if (right.name !== 'B') {
      return fail(right, `Second operand must be register B, got ${right.name}.`);
    }
    pos++;
    const end = endStatement();
    if (!end) return undefined;
    return {
      kind: 'BinaryOp',
      span: joinSpans(reg.span, end.span),
      left: reg.name,
      op,
      right: right.name,
    };
  }

  function parseOperand(): OperandNode | undefined {
    const t = peek();
    if (t?.kind === 'Identifier') {
      if (!declared.has(t.name)) {
        return fail(t, `Variable "${t.name}" is not declared before use.`);
      }
      pos++;
      return { kind: 'VarRef', span: t.span, name: t.name };
    }
    if (t?.kind === 'Register') {
      if (!isReg8(t.name)) {
        return fail(t, `Conditions compare 8-bit values; ${t.name} is a 16-bit register pair.`);
      }
      pos++;
      return { kind: 'RegRef', span: t.span, register: t.name };
    }
    return expected('a register or variable name in the condition');
  }

  function parseIf(start: Token): IfNode | undefined {
    pos++;
    if (!expectPunct('(', '"(" after "if"')) return undefined;
    const left = parseOperand();
    if (!left) return undefined;
    const comparator = asComparator(peek());
    if (!comparator) return expected('a comparison operator ("<", ">" or "==")');
    pos++;
    const right = parseOperand();
    if (!right) return undefined;
    if (!expectPunct(')', '")" after the condition')) return undefined;
    if (!expectPunct('{', '"{" to open the if block')) return undefined;
    const body = parseBlock();
    if (!body) return undefined;
    const close = expectPunct('}', '"}" to close the if block');
    if (!close) return undefined;
    return {
      kind: 'If',
      span: joinSpans(start.span, close.span),
      left,
      comparator,
      right,
      body,
    };
  }

  function parseStatement(t: Token): StatementNode | undefined {
    switch (t.kind) {
      case 'Identifier':
        return parseVarAssign(t);
      case 'Register':
        return parseRegisterStatement(t);
      case 'Keyword':
        if (t.keyword === 'reg') return parseRegStatement(t);
        if (t.keyword === 'if') return parseIf(t);
        if (t.keyword === 'main') return fail(t, 'Duplicate main block: "main" may appear only once.');
        return expected('a statement');
      case 'HexLiteral':
      case 'Operator':
      case 'Punct':
        return expected('a statement');
    }
  }

  /** Statements up to (not including) the closing `}` or the end of input. */
  function parseBlock(): StatementNode[] | undefined {
    const statements: StatementNode[] = [];
    for (let t = peek(); t && !isPunct(t, '}'); t = peek()) {
      const stmt = parseStatement(t);
      if (!stmt) return undefined;
      statements.push(stmt);
    }
    return statements;
  }

  const first = peek();
  if (!isKeyword(first, 'main')) {
    return fail(first, `Missing main block: expected "main", found ${describeToken(first)}.`);
  }
  pos++;
  if (!expectPunct('{', '"{" after "main"')) return undefined;
  const body = parseBlock();
  if (!body) return undefined;
  const close = expectPunct('}', '"}" to close the main block');
  if (!close) return undefined;

  const trailing = peek();
  if (trailing) {
    if (isKeyword(trailing, 'main')) {
      return fail(trailing, 'Duplicate main block: "main" may appear only once.');
    }
    return fail(trailing, `Unexpected ${describeToken(trailing)} after the end of the main block.`);
  }

  return {
    kind: 'Program',
    span: span(file, 0, file.text.length),
    file: file.path,
    body,
  };
}
