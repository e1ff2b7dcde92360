import type { SourceSpan } from './ast.js';
import type { RegisterName, RegisterWidth } from '../semantics/registers.js';

export const KEYWORDS = ['main', 'if', 'reg', 'malloc'] as const;
export type Keyword = (typeof KEYWORDS)[number];

export type OperatorText = '=' | '==' | '<' | '>' | '+' | '-' | '&' | '|' | '^' | '++' | '--';
export type PunctText = '{' | '}' | '(' | ')' | ';';

/**
 * Lexer output. Every token carries the span of its source text for diagnostics.
 */
export type Token =
  | { kind: 'Identifier'; span: SourceSpan; name: string }
  | {
      kind: 'HexLiteral';
      span: SourceSpan;
      value: number;
      /** Number of hex digits written after `0x`. */
      digits: number;
    }
  | { kind: 'Keyword'; span: SourceSpan; keyword: Keyword }
  | { kind: 'Register'; span: SourceSpan; name: RegisterName; width: RegisterWidth }
  | { kind: 'Operator'; span: SourceSpan; text: OperatorText }
  | { kind: 'Punct'; span: SourceSpan; text: PunctText };

export function isKeyword(text: string): text is Keyword {
  return KEYWORDS.some((k) => k === text);
}

/**
 * Short user-facing description of a token, as used in "expected X, found Y" messages.
 */
export function describeToken(token: Token | undefined): string {
  if (!token) return 'end of input';
  switch (token.kind) {
    case 'Identifier':
      return `identifier "${token.name}"`;
    case 'HexLiteral':
      return `literal 0x${token.value.toString(16).toUpperCase().padStart(token.digits, '0')}`;
    case 'Keyword':
      return `keyword "${token.keyword}"`;
    case 'Register':
      return `register ${token.name}`;
    case 'Operator':
    case 'Punct':
      return `"${token.text}"`;
  }
}
