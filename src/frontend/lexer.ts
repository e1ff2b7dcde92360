import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { isRegister, registerWidth } from '../semantics/registers.js';
import type { SourceFile } from './source.js';
import { posAtOffset, span } from './source.js';
import type { OperatorText, PunctText, Token } from './tokens.js';
import { isKeyword } from './tokens.js';

/** Literals wider than this many hex digits cannot fit in a 16-bit word. */
const MAX_HEX_DIGITS = 4;

const TWO_CHAR_OPERATORS: readonly OperatorText[] = ['==', '++', '--'];
const ONE_CHAR_OPERATORS: readonly OperatorText[] = ['=', '<', '>', '+', '-', '&', '|', '^'];
const PUNCT: readonly PunctText[] = ['{', '}', '(', ')', ';'];

function diag(diagnostics: Diagnostic[], file: SourceFile, offset: number, message: string): void {
  const pos = posAtOffset(file, offset);
  diagnostics.push({
    id: DiagnosticIds.LexError,
    severity: 'error',
    message,
    file: file.path,
    line: pos.line,
    column: pos.column,
  });
}

function printable(ch: string): string {
  if (ch === '\t') return '\\t';
  const code = ch.codePointAt(0) ?? 0;
  if (code < 0x20 || code === 0x7f) return `\\x${code.toString(16).padStart(2, '0')}`;
  return ch;
}

function asOperator(text: string, candidates: readonly OperatorText[]): OperatorText | undefined {
  return candidates.find((c) => c === text);
}

function asPunct(ch: string): PunctText | undefined {
  return PUNCT.find((p) => p === ch);
}

/**
 * Split source text into tokens.
 *
 * Whitespace and `//` comments produce no tokens. Stops at the first error and returns `undefined`,
 * so callers never see a partial token stream.
 */
export function tokenize(file: SourceFile, diagnostics: Diagnostic[]): Token[] | undefined {
  const out: Token[] = [];
  const s = file.text;
  let i = 0;

  while (i < s.length) {
    const ch = s[i] ?? '';

    if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n') {
      i++;
      continue;
    }

    if (s.startsWith('//', i)) {
      const eol = s.indexOf('\n', i);
      i = eol < 0 ? s.length : eol + 1;
      continue;
    }

    const two = asOperator(s.slice(i, i + 2), TWO_CHAR_OPERATORS);
    if (two) {
      out.push({ kind: 'Operator', span: span(file, i, i + 2), text: two });
      i += 2;
      continue;
    }

    const one = asOperator(ch, ONE_CHAR_OPERATORS);
    if (one) {
      out.push({ kind: 'Operator', span: span(file, i, i + 1), text: one });
      i++;
      continue;
    }

    const punct = asPunct(ch);
    if (punct) {
      out.push({ kind: 'Punct', span: span(file, i, i + 1), text: punct });
      i++;
      continue;
    }

    const rest = s.slice(i);

    const hex = /^0[xX]([0-9A-Fa-f]*)/.exec(rest);
    if (hex) {
      const digits = hex[1] ?? '';
      const end = i + hex[0].length;
      if (digits.length === 0) {
        diag(diagnostics, file, i, `Invalid hex literal "${hex[0]}": expected digits after 0x.`);
        return undefined;
      }
      const trailing = /^[A-Za-z0-9_]+/.exec(s.slice(end));
      if (trailing) {
        diag(
          diagnostics,
          file,
          i,
          `Invalid hex literal "${hex[0]}${trailing[0]}": unexpected "${trailing[0]}" after the digits.`,
        );
        return undefined;
      }
      if (digits.length > MAX_HEX_DIGITS) {
        diag(
          diagnostics,
          file,
          i,
          `Invalid hex literal "${hex[0]}": at most ${MAX_HEX_DIGITS} hex digits are allowed.`,
        );
        return undefined;
      }
      out.push({
        kind: 'HexLiteral',
        span: span(file, i, end),
        value: Number.parseInt(digits, 16),
        digits: digits.length,
      });
      i = end;
      continue;
    }

    const decimal = /^[0-9][A-Za-z0-9_]*/.exec(rest);
    if (decimal) {
      diag(
        diagnostics,
        file,
        i,
        `Invalid number literal "${decimal[0]}". Use the 0x prefix for hex values.`,
      );
      return undefined;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(rest);
    if (ident) {
      const text = ident[0];
      const tokenSpan = span(file, i, i + text.length);
      if (isKeyword(text)) {
        out.push({ kind: 'Keyword', span: tokenSpan, keyword: text });
      } else if (isRegister(text)) {
        out.push({ kind: 'Register', span: tokenSpan, name: text, width: registerWidth(text) });
      } else {
        out.push({ kind: 'Identifier', span: tokenSpan, name: text });
      }
      i += text.length;
      continue;
    }

    const char = String.fromCodePoint(s.codePointAt(i) ?? 0);
    diag(diagnostics, file, i, `Unexpected character "${printable(char)}".`);
    return undefined;
  }

  return out;
}
