import { lineText, makeSourceFile } from '../frontend/source.js';
import { hexWord } from '../i8085/instructions.js';
import type { EmittedProgram, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';

function formatSymbol(s: SymbolEntry): string {
  if (s.kind === 'var') {
    return `var ${s.name} = ${hexWord(s.address)} (${s.register})`;
  }
  return `label ${s.name} (line ${s.line})`;
}

/**
 * Create a deterministic `.lst` listing artifact.
 *
 * Output lines are grouped under the source line that produced them, followed by the symbol table.
 * Without `sourceText` the group headers only carry line numbers.
 */
export function writeListing(program: EmittedProgram, opts?: WriteListingOptions): ListingArtifact {
  const lineEnding = opts?.lineEnding ?? '\n';
  const source =
    opts?.sourceText !== undefined ? makeSourceFile(program.file, opts.sourceText) : undefined;

  const lines: string[] = [];
  lines.push('; c85c listing');
  lines.push(`; source: ${program.file.replace(/\\/g, '/')}`);
  lines.push('');

  let currentLine: number | undefined;
  for (const l of program.lines) {
    const line = l.span.start.line;
    if (line !== currentLine) {
      const text = source ? lineText(source, line).trim() : '';
      lines.push(text.length > 0 ? `; ${String(line).padStart(4)} | ${text}` : `; ${String(line).padStart(4)} |`);
      currentLine = line;
    }
    lines.push(l.kind === 'label' ? l.text : `        ${l.text}`);
  }
  if (program.lines.length === 0) {
    lines.push('; no output');
  }

  lines.push('');
  lines.push('; symbols:');
  for (const s of program.symbols) {
    lines.push(`; ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join(lineEnding) + lineEnding };
}
