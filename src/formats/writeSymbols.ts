import { isAbsolute, relative, resolve } from 'node:path';

import { hexWord } from '../i8085/instructions.js';
import type { EmittedProgram, SymbolsArtifact, SymbolsJson, WriteSymbolsOptions } from './types.js';

function normalizeSymbolPath(file: string, rootDir?: string): string {
  const withSlashes = file.replace(/\\/g, '/');
  if (!rootDir) return withSlashes;
  const absFile = resolve(file);
  const absRoot = resolve(rootDir);
  const rel = relative(absRoot, absFile);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return absFile.replace(/\\/g, '/');
  }
  return rel.replace(/\\/g, '/');
}

/**
 * Create the `.sym.json` symbol map: variable storage (register + address) and skip labels.
 */
export function writeSymbols(program: EmittedProgram, opts?: WriteSymbolsOptions): SymbolsArtifact {
  const json: SymbolsJson = {
    format: 'c85-symbols',
    version: 1,
    arch: '8085',
    variables: [],
    labels: [],
  };

  for (const s of program.symbols) {
    const file = normalizeSymbolPath(s.file, opts?.rootDir);
    if (s.kind === 'var') {
      json.variables.push({
        name: s.name,
        register: s.register,
        address: hexWord(s.address),
        file,
        line: s.line,
      });
    } else {
      json.labels.push({ name: s.name, file, line: s.line });
    }
  }

  return { kind: 'sym', json };
}
