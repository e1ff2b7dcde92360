import type { SourceSpan } from '../frontend/ast.js';
import type { Reg8Name } from './registers.js';

/**
 * Storage assigned to one static variable.
 */
export interface VariableSymbol {
  name: string;
  register: Reg8Name;
  address: number;
  /** Where the variable was declared. */
  span: SourceSpan;
}

/**
 * Insertion-ordered table of declared variables.
 *
 * Owned by a single compilation; the lowering pass creates one per program.
 */
export class SymbolTable {
  private readonly entries = new Map<string, VariableSymbol>();

  lookup(name: string): VariableSymbol | undefined {
    return this.entries.get(name);
  }

  /**
   * Record a variable. Returns `false` (leaving the table unchanged) when the name already exists.
   */
  declare(symbol: VariableSymbol): boolean {
    if (this.entries.has(symbol.name)) return false;
    this.entries.set(symbol.name, symbol);
    return true;
  }

  /** Variables in declaration order. */
  list(): VariableSymbol[] {
    return [...this.entries.values()];
  }
}
