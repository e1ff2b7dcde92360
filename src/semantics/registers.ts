/**
 * 8085 register model: names, widths and the variable allocation order.
 */

export const REG8_NAMES = ['A', 'B', 'C', 'D', 'E', 'H', 'L'] as const;
export const REG16_NAMES = ['BC', 'DE', 'HL', 'SP'] as const;

export type Reg8Name = (typeof REG8_NAMES)[number];
export type Reg16Name = (typeof REG16_NAMES)[number];
export type RegisterName = Reg8Name | Reg16Name;

export type RegisterWidth = 8 | 16;

/**
 * Order in which static variables take up residence in registers.
 */
export const ALLOCATION_ORDER: readonly Reg8Name[] = REG8_NAMES;

export function isReg8(name: string): name is Reg8Name {
  return REG8_NAMES.some((r) => r === name);
}

export function isReg16(name: string): name is Reg16Name {
  return REG16_NAMES.some((r) => r === name);
}

export function isRegister(name: string): name is RegisterName {
  return isReg8(name) || isReg16(name);
}

export function registerWidth(name: RegisterName): RegisterWidth {
  return isReg8(name) ? 8 : 16;
}

/**
 * 8-bit halves of a pair. `SP` has no addressable halves.
 */
export function pairHalves(pair: Reg16Name): Reg8Name[] {
  switch (pair) {
    case 'BC':
      return ['B', 'C'];
    case 'DE':
      return ['D', 'E'];
    case 'HL':
      return ['H', 'L'];
    case 'SP':
      return [];
  }
}

/**
 * Operand spelling of a pair in 8085 mnemonics (`LXI H`, `INX B`, `DCX SP`).
 */
export function pairOperand(pair: Reg16Name): string {
  switch (pair) {
    case 'BC':
      return 'B';
    case 'DE':
      return 'D';
    case 'HL':
      return 'H';
    case 'SP':
      return 'SP';
  }
}
