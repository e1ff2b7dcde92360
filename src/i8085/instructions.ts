import type { Reg16Name, Reg8Name } from '../semantics/registers.js';
import { pairOperand } from '../semantics/registers.js';

export type AluMnemonic = 'ADD' | 'SUB' | 'ANA' | 'ORA' | 'XRA';
export type JumpMnemonic = 'JZ' | 'JNZ' | 'JC' | 'JNC';

/**
 * The subset of the 8085 instruction set the lowering pass emits.
 */
export type Instruction =
  | { mnemonic: 'MVI'; dst: Reg8Name; value: number }
  | { mnemonic: 'MOV'; dst: Reg8Name; src: Reg8Name }
  | { mnemonic: 'STA'; address: number }
  | { mnemonic: 'LXI'; pair: Reg16Name; value: number }
  | { mnemonic: 'INX' | 'DCX'; pair: Reg16Name }
  | { mnemonic: 'CMP'; src: Reg8Name }
  | { mnemonic: AluMnemonic; src: Reg8Name }
  | { mnemonic: JumpMnemonic; target: string };

/**
 * `0x0A` -> `0AH`. Always two digits.
 */
export function hexByte(n: number): string {
  return `${(n & 0xff).toString(16).toUpperCase().padStart(2, '0')}H`;
}

/**
 * `0x8000` -> `8000H`. Always four digits.
 */
export function hexWord(n: number): string {
  return `${(n & 0xffff).toString(16).toUpperCase().padStart(4, '0')}H`;
}

function operands(ins: Instruction): string {
  switch (ins.mnemonic) {
    case 'MVI':
      return `${ins.dst},${hexByte(ins.value)}`;
    case 'MOV':
      return `${ins.dst},${ins.src}`;
    case 'STA':
      return hexWord(ins.address);
    case 'LXI':
      return `${pairOperand(ins.pair)},${hexWord(ins.value)}`;
    case 'INX':
    case 'DCX':
      return pairOperand(ins.pair);
    case 'CMP':
    case 'ADD':
    case 'SUB':
    case 'ANA':
    case 'ORA':
    case 'XRA':
      return ins.src;
    case 'JZ':
    case 'JNZ':
    case 'JC':
    case 'JNC':
      return ins.target;
  }
}

/**
 * Render one instruction as an output line, e.g. `MVI A,05H;` or `JNZ SKIP_2;`.
 */
export function formatInstruction(ins: Instruction): string {
  return `${ins.mnemonic} ${operands(ins)};`;
}

/**
 * Render a label declaration line, e.g. `SKIP_0:`.
 */
export function formatLabel(name: string): string {
  return `${name}:`;
}
