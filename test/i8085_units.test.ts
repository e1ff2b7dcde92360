import { describe, expect, it } from 'vitest';

import { formatInstruction, formatLabel, hexByte, hexWord } from '../src/i8085/instructions.js';
import { AllocatorState, STATIC_BASE_ADDRESS } from '../src/lowering/allocator.js';
import { isRegister, pairHalves, pairOperand, registerWidth } from '../src/semantics/registers.js';

describe('hex formatting', () => {
  it('pads bytes to two digits and words to four', () => {
    expect(hexByte(0)).toBe('00H');
    expect(hexByte(0x0a)).toBe('0AH');
    expect(hexByte(0xaa)).toBe('AAH');
    expect(hexWord(0x1f)).toBe('001FH');
    expect(hexWord(0x8000)).toBe('8000H');
  });
});

describe('formatInstruction', () => {
  it('renders operands per mnemonic', () => {
    expect(formatInstruction({ mnemonic: 'MVI', dst: 'D', value: 0xaa })).toBe('MVI D,AAH;');
    expect(formatInstruction({ mnemonic: 'MOV', dst: 'B', src: 'A' })).toBe('MOV B,A;');
    expect(formatInstruction({ mnemonic: 'STA', address: 0x8002 })).toBe('STA 8002H;');
    expect(formatInstruction({ mnemonic: 'LXI', pair: 'HL', value: 0x6000 })).toBe('LXI H,6000H;');
    expect(formatInstruction({ mnemonic: 'DCX', pair: 'SP' })).toBe('DCX SP;');
    expect(formatInstruction({ mnemonic: 'XRA', src: 'B' })).toBe('XRA B;');
    expect(formatInstruction({ mnemonic: 'JNC', target: 'SKIP_4' })).toBe('JNC SKIP_4;');
    expect(formatLabel('SKIP_4')).toBe('SKIP_4:');
  });
});

describe('registers', () => {
  it('classifies names by width', () => {
    expect(isRegister('HL')).toBe(true);
    expect(isRegister('hl')).toBe(false);
    expect(isRegister('M')).toBe(false);
    expect(registerWidth('E')).toBe(8);
    expect(registerWidth('SP')).toBe(16);
  });

  it('splits pairs into their halves', () => {
    expect(pairHalves('BC')).toEqual(['B', 'C']);
    expect(pairHalves('HL')).toEqual(['H', 'L']);
    expect(pairHalves('SP')).toEqual([]);
    expect(pairOperand('DE')).toBe('D');
    expect(pairOperand('SP')).toBe('SP');
  });
});

describe('AllocatorState', () => {
  it('hands out registers in order, skipping claims', () => {
    const alloc = new AllocatorState();
    alloc.claim('B');
    alloc.claimPair('DE');
    expect(alloc.isClaimed('D')).toBe(true);
    expect(alloc.isClaimed('C')).toBe(false);
    expect(alloc.allocateRegister()).toBe('A');
    expect(alloc.allocateRegister()).toBe('C');
    expect(alloc.isClaimed('C')).toBe(true);
    expect(alloc.allocateRegister()).toBe('H');
    expect(alloc.allocateRegister()).toBe('L');
    expect(alloc.allocateRegister()).toBeUndefined();
  });

  it('counts addresses and labels independently', () => {
    const alloc = new AllocatorState();
    expect(alloc.allocateAddress()).toBe(STATIC_BASE_ADDRESS);
    expect(alloc.allocateLabel()).toBe('SKIP_0');
    expect(alloc.allocateAddress()).toBe(STATIC_BASE_ADDRESS + 1);
    expect(alloc.allocateLabel()).toBe('SKIP_1');
  });
});
