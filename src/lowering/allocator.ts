import type { Reg16Name, Reg8Name } from '../semantics/registers.js';
import { ALLOCATION_ORDER, pairHalves } from '../semantics/registers.js';

/** First address handed out to static variables. */
export const STATIC_BASE_ADDRESS = 0x8000;

export const SKIP_LABEL_PREFIX = 'SKIP_';

/**
 * Mutable allocation cursors for a single lowering pass.
 *
 * Registers are handed out in {@link ALLOCATION_ORDER}; a register is skipped once it has been given to
 * a variable or claimed by an explicit `reg` statement.
 */
export class AllocatorState {
  private readonly taken = new Set<Reg8Name>();
  private nextAddress = STATIC_BASE_ADDRESS;
  private nextLabel = 0;

  /** Reserve a register named by `reg R = ...`. */
  claim(register: Reg8Name): void {
    this.taken.add(register);
  }

  /** Reserve both halves of a pair loaded by `reg RR = malloc(...)`. */
  claimPair(pair: Reg16Name): void {
    for (const half of pairHalves(pair)) this.taken.add(half);
  }

  isClaimed(register: Reg8Name): boolean {
    return this.taken.has(register);
  }

  /**
   * Next free register in priority order, or `undefined` when all seven are in use.
   */
  allocateRegister(): Reg8Name | undefined {
    const free = ALLOCATION_ORDER.find((r) => !this.taken.has(r));
    if (free === undefined) return undefined;
    this.taken.add(free);
    return free;
  }

  allocateAddress(): number {
    return this.nextAddress++;
  }

  allocateLabel(): string {
    const label = `${SKIP_LABEL_PREFIX}${this.nextLabel}`;
    this.nextLabel++;
    return label;
  }
}
