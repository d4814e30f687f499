/**
 * InMemoryStableCoin: process-local synthetic dollar owned by the engine.
 *
 * Mirrors a burnable ERC20 whose minting and burning are reserved to its
 * owner. Allowances are not modelled: transferFrom only checks balances.
 */

import { ZeroAddress } from 'ethers';

import { normalizeAddress } from '../utils/Address.js';
import { BalanceBook } from './BalanceBook.js';
import type { StableCoin } from '../engine/types.js';

export class InMemoryStableCoin implements StableCoin {
  readonly address: string;
  private readonly owner: string;
  private readonly book = new BalanceBook();

  constructor(address: string, owner: string) {
    this.address = normalizeAddress(address);
    this.owner = normalizeAddress(owner);
  }

  async mint(to: string, amount: bigint): Promise<boolean> {
    const holder = normalizeAddress(to);
    if (holder === ZeroAddress) {
      throw new Error('NotZeroAddress');
    }
    if (amount <= 0n) {
      throw new Error('MustBeMoreThanZero');
    }
    this.book.credit(holder, amount);
    return true;
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<boolean> {
    return this.book.move(normalizeAddress(from), normalizeAddress(to), amount);
  }

  /** Destroys tokens held by the owner */
  async burn(amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new Error('MustBeMoreThanZero');
    }
    if (!this.book.debit(this.owner, amount)) {
      throw new Error('BurnAmountExceedsBalance');
    }
  }

  balanceOf(holder: string): bigint {
    return this.book.balanceOf(normalizeAddress(holder));
  }

  totalSupply(): bigint {
    return this.book.total();
  }
}
