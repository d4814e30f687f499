/**
 * InMemoryAssetCustody: per-asset balances standing in for collateral token contracts.
 * `fund` is a faucet for local runs and tests.
 */

import { normalizeAddress } from '../utils/Address.js';
import { BalanceBook } from './BalanceBook.js';
import type { AssetCustody } from '../engine/types.js';

export class InMemoryAssetCustody implements AssetCustody {
  private readonly engineAddress: string;
  private readonly books: Map<string, BalanceBook> = new Map();

  constructor(engineAddress: string) {
    this.engineAddress = normalizeAddress(engineAddress);
  }

  fund(asset: string, holder: string, amount: bigint): void {
    this.book(asset).credit(normalizeAddress(holder), amount);
  }

  balanceOf(asset: string, holder: string): bigint {
    return this.book(asset).balanceOf(normalizeAddress(holder));
  }

  async transferFrom(asset: string, from: string, to: string, amount: bigint): Promise<boolean> {
    return this.book(asset).move(normalizeAddress(from), normalizeAddress(to), amount);
  }

  /** Pays out of the engine's custody */
  async transfer(asset: string, to: string, amount: bigint): Promise<boolean> {
    return this.book(asset).move(this.engineAddress, normalizeAddress(to), amount);
  }

  private book(asset: string): BalanceBook {
    const key = normalizeAddress(asset);
    let book = this.books.get(key);
    if (!book) {
      book = new BalanceBook();
      this.books.set(key, book);
    }
    return book;
  }
}
