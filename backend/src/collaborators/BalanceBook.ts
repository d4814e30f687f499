// BalanceBook: holder -> balance bookkeeping shared by the in-memory collaborators
export class BalanceBook {
  private readonly balances: Map<string, bigint> = new Map();

  balanceOf(holder: string): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  credit(holder: string, amount: bigint): void {
    this.balances.set(holder, this.balanceOf(holder) + amount);
  }

  /**
   * @returns false, leaving balances untouched, when `holder` cannot cover `amount`
   */
  debit(holder: string, amount: bigint): boolean {
    const balance = this.balanceOf(holder);
    if (amount > balance) return false;
    this.balances.set(holder, balance - amount);
    return true;
  }

  move(from: string, to: string, amount: bigint): boolean {
    if (!this.debit(from, amount)) return false;
    this.credit(to, amount);
    return true;
  }

  total(): bigint {
    let sum = 0n;
    for (const amount of this.balances.values()) sum += amount;
    return sum;
  }
}
