/**
 * CollateralLedger: committed per-account collateral and debt balances.
 *
 * The only source of truth for solvency checks. Writes arrive exclusively
 * through LedgerTransaction.commit(); zero balances are kept as entries and
 * read back as 0n, accounts are never deleted.
 */

export interface LedgerView {
  getCollateral(user: string, asset: string): bigint;
  getDebt(user: string): bigint;
}

export class CollateralLedger implements LedgerView {
  private readonly collateral: Map<string, Map<string, bigint>> = new Map();
  private readonly debt: Map<string, bigint> = new Map();

  getCollateral(user: string, asset: string): bigint {
    return this.collateral.get(user)?.get(asset) ?? 0n;
  }

  getDebt(user: string): bigint {
    return this.debt.get(user) ?? 0n;
  }

  /** Assets with a recorded (possibly zero) balance for `user` */
  getPositions(user: string): Map<string, bigint> {
    return new Map(this.collateral.get(user) ?? []);
  }

  applyCollateral(user: string, asset: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative collateral balance for ${user}/${asset}`);
    }
    let positions = this.collateral.get(user);
    if (!positions) {
      positions = new Map();
      this.collateral.set(user, positions);
    }
    positions.set(asset, amount);
  }

  applyDebt(user: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative debt balance for ${user}`);
    }
    this.debt.set(user, amount);
  }

  totalDebt(): bigint {
    let total = 0n;
    for (const amount of this.debt.values()) {
      total += amount;
    }
    return total;
  }

  totalCollateral(asset: string): bigint {
    let total = 0n;
    for (const positions of this.collateral.values()) {
      total += positions.get(asset) ?? 0n;
    }
    return total;
  }

  accountCount(): number {
    const users = new Set([...this.collateral.keys(), ...this.debt.keys()]);
    return users.size;
  }

  clear(): void {
    this.collateral.clear();
    this.debt.clear();
  }
}
