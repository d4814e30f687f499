// AccountValuator: collateral valuation and health factor for any ledger view
import { BreakHealthFactorError } from './errors.js';
import { calculateHealthFactor, isHealthy } from './healthFactor.js';
import type { LedgerView } from './CollateralLedger.js';
import type { PriceOracleAdapter } from './PriceOracleAdapter.js';
import type { AccountInformation } from './types.js';

export class AccountValuator {
  constructor(
    private readonly prices: PriceOracleAdapter,
    private readonly collateralTokens: readonly string[]
  ) {}

  /**
   * Sum of the USD value of every allow-listed collateral position
   */
  collateralValueInUsd(view: LedgerView, user: string): Promise<bigint> {
    return this.valuePositions(this.positionsOf(view, user));
  }

  /**
   * Debt and positions are read together before the first oracle await, so a
   * commit landing mid-valuation cannot mix two ledger states.
   */
  async accountInformation(view: LedgerView, user: string): Promise<AccountInformation> {
    const totalDscMinted = view.getDebt(user);
    const positions = this.positionsOf(view, user);
    const collateralValueInUsd = await this.valuePositions(positions);
    return { totalDscMinted, collateralValueInUsd };
  }

  async healthFactor(view: LedgerView, user: string): Promise<bigint> {
    const { totalDscMinted, collateralValueInUsd } = await this.accountInformation(view, user);
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  /**
   * @returns the health factor, when it satisfies MIN_HEALTH_FACTOR
   * @throws BreakHealthFactorError carrying the computed ratio otherwise
   */
  async requireHealthy(view: LedgerView, user: string): Promise<bigint> {
    const healthFactor = await this.healthFactor(view, user);
    if (!isHealthy(healthFactor)) {
      throw new BreakHealthFactorError(user, healthFactor);
    }
    return healthFactor;
  }

  private positionsOf(view: LedgerView, user: string): Array<[string, bigint]> {
    return this.collateralTokens.map((asset): [string, bigint] => [asset, view.getCollateral(user, asset)]);
  }

  private async valuePositions(positions: ReadonlyArray<readonly [string, bigint]>): Promise<bigint> {
    let total = 0n;
    for (const [asset, amount] of positions) {
      // Skip the oracle round-trip for empty positions
      if (amount === 0n) continue;
      total += await this.prices.usdValue(asset, amount);
    }
    return total;
  }
}
