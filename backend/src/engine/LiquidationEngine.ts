/**
 * LiquidationEngine: bonus-adjusted debt-for-collateral exchange on an
 * undercollateralized position.
 *
 * Flow (all inside the caller's transaction):
 * 1. target must be below MIN_HEALTH_FACTOR, else HealthFactorOK
 * 2. debtToCover (USD) -> base amount of the collateral asset
 * 3. bonus = base × LIQUIDATION_BONUS / LIQUIDATION_PRECISION
 * 4. seize base + bonus from the target's position to the liquidator
 * 5. repay the target's debt with the liquidator's tokens, then burn them
 * 6. target's health factor must strictly improve, else HealthFactorNotImproved
 * 7. liquidator's own health factor must still satisfy the minimum
 *
 * If system-wide collateral falls to 100% of debt or below before anyone
 * liquidates, the bonus cannot be funded; that limitation is accepted.
 */

import { LIQUIDATION_BONUS, LIQUIDATION_PRECISION } from './constants.js';
import { DscEngineError } from './errors.js';
import { isHealthy } from './healthFactor.js';
import { stageBurnDsc, stageRedeemCollateral, type EffectContext } from './positionEffects.js';
import type { AccountValuator } from './AccountValuator.js';
import type { LedgerTransaction } from './LedgerTransaction.js';
import type { PriceOracleAdapter } from './PriceOracleAdapter.js';

export interface SeizureQuote {
  tokenAmountFromDebtCovered: bigint;
  bonusCollateral: bigint;
  totalCollateralToRedeem: bigint;
}

export interface LiquidationResult extends SeizureQuote {
  user: string;
  liquidator: string;
  collateral: string;
  debtCovered: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

export function quoteSeizure(tokenAmountFromDebtCovered: bigint): SeizureQuote {
  const bonusCollateral = (tokenAmountFromDebtCovered * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
  return {
    tokenAmountFromDebtCovered,
    bonusCollateral,
    totalCollateralToRedeem: tokenAmountFromDebtCovered + bonusCollateral
  };
}

export class LiquidationEngine {
  constructor(
    private readonly prices: PriceOracleAdapter,
    private readonly valuator: AccountValuator,
    private readonly effects: EffectContext
  ) {}

  /**
   * Collateral a liquidator would receive for covering `debtToCover` at current prices
   */
  async previewSeizure(collateral: string, debtToCover: bigint): Promise<SeizureQuote> {
    return quoteSeizure(await this.prices.amountFromUsd(collateral, debtToCover));
  }

  async liquidate(
    tx: LedgerTransaction,
    collateral: string,
    user: string,
    liquidator: string,
    debtToCover: bigint
  ): Promise<LiquidationResult> {
    const startingHealthFactor = await this.valuator.healthFactor(tx, user);
    if (isHealthy(startingHealthFactor)) {
      throw new DscEngineError('HealthFactorOK', `Health factor of ${user} is ${startingHealthFactor}; nothing to liquidate`);
    }

    const quote = await this.previewSeizure(collateral, debtToCover);

    stageRedeemCollateral(tx, this.effects, collateral, quote.totalCollateralToRedeem, user, liquidator);
    stageBurnDsc(tx, this.effects, debtToCover, user, liquidator);

    const endingHealthFactor = await this.valuator.healthFactor(tx, user);
    if (endingHealthFactor <= startingHealthFactor) {
      throw new DscEngineError(
        'HealthFactorNotImproved',
        `Health factor of ${user} went from ${startingHealthFactor} to ${endingHealthFactor}`
      );
    }

    await this.valuator.requireHealthy(tx, liquidator);

    return {
      ...quote,
      user,
      liquidator,
      collateral,
      debtCovered: debtToCover,
      startingHealthFactor,
      endingHealthFactor
    };
  }
}
