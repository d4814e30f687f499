/**
 * PriceOracleAdapter: asset amount <-> USD conversions on the 1e18 scale.
 *
 * Always asks the bound feed for its latest answer; nothing is cached.
 * Conversions truncate toward zero, so
 * usdValue(asset, amountFromUsd(asset, x)) <= x, short of x by less than the
 * USD value of one asset base unit.
 */

import { ADDITIONAL_FEED_PRECISION, PRECISION } from './constants.js';
import { DscEngineError } from './errors.js';
import type { PriceOracle } from './types.js';

export class PriceOracleAdapter {
  constructor(
    private readonly oracle: PriceOracle,
    private readonly feedOf: (asset: string) => string | undefined
  ) {}

  async usdValue(asset: string, amount: bigint): Promise<bigint> {
    const price = await this.latestPrice(asset);
    return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
  }

  async amountFromUsd(asset: string, usdAmount: bigint): Promise<bigint> {
    const price = await this.latestPrice(asset);
    return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
  }

  private async latestPrice(asset: string): Promise<bigint> {
    const feed = this.feedOf(asset);
    if (feed === undefined) {
      throw new DscEngineError('TokenNotAllowed', `No price feed bound to ${asset}`);
    }

    const price = await this.oracle.latestPrice(feed);
    if (price <= 0n) {
      throw new DscEngineError('InvalidPrice', `Feed ${feed} returned non-positive price ${price}`);
    }
    return price;
  }
}
