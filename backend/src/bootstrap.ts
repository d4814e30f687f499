/**
 * Wire a DscEngine from configuration.
 *
 * Custody and the stable coin are process-local (InMemory*), with custody
 * opening balances taken from INITIAL_COLLATERAL_BALANCES; prices come from
 * configured static answers or from Chainlink aggregators over RPC_URL.
 */

import { config } from './config/index.js';
import { ChainlinkPriceOracle } from './collaborators/ChainlinkPriceOracle.js';
import { InMemoryAssetCustody } from './collaborators/InMemoryAssetCustody.js';
import { InMemoryStableCoin } from './collaborators/InMemoryStableCoin.js';
import { StaticPriceOracle } from './collaborators/StaticPriceOracle.js';
import { DscEngine } from './engine/DscEngine.js';
import { logger } from './logger.js';
import type { BalanceAllocation } from './config/parseEnv.js';
import type { EngineMetrics } from './metrics/engine.js';
import type { PriceOracle } from './engine/types.js';

export interface EngineBundle {
  engine: DscEngine;
  dsc: InMemoryStableCoin;
  custody: InMemoryAssetCustody;
  oracle: PriceOracle;
}

export function createOracleFromConfig(): PriceOracle {
  if (config.priceOracleMode === 'chainlink') {
    const rpcUrl = config.rpcUrl;
    if (!rpcUrl) {
      throw new Error('RPC_URL required when PRICE_ORACLE_MODE=chainlink');
    }
    logger.info(`[oracle] Chainlink aggregators via ${rpcUrl}`);
    return ChainlinkPriceOracle.fromRpcUrl(rpcUrl);
  }

  const prices = config.staticPrices;
  logger.info(`[oracle] Static answers for ${prices.length} feed(s)`);
  return new StaticPriceOracle(
    config.priceFeeds.map((feed, i): [string, bigint] => [feed, prices[i] ?? 0n])
  );
}

export function seedCustody(custody: InMemoryAssetCustody, allocations: readonly BalanceAllocation[]): void {
  for (const { asset, holder, amount } of allocations) {
    custody.fund(asset, holder, amount);
  }
  if (allocations.length > 0) {
    logger.info(`[bootstrap] Seeded ${allocations.length} custody balance(s)`);
  }
}

export function createEngineFromConfig(metrics?: EngineMetrics): EngineBundle {
  const custody = new InMemoryAssetCustody(config.engineAddress);
  seedCustody(custody, config.initialCollateralBalances);
  const dsc = new InMemoryStableCoin(config.dscAddress, config.engineAddress);
  const oracle = createOracleFromConfig();

  const engine = new DscEngine({
    tokenAddresses: config.collateralTokens,
    priceFeedAddresses: config.priceFeeds,
    engineAddress: config.engineAddress,
    dsc,
    oracle,
    custody,
    logger,
    metrics
  });

  return { engine, dsc, custody, oracle };
}
