/**
 * DSC engine service
 *
 * Environment variables (see envSchema.ts):
 *   API_KEY, JWT_SECRET, PORT, COLLATERAL_TOKENS, PRICE_FEEDS,
 *   PRICE_ORACLE_MODE, STATIC_PRICES, RPC_URL, ENGINE_ADDRESS, DSC_ADDRESS
 */

import { createServer } from 'http';

import { createApp } from './app.js';
import { createEngineFromConfig } from './bootstrap.js';
import { buildInfo } from './buildInfo.js';
import { config } from './config/index.js';
import { logger } from './logger.js';
import { initMetricsOnce, registry } from './metrics/index.js';

async function main() {
  const metrics = initMetricsOnce();
  const { engine } = createEngineFromConfig(metrics);
  const httpServer = createServer(createApp(engine, registry));

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    httpServer.close();
    await engine.shutdown();
    process.exit(0);
  };
  ['SIGINT', 'SIGTERM'].forEach(sig => process.on(sig, () => {
    shutdown(sig).catch(err => {
      logger.error('[shutdown] Failed', { error: err });
      process.exit(1);
    });
  }));

  httpServer.listen(config.port, () => {
    logger.info(`DSC engine listening on port ${config.port}`);
    logger.info(`Build info: commit=${buildInfo.commit} node=${buildInfo.node} started=${buildInfo.startedAt}`);
    logger.info(`[config] collateral=${engine.getCollateralTokens().join(',') || '(none)'} oracle=${config.priceOracleMode}`);
  });
}

main().catch(err => {
  logger.error('Fatal', { error: err });
  process.exit(1);
});
