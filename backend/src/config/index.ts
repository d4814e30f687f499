// Load .env before the schema module reads process.env
import 'dotenv/config';

import { env } from './envSchema.js';

export const config = {
  get port() { return env.port; },
  get nodeEnv() { return env.nodeEnv; },
  get isTest() { return env.nodeEnv === 'test'; },

  get apiKey() { return env.apiKey; },
  get jwtSecret() { return env.jwtSecret; },

  // Logging
  get logLevel() { return env.logLevel; },
  get logFileEnabled() { return env.logFileEnabled; },
  get logFileRetentionHours() { return env.logFileRetentionHours; },

  // Rate limiting
  get rateLimitWindowMs() { return env.rateLimitWindowMs; },
  get rateLimitMaxRequests() { return env.rateLimitMaxRequests; },

  get addressNormalizeLowercase() { return env.addressNormalizeLowercase; },

  // Engine wiring
  get engineAddress() { return env.engineAddress; },
  get dscAddress() { return env.dscAddress; },
  get collateralTokens() { return env.collateralTokens; },
  get priceFeeds() { return env.priceFeeds; },
  get initialCollateralBalances() { return env.initialCollateralBalances; },

  // Price oracle
  get priceOracleMode() { return env.priceOracleMode; },
  get staticPrices() { return env.staticPrices; },
  get rpcUrl() { return env.rpcUrl; }
};
