import { z } from 'zod';

import {
  parseAllocationListEnv,
  parseBigIntListEnv,
  parseBoolEnv,
  parseEnumEnv,
  parseIntEnv,
  parseListEnv
} from './parseEnv.js';

const isTest = (process.env.NODE_ENV || '').toLowerCase() === 'test';

// Inject test defaults BEFORE schema parsing so Zod doesn't throw for test runs.
if (isTest) {
  if (!process.env.API_KEY) process.env.API_KEY = 'test-api-key';
  if (!process.env.JWT_SECRET) process.env.JWT_SECRET = 'test-jwt-secret';
}

export const PRICE_ORACLE_MODES = ['static', 'chainlink'] as const;
export type PriceOracleMode = (typeof PRICE_ORACLE_MODES)[number];

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const rawEnvSchema = z.object({
  PORT: z.string().optional(),
  NODE_ENV: z.string().optional(),

  API_KEY: z.string().min(3, 'API_KEY required'),
  JWT_SECRET: z.string().min(8, 'JWT_SECRET too short'),

  // Logging
  LOG_LEVEL: z.string().optional(),
  LOG_FILE_ENABLED: z.string().optional(),
  LOG_FILE_RETENTION_HOURS: z.string().optional(),

  // API rate limiting
  RATE_LIMIT_WINDOW_MS: z.string().optional(),
  RATE_LIMIT_MAX_REQUESTS: z.string().optional(),

  ADDRESS_NORMALIZE_LOWERCASE: z.string().optional(),

  // Engine wiring
  ENGINE_ADDRESS: z.string().optional(),
  DSC_ADDRESS: z.string().optional(),
  COLLATERAL_TOKENS: z.string().optional(),
  PRICE_FEEDS: z.string().optional(),
  // Opening balances for the in-process custody: asset:holder:amount,...
  INITIAL_COLLATERAL_BALANCES: z.string().optional(),

  // Price oracle
  PRICE_ORACLE_MODE: z.string().optional(),
  STATIC_PRICES: z.string().optional(),
  RPC_URL: z.string().url().optional()
});

export type RawEnv = z.infer<typeof rawEnvSchema>;

/**
 * Derive the typed environment from raw variables.
 * Exported separately so tests can validate alternative inputs without touching process.env.
 */
export function buildEnv(source: NodeJS.ProcessEnv) {
  const parsed = rawEnvSchema.parse(source);

  const priceOracleMode = parseEnumEnv<PriceOracleMode>(parsed.PRICE_ORACLE_MODE, PRICE_ORACLE_MODES, 'static');
  const collateralTokens = parseListEnv(parsed.COLLATERAL_TOKENS);
  const priceFeeds = parseListEnv(parsed.PRICE_FEEDS);
  const staticPrices = parseBigIntListEnv(parsed.STATIC_PRICES);

  if (priceOracleMode === 'chainlink' && !parsed.RPC_URL) {
    throw new Error('RPC_URL required when PRICE_ORACLE_MODE=chainlink');
  }
  if (priceOracleMode === 'static' && staticPrices.length !== priceFeeds.length) {
    throw new Error(
      `STATIC_PRICES must list one price per feed (feeds=${priceFeeds.length}, prices=${staticPrices.length})`
    );
  }

  return {
    port: parseIntEnv(parsed.PORT, 3000, 1, 65535),
    nodeEnv: parsed.NODE_ENV || 'development',
    apiKey: parsed.API_KEY,
    jwtSecret: parsed.JWT_SECRET,

    logLevel: parseEnumEnv<LogLevel>(parsed.LOG_LEVEL, LOG_LEVELS, 'info'),
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parseIntEnv(parsed.LOG_FILE_RETENTION_HOURS, 8, 1),

    rateLimitWindowMs: parseIntEnv(parsed.RATE_LIMIT_WINDOW_MS, 60000, 1000),
    rateLimitMaxRequests: parseIntEnv(parsed.RATE_LIMIT_MAX_REQUESTS, 120, 1),

    addressNormalizeLowercase: parseBoolEnv(parsed.ADDRESS_NORMALIZE_LOWERCASE, true),

    engineAddress: parsed.ENGINE_ADDRESS || '0x00000000000000000000000000000000000e0001',
    dscAddress: parsed.DSC_ADDRESS || '0x00000000000000000000000000000000000d5c01',
    collateralTokens,
    priceFeeds,
    initialCollateralBalances: parseAllocationListEnv(parsed.INITIAL_COLLATERAL_BALANCES),

    priceOracleMode,
    staticPrices,
    rpcUrl: parsed.RPC_URL
  };
}

export type Env = ReturnType<typeof buildEnv>;

export const env: Env = buildEnv(process.env);
