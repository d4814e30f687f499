// Unit tests for the typed environment
import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';

import { buildEnv } from '../../src/config/envSchema.js';

const base = { API_KEY: 'test-api-key', JWT_SECRET: 'test-jwt-secret' };

describe('buildEnv', () => {
  it('should apply defaults', () => {
    const env = buildEnv(base);

    expect(env.port).toBe(3000);
    expect(env.nodeEnv).toBe('development');
    expect(env.logLevel).toBe('info');
    expect(env.logFileEnabled).toBe(false);
    expect(env.addressNormalizeLowercase).toBe(true);
    expect(env.priceOracleMode).toBe('static');
    expect(env.collateralTokens).toEqual([]);
    expect(env.priceFeeds).toEqual([]);
    expect(env.engineAddress).toBe('0x00000000000000000000000000000000000e0001');
  });

  it('should parse engine wiring lists in order', () => {
    const env = buildEnv({
      ...base,
      COLLATERAL_TOKENS: '0xaa01, 0xaa02',
      PRICE_FEEDS: '0xfe01,0xfe02',
      STATIC_PRICES: '200000000000,100000000000'
    });

    expect(env.collateralTokens).toEqual(['0xaa01', '0xaa02']);
    expect(env.priceFeeds).toEqual(['0xfe01', '0xfe02']);
    expect(env.staticPrices).toEqual([200000000000n, 100000000000n]);
  });

  it('should parse opening custody balances', () => {
    expect(buildEnv(base).initialCollateralBalances).toEqual([]);

    const env = buildEnv({ ...base, INITIAL_COLLATERAL_BALANCES: '0xaa01:0xa11c:10000000000000000000' });
    expect(env.initialCollateralBalances).toEqual([
      { asset: '0xaa01', holder: '0xa11c', amount: 10000000000000000000n }
    ]);
  });

  it('should require one static price per feed', () => {
    expect(() => buildEnv({ ...base, PRICE_FEEDS: '0xfe01,0xfe02', STATIC_PRICES: '200000000000' })).toThrow(
      'STATIC_PRICES must list one price per feed (feeds=2, prices=1)'
    );
  });

  it('should require RPC_URL in chainlink mode', () => {
    expect(() => buildEnv({ ...base, PRICE_ORACLE_MODE: 'chainlink' })).toThrow(
      'RPC_URL required when PRICE_ORACLE_MODE=chainlink'
    );

    const env = buildEnv({ ...base, PRICE_ORACLE_MODE: 'chainlink', RPC_URL: 'http://127.0.0.1:8545' });
    expect(env.rpcUrl).toBe('http://127.0.0.1:8545');
  });

  it('should reject missing or weak secrets', () => {
    expect(() => buildEnv({ JWT_SECRET: 'test-jwt-secret' })).toThrow(ZodError);
    expect(() => buildEnv({ API_KEY: 'test-api-key', JWT_SECRET: 'short' })).toThrow(ZodError);
  });

  it('should fall back on unknown log levels', () => {
    expect(buildEnv({ ...base, LOG_LEVEL: 'loud' }).logLevel).toBe('info');
    expect(buildEnv({ ...base, LOG_LEVEL: 'DEBUG' }).logLevel).toBe('debug');
  });
});
