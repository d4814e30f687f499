// Integration tests for the HTTP API
import { describe, it, expect, beforeEach } from 'vitest';
import type express from 'express';
import jwt from 'jsonwebtoken';
import { Registry } from 'prom-client';
import request from 'supertest';

import { createApp } from '../../src/app.js';
import { config } from '../../src/config/index.js';
import { createEngineMetrics } from '../../src/metrics/engine.js';
import { E18, ETH_USD_FEED, LIQUIDATOR, USER, WETH, createHarness, type Harness } from '../helpers/engineHarness.js';

function bearer(address: string): string {
  return `Bearer ${jwt.sign({ address }, config.jwtSecret)}`;
}

describe('API Integration Tests', () => {
  let h: Harness;
  let app: express.Express;

  beforeEach(() => {
    const registry = new Registry();
    h = createHarness({ metrics: createEngineMetrics(registry) });
    app = createApp(h.engine, registry);
  });

  describe('authentication', () => {
    it('should return health status with valid API key', async () => {
      const response = await request(app).get('/api/v1/health').set('x-api-key', config.apiKey).expect(200);

      expect(response.body.status).toBe('ok');
      expect(response.body.service).toBe('dsc-engine-api');
    });

    it('should reject requests without authentication', async () => {
      const response = await request(app).get('/api/v1/health').expect(401);
      expect(response.body).toEqual({ error: 'Authentication required' });
    });

    it('should reject a token signed with another secret', async () => {
      const forged = jwt.sign({ address: USER }, 'another-test-secret');
      const response = await request(app)
        .get('/api/v1/health')
        .set('Authorization', `Bearer ${forged}`)
        .expect(401);
      expect(response.body).toEqual({ error: 'Invalid token' });
    });

    it('should require a caller identity on mutating routes', async () => {
      const response = await request(app)
        .post('/api/v1/collateral/deposit')
        .set('x-api-key', config.apiKey)
        .send({ asset: WETH, amount: '1' })
        .expect(403);
      expect(response.body.error).toBe('A bearer token identifying the caller is required');
    });
  });

  describe('read views', () => {
    it('should describe the engine configuration', async () => {
      const response = await request(app).get('/api/v1/engine').set('x-api-key', config.apiKey).expect(200);

      expect(response.body.collateralTokens[0]).toEqual({ token: WETH, priceFeed: ETH_USD_FEED });
      expect(response.body.liquidationThreshold).toBe('50');
      expect(response.body.minHealthFactor).toBe('1000000000000000000');
      expect(response.body.totals.totalDebt).toBe('0');
    });

    it('should value an asset amount in USD', async () => {
      const response = await request(app)
        .get(`/api/v1/assets/${WETH}/usd-value`)
        .query({ amount: (15n * E18).toString() })
        .set('x-api-key', config.apiKey)
        .expect(200);

      expect(response.body.usdValue).toBe('30000000000000000000000');
    });

    it('should convert USD to an asset amount', async () => {
      const response = await request(app)
        .get(`/api/v1/assets/${WETH}/token-amount`)
        .query({ usd: (100n * E18).toString() })
        .set('x-api-key', config.apiKey)
        .expect(200);

      expect(response.body.tokenAmount).toBe('50000000000000000');
    });

    it('should quote a liquidation at current prices', async () => {
      const response = await request(app)
        .get(`/api/v1/assets/${WETH}/liquidation-quote`)
        .query({ debtToCover: (100n * E18).toString() })
        .set('x-api-key', config.apiKey)
        .expect(200);

      expect(response.body).toEqual({
        asset: WETH,
        debtToCover: '100000000000000000000',
        tokenAmountFromDebtCovered: '50000000000000000',
        bonusCollateral: '5000000000000000',
        totalCollateralToRedeem: '55000000000000000'
      });
    });

    it('should compute what-if health factors', async () => {
      const response = await request(app)
        .post('/api/v1/health-factor')
        .set('x-api-key', config.apiKey)
        .send({ debt: (100n * E18).toString(), collateralUsd: (20000n * E18).toString() })
        .expect(200);
      expect(response.body.healthFactor).toBe('100000000000000000000');

      const noDebt = await request(app)
        .post('/api/v1/health-factor')
        .set('x-api-key', config.apiKey)
        .send({ debt: '0', collateralUsd: '0' })
        .expect(200);
      expect(noDebt.body.healthFactor).toBe('max');
    });

    it('should reject malformed input with 400', async () => {
      const response = await request(app)
        .get('/api/v1/accounts/alice')
        .set('x-api-key', config.apiKey)
        .expect(400);

      expect(response.body.error).toBe('ValidationError');
      expect(response.body.details).toEqual([': must be a 20-byte hex address']);
    });

    it('should map engine rejections to 422', async () => {
      const response = await request(app)
        .get('/api/v1/assets/0x000000000000000000000000000000000000dead/usd-value')
        .query({ amount: '1' })
        .set('x-api-key', config.apiKey)
        .expect(422);

      expect(response.body.error).toBe('TokenNotAllowed');
    });
  });

  describe('operations', () => {
    it('should deposit and mint for the token holder', async () => {
      const response = await request(app)
        .post('/api/v1/collateral/deposit-and-mint')
        .set('Authorization', bearer(USER))
        .send({ asset: WETH, amountCollateral: (10n * E18).toString(), amountDscToMint: (100n * E18).toString() })
        .expect(200);

      expect(response.body).toEqual({
        status: 'committed',
        account: {
          user: USER,
          totalDscMinted: '100000000000000000000',
          collateralValueInUsd: '20000000000000000000000',
          healthFactor: '100000000000000000000',
          collateral: { [WETH]: '10000000000000000000', '0x000000000000000000000000000000000000aa02': '0' }
        }
      });
      expect(h.dsc.balanceOf(USER)).toBe(100n * E18);
    });

    it('should report a broken health factor with its value', async () => {
      await request(app)
        .post('/api/v1/collateral/deposit')
        .set('Authorization', bearer(USER))
        .send({ asset: WETH, amount: (10n * E18).toString() })
        .expect(200);

      const response = await request(app)
        .post('/api/v1/dsc/mint')
        .set('Authorization', bearer(USER))
        .send({ amount: (20000n * E18).toString() })
        .expect(422);

      expect(response.body.error).toBe('BreakHealthFactor');
      expect(response.body.healthFactor).toBe('500000000000000000');
    });

    it('should reject zero amounts', async () => {
      const response = await request(app)
        .post('/api/v1/dsc/mint')
        .set('Authorization', bearer(USER))
        .send({ amount: '0' })
        .expect(422);

      expect(response.body.error).toBe('NeedsMoreThanZero');
    });

    it('should liquidate an undercollateralized account', async () => {
      await h.engine.depositCollateralAndMintDsc(USER, WETH, 10n * E18, 100n * E18);
      h.custody.fund(WETH, LIQUIDATOR, 20n * E18);
      await h.engine.depositCollateralAndMintDsc(LIQUIDATOR, WETH, 20n * E18, 100n * E18);
      h.oracle.updateAnswer(ETH_USD_FEED, 18n * 10n ** 8n);

      const response = await request(app)
        .post('/api/v1/liquidations')
        .set('Authorization', bearer(LIQUIDATOR))
        .send({ asset: WETH, user: USER, debtToCover: (100n * E18).toString() })
        .expect(200);

      expect(response.body.totalCollateralToRedeem).toBe('6111111111111111110');
      expect(response.body.startingHealthFactor).toBe('900000000000000000');
      expect(response.body.endingHealthFactor).toBe('max');
    });
  });

  describe('GET /metrics', () => {
    it('should expose engine metrics', async () => {
      await h.engine.depositCollateral(USER, WETH, E18);

      const response = await request(app).get('/metrics').expect(200);
      expect(response.text).toContain('# HELP dsc_engine_operations_total Mutating engine operations by outcome');
    });
  });
});
