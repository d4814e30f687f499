// API routes: read views and caller-authenticated operations over a DscEngine
import { Router, type Request, type Response } from 'express';
import { z, ZodError } from 'zod';

import { BreakHealthFactorError, isDscEngineError } from '../engine/errors.js';
import { MAX_HEALTH_FACTOR } from '../engine/constants.js';
import { requireCaller, type AuthRequest } from '../middleware/auth.js';
import { logger } from '../logger.js';
import { isHexAddress } from '../utils/Address.js';
import type { DscEngine } from '../engine/DscEngine.js';

const address = z.string().refine(isHexAddress, 'must be a 20-byte hex address');
const amount = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer string')
  .transform(value => BigInt(value));

const collateralBody = z.object({ asset: address, amount });
const amountBody = z.object({ amount });
const depositAndMintBody = z.object({ asset: address, amountCollateral: amount, amountDscToMint: amount });
const redeemForDscBody = z.object({ asset: address, amountCollateral: amount, amountDscToBurn: amount });
const liquidationBody = z.object({ asset: address, user: address, debtToCover: amount });
const healthFactorBody = z.object({ debt: amount, collateralUsd: amount });

function stringify(values: Record<string, bigint>): Record<string, string> {
  return Object.fromEntries(Object.entries(values).map(([key, value]) => [key, value.toString()]));
}

function renderHealthFactor(healthFactor: bigint): string {
  return healthFactor === MAX_HEALTH_FACTOR ? 'max' : healthFactor.toString();
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'ValidationError',
      details: err.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
    return;
  }
  if (err instanceof BreakHealthFactorError) {
    res.status(422).json({ error: err.code, message: err.message, healthFactor: err.healthFactor.toString() });
    return;
  }
  if (isDscEngineError(err)) {
    res.status(422).json({ error: err.code, message: err.message });
    return;
  }
  logger.error('[api] Unhandled error', { error: err });
  res.status(500).json({ error: 'InternalError' });
}

/**
 * Express 4 does not await handlers; route failures through sendError
 */
function handle(fn: (req: AuthRequest, res: Response) => Promise<void>) {
  return (req: Request, res: Response) => {
    fn(req, res).catch(err => sendError(res, err));
  };
}

function callerOf(req: AuthRequest): string {
  if (!req.user) {
    // requireCaller runs first on every mutating route
    throw new Error('Caller missing on authenticated route');
  }
  return req.user.address;
}

export default function buildRoutes(engine: DscEngine) {
  const router = Router();

  // Positions and account information are both read before the first await
  async function accountSnapshot(user: string) {
    const collateral = engine.getCollateralPositions(user);
    const info = await engine.getAccountInformation(user);
    const healthFactor = engine.calculateHealthFactor(info.totalDscMinted, info.collateralValueInUsd);
    return {
      user,
      totalDscMinted: info.totalDscMinted.toString(),
      collateralValueInUsd: info.collateralValueInUsd.toString(),
      healthFactor: renderHealthFactor(healthFactor),
      collateral: stringify(collateral)
    };
  }

  /**
   * GET /health - Health check endpoint
   */
  router.get('/health', (_req, res) => {
    res.json({
      status: engine.isClosed() ? 'closed' : 'ok',
      timestamp: new Date().toISOString(),
      service: 'dsc-engine-api'
    });
  });

  /**
   * GET /engine - Configuration, constants and system totals
   */
  router.get('/engine', (_req, res) => {
    const totals = engine.getSystemTotals();
    res.json({
      dsc: engine.getDsc(),
      collateralTokens: engine.getCollateralTokens().map(token => ({
        token,
        priceFeed: engine.getCollateralTokenPriceFeed(token) ?? null
      })),
      precision: engine.getPrecision().toString(),
      additionalFeedPrecision: engine.getAdditionalFeedPrecision().toString(),
      liquidationThreshold: engine.getLiquidationThreshold().toString(),
      liquidationBonus: engine.getLiquidationBonus().toString(),
      liquidationPrecision: engine.getLiquidationPrecision().toString(),
      minHealthFactor: engine.getMinHealthFactor().toString(),
      totals: {
        totalDebt: totals.totalDebt.toString(),
        collateral: stringify(totals.collateral)
      }
    });
  });

  router.get('/accounts/:user', handle(async (req, res) => {
    const user = address.parse(req.params.user);
    res.json(await accountSnapshot(user));
  }));

  router.get('/assets/:asset/usd-value', handle(async (req, res) => {
    const asset = address.parse(req.params.asset);
    const query = z.object({ amount }).parse(req.query);
    const usdValue = await engine.getUsdValue(asset, query.amount);
    res.json({ asset, amount: query.amount.toString(), usdValue: usdValue.toString() });
  }));

  router.get('/assets/:asset/token-amount', handle(async (req, res) => {
    const asset = address.parse(req.params.asset);
    const query = z.object({ usd: amount }).parse(req.query);
    const tokenAmount = await engine.getTokenAmountFromUsd(asset, query.usd);
    res.json({ asset, usd: query.usd.toString(), tokenAmount: tokenAmount.toString() });
  }));

  router.get('/assets/:asset/liquidation-quote', handle(async (req, res) => {
    const asset = address.parse(req.params.asset);
    const query = z.object({ debtToCover: amount }).parse(req.query);
    const quote = await engine.previewLiquidation(asset, query.debtToCover);
    res.json({ asset, debtToCover: query.debtToCover.toString(), ...stringify({ ...quote }) });
  }));

  /**
   * POST /health-factor - What-if calculation, no state involved
   */
  router.post('/health-factor', handle(async (req, res) => {
    const body = healthFactorBody.parse(req.body);
    res.json({ healthFactor: renderHealthFactor(engine.calculateHealthFactor(body.debt, body.collateralUsd)) });
  }));

  router.post('/collateral/deposit', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = collateralBody.parse(req.body);
    await engine.depositCollateral(caller, body.asset, body.amount);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/collateral/redeem', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = collateralBody.parse(req.body);
    await engine.redeemCollateral(caller, body.asset, body.amount);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/collateral/deposit-and-mint', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = depositAndMintBody.parse(req.body);
    await engine.depositCollateralAndMintDsc(caller, body.asset, body.amountCollateral, body.amountDscToMint);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/collateral/redeem-for-dsc', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = redeemForDscBody.parse(req.body);
    await engine.redeemCollateralForDsc(caller, body.asset, body.amountCollateral, body.amountDscToBurn);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/dsc/mint', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = amountBody.parse(req.body);
    await engine.mintDsc(caller, body.amount);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/dsc/burn', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = amountBody.parse(req.body);
    await engine.burnDsc(caller, body.amount);
    res.json({ status: 'committed', account: await accountSnapshot(caller) });
  }));

  router.post('/liquidations', requireCaller, handle(async (req, res) => {
    const caller = callerOf(req);
    const body = liquidationBody.parse(req.body);
    const result = await engine.liquidate(caller, body.asset, body.user, body.debtToCover);
    res.json({
      status: 'committed',
      user: result.user,
      liquidator: result.liquidator,
      collateral: result.collateral,
      ...stringify({
        debtCovered: result.debtCovered,
        tokenAmountFromDebtCovered: result.tokenAmountFromDebtCovered,
        bonusCollateral: result.bonusCollateral,
        totalCollateralToRedeem: result.totalCollateralToRedeem,
        startingHealthFactor: result.startingHealthFactor
      }),
      endingHealthFactor: renderHealthFactor(result.endingHealthFactor)
    });
  }));

  return router;
}
