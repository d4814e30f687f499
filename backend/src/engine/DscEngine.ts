/**
 * DscEngine: collateral and debt accounting for the synthetic dollar.
 *
 * Users deposit allow-listed collateral, mint debt against it while keeping a
 * 200% collateralization margin, burn debt and redeem collateral. Anyone may
 * liquidate a position whose health factor fell below 1e18.
 *
 * Every mutating entry point is one atomic unit of work:
 *   validate -> lock -> stage ledger effects -> health checks -> call-outs -> commit
 * Any failure rolls the stage back and reverses the call-outs that already
 * went through, so callers never see partial state. Events are only
 * published for committed operations, once the lock is released.
 */

import EventEmitter from 'events';

import type { Logger } from 'winston';

import { logger as defaultLogger } from '../logger.js';
import { normalizeAddress, normalizeAddresses } from '../utils/Address.js';
import { formatHealthFactor, formatWad } from '../utils/usdMath.js';
import { AccountValuator } from './AccountValuator.js';
import { CollateralLedger } from './CollateralLedger.js';
import {
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION
} from './constants.js';
import { DscEngineError, isDscEngineError } from './errors.js';
import { calculateHealthFactor } from './healthFactor.js';
import { LedgerTransaction } from './LedgerTransaction.js';
import { LiquidationEngine, type LiquidationResult, type SeizureQuote } from './LiquidationEngine.js';
import { OperationGuard } from './OperationGuard.js';
import {
  stageBurnDsc,
  stageDepositCollateral,
  stageMintDsc,
  stageRedeemCollateral,
  type EffectContext
} from './positionEffects.js';
import { PriceOracleAdapter } from './PriceOracleAdapter.js';
import type { EngineMetrics } from '../metrics/engine.js';
import type {
  AccountInformation,
  DscEngineOptions,
  EngineEvent,
  MutatingOperation,
  StableCoin,
  SystemTotals
} from './types.js';

export class DscEngine extends EventEmitter {
  private readonly ledger = new CollateralLedger();
  private readonly collateralTokens: readonly string[];
  private readonly priceFeeds: ReadonlyMap<string, string>;
  private readonly guard: OperationGuard;
  private readonly prices: PriceOracleAdapter;
  private readonly valuator: AccountValuator;
  private readonly liquidations: LiquidationEngine;
  private readonly effects: EffectContext;
  private readonly dsc: StableCoin;
  private readonly logger: Logger;
  private readonly metrics?: EngineMetrics;
  private closed = false;

  constructor(options: DscEngineOptions) {
    super();

    if (options.tokenAddresses.length !== options.priceFeedAddresses.length) {
      throw new DscEngineError(
        'TokenAddressesAndPriceFeedsMustBeSameLength',
        `Got ${options.tokenAddresses.length} token addresses and ${options.priceFeedAddresses.length} price feeds`
      );
    }

    const tokens = normalizeAddresses(options.tokenAddresses);
    const feeds = new Map<string, string>();
    const seen = new Set<string>();
    tokens.forEach((token, i) => {
      if (seen.has(token)) {
        throw new Error(`Collateral token ${token} listed more than once`);
      }
      seen.add(token);
      // An empty binding leaves the token listed but not allowed
      const feed = normalizeAddress(options.priceFeedAddresses[i] ?? '');
      if (feed) {
        feeds.set(token, feed);
      }
    });

    this.collateralTokens = tokens;
    this.priceFeeds = feeds;
    this.dsc = options.dsc;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics;

    this.guard = new OperationGuard(asset => this.priceFeeds.has(asset));
    this.prices = new PriceOracleAdapter(options.oracle, asset => this.priceFeeds.get(asset));
    this.valuator = new AccountValuator(this.prices, this.collateralTokens);
    this.effects = {
      engineAddress: normalizeAddress(options.engineAddress),
      dsc: options.dsc,
      custody: options.custody
    };
    this.liquidations = new LiquidationEngine(this.prices, this.valuator, this.effects);

    this.logger.info(`[engine] Initialized with ${tokens.length} collateral token(s), dsc=${options.dsc.address}`);
  }

  // ---------------------------------------------------------------------------
  // Mutating entry points
  // ---------------------------------------------------------------------------

  async depositCollateral(caller: string, tokenCollateralAddress: string, amountCollateral: bigint): Promise<void> {
    const user = normalizeAddress(caller);
    const asset = normalizeAddress(tokenCollateralAddress);
    this.guard.requireMoreThanZero(amountCollateral, 'amountCollateral');
    this.guard.requireAllowedToken(asset);

    await this.execute('depositCollateral', async tx => {
      stageDepositCollateral(tx, this.effects, asset, amountCollateral, user);
    });
  }

  async mintDsc(caller: string, amountDscToMint: bigint): Promise<void> {
    const user = normalizeAddress(caller);
    this.guard.requireMoreThanZero(amountDscToMint, 'amountDscToMint');

    await this.execute('mintDsc', async tx => {
      stageMintDsc(tx, this.effects, amountDscToMint, user);
      await this.valuator.requireHealthy(tx, user);
    });
  }

  async depositCollateralAndMintDsc(
    caller: string,
    tokenCollateralAddress: string,
    amountCollateral: bigint,
    amountDscToMint: bigint
  ): Promise<void> {
    const user = normalizeAddress(caller);
    const asset = normalizeAddress(tokenCollateralAddress);
    this.guard.requireMoreThanZero(amountCollateral, 'amountCollateral');
    this.guard.requireAllowedToken(asset);
    this.guard.requireMoreThanZero(amountDscToMint, 'amountDscToMint');

    await this.execute('depositCollateralAndMintDsc', async tx => {
      stageDepositCollateral(tx, this.effects, asset, amountCollateral, user);
      stageMintDsc(tx, this.effects, amountDscToMint, user);
      await this.valuator.requireHealthy(tx, user);
    });
  }

  async redeemCollateral(caller: string, tokenCollateralAddress: string, amountCollateral: bigint): Promise<void> {
    const user = normalizeAddress(caller);
    const asset = normalizeAddress(tokenCollateralAddress);
    this.guard.requireMoreThanZero(amountCollateral, 'amountCollateral');
    this.guard.requireAllowedToken(asset);

    await this.execute('redeemCollateral', async tx => {
      stageRedeemCollateral(tx, this.effects, asset, amountCollateral, user, user);
      await this.valuator.requireHealthy(tx, user);
    });
  }

  async burnDsc(caller: string, amount: bigint): Promise<void> {
    const user = normalizeAddress(caller);
    this.guard.requireMoreThanZero(amount, 'amount');

    await this.execute('burnDsc', async tx => {
      stageBurnDsc(tx, this.effects, amount, user, user);
      // Burning only improves health; re-checked all the same
      await this.valuator.requireHealthy(tx, user);
    });
  }

  async redeemCollateralForDsc(
    caller: string,
    tokenCollateralAddress: string,
    amountCollateral: bigint,
    amountDscToBurn: bigint
  ): Promise<void> {
    const user = normalizeAddress(caller);
    const asset = normalizeAddress(tokenCollateralAddress);
    this.guard.requireMoreThanZero(amountCollateral, 'amountCollateral');
    this.guard.requireAllowedToken(asset);
    this.guard.requireMoreThanZero(amountDscToBurn, 'amountDscToBurn');

    await this.execute('redeemCollateralForDsc', async tx => {
      stageBurnDsc(tx, this.effects, amountDscToBurn, user, user);
      stageRedeemCollateral(tx, this.effects, asset, amountCollateral, user, user);
      await this.valuator.requireHealthy(tx, user);
    });
  }

  /**
   * Cover `debtToCover` of `targetUser`'s debt with the caller's tokens and
   * receive the equivalent collateral plus a 10% bonus.
   */
  async liquidate(
    caller: string,
    tokenCollateralAddress: string,
    targetUser: string,
    debtToCover: bigint
  ): Promise<LiquidationResult> {
    const liquidator = normalizeAddress(caller);
    const asset = normalizeAddress(tokenCollateralAddress);
    const user = normalizeAddress(targetUser);
    this.guard.requireMoreThanZero(debtToCover, 'debtToCover');
    this.guard.requireAllowedToken(asset);

    const result = await this.execute('liquidate', tx =>
      this.liquidations.liquidate(tx, asset, user, liquidator, debtToCover)
    );

    this.metrics?.liquidationsTotal.inc({ collateral: asset });
    this.logger.info(`[engine] Liquidated ${user}`, {
      liquidator,
      collateral: asset,
      debtCovered: formatWad(result.debtCovered),
      collateralSeized: formatWad(result.totalCollateralToRedeem),
      healthFactorBefore: formatHealthFactor(result.startingHealthFactor),
      healthFactorAfter: formatHealthFactor(result.endingHealthFactor)
    });
    return result;
  }

  // ---------------------------------------------------------------------------
  // Read-only views (committed state only)
  // ---------------------------------------------------------------------------

  getAccountInformation(user: string): Promise<AccountInformation> {
    return this.valuator.accountInformation(this.ledger, normalizeAddress(user));
  }

  getAccountCollateralValue(user: string): Promise<bigint> {
    return this.valuator.collateralValueInUsd(this.ledger, normalizeAddress(user));
  }

  getUserHealthFactor(user: string): Promise<bigint> {
    return this.valuator.healthFactor(this.ledger, normalizeAddress(user));
  }

  getHealthFactor(user: string): Promise<bigint> {
    return this.getUserHealthFactor(user);
  }

  /** Pure what-if calculation; touches no state */
  calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  getUsdValue(token: string, amount: bigint): Promise<bigint> {
    return this.prices.usdValue(normalizeAddress(token), amount);
  }

  getTokenAmountFromUsd(token: string, usdAmountInWei: bigint): Promise<bigint> {
    return this.prices.amountFromUsd(normalizeAddress(token), usdAmountInWei);
  }

  previewLiquidation(token: string, debtToCover: bigint): Promise<SeizureQuote> {
    return this.liquidations.previewSeizure(normalizeAddress(token), debtToCover);
  }

  getCollateralTokenAmount(token: string, user: string): bigint {
    return this.ledger.getCollateral(normalizeAddress(user), normalizeAddress(token));
  }

  getCollateralBalanceOfUser(user: string, token: string): bigint {
    return this.getCollateralTokenAmount(token, user);
  }

  /** Every allow-listed asset with the user's balance, zero included */
  getCollateralPositions(user: string): Record<string, bigint> {
    const key = normalizeAddress(user);
    const positions: Record<string, bigint> = {};
    for (const token of this.collateralTokens) {
      positions[token] = this.ledger.getCollateral(key, token);
    }
    return positions;
  }

  getDscMinted(user: string): bigint {
    return this.ledger.getDebt(normalizeAddress(user));
  }

  getCollateralTokens(): readonly string[] {
    return this.collateralTokens;
  }

  getCollateralTokenPriceFeed(token: string): string | undefined {
    return this.priceFeeds.get(normalizeAddress(token));
  }

  isAllowedToken(token: string): boolean {
    return this.priceFeeds.has(normalizeAddress(token));
  }

  getDsc(): string {
    return this.dsc.address;
  }

  getSystemTotals(): SystemTotals {
    const collateral: Record<string, bigint> = {};
    for (const token of this.collateralTokens) {
      collateral[token] = this.ledger.totalCollateral(token);
    }
    return { totalDebt: this.ledger.totalDebt(), collateral };
  }

  getPrecision(): bigint { return PRECISION; }
  getAdditionalFeedPrecision(): bigint { return ADDITIONAL_FEED_PRECISION; }
  getLiquidationThreshold(): bigint { return LIQUIDATION_THRESHOLD; }
  getLiquidationBonus(): bigint { return LIQUIDATION_BONUS; }
  getLiquidationPrecision(): bigint { return LIQUIDATION_PRECISION; }
  getMinHealthFactor(): bigint { return MIN_HEALTH_FACTOR; }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Stop accepting mutating calls, wait for queued ones to finish and detach listeners.
   */
  async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.guard.drain();
    this.removeAllListeners();
    this.logger.info(`[engine] Shut down (${this.ledger.accountCount()} accounts on ledger)`);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async execute<T>(operation: MutatingOperation, body: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new DscEngineError('EngineClosed', `${operation} rejected: engine is shut down`);
    }

    const { result, events } = await this.guard.nonReentrant(operation, async frame => {
      const endTimer = this.metrics?.operationDurationSeconds.startTimer({ operation });
      const tx = new LedgerTransaction(this.ledger);

      try {
        const result = await body(tx);
        // Oracle reads inside `body` are call-outs as well
        this.guard.assertNotReentered(frame);
        await tx.settle({
          afterCallout: () => this.guard.assertNotReentered(frame),
          onCompensationFailed: (callout, err) => {
            this.metrics?.compensationFailuresTotal.inc({ operation });
            this.logger.error(`[engine] ${operation} could not reverse ${callout.description}`, {
              error: err instanceof Error ? err.message : String(err)
            });
          }
        });
        const events = tx.commit();

        this.metrics?.operationsTotal.inc({ operation, outcome: 'committed' });
        this.metrics?.totalDebt.set(Number(this.ledger.totalDebt() / PRECISION));
        this.logger.debug(`[engine] ${operation} committed`, { events: events.length });

        return { result, events };
      } catch (err) {
        tx.rollback();
        const outcome = isDscEngineError(err) ? err.code : 'error';
        this.metrics?.operationsTotal.inc({ operation, outcome });
        this.logger.warn(`[engine] ${operation} rejected`, {
          code: outcome,
          error: err instanceof Error ? err.message : String(err)
        });
        throw err;
      } finally {
        endTimer?.();
      }
    });

    // Outside the operation frame, so listeners may call back into the engine
    this.publish(events);
    return result;
  }

  /**
   * Deliver events of a committed operation. A throwing listener cannot undo
   * the commit, so its error is logged rather than returned to the caller.
   */
  private publish(events: EngineEvent[]): void {
    for (const event of events) {
      try {
        this.emit(event.name, event.payload);
      } catch (err) {
        this.logger.error(`[engine] ${event.name} listener failed`, { error: err });
      }
    }
  }
}
