// Collaborator contracts and event payloads for the engine
import type { Logger } from 'winston';

import type { EngineMetrics } from '../metrics/engine.js';

/**
 * Synthetic-dollar token. The engine is its owner: only the engine mints, and
 * `burn` destroys tokens the engine itself holds.
 */
export interface StableCoin {
  readonly address: string;
  mint(to: string, amount: bigint): Promise<boolean>;
  transferFrom(from: string, to: string, amount: bigint): Promise<boolean>;
  /** Throws when the engine's balance cannot cover the burn */
  burn(amount: bigint): Promise<void>;
}

/**
 * Latest USD price for one whole unit of an asset, 8 decimals, keyed by feed id.
 * No staleness or consensus handling here; the engine trusts the answer.
 */
export interface PriceOracle {
  latestPrice(feed: string): Promise<bigint>;
}

/**
 * Opaque custody primitive for collateral assets. `transfer` moves assets out
 * of the engine's custody.
 */
export interface AssetCustody {
  transferFrom(asset: string, from: string, to: string, amount: bigint): Promise<boolean>;
  transfer(asset: string, to: string, amount: bigint): Promise<boolean>;
}

export interface DscEngineOptions {
  /** Allow-listed collateral assets, matched by index with `priceFeedAddresses` */
  tokenAddresses: readonly string[];
  priceFeedAddresses: readonly string[];
  /** Identity the engine uses as counterparty in custody and token transfers */
  engineAddress: string;
  dsc: StableCoin;
  oracle: PriceOracle;
  custody: AssetCustody;
  logger?: Logger;
  metrics?: EngineMetrics;
}

export interface AccountInformation {
  totalDscMinted: bigint;
  collateralValueInUsd: bigint;
}

export interface SystemTotals {
  totalDebt: bigint;
  collateral: Record<string, bigint>;
}

export interface CollateralDepositedEvent {
  user: string;
  token: string;
  amount: bigint;
}

/** `redeemedTo` differs from `redeemedFrom` when collateral is seized in a liquidation */
export interface CollateralRedeemedEvent {
  redeemedFrom: string;
  redeemedTo: string;
  token: string;
  amount: bigint;
}

export type EngineEvent =
  | { name: 'CollateralDeposited'; payload: CollateralDepositedEvent }
  | { name: 'CollateralRedeemed'; payload: CollateralRedeemedEvent };

export type MutatingOperation =
  | 'depositCollateral'
  | 'mintDsc'
  | 'depositCollateralAndMintDsc'
  | 'redeemCollateral'
  | 'burnDsc'
  | 'redeemCollateralForDsc'
  | 'liquidate';
