/**
 * HealthFactor: pure solvency math on 1e18 fixed-point integers.
 *
 * HF = (collateralUsd × LIQUIDATION_THRESHOLD / LIQUIDATION_PRECISION) × PRECISION / debt
 *
 * Multiplication happens before each division and every division truncates,
 * so results are reproducible bit for bit.
 */

import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION
} from './constants.js';

/**
 * Health factor for a position. Zero debt is unconditionally healthy and
 * yields MAX_HEALTH_FACTOR.
 */
export function calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
  if (totalDscMinted === 0n) {
    return MAX_HEALTH_FACTOR;
  }
  const collateralAdjustedForThreshold = (collateralValueInUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (collateralAdjustedForThreshold * PRECISION) / totalDscMinted;
}

export function isHealthy(healthFactor: bigint): boolean {
  return healthFactor >= MIN_HEALTH_FACTOR;
}

/**
 * Largest debt the given collateral value supports at MIN_HEALTH_FACTOR
 */
export function maxMintableDebt(collateralValueInUsd: bigint): bigint {
  return (collateralValueInUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
}
