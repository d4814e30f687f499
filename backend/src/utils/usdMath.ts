/**
 * Display helpers for 1e18 fixed-point values.
 * Accounting never goes through these: they exist for logs and API output only.
 */

import { formatUnits } from 'ethers';

import { MAX_HEALTH_FACTOR } from '../engine/constants.js';

/**
 * Format a 1e18-scaled amount (USD, debt or token units) as a decimal string
 * @example formatWad(1500000000000000000n) // "1.5"
 */
export function formatWad(value: bigint): string {
  return formatUnits(value, 18);
}

/**
 * Format a health factor, rendering the zero-debt sentinel as "max"
 */
export function formatHealthFactor(healthFactor: bigint): string {
  if (healthFactor === MAX_HEALTH_FACTOR) {
    return 'max';
  }
  return formatUnits(healthFactor, 18);
}
