/**
 * Address normalization utilities for consistent account and asset keys
 * across the ledger, the price-feed bindings and the API layer.
 *
 * Ensures all lookups use the same normalized key.
 */

import { isAddress } from 'ethers';

import { config } from '../config/index.js';

/**
 * Normalize an identifier to lowercase if normalization is enabled
 */
export function normalizeAddress(address: string): string {
  if (!address) return address;

  const trimmed = address.trim();
  if (config.addressNormalizeLowercase) {
    return trimmed.toLowerCase();
  }

  return trimmed;
}

export function normalizeAddresses(addresses: readonly string[]): string[] {
  return addresses.map(normalizeAddress);
}

/**
 * Check that a string is a well-formed 20-byte hex address (any checksum casing)
 */
export function isHexAddress(value: string): boolean {
  return isAddress(value);
}
