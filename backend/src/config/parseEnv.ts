/**
 * Environment variable parsing utilities with boolean, integer, enum, list and allocation handling
 * Addresses truthy coercion pitfalls where "false" string evaluates to true
 */

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }

  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  // Invalid value - return default
  return defaultValue;
}

/**
 * Parse integer environment variable, clamped to [min, max] when given
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  let result = parsed;

  if (min !== undefined && result < min) {
    result = min;
  }

  if (max !== undefined && result > max) {
    result = max;
  }

  return result;
}

/**
 * Parse enum environment variable
 * @param allowedValues - Array of allowed values (lowercase)
 * @param defaultValue - Default value if undefined/empty/invalid
 */
export function parseEnumEnv<T extends string>(
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue: T
): T {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();
  const match = allowedValues.find(allowed => allowed === normalized);

  return match ?? defaultValue;
}

/**
 * Parse a comma-separated list, dropping blank entries.
 * Order is preserved: collateral tokens and their feeds are matched by index.
 */
export function parseListEnv(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/**
 * Parse a comma-separated list of non-negative integers as bigint.
 * @throws Error naming the offending entry
 */
export function parseBigIntListEnv(value: string | undefined): bigint[] {
  return parseListEnv(value).map(entry => {
    if (!/^\d+$/.test(entry)) {
      throw new Error(`Invalid integer list entry: "${entry}"`);
    }
    return BigInt(entry);
  });
}

export interface BalanceAllocation {
  asset: string;
  holder: string;
  amount: bigint;
}

/**
 * Parse `asset:holder:amount` triples separated by commas.
 * @throws Error naming the offending entry
 */
export function parseAllocationListEnv(value: string | undefined): BalanceAllocation[] {
  return parseListEnv(value).map(entry => {
    const [asset, holder, amount, ...rest] = entry.split(':').map(part => part.trim());
    if (!asset || !holder || !amount || rest.length > 0 || !/^\d+$/.test(amount)) {
      throw new Error(`Invalid allocation entry: "${entry}" (expected asset:holder:amount)`);
    }
    return { asset, holder, amount: BigInt(amount) };
  });
}
