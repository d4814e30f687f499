/**
 * Engine error taxonomy.
 *
 * Every rejection aborts the whole operation; the engine never retries or
 * partially applies. The `code` is stable and safe to switch on; the
 * subclasses carry the offending values for diagnostics.
 */

export type DscEngineErrorCode =
  // validation
  | 'NeedsMoreThanZero'
  | 'TokenNotAllowed'
  | 'TokenAddressesAndPriceFeedsMustBeSameLength'
  // solvency
  | 'BreakHealthFactor'
  | 'HealthFactorOK'
  | 'HealthFactorNotImproved'
  // collaborators
  | 'TransferFailed'
  | 'MintFailed'
  | 'InvalidPrice'
  // arithmetic
  | 'ArithmeticUnderflow'
  // concurrency / lifecycle
  | 'ReentrantCall'
  | 'EngineClosed';

export class DscEngineError extends Error {
  constructor(
    public readonly code: DscEngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DscEngineError';
  }
}

export class BreakHealthFactorError extends DscEngineError {
  constructor(
    public readonly user: string,
    public readonly healthFactor: bigint
  ) {
    super('BreakHealthFactor', `Health factor of ${user} would drop to ${healthFactor}`);
    this.name = 'BreakHealthFactorError';
  }
}

export class ArithmeticUnderflowError extends DscEngineError {
  constructor(
    what: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super('ArithmeticUnderflow', `${what}: requested ${requested} exceeds recorded ${available}`);
    this.name = 'ArithmeticUnderflowError';
  }
}

export function isDscEngineError(err: unknown): err is DscEngineError {
  return err instanceof DscEngineError;
}
