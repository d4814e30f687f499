export { DscEngine } from './DscEngine.js';
export { CollateralLedger, type LedgerView } from './CollateralLedger.js';
export { LedgerTransaction, type Callout, type CalloutPhase } from './LedgerTransaction.js';
export { PriceOracleAdapter } from './PriceOracleAdapter.js';
export { OperationGuard, type OperationFrame } from './OperationGuard.js';
export { AccountValuator } from './AccountValuator.js';
export { LiquidationEngine, quoteSeizure, type LiquidationResult, type SeizureQuote } from './LiquidationEngine.js';
export { calculateHealthFactor, isHealthy, maxMintableDebt } from './healthFactor.js';
export * from './constants.js';
export * from './errors.js';
export type * from './types.js';
