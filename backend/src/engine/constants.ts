// Fixed-point parameters shared by the ledger, the oracle adapter and the liquidation path.
import { MaxUint256 } from 'ethers';

/** Internal scale for USD values, debt and token amounts */
export const PRECISION = 10n ** 18n;

/** Price feeds quote USD with 8 decimals */
export const FEED_PRECISION = 10n ** 8n;

/** Lifts an 8-decimal feed answer to the 1e18 scale */
export const ADDITIONAL_FEED_PRECISION = PRECISION / FEED_PRECISION;

/** Share of collateral value counted toward solvency (50 => 200% overcollateralized) */
export const LIQUIDATION_THRESHOLD = 50n;

/** Extra collateral paid to a liquidator, as a share of the seized base amount */
export const LIQUIDATION_BONUS = 10n;

export const LIQUIDATION_PRECISION = 100n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor of a position without debt: uint256 max */
export const MAX_HEALTH_FACTOR = MaxUint256;
