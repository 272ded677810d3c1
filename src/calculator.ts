/**
 * Ballast Engine - Calculator Utilities
 *
 * Pure fixed-point math for USD conversion, health factor, and liquidation
 * seizure. No state and no external dependencies. Every formula multiplies
 * before it divides, and every division floors.
 */

import type {
  Amount,
  HealthFactor,
  NormalizedPrice,
  Percent,
  RawPrice,
  UsdValue,
} from "./types";

/** 18-decimal scale shared by amounts, USD values and health factors */
export const PRECISION = 10n ** 18n;

/** Decimals every price feed must report in */
export const FEED_DECIMALS = 8;

/** Lifts an 8-decimal feed price to the 18-decimal scale */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Percentage denominator (100 = 100%) */
export const LIQUIDATION_PRECISION = 100n;

/** Share of raw collateral value that counts toward borrowing capacity (200% overcollateralized) */
export const LIQUIDATION_THRESHOLD: Percent = 50n;

/** Extra collateral awarded to a liquidator on top of the debt covered */
export const LIQUIDATION_BONUS: Percent = 10n;

export const MIN_HEALTH_FACTOR: HealthFactor = PRECISION;

/** Health factor of an account with no debt */
export const MAX_HEALTH_FACTOR: HealthFactor = 2n ** 256n - 1n;

export function normalizePrice(rawPrice: RawPrice): NormalizedPrice {
  return rawPrice * ADDITIONAL_FEED_PRECISION;
}

/**
 * USD value of `amount` units at `price`.
 * @param amount  Collateral units (18 decimals)
 * @param price   Normalized price (18 decimals)
 */
export function calculateUsdValue(amount: Amount, price: NormalizedPrice): UsdValue {
  return (amount * price) / PRECISION;
}

/**
 * Collateral units worth `usdAmount` at `price`. Inverse of
 * calculateUsdValue up to floor truncation.
 */
export function calculateAssetAmountFromUsd(usdAmount: UsdValue, price: NormalizedPrice): Amount {
  return (usdAmount * PRECISION) / price;
}

/**
 * Health factor for an account.
 * healthFactor = collateralValue * threshold / 100 * 1e18 / debt
 * @returns MAX_HEALTH_FACTOR when the account has no debt
 */
export function calculateHealthFactor(debtMinted: Amount, collateralValueUsd: UsdValue): HealthFactor {
  if (debtMinted === 0n) return MAX_HEALTH_FACTOR;
  const adjustedCollateral = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjustedCollateral * PRECISION) / debtMinted;
}

export function calculateLiquidationBonus(seizedBase: Amount): Amount {
  return (seizedBase * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}

export interface SeizeAmount {
  /** Collateral worth exactly the debt covered */
  seizedBase: Amount;
  bonus: Amount;
  totalSeized: Amount;
}

/**
 * Collateral a liquidator receives for covering `debtToCover` at `price`.
 */
export function calculateSeizeAmount(debtToCover: UsdValue, price: NormalizedPrice): SeizeAmount {
  const seizedBase = calculateAssetAmountFromUsd(debtToCover, price);
  const bonus = calculateLiquidationBonus(seizedBase);
  return { seizedBase, bonus, totalSeized: seizedBase + bonus };
}
