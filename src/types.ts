/**
 * Ballast Engine - Shared Types
 *
 * Every quantity is an integer fixed-point bigint. The aliases below only
 * document which scale a value is expressed in:
 *
 *   Amount          collateral or debt units, 18 decimals
 *   UsdValue        USD, 18 decimals
 *   RawPrice        USD per unit as reported by a feed, 8 decimals
 *   NormalizedPrice USD per unit, 18 decimals
 *   Percent         2-decimal percentage, 100 = 100%
 *   HealthFactor    unitless ratio, 18 decimals (1e18 = 1.0)
 */

/** Checksummed 20-byte hex address identifying an account or an asset. */
export type Address = string;

export type Amount = bigint;
export type UsdValue = bigint;
export type RawPrice = bigint;
export type NormalizedPrice = bigint;
export type Percent = bigint;
export type HealthFactor = bigint;

/** Returns the current time in whole seconds since the epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/** Committed debt and collateral value of one account. */
export interface AccountInformation {
  debtMinted: Amount;
  collateralValueUsd: UsdValue;
}
