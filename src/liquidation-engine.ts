/**
 * Ballast Engine - Liquidation Engine
 *
 * Lets any account cover part or all of an unhealthy account's debt in one
 * collateral asset of the caller's choosing, and receive that asset's
 * equivalent plus a 10% bonus.
 *
 * Flow:
 *   1. Target must be below the minimum health factor
 *   2. seizedBase = collateral worth debtToCover at the current price
 *   3. totalSeized = seizedBase + 10% bonus, taken from the named asset only
 *   4. Liquidator's debt tokens retire debtToCover of the target's debt
 *   5. Target's health factor must strictly improve
 *   6. Liquidator's own position must still be healthy
 *
 * Known limitation: the bonus assumes the system stays well above 100%
 * collateralized. Once a position's collateral is worth less than 110% of
 * its debt, seizing debt + bonus lowers its health factor and the call fails
 * with LiquidationIneffective. There is no fallback auction.
 */

import { calculateSeizeAmount, MIN_HEALTH_FACTOR, type SeizeAmount } from "./calculator";
import type { CollateralLedger } from "./collateral-ledger";
import { LiquidationIneffective, LiquidationNotEligible } from "./errors";
import type { LedgerTransaction, LedgerView } from "./ledger-store";
import type { MintBurnController } from "./mint-burn-controller";
import type { PriceOracleAdapter } from "./price-oracle";
import type { Address, Amount, HealthFactor } from "./types";
import { requirePositive } from "./utils";

export interface LiquidationResult extends SeizeAmount {
  asset: Address;
  target: Address;
  liquidator: Address;
  debtCovered: Amount;
  startHealthFactor: HealthFactor;
  endHealthFactor: HealthFactor;
}

export interface LiquidationQuote extends SeizeAmount {
  healthFactor: HealthFactor;
  liquidatable: boolean;
  /** Target's balance of the asset covers totalSeized */
  collateralSufficient: boolean;
}

export class LiquidationEngine {
  constructor(
    private readonly ledger: CollateralLedger,
    private readonly oracle: PriceOracleAdapter,
    private readonly controller: MintBurnController
  ) {}

  liquidate(
    tx: LedgerTransaction,
    asset: Address,
    target: Address,
    debtToCover: Amount,
    liquidator: Address
  ): LiquidationResult {
    const startHealthFactor = this.controller.healthFactorOf(tx, target);
    if (startHealthFactor >= MIN_HEALTH_FACTOR) {
      throw new LiquidationNotEligible(target, startHealthFactor);
    }
    requirePositive(debtToCover, "debtToCover");

    const seize = calculateSeizeAmount(debtToCover, this.oracle.normalizedPrice(asset));

    // Dust cover can floor to nothing seized; the debt is still retired.
    if (seize.totalSeized > 0n) {
      this.ledger.withdraw(tx, asset, seize.totalSeized, target, liquidator);
    }
    this.controller.burn(tx, debtToCover, target, liquidator);

    const endHealthFactor = this.controller.healthFactorOf(tx, target);
    if (endHealthFactor <= startHealthFactor) {
      throw new LiquidationIneffective(target, startHealthFactor, endHealthFactor);
    }
    this.controller.assertHealthy(tx, liquidator);

    const assetId = this.ledger.assetIdOf(asset);
    tx.record({
      type: "Liquidated",
      liquidator,
      target,
      asset: assetId,
      debtCovered: debtToCover,
      collateralSeized: seize.totalSeized,
    });

    return {
      ...seize,
      asset: assetId,
      target,
      liquidator,
      debtCovered: debtToCover,
      startHealthFactor,
      endHealthFactor,
    };
  }

  /** What `liquidate` would seize right now, without touching state. */
  quote(view: LedgerView, asset: Address, target: Address, debtToCover: Amount): LiquidationQuote {
    requirePositive(debtToCover, "debtToCover");
    const healthFactor = this.controller.healthFactorOf(view, target);
    const seize = calculateSeizeAmount(debtToCover, this.oracle.normalizedPrice(asset));
    return {
      ...seize,
      healthFactor,
      liquidatable: healthFactor < MIN_HEALTH_FACTOR,
      collateralSufficient: this.ledger.balanceOf(view, target, asset) >= seize.totalSeized,
    };
  }
}
