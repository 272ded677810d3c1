// Ballast Engine - Position Monitor
// View-only scan of open positions; never mutates the engine.

import { ethers } from "ethers";
import { MAX_HEALTH_FACTOR, MIN_HEALTH_FACTOR } from "./calculator";
import { createModuleLogger } from "./logger";
import type { StablecoinEngine } from "./stablecoin-engine";
import type { Address, Amount, HealthFactor, UsdValue } from "./types";

const logger = createModuleLogger("MONITOR");

export interface CollateralHolding {
  asset: Address;
  amount: Amount;
  valueUsd: UsdValue;
}

export interface PositionInfo {
  account: Address;
  debt: Amount;
  healthFactor: HealthFactor;
  isLiquidatable: boolean;
  collateral: CollateralHolding[];
}

export interface PositionScanFailure {
  account: Address;
  error: Error;
}

export interface PositionScan {
  /** Accounts with debt, lowest health factor first */
  positions: PositionInfo[];
  /** Accounts that could not be valued, e.g. behind a stale feed */
  failures: PositionScanFailure[];
}

/**
 * Read every account with outstanding debt. Defaults to all accounts the
 * engine has seen.
 */
export function scanPositions(
  engine: StablecoinEngine,
  accounts: readonly Address[] = engine.getAccounts()
): PositionScan {
  const positions: PositionInfo[] = [];
  const failures: PositionScanFailure[] = [];

  for (const account of accounts) {
    try {
      const { debtMinted } = engine.getAccountInformation(account);
      if (debtMinted === 0n) {
        continue;
      }

      const collateral: CollateralHolding[] = [];
      for (const asset of engine.getCollateralTokens()) {
        const amount = engine.getCollateralBalanceOfUser(account, asset);
        if (amount > 0n) {
          collateral.push({ asset, amount, valueUsd: engine.getUsdValue(asset, amount) });
        }
      }

      const healthFactor = engine.getHealthFactor(account);
      positions.push({
        account,
        debt: debtMinted,
        healthFactor,
        isLiquidatable: healthFactor < MIN_HEALTH_FACTOR,
        collateral,
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.warn(`Error reading position for ${account}: ${err.message}`);
      failures.push({ account, error: err });
    }
  }

  // Sort by health factor (lowest first)
  positions.sort((a, b) => (a.healthFactor < b.healthFactor ? -1 : a.healthFactor > b.healthFactor ? 1 : 0));

  return { positions, failures };
}

export function formatHealthFactor(healthFactor: HealthFactor): string {
  return healthFactor === MAX_HEALTH_FACTOR ? "inf" : ethers.formatEther(healthFactor);
}

/** Plain-text report of a scan, one block per position. */
export function formatPositionReport(scan: PositionScan): string {
  const lines: string[] = [];
  let liquidatableCount = 0;

  for (const pos of scan.positions) {
    if (pos.isLiquidatable) liquidatableCount++;
    lines.push(`Address: ${pos.account}`);
    lines.push(`Status:  ${pos.isLiquidatable ? "LIQUIDATABLE" : "HEALTHY"}`);
    lines.push(`Health Factor: ${formatHealthFactor(pos.healthFactor)}`);
    lines.push(`Debt: ${ethers.formatEther(pos.debt)}`);
    lines.push("Collateral:");
    for (const col of pos.collateral) {
      lines.push(`  - ${ethers.formatEther(col.amount)} of ${col.asset} ($${ethers.formatEther(col.valueUsd)})`);
    }
  }
  for (const failure of scan.failures) {
    lines.push(`Address: ${failure.account}`);
    lines.push(`Status:  UNREADABLE (${failure.error.message})`);
  }

  lines.push(
    `SUMMARY: ${scan.positions.length} active positions, ${liquidatableCount} liquidatable, ` +
      `${scan.failures.length} unreadable`
  );
  return lines.join("\n");
}
