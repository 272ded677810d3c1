/**
 * Ballast Engine - Collateral Ledger
 *
 * Per-account, per-asset collateral balances. Writes go through an open
 * LedgerTransaction: the balance change, its event and the token transfer
 * are all staged, and a transfer that fails at commit aborts the
 * transaction so the balance change is never applied.
 */

import type { AssetRegistry } from "./asset-registry";
import { InsufficientFunds } from "./errors";
import type { LedgerTransaction, LedgerView } from "./ledger-store";
import type { PriceOracleAdapter } from "./price-oracle";
import type { Address, Amount, UsdValue } from "./types";
import { requirePositive } from "./utils";

export class CollateralLedger {
  constructor(
    private readonly registry: AssetRegistry,
    private readonly oracle: PriceOracleAdapter,
    /** Engine address holding deposited collateral */
    private readonly custody: Address
  ) {}

  deposit(tx: LedgerTransaction, account: Address, asset: Address, amount: Amount): void {
    requirePositive(amount, "amount");
    const { assetId, token } = this.registry.require(asset);

    tx.setCollateral(account, assetId, tx.collateralOf(account, assetId) + amount);
    tx.record({ type: "CollateralDeposited", account, to: this.custody, asset: assetId, amount });

    tx.interact({
      operation: `collateral(${assetId}).transferFrom`,
      phase: "pull",
      run: () => token.transferFrom(account, this.custody, amount),
      compensate: () => token.transfer(account, amount),
    });
  }

  /**
   * Move collateral out of `from`'s balance to `to`. Callers are responsible
   * for any solvency check the withdrawal implies, and for rejecting a zero
   * amount where the caller asked for one.
   * @throws InsufficientFunds if `from` holds less than `amount` of `asset`
   */
  withdraw(tx: LedgerTransaction, asset: Address, amount: Amount, from: Address, to: Address): void {
    const { assetId, token } = this.registry.require(asset);

    const balance = tx.collateralOf(from, assetId);
    if (amount > balance) {
      throw new InsufficientFunds(from, assetId, amount, balance);
    }

    tx.setCollateral(from, assetId, balance - amount);
    tx.record({ type: "CollateralRedeemed", from, to, asset: assetId, amount });

    tx.interact({
      operation: `collateral(${assetId}).transfer`,
      phase: "push",
      run: () => token.transfer(to, amount),
    });
  }

  balanceOf(view: LedgerView, account: Address, asset: Address): Amount {
    return view.collateralOf(account, this.assetIdOf(asset));
  }

  /** Canonical id of a registered asset given in any letter case */
  assetIdOf(asset: Address): Address {
    return this.registry.require(asset).assetId;
  }

  /**
   * Total USD value of `account`'s collateral. Assets with a zero balance are
   * skipped, so an unrelated stale feed cannot block an account that holds
   * none of that asset.
   */
  collateralValue(view: LedgerView, account: Address): UsdValue {
    let total = 0n;
    for (const assetId of this.registry.assetIds()) {
      const balance = view.collateralOf(account, assetId);
      if (balance === 0n) continue;
      total += this.oracle.usdValue(assetId, balance);
    }
    return total;
  }
}
