/**
 * Ballast Engine - Mint/Burn Controller
 *
 * Debt ledger changes paired with calls into the debt token. Debt is staged
 * on the open transaction and checked against the minimum health factor;
 * the token's mint, pull and burn are staged with it and run at commit.
 */

import { calculateHealthFactor, MIN_HEALTH_FACTOR } from "./calculator";
import type { CollateralLedger } from "./collateral-ledger";
import type { DebtTokenController } from "./collaborators";
import { InsufficientFunds, SolvencyViolation } from "./errors";
import type { LedgerTransaction, LedgerView } from "./ledger-store";
import type { Address, Amount, HealthFactor } from "./types";
import { requirePositive } from "./utils";

export class MintBurnController {
  constructor(
    private readonly debtToken: DebtTokenController,
    private readonly ledger: CollateralLedger,
    /** Engine address that receives debt tokens before they are burned */
    private readonly custody: Address
  ) {}

  /**
   * @throws SolvencyViolation if the new debt would leave `account` below the minimum
   * @throws ExternalTransferFailure if the debt token refuses to mint
   */
  mint(tx: LedgerTransaction, account: Address, amount: Amount): void {
    requirePositive(amount, "amount");

    tx.setDebt(account, tx.debtOf(account) + amount);
    this.assertHealthy(tx, account);
    tx.record({ type: "DebtMinted", account, amount });

    tx.interact({
      operation: "debtToken.mint",
      phase: "push",
      run: () => this.debtToken.mint(account, amount),
    });
  }

  /**
   * Retire `amount` of `target`'s debt using tokens pulled from `payer`.
   * @throws InsufficientFunds if `target` owes less than `amount`
   */
  burn(tx: LedgerTransaction, amount: Amount, target: Address, payer: Address): void {
    requirePositive(amount, "amount");

    const debt = tx.debtOf(target);
    if (amount > debt) {
      throw new InsufficientFunds(target, "debt", amount, debt);
    }

    tx.setDebt(target, debt - amount);
    tx.record({ type: "DebtBurned", onBehalfOf: target, payer, amount });

    tx.interact({
      operation: "debtToken.transferFrom",
      phase: "pull",
      run: () => this.debtToken.transferFrom(payer, this.custody, amount),
      compensate: () => this.debtToken.transfer(payer, amount),
    });
    tx.interact({
      operation: "debtToken.burn",
      phase: "settle",
      run: () => this.debtToken.burn(amount),
      compensate: () => this.debtToken.mint(this.custody, amount),
    });
  }

  healthFactorOf(view: LedgerView, account: Address): HealthFactor {
    return calculateHealthFactor(view.debtOf(account), this.ledger.collateralValue(view, account));
  }

  /**
   * @throws SolvencyViolation if `account` has debt and is below the minimum health factor
   */
  assertHealthy(view: LedgerView, account: Address): void {
    if (view.debtOf(account) === 0n) return;
    const healthFactor = this.healthFactorOf(view, account);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new SolvencyViolation(account, healthFactor);
    }
  }
}
