/**
 * Ballast Engine - Ledger Store
 *
 * Owns committed per-account collateral and debt. Mutations never touch the
 * store directly: an operation opens a LedgerTransaction and stages writes,
 * events and collaborator interactions in it. Commit runs the interactions
 * (pulls into custody, then changes confined to custody, then pushes out of
 * custody) and applies the writes only if all of them succeed; discard drops
 * everything. Readers of
 * the store therefore only ever see fully committed state.
 */

import { invokeCollaborator } from "./collaborators";
import type { EngineEvent } from "./events";
import type { Address, Amount } from "./types";

/** Read access shared by the committed store and an open transaction. */
export interface LedgerView {
  collateralOf(account: Address, asset: Address): Amount;
  debtOf(account: Address): Amount;
}

export class LedgerStore implements LedgerView {
  private readonly collateral = new Map<Address, Map<Address, Amount>>();
  private readonly debt = new Map<Address, Amount>();
  private readonly collateralTotals = new Map<Address, Amount>();
  private debtTotal = 0n;
  private openTransaction: LedgerTransaction | null = null;

  collateralOf(account: Address, asset: Address): Amount {
    return this.collateral.get(account)?.get(asset) ?? 0n;
  }

  debtOf(account: Address): Amount {
    return this.debt.get(account) ?? 0n;
  }

  /** Collateral of `asset` held in custody across all accounts */
  totalCollateral(asset: Address): Amount {
    return this.collateralTotals.get(asset) ?? 0n;
  }

  totalDebt(): Amount {
    return this.debtTotal;
  }

  /** Accounts that have ever held collateral or debt */
  accounts(): Address[] {
    return [...new Set([...this.collateral.keys(), ...this.debt.keys()])];
  }

  /**
   * Open a transaction. Only one may be open at a time; the engine's lock
   * guarantees this, the check here backs it up.
   */
  begin(): LedgerTransaction {
    if (this.openTransaction) {
      throw new Error("LedgerStore: a transaction is already open");
    }
    const tx = new LedgerTransaction(this);
    this.openTransaction = tx;
    return tx;
  }

  /** @internal called by LedgerTransaction.commit() */
  applyCommit(
    tx: LedgerTransaction,
    collateralWrites: Iterable<CollateralWrite>,
    debtWrites: Iterable<[Address, Amount]>
  ): void {
    this.release(tx);

    for (const { account, asset, amount } of collateralWrites) {
      const previous = this.collateralOf(account, asset);
      let perAsset = this.collateral.get(account);
      if (!perAsset) {
        perAsset = new Map();
        this.collateral.set(account, perAsset);
      }
      perAsset.set(asset, amount);
      this.collateralTotals.set(asset, this.totalCollateral(asset) + amount - previous);
    }

    for (const [account, amount] of debtWrites) {
      this.debtTotal += amount - this.debtOf(account);
      this.debt.set(account, amount);
    }
  }

  /** @internal called by LedgerTransaction on commit or discard */
  release(tx: LedgerTransaction): void {
    if (this.openTransaction !== tx) {
      throw new Error("LedgerStore: transaction is not the open one");
    }
    this.openTransaction = null;
  }
}

/**
 * A collaborator call deferred until commit, run in phase order:
 *   pull    brings funds into custody; compensated by returning them
 *   settle  acts on funds already in custody (e.g. a burn); compensated by restoring them
 *   push    sends funds out of custody; cannot be undone, so each
 *           operation stages at most one and it runs last
 */
export type InteractionPhase = "pull" | "settle" | "push";

const PHASE_ORDER: readonly InteractionPhase[] = ["pull", "settle", "push"];

export interface Interaction {
  operation: string;
  phase: InteractionPhase;
  run: () => boolean | void;
  compensate?: () => boolean | void;
}

export type CompensationFailureHandler = (operation: string, err: unknown) => void;

interface CollateralWrite {
  account: Address;
  asset: Address;
  amount: Amount;
}

type TransactionState = "open" | "committed" | "discarded";

export class LedgerTransaction implements LedgerView {
  private readonly collateralWrites = new Map<string, CollateralWrite>();
  private readonly debtWrites = new Map<Address, Amount>();
  private readonly pendingEvents: EngineEvent[] = [];
  private readonly interactions: Interaction[] = [];
  private state: TransactionState = "open";

  constructor(private readonly store: LedgerStore) {}

  collateralOf(account: Address, asset: Address): Amount {
    const staged = this.collateralWrites.get(collateralKey(account, asset));
    return staged ? staged.amount : this.store.collateralOf(account, asset);
  }

  debtOf(account: Address): Amount {
    return this.debtWrites.get(account) ?? this.store.debtOf(account);
  }

  setCollateral(account: Address, asset: Address, amount: Amount): void {
    this.assertOpen();
    if (amount < 0n) {
      throw new RangeError(`collateral of ${account} in ${asset} cannot be negative`);
    }
    this.collateralWrites.set(collateralKey(account, asset), { account, asset, amount });
  }

  setDebt(account: Address, amount: Amount): void {
    this.assertOpen();
    if (amount < 0n) {
      throw new RangeError(`debt of ${account} cannot be negative`);
    }
    this.debtWrites.set(account, amount);
  }

  /** Stage an event; it is only returned to the caller on commit. */
  record(event: EngineEvent): void {
    this.assertOpen();
    this.pendingEvents.push(event);
  }

  /** Stage a collaborator call to run at commit. */
  interact(interaction: Interaction): void {
    this.assertOpen();
    this.interactions.push(interaction);
  }

  /**
   * Run staged interactions, then apply every staged write and hand back the
   * staged events. If an interaction fails, the interactions already run are
   * compensated in reverse order and the error is rethrown with the
   * transaction still open, for the caller to discard.
   */
  commit(onCompensationFailure?: CompensationFailureHandler): EngineEvent[] {
    this.assertOpen();
    this.settle(onCompensationFailure);
    this.state = "committed";
    this.store.applyCommit(this, this.collateralWrites.values(), this.debtWrites.entries());
    return [...this.pendingEvents];
  }

  /** Drop every staged write and event. Safe to call more than once. */
  discard(): void {
    if (this.state !== "open") return;
    this.state = "discarded";
    this.store.release(this);
  }

  private settle(onCompensationFailure?: CompensationFailureHandler): void {
    const ordered = PHASE_ORDER.flatMap((phase) => this.interactions.filter((i) => i.phase === phase));
    const completed: Interaction[] = [];
    try {
      for (const interaction of ordered) {
        invokeCollaborator(interaction.operation, interaction.run);
        completed.push(interaction);
      }
    } catch (err) {
      for (const done of completed.reverse()) {
        if (!done.compensate) continue;
        try {
          invokeCollaborator(`${done.operation} (compensation)`, done.compensate);
        } catch (compensationErr) {
          onCompensationFailure?.(done.operation, compensationErr);
        }
      }
      throw err;
    }
  }

  private assertOpen(): void {
    if (this.state !== "open") {
      throw new Error(`LedgerTransaction: already ${this.state}`);
    }
  }
}

function collateralKey(account: Address, asset: Address): string {
  return `${account}/${asset}`;
}
