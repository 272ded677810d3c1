/**
 * Ballast Engine - External Collaborators
 *
 * Interfaces for the contracts the engine drives but does not implement:
 * the collateral tokens, the debt token it has mint/burn authority over, and
 * the price feeds. All calls are synchronous; a `false` return means the
 * collaborator refused the transfer. Token calls are staged on the open
 * LedgerTransaction and run when it commits.
 */

import { EngineError, ExternalTransferFailure } from "./errors";
import type { Address, Amount, RawPrice } from "./types";

export interface CollateralToken {
  /** Move `amount` out of engine custody to `to`. */
  transfer(to: Address, amount: Amount): boolean;
  /** Pull `amount` from `from` (who must have authorized it) to `to`. */
  transferFrom(from: Address, to: Address, amount: Amount): boolean;
}

export interface DebtTokenController {
  /** Also used to restore a burn when a later step of the same commit fails. */
  mint(to: Address, amount: Amount): boolean;
  transferFrom(from: Address, to: Address, amount: Amount): boolean;
  /** Move `amount` out of engine custody; used to return a pull that could not be settled. */
  transfer(to: Address, amount: Amount): boolean;
  /** Destroy `amount` already held in engine custody. Throws on failure. */
  burn(amount: Amount): void;
}

/** Answer of an aggregator-style feed. Timestamps are seconds since the epoch. */
export interface RoundData {
  roundId: bigint;
  answer: RawPrice;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  readonly decimals: number;
  latestRoundData(): RoundData;
}

/**
 * Run a collaborator call that reports success as a boolean.
 *
 * `false` and thrown foreign errors become ExternalTransferFailure. An
 * EngineError thrown through the collaborator (for example a rejected
 * re-entrant call) is rethrown unchanged.
 */
export function invokeCollaborator(operation: string, call: () => boolean | void): void {
  try {
    if (call() === false) {
      throw new ExternalTransferFailure(operation, "collaborator returned false");
    }
  } catch (err) {
    if (err instanceof EngineError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new ExternalTransferFailure(operation, detail, err);
  }
}
