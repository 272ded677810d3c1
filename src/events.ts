/**
 * Ballast Engine - Ledger Events
 *
 * Signals published after an operation commits. Collateral events carry
 * enough to rebuild every balance without reading live state.
 */

import type { Address, Amount } from "./types";

export interface CollateralDepositedEvent {
  type: "CollateralDeposited";
  account: Address;
  /** Custody address the collateral moved to */
  to: Address;
  asset: Address;
  amount: Amount;
}

/** Collateral leaving `from`'s balance, by redemption or liquidation seizure. */
export interface CollateralRedeemedEvent {
  type: "CollateralRedeemed";
  from: Address;
  to: Address;
  asset: Address;
  amount: Amount;
}

export interface DebtMintedEvent {
  type: "DebtMinted";
  account: Address;
  amount: Amount;
}

export interface DebtBurnedEvent {
  type: "DebtBurned";
  onBehalfOf: Address;
  payer: Address;
  amount: Amount;
}

export interface LiquidatedEvent {
  type: "Liquidated";
  liquidator: Address;
  target: Address;
  asset: Address;
  debtCovered: Amount;
  collateralSeized: Amount;
}

export type EngineEvent =
  | CollateralDepositedEvent
  | CollateralRedeemedEvent
  | DebtMintedEvent
  | DebtBurnedEvent
  | LiquidatedEvent;

export type EngineEventType = EngineEvent["type"];

export type EngineEventOf<K extends EngineEventType> = Extract<EngineEvent, { type: K }>;

export type CollateralEvent = CollateralDepositedEvent | CollateralRedeemedEvent;

/**
 * Rebuild account => asset => balance from a collateral event history.
 * Other event types are ignored.
 */
export function replayCollateralEvents(
  events: readonly EngineEvent[]
): Map<Address, Map<Address, Amount>> {
  const balances = new Map<Address, Map<Address, Amount>>();

  const adjust = (account: Address, asset: Address, delta: Amount) => {
    let perAsset = balances.get(account);
    if (!perAsset) {
      perAsset = new Map();
      balances.set(account, perAsset);
    }
    perAsset.set(asset, (perAsset.get(asset) ?? 0n) + delta);
  };

  for (const event of events) {
    if (event.type === "CollateralDeposited") {
      adjust(event.account, event.asset, event.amount);
    } else if (event.type === "CollateralRedeemed") {
      adjust(event.from, event.asset, -event.amount);
    }
  }

  return balances;
}
