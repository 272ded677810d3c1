/**
 * Ballast Engine - Stablecoin Engine
 *
 * Caller-facing entry point. Users deposit registered collateral, mint the
 * pegged debt unit against it, burn debt and redeem collateral; anyone may
 * liquidate an account whose health factor has fallen below 1.0.
 *
 * Every mutating operation:
 *   1. takes the per-instance lock (a nested call while it is held fails with ReentrancyError)
 *   2. opens a LedgerTransaction and stages balance, debt, event and token-call changes in it
 *   3. runs every solvency and eligibility check against the staged state
 *   4. commits: token pulls, then burns in custody, then the single outbound
 *      transfer or mint, then the staged writes; any failure undoes the
 *      completed pulls and burns and discards the overlay
 *   5. releases the lock, then publishes the committed events
 *
 * Getters never take the lock and always read committed state, so a
 * collaborator reading mid-operation sees the state before the operation.
 *
 * Usage:
 *   const engine = new StablecoinEngine({
 *     custody, collateralAssets: [weth], priceFeeds: [ethUsdFeed],
 *     collateralTokens: [wethToken], debtToken,
 *   });
 *   engine.depositAndMint(user, weth, parseEther("10"), parseEther("5000"));
 */

import { EventEmitter } from "events";
import { ethers } from "ethers";
import type { Logger } from "winston";
import { AssetRegistry } from "./asset-registry";
import {
  ADDITIONAL_FEED_PRECISION,
  calculateHealthFactor,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./calculator";
import { CollateralLedger } from "./collateral-ledger";
import type { CollateralToken, DebtTokenController, PriceFeed } from "./collaborators";
import { DEFAULT_SETTINGS, validateSettings, type EngineSettings } from "./config";
import { EngineError, ReentrancyError } from "./errors";
import type { EngineEvent, EngineEventOf, EngineEventType } from "./events";
import { LedgerStore, type LedgerTransaction } from "./ledger-store";
import { LiquidationEngine, type LiquidationQuote, type LiquidationResult } from "./liquidation-engine";
import { createModuleLogger } from "./logger";
import {
  collateralMovementsTotal,
  liquidationsTotal,
  operationErrorsTotal,
  operationsTotal,
  totalDebtUnits,
} from "./metrics";
import { MintBurnController } from "./mint-burn-controller";
import { PriceOracleAdapter } from "./price-oracle";
import {
  systemClock,
  type AccountInformation,
  type Address,
  type Amount,
  type Clock,
  type HealthFactor,
  type Percent,
  type UsdValue,
} from "./types";
import { normalizeAddress, requirePositive } from "./utils";

// ============================================================
//                     CONFIGURATION
// ============================================================

export interface EngineConfig {
  /** Engine's own address; holds deposited collateral and debt tokens awaiting burn */
  custody: string;
  /** Collateral asset ids, in registry order */
  collateralAssets: readonly string[];
  /** One feed per asset, same order */
  priceFeeds: readonly PriceFeed[];
  /** One token per asset, same order */
  collateralTokens: readonly CollateralToken[];
  debtToken: DebtTokenController;
  /** Overrides for environment-derived settings */
  settings?: Partial<EngineSettings>;
  /** Time source for oracle staleness checks (default: system clock) */
  clock?: Clock;
}

export type EngineOperation =
  | "deposit"
  | "mint"
  | "depositAndMint"
  | "redeem"
  | "burn"
  | "burnAndRedeem"
  | "liquidate";

// ============================================================
//                     ENGINE
// ============================================================

export class StablecoinEngine {
  private readonly registry: AssetRegistry;
  private readonly store: LedgerStore;
  private readonly oracle: PriceOracleAdapter;
  private readonly ledger: CollateralLedger;
  private readonly controller: MintBurnController;
  private readonly liquidations: LiquidationEngine;
  private readonly debtToken: DebtTokenController;
  private readonly custody: Address;
  private readonly settings: EngineSettings;
  private readonly logger: Logger;
  private readonly emitter = new EventEmitter();
  private locked = false;

  /**
   * @throws ValidationError on malformed configuration; no state is created
   */
  constructor(config: EngineConfig) {
    this.registry = new AssetRegistry(config.collateralAssets, config.priceFeeds, config.collateralTokens);

    this.settings = { ...DEFAULT_SETTINGS, ...config.settings };
    validateSettings(this.settings);
    this.custody = normalizeAddress(config.custody, "custody");

    this.store = new LedgerStore();
    this.oracle = new PriceOracleAdapter(this.registry, {
      maxPriceAgeSeconds: this.settings.maxPriceAgeSeconds,
      clock: config.clock ?? systemClock,
    });
    this.ledger = new CollateralLedger(this.registry, this.oracle, this.custody);
    this.debtToken = config.debtToken;
    this.controller = new MintBurnController(this.debtToken, this.ledger, this.custody);
    this.liquidations = new LiquidationEngine(this.ledger, this.oracle, this.controller);
    this.logger = createModuleLogger("ENGINE", this.settings);

    this.logger.info(
      `Engine ready: custody ${this.custody}, ${this.registry.assetIds().length} collateral assets, ` +
        `max price age ${this.settings.maxPriceAgeSeconds}s`
    );
  }

  // ============================================================
  //                     MUTATING OPERATIONS
  // ============================================================

  deposit(account: string, asset: string, amount: Amount): void {
    this.execute("deposit", (tx) => {
      this.ledger.deposit(tx, normalizeAddress(account, "account"), asset, amount);
    });
  }

  mint(account: string, amount: Amount): void {
    this.execute("mint", (tx) => {
      this.controller.mint(tx, normalizeAddress(account, "account"), amount);
    });
  }

  depositAndMint(account: string, asset: string, collateralAmount: Amount, debtAmount: Amount): void {
    this.execute("depositAndMint", (tx) => {
      const who = normalizeAddress(account, "account");
      this.ledger.deposit(tx, who, asset, collateralAmount);
      this.controller.mint(tx, who, debtAmount);
    });
  }

  /**
   * Withdraw collateral back to `account`.
   * @throws SolvencyViolation if the remaining collateral no longer covers the account's debt
   */
  redeem(account: string, asset: string, amount: Amount): void {
    this.execute("redeem", (tx) => {
      const who = normalizeAddress(account, "account");
      requirePositive(amount, "amount");
      this.ledger.withdraw(tx, asset, amount, who, who);
      this.controller.assertHealthy(tx, who);
    });
  }

  /** Burn `amount` of `account`'s own debt with its own debt tokens. */
  burn(account: string, amount: Amount): void {
    this.execute("burn", (tx) => {
      const who = normalizeAddress(account, "account");
      this.controller.burn(tx, amount, who, who);
      this.controller.assertHealthy(tx, who);
    });
  }

  burnAndRedeem(account: string, asset: string, collateralAmount: Amount, debtAmount: Amount): void {
    this.execute("burnAndRedeem", (tx) => {
      const who = normalizeAddress(account, "account");
      requirePositive(collateralAmount, "collateralAmount");
      this.controller.burn(tx, debtAmount, who, who);
      this.ledger.withdraw(tx, asset, collateralAmount, who, who);
      this.controller.assertHealthy(tx, who);
    });
  }

  /**
   * Cover `debtToCover` of `target`'s debt and seize the equivalent of `asset`
   * plus the liquidation bonus. `liquidator` must hold and have authorized
   * `debtToCover` debt tokens.
   */
  liquidate(liquidator: string, asset: string, target: string, debtToCover: Amount): LiquidationResult {
    return this.execute("liquidate", (tx) =>
      this.liquidations.liquidate(
        tx,
        asset,
        normalizeAddress(target, "target"),
        debtToCover,
        normalizeAddress(liquidator, "liquidator")
      )
    );
  }

  // ============================================================
  //                     READ SURFACE
  // ============================================================

  getUsdValue(asset: string, amount: Amount): UsdValue {
    return this.oracle.usdValue(asset, amount);
  }

  getAssetAmountFromUsd(asset: string, usdAmount: UsdValue): Amount {
    return this.oracle.assetAmountFromUsd(asset, usdAmount);
  }

  getAccountInformation(account: string): AccountInformation {
    const who = normalizeAddress(account, "account");
    return {
      debtMinted: this.store.debtOf(who),
      collateralValueUsd: this.ledger.collateralValue(this.store, who),
    };
  }

  getAccountCollateralValue(account: string): UsdValue {
    return this.ledger.collateralValue(this.store, normalizeAddress(account, "account"));
  }

  getCollateralBalanceOfUser(account: string, asset: string): Amount {
    return this.ledger.balanceOf(this.store, normalizeAddress(account, "account"), asset);
  }

  getHealthFactor(account: string): HealthFactor {
    return this.controller.healthFactorOf(this.store, normalizeAddress(account, "account"));
  }

  calculateHealthFactor(debtMinted: Amount, collateralValueUsd: UsdValue): HealthFactor {
    return calculateHealthFactor(debtMinted, collateralValueUsd);
  }

  /** Read-only preview of a liquidation against committed state */
  previewLiquidation(asset: string, target: string, debtToCover: Amount): LiquidationQuote {
    return this.liquidations.quote(this.store, asset, normalizeAddress(target, "target"), debtToCover);
  }

  getCollateralTokens(): Address[] {
    return this.registry.assetIds();
  }

  getCollateralTokenPriceFeed(asset: string): PriceFeed {
    return this.registry.require(asset).priceFeed;
  }

  getDebtToken(): DebtTokenController {
    return this.debtToken;
  }

  getCustody(): Address {
    return this.custody;
  }

  getTotalDebt(): Amount {
    return this.store.totalDebt();
  }

  getTotalCollateral(asset: string): Amount {
    return this.store.totalCollateral(this.ledger.assetIdOf(asset));
  }

  /** Every account that has held collateral or debt */
  getAccounts(): Address[] {
    return this.store.accounts();
  }

  getLiquidationThreshold(): Percent {
    return LIQUIDATION_THRESHOLD;
  }

  getLiquidationBonus(): Percent {
    return LIQUIDATION_BONUS;
  }

  getLiquidationPrecision(): bigint {
    return LIQUIDATION_PRECISION;
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return ADDITIONAL_FEED_PRECISION;
  }

  getMinHealthFactor(): HealthFactor {
    return MIN_HEALTH_FACTOR;
  }

  getMaxPriceAgeSeconds(): number {
    return this.settings.maxPriceAgeSeconds;
  }

  // ============================================================
  //                     EVENTS
  // ============================================================

  on<K extends EngineEventType>(type: K, listener: (event: EngineEventOf<K>) => void): this {
    this.emitter.on(type, listener);
    return this;
  }

  off<K extends EngineEventType>(type: K, listener: (event: EngineEventOf<K>) => void): this {
    this.emitter.off(type, listener);
    return this;
  }

  // ============================================================
  //                     TRANSACTION PLUMBING
  // ============================================================

  private execute<T>(operation: EngineOperation, body: (tx: LedgerTransaction) => T): T {
    const { result, events } = this.transact(operation, body);

    operationsTotal.inc({ operation, status: "committed" });
    for (const event of events) {
      if (event.type === "CollateralDeposited") collateralMovementsTotal.inc({ kind: "deposit" });
      else if (event.type === "CollateralRedeemed") collateralMovementsTotal.inc({ kind: "redeem" });
      else if (event.type === "Liquidated") liquidationsTotal.inc();
    }
    totalDebtUnits.set(Number(ethers.formatEther(this.store.totalDebt())));
    this.logger.info(`${operation} committed (${events.map((e) => e.type).join(", ")})`);

    this.publish(events);
    return result;
  }

  private transact<T>(
    operation: EngineOperation,
    body: (tx: LedgerTransaction) => T
  ): { result: T; events: EngineEvent[] } {
    if (this.locked) {
      const err = new ReentrancyError(operation);
      this.recordAbort(operation, err);
      throw err;
    }

    const tx = this.store.begin();
    this.locked = true;
    try {
      this.oracle.openSession();
      const result = body(tx);
      const events = tx.commit((failed, err) =>
        this.logger.error(
          `${operation}: could not undo ${failed}: ${err instanceof Error ? err.message : String(err)}`
        )
      );
      this.oracle.closeSession(true);
      return { result, events };
    } catch (err) {
      this.oracle.closeSession(false);
      tx.discard();
      this.recordAbort(operation, err);
      throw err;
    } finally {
      this.locked = false;
    }
  }

  private recordAbort(operation: EngineOperation, err: unknown): void {
    const code = err instanceof EngineError ? err.code : "INTERNAL";
    const message = err instanceof Error ? err.message : String(err);
    operationsTotal.inc({ operation, status: "aborted" });
    operationErrorsTotal.inc({ code });
    this.logger.warn(`${operation} aborted [${code}]: ${message}`);
  }

  /**
   * Deliver committed events. State is already final here, so a throwing
   * listener is logged and does not turn the operation into a failure.
   */
  private publish(events: readonly EngineEvent[]): void {
    for (const event of events) {
      try {
        this.emitter.emit(event.type, event);
      } catch (err) {
        this.logger.error(
          `${event.type} listener threw: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    }
  }
}
