/**
 * Ballast Engine
 *
 * Overcollateralized synthetic-dollar engine: collateral ledger, oracle
 * adapter, health factor, mint/burn and liquidation.
 */

export { StablecoinEngine, type EngineConfig, type EngineOperation } from "./stablecoin-engine";
export { AssetRegistry, type CollateralAsset } from "./asset-registry";
export { CollateralLedger } from "./collateral-ledger";
export { MintBurnController } from "./mint-burn-controller";
export {
  LiquidationEngine,
  type LiquidationQuote,
  type LiquidationResult,
} from "./liquidation-engine";
export { PriceOracleAdapter, isPriceStale, type OraclePrice, type PriceOracleOptions } from "./price-oracle";
export { LedgerStore, LedgerTransaction, type Interaction, type InteractionPhase, type LedgerView } from "./ledger-store";
export * from "./calculator";
export * from "./collaborators";
export * from "./errors";
export * from "./events";
export * from "./types";
export {
  DEFAULT_MAX_PRICE_AGE_SECONDS,
  DEFAULT_SETTINGS,
  loadSettings,
  readSettings,
  validateSettings,
  type EngineSettings,
} from "./config";
export { register as metricsRegistry } from "./metrics";
export {
  formatHealthFactor,
  formatPositionReport,
  scanPositions,
  type CollateralHolding,
  type PositionInfo,
  type PositionScan,
  type PositionScanFailure,
} from "./monitor";
