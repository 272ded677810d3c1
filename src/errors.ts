/**
 * Ballast Engine - Error Types
 *
 * Every failure aborts the whole top-level operation. Callers can branch on
 * `instanceof` or on the stable `code`.
 */

import type { Address, Amount, HealthFactor } from "./types";

export type EngineErrorCode =
  | "VALIDATION"
  | "INSUFFICIENT_FUNDS"
  | "EXTERNAL_TRANSFER_FAILURE"
  | "SOLVENCY_VIOLATION"
  | "STALE_ORACLE_DATA"
  | "LIQUIDATION_NOT_ELIGIBLE"
  | "LIQUIDATION_INEFFECTIVE"
  | "REENTRANT_CALL";

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}

export class ValidationError extends EngineError {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super("VALIDATION", `Invalid ${field}: ${reason}`);
    this.name = "ValidationError";
  }
}

export class InsufficientFunds extends EngineError {
  constructor(
    public readonly account: Address,
    /** Collateral asset, or "debt" for the debt ledger */
    public readonly balanceOf: string,
    public readonly requested: Amount,
    public readonly available: Amount
  ) {
    super(
      "INSUFFICIENT_FUNDS",
      `Insufficient ${balanceOf} balance for ${account}: requested ${requested}, available ${available}`
    );
    this.name = "InsufficientFunds";
  }
}

export class ExternalTransferFailure extends EngineError {
  constructor(
    public readonly operation: string,
    detail: string,
    cause?: unknown
  ) {
    super("EXTERNAL_TRANSFER_FAILURE", `${operation} failed: ${detail}`, { cause });
    this.name = "ExternalTransferFailure";
  }
}

export class SolvencyViolation extends EngineError {
  constructor(
    public readonly account: Address,
    public readonly healthFactor: HealthFactor
  ) {
    super("SOLVENCY_VIOLATION", `Health factor of ${account} would fall to ${healthFactor}`);
    this.name = "SolvencyViolation";
  }
}

export class StaleOracleData extends EngineError {
  constructor(
    public readonly asset: Address,
    public readonly reason: string,
    cause?: unknown
  ) {
    super("STALE_ORACLE_DATA", `Price feed for ${asset} rejected: ${reason}`, { cause });
    this.name = "StaleOracleData";
  }
}

export class LiquidationNotEligible extends EngineError {
  constructor(
    public readonly target: Address,
    public readonly healthFactor: HealthFactor
  ) {
    super("LIQUIDATION_NOT_ELIGIBLE", `${target} is healthy (health factor ${healthFactor})`);
    this.name = "LiquidationNotEligible";
  }
}

export class LiquidationIneffective extends EngineError {
  constructor(
    public readonly target: Address,
    public readonly startHealthFactor: HealthFactor,
    public readonly endHealthFactor: HealthFactor
  ) {
    super(
      "LIQUIDATION_INEFFECTIVE",
      `Liquidation of ${target} did not improve health factor (${startHealthFactor} -> ${endHealthFactor})`
    );
    this.name = "LiquidationIneffective";
  }
}

export class ReentrancyError extends EngineError {
  constructor(public readonly operation: string) {
    super("REENTRANT_CALL", `Re-entrant call to ${operation} while another operation is in flight`);
    this.name = "ReentrancyError";
  }
}
