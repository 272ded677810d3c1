/**
 * Ballast Engine - Prometheus Metrics
 *
 * Counters and gauges updated by the engine after each operation settles.
 * Naming convention:  synth_engine_<metric>_<unit>
 */

import { Counter, Gauge, Registry } from "prom-client";

/** Registry for everything the engine exports; scrape with register.metrics(). */
export const register = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

/** Top-level operations by outcome. */
export const operationsTotal = new Counter({
  name: "synth_engine_operations_total",
  help: "Total engine operations by name and outcome",
  labelNames: ["operation", "status"] as const, // status: committed | aborted
  registers: [register],
});

/** Aborted operations by error code. */
export const operationErrorsTotal = new Counter({
  name: "synth_engine_operation_errors_total",
  help: "Total aborted engine operations by error code",
  labelNames: ["code"] as const,
  registers: [register],
});

/** Committed collateral movements. */
export const collateralMovementsTotal = new Counter({
  name: "synth_engine_collateral_movements_total",
  help: "Total committed collateral deposits and withdrawals",
  labelNames: ["kind"] as const, // deposit | redeem
  registers: [register],
});

/** Committed liquidations. */
export const liquidationsTotal = new Counter({
  name: "synth_engine_liquidations_total",
  help: "Total committed liquidations",
  registers: [register],
});

// ============================================================
//  GAUGES
// ============================================================

/** Outstanding debt across all accounts, in whole debt units. */
export const totalDebtUnits = new Gauge({
  name: "synth_engine_total_debt_units",
  help: "Outstanding debt across all accounts (whole units)",
  registers: [register],
});
