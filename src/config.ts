/**
 * Ballast Engine - Configuration
 *
 * Runtime settings read from environment variables with sensible defaults.
 * Construction-time wiring (assets, feeds, tokens) is passed to the engine
 * directly; see EngineConfig in stablecoin-engine.ts.
 */

import * as dotenv from "dotenv";
import { ValidationError } from "./errors";

export interface EngineSettings {
  /** Max seconds since a feed's last update before its price is rejected */
  maxPriceAgeSeconds: number;
  /** winston level: error | warn | info | debug */
  logLevel: string;
  /** Environment: production | staging | development | test (test silences logging) */
  environment: string;
}

/** Three hours, the heartbeat headroom used for USD feeds */
export const DEFAULT_MAX_PRICE_AGE_SECONDS = 3 * 60 * 60;

const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

/**
 * Build settings from an environment map. Unset or empty variables fall back
 * to the defaults.
 */
export function readSettings(env: NodeJS.ProcessEnv): EngineSettings {
  return {
    maxPriceAgeSeconds: env.ENGINE_MAX_PRICE_AGE_SECONDS
      ? Number(env.ENGINE_MAX_PRICE_AGE_SECONDS)
      : DEFAULT_MAX_PRICE_AGE_SECONDS,
    logLevel: env.LOG_LEVEL || "info",
    environment: env.NODE_ENV || "development",
  };
}

export const DEFAULT_SETTINGS: EngineSettings = readSettings(process.env);

/**
 * Load settings, reading `envFile` (default ./.env) first. Variables already
 * present in the process environment take precedence over the file.
 */
export function loadSettings(envFile?: string): EngineSettings {
  dotenv.config({ path: envFile });
  const settings = readSettings(process.env);
  validateSettings(settings);
  return settings;
}

/**
 * Throws ValidationError if a setting is out of range.
 */
export function validateSettings(settings: EngineSettings): void {
  if (!Number.isInteger(settings.maxPriceAgeSeconds) || settings.maxPriceAgeSeconds <= 0) {
    throw new ValidationError(
      "maxPriceAgeSeconds",
      `must be a positive whole number of seconds, got ${settings.maxPriceAgeSeconds}`
    );
  }
  if (!LOG_LEVELS.includes(settings.logLevel)) {
    throw new ValidationError("logLevel", `unknown level "${settings.logLevel}"`);
  }
}
