/**
 * Engine Configuration Tests
 * Environment parsing, defaults and range checks
 */

import * as path from "path";
import {
  DEFAULT_MAX_PRICE_AGE_SECONDS,
  loadSettings,
  readSettings,
  validateSettings,
  type EngineSettings,
} from "../config";
import { ValidationError } from "../errors";
import { captureError } from "./helpers/fixture";

const fixture = (name: string) => path.join(__dirname, "fixtures", name);

describe("Engine configuration", () => {
  describe("readSettings", () => {
    it("should fall back to defaults for an empty environment", () => {
      expect(readSettings({})).toEqual({
        maxPriceAgeSeconds: DEFAULT_MAX_PRICE_AGE_SECONDS,
        logLevel: "info",
        environment: "development",
      });
    });

    it("should default to a three hour price age", () => {
      expect(DEFAULT_MAX_PRICE_AGE_SECONDS).toBe(10_800);
    });

    it("should read every variable", () => {
      expect(
        readSettings({ ENGINE_MAX_PRICE_AGE_SECONDS: "3600", LOG_LEVEL: "debug", NODE_ENV: "production" })
      ).toEqual({ maxPriceAgeSeconds: 3600, logLevel: "debug", environment: "production" });
    });

    it("should treat empty variables as unset", () => {
      expect(readSettings({ ENGINE_MAX_PRICE_AGE_SECONDS: "", LOG_LEVEL: "" })).toMatchObject({
        maxPriceAgeSeconds: DEFAULT_MAX_PRICE_AGE_SECONDS,
        logLevel: "info",
      });
    });
  });

  describe("validateSettings", () => {
    const valid: EngineSettings = { maxPriceAgeSeconds: 60, logLevel: "warn", environment: "test" };

    it("should accept valid settings", () => {
      expect(() => validateSettings(valid)).not.toThrow();
    });

    for (const bad of [0, -5, 1.5, Number.NaN]) {
      it(`should reject a max price age of ${bad}`, () => {
        const err = captureError(() => validateSettings({ ...valid, maxPriceAgeSeconds: bad }));
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({ field: "maxPriceAgeSeconds" });
      });
    }

    it("should reject an unknown log level", () => {
      const err = captureError(() => validateSettings({ ...valid, logLevel: "loud" }));
      expect(err).toMatchObject({ field: "logLevel", reason: 'unknown level "loud"' });
    });
  });

  describe("loadSettings", () => {
    const saved = process.env.ENGINE_MAX_PRICE_AGE_SECONDS;

    beforeEach(() => {
      delete process.env.ENGINE_MAX_PRICE_AGE_SECONDS;
    });

    afterAll(() => {
      if (saved === undefined) delete process.env.ENGINE_MAX_PRICE_AGE_SECONDS;
      else process.env.ENGINE_MAX_PRICE_AGE_SECONDS = saved;
    });

    it("should read variables from an env file", () => {
      expect(loadSettings(fixture("engine.env")).maxPriceAgeSeconds).toBe(3600);
    });

    it("should let the process environment win over the file", () => {
      process.env.ENGINE_MAX_PRICE_AGE_SECONDS = "600";
      expect(loadSettings(fixture("engine.env")).maxPriceAgeSeconds).toBe(600);
    });

    it("should validate what it loads", () => {
      const err = captureError(() => loadSettings(fixture("invalid.env")));
      expect(err).toMatchObject({ field: "maxPriceAgeSeconds" });
    });
  });
});
