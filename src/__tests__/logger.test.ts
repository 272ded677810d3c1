/**
 * Module Logger Tests
 */

import { createModuleLogger } from "../logger";

describe("createModuleLogger", () => {
  it("should take its level from the settings", () => {
    const logger = createModuleLogger("ENGINE", { logLevel: "debug", environment: "production" });
    expect(logger.level).toBe("debug");
  });

  it("should be silent in the test environment", () => {
    expect(createModuleLogger("ENGINE", { logLevel: "info", environment: "test" }).silent).toBe(true);
  });

  // Jest runs with NODE_ENV=test; the settings decide, not the process
  it("should log outside the test environment", () => {
    expect(createModuleLogger("ENGINE", { logLevel: "info", environment: "production" }).silent).toBe(false);
  });
});
