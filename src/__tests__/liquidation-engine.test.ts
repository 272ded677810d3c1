/**
 * Liquidation Tests
 * Eligibility, seize math, partial cover and rollback paths
 */

import { MAX_HEALTH_FACTOR } from "../calculator";
import {
  ExternalTransferFailure,
  InsufficientFunds,
  LiquidationIneffective,
  LiquidationNotEligible,
  SolvencyViolation,
  StaleOracleData,
  ValidationError,
} from "../errors";
import { captureError, CUSTODY, deployEngineFixture, fund, LIQUIDATOR, NOW, units, USER, WBTC, WETH } from "./helpers/fixture";

/** $1.80 */
const CRASHED_ETH = 180_000_000n;

describe("Liquidation", () => {
  let f: ReturnType<typeof deployEngineFixture>;

  /** USER: 10 WETH backing 10 debt */
  function openSmallPosition(): void {
    fund(f.weth, USER, units(10));
    f.engine.depositAndMint(USER, WETH, units(10), units(10));
  }

  function fundLiquidator(amount: bigint): void {
    fund(f.debtToken, LIQUIDATOR, amount);
  }

  beforeEach(() => {
    f = deployEngineFixture();
  });

  describe("eligibility", () => {
    it("should report a health factor of 1000 at $2000", () => {
      openSmallPosition();
      expect(f.engine.getHealthFactor(USER)).toBe(units(1_000));
    });

    it("should report a health factor of 9 at $18", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(18n * 10n ** 8n);
      expect(f.engine.getHealthFactor(USER)).toBe(units(9));
    });

    it("should refuse to liquidate a healthy account", () => {
      openSmallPosition();
      fundLiquidator(units(10));
      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10)));
      expect(err).toBeInstanceOf(LiquidationNotEligible);
      expect(err).toMatchObject({ target: USER, healthFactor: units(1_000) });
    });

    it("should refuse to liquidate an account at exactly the minimum", () => {
      fund(f.weth, USER, units(10));
      f.engine.depositAndMint(USER, WETH, units(10), units(10_000));
      fundLiquidator(units(100));
      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(100))).toThrow(LiquidationNotEligible);
    });

    it("should check eligibility before the amount", () => {
      openSmallPosition();
      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, 0n)).toThrow(LiquidationNotEligible);

      f.ethFeed.setAnswer(CRASHED_ETH);
      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, 0n));
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({ field: "debtToCover" });
    });
  });

  describe("full liquidation at $1.80", () => {
    beforeEach(() => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(10));
      f.events.length = 0;
    });

    it("should start from a health factor of 0.9", () => {
      expect(f.engine.getHealthFactor(USER)).toBe(9n * 10n ** 17n);
    });

    it("should seize the debt's worth plus 10% and clear the debt", () => {
      const result = f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10));

      expect(result).toEqual({
        seizedBase: 5_555_555_555_555_555_555n,
        bonus: 555_555_555_555_555_555n,
        totalSeized: 6_111_111_111_111_111_110n,
        asset: WETH,
        target: USER,
        liquidator: LIQUIDATOR,
        debtCovered: units(10),
        startHealthFactor: 9n * 10n ** 17n,
        endHealthFactor: MAX_HEALTH_FACTOR,
      });
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(3_888_888_888_888_888_890n);
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(0n);
      expect(f.weth.balanceOf(LIQUIDATOR)).toBe(6_111_111_111_111_111_110n);
      expect(f.debtToken.balanceOf(LIQUIDATOR)).toBe(0n);
      expect(f.debtToken.totalSupply).toBe(units(10));
    });

    it("should emit redemption, burn and liquidation events in order", () => {
      f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10));

      expect(f.events).toEqual([
        { type: "CollateralRedeemed", from: USER, to: LIQUIDATOR, asset: WETH, amount: 6_111_111_111_111_111_110n },
        { type: "DebtBurned", onBehalfOf: USER, payer: LIQUIDATOR, amount: units(10) },
        {
          type: "Liquidated",
          liquidator: LIQUIDATOR,
          target: USER,
          asset: WETH,
          debtCovered: units(10),
          collateralSeized: 6_111_111_111_111_111_110n,
        },
      ]);
    });

    it("should refuse a second liquidation once the debt is gone", () => {
      f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10));
      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(1))).toThrow(LiquidationNotEligible);
    });

    it("should quote the same numbers without changing state", () => {
      expect(f.engine.previewLiquidation(WETH, USER, units(10))).toEqual({
        seizedBase: 5_555_555_555_555_555_555n,
        bonus: 555_555_555_555_555_555n,
        totalSeized: 6_111_111_111_111_111_110n,
        healthFactor: 9n * 10n ** 17n,
        liquidatable: true,
        collateralSufficient: true,
      });
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(units(10));
    });
  });

  describe("partial liquidation", () => {
    it("should raise the health factor to 1.25 covering half the debt", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(5));

      const result = f.engine.liquidate(LIQUIDATOR, WETH, USER, units(5));

      expect(result.totalSeized).toBe(3_055_555_555_555_555_554n);
      expect(result.endHealthFactor).toBe(125n * 10n ** 16n);
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(6_944_444_444_444_444_446n);
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(5));
    });
  });

  describe("dust cover", () => {
    it("should retire debt even when nothing is seized", () => {
      // 1e9 wei of WETH backing 1e12 wei of debt, exactly at the minimum at $2000
      fund(f.weth, USER, 1_000_000_000n);
      f.engine.depositAndMint(USER, WETH, 1_000_000_000n, 1_000_000_000_000n);
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(1n);
      f.events.length = 0;

      const result = f.engine.liquidate(LIQUIDATOR, WETH, USER, 1n);

      expect(result).toMatchObject({
        seizedBase: 0n,
        bonus: 0n,
        totalSeized: 0n,
        startHealthFactor: 900_000_000_000_000n,
        endHealthFactor: 900_000_000_000_900n,
      });
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(999_999_999_999n);
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(1_000_000_000n);
      expect(f.weth.balanceOf(CUSTODY)).toBe(1_000_000_000n);
      expect(f.events).toEqual([
        { type: "DebtBurned", onBehalfOf: USER, payer: LIQUIDATOR, amount: 1n },
        {
          type: "Liquidated",
          liquidator: LIQUIDATOR,
          target: USER,
          asset: WETH,
          debtCovered: 1n,
          collateralSeized: 0n,
        },
      ]);
    });
  });

  describe("rollback", () => {
    it("should refuse a liquidation that leaves the target worse off", () => {
      fund(f.weth, USER, units(10));
      f.engine.depositAndMint(USER, WETH, units(10), units(10_000));
      f.ethFeed.setAnswer(1000n * 10n ** 8n);
      fundLiquidator(units(1_000));
      f.events.length = 0;

      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(1_000)));
      expect(err).toBeInstanceOf(LiquidationIneffective);
      expect(err).toMatchObject({
        startHealthFactor: 5n * 10n ** 17n,
        endHealthFactor: 494_444_444_444_444_444n,
      });
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(units(10));
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(10_000));
      expect(f.debtToken.balanceOf(LIQUIDATOR)).toBe(units(1_000));
      expect(f.weth.balanceOf(LIQUIDATOR)).toBe(0n);
      expect(f.events).toEqual([]);
    });

    it("should refuse to seize an asset the target does not hold enough of", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(10));

      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WBTC, USER, units(10)));
      expect(err).toBeInstanceOf(InsufficientFunds);
      expect(err).toMatchObject({
        account: USER,
        balanceOf: WBTC,
        requested: 366_666_666_666_666n,
        available: 0n,
      });
    });

    it("should hand over no collateral when the liquidator's tokens cannot be pulled", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      f.debtToken.faucet(LIQUIDATOR, units(10));

      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10))).toThrow(ExternalTransferFailure);
      expect(f.weth.balanceOf(LIQUIDATOR)).toBe(0n);
      expect(f.engine.getCollateralBalanceOfUser(USER, WETH)).toBe(units(10));
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(10));
    });

    it("should refuse a liquidator whose own position is unhealthy", () => {
      openSmallPosition();
      fund(f.weth, LIQUIDATOR, units(1));
      f.engine.depositAndMint(LIQUIDATOR, WETH, units(1), units(1_000));
      f.ethFeed.setAnswer(CRASHED_ETH);
      f.debtToken.approve(LIQUIDATOR, units(10));

      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10)));
      expect(err).toBeInstanceOf(SolvencyViolation);
      expect(err).toMatchObject({ account: LIQUIDATOR, healthFactor: 900_000_000_000_000n });
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(10));
    });

    it("should leave collateral in custody when the debt burn fails", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(10));
      f.debtToken.failing.add("burn");
      f.events.length = 0;

      const err = captureError(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10)));
      expect(err).toBeInstanceOf(ExternalTransferFailure);
      expect(err).toMatchObject({ message: "debtToken.burn failed: bUSD: burn reverted" });

      expect(f.weth.balanceOf(CUSTODY)).toBe(f.engine.getTotalCollateral(WETH));
      expect(f.weth.balanceOf(CUSTODY)).toBe(units(10));
      expect(f.weth.balanceOf(LIQUIDATOR)).toBe(0n);
      expect(f.debtToken.balanceOf(LIQUIDATOR)).toBe(units(10));
      expect(f.debtToken.balanceOf(CUSTODY)).toBe(0n);
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(10));
      expect(f.events).toEqual([]);
    });

    it("should restore the burn and refund the liquidator when the collateral transfer fails", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(10));
      f.weth.failing.add("transfer");

      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10))).toThrow(ExternalTransferFailure);
      expect(f.weth.balanceOf(CUSTODY)).toBe(f.engine.getTotalCollateral(WETH));
      expect(f.debtToken.balanceOf(LIQUIDATOR)).toBe(units(10));
      expect(f.debtToken.balanceOf(CUSTODY)).toBe(0n);
      expect(f.debtToken.totalSupply).toBe(units(20));
      expect(f.engine.getAccountInformation(USER).debtMinted).toBe(units(10));
    });

    it("should refuse to liquidate on a stale price", () => {
      openSmallPosition();
      f.ethFeed.setAnswer(CRASHED_ETH);
      fundLiquidator(units(10));
      f.setNow(NOW + 10_801);

      expect(() => f.engine.liquidate(LIQUIDATOR, WETH, USER, units(10))).toThrow(StaleOracleData);
    });
  });
});
