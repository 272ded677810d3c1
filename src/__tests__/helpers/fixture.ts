import { ethers } from "ethers";
import type { EngineEvent } from "../../events";
import { StablecoinEngine } from "../../stablecoin-engine";
import { MockAggregatorV3, MockERC20 } from "./mocks";

/** Fixed "now" for every feed and the engine clock, in seconds */
export const NOW = 1_700_000_000;

// Digit-only addresses are their own checksum form.
export const CUSTODY = "0x" + "1".repeat(40);
export const WETH = "0x" + "2".repeat(40);
export const WBTC = "0x" + "3".repeat(40);
export const USER = "0x" + "4".repeat(40);
export const LIQUIDATOR = "0x" + "5".repeat(40);
export const OTHER = "0x" + "6".repeat(40);

/** $2000.00000000 */
export const ETH_USD = 2000n * 10n ** 8n;
/** $30000.00000000 */
export const BTC_USD = 30_000n * 10n ** 8n;

export const units = (value: string | number): bigint => ethers.parseEther(String(value));

/** Faucet `amount` to `owner` and authorize the engine to pull it. */
export function fund(token: MockERC20, owner: string, amount: bigint): void {
  token.faucet(owner, amount);
  token.approve(owner, (token.allowances.get(owner) ?? 0n) + amount);
}

export function deployEngineFixture() {
  const weth = new MockERC20("WETH", CUSTODY);
  const wbtc = new MockERC20("WBTC", CUSTODY);
  const debtToken = new MockERC20("bUSD", CUSTODY);
  const ethFeed = new MockAggregatorV3(ETH_USD, BigInt(NOW));
  const btcFeed = new MockAggregatorV3(BTC_USD, BigInt(NOW));

  let now = NOW;
  const engine = new StablecoinEngine({
    custody: CUSTODY,
    collateralAssets: [WETH, WBTC],
    priceFeeds: [ethFeed, btcFeed],
    collateralTokens: [weth, wbtc],
    debtToken,
    clock: () => now,
  });

  const events: EngineEvent[] = [];
  const record = (event: EngineEvent) => events.push(event);
  engine
    .on("CollateralDeposited", record)
    .on("CollateralRedeemed", record)
    .on("DebtMinted", record)
    .on("DebtBurned", record)
    .on("Liquidated", record);

  return {
    engine,
    weth,
    wbtc,
    debtToken,
    ethFeed,
    btcFeed,
    events,
    setNow: (seconds: number) => {
      now = seconds;
    },
  };
}

/** Run `fn` and return what it threw; fails the test if it returns normally. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
