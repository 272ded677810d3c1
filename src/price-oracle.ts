/**
 * Ballast Engine - Price Oracle Adapter
 *
 * Reads collateral prices through the registry's feeds and refuses to value
 * anything with a price it cannot trust:
 *   - updatedAt is zero, or older than maxPriceAgeSeconds
 *   - the answer was carried over from an earlier round (answeredInRound < roundId)
 *   - the feed reports a round older than one this adapter has already seen
 *   - the answer is zero or negative
 *
 * Valid 8-decimal prices are lifted to 18 decimals before any conversion.
 *
 * Rounds are only remembered for operations that commit: the engine opens a
 * session around each operation and closes it with the outcome. Reads
 * outside a session are checked against the remembered rounds but never
 * change them.
 */

import type { AssetRegistry } from "./asset-registry";
import {
  calculateAssetAmountFromUsd,
  calculateUsdValue,
  normalizePrice,
} from "./calculator";
import type { RoundData } from "./collaborators";
import { EngineError, StaleOracleData } from "./errors";
import type { Address, Amount, Clock, NormalizedPrice, RawPrice, UsdValue } from "./types";

export interface OraclePrice {
  price: RawPrice;
  updatedAt: bigint;
  roundId: bigint;
}

export interface PriceOracleOptions {
  maxPriceAgeSeconds: number;
  clock: Clock;
}

/**
 * True if an answer last updated at `updatedAt` is too old at `now`.
 * An answer exactly `maxAgeSeconds` old is still fresh.
 */
export function isPriceStale(updatedAt: bigint, now: number, maxAgeSeconds: number): boolean {
  if (updatedAt === 0n) return true;
  return BigInt(now) - updatedAt > BigInt(maxAgeSeconds);
}

export class PriceOracleAdapter {
  /** Highest round observed per asset by a committed operation, to catch a feed that rewinds */
  private readonly latestRounds = new Map<Address, bigint>();
  /** Rounds observed by the operation in flight */
  private pendingRounds: Map<Address, bigint> | null = null;

  constructor(
    private readonly registry: AssetRegistry,
    private readonly options: PriceOracleOptions
  ) {}

  /**
   * Latest validated price of `asset` in 8 decimals.
   * @throws StaleOracleData if the feed fails any freshness or consistency check
   */
  getPrice(asset: Address): OraclePrice {
    const { assetId, priceFeed } = this.registry.require(asset);

    let round: RoundData;
    try {
      round = priceFeed.latestRoundData();
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new StaleOracleData(assetId, "feed read failed", err);
    }

    const { roundId, answer, updatedAt, answeredInRound } = round;
    const now = this.options.clock();

    if (isPriceStale(updatedAt, now, this.options.maxPriceAgeSeconds)) {
      throw new StaleOracleData(
        assetId,
        `last update at ${updatedAt} is older than ${this.options.maxPriceAgeSeconds}s (now ${now})`
      );
    }
    if (answeredInRound < roundId) {
      throw new StaleOracleData(assetId, `round ${roundId} answered in earlier round ${answeredInRound}`);
    }
    const seen = this.pendingRounds?.get(assetId) ?? this.latestRounds.get(assetId);
    if (seen !== undefined && roundId < seen) {
      throw new StaleOracleData(assetId, `round ${roundId} is behind previously observed round ${seen}`);
    }
    if (answer <= 0n) {
      throw new StaleOracleData(assetId, `non-positive answer ${answer}`);
    }

    this.pendingRounds?.set(assetId, roundId);
    return { price: answer, updatedAt, roundId };
  }

  /** Start buffering the rounds observed by one operation. */
  openSession(): void {
    if (this.pendingRounds) {
      throw new Error("PriceOracleAdapter: a session is already open");
    }
    this.pendingRounds = new Map();
  }

  /** End the current session, keeping its observed rounds only if the operation committed. */
  closeSession(committed: boolean): void {
    if (committed && this.pendingRounds) {
      for (const [assetId, roundId] of this.pendingRounds) {
        this.latestRounds.set(assetId, roundId);
      }
    }
    this.pendingRounds = null;
  }

  normalizedPrice(asset: Address): NormalizedPrice {
    return normalizePrice(this.getPrice(asset).price);
  }

  usdValue(asset: Address, amount: Amount): UsdValue {
    return calculateUsdValue(amount, this.normalizedPrice(asset));
  }

  assetAmountFromUsd(asset: Address, usdAmount: UsdValue): Amount {
    return calculateAssetAmountFromUsd(usdAmount, this.normalizedPrice(asset));
  }
}
