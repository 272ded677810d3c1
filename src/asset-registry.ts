/**
 * Ballast Engine - Collateral Asset Registry
 *
 * Ordered, immutable list of accepted collateral, fixed at construction.
 * Each entry binds an asset id to its price feed and its token.
 */

import { FEED_DECIMALS } from "./calculator";
import type { CollateralToken, PriceFeed } from "./collaborators";
import { ValidationError } from "./errors";
import type { Address } from "./types";
import { normalizeAddress } from "./utils";

export interface CollateralAsset {
  assetId: Address;
  priceFeed: PriceFeed;
  token: CollateralToken;
}

export class AssetRegistry {
  private readonly entries: ReadonlyMap<Address, CollateralAsset>;

  /**
   * @throws ValidationError on mismatched list lengths, an empty list, a
   * malformed or duplicate asset id, or a feed not reporting 8 decimals.
   */
  constructor(assetIds: readonly string[], priceFeeds: readonly PriceFeed[], tokens: readonly CollateralToken[]) {
    if (assetIds.length !== priceFeeds.length) {
      throw new ValidationError(
        "priceFeeds",
        `expected one feed per asset (${assetIds.length} assets, ${priceFeeds.length} feeds)`
      );
    }
    if (assetIds.length !== tokens.length) {
      throw new ValidationError(
        "collateralTokens",
        `expected one token per asset (${assetIds.length} assets, ${tokens.length} tokens)`
      );
    }
    if (assetIds.length === 0) {
      throw new ValidationError("collateralAssets", "at least one collateral asset is required");
    }

    const entries = new Map<Address, CollateralAsset>();
    assetIds.forEach((raw, i) => {
      const assetId = normalizeAddress(raw, `collateralAssets[${i}]`);
      if (entries.has(assetId)) {
        throw new ValidationError(`collateralAssets[${i}]`, `duplicate asset ${assetId}`);
      }
      if (priceFeeds[i].decimals !== FEED_DECIMALS) {
        throw new ValidationError(
          `priceFeeds[${i}]`,
          `feed must report ${FEED_DECIMALS} decimals, got ${priceFeeds[i].decimals}`
        );
      }
      entries.set(assetId, { assetId, priceFeed: priceFeeds[i], token: tokens[i] });
    });
    this.entries = entries;
  }

  /** Registered asset ids in construction order */
  assetIds(): Address[] {
    return [...this.entries.keys()];
  }

  /**
   * Look up a registered asset. `asset` may be in any letter case.
   * @throws ValidationError if the asset is malformed or not registered
   */
  require(asset: string): CollateralAsset {
    const assetId = normalizeAddress(asset, "asset");
    const entry = this.entries.get(assetId);
    if (!entry) {
      throw new ValidationError("asset", `${assetId} is not a registered collateral asset`);
    }
    return entry;
  }
}
