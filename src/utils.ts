/**
 * Shared input checks for the engine's public surface.
 */

import { ethers } from "ethers";
import { ValidationError } from "./errors";
import type { Address, Amount } from "./types";

/**
 * Normalize a hex address to its checksum form so that differently-cased
 * inputs name the same account or asset.
 */
export function normalizeAddress(value: string, field: string): Address {
  if (!ethers.isAddress(value)) {
    throw new ValidationError(field, `"${value}" is not a 20-byte hex address`);
  }
  return ethers.getAddress(value);
}

export function requirePositive(amount: Amount, field: string): void {
  if (amount <= 0n) {
    throw new ValidationError(field, `must be greater than zero, got ${amount}`);
  }
}
