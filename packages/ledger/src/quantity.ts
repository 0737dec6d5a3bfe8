/**
 * @lockbox/ledger: Base-unit quantities.
 *
 * Quantities are unsigned integers in an asset's smallest unit.
 * bigint in memory; decimal strings on the wire.
 */

import { isQuantityString } from "@lockbox/types";
import { CustodyError } from "./types.js";

/**
 * Parse a decimal integer string into a quantity.
 *
 * "1500" → 1500n. Signs, fractions and exponents are rejected.
 */
export function parseQuantity(raw: string): bigint {
  if (!isQuantityString(raw)) {
    throw new CustodyError("INVALID_AMOUNT", `Invalid quantity: "${raw}"`);
  }
  return BigInt(raw);
}

export function formatQuantity(quantity: bigint): string {
  return quantity.toString();
}
