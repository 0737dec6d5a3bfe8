/**
 * Identifier Types
 *
 * Accounts and assets are identified by opaque, stable strings
 * (an address, a token symbol, a UUID, whatever the host uses).
 */

/** Identifier of an account holding a lock cycle. */
export type AccountId = string;

/** Identifier of a fungible asset class (e.g., a token contract address). */
export type AssetId = string;

const ZERO_HEX = /^0x0+$/i;

/**
 * Whether an asset identifier denotes "no asset":
 * the empty string or any 0x-prefixed all-zero hex string.
 */
export function isNullAsset(asset: AssetId): boolean {
  return asset.trim() === "" || ZERO_HEX.test(asset);
}
