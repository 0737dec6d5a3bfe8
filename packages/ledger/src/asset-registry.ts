/**
 * @lockbox/ledger: Per-account asset registry.
 *
 * Tracks, for each account, the ordered set of assets it has held.
 *
 * Rules:
 * - No duplicates; O(1) membership via an index map
 * - Removal swaps the target with the last entry and truncates, so
 *   enumeration order is NOT stable across removals
 * - Listings are copies; later mutations are not reflected
 */

import type { AccountId, AssetId } from "@lockbox/types";

interface RegistryEntry {
  readonly items: AssetId[];
  readonly index: Map<AssetId, number>;
}

export class AssetRegistry {
  private readonly _entries = new Map<AccountId, RegistryEntry>();

  /**
   * Append an asset to an account's registry.
   * Returns false (and changes nothing) if it is already present.
   */
  register(account: AccountId, asset: AssetId): boolean {
    let entry = this._entries.get(account);
    if (entry === undefined) {
      entry = { items: [], index: new Map() };
      this._entries.set(account, entry);
    }
    if (entry.index.has(asset)) {
      return false;
    }
    entry.index.set(asset, entry.items.length);
    entry.items.push(asset);
    return true;
  }

  /**
   * Remove an asset by swapping it with the last entry.
   * Returns whether it was present.
   */
  remove(account: AccountId, asset: AssetId): boolean {
    const entry = this._entries.get(account);
    const position = entry?.index.get(asset);
    if (entry === undefined || position === undefined) {
      return false;
    }

    const lastPosition = entry.items.length - 1;
    const last = entry.items[lastPosition];
    if (last !== undefined && position !== lastPosition) {
      entry.items[position] = last;
      entry.index.set(last, position);
    }
    entry.items.pop();
    entry.index.delete(asset);
    return true;
  }

  list(account: AccountId): readonly AssetId[] {
    return [...(this._entries.get(account)?.items ?? [])];
  }

  has(account: AccountId, asset: AssetId): boolean {
    return this._entries.get(account)?.index.has(asset) ?? false;
  }

  size(account: AccountId): number {
    return this._entries.get(account)?.items.length ?? 0;
  }
}
