/**
 * @lockbox/ledger: Per-account mutual exclusion.
 *
 * Deposit, withdrawal and removal each read state, await an external
 * transfer, then write state. Calls for one account are queued and run
 * one at a time for their full duration, transfer included; calls for
 * different accounts run independently.
 *
 * A call for an account made from inside that account's critical
 * section (a transfer port calling back into the ledger) would wait on
 * itself forever, so it is rejected with REENTRANT_CALL instead.
 *
 * The held set lives in AsyncLocalStorage, so callbacks a transfer
 * port schedules without awaiting (`setTimeout(() => custody.deposit(...))`)
 * inherit it. Such a callback is rejected with REENTRANT_CALL for the
 * held account even when it runs after the lock was released. A port
 * that needs to call back later must leave the context first, for
 * example through `AsyncLocalStorage.exit` or a queue drained outside
 * the ledger call.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type { AccountId } from "@lockbox/types";
import { CustodyError } from "./types.js";

export class AccountMutex {
  /** Completion of the last queued task, per account */
  private readonly _tails = new Map<AccountId, Promise<void>>();

  /** Accounts held by the current async call chain */
  private readonly _held = new AsyncLocalStorage<ReadonlySet<AccountId>>();

  /**
   * Run `task` while holding `account`'s lock.
   * The lock is released on every exit path.
   */
  async runExclusive<T>(account: AccountId, task: () => Promise<T>): Promise<T> {
    const held = this._held.getStore();
    if (held?.has(account) === true) {
      throw new CustodyError(
        "REENTRANT_CALL",
        `Reentrant call for account "${account}" while its operation is in progress`,
      );
    }

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this._tails.get(account) ?? Promise.resolve();
    const tail = previous.then(() => done);
    this._tails.set(account, tail);

    await previous;
    try {
      return await this._held.run(new Set([...(held ?? []), account]), task);
    } finally {
      release();
      if (this._tails.get(account) === tail) {
        this._tails.delete(account);
      }
    }
  }
}
