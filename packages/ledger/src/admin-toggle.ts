/**
 * @lockbox/ledger: Owner-controlled pause switch.
 *
 * While paused, deposit, withdrawAll and removeAsset fail with
 * SYSTEM_PAUSED before touching any state. Queries are unaffected.
 */

import type { PauseSwitch } from "./types.js";
import { CustodyError } from "./types.js";

export interface AdminToggleOptions {
  readonly paused?: boolean | undefined;
}

export class AdminToggle implements PauseSwitch {
  readonly ownerId: string;
  private _paused: boolean;

  constructor(ownerId: string, options?: AdminToggleOptions) {
    this.ownerId = ownerId;
    this._paused = options?.paused ?? false;
  }

  isPaused(): boolean {
    return this._paused;
  }

  pause(actor: string): void {
    this._assertOwner(actor);
    this._paused = true;
  }

  unpause(actor: string): void {
    this._assertOwner(actor);
    this._paused = false;
  }

  private _assertOwner(actor: string): void {
    if (actor !== this.ownerId) {
      throw new CustodyError(
        "UNAUTHORIZED",
        `"${actor}" is not the custody owner`,
      );
    }
  }
}

/** A switch that is never paused. */
export const NEVER_PAUSED: PauseSwitch = { isPaused: () => false };

export function assertNotPaused(pause: PauseSwitch): void {
  if (pause.isPaused()) {
    throw new CustodyError("SYSTEM_PAUSED", "Custody operations are paused");
  }
}
