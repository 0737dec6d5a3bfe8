/**
 * The custody walkthrough, as a list of transcript lines.
 *
 * Runs one holder through a full lock cycle against the real ledger,
 * event store and development bank on a manual clock:
 * deposit -> refused early withdrawal -> partial failure -> retry ->
 * re-arm -> forfeit -> verify the event chain.
 */

import { InMemoryEventStore } from "@lockbox/event-store";
import {
  AdminToggle,
  Custody,
  CustodyError,
  InMemoryAssetBank,
  ManualClock,
  authorizeTransfer,
  formatQuantity,
} from "@lockbox/ledger";
import type { AccountId, AssetId } from "@lockbox/types";

// =============================================================================
// Transcript
// =============================================================================

export type DemoLine =
  | { readonly kind: "step"; readonly step: number; readonly title: string }
  | { readonly kind: "ok"; readonly message: string }
  | { readonly kind: "info"; readonly label: string; readonly value: string }
  | { readonly kind: "warn"; readonly message: string };

export const TOTAL_STEPS = 7;

export const DEMO_CUSTODY_ID = "lockbox-demo";
export const DEMO_START = 1_700_000_000;
export const DEMO_HOLDER = "alice";
export const DEMO_USDC = "0x00000000000000000000000000000000000000aa";
export const DEMO_WETH = "0x00000000000000000000000000000000000000bb";

const SECRET = "demo-secret";
const DAY = 86_400;
const HOUR = 3_600;

class Transcript {
  readonly lines: DemoLine[] = [];

  step(step: number, title: string): void {
    this.lines.push({ kind: "step", step, title });
  }

  ok(message: string): void {
    this.lines.push({ kind: "ok", message });
  }

  info(label: string, value: string | number | bigint | boolean): void {
    this.lines.push({ kind: "info", label, value: String(value) });
  }

  warn(message: string): void {
    this.lines.push({ kind: "warn", message });
  }
}

// =============================================================================
// Walkthrough
// =============================================================================

export async function runWalkthrough(): Promise<readonly DemoLine[]> {
  const out = new Transcript();

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  out.step(1, "Boot");

  const clock = new ManualClock(DEMO_START);
  const events = new InMemoryEventStore();
  const toggle = new AdminToggle("operator");
  const bank = new InMemoryAssetBank({ custodyId: DEMO_CUSTODY_ID, signingSecret: SECRET, clock });
  const custody = new Custody({
    custodyId: DEMO_CUSTODY_ID,
    transfers: bank,
    events,
    clock,
    pause: toggle,
  });
  bank.mint(DEMO_USDC, DEMO_HOLDER, 1_000n);
  bank.mint(DEMO_WETH, DEMO_HOLDER, 5n);
  out.ok(`Custody "${DEMO_CUSTODY_ID}" ready, ${DEMO_HOLDER} funded in the bank`);

  let nonce = 0;
  const deposit = (account: AccountId, asset: AssetId, quantity: bigint, lockPeriod: number) => {
    nonce++;
    return custody.deposit({
      account,
      asset,
      lockPeriod,
      quantity,
      authorization: authorizeTransfer(
        {
          asset,
          amount: formatQuantity(quantity),
          owner: account,
          nonce: `demo-${nonce}`,
          deadline: clock.now() + 600,
          spender: DEMO_CUSTODY_ID,
        },
        SECRET,
      ),
    });
  };

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  out.step(2, "Deposit");

  const first = await deposit(DEMO_HOLDER, DEMO_USDC, 400n, DAY);
  out.ok(`Deposited 400 USDC, account created: ${first.created}`);
  const second = await deposit(DEMO_HOLDER, DEMO_WETH, 5n, 0);
  out.ok(`Deposited 5 WETH under the same lock`);
  out.info("unlock time", second.unlockTime);
  out.info("assets held", custody.getLockState(DEMO_HOLDER)?.nonZeroAssetCount ?? 0);

  // ─── Step 3: Early Withdrawal ───────────────────────────────────────

  out.step(3, "Early Withdrawal");

  try {
    await custody.withdrawAll(DEMO_HOLDER);
    out.warn("Withdrawal went through before the unlock time");
  } catch (err) {
    if (!(err instanceof CustodyError)) {
      throw err;
    }
    out.ok(`Refused with ${err.code}`);
  }

  // ─── Step 4: Partial Failure ────────────────────────────────────────

  out.step(4, "Withdraw With One Asset Blocked");

  clock.advance(DAY);
  bank.block(DEMO_WETH, DEMO_HOLDER);
  for (const outcome of await custody.withdrawAll(DEMO_HOLDER)) {
    if (outcome.status === "withdrawn") {
      out.ok(`${formatQuantity(outcome.amount)} of ${outcome.asset} returned`);
    } else {
      out.warn(`${formatQuantity(outcome.amount)} of ${outcome.asset} kept: ${outcome.reason}`);
    }
  }
  out.info("WETH balance", custody.balanceOf(DEMO_HOLDER, DEMO_WETH));

  // ─── Step 5: Retry ──────────────────────────────────────────────────

  out.step(5, "Retry");

  bank.unblock(DEMO_WETH, DEMO_HOLDER);
  const retry = await custody.withdrawAll(DEMO_HOLDER);
  out.ok(`${retry.length} asset(s) returned on retry`);
  out.info("holder WETH", bank.balanceOf(DEMO_WETH, DEMO_HOLDER));

  // ─── Step 6: Re-arm and Forfeit ─────────────────────────────────────

  out.step(6, "Re-arm and Forfeit");

  const rearm = await deposit(DEMO_HOLDER, DEMO_USDC, 100n, HOUR);
  out.info("rearmed", rearm.rearmed);
  out.info("unlock time", rearm.unlockTime);
  const removal = await custody.removeAsset(DEMO_HOLDER, DEMO_USDC);
  out.ok(`Removed USDC, ${formatQuantity(removal.amount)} forfeited to custody`);
  out.info("total forfeited", custody.totalForfeited(DEMO_USDC));

  // ─── Step 7: Event Log ──────────────────────────────────────────────

  out.step(7, "Event Log");

  for (const stored of custody.readAccountEvents(DEMO_HOLDER)) {
    out.info(`v${stored.version}`, stored.event.type);
  }
  const integrity = events.verifyIntegrity();
  if (integrity.valid) {
    out.ok(`Hash chain intact over ${events.globalPosition()} events`);
  } else {
    out.warn(`Hash chain broken: ${integrity.errors.length} error(s)`);
  }

  return out.lines;
}
