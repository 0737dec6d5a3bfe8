/**
 * Tests for the global and per-account event feeds.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { USDC, WETH, createTestApp, fundAndDeposit } from "../setup.js";
import type { TestApp } from "../setup.js";

interface EventPage {
  data: { streamId: string; version: number; globalPosition: number; event: { type: string } }[];
  pagination: { next: number | null; hasMore: boolean };
}

let test: TestApp;

beforeEach(async () => {
  test = createTestApp();
  await fundAndDeposit(test, "alice", USDC, "100", 3_600);
  await fundAndDeposit(test, "bob", WETH, "5", 3_600);
});

describe("GET /api/v1/events", () => {
  it("lists the global log in order", async () => {
    const res = await test.app.request("/api/v1/events");
    const body = (await res.json()) as EventPage;

    expect(res.status).toBe(200);
    expect(body.data.map((e) => [e.globalPosition, e.event.type])).toEqual([
      [1, "account.created"],
      [2, "asset.deposited"],
      [3, "account.created"],
      [4, "asset.deposited"],
    ]);
    expect(body.pagination).toEqual({ next: null, hasMore: false });
  });

  it("pages by position", async () => {
    const first = (await (await test.app.request("/api/v1/events?limit=3")).json()) as EventPage;
    expect(first.data).toHaveLength(3);
    expect(first.pagination).toEqual({ next: 3, hasMore: true });

    const second = (await (
      await test.app.request("/api/v1/events?limit=3&afterPosition=3")
    ).json()) as EventPage;
    expect(second.data.map((e) => e.globalPosition)).toEqual([4]);
    expect(second.pagination).toEqual({ next: null, hasMore: false });
  });

  it("filters by event type", async () => {
    const res = await test.app.request("/api/v1/events?type=asset.deposited");
    const body = (await res.json()) as EventPage;

    expect(body.data.map((e) => e.streamId)).toEqual(["account-alice", "account-bob"]);
  });

  it("rejects unknown event types", async () => {
    const res = await test.app.request("/api/v1/events?type=account.deleted");

    expect(res.status).toBe(400);
  });

  it("rejects a limit above 100", async () => {
    const res = await test.app.request("/api/v1/events?limit=101");

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/accounts/:account/events", () => {
  it("lists one account's stream by version", async () => {
    const res = await test.app.request("/api/v1/accounts/bob/events");
    const body = (await res.json()) as EventPage;

    expect(body.data.map((e) => [e.version, e.event.type])).toEqual([
      [1, "account.created"],
      [2, "asset.deposited"],
    ]);
  });

  it("pages by version", async () => {
    const first = (await (
      await test.app.request("/api/v1/accounts/alice/events?limit=1")
    ).json()) as EventPage;
    expect(first.pagination).toEqual({ next: 1, hasMore: true });

    const second = (await (
      await test.app.request("/api/v1/accounts/alice/events?limit=1&afterVersion=1")
    ).json()) as EventPage;
    expect(second.data.map((e) => e.event.type)).toEqual(["asset.deposited"]);
    expect(second.pagination).toEqual({ next: null, hasMore: false });
  });
});
