import assert from "node:assert";
import { describe, it } from "node:test";

import axios, { AxiosError, type AxiosAdapter } from "axios";

import { FairDrawEngine } from "./draw";
import type { AppLogger } from "./logger";
import { PeriodManager } from "./period-manager";
import { PresenceStore } from "./presence";
import { createTestLogger, openTestDatabase, readLogEvents } from "./test-support";
import { TicketLedger } from "./ticket-ledger";
import { WagerTracker, type WagerOptions } from "./wager-tracker";

const NOW = new Date("2026-03-10T20:00:00.000Z");
const FEED_URL = "https://feed.test/affiliate/stats";

function setup(overrides: Partial<WagerOptions> = {}, tenants: string[] = ["t1"]) {
  const db = openTestDatabase();
  const logger = createTestLogger();
  const ledger = new TicketLedger(db);
  const periods = new PeriodManager(db, ledger, new PresenceStore(db), new FairDrawEngine(db, ledger), logger, {
    autoDraw: false,
    autoDrawLeadMs: 0,
  });
  const started = periods.startNewPeriod("t1", new Date("2026-03-01T00:00:00.000Z"), new Date("2026-04-01T00:00:00.000Z"));
  assert.ok(started.ok);

  const feed: { status: number; data: unknown } = { status: 200, data: [] };
  const urls: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    urls.push(config.url ?? "");
    const response = { data: feed.data, status: feed.status, statusText: String(feed.status), headers: {}, config };
    if (feed.status >= 400) {
      throw new AxiosError(`Request failed with status code ${feed.status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };

  const tracker = new WagerTracker({
    db,
    ledger,
    periods,
    logger,
    options: { feedUrl: FEED_URL, campaignCodes: ["abc"], ticketsPer1000: 20, httpTimeoutMs: 1_000, ...overrides },
    tenants: () => tenants,
    http: axios.create({ adapter }),
    clock: () => NOW,
  });
  return { logger, ledger, tracker, feed, urls, periodId: started.period.id };
}

function wagerEvents(logger: AppLogger): string[] {
  return readLogEvents(logger).filter((event) => event.startsWith("wager_"));
}

function row(wagerAmount: number | string, username = "HighRoller", campaignCode = "ABC") {
  return { username, campaignCode, wagerAmount };
}

describe("WagerTracker", () => {
  it("baselines the first sighting and awards growth per $1000", async () => {
    const { ledger, tracker, feed, urls, periodId } = setup();
    tracker.link("t1", "HighRoller", "user-hr", "Alice");

    feed.data = [row(5000)];
    assert.deepStrictEqual(await tracker.poll(), {
      status: "polled",
      users: 1,
      tenants: [
        { tenantId: "t1", status: "processed", periodId, tracked: 1, awards: 0, ticketsAwarded: 0, unlinked: 0, failures: 0 },
      ],
    });
    assert.strictEqual(ledger.getBalance("t1", "user-hr", periodId), undefined);

    feed.data = [row("5120")];
    const second = await tracker.poll();
    assert.strictEqual(second.status === "polled" && second.tenants[0]?.status === "processed" && second.tenants[0].ticketsAwarded, 2);

    feed.data = [row(5160)];
    await tracker.poll();
    await tracker.poll();

    const balance = ledger.getBalance("t1", "user-hr", periodId);
    assert.strictEqual(balance?.sources.wager, 3);
    assert.strictEqual(balance?.username, "alice");
    assert.deepStrictEqual(
      ledger.conversions(periodId, "wager:highroller").map((conversion) => conversion.basisKey),
      ["wager:0-2", "wager:2-3"],
    );
    assert.deepStrictEqual(urls, [FEED_URL, FEED_URL, FEED_URL, FEED_URL]);
  });

  it("ignores a feed total that drops below what was already seen", async () => {
    const { ledger, tracker, feed, periodId } = setup();
    tracker.link("t1", "highroller", "user-hr", "alice");
    feed.data = [row(1000)];
    await tracker.poll();
    feed.data = [row(1100)];
    await tracker.poll();
    feed.data = [row(900)];
    await tracker.poll();
    feed.data = [row(1150)];
    await tracker.poll();

    assert.strictEqual(ledger.getBalance("t1", "user-hr", periodId)?.sources.wager, 3);
  });

  it("credits wagers placed before the account was linked", async () => {
    const { ledger, tracker, feed, periodId } = setup();
    feed.data = [row(1000)];
    await tracker.poll();
    feed.data = [row(2000)];
    const unlinked = await tracker.poll();
    assert.strictEqual(unlinked.status === "polled" && unlinked.tenants[0]?.status === "processed" && unlinked.tenants[0].unlinked, 1);

    tracker.link("t1", "HIGHROLLER", "user-hr", "alice");
    await tracker.poll();
    assert.strictEqual(ledger.getBalance("t1", "user-hr", periodId)?.sources.wager, 20);
  });

  it("keeps only rows with a configured campaign code", async () => {
    const { logger, tracker, feed } = setup();
    feed.data = [row(5000, "someone", "OTHER"), { username: "", wagerAmount: 1 }, "junk"];
    assert.deepStrictEqual(await tracker.poll(), { status: "no_users" });
    assert.deepStrictEqual(wagerEvents(logger), ["wager_rows_skipped", "wager_no_users"]);
  });

  it("keeps every row when no campaign code is configured", async () => {
    const { tracker, feed } = setup({ campaignCodes: [] });
    feed.data = [row(5000, "someone", "OTHER"), { username: "nocode", wagerAmount: 10 }];
    const report = await tracker.poll();
    assert.strictEqual(report.status === "polled" && report.users, 2);
  });

  it("reports fetch failures without touching the ledger", async () => {
    const { logger, tracker, feed } = setup();
    feed.status = 500;
    assert.deepStrictEqual(await tracker.poll(), {
      status: "fetch_failed",
      error: "Request failed with status code 500",
    });

    feed.status = 200;
    feed.data = { users: [] };
    assert.deepStrictEqual(await tracker.poll(), { status: "fetch_failed", error: "wager feed is not a JSON array" });
    assert.deepStrictEqual(wagerEvents(logger), ["wager_fetch_failed", "wager_fetch_failed"]);
  });

  it("skips tenants without an active period", async () => {
    const { tracker, feed, periodId } = setup({}, ["t1", "t2"]);
    feed.data = [row(100)];
    const report = await tracker.poll();
    assert.deepStrictEqual(report.status === "polled" && report.tenants, [
      { tenantId: "t1", status: "processed", periodId, tracked: 1, awards: 0, ticketsAwarded: 0, unlinked: 0, failures: 0 },
      { tenantId: "t2", status: "no_active_period" },
    ]);
  });

  it("does nothing without a feed url", async () => {
    const { tracker, urls } = setup({ feedUrl: "" });
    assert.strictEqual(tracker.enabled, false);
    assert.deepStrictEqual(await tracker.poll(), { status: "disabled" });
    assert.deepStrictEqual(urls, []);
  });

  it("links and unlinks wager usernames per tenant", () => {
    const { tracker } = setup();
    assert.deepStrictEqual(tracker.link("t1", " HighRoller ", "user-hr", "Alice"), {
      tenantId: "t1",
      wagerUsername: "highroller",
      userId: "user-hr",
      username: "alice",
      linkedAt: NOW.toISOString(),
    });
    assert.strictEqual(tracker.lookup("t2", "highroller"), undefined);
    assert.strictEqual(tracker.unlink("t1", "HIGHROLLER"), true);
    assert.strictEqual(tracker.lookup("t1", "highroller"), undefined);
  });
});
