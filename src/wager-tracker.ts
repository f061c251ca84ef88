import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { EconomyDatabase } from "./database";
import { normalizeError, type AppLogger } from "./logger";
import type { PeriodManager } from "./period-manager";
import { normalizeUserKey } from "./session-store";
import type { TicketLedger } from "./ticket-ledger";
import type { Period, TenantId } from "./types";

/** One row of the affiliate feed; the feed is a JSON array of these. */
const WagerRowSchema = z.object({
  username: z.string().trim().min(1),
  campaignCode: z.string().optional().default(""),
  wagerAmount: z.coerce.number().finite().nonnegative(),
});

export type WagerRow = { username: string; campaignCode: string; wagerCents: number };

export type WagerOptions = {
  /** Affiliate stats endpoint. Empty disables polling. */
  feedUrl: string;
  /** Lowercase campaign codes to keep; empty keeps every row. */
  campaignCodes: string[];
  ticketsPer1000: number;
  httpTimeoutMs: number;
};

export type WagerLink = {
  tenantId: TenantId;
  wagerUsername: string;
  userId: string;
  username: string;
  linkedAt: string;
};

export type WagerTenantReport =
  | { tenantId: TenantId; status: "no_active_period" }
  | {
      tenantId: TenantId;
      status: "processed";
      periodId: number;
      tracked: number;
      awards: number;
      ticketsAwarded: number;
      unlinked: number;
      failures: number;
    };

export type WagerPollReport =
  | { status: "disabled" }
  | { status: "fetch_failed"; error: string }
  | { status: "no_users" }
  | { status: "polled"; users: number; tenants: WagerTenantReport[] };

export type WagerTrackerDeps = {
  db: EconomyDatabase;
  ledger: TicketLedger;
  periods: PeriodManager;
  logger: AppLogger;
  options: WagerOptions;
  /** Tenants whose links and periods are visited on each poll. */
  tenants: () => TenantId[];
  http?: AxiosInstance;
  clock?: () => Date;
};

type TotalsRow = {
  baseline_cents: number;
  last_seen_cents: number;
  tickets_awarded: number;
};

type LinkRow = {
  tenant_id: string;
  wager_username: string;
  user_id: string;
  username: string;
  linked_at: string;
};

type WagerOutcome =
  | { status: "tracked" }
  | { status: "unlinked" }
  | { status: "nothing_due" }
  | { status: "awarded"; tickets: number };

const CENTS_PER_1000 = 100_000;

function formatDollars(cents: number): string {
  return `$${(cents / 100).toFixed(2)}`;
}

/**
 * Polls a casino affiliate feed and turns wagered amounts into tickets. The
 * first sighting of a username in a period is its baseline; only growth past
 * it earns, at `ticketsPer1000` per $1000. Fractions carry over between polls
 * because the due count is always derived from the baseline.
 */
export class WagerTracker {
  private readonly http: AxiosInstance;
  private readonly clock: () => Date;

  constructor(private readonly deps: WagerTrackerDeps) {
    this.http = deps.http ?? axios.create({ timeout: deps.options.httpTimeoutMs, headers: { Accept: "application/json" } });
    this.clock = deps.clock ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.deps.options.feedUrl.length > 0;
  }

  link(tenantId: TenantId, wagerUsername: string, userId: string, username: string): WagerLink {
    const key = normalizeUserKey(wagerUsername);
    const linkedAt = this.clock().toISOString();
    this.deps.db
      .prepare(
        `INSERT INTO wager_links (tenant_id, wager_username, user_id, username, linked_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (tenant_id, wager_username) DO UPDATE SET
           user_id = excluded.user_id, username = excluded.username, linked_at = excluded.linked_at`,
      )
      .run(tenantId, key, userId, normalizeUserKey(username), linkedAt);
    return { tenantId, wagerUsername: key, userId, username: normalizeUserKey(username), linkedAt };
  }

  unlink(tenantId: TenantId, wagerUsername: string): boolean {
    return (
      this.deps.db
        .prepare("DELETE FROM wager_links WHERE tenant_id = ? AND wager_username = ?")
        .run(tenantId, normalizeUserKey(wagerUsername)).changes > 0
    );
  }

  lookup(tenantId: TenantId, wagerUsername: string): WagerLink | undefined {
    const row = this.deps.db
      .prepare<[string, string], LinkRow>("SELECT * FROM wager_links WHERE tenant_id = ? AND wager_username = ?")
      .get(tenantId, normalizeUserKey(wagerUsername));
    if (!row) {
      return undefined;
    }
    return {
      tenantId: row.tenant_id,
      wagerUsername: row.wager_username,
      userId: row.user_id,
      username: row.username,
      linkedAt: row.linked_at,
    };
  }

  /** Fetches the feed once and applies it to every tenant with an active period. */
  async poll(): Promise<WagerPollReport> {
    const { logger, options } = this.deps;
    if (!this.enabled) {
      return { status: "disabled" };
    }

    let rows: WagerRow[];
    try {
      rows = await this.fetchFeed();
    } catch (error) {
      const details = normalizeError(error);
      logger.error("wager_fetch_failed", details);
      return { status: "fetch_failed", error: details.message };
    }

    const wanted = new Set(options.campaignCodes);
    const kept = wanted.size === 0 ? rows : rows.filter((row) => wanted.has(row.campaignCode.toLowerCase()));
    if (kept.length === 0) {
      logger.warn("wager_no_users", { rows: rows.length, campaignCodes: options.campaignCodes });
      return { status: "no_users" };
    }

    const now = this.clock();
    const tenants = this.deps.tenants().map((tenantId) => this.applyTenant(tenantId, kept, now));
    return { status: "polled", users: kept.length, tenants };
  }

  /** Rows that fail validation are skipped; a body that is not an array fails the poll. */
  async fetchFeed(): Promise<WagerRow[]> {
    const response = await this.http.get<unknown>(this.deps.options.feedUrl);
    const body = z.array(z.unknown()).safeParse(response.data);
    if (!body.success) {
      throw new Error("wager feed is not a JSON array");
    }
    const rows: WagerRow[] = [];
    let skipped = 0;
    for (const entry of body.data) {
      const parsed = WagerRowSchema.safeParse(entry);
      if (!parsed.success) {
        skipped += 1;
        continue;
      }
      rows.push({
        username: normalizeUserKey(parsed.data.username),
        campaignCode: parsed.data.campaignCode,
        wagerCents: Math.round(parsed.data.wagerAmount * 100),
      });
    }
    if (skipped > 0) {
      this.deps.logger.warn("wager_rows_skipped", { skipped });
    }
    return rows;
  }

  private applyTenant(tenantId: TenantId, rows: WagerRow[], now: Date): WagerTenantReport {
    const { periods, logger } = this.deps;
    const period = periods.getActive(tenantId);
    if (!period) {
      logger.warn("wager_no_active_period", { tenantId });
      return { tenantId, status: "no_active_period" };
    }

    const report = {
      tenantId,
      status: "processed" as const,
      periodId: period.id,
      tracked: 0,
      awards: 0,
      ticketsAwarded: 0,
      unlinked: 0,
      failures: 0,
    };
    for (const row of rows) {
      try {
        const outcome = this.applyRow(period, row, now);
        if (outcome.status === "tracked") {
          report.tracked += 1;
        } else if (outcome.status === "unlinked") {
          report.unlinked += 1;
        } else if (outcome.status === "awarded") {
          report.awards += 1;
          report.ticketsAwarded += outcome.tickets;
        }
      } catch (error) {
        report.failures += 1;
        logger.error("wager_user_failed", { tenantId, wagerUsername: row.username, ...normalizeError(error) });
      }
    }
    logger.info("wager_poll", {
      tenantId,
      periodId: period.id,
      users: rows.length,
      awards: report.awards,
      ticketsAwarded: report.ticketsAwarded,
      failures: report.failures,
    });
    return report;
  }

  private applyRow(period: Period, row: WagerRow, now: Date): WagerOutcome {
    const { db, ledger, options } = this.deps;
    const updatedAt = now.toISOString();

    return ledger.transaction((): WagerOutcome => {
      const totals = db
        .prepare<[number, string], TotalsRow>(
          "SELECT baseline_cents, last_seen_cents, tickets_awarded FROM wager_totals WHERE period_id = ? AND wager_username = ?",
        )
        .get(period.id, row.username);
      if (!totals) {
        db.prepare(
          `INSERT INTO wager_totals
             (period_id, tenant_id, wager_username, baseline_cents, last_seen_cents, tickets_awarded, updated_at)
           VALUES (?, ?, ?, ?, ?, 0, ?)`,
        ).run(period.id, period.tenantId, row.username, row.wagerCents, row.wagerCents, updatedAt);
        return { status: "tracked" };
      }

      // Feeds occasionally dip; the running maximum is what earns.
      const seen = Math.max(totals.last_seen_cents, row.wagerCents);
      const touch = (ticketsAwarded: number): void => {
        db.prepare(
          "UPDATE wager_totals SET last_seen_cents = ?, tickets_awarded = ?, updated_at = ? WHERE period_id = ? AND wager_username = ?",
        ).run(seen, ticketsAwarded, updatedAt, period.id, row.username);
      };

      const link = this.lookup(period.tenantId, row.username);
      if (!link) {
        touch(totals.tickets_awarded);
        return { status: "unlinked" };
      }
      const due = Math.floor(((seen - totals.baseline_cents) * options.ticketsPer1000) / CENTS_PER_1000);
      const owed = due - totals.tickets_awarded;
      if (owed <= 0) {
        touch(totals.tickets_awarded);
        return { status: "nothing_due" };
      }

      const claimed = ledger.recordConversion({
        tenantId: period.tenantId,
        periodId: period.id,
        userKey: `wager:${row.username}`,
        basisKey: `wager:${totals.tickets_awarded}-${due}`,
        units: seen - totals.last_seen_cents,
        ticketsAwarded: owed,
        now,
      });
      if (!claimed) {
        return { status: "nothing_due" };
      }
      const award = ledger.award({
        tenantId: period.tenantId,
        periodId: period.id,
        userId: link.userId,
        username: link.username,
        amount: owed,
        source: "wager",
        description: `wagered ${formatDollars(totals.last_seen_cents)} -> ${formatDollars(seen)} (${row.username})`,
        now,
      });
      if (!award.ok) {
        throw new Error(`wager award rejected: ${award.reason}`);
      }
      touch(due);
      return { status: "awarded", tickets: owed };
    });
  }
}
