import type { EconomyDatabase } from "./database";
import type { DrawOutcome, FairDrawEngine } from "./draw";
import type { AppLogger } from "./logger";
import type { PresenceStore } from "./presence";
import type { TicketLedger } from "./ticket-ledger";
import type { Period, TenantId } from "./types";

export const BASELINE_BASIS_KEY = "baseline";

type PeriodRow = {
  id: number;
  tenant_id: string;
  start_at: string;
  end_at: string;
  status: string;
  total_tickets: number;
  created_at: string;
  ended_at: string | null;
};

function toPeriod(row: PeriodRow): Period {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    startAt: row.start_at,
    endAt: row.end_at,
    status: row.status === "active" ? "active" : "ended",
    totalTickets: row.total_tickets,
    createdAt: row.created_at,
    ...(row.ended_at ? { endedAt: row.ended_at } : {}),
  };
}

/** Calendar month (UTC) containing `at`. */
export function monthBounds(at: Date): { startAt: Date; endAt: Date } {
  const startAt = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), 1));
  const endAt = new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth() + 1, 1));
  return { startAt, endAt };
}

export type StartPeriodResult =
  | { ok: true; period: Period; endedPeriodId?: number; baselineUsers: number }
  | { ok: false; reason: "invalid_range" };

export type EndPeriodResult = { ok: true; period: Period } | { ok: false; reason: "not_found" | "already_ended" };

export type TransitionReport =
  | { action: "none"; period: Period }
  | { action: "waiting"; nextStartAt: string }
  | { action: "created"; period: Period }
  | { action: "auto_drawn"; period: Period; draw: DrawOutcome }
  | { action: "rolled_over"; endedPeriodId: number; period: Period; draw?: DrawOutcome };

export type PeriodManagerOptions = {
  autoDraw: boolean;
  /** How long before a period's end the automatic draw runs. */
  autoDrawLeadMs: number;
};

export class PeriodManager {
  constructor(
    private readonly db: EconomyDatabase,
    private readonly ledger: TicketLedger,
    private readonly presence: PresenceStore,
    private readonly draws: FairDrawEngine,
    private readonly logger: AppLogger,
    private readonly options: PeriodManagerOptions,
  ) {}

  getActive(tenantId: TenantId): Period | undefined {
    const row = this.db
      .prepare<[string], PeriodRow>("SELECT * FROM periods WHERE tenant_id = ? AND status = 'active'")
      .get(tenantId);
    return row ? toPeriod(row) : undefined;
  }

  get(tenantId: TenantId, periodId: number): Period | undefined {
    const row = this.db
      .prepare<[number, string], PeriodRow>("SELECT * FROM periods WHERE id = ? AND tenant_id = ?")
      .get(periodId, tenantId);
    return row ? toPeriod(row) : undefined;
  }

  latest(tenantId: TenantId): Period | undefined {
    const row = this.db
      .prepare<[string], PeriodRow>("SELECT * FROM periods WHERE tenant_id = ? ORDER BY id DESC LIMIT 1")
      .get(tenantId);
    return row ? toPeriod(row) : undefined;
  }

  list(tenantId: TenantId, limit = 12): Period[] {
    return this.db
      .prepare<[string, number], PeriodRow>("SELECT * FROM periods WHERE tenant_id = ? ORDER BY id DESC LIMIT ?")
      .all(tenantId, limit)
      .map(toPeriod);
  }

  /**
   * Ends the active period (if any), opens a new one and records every
   * viewer's cumulative presence minutes as an already-converted baseline, so
   * time watched before `startAt` never earns tickets in the new period.
   */
  startNewPeriod(tenantId: TenantId, startAt: Date, endAt: Date, now = new Date()): StartPeriodResult {
    if (!(endAt.getTime() > startAt.getTime())) {
      return { ok: false, reason: "invalid_range" };
    }
    const createdAt = now.toISOString();

    const run = this.db.transaction((): StartPeriodResult => {
      const previous = this.getActive(tenantId);
      if (previous) {
        this.db
          .prepare("UPDATE periods SET status = 'ended', ended_at = ? WHERE id = ?")
          .run(createdAt, previous.id);
      }

      const inserted = this.db
        .prepare(
          `INSERT INTO periods (tenant_id, start_at, end_at, status, total_tickets, created_at)
           VALUES (?, ?, ?, 'active', 0, ?)`,
        )
        .run(tenantId, startAt.toISOString(), endAt.toISOString(), createdAt);
      const periodId = Number(inserted.lastInsertRowid);

      let baselineUsers = 0;
      for (const total of this.presence.totals(tenantId)) {
        if (total.minutes <= 0) {
          continue;
        }
        const recorded = this.ledger.recordConversion({
          tenantId,
          periodId,
          userKey: total.username,
          basisKey: BASELINE_BASIS_KEY,
          units: total.minutes,
          ticketsAwarded: 0,
          now,
        });
        if (recorded) {
          baselineUsers += 1;
        }
      }

      const period = this.get(tenantId, periodId);
      if (!period) {
        throw new Error(`period ${periodId} missing after insert`);
      }
      return {
        ok: true,
        period,
        baselineUsers,
        ...(previous ? { endedPeriodId: previous.id } : {}),
      };
    });

    const result = run();
    if (result.ok) {
      this.logger.info("period_started", {
        tenantId,
        periodId: result.period.id,
        startAt: result.period.startAt,
        endAt: result.period.endAt,
        baselineUsers: result.baselineUsers,
        ...(result.endedPeriodId !== undefined ? { endedPeriodId: result.endedPeriodId } : {}),
      });
    }
    return result;
  }

  endPeriod(tenantId: TenantId, periodId: number, now = new Date()): EndPeriodResult {
    const period = this.get(tenantId, periodId);
    if (!period) {
      return { ok: false, reason: "not_found" };
    }
    if (period.status === "ended") {
      return { ok: false, reason: "already_ended" };
    }
    this.db
      .prepare("UPDATE periods SET status = 'ended', ended_at = ? WHERE id = ? AND status = 'active'")
      .run(now.toISOString(), periodId);
    this.logger.info("period_ended", { tenantId, periodId });
    const ended = this.get(tenantId, periodId);
    return ended ? { ok: true, period: ended } : { ok: false, reason: "not_found" };
  }

  /**
   * Monthly cycle: open the current month when nothing is active, draw shortly
   * before the end when auto-draw is on, and roll over once the end passes.
   */
  checkTransition(tenantId: TenantId, now = new Date()): TransitionReport {
    const active = this.getActive(tenantId);

    if (!active) {
      const latest = this.latest(tenantId);
      if (latest && now.getTime() < Date.parse(latest.endAt)) {
        return { action: "waiting", nextStartAt: latest.endAt };
      }
      return { action: "created", period: this.openMonth(tenantId, now) };
    }

    const endAt = Date.parse(active.endAt);
    if (now.getTime() >= endAt) {
      const draw = this.autoDraw(active, now);
      if (this.get(tenantId, active.id)?.status === "active") {
        this.endPeriod(tenantId, active.id, now);
      }
      return {
        action: "rolled_over",
        endedPeriodId: active.id,
        period: this.openMonth(tenantId, now),
        ...(draw ? { draw } : {}),
      };
    }

    if (now.getTime() >= endAt - this.options.autoDrawLeadMs) {
      const draw = this.autoDraw(active, now);
      if (draw?.status === "drawn") {
        return { action: "auto_drawn", period: this.get(tenantId, active.id) ?? active, draw };
      }
    }
    return { action: "none", period: active };
  }

  private autoDraw(period: Period, now: Date): DrawOutcome | undefined {
    if (!this.options.autoDraw || this.draws.getDraw(period.tenantId, period.id)) {
      return undefined;
    }
    const outcome = this.draws.draw({
      tenantId: period.tenantId,
      periodId: period.id,
      drawnBy: "auto",
      prizeDescription: "Monthly draw",
      now,
    });
    if (outcome.status === "drawn") {
      this.logger.info("auto_draw_completed", {
        tenantId: period.tenantId,
        periodId: period.id,
        winnerUserId: outcome.result.winnerUserId,
        winningTicket: outcome.result.winningTicketNumber,
        totalTickets: outcome.result.totalTickets,
      });
    } else {
      this.logger.warn("auto_draw_skipped", { tenantId: period.tenantId, periodId: period.id, status: outcome.status });
    }
    return outcome;
  }

  private openMonth(tenantId: TenantId, now: Date): Period {
    const { startAt, endAt } = monthBounds(now);
    const started = this.startNewPeriod(tenantId, startAt, endAt, now);
    if (!started.ok) {
      throw new Error(`could not open period for ${tenantId}: ${started.reason}`);
    }
    return started.period;
  }
}
