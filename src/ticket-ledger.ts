import type { EconomyDatabase } from "./database";
import {
  TICKET_SOURCES,
  type ConversionRecord,
  type LeaderboardEntry,
  type SourceBreakdown,
  type TenantId,
  type TicketBalance,
  type TicketLogEntry,
  type TicketSource,
} from "./types";

const SOURCE_COLUMNS = {
  presence: "presence_tickets",
  gift: "gift_tickets",
  wager: "wager_tickets",
  bonus: "bonus_tickets",
} as const satisfies Record<TicketSource, string>;

type BalanceRow = {
  id: number;
  period_id: number;
  tenant_id: string;
  user_id: string;
  username: string;
  presence_tickets: number;
  gift_tickets: number;
  wager_tickets: number;
  bonus_tickets: number;
  total_tickets: number;
  updated_at: string;
};

type PeriodRow = { tenant_id: string; status: string };

type LogRow = {
  id: number;
  period_id: number;
  user_id: string;
  username: string;
  delta: number;
  source: string;
  description: string;
  created_at: string;
};

export type LedgerFailure = "invalid_amount" | "period_not_found" | "period_ended" | "no_balance";

export type AwardInput = {
  tenantId: TenantId;
  periodId: number;
  userId: string;
  username: string;
  amount: number;
  source: TicketSource;
  description: string;
  now?: Date;
};

export type RemoveInput = {
  tenantId: TenantId;
  periodId: number;
  userId: string;
  amount: number;
  reason: string;
  now?: Date;
};

export type AwardResult = { ok: true; balance: TicketBalance } | { ok: false; reason: LedgerFailure };

export type RemoveResult =
  | { ok: true; removed: number; balance: TicketBalance }
  | { ok: false; reason: LedgerFailure };

export type ConversionInput = Omit<ConversionRecord, "createdAt"> & { now?: Date };

export type DrawEntry = { userId: string; username: string; tickets: number };

export type UserRank = { rank: number; total: number; participants: number };

export type PeriodStats = {
  participants: number;
  totalTickets: number;
  bySource: SourceBreakdown;
};

function emptySources(): SourceBreakdown {
  return { presence: 0, gift: 0, wager: 0, bonus: 0 };
}

function toBalance(row: BalanceRow): TicketBalance {
  return {
    periodId: row.period_id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    username: row.username,
    sources: {
      presence: row.presence_tickets,
      gift: row.gift_tickets,
      wager: row.wager_tickets,
      bonus: row.bonus_tickets,
    },
    total: row.total_tickets,
    updatedAt: row.updated_at,
  };
}

function isLogSource(value: string): value is TicketLogEntry["source"] {
  return value === "removal" || TICKET_SOURCES.some((source) => source === value);
}

/**
 * Scales every bucket to `newTotal / oldTotal` of its size and hands the
 * rounding remainder to the buckets with the largest fractional parts, so the
 * result always sums to `newTotal`.
 */
export function scaleSources(sources: SourceBreakdown, newTotal: number): SourceBreakdown {
  const oldTotal = TICKET_SOURCES.reduce((sum, source) => sum + sources[source], 0);
  const scaled = emptySources();
  if (oldTotal <= 0 || newTotal <= 0) {
    return scaled;
  }
  if (newTotal >= oldTotal) {
    return { ...sources };
  }

  const fractions: Array<{ source: TicketSource; remainder: number }> = [];
  let assigned = 0;
  for (const source of TICKET_SOURCES) {
    const numerator = sources[source] * newTotal;
    scaled[source] = Math.floor(numerator / oldTotal);
    assigned += scaled[source];
    fractions.push({ source, remainder: numerator % oldTotal });
  }

  // Stable sort keeps TICKET_SOURCES order among equal remainders.
  fractions.sort((a, b) => b.remainder - a.remainder);
  for (let i = 0; assigned < newTotal; i += 1) {
    const next = fractions[i % fractions.length];
    if (!next) {
      break;
    }
    scaled[next.source] += 1;
    assigned += 1;
  }
  return scaled;
}

export class TicketLedger {
  constructor(private readonly db: EconomyDatabase) {}

  /** Runs `fn` in one transaction; nested calls become savepoints. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  award(input: AwardInput): AwardResult {
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      return { ok: false, reason: "invalid_amount" };
    }
    const column = SOURCE_COLUMNS[input.source];
    const updatedAt = (input.now ?? new Date()).toISOString();

    return this.transaction((): AwardResult => {
      const period = this.checkPeriod(input.tenantId, input.periodId);
      if (period) {
        return { ok: false, reason: period };
      }

      this.db
        .prepare(
          `INSERT INTO ticket_balances
             (period_id, tenant_id, user_id, username, ${column}, total_tickets, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (period_id, user_id) DO UPDATE SET
             ${column} = ${column} + excluded.${column},
             total_tickets = total_tickets + excluded.total_tickets,
             username = excluded.username,
             updated_at = excluded.updated_at`,
        )
        .run(input.periodId, input.tenantId, input.userId, input.username, input.amount, input.amount, updatedAt);
      this.bumpPeriodTotal(input.periodId, input.amount);
      this.appendLog(
        input.tenantId,
        input.periodId,
        input.userId,
        input.username,
        input.amount,
        input.source,
        input.description,
        updatedAt,
      );

      return { ok: true, balance: this.requireBalance(input.periodId, input.userId) };
    });
  }

  /** Removes up to `amount`; the total never goes below zero. */
  remove(input: RemoveInput): RemoveResult {
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      return { ok: false, reason: "invalid_amount" };
    }
    const updatedAt = (input.now ?? new Date()).toISOString();

    return this.transaction((): RemoveResult => {
      const period = this.checkPeriod(input.tenantId, input.periodId);
      if (period) {
        return { ok: false, reason: period };
      }
      const current = this.getBalance(input.tenantId, input.userId, input.periodId);
      if (!current || current.total === 0) {
        return { ok: false, reason: "no_balance" };
      }

      const removed = Math.min(input.amount, current.total);
      const newTotal = current.total - removed;
      const sources = scaleSources(current.sources, newTotal);
      this.db
        .prepare(
          `UPDATE ticket_balances SET
             presence_tickets = ?, gift_tickets = ?, wager_tickets = ?, bonus_tickets = ?,
             total_tickets = ?, updated_at = ?
           WHERE period_id = ? AND user_id = ?`,
        )
        .run(
          sources.presence,
          sources.gift,
          sources.wager,
          sources.bonus,
          newTotal,
          updatedAt,
          input.periodId,
          input.userId,
        );
      this.bumpPeriodTotal(input.periodId, -removed);
      this.appendLog(
        input.tenantId,
        input.periodId,
        input.userId,
        current.username,
        -removed,
        "removal",
        input.reason,
        updatedAt,
      );

      return { ok: true, removed, balance: this.requireBalance(input.periodId, input.userId) };
    });
  }

  getBalance(tenantId: TenantId, userId: string, periodId: number): TicketBalance | undefined {
    const row = this.db
      .prepare<[number, string, string], BalanceRow>(
        "SELECT * FROM ticket_balances WHERE period_id = ? AND user_id = ? AND tenant_id = ?",
      )
      .get(periodId, userId, tenantId);
    return row ? toBalance(row) : undefined;
  }

  /** Highest totals first; ties keep the order in which users first received tickets. */
  leaderboard(tenantId: TenantId, periodId: number, limit = 10): LeaderboardEntry[] {
    return this.db
      .prepare<[number, string, number], BalanceRow>(
        `SELECT * FROM ticket_balances
         WHERE period_id = ? AND tenant_id = ? AND total_tickets > 0
         ORDER BY total_tickets DESC, id ASC
         LIMIT ?`,
      )
      .all(periodId, tenantId, limit)
      .map((row, index) => ({ ...toBalance(row), rank: index + 1 }));
  }

  getUserRank(tenantId: TenantId, userId: string, periodId: number): UserRank | undefined {
    const balance = this.db
      .prepare<[number, string, string], BalanceRow>(
        "SELECT * FROM ticket_balances WHERE period_id = ? AND user_id = ? AND tenant_id = ? AND total_tickets > 0",
      )
      .get(periodId, userId, tenantId);
    if (!balance) {
      return undefined;
    }
    const ahead = this.db
      .prepare<[number, string, number, number, number], { count: number }>(
        `SELECT COUNT(*) AS count FROM ticket_balances
         WHERE period_id = ? AND tenant_id = ? AND total_tickets > 0
           AND (total_tickets > ? OR (total_tickets = ? AND id < ?))`,
      )
      .get(periodId, tenantId, balance.total_tickets, balance.total_tickets, balance.id);
    const stats = this.getPeriodStats(tenantId, periodId);
    return {
      rank: (ahead?.count ?? 0) + 1,
      total: balance.total_tickets,
      participants: stats.participants,
    };
  }

  getPeriodStats(tenantId: TenantId, periodId: number): PeriodStats {
    const row = this.db
      .prepare<
        [number, string],
        {
          participants: number;
          total: number | null;
          presence: number | null;
          gift: number | null;
          wager: number | null;
          bonus: number | null;
        }
      >(
        `SELECT COUNT(*) AS participants,
                SUM(total_tickets) AS total,
                SUM(presence_tickets) AS presence,
                SUM(gift_tickets) AS gift,
                SUM(wager_tickets) AS wager,
                SUM(bonus_tickets) AS bonus
         FROM ticket_balances
         WHERE period_id = ? AND tenant_id = ? AND total_tickets > 0`,
      )
      .get(periodId, tenantId);
    return {
      participants: row?.participants ?? 0,
      totalTickets: row?.total ?? 0,
      bySource: {
        presence: row?.presence ?? 0,
        gift: row?.gift ?? 0,
        wager: row?.wager ?? 0,
        bonus: row?.bonus ?? 0,
      },
    };
  }

  /** Share of the period's tickets held by the user, in [0, 1]. */
  getWinProbability(tenantId: TenantId, userId: string, periodId: number): number {
    const balance = this.getBalance(tenantId, userId, periodId);
    const stats = this.getPeriodStats(tenantId, periodId);
    if (!balance || stats.totalTickets === 0) {
      return 0;
    }
    return balance.total / stats.totalTickets;
  }

  history(tenantId: TenantId, userId: string, periodId: number, limit = 20): TicketLogEntry[] {
    return this.db
      .prepare<[number, string, string, number], LogRow>(
        `SELECT id, period_id, user_id, username, delta, source, description, created_at
         FROM ticket_log
         WHERE period_id = ? AND user_id = ? AND tenant_id = ?
         ORDER BY id DESC
         LIMIT ?`,
      )
      .all(periodId, userId, tenantId, limit)
      .flatMap((row) =>
        isLogSource(row.source)
          ? [
              {
                id: row.id,
                periodId: row.period_id,
                userId: row.user_id,
                username: row.username,
                delta: row.delta,
                source: row.source,
                description: row.description,
                createdAt: row.created_at,
              },
            ]
          : [],
      );
  }

  /** Participants with tickets, in row order; this order fixes the draw's ranges. */
  drawEntries(tenantId: TenantId, periodId: number): DrawEntry[] {
    return this.db
      .prepare<[number, string], { user_id: string; username: string; total_tickets: number }>(
        `SELECT user_id, username, total_tickets FROM ticket_balances
         WHERE period_id = ? AND tenant_id = ? AND total_tickets > 0
         ORDER BY id ASC`,
      )
      .all(periodId, tenantId)
      .map((row) => ({ userId: row.user_id, username: row.username, tickets: row.total_tickets }));
  }

  /**
   * Claims an accrual basis. Returns false when the key was already recorded,
   * in which case the caller must not award.
   */
  recordConversion(input: ConversionInput): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO conversions
           (period_id, tenant_id, user_key, basis_key, units, tickets_awarded, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        input.periodId,
        input.tenantId,
        input.userKey,
        input.basisKey,
        input.units,
        input.ticketsAwarded,
        (input.now ?? new Date()).toISOString(),
      );
    return result.changes > 0;
  }

  /** Sum of basis units already claimed by `userKey` in the period, baseline included. */
  convertedUnits(periodId: number, userKey: string): number {
    const row = this.db
      .prepare<[number, string], { units: number | null }>(
        "SELECT SUM(units) AS units FROM conversions WHERE period_id = ? AND user_key = ?",
      )
      .get(periodId, userKey);
    return row?.units ?? 0;
  }

  conversions(periodId: number, userKey: string): ConversionRecord[] {
    return this.db
      .prepare<
        [number, string],
        {
          period_id: number;
          tenant_id: string;
          user_key: string;
          basis_key: string;
          units: number;
          tickets_awarded: number;
          created_at: string;
        }
      >("SELECT * FROM conversions WHERE period_id = ? AND user_key = ? ORDER BY id ASC")
      .all(periodId, userKey)
      .map((row) => ({
        periodId: row.period_id,
        tenantId: row.tenant_id,
        userKey: row.user_key,
        basisKey: row.basis_key,
        units: row.units,
        ticketsAwarded: row.tickets_awarded,
        createdAt: row.created_at,
      }));
  }

  private checkPeriod(tenantId: TenantId, periodId: number): LedgerFailure | null {
    const period = this.db
      .prepare<[number], PeriodRow>("SELECT tenant_id, status FROM periods WHERE id = ?")
      .get(periodId);
    if (!period || period.tenant_id !== tenantId) {
      return "period_not_found";
    }
    if (period.status !== "active") {
      return "period_ended";
    }
    return null;
  }

  private bumpPeriodTotal(periodId: number, delta: number): void {
    this.db.prepare("UPDATE periods SET total_tickets = total_tickets + ? WHERE id = ?").run(delta, periodId);
  }

  private appendLog(
    tenantId: TenantId,
    periodId: number,
    userId: string,
    username: string,
    delta: number,
    source: TicketLogEntry["source"],
    description: string,
    createdAt: string,
  ): void {
    this.db
      .prepare(
        `INSERT INTO ticket_log (period_id, tenant_id, user_id, username, delta, source, description, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(periodId, tenantId, userId, username, delta, source, description, createdAt);
  }

  private requireBalance(periodId: number, userId: string): TicketBalance {
    const row = this.db
      .prepare<[number, string], BalanceRow>("SELECT * FROM ticket_balances WHERE period_id = ? AND user_id = ?")
      .get(periodId, userId);
    if (!row) {
      throw new Error(`ticket balance missing after write: period ${periodId}, user ${userId}`);
    }
    return toBalance(row);
  }
}
