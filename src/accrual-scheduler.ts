import type { AccountLinks } from "./account-links";
import type { LivenessDetector, LivenessReason } from "./liveness";
import { normalizeError, type AppLogger } from "./logger";
import type { PeriodManager } from "./period-manager";
import type { PresenceStore } from "./presence";
import type { TenantSessionStore } from "./session-store";
import type { TicketLedger } from "./ticket-ledger";
import type { Period, TenantId } from "./types";

export type AccrualOptions = {
  /** Watch minutes credited to each active viewer per tick. */
  minutesPerTick: number;
  /** A viewer counts as present when seen within this window. */
  presenceWindowMs: number;
  minutesPerUnit: number;
  ticketsPerUnit: number;
};

export type TenantAccrual =
  | { tenantId: TenantId; status: "offline"; reason: LivenessReason }
  | { tenantId: TenantId; status: "no_active_period" }
  | {
      tenantId: TenantId;
      status: "processed";
      periodId: number;
      viewersCredited: number;
      awards: number;
      ticketsAwarded: number;
      unlinked: number;
      failures: number;
    };

export type AccrualReport = {
  at: string;
  tenants: TenantAccrual[];
};

export type AccrualDeps = {
  sessions: TenantSessionStore;
  liveness: LivenessDetector;
  periods: PeriodManager;
  ledger: TicketLedger;
  presence: PresenceStore;
  links: AccountLinks;
  logger: AppLogger;
  options: AccrualOptions;
  /** Tenants to visit each tick; defaults to those with an open session. */
  tenants?: () => TenantId[];
};

type ConversionOutcome = { status: "unlinked" } | { status: "awarded"; tickets: number } | { status: "nothing_due" };

export class AccrualScheduler {
  private readonly listTenants: () => TenantId[];

  constructor(private readonly deps: AccrualDeps) {
    this.listTenants = deps.tenants ?? (() => deps.sessions.tenants());
  }

  tick(now = new Date()): AccrualReport {
    const tenants: TenantAccrual[] = [];
    for (const tenantId of this.listTenants()) {
      tenants.push(this.tickTenant(tenantId, now));
    }
    return { at: now.toISOString(), tenants };
  }

  private tickTenant(tenantId: TenantId, now: Date): TenantAccrual {
    const { sessions, liveness, periods, presence, logger, options } = this.deps;
    const verdict = liveness.evaluate(tenantId, now.getTime());
    if (!verdict.live) {
      logger.debug("accrual_skipped", { tenantId, reason: verdict.reason, uniqueChatters: verdict.uniqueChatters });
      return { tenantId, status: "offline", reason: verdict.reason };
    }

    const period = periods.getActive(tenantId);
    if (!period) {
      logger.warn("accrual_no_active_period", { tenantId });
      return { tenantId, status: "no_active_period" };
    }

    const viewers = sessions.activeViewersSince(tenantId, now.getTime() - options.presenceWindowMs);
    const report = {
      tenantId,
      status: "processed" as const,
      periodId: period.id,
      viewersCredited: 0,
      awards: 0,
      ticketsAwarded: 0,
      unlinked: 0,
      failures: 0,
    };

    for (const viewer of viewers) {
      try {
        presence.addMinutes(tenantId, viewer, options.minutesPerTick, now);
        report.viewersCredited += 1;
        const outcome = this.convert(period, viewer, now);
        if (outcome.status === "unlinked") {
          report.unlinked += 1;
        } else if (outcome.status === "awarded") {
          report.awards += 1;
          report.ticketsAwarded += outcome.tickets;
        }
      } catch (error) {
        report.failures += 1;
        logger.error("accrual_user_failed", { tenantId, viewer, periodId: period.id, ...normalizeError(error) });
      }
    }

    logger.info("accrual_tick", {
      tenantId,
      periodId: period.id,
      viewers: viewers.length,
      awards: report.awards,
      ticketsAwarded: report.ticketsAwarded,
      failures: report.failures,
    });
    return report;
  }

  /**
   * Turns whole units of unconverted watch time into tickets. The conversion
   * row is the idempotency key; it commits together with the award or not at all.
   */
  private convert(period: Period, viewer: string, now: Date): ConversionOutcome {
    const { ledger, presence, links, options } = this.deps;
    const link = links.lookup(period.tenantId, viewer);
    if (!link) {
      return { status: "unlinked" };
    }

    return ledger.transaction((): ConversionOutcome => {
      const totalMinutes = presence.minutes(period.tenantId, viewer);
      const convertedMinutes = ledger.convertedUnits(period.id, viewer);
      const units = Math.floor((totalMinutes - convertedMinutes) / options.minutesPerUnit);
      if (units <= 0) {
        return { status: "nothing_due" };
      }

      const toMinutes = convertedMinutes + units * options.minutesPerUnit;
      const tickets = units * options.ticketsPerUnit;
      const claimed = ledger.recordConversion({
        tenantId: period.tenantId,
        periodId: period.id,
        userKey: viewer,
        basisKey: `presence:${convertedMinutes}-${toMinutes}`,
        units: toMinutes - convertedMinutes,
        ticketsAwarded: tickets,
        now,
      });
      if (!claimed) {
        return { status: "nothing_due" };
      }

      const award = ledger.award({
        tenantId: period.tenantId,
        periodId: period.id,
        userId: link.userId,
        username: viewer,
        amount: tickets,
        source: "presence",
        description: `${toMinutes - convertedMinutes} watch minutes`,
        now,
      });
      if (!award.ok) {
        throw new Error(`presence award rejected: ${award.reason}`);
      }
      return { status: "awarded", tickets };
    });
  }
}
