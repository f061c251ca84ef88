import type {
  DrawExclusion,
  DrawOutcome,
  ExclusionInput,
  ExclusionResult,
  FairDrawEngine,
  SimulationOutcome,
} from "./draw";
import type { LivenessDetector, LivenessVerdict } from "./liveness";
import type { AppLogger } from "./logger";
import type { PeriodManager } from "./period-manager";
import type { TenantSessionStore } from "./session-store";
import type { AwardResult, LedgerFailure, RemoveResult, TicketLedger } from "./ticket-ledger";
import type { LeaderboardEntry, TenantId, TicketBalance, TicketSource } from "./types";

export type AwardRequest = {
  tenantId: TenantId;
  userId: string;
  username: string;
  amount: number;
  source: TicketSource;
  description: string;
};

export type RemoveRequest = {
  tenantId: TenantId;
  userId: string;
  amount: number;
  reason: string;
};

export type EconomyAwardResult = AwardResult | { ok: false; reason: "no_active_period" };

export type EconomyRemoveResult = RemoveResult | { ok: false; reason: "no_active_period" };

export type DrawRequestInput = {
  tenantId: TenantId;
  periodId?: number;
  prizeDescription?: string;
  drawnBy?: string;
  excludeUserIds?: readonly string[];
};

export type EconomyDrawOutcome = DrawOutcome | { status: "no_active_period" };

export type SimulateRequestInput = {
  tenantId: TenantId;
  periodId?: number;
  runs?: number;
  excludeUserIds?: readonly string[];
};

export type EconomySimulationOutcome = SimulationOutcome | { status: "no_active_period" };

export type EconomyDeps = {
  sessions: TenantSessionStore;
  liveness: LivenessDetector;
  ledger: TicketLedger;
  periods: PeriodManager;
  draws: FairDrawEngine;
  logger: AppLogger;
  clock?: () => Date;
};

/**
 * The narrow surface handed to collaborators (chat commands, wagers, the
 * account-linking flow). Every call is scoped to a tenant; amounts land in the
 * tenant's active period.
 */
export class TicketEconomy {
  private readonly clock: () => Date;

  constructor(private readonly deps: EconomyDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  awardTickets(request: AwardRequest): EconomyAwardResult {
    const period = this.deps.periods.getActive(request.tenantId);
    if (!period) {
      return { ok: false, reason: "no_active_period" };
    }
    const result = this.deps.ledger.award({ ...request, periodId: period.id, now: this.clock() });
    this.logOutcome("tickets_awarded", request.tenantId, request.userId, request.amount, result);
    return result;
  }

  removeTickets(request: RemoveRequest): EconomyRemoveResult {
    const period = this.deps.periods.getActive(request.tenantId);
    if (!period) {
      return { ok: false, reason: "no_active_period" };
    }
    const result = this.deps.ledger.remove({ ...request, periodId: period.id, now: this.clock() });
    this.logOutcome("tickets_removed", request.tenantId, request.userId, request.amount, result);
    return result;
  }

  getBalance(tenantId: TenantId, userId: string): TicketBalance | undefined {
    const period = this.deps.periods.getActive(tenantId);
    return period ? this.deps.ledger.getBalance(tenantId, userId, period.id) : undefined;
  }

  leaderboard(tenantId: TenantId, limit = 10): LeaderboardEntry[] {
    const period = this.deps.periods.getActive(tenantId);
    return period ? this.deps.ledger.leaderboard(tenantId, period.id, limit) : [];
  }

  /** Chat seen through a path other than the socket, e.g. a command relay. */
  recordChatActivity(tenantId: TenantId, user: string): boolean {
    return this.deps.sessions.recordChatActivity(tenantId, user, this.clock().getTime());
  }

  isLive(tenantId: TenantId): boolean {
    return this.liveness(tenantId).live;
  }

  liveness(tenantId: TenantId): LivenessVerdict {
    return this.deps.liveness.evaluate(tenantId, this.clock().getTime());
  }

  setLiveOverride(tenantId: TenantId, forceLive: boolean): void {
    this.deps.liveness.setOverride(tenantId, forceLive);
    this.deps.logger.info("live_override_changed", { tenantId, forceLive });
  }

  /** Draws the given period, or the active one when no id is passed. */
  runDraw(input: DrawRequestInput): EconomyDrawOutcome {
    const periodId = input.periodId ?? this.deps.periods.getActive(input.tenantId)?.id;
    if (periodId === undefined) {
      return { status: "no_active_period" };
    }
    const outcome = this.deps.draws.draw({
      tenantId: input.tenantId,
      periodId,
      now: this.clock(),
      ...(input.drawnBy ? { drawnBy: input.drawnBy } : {}),
      ...(input.prizeDescription ? { prizeDescription: input.prizeDescription } : {}),
      ...(input.excludeUserIds ? { excludeUserIds: input.excludeUserIds } : {}),
    });
    this.deps.logger.info("draw_requested", {
      tenantId: input.tenantId,
      periodId,
      status: outcome.status,
      ...(outcome.status === "drawn" ? { winnerUserId: outcome.result.winnerUserId } : {}),
    });
    return outcome;
  }

  /** Dry-runs the draw; defaults to 1000 runs over the active period. */
  simulateDraw(input: SimulateRequestInput): EconomySimulationOutcome {
    const periodId = input.periodId ?? this.deps.periods.getActive(input.tenantId)?.id;
    if (periodId === undefined) {
      return { status: "no_active_period" };
    }
    return this.deps.draws.simulate({
      tenantId: input.tenantId,
      periodId,
      runs: input.runs ?? 1000,
      ...(input.excludeUserIds ? { excludeUserIds: input.excludeUserIds } : {}),
    });
  }

  excludeFromDraws(input: Omit<ExclusionInput, "now">): ExclusionResult {
    const result = this.deps.draws.addExclusion({ ...input, now: this.clock() });
    if (result.ok) {
      this.deps.logger.info("draw_exclusion_added", { tenantId: input.tenantId, exclusionId: result.exclusion.id });
    }
    return result;
  }

  removeDrawExclusion(tenantId: TenantId, exclusionId: number): boolean {
    const removed = this.deps.draws.removeExclusion(tenantId, exclusionId);
    if (removed) {
      this.deps.logger.info("draw_exclusion_removed", { tenantId, exclusionId });
    }
    return removed;
  }

  drawExclusions(tenantId: TenantId): DrawExclusion[] {
    return this.deps.draws.listExclusions(tenantId);
  }

  private logOutcome(
    event: string,
    tenantId: TenantId,
    userId: string,
    amount: number,
    result: { ok: true } | { ok: false; reason: LedgerFailure },
  ): void {
    if (result.ok) {
      this.deps.logger.info(event, { tenantId, userId, amount });
    } else {
      this.deps.logger.warn(`${event}_rejected`, { tenantId, userId, amount, reason: result.reason });
    }
  }
}
