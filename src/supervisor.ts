import type { AccrualScheduler } from "./accrual-scheduler";
import type { RoomResolver } from "./channel-resolver";
import type { CooldownTracker } from "./cooldown";
import { EventQueue } from "./event-queue";
import type { EventRouter } from "./event-router";
import type { LivenessDetector } from "./liveness";
import { normalizeError, type AppLogger } from "./logger";
import type { PeriodManager } from "./period-manager";
import { TenantConnection, type ConnectionExit, type ConnectionOptions } from "./protocol-client";
import type { TenantSessionStore } from "./session-store";
import type { SocketFactory } from "./socket";
import type { TenantSettingsSource } from "./tenant-settings";
import type { NormalizedEvent, TenantId } from "./types";
import type { WagerPollReport, WagerTracker } from "./wager-tracker";

export type SupervisorIntervals = {
  accrualMs: number;
  periodCheckMs: number;
  pruneMs: number;
  tenantSyncMs: number;
  wagerPollMs?: number;
};

export type SupervisorDeps = {
  settings: TenantSettingsSource;
  resolver: RoomResolver;
  sockets: SocketFactory;
  sessions: TenantSessionStore;
  liveness: LivenessDetector;
  cooldowns: CooldownTracker;
  router: EventRouter;
  accrual: AccrualScheduler;
  periods: PeriodManager;
  wagers?: WagerTracker;
  logger: AppLogger;
  connection: ConnectionOptions;
  queueCapacity: number;
  intervals: SupervisorIntervals;
  clock?: () => Date;
  random?: () => number;
};

export type SyncReport = { started: TenantId[]; stopped: TenantId[] };

type Worker = {
  connection: TenantConnection;
  queue: EventQueue<NormalizedEvent>;
  controller: AbortController;
  done: Promise<ConnectionExit | "crashed">;
};

/**
 * Owns one connection loop and one event queue per enabled tenant, plus the
 * interval jobs that act on every tenant. A tenant whose loop exits (missing
 * config, disabled) is dropped and picked up again by the next sync.
 */
export class TenantSupervisor {
  private readonly workers = new Map<TenantId, Worker>();
  private readonly timers: NodeJS.Timeout[] = [];
  private readonly clock: () => Date;
  private stopping = false;

  constructor(private readonly deps: SupervisorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get running(): TenantId[] {
    return [...this.workers.keys()].sort();
  }

  connection(tenantId: TenantId): TenantConnection | undefined {
    return this.workers.get(tenantId)?.connection;
  }

  queue(tenantId: TenantId): EventQueue<NormalizedEvent> | undefined {
    return this.workers.get(tenantId)?.queue;
  }

  start(): void {
    const { intervals } = this.deps;
    this.syncTenants();
    this.runPeriodChecks();
    this.every("tenant_sync", intervals.tenantSyncMs, () => {
      this.syncTenants();
    });
    this.every("accrual", intervals.accrualMs, () => {
      this.deps.accrual.tick(this.clock());
    });
    this.every("period_check", intervals.periodCheckMs, () => {
      this.runPeriodChecks();
    });
    this.every("prune", intervals.pruneMs, () => {
      this.prune();
    });
    if (this.deps.wagers?.enabled && intervals.wagerPollMs) {
      this.every("wager_poll", intervals.wagerPollMs, async () => {
        await this.pollWagers();
      });
    }
    this.deps.logger.info("supervisor_started", { tenants: this.running });
  }

  /** Starts loops for newly enabled tenants and stops the ones removed or disabled. */
  syncTenants(): SyncReport {
    const report: SyncReport = { started: [], stopped: [] };
    if (this.stopping) {
      return report;
    }
    const wanted = new Set(
      this.deps.settings
        .list()
        .filter((config) => config.enabled)
        .map((config) => config.tenantId),
    );

    for (const tenantId of wanted) {
      if (!this.workers.has(tenantId)) {
        this.startTenant(tenantId);
        report.started.push(tenantId);
      }
    }
    for (const [tenantId, worker] of this.workers) {
      if (!wanted.has(tenantId)) {
        worker.controller.abort();
        report.stopped.push(tenantId);
      }
    }
    if (report.started.length > 0 || report.stopped.length > 0) {
      this.deps.logger.info("tenants_synced", report);
    }
    return report;
  }

  runPeriodChecks(now = this.clock()): void {
    for (const config of this.deps.settings.list()) {
      if (!config.enabled) {
        continue;
      }
      try {
        const report = this.deps.periods.checkTransition(config.tenantId, now);
        if (report.action === "created" || report.action === "rolled_over") {
          this.deps.logger.info("period_transition", {
            tenantId: config.tenantId,
            action: report.action,
            periodId: report.period.id,
            ...(report.action === "rolled_over" ? { endedPeriodId: report.endedPeriodId } : {}),
          });
        }
      } catch (error) {
        this.deps.logger.error("period_check_failed", { tenantId: config.tenantId, ...normalizeError(error) });
      }
    }
  }

  prune(now = this.clock()): void {
    const chatters = this.deps.liveness.prune(now.getTime());
    const cooldowns = this.deps.cooldowns.prune(now.getTime());
    if (chatters > 0 || cooldowns > 0) {
      this.deps.logger.debug("state_pruned", { chatters, cooldowns });
    }
  }

  async pollWagers(): Promise<WagerPollReport> {
    if (!this.deps.wagers) {
      return { status: "disabled" };
    }
    const report = await this.deps.wagers.poll();
    if (report.status === "polled") {
      this.deps.logger.debug("wager_poll_completed", { users: report.users, tenants: report.tenants.length });
    }
    return report;
  }

  async stop(): Promise<void> {
    this.stopping = true;
    for (const timer of this.timers.splice(0)) {
      clearInterval(timer);
    }
    const workers = [...this.workers.values()];
    for (const worker of workers) {
      worker.controller.abort();
    }
    await Promise.all(workers.map((worker) => worker.done));
    this.deps.logger.info("supervisor_stopped", { tenants: workers.length });
  }

  private startTenant(tenantId: TenantId): void {
    const { logger } = this.deps;
    const queue = new EventQueue<NormalizedEvent>({
      capacity: this.deps.queueCapacity,
      logger: logger.child({ tenantId }),
      retain: (event) => event.kind === "gift",
      handler: async (event) => {
        await this.deps.router.route(tenantId, event);
      },
    });
    const connection = new TenantConnection({
      tenantId,
      settings: this.deps.settings,
      resolver: this.deps.resolver,
      sockets: this.deps.sockets,
      sessions: this.deps.sessions,
      sink: (event) => {
        queue.push(event);
      },
      onUnknown: (eventName) => this.deps.router.noteUnknown(tenantId, eventName),
      logger,
      options: this.deps.connection,
      ...(this.deps.random ? { random: this.deps.random } : {}),
    });
    const controller = new AbortController();

    const worker: Worker = {
      connection,
      queue,
      controller,
      done: connection
        .run(controller.signal)
        .catch((error: unknown): "crashed" => {
          logger.error("tenant_loop_crashed", { tenantId, ...normalizeError(error) });
          return "crashed";
        })
        .then(async (exit) => {
          await queue.close();
          if (this.workers.get(tenantId) === worker) {
            this.workers.delete(tenantId);
          }
          logger.info("tenant_stopped", { tenantId, exit });
          return exit;
        }),
    };
    this.workers.set(tenantId, worker);
    logger.info("tenant_started", { tenantId });
  }

  /** A run still in flight when the next tick fires is not started twice. */
  private every(task: string, intervalMs: number, run: () => void | Promise<void>): void {
    let busy = false;
    const timer = setInterval(() => {
      if (busy) {
        this.deps.logger.warn("task_still_running", { task });
        return;
      }
      busy = true;
      void Promise.resolve()
        .then(run)
        .catch((error: unknown) => {
          this.deps.logger.error("task_failed", { task, ...normalizeError(error) });
        })
        .finally(() => {
          busy = false;
        });
    }, intervalMs);
    timer.unref();
    this.timers.push(timer);
  }
}
