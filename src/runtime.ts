import type { AxiosInstance } from "axios";

import { AccountLinks } from "./account-links";
import { AccrualScheduler } from "./accrual-scheduler";
import { HttpRoomResolver, type RoomResolver } from "./channel-resolver";
import type { AppConfig } from "./config";
import { CooldownTracker } from "./cooldown";
import { openDatabase, type EconomyDatabase } from "./database";
import { FairDrawEngine } from "./draw";
import { TicketEconomy } from "./economy";
import { EventRouter, type ChatConsumer, type ChatSender } from "./event-router";
import { LivenessDetector } from "./liveness";
import type { AppLogger } from "./logger";
import { PeriodManager } from "./period-manager";
import { PresenceStore } from "./presence";
import { TenantSessionStore } from "./session-store";
import { createWsSocketFactory, type SocketFactory } from "./socket";
import { TenantSupervisor } from "./supervisor";
import { SqliteTenantSettings } from "./tenant-settings";
import { TicketLedger } from "./ticket-ledger";
import { WagerTracker } from "./wager-tracker";

/** Collaborator-supplied pieces; everything else is built from config. */
export type RuntimeOverrides = {
  /** Outgoing chat, used for gift thank-you messages. */
  chatSender?: ChatSender;
  sockets?: SocketFactory;
  resolver?: RoomResolver;
  wagerHttp?: AxiosInstance;
};

export type Runtime = {
  db: EconomyDatabase;
  settings: SqliteTenantSettings;
  links: AccountLinks;
  periods: PeriodManager;
  router: EventRouter;
  wagers: WagerTracker;
  economy: TicketEconomy;
  supervisor: TenantSupervisor;
  registerChatConsumer(consumer: ChatConsumer): void;
  start(): void;
  /** Stops every tenant loop, then closes the database. */
  stop(): Promise<void>;
};

const MINUTE_MS = 60_000;

export function createRuntime(config: AppConfig, logger: AppLogger, overrides: RuntimeOverrides = {}): Runtime {
  const db = openDatabase(config.databasePath);

  const settings = new SqliteTenantSettings(db);
  for (const seed of config.seedTenants) {
    settings.upsert(seed);
  }
  const enabledTenants = () =>
    settings
      .list()
      .filter((tenant) => tenant.enabled)
      .map((tenant) => tenant.tenantId);

  const sessions = new TenantSessionStore();
  const liveness = new LivenessDetector(sessions, {
    windowMs: config.livenessWindowMs,
    minUniqueChatters: config.livenessMinUniqueChatters,
  });
  const cooldowns = new CooldownTracker();
  const ledger = new TicketLedger(db);
  const presence = new PresenceStore(db);
  const links = new AccountLinks(db);
  const draws = new FairDrawEngine(db, ledger);
  const periods = new PeriodManager(db, ledger, presence, draws, logger, {
    autoDraw: config.autoDraw,
    autoDrawLeadMs: config.autoDrawLeadMs,
  });

  if (config.giftThanksEnabled && !overrides.chatSender) {
    logger.warn("gift_thanks_disabled", { reason: "no_chat_sender" });
  }
  const router = new EventRouter({
    db,
    ledger,
    periods,
    links,
    cooldowns,
    logger,
    giftTicketsPerSub: config.giftTicketsPerSub,
    chatCooldownSeconds: config.chatCooldownSeconds,
    giftThanks: config.giftThanksEnabled,
    ...(overrides.chatSender ? { chatSender: overrides.chatSender } : {}),
  });
  const accrual = new AccrualScheduler({
    sessions,
    liveness,
    periods,
    ledger,
    presence,
    links,
    logger,
    options: {
      // Config only admits whole minutes.
      minutesPerTick: config.accrualIntervalMs / MINUTE_MS,
      presenceWindowMs: config.presenceWindowMs,
      minutesPerUnit: config.presenceMinutesPerUnit,
      ticketsPerUnit: config.presenceTicketsPerUnit,
    },
  });
  const wagers = new WagerTracker({
    db,
    ledger,
    periods,
    logger: logger.child({ component: "wagers" }),
    options: {
      feedUrl: config.wagerFeedUrl,
      campaignCodes: config.wagerCampaignCodes,
      ticketsPer1000: config.wagerTicketsPer1000,
      httpTimeoutMs: config.httpTimeoutMs,
    },
    tenants: enabledTenants,
    ...(overrides.wagerHttp ? { http: overrides.wagerHttp } : {}),
  });
  const supervisor = new TenantSupervisor({
    settings,
    resolver: overrides.resolver ?? new HttpRoomResolver(config.kickApiUrl, config.httpTimeoutMs),
    sockets: overrides.sockets ?? createWsSocketFactory({ handshakeTimeoutMs: config.handshakeTimeoutMs }),
    sessions,
    liveness,
    cooldowns,
    router,
    accrual,
    periods,
    wagers,
    logger,
    connection: {
      wsUrl: config.kickWsUrl,
      protocol: { eventPrefix: config.eventPrefix, roomChannelPrefix: config.roomChannelPrefix },
      receiveIdleTimeoutMs: config.receiveIdleTimeoutMs,
      handshakeTimeoutMs: config.handshakeTimeoutMs,
      reconnectBaseMs: config.reconnectBaseMs,
      reconnectMaxMs: config.reconnectMaxMs,
    },
    queueCapacity: config.eventQueueCapacity,
    intervals: {
      accrualMs: config.accrualIntervalMs,
      periodCheckMs: config.periodCheckIntervalMs,
      pruneMs: config.livenessWindowMs,
      tenantSyncMs: config.tenantSyncIntervalMs,
      wagerPollMs: config.wagerPollIntervalMs,
    },
  });
  const economy = new TicketEconomy({ sessions, liveness, ledger, periods, draws, logger });

  return {
    db,
    settings,
    links,
    periods,
    router,
    wagers,
    economy,
    supervisor,
    registerChatConsumer: (consumer) => router.registerChatConsumer(consumer),
    start: () => {
      supervisor.start();
      logger.info("economy_started", {
        databasePath: config.databasePath,
        tenants: supervisor.running,
        wagers: wagers.enabled,
      });
    },
    stop: async () => {
      try {
        await supervisor.stop();
      } finally {
        db.close();
      }
    },
  };
}
