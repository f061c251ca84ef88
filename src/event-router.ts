import type { AccountLinks } from "./account-links";
import type { CooldownTracker } from "./cooldown";
import type { EconomyDatabase } from "./database";
import { normalizeError, type AppLogger } from "./logger";
import type { PeriodManager } from "./period-manager";
import { normalizeUserKey } from "./session-store";
import type { TicketLedger } from "./ticket-ledger";
import type { ChatMessageEvent, GiftSubscriptionEvent, NormalizedEvent, TenantId } from "./types";

/** Outgoing chat capability; the platform client that implements it lives outside the core. */
export interface ChatSender {
  send(tenantId: TenantId, message: string): Promise<void>;
}

/** A rate-limited reaction to chat messages, e.g. a request queue command. */
export interface ChatConsumer {
  name: string;
  /** Per-user cooldown; falls back to the router's `chatCooldownSeconds`. */
  cooldownSeconds?: number;
  matches(event: ChatMessageEvent): boolean;
  handle(tenantId: TenantId, event: ChatMessageEvent): Promise<void> | void;
}

export type GiftOutcome =
  | { status: "duplicate" }
  | { status: "not_linked" }
  | { status: "no_active_period" }
  | { status: "awarded"; userId: string; periodId: number; tickets: number };

export type RouteOutcome =
  | { kind: "gift"; outcome: GiftOutcome }
  | { kind: "chat"; delivered: number; throttled: number }
  | { kind: "heartbeat" };

export type RouterCounters = {
  chat: number;
  gift: number;
  heartbeat: number;
  unknown: number;
  duplicates: number;
};

export type EventRouterDeps = {
  db: EconomyDatabase;
  ledger: TicketLedger;
  periods: PeriodManager;
  links: AccountLinks;
  cooldowns: CooldownTracker;
  logger: AppLogger;
  giftTicketsPerSub: number;
  chatCooldownSeconds?: number;
  chatSender?: ChatSender;
  giftThanks?: boolean;
  clock?: () => Date;
};

export class EventRouter {
  readonly counters: RouterCounters = { chat: 0, gift: 0, heartbeat: 0, unknown: 0, duplicates: 0 };
  private readonly consumers: ChatConsumer[] = [];
  private readonly clock: () => Date;

  constructor(private readonly deps: EventRouterDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  registerChatConsumer(consumer: ChatConsumer): void {
    this.consumers.push(consumer);
  }

  async route(tenantId: TenantId, event: NormalizedEvent): Promise<RouteOutcome> {
    switch (event.kind) {
      case "gift": {
        this.counters.gift += 1;
        const outcome = this.handleGift(tenantId, event);
        if (outcome.status === "awarded") {
          await this.thankGifter(tenantId, event, outcome.tickets);
        }
        return { kind: "gift", outcome };
      }
      case "chat":
        this.counters.chat += 1;
        return this.handleChat(tenantId, event);
      case "heartbeat":
        this.counters.heartbeat += 1;
        return { kind: "heartbeat" };
    }
  }

  /** Frames the classifier could not place; counted, never raised. */
  noteUnknown(tenantId: TenantId, eventName: string): void {
    this.counters.unknown += 1;
    this.deps.logger.debug("event_unknown", { tenantId, eventName });
  }

  /**
   * Records the gift in the event log and awards tickets in one transaction.
   * The log's (tenant, event id) uniqueness makes replays no-ops. Nothing is
   * written while the tenant has no active period.
   */
  handleGift(tenantId: TenantId, event: GiftSubscriptionEvent): GiftOutcome {
    const { db, ledger, periods, links, logger, giftTicketsPerSub } = this.deps;
    const now = this.clock();

    const run = db.transaction((): GiftOutcome => {
      // Without a period the event id stays unclaimed so a redelivery can still award.
      const period = periods.getActive(tenantId);
      if (!period) {
        return { status: "no_active_period" };
      }
      const link = links.lookup(tenantId, event.gifterUser);
      const tickets = link ? event.recipientCount * giftTicketsPerSub : 0;

      const inserted = db
        .prepare(
          `INSERT OR IGNORE INTO gift_events
             (tenant_id, period_id, event_id, gifter_username, user_id, recipient_count, tickets_awarded, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          tenantId,
          period.id,
          event.eventId,
          normalizeUserKey(event.gifterUser),
          link?.userId ?? null,
          event.recipientCount,
          tickets,
          now.toISOString(),
        );
      if (inserted.changes === 0) {
        return { status: "duplicate" };
      }
      if (!link) {
        return { status: "not_linked" };
      }

      const award = ledger.award({
        tenantId,
        periodId: period.id,
        userId: link.userId,
        username: normalizeUserKey(event.gifterUser),
        amount: tickets,
        source: "gift",
        description: `${event.recipientCount} gifted sub${event.recipientCount === 1 ? "" : "s"} (${event.eventId})`,
        now,
      });
      if (!award.ok) {
        throw new Error(`gift award rejected: ${award.reason}`);
      }
      return { status: "awarded", userId: link.userId, periodId: period.id, tickets };
    });

    const outcome = run();
    if (outcome.status === "duplicate") {
      this.counters.duplicates += 1;
    }
    logger.info("gift_routed", {
      tenantId,
      eventId: event.eventId,
      gifter: event.gifterUser,
      recipientCount: event.recipientCount,
      status: outcome.status,
      ...(outcome.status === "awarded" ? { tickets: outcome.tickets, userId: outcome.userId } : {}),
      ...(event.synthesizedId ? { synthesizedId: true } : {}),
    });
    return outcome;
  }

  private async handleChat(tenantId: TenantId, event: ChatMessageEvent): Promise<RouteOutcome> {
    let delivered = 0;
    let throttled = 0;
    for (const consumer of this.consumers) {
      if (!consumer.matches(event)) {
        continue;
      }
      const allowed = this.deps.cooldowns.allow(
        tenantId,
        `${consumer.name}:${event.user}`,
        consumer.cooldownSeconds ?? this.deps.chatCooldownSeconds ?? 0,
        this.clock().getTime(),
      );
      if (!allowed) {
        throttled += 1;
        continue;
      }
      try {
        await consumer.handle(tenantId, event);
        delivered += 1;
      } catch (error) {
        this.deps.logger.error("chat_consumer_failed", { tenantId, consumer: consumer.name, ...normalizeError(error) });
      }
    }
    return { kind: "chat", delivered, throttled };
  }

  private async thankGifter(tenantId: TenantId, event: GiftSubscriptionEvent, tickets: number): Promise<void> {
    const { chatSender, giftThanks, logger } = this.deps;
    if (!giftThanks || !chatSender) {
      return;
    }
    const subs = `${event.recipientCount} sub${event.recipientCount === 1 ? "" : "s"}`;
    try {
      await chatSender.send(tenantId, `Thanks @${event.gifterUser} for gifting ${subs}! +${tickets} tickets`);
    } catch (error) {
      logger.warn("gift_thanks_failed", { tenantId, eventId: event.eventId, ...normalizeError(error) });
    }
  }
}
