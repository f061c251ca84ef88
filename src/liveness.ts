import type { TenantSessionStore } from "./session-store";
import type { TenantId } from "./types";

export const DEFAULT_LIVENESS_WINDOW_MS = 5 * 60 * 1000;
export const DEFAULT_MIN_UNIQUE_CHATTERS = 2;

export type LivenessReason = "override" | "no_session" | "stale_activity" | "too_few_chatters" | "live";

export type LivenessVerdict = {
  live: boolean;
  reason: LivenessReason;
  uniqueChatters: number;
};

export type LivenessInput = {
  lastActivityAt: number | null;
  recentChatters: ReadonlyMap<string, number>;
  now: number;
  windowMs: number;
  minUniqueChatters: number;
  forceLive?: boolean;
};

/**
 * Two-factor check: recent activity within the window and at least
 * `minUniqueChatters` distinct chatters inside the same window.
 */
export function evaluateLiveness(input: LivenessInput): LivenessVerdict {
  const since = input.now - input.windowMs;
  let uniqueChatters = 0;
  for (const lastSeenAt of input.recentChatters.values()) {
    if (lastSeenAt >= since) {
      uniqueChatters += 1;
    }
  }

  if (input.forceLive) {
    return { live: true, reason: "override", uniqueChatters };
  }
  if (input.lastActivityAt === null || input.lastActivityAt < since) {
    return { live: false, reason: "stale_activity", uniqueChatters };
  }
  if (uniqueChatters < input.minUniqueChatters) {
    return { live: false, reason: "too_few_chatters", uniqueChatters };
  }
  return { live: true, reason: "live", uniqueChatters };
}

export type LivenessOptions = {
  windowMs?: number;
  minUniqueChatters?: number;
};

export class LivenessDetector {
  private readonly overrides = new Set<TenantId>();
  private readonly windowMs: number;
  private readonly minUniqueChatters: number;

  constructor(
    private readonly sessions: TenantSessionStore,
    options: LivenessOptions = {},
  ) {
    this.windowMs = options.windowMs ?? DEFAULT_LIVENESS_WINDOW_MS;
    this.minUniqueChatters = options.minUniqueChatters ?? DEFAULT_MIN_UNIQUE_CHATTERS;
  }

  /** Operator switch that bypasses both checks until cleared. */
  setOverride(tenantId: TenantId, forceLive: boolean): void {
    if (forceLive) {
      this.overrides.add(tenantId);
    } else {
      this.overrides.delete(tenantId);
    }
  }

  hasOverride(tenantId: TenantId): boolean {
    return this.overrides.has(tenantId);
  }

  evaluate(
    tenantId: TenantId,
    now: number,
    windowMs: number = this.windowMs,
    minUniqueChatters: number = this.minUniqueChatters,
  ): LivenessVerdict {
    const forceLive = this.overrides.has(tenantId);
    const session = this.sessions.get(tenantId);
    if (!session) {
      return forceLive
        ? { live: true, reason: "override", uniqueChatters: 0 }
        : { live: false, reason: "no_session", uniqueChatters: 0 };
    }
    return evaluateLiveness({
      lastActivityAt: session.lastActivityAt,
      recentChatters: session.recentChatters,
      now,
      windowMs,
      minUniqueChatters,
      forceLive,
    });
  }

  isLive(tenantId: TenantId, now: number, windowMs?: number, minUniqueChatters?: number): boolean {
    return this.evaluate(tenantId, now, windowMs, minUniqueChatters).live;
  }

  /** Drops chatter entries older than twice the window. */
  prune(now: number): number {
    return this.sessions.prune(now - 2 * this.windowMs);
  }
}
