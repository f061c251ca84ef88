import type { TenantId } from "./types";

export interface Session {
  activeViewers: Map<string, number>;
  recentChatters: Map<string, number>;
  lastActivityAt: number | null;
  openedAt: number;
}

export type SessionSnapshot = {
  activeViewers: number;
  recentChatters: number;
  lastActivityAt: number | null;
};

export function normalizeUserKey(user: string): string {
  return user.trim().toLowerCase();
}

/**
 * Registry of per-tenant viewer state. Each tenant's entry is written only by
 * that tenant's connection loop; readers (liveness, accrual) take snapshots.
 */
export class TenantSessionStore {
  private readonly sessions = new Map<TenantId, Session>();

  open(tenantId: TenantId, now: number): Session {
    const session: Session = {
      activeViewers: new Map(),
      recentChatters: new Map(),
      lastActivityAt: null,
      openedAt: now,
    };
    this.sessions.set(tenantId, session);
    return session;
  }

  discard(tenantId: TenantId): void {
    this.sessions.delete(tenantId);
  }

  get(tenantId: TenantId): Session | undefined {
    return this.sessions.get(tenantId);
  }

  tenants(): TenantId[] {
    return [...this.sessions.keys()];
  }

  /** Returns false when the tenant has no open session. */
  recordChatActivity(tenantId: TenantId, user: string, at: number): boolean {
    const session = this.sessions.get(tenantId);
    const userKey = normalizeUserKey(user);
    if (!session || !userKey) {
      return false;
    }

    session.activeViewers.set(userKey, Math.max(session.activeViewers.get(userKey) ?? at, at));
    session.recentChatters.set(userKey, Math.max(session.recentChatters.get(userKey) ?? at, at));
    if (session.lastActivityAt === null || at > session.lastActivityAt) {
      session.lastActivityAt = at;
    }
    return true;
  }

  activeViewersSince(tenantId: TenantId, since: number): string[] {
    const session = this.sessions.get(tenantId);
    if (!session) {
      return [];
    }
    return [...session.activeViewers.entries()]
      .filter(([, lastSeenAt]) => lastSeenAt >= since)
      .map(([userKey]) => userKey);
  }

  countRecentChatters(tenantId: TenantId, since: number): number {
    const session = this.sessions.get(tenantId);
    if (!session) {
      return 0;
    }
    let count = 0;
    for (const lastSeenAt of session.recentChatters.values()) {
      if (lastSeenAt >= since) {
        count += 1;
      }
    }
    return count;
  }

  snapshot(tenantId: TenantId): SessionSnapshot | undefined {
    const session = this.sessions.get(tenantId);
    if (!session) {
      return undefined;
    }
    return {
      activeViewers: session.activeViewers.size,
      recentChatters: session.recentChatters.size,
      lastActivityAt: session.lastActivityAt,
    };
  }

  /** Evicts viewer and chatter entries last seen before `olderThan`. Returns the number removed. */
  prune(olderThan: number): number {
    let removed = 0;
    for (const session of this.sessions.values()) {
      for (const map of [session.activeViewers, session.recentChatters]) {
        for (const [userKey, lastSeenAt] of map) {
          if (lastSeenAt < olderThan) {
            map.delete(userKey);
            removed += 1;
          }
        }
      }
    }
    return removed;
  }
}
