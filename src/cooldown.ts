import { normalizeUserKey } from "./session-store";
import type { TenantId } from "./types";

export type CooldownResult = { ok: true } | { ok: false; waitSeconds: number };

/** Per tenant+user gate. An allowed call moves the next allowed time forward. */
export class CooldownTracker {
  private readonly nextAllowedAt = new Map<string, number>();

  hit(tenantId: TenantId, userKey: string, cooldownSeconds: number, now = Date.now()): CooldownResult {
    const key = `${tenantId}:${normalizeUserKey(userKey)}`;
    const nextAllowedAt = this.nextAllowedAt.get(key) ?? 0;
    if (nextAllowedAt > now) {
      return {
        ok: false,
        waitSeconds: Math.max(1, Math.ceil((nextAllowedAt - now) / 1000)),
      };
    }
    this.nextAllowedAt.set(key, now + cooldownSeconds * 1000);
    return { ok: true };
  }

  allow(tenantId: TenantId, userKey: string, cooldownSeconds: number, now = Date.now()): boolean {
    return this.hit(tenantId, userKey, cooldownSeconds, now).ok;
  }

  /** Forgets entries whose cooldown has already expired. */
  prune(now = Date.now()): number {
    let removed = 0;
    for (const [key, nextAllowedAt] of this.nextAllowedAt) {
      if (nextAllowedAt <= now) {
        this.nextAllowedAt.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
