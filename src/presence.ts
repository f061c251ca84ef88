import type { EconomyDatabase } from "./database";
import { normalizeUserKey } from "./session-store";
import type { TenantId } from "./types";

export type PresenceTotal = {
  username: string;
  minutes: number;
  lastActiveAt: string;
};

type PresenceRow = { username: string; minutes: number; last_active_at: string };

/** Cumulative watch minutes per tenant and viewer; the accrual basis. Never reset. */
export class PresenceStore {
  constructor(private readonly db: EconomyDatabase) {}

  addMinutes(tenantId: TenantId, username: string, minutes: number, now = new Date()): number {
    const key = normalizeUserKey(username);
    this.db
      .prepare(
        `INSERT INTO presence_minutes (tenant_id, username, minutes, last_active_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (tenant_id, username) DO UPDATE SET
           minutes = minutes + excluded.minutes,
           last_active_at = excluded.last_active_at`,
      )
      .run(tenantId, key, minutes, now.toISOString());
    return this.minutes(tenantId, key);
  }

  minutes(tenantId: TenantId, username: string): number {
    const row = this.db
      .prepare<[string, string], { minutes: number }>(
        "SELECT minutes FROM presence_minutes WHERE tenant_id = ? AND username = ?",
      )
      .get(tenantId, normalizeUserKey(username));
    return row?.minutes ?? 0;
  }

  totals(tenantId: TenantId): PresenceTotal[] {
    return this.db
      .prepare<[string], PresenceRow>(
        "SELECT username, minutes, last_active_at FROM presence_minutes WHERE tenant_id = ? ORDER BY username",
      )
      .all(tenantId)
      .map((row) => ({ username: row.username, minutes: row.minutes, lastActiveAt: row.last_active_at }));
  }
}
