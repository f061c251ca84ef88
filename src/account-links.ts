import type { EconomyDatabase } from "./database";
import { normalizeUserKey } from "./session-store";
import type { TenantId } from "./types";

export type AccountLink = {
  tenantId: TenantId;
  username: string;
  userId: string;
  linkedAt: string;
};

type LinkRow = {
  tenant_id: string;
  username: string;
  user_id: string;
  linked_at: string;
};

/** Platform username to internal account id. The linking flow itself lives elsewhere. */
export class AccountLinks {
  constructor(private readonly db: EconomyDatabase) {}

  lookup(tenantId: TenantId, username: string): AccountLink | undefined {
    const row = this.db
      .prepare<[string, string], LinkRow>("SELECT * FROM account_links WHERE tenant_id = ? AND username = ?")
      .get(tenantId, normalizeUserKey(username));
    if (!row) {
      return undefined;
    }
    return { tenantId: row.tenant_id, username: row.username, userId: row.user_id, linkedAt: row.linked_at };
  }

  link(tenantId: TenantId, username: string, userId: string, now = new Date()): AccountLink {
    const key = normalizeUserKey(username);
    const linkedAt = now.toISOString();
    this.db
      .prepare(
        `INSERT INTO account_links (tenant_id, username, user_id, linked_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT (tenant_id, username) DO UPDATE SET user_id = excluded.user_id, linked_at = excluded.linked_at`,
      )
      .run(tenantId, key, userId, linkedAt);
    return { tenantId, username: key, userId, linkedAt };
  }

  unlink(tenantId: TenantId, username: string): boolean {
    const result = this.db
      .prepare("DELETE FROM account_links WHERE tenant_id = ? AND username = ?")
      .run(tenantId, normalizeUserKey(username));
    return result.changes > 0;
  }
}
