import type { EconomyDatabase } from "./database";
import type { TenantConfig, TenantId } from "./types";

/** Read side of the settings collaborator. `revision` grows on every change. */
export interface TenantSettingsSource {
  get(tenantId: TenantId): TenantConfig | undefined;
  list(): TenantConfig[];
}

export type TenantSettingsInput = {
  tenantId: TenantId;
  channelSlug: string;
  roomId?: string | null;
  platformChannelId?: string | null;
  enabled?: boolean;
};

type SettingsRow = {
  tenant_id: string;
  channel_slug: string;
  room_id: string | null;
  platform_channel_id: string | null;
  revision: number;
  enabled: number;
};

function toConfig(row: SettingsRow): TenantConfig {
  return {
    tenantId: row.tenant_id,
    channelSlug: row.channel_slug,
    ...(row.room_id ? { roomId: row.room_id } : {}),
    ...(row.platform_channel_id ? { platformChannelId: row.platform_channel_id } : {}),
    revision: row.revision,
    enabled: row.enabled === 1,
  };
}

export class SqliteTenantSettings implements TenantSettingsSource {
  constructor(private readonly db: EconomyDatabase) {}

  get(tenantId: TenantId): TenantConfig | undefined {
    const row = this.db
      .prepare<[string], SettingsRow>("SELECT * FROM tenant_settings WHERE tenant_id = ?")
      .get(tenantId);
    return row ? toConfig(row) : undefined;
  }

  list(): TenantConfig[] {
    return this.db
      .prepare<[], SettingsRow>("SELECT * FROM tenant_settings ORDER BY tenant_id")
      .all()
      .map(toConfig);
  }

  /** Inserts or replaces a tenant's binding; an actual change bumps the revision. */
  upsert(input: TenantSettingsInput, now = new Date()): TenantConfig {
    const run = this.db.transaction((): TenantConfig => {
      const current = this.get(input.tenantId);
      const next = {
        channelSlug: input.channelSlug,
        roomId: input.roomId ?? null,
        platformChannelId: input.platformChannelId ?? null,
        enabled: input.enabled ?? true,
      };
      if (
        current &&
        current.channelSlug === next.channelSlug &&
        (current.roomId ?? null) === next.roomId &&
        (current.platformChannelId ?? null) === next.platformChannelId &&
        current.enabled === next.enabled
      ) {
        return current;
      }
      const revision = (current?.revision ?? 0) + 1;
      this.db
        .prepare(
          `INSERT INTO tenant_settings
             (tenant_id, channel_slug, room_id, platform_channel_id, revision, enabled, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (tenant_id) DO UPDATE SET
             channel_slug = excluded.channel_slug,
             room_id = excluded.room_id,
             platform_channel_id = excluded.platform_channel_id,
             revision = excluded.revision,
             enabled = excluded.enabled,
             updated_at = excluded.updated_at`,
        )
        .run(
          input.tenantId,
          next.channelSlug,
          next.roomId,
          next.platformChannelId,
          revision,
          next.enabled ? 1 : 0,
          now.toISOString(),
        );
      return {
        tenantId: input.tenantId,
        channelSlug: next.channelSlug,
        ...(next.roomId ? { roomId: next.roomId } : {}),
        ...(next.platformChannelId ? { platformChannelId: next.platformChannelId } : {}),
        revision,
        enabled: next.enabled,
      };
    });
    return run();
  }
}
