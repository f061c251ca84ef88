import fs from "node:fs";
import path from "node:path";

import Database from "better-sqlite3";

export type EconomyDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tenant_settings (
    tenant_id TEXT PRIMARY KEY,
    channel_slug TEXT NOT NULL,
    room_id TEXT,
    platform_channel_id TEXT,
    revision INTEGER NOT NULL DEFAULT 1,
    enabled INTEGER NOT NULL DEFAULT 1,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS account_links (
    tenant_id TEXT NOT NULL,
    username TEXT NOT NULL,
    user_id TEXT NOT NULL,
    linked_at TEXT NOT NULL,
    PRIMARY KEY (tenant_id, username)
  );

  CREATE TABLE IF NOT EXISTS periods (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tenant_id TEXT NOT NULL,
    start_at TEXT NOT NULL,
    end_at TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('active', 'ended')),
    total_tickets INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    ended_at TEXT
  );
  CREATE UNIQUE INDEX IF NOT EXISTS idx_periods_one_active
    ON periods (tenant_id) WHERE status = 'active';

  CREATE TABLE IF NOT EXISTS ticket_balances (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    period_id INTEGER NOT NULL REFERENCES periods (id),
    tenant_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    username TEXT NOT NULL,
    presence_tickets INTEGER NOT NULL DEFAULT 0 CHECK (presence_tickets >= 0),
    gift_tickets INTEGER NOT NULL DEFAULT 0 CHECK (gift_tickets >= 0),
    wager_tickets INTEGER NOT NULL DEFAULT 0 CHECK (wager_tickets >= 0),
    bonus_tickets INTEGER NOT NULL DEFAULT 0 CHECK (bonus_tickets >= 0),
    total_tickets INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL,
    UNIQUE (period_id, user_id),
    CHECK (total_tickets = presence_tickets + gift_tickets + wager_tickets + bonus_tickets)
  );
  CREATE INDEX IF NOT EXISTS idx_ticket_balances_total
    ON ticket_balances (period_id, total_tickets DESC);

  CREATE TABLE IF NOT EXISTS ticket_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    period_id INTEGER NOT NULL REFERENCES periods (id),
    tenant_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    username TEXT NOT NULL,
    delta INTEGER NOT NULL,
    source TEXT NOT NULL,
    description TEXT NOT NULL,
    created_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_ticket_log_user ON ticket_log (period_id, user_id);

  CREATE TABLE IF NOT EXISTS conversions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    period_id INTEGER NOT NULL REFERENCES periods (id),
    tenant_id TEXT NOT NULL,
    user_key TEXT NOT NULL,
    basis_key TEXT NOT NULL,
    units INTEGER NOT NULL,
    tickets_awarded INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE (period_id, user_key, basis_key)
  );

  CREATE TABLE IF NOT EXISTS gift_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tenant_id TEXT NOT NULL,
    period_id INTEGER NOT NULL REFERENCES periods (id),
    event_id TEXT NOT NULL,
    gifter_username TEXT NOT NULL,
    user_id TEXT,
    recipient_count INTEGER NOT NULL,
    tickets_awarded INTEGER NOT NULL,
    created_at TEXT NOT NULL,
    UNIQUE (tenant_id, event_id)
  );

  CREATE TABLE IF NOT EXISTS draws (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    period_id INTEGER NOT NULL UNIQUE REFERENCES periods (id),
    tenant_id TEXT NOT NULL,
    total_tickets INTEGER NOT NULL,
    total_participants INTEGER NOT NULL,
    winner_user_id TEXT NOT NULL,
    winner_username TEXT NOT NULL,
    winner_tickets INTEGER NOT NULL,
    winning_ticket INTEGER NOT NULL,
    win_probability REAL NOT NULL,
    prize_description TEXT,
    drawn_by TEXT,
    server_seed TEXT NOT NULL,
    client_seed TEXT NOT NULL,
    nonce TEXT NOT NULL,
    proof_hash TEXT NOT NULL,
    proof_rounds INTEGER NOT NULL,
    drawn_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS draw_exclusions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    tenant_id TEXT NOT NULL,
    username TEXT,
    user_id TEXT,
    reason TEXT,
    created_at TEXT NOT NULL,
    CHECK (username IS NOT NULL OR user_id IS NOT NULL)
  );
  CREATE INDEX IF NOT EXISTS idx_draw_exclusions_tenant ON draw_exclusions (tenant_id);

  CREATE TABLE IF NOT EXISTS wager_links (
    tenant_id TEXT NOT NULL,
    wager_username TEXT NOT NULL,
    user_id TEXT NOT NULL,
    username TEXT NOT NULL,
    linked_at TEXT NOT NULL,
    PRIMARY KEY (tenant_id, wager_username)
  );

  CREATE TABLE IF NOT EXISTS wager_totals (
    period_id INTEGER NOT NULL REFERENCES periods (id),
    tenant_id TEXT NOT NULL,
    wager_username TEXT NOT NULL,
    baseline_cents INTEGER NOT NULL,
    last_seen_cents INTEGER NOT NULL,
    tickets_awarded INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (period_id, wager_username)
  );

  CREATE TABLE IF NOT EXISTS presence_minutes (
    tenant_id TEXT NOT NULL,
    username TEXT NOT NULL,
    minutes INTEGER NOT NULL DEFAULT 0,
    last_active_at TEXT NOT NULL,
    PRIMARY KEY (tenant_id, username)
  );
`;

/** Opens (and migrates) the store. `:memory:` is accepted for tests. */
export function openDatabase(storagePath: string): EconomyDatabase {
  if (storagePath !== ":memory:") {
    fs.mkdirSync(path.dirname(storagePath), { recursive: true });
  }
  const db = new Database(storagePath);
  if (storagePath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}
