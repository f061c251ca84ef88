import assert from "node:assert";
import { afterEach, describe, it } from "node:test";

import { loadConfig, parseCampaignCodes, parseSeedTenants } from "./config";

const ORIGINAL_ENV = { ...process.env };

afterEach(() => {
  process.env = { ...ORIGINAL_ENV };
});

function withEnv(values: Record<string, string | undefined>): void {
  process.env = {
    ...ORIGINAL_ENV,
    ...values,
  };
}

const CONFIG_KEYS = [
  "KICK_API_URL",
  "KICK_EVENT_PREFIX",
  "KICK_ROOM_CHANNEL_PREFIX",
  "DATABASE_PATH",
  "LOG_PATH",
  "LOG_TO_CONSOLE",
  "RECEIVE_IDLE_TIMEOUT_MS",
  "HANDSHAKE_TIMEOUT_MS",
  "HTTP_TIMEOUT_MS",
  "RECONNECT_BASE_MS",
  "RECONNECT_MAX_MS",
  "EVENT_QUEUE_CAPACITY",
  "LIVENESS_WINDOW_MS",
  "LIVENESS_MIN_UNIQUE_CHATTERS",
  "ACCRUAL_INTERVAL_MS",
  "PRESENCE_WINDOW_MS",
  "PRESENCE_MINUTES_PER_UNIT",
  "PRESENCE_TICKETS_PER_UNIT",
  "GIFT_TICKETS_PER_SUB",
  "GIFT_THANKS_ENABLED",
  "CHAT_COOLDOWN_SECONDS",
  "PERIOD_CHECK_INTERVAL_MS",
  "AUTO_DRAW",
  "AUTO_DRAW_LEAD_MS",
  "TENANT_SYNC_INTERVAL_MS",
  "SEED_TENANTS",
  "WAGER_FEED_URL",
  "WAGER_CAMPAIGN_CODES",
  "WAGER_TICKETS_PER_1000",
  "WAGER_POLL_INTERVAL_MS",
];

function withOnlyRequiredEnv(values: Record<string, string>): void {
  const cleared = Object.fromEntries(CONFIG_KEYS.map((key) => [key, undefined]));
  withEnv({ ...cleared, ...values });
  for (const key of CONFIG_KEYS) {
    if (!(key in values)) {
      delete process.env[key];
    }
  }
}

describe("loadConfig", () => {
  it("parses explicit env values", () => {
    withEnv({
      KICK_WS_URL: "wss://ws.example.test/app/key?protocol=7",
      KICK_API_URL: "https://api.example.test/v2/",
      KICK_EVENT_PREFIX: "pusher:",
      KICK_ROOM_CHANNEL_PREFIX: "chatrooms",
      DATABASE_PATH: "data/custom.db",
      LOG_PATH: "data/custom.log",
      LOG_TO_CONSOLE: "false",
      RECEIVE_IDLE_TIMEOUT_MS: "15000",
      HANDSHAKE_TIMEOUT_MS: "5000",
      HTTP_TIMEOUT_MS: "8000",
      RECONNECT_BASE_MS: "500",
      RECONNECT_MAX_MS: "20000",
      EVENT_QUEUE_CAPACITY: "64",
      LIVENESS_WINDOW_MS: "120000",
      LIVENESS_MIN_UNIQUE_CHATTERS: "3",
      ACCRUAL_INTERVAL_MS: "120000",
      PRESENCE_WINDOW_MS: "240000",
      PRESENCE_MINUTES_PER_UNIT: "30",
      PRESENCE_TICKETS_PER_UNIT: "4",
      GIFT_TICKETS_PER_SUB: "20",
      GIFT_THANKS_ENABLED: "true",
      CHAT_COOLDOWN_SECONDS: "10",
      PERIOD_CHECK_INTERVAL_MS: "90000",
      AUTO_DRAW: "1",
      AUTO_DRAW_LEAD_MS: "300000",
      TENANT_SYNC_INTERVAL_MS: "45000",
      SEED_TENANTS: "guild-1:streamer_one:1001, guild-2:streamer_two",
      WAGER_FEED_URL: "https://feed.example.test/stats",
      WAGER_CAMPAIGN_CODES: "ABC, xyz",
      WAGER_TICKETS_PER_1000: "25",
      WAGER_POLL_INTERVAL_MS: "600000",
    });

    const config = loadConfig();
    assert.strictEqual(config.kickWsUrl, "wss://ws.example.test/app/key?protocol=7");
    assert.strictEqual(config.kickApiUrl, "https://api.example.test/v2");
    assert.strictEqual(config.eventPrefix, "pusher:");
    assert.strictEqual(config.roomChannelPrefix, "chatrooms");
    assert.strictEqual(config.databasePath, "data/custom.db");
    assert.strictEqual(config.logPath, "data/custom.log");
    assert.strictEqual(config.logToConsole, false);
    assert.strictEqual(config.receiveIdleTimeoutMs, 15000);
    assert.strictEqual(config.handshakeTimeoutMs, 5000);
    assert.strictEqual(config.httpTimeoutMs, 8000);
    assert.strictEqual(config.reconnectBaseMs, 500);
    assert.strictEqual(config.reconnectMaxMs, 20000);
    assert.strictEqual(config.eventQueueCapacity, 64);
    assert.strictEqual(config.livenessWindowMs, 120000);
    assert.strictEqual(config.livenessMinUniqueChatters, 3);
    assert.strictEqual(config.accrualIntervalMs, 120000);
    assert.strictEqual(config.presenceWindowMs, 240000);
    assert.strictEqual(config.presenceMinutesPerUnit, 30);
    assert.strictEqual(config.presenceTicketsPerUnit, 4);
    assert.strictEqual(config.giftTicketsPerSub, 20);
    assert.strictEqual(config.giftThanksEnabled, true);
    assert.strictEqual(config.chatCooldownSeconds, 10);
    assert.strictEqual(config.periodCheckIntervalMs, 90000);
    assert.strictEqual(config.autoDraw, true);
    assert.strictEqual(config.autoDrawLeadMs, 300000);
    assert.strictEqual(config.tenantSyncIntervalMs, 45000);
    assert.deepStrictEqual(config.seedTenants, [
      { tenantId: "guild-1", channelSlug: "streamer_one", roomId: "1001" },
      { tenantId: "guild-2", channelSlug: "streamer_two" },
    ]);
    assert.strictEqual(config.wagerFeedUrl, "https://feed.example.test/stats");
    assert.deepStrictEqual(config.wagerCampaignCodes, ["abc", "xyz"]);
    assert.strictEqual(config.wagerTicketsPer1000, 25);
    assert.strictEqual(config.wagerPollIntervalMs, 600000);
  });

  it("applies defaults for optional values", () => {
    withOnlyRequiredEnv({ KICK_WS_URL: "wss://ws.example.test/app/key" });

    const config = loadConfig();
    assert.strictEqual(config.kickApiUrl, "https://kick.com/api/v2");
    assert.strictEqual(config.eventPrefix, "");
    assert.strictEqual(config.roomChannelPrefix, "room");
    assert.strictEqual(config.databasePath, "data/economy.db");
    assert.strictEqual(config.logPath, "data/economy.log");
    assert.strictEqual(config.logToConsole, true);
    assert.strictEqual(config.receiveIdleTimeoutMs, 30_000);
    assert.strictEqual(config.httpTimeoutMs, 10_000);
    assert.strictEqual(config.livenessWindowMs, 5 * 60 * 1000);
    assert.strictEqual(config.livenessMinUniqueChatters, 2);
    assert.strictEqual(config.presenceMinutesPerUnit, 60);
    assert.strictEqual(config.presenceTicketsPerUnit, 10);
    assert.strictEqual(config.giftTicketsPerSub, 15);
    assert.strictEqual(config.giftThanksEnabled, false);
    assert.strictEqual(config.autoDraw, false);
    assert.deepStrictEqual(config.seedTenants, []);
    assert.strictEqual(config.accrualIntervalMs, 60_000);
    assert.strictEqual(config.wagerFeedUrl, "");
    assert.deepStrictEqual(config.wagerCampaignCodes, []);
    assert.strictEqual(config.wagerTicketsPer1000, 20);
    assert.strictEqual(config.wagerPollIntervalMs, 15 * 60 * 1000);
  });

  it("throws when the websocket url is missing", () => {
    withOnlyRequiredEnv({ KICK_WS_URL: "not a url" });
    assert.throws(() => loadConfig(), /Invalid environment/);
  });

  it("rejects accrual intervals that are not whole minutes", () => {
    withOnlyRequiredEnv({ KICK_WS_URL: "wss://ws.example.test/app/key", ACCRUAL_INTERVAL_MS: "90000" });
    assert.throws(() => loadConfig(), /ACCRUAL_INTERVAL_MS must be a whole number of minutes/);

    withOnlyRequiredEnv({ KICK_WS_URL: "wss://ws.example.test/app/key", ACCRUAL_INTERVAL_MS: "30000" });
    assert.throws(() => loadConfig(), /ACCRUAL_INTERVAL_MS must be a whole number of minutes/);
  });

  it("rejects a wager feed that is not a url", () => {
    withOnlyRequiredEnv({ KICK_WS_URL: "wss://ws.example.test/app/key", WAGER_FEED_URL: "feed" });
    assert.throws(() => loadConfig(), /Invalid environment/);
  });

  it("rejects a reconnect ceiling below the base delay", () => {
    withOnlyRequiredEnv({
      KICK_WS_URL: "wss://ws.example.test/app/key",
      RECONNECT_BASE_MS: "5000",
      RECONNECT_MAX_MS: "2000",
    });
    assert.throws(() => loadConfig(), /RECONNECT_MAX_MS/);
  });
});

describe("parseSeedTenants", () => {
  it("skips entries without a channel", () => {
    assert.deepStrictEqual(parseSeedTenants("a:chan, b, :c"), [{ tenantId: "a", channelSlug: "chan" }]);
  });
});

describe("parseCampaignCodes", () => {
  it("lowercases and drops blanks", () => {
    assert.deepStrictEqual(parseCampaignCodes(" ABC, ,xyz "), ["abc", "xyz"]);
  });
});
