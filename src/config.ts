import { z } from "zod";

const BooleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .default("")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  KICK_WS_URL: z.string().url("KICK_WS_URL must be a websocket URL"),
  KICK_API_URL: z.string().url().default("https://kick.com/api/v2"),
  KICK_EVENT_PREFIX: z.string().optional().default(""),
  KICK_ROOM_CHANNEL_PREFIX: z.string().min(1).default("room"),
  DATABASE_PATH: z.string().optional().default("data/economy.db"),
  LOG_PATH: z.string().optional().default("data/economy.log"),
  LOG_TO_CONSOLE: z.enum(["true", "false"]).default("true"),
  RECEIVE_IDLE_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(30_000),
  HANDSHAKE_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(10_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1_000).default(10_000),
  RECONNECT_BASE_MS: z.coerce.number().int().min(100).default(1_000),
  RECONNECT_MAX_MS: z.coerce.number().int().min(1_000).default(60_000),
  EVENT_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(500),
  LIVENESS_WINDOW_MS: z.coerce.number().int().min(10_000).default(5 * 60 * 1000),
  LIVENESS_MIN_UNIQUE_CHATTERS: z.coerce.number().int().min(1).default(2),
  ACCRUAL_INTERVAL_MS: z.coerce
    .number()
    .int()
    .refine((value) => value >= 60_000 && value % 60_000 === 0, "ACCRUAL_INTERVAL_MS must be a whole number of minutes")
    .default(60_000),
  PRESENCE_WINDOW_MS: z.coerce.number().int().min(10_000).default(5 * 60 * 1000),
  PRESENCE_MINUTES_PER_UNIT: z.coerce.number().int().min(1).default(60),
  PRESENCE_TICKETS_PER_UNIT: z.coerce.number().int().min(1).default(10),
  GIFT_TICKETS_PER_SUB: z.coerce.number().int().min(1).default(15),
  GIFT_THANKS_ENABLED: BooleanFlag,
  CHAT_COOLDOWN_SECONDS: z.coerce.number().int().min(0).default(30),
  PERIOD_CHECK_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60_000),
  AUTO_DRAW: BooleanFlag,
  AUTO_DRAW_LEAD_MS: z.coerce.number().int().min(0).default(10 * 60 * 1000),
  TENANT_SYNC_INTERVAL_MS: z.coerce.number().int().min(1_000).default(60_000),
  SEED_TENANTS: z.string().optional().default(""),
  WAGER_FEED_URL: z.union([z.literal(""), z.string().url("WAGER_FEED_URL must be a URL")]).optional().default(""),
  WAGER_CAMPAIGN_CODES: z.string().optional().default(""),
  WAGER_TICKETS_PER_1000: z.coerce.number().int().min(1).default(20),
  WAGER_POLL_INTERVAL_MS: z.coerce.number().int().min(60_000).default(15 * 60 * 1000),
});

export type SeedTenant = {
  tenantId: string;
  channelSlug: string;
  roomId?: string;
};

export type AppConfig = {
  kickWsUrl: string;
  kickApiUrl: string;
  eventPrefix: string;
  roomChannelPrefix: string;
  databasePath: string;
  logPath: string;
  logToConsole: boolean;
  receiveIdleTimeoutMs: number;
  handshakeTimeoutMs: number;
  httpTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
  eventQueueCapacity: number;
  livenessWindowMs: number;
  livenessMinUniqueChatters: number;
  accrualIntervalMs: number;
  presenceWindowMs: number;
  presenceMinutesPerUnit: number;
  presenceTicketsPerUnit: number;
  giftTicketsPerSub: number;
  giftThanksEnabled: boolean;
  chatCooldownSeconds: number;
  periodCheckIntervalMs: number;
  autoDraw: boolean;
  autoDrawLeadMs: number;
  tenantSyncIntervalMs: number;
  seedTenants: SeedTenant[];
  /** Empty when wager tracking is off. */
  wagerFeedUrl: string;
  wagerCampaignCodes: string[];
  wagerTicketsPer1000: number;
  wagerPollIntervalMs: number;
};

/** Parses `tenant:channel[:roomId]` entries separated by commas. */
export function parseSeedTenants(raw: string): SeedTenant[] {
  return raw
    .split(",")
    .map((value) => value.trim())
    .filter(Boolean)
    .flatMap((entry) => {
      const [tenantId = "", channelSlug = "", roomId = ""] = entry.split(":").map((part) => part.trim());
      if (!tenantId || !channelSlug) {
        return [];
      }
      return [{ tenantId, channelSlug, ...(roomId ? { roomId } : {}) }];
    });
}

export function parseCampaignCodes(raw: string): string[] {
  return raw
    .split(",")
    .map((code) => code.trim().toLowerCase())
    .filter(Boolean);
}

export function loadConfig(): AppConfig {
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(
      `Invalid environment: ${parsed.error.issues.map((issue) => issue.message).join(", ")}`,
    );
  }
  const env = parsed.data;
  if (env.RECONNECT_MAX_MS < env.RECONNECT_BASE_MS) {
    throw new Error("Invalid environment: RECONNECT_MAX_MS must be >= RECONNECT_BASE_MS");
  }

  return {
    kickWsUrl: env.KICK_WS_URL,
    kickApiUrl: env.KICK_API_URL.replace(/\/+$/, ""),
    eventPrefix: env.KICK_EVENT_PREFIX.trim(),
    roomChannelPrefix: env.KICK_ROOM_CHANNEL_PREFIX.trim(),
    databasePath: env.DATABASE_PATH,
    logPath: env.LOG_PATH,
    logToConsole: env.LOG_TO_CONSOLE === "true",
    receiveIdleTimeoutMs: env.RECEIVE_IDLE_TIMEOUT_MS,
    handshakeTimeoutMs: env.HANDSHAKE_TIMEOUT_MS,
    httpTimeoutMs: env.HTTP_TIMEOUT_MS,
    reconnectBaseMs: env.RECONNECT_BASE_MS,
    reconnectMaxMs: env.RECONNECT_MAX_MS,
    eventQueueCapacity: env.EVENT_QUEUE_CAPACITY,
    livenessWindowMs: env.LIVENESS_WINDOW_MS,
    livenessMinUniqueChatters: env.LIVENESS_MIN_UNIQUE_CHATTERS,
    accrualIntervalMs: env.ACCRUAL_INTERVAL_MS,
    presenceWindowMs: env.PRESENCE_WINDOW_MS,
    presenceMinutesPerUnit: env.PRESENCE_MINUTES_PER_UNIT,
    presenceTicketsPerUnit: env.PRESENCE_TICKETS_PER_UNIT,
    giftTicketsPerSub: env.GIFT_TICKETS_PER_SUB,
    giftThanksEnabled: env.GIFT_THANKS_ENABLED,
    chatCooldownSeconds: env.CHAT_COOLDOWN_SECONDS,
    periodCheckIntervalMs: env.PERIOD_CHECK_INTERVAL_MS,
    autoDraw: env.AUTO_DRAW,
    autoDrawLeadMs: env.AUTO_DRAW_LEAD_MS,
    tenantSyncIntervalMs: env.TENANT_SYNC_INTERVAL_MS,
    seedTenants: parseSeedTenants(env.SEED_TENANTS),
    wagerFeedUrl: env.WAGER_FEED_URL.trim(),
    wagerCampaignCodes: parseCampaignCodes(env.WAGER_CAMPAIGN_CODES),
    wagerTicketsPer1000: env.WAGER_TICKETS_PER_1000,
    wagerPollIntervalMs: env.WAGER_POLL_INTERVAL_MS,
  };
}
