import { randomUUID } from "node:crypto";

import { z } from "zod";

import type { ChatMessageEvent, GiftSubscriptionEvent, NormalizedEvent } from "./types";

export type ProtocolOptions = {
  /** Prepended to control event names on the wire, e.g. `pusher:`. */
  eventPrefix: string;
  /** Room channel name is `<prefix>.<roomId>.v2`. */
  roomChannelPrefix: string;
};

export const DEFAULT_PROTOCOL: ProtocolOptions = {
  eventPrefix: "",
  roomChannelPrefix: "room",
};

/**
 * Classification order for application events:
 * 1. explicit chat tag, 2. explicit gift/subscription tag,
 * 3. gift field heuristics, 4. chat field heuristics.
 * Tags are compared lowercased with any `App\Events\` namespace removed.
 */
export const CHAT_EVENT_TAGS = new Set(["chatmessageevent", "chatmessagesentevent"]);
export const GIFT_EVENT_TAGS = new Set([
  "giftedsubscriptionsevent",
  "giftsubscriptionevent",
  "subscriptionevent",
  "channelsubscriptionevent",
  "channelsubscriptiongiftsevent",
]);
export const GIFT_FIELD_HINTS = ["gifter_username", "gift_count", "months", "usernames"] as const;

const EnvelopeSchema = z.object({
  event: z.string().min(1),
  data: z.unknown().optional(),
  channel: z.string().optional(),
});

const DataObjectSchema = z.record(z.unknown());

const IdSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

const ChatPayloadSchema = z.object({
  id: IdSchema.optional(),
  content: z.string(),
  created_at: z.string().optional(),
  sender: z.object({ username: z.string().min(1) }),
});

const EstablishedPayloadSchema = z.object({
  socket_id: z.string().optional(),
});

const PositiveCountSchema = z.coerce.number().int().positive();

export type DecodedFrame =
  | { type: "established"; socketId?: string }
  | { type: "ping" }
  | { type: "pong" }
  | { type: "subscribed"; channel?: string }
  | { type: "error"; message: string }
  | { type: "event"; event: NormalizedEvent }
  | { type: "unknown"; eventName: string }
  | { type: "malformed"; reason: string };

export type DecodeContext = {
  now: number;
};

export function roomChannel(roomId: string, options: ProtocolOptions = DEFAULT_PROTOCOL): string {
  return `${options.roomChannelPrefix}.${roomId}.v2`;
}

export function platformChannel(platformChannelId: string): string {
  return `channel.${platformChannelId}`;
}

export function subscribeFrame(channel: string, options: ProtocolOptions = DEFAULT_PROTOCOL): string {
  return JSON.stringify({
    event: `${options.eventPrefix}subscribe`,
    data: { auth: "", channel },
  });
}

export function pingFrame(options: ProtocolOptions = DEFAULT_PROTOCOL): string {
  return JSON.stringify({ event: `${options.eventPrefix}ping`, data: {} });
}

export function pongFrame(options: ProtocolOptions = DEFAULT_PROTOCOL): string {
  return JSON.stringify({ event: `${options.eventPrefix}pong`, data: {} });
}

function canonicalControlName(eventName: string, options: ProtocolOptions): string {
  let name = eventName;
  if (options.eventPrefix && name.startsWith(options.eventPrefix)) {
    name = name.slice(options.eventPrefix.length);
  } else if (name.startsWith("pusher_internal:")) {
    name = name.slice("pusher_internal:".length);
  } else if (name.startsWith("pusher:")) {
    name = name.slice("pusher:".length);
  }
  return name.toLowerCase();
}

export function canonicalEventTag(eventName: string): string {
  const parts = eventName.split("\\");
  return (parts[parts.length - 1] ?? eventName).toLowerCase();
}

type DataResult = { ok: true; data: Record<string, unknown> } | { ok: false; reason: string };

/** Pusher double-encodes `data` as a JSON string; plain objects are accepted too. */
function decodeData(raw: unknown): DataResult {
  if (raw === undefined || raw === null || raw === "") {
    return { ok: true, data: {} };
  }
  let value: unknown = raw;
  if (typeof raw === "string") {
    try {
      value = JSON.parse(raw);
    } catch {
      return { ok: false, reason: "data_not_json" };
    }
  }
  const parsed = DataObjectSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, reason: "data_not_object" };
  }
  return { ok: true, data: parsed.data };
}

function parseTimestamp(raw: unknown, fallback: number): number {
  if (typeof raw !== "string") {
    return fallback;
  }
  const parsed = Date.parse(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function readNested(record: Record<string, unknown>, key: string): Record<string, unknown> | undefined {
  const parsed = DataObjectSchema.safeParse(record[key]);
  return parsed.success ? parsed.data : undefined;
}

function hasGiftHints(data: Record<string, unknown>): boolean {
  return GIFT_FIELD_HINTS.some((field) => field in data);
}

function looksLikeChat(data: Record<string, unknown>): boolean {
  return typeof data.content === "string" && readNested(data, "sender") !== undefined;
}

function toChatEvent(data: Record<string, unknown>, context: DecodeContext): ChatMessageEvent | null {
  const parsed = ChatPayloadSchema.safeParse(data);
  if (!parsed.success) {
    return null;
  }
  return {
    kind: "chat",
    user: parsed.data.sender.username,
    text: parsed.data.content,
    at: parseTimestamp(parsed.data.created_at, context.now),
    ...(parsed.data.id ? { messageId: parsed.data.id } : {}),
  };
}

function readGifter(data: Record<string, unknown>): string | undefined {
  const nestedUsername = (key: string): string | undefined => {
    const nested = readNested(data, key);
    return nested ? readString(nested, "username") : undefined;
  };
  return (
    readString(data, "gifter_username") ??
    nestedUsername("gifter") ??
    nestedUsername("sender") ??
    readString(data, "username")
  );
}

function readRecipientCount(data: Record<string, unknown>): number {
  for (const key of ["gift_count", "quantity", "count"]) {
    const parsed = PositiveCountSchema.safeParse(data[key]);
    if (parsed.success) {
      return parsed.data;
    }
  }
  for (const key of ["usernames", "gifted_usernames"]) {
    const value = data[key];
    if (Array.isArray(value) && value.length > 0) {
      return value.length;
    }
  }
  return 1;
}

function toGiftEvent(data: Record<string, unknown>, context: DecodeContext): GiftSubscriptionEvent | null {
  const gifterUser = readGifter(data);
  if (!gifterUser) {
    return null;
  }
  const rawId = IdSchema.safeParse(data.id ?? data.event_id);
  const at = parseTimestamp(data.created_at, context.now);
  // Without an upstream id the event is not deduplicated: the generated key is unique per frame.
  const eventId = rawId.success ? rawId.data : `local:${gifterUser.toLowerCase()}:${at}:${randomUUID()}`;
  return {
    kind: "gift",
    gifterUser,
    recipientCount: readRecipientCount(data),
    eventId,
    synthesizedId: !rawId.success,
    at,
  };
}

export function classifyPayload(
  eventName: string,
  data: Record<string, unknown>,
  context: DecodeContext,
): DecodedFrame {
  const tag = canonicalEventTag(eventName);

  if (CHAT_EVENT_TAGS.has(tag)) {
    const chat = toChatEvent(data, context);
    return chat ? { type: "event", event: chat } : { type: "malformed", reason: "chat_payload_invalid" };
  }

  if (GIFT_EVENT_TAGS.has(tag) || hasGiftHints(data)) {
    const gift = toGiftEvent(data, context);
    return gift ? { type: "event", event: gift } : { type: "malformed", reason: "gift_without_gifter" };
  }

  if (looksLikeChat(data)) {
    const chat = toChatEvent(data, context);
    return chat ? { type: "event", event: chat } : { type: "malformed", reason: "chat_payload_invalid" };
  }

  return { type: "unknown", eventName };
}

/** Decodes one inbound text frame. Never throws. */
export function decodeFrame(
  raw: string,
  context: DecodeContext,
  options: ProtocolOptions = DEFAULT_PROTOCOL,
): DecodedFrame {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { type: "malformed", reason: "frame_not_json" };
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { type: "malformed", reason: "envelope_invalid" };
  }

  const control = canonicalControlName(envelope.data.event, options);
  switch (control) {
    case "ping":
      return { type: "ping" };
    case "pong":
      return { type: "pong" };
    case "conn:established":
    case "connection_established": {
      const data = decodeData(envelope.data.data);
      if (!data.ok) {
        return { type: "malformed", reason: data.reason };
      }
      const payload = EstablishedPayloadSchema.safeParse(data.data);
      const socketId = payload.success ? payload.data.socket_id : undefined;
      return socketId ? { type: "established", socketId } : { type: "established" };
    }
    case "subscription_succeeded":
      return envelope.data.channel
        ? { type: "subscribed", channel: envelope.data.channel }
        : { type: "subscribed" };
    case "error": {
      const data = decodeData(envelope.data.data);
      const message = data.ok ? (readString(data.data, "message") ?? "unknown_error") : "unknown_error";
      return { type: "error", message };
    }
    default:
      break;
  }

  const data = decodeData(envelope.data.data);
  if (!data.ok) {
    return { type: "malformed", reason: data.reason };
  }
  return classifyPayload(envelope.data.event, data.data, context);
}
