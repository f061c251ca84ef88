export type TenantId = string;

export interface TenantConfig {
  tenantId: TenantId;
  channelSlug: string;
  roomId?: string;
  platformChannelId?: string;
  revision: number;
  enabled: boolean;
}

/** Where a subscribed socket points; two targets are equal when both ids match. */
export interface ChannelTarget {
  roomId: string;
  platformChannelId?: string;
}

export interface ChatMessageEvent {
  kind: "chat";
  user: string;
  text: string;
  at: number;
  messageId?: string;
}

export interface GiftSubscriptionEvent {
  kind: "gift";
  gifterUser: string;
  recipientCount: number;
  eventId: string;
  /** True when the upstream frame carried no id and one was generated locally. */
  synthesizedId: boolean;
  at: number;
}

export interface HeartbeatEvent {
  kind: "heartbeat";
  at: number;
}

export type NormalizedEvent = ChatMessageEvent | GiftSubscriptionEvent | HeartbeatEvent;

export type PeriodStatus = "active" | "ended";

export interface Period {
  id: number;
  tenantId: TenantId;
  startAt: string;
  endAt: string;
  status: PeriodStatus;
  totalTickets: number;
  createdAt: string;
  endedAt?: string;
}

export const TICKET_SOURCES = ["presence", "gift", "wager", "bonus"] as const;

export type TicketSource = (typeof TICKET_SOURCES)[number];

export type SourceBreakdown = Record<TicketSource, number>;

export interface TicketBalance {
  periodId: number;
  tenantId: TenantId;
  userId: string;
  username: string;
  sources: SourceBreakdown;
  total: number;
  updatedAt: string;
}

export interface LeaderboardEntry extends TicketBalance {
  rank: number;
}

export interface TicketLogEntry {
  id: number;
  periodId: number;
  userId: string;
  username: string;
  delta: number;
  source: TicketSource | "removal";
  description: string;
  createdAt: string;
}

export interface ConversionRecord {
  periodId: number;
  tenantId: TenantId;
  userKey: string;
  basisKey: string;
  units: number;
  ticketsAwarded: number;
  createdAt: string;
}

export interface DrawProof {
  serverSeed: string;
  clientSeed: string;
  nonce: string;
  proofHash: string;
  rounds: number;
}

export interface DrawResult {
  periodId: number;
  tenantId: TenantId;
  totalTickets: number;
  totalParticipants: number;
  winnerUserId: string;
  winnerUsername: string;
  winnerTickets: number;
  winningTicketNumber: number;
  winProbability: number;
  prizeDescription?: string;
  drawnBy?: string;
  proof: DrawProof;
  drawnAt: string;
}
