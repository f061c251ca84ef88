import axios, { type AxiosInstance } from "axios";
import { z } from "zod";

import type { ChannelTarget, TenantConfig } from "./types";

export interface RoomResolver {
  /** Looks up the chatroom id (and platform channel id) for a channel slug. */
  resolve(channelSlug: string): Promise<ChannelTarget>;
}

const ChannelResponseSchema = z.object({
  id: z.union([z.number(), z.string().min(1)]).optional(),
  chatroom: z.object({
    id: z.union([z.number(), z.string().min(1)]),
  }),
});

export class ChannelLookupError extends Error {
  constructor(
    message: string,
    readonly channelSlug: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "ChannelLookupError";
  }
}

/** Single GET per call; retries are left to the caller's reconnect backoff. */
export class HttpRoomResolver implements RoomResolver {
  private readonly http: AxiosInstance;

  constructor(apiUrl: string, timeoutMs: number, http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: apiUrl,
        timeout: timeoutMs,
        headers: { Accept: "application/json" },
      });
  }

  async resolve(channelSlug: string): Promise<ChannelTarget> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(`/channels/${encodeURIComponent(channelSlug)}`);
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new ChannelLookupError(
          `channel lookup failed: ${error.message}`,
          channelSlug,
          error.response?.status,
        );
      }
      throw error;
    }

    const parsed = ChannelResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ChannelLookupError("channel lookup returned no chatroom id", channelSlug);
    }
    return {
      roomId: String(parsed.data.chatroom.id),
      ...(parsed.data.id !== undefined ? { platformChannelId: String(parsed.data.id) } : {}),
    };
  }
}

/** Uses the configured room id when present, otherwise asks the resolver. */
export async function resolveTarget(config: TenantConfig, resolver: RoomResolver): Promise<ChannelTarget> {
  if (config.roomId) {
    return {
      roomId: config.roomId,
      ...(config.platformChannelId ? { platformChannelId: config.platformChannelId } : {}),
    };
  }
  const resolved = await resolver.resolve(config.channelSlug);
  if (config.platformChannelId) {
    return { ...resolved, platformChannelId: config.platformChannelId };
  }
  return resolved;
}

export function sameTarget(a: ChannelTarget, b: ChannelTarget): boolean {
  return a.roomId === b.roomId && (a.platformChannelId ?? null) === (b.platformChannelId ?? null);
}
