import { resolveTarget, sameTarget, type RoomResolver } from "./channel-resolver";
import { normalizeError, type AppLogger } from "./logger";
import {
  decodeFrame,
  pingFrame,
  platformChannel,
  pongFrame,
  roomChannel,
  subscribeFrame,
  type ProtocolOptions,
} from "./protocol";
import type { TenantSessionStore } from "./session-store";
import { FrameInbox, type ProtocolSocket, type SocketFactory } from "./socket";
import type { TenantSettingsSource } from "./tenant-settings";
import type { ChannelTarget, NormalizedEvent, TenantConfig, TenantId } from "./types";

export type ConnectionOptions = {
  wsUrl: string;
  protocol: ProtocolOptions;
  receiveIdleTimeoutMs: number;
  handshakeTimeoutMs: number;
  reconnectBaseMs: number;
  reconnectMaxMs: number;
};

export type ConnectionDeps = {
  tenantId: TenantId;
  settings: TenantSettingsSource;
  resolver: RoomResolver;
  sockets: SocketFactory;
  sessions: TenantSessionStore;
  /** Must not block; the supervisor passes a bounded queue's `push`. */
  sink: (event: NormalizedEvent) => void;
  onUnknown?: (eventName: string) => void;
  logger: AppLogger;
  options: ConnectionOptions;
  clock?: () => number;
  random?: () => number;
};

export type ConnectionExit = "aborted" | "config_missing" | "disabled";

export type ConnectionState = "idle" | "resolving" | "connecting" | "subscribed" | "backoff" | "stopped";

export type ConnectionStats = {
  connects: number;
  reloads: number;
  failures: number;
  malformedFrames: number;
  unknownFrames: number;
  lastError?: string;
};

type SessionOutcome =
  | { kind: "reload" }
  | { kind: "failed"; error: string }
  | { kind: "stop"; exit: ConnectionExit };

type Connected = {
  socket: ProtocolSocket;
  inbox: FrameInbox;
  revision: number;
  target: ChannelTarget;
};

export function reconnectDelay(
  attempt: number,
  options: Pick<ConnectionOptions, "reconnectBaseMs" | "reconnectMaxMs">,
  random: () => number = Math.random,
): number {
  const exponent = Math.min(Math.max(attempt - 1, 0), 16);
  const backoff = Math.min(options.reconnectMaxMs, options.reconnectBaseMs * 2 ** exponent);
  const jitter = Math.floor(random() * (options.reconnectBaseMs / 2));
  return backoff + jitter;
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * One long-lived chat connection for one tenant. `run` loops until aborted:
 * resolve the room, connect, subscribe, then read frames with an idle timeout
 * that doubles as the settings poll. A changed target closes the socket and
 * reconnects at once; transport failures back off with jitter.
 */
export class TenantConnection {
  readonly stats: ConnectionStats = {
    connects: 0,
    reloads: 0,
    failures: 0,
    malformedFrames: 0,
    unknownFrames: 0,
  };

  private currentState: ConnectionState = "idle";
  private resolved: { revision: number; target: ChannelTarget } | null = null;
  private readonly clock: () => number;
  private readonly random: () => number;
  private readonly logger: AppLogger;

  constructor(private readonly deps: ConnectionDeps) {
    this.clock = deps.clock ?? Date.now;
    this.random = deps.random ?? Math.random;
    this.logger = deps.logger.child({ tenantId: deps.tenantId });
  }

  get tenantId(): TenantId {
    return this.deps.tenantId;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  async run(signal: AbortSignal): Promise<ConnectionExit> {
    let attempts = 0;
    try {
      while (!signal.aborted) {
        const outcome = await this.runSession(signal, () => {
          attempts = 0;
        });
        if (signal.aborted) {
          break;
        }
        if (outcome.kind === "stop") {
          this.logger.warn("connection_stopped", { reason: outcome.exit });
          return outcome.exit;
        }
        if (outcome.kind === "reload") {
          this.stats.reloads += 1;
          this.logger.info("connection_reloading");
          continue;
        }

        attempts += 1;
        this.stats.failures += 1;
        this.stats.lastError = outcome.error;
        const delayMs = reconnectDelay(attempts, this.deps.options, this.random);
        this.currentState = "backoff";
        this.logger.warn("connection_retry_scheduled", { attempts, delayMs, error: outcome.error });
        await sleep(delayMs, signal);
      }
      return "aborted";
    } finally {
      this.currentState = "stopped";
    }
  }

  private async runSession(signal: AbortSignal, onSubscribed: () => void): Promise<SessionOutcome> {
    const config = this.deps.settings.get(this.deps.tenantId);
    if (!config) {
      return { kind: "stop", exit: "config_missing" };
    }
    if (!config.enabled) {
      return { kind: "stop", exit: "disabled" };
    }

    let connected: Connected | null = null;
    try {
      this.currentState = "resolving";
      const target = await this.resolve(config);
      if (signal.aborted) {
        return { kind: "stop", exit: "aborted" };
      }

      this.currentState = "connecting";
      const socket = await this.deps.sockets(this.deps.options.wsUrl);
      connected = { socket, inbox: new FrameInbox(socket), revision: config.revision, target };
      if (signal.aborted) {
        return { kind: "stop", exit: "aborted" };
      }

      const handshake = await this.handshake(connected, signal);
      if (handshake) {
        return handshake;
      }

      this.deps.sessions.open(this.deps.tenantId, this.clock());
      this.stats.connects += 1;
      this.currentState = "subscribed";
      onSubscribed();
      this.logger.info("connection_subscribed", {
        roomId: target.roomId,
        ...(target.platformChannelId ? { platformChannelId: target.platformChannelId } : {}),
        revision: config.revision,
      });

      return await this.receive(connected, signal);
    } catch (error) {
      const details = normalizeError(error);
      this.logger.warn("connection_failed", details);
      return { kind: "failed", error: details.message };
    } finally {
      this.deps.sessions.discard(this.deps.tenantId);
      connected?.socket.close(1000, signal.aborted ? "shutdown" : "reconnect");
    }
  }

  private async resolve(config: TenantConfig): Promise<ChannelTarget> {
    if (this.resolved && this.resolved.revision === config.revision) {
      return this.resolved.target;
    }
    const target = await resolveTarget(config, this.deps.resolver);
    this.resolved = { revision: config.revision, target };
    return target;
  }

  private async handshake(connected: Connected, signal: AbortSignal): Promise<SessionOutcome | null> {
    const deadline = this.clock() + this.deps.options.handshakeTimeoutMs;
    const { protocol } = this.deps.options;

    for (;;) {
      const remaining = deadline - this.clock();
      if (remaining <= 0) {
        return { kind: "failed", error: "handshake_timeout" };
      }
      const item = await connected.inbox.next(remaining, signal);
      if (item.type === "aborted") {
        return { kind: "stop", exit: "aborted" };
      }
      if (item.type === "timeout") {
        return { kind: "failed", error: "handshake_timeout" };
      }
      if (item.type === "closed") {
        return { kind: "failed", error: `closed during handshake (code ${item.code})` };
      }
      if (item.type === "error") {
        return { kind: "failed", error: item.error.message };
      }

      const frame = decodeFrame(item.raw, { now: this.clock() }, protocol);
      if (frame.type === "ping") {
        connected.socket.send(pongFrame(protocol));
        continue;
      }
      if (frame.type === "error") {
        return { kind: "failed", error: `handshake rejected: ${frame.message}` };
      }
      if (frame.type !== "established") {
        continue;
      }

      this.logger.debug("connection_established", frame.socketId ? { socketId: frame.socketId } : {});
      connected.socket.send(subscribeFrame(roomChannel(connected.target.roomId, protocol), protocol));
      if (connected.target.platformChannelId) {
        connected.socket.send(subscribeFrame(platformChannel(connected.target.platformChannelId), protocol));
      }
      return null;
    }
  }

  private async receive(connected: Connected, signal: AbortSignal): Promise<SessionOutcome> {
    const { protocol, receiveIdleTimeoutMs } = this.deps.options;
    let lastReloadCheckAt = this.clock();

    for (;;) {
      const item = await connected.inbox.next(receiveIdleTimeoutMs, signal);
      if (item.type === "aborted") {
        return { kind: "stop", exit: "aborted" };
      }
      if (item.type === "closed") {
        return { kind: "failed", error: `socket closed (code ${item.code}${item.reason ? `: ${item.reason}` : ""})` };
      }
      if (item.type === "error") {
        return { kind: "failed", error: item.error.message };
      }

      if (item.type === "frame") {
        this.handleFrame(connected, item.raw);
      }

      const now = this.clock();
      if (item.type === "timeout" || now - lastReloadCheckAt >= receiveIdleTimeoutMs) {
        lastReloadCheckAt = now;
        const reload = await this.checkReload(connected);
        if (reload) {
          return reload;
        }
        if (item.type === "timeout") {
          connected.socket.send(pingFrame(protocol));
        }
      }
    }
  }

  /** Re-reads settings; returns an outcome when the socket must be replaced. */
  private async checkReload(connected: Connected): Promise<SessionOutcome | null> {
    const latest = this.deps.settings.get(this.deps.tenantId);
    if (!latest) {
      return { kind: "stop", exit: "config_missing" };
    }
    if (!latest.enabled) {
      return { kind: "stop", exit: "disabled" };
    }
    if (latest.revision === connected.revision) {
      return null;
    }

    let target: ChannelTarget;
    try {
      target = await this.resolve(latest);
    } catch (error) {
      // Keep the working socket; the next poll retries the lookup.
      this.logger.warn("reload_resolve_failed", { revision: latest.revision, ...normalizeError(error) });
      return null;
    }
    if (sameTarget(target, connected.target)) {
      connected.revision = latest.revision;
      return null;
    }
    this.logger.info("reload_detected", {
      fromRoomId: connected.target.roomId,
      toRoomId: target.roomId,
      revision: latest.revision,
    });
    return { kind: "reload" };
  }

  private handleFrame(connected: Connected, raw: string): void {
    const { protocol } = this.deps.options;
    const now = this.clock();
    const frame = decodeFrame(raw, { now }, protocol);

    switch (frame.type) {
      case "ping":
        connected.socket.send(pongFrame(protocol));
        return;
      case "pong":
        this.deps.sink({ kind: "heartbeat", at: now });
        return;
      case "established":
        return;
      case "subscribed":
        this.logger.debug("channel_subscribed", frame.channel ? { channel: frame.channel } : {});
        return;
      case "error":
        this.logger.warn("protocol_error", { message: frame.message });
        return;
      case "malformed":
        this.stats.malformedFrames += 1;
        this.logger.warn("frame_skipped", { reason: frame.reason });
        return;
      case "unknown":
        this.stats.unknownFrames += 1;
        this.deps.onUnknown?.(frame.eventName);
        return;
      case "event":
        if (frame.event.kind === "chat") {
          this.deps.sessions.recordChatActivity(this.deps.tenantId, frame.event.user, now);
        }
        this.deps.sink(frame.event);
        return;
    }
  }
}
