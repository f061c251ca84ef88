import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { openDatabase, type EconomyDatabase } from "./database";
import { AppLogger } from "./logger";
import type { ProtocolSocket, SocketFactory } from "./socket";
import type { TenantSettingsSource } from "./tenant-settings";
import type { TenantConfig } from "./types";

export function createTestLogger(): AppLogger {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "economy-test-"));
  return new AppLogger({ logPath: path.join(dir, "test.log"), console: false, minLevel: "debug" });
}

export function readLogEvents(logger: AppLogger): string[] {
  if (!fs.existsSync(logger.path)) {
    return [];
  }
  return fs
    .readFileSync(logger.path, "utf8")
    .trim()
    .split("\n")
    .filter(Boolean)
    .map((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === "object" && parsed !== null && "event" in parsed ? String(parsed.event) : "";
    });
}

export function openTestDatabase(): EconomyDatabase {
  return openDatabase(":memory:");
}

/** Polls `predicate` until it holds or `timeoutMs` passes. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000, label = "condition"): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`timed out waiting for ${label}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export const ESTABLISHED = JSON.stringify({ event: "conn:established", data: '{"socket_id":"1.2"}' });

export class FakeSocket implements ProtocolSocket {
  readonly sent: string[] = [];
  closed = false;
  private readonly messageListeners: Array<(frame: string) => void> = [];
  private readonly closeListeners: Array<(code: number, reason: string) => void> = [];

  send(frame: string): void {
    if (this.closed) {
      throw new Error("socket closed");
    }
    this.sent.push(frame);
  }

  close(code = 1000, reason = ""): void {
    this.drop(code, reason);
  }

  onMessage(listener: (frame: string) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.closeListeners.push(listener);
  }

  onError(): void {}

  deliver(frame: string): void {
    for (const listener of this.messageListeners) {
      listener(frame);
    }
  }

  drop(code = 1006, reason = ""): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const listener of this.closeListeners) {
      listener(code, reason);
    }
  }

  subscriptions(): string[] {
    return this.sent
      .map((frame) => {
        const parsed: unknown = JSON.parse(frame);
        if (typeof parsed !== "object" || parsed === null || !("data" in parsed)) {
          return "";
        }
        const data = parsed.data;
        return typeof data === "object" && data !== null && "channel" in data ? String(data.channel) : "";
      })
      .filter(Boolean);
  }
}

export class FakeServer {
  readonly sockets: FakeSocket[] = [];
  handshake = true;

  readonly factory: SocketFactory = async () => {
    const socket = new FakeSocket();
    this.sockets.push(socket);
    if (this.handshake) {
      setImmediate(() => socket.deliver(ESTABLISHED));
    }
    return socket;
  };

  latest(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error("no socket opened yet");
    }
    return socket;
  }
}

export class MemorySettings implements TenantSettingsSource {
  private readonly configs = new Map<string, TenantConfig>();

  get(tenantId: string): TenantConfig | undefined {
    return this.configs.get(tenantId);
  }

  list(): TenantConfig[] {
    return [...this.configs.values()];
  }

  put(config: Omit<TenantConfig, "revision" | "enabled"> & { enabled?: boolean }): void {
    const revision = (this.configs.get(config.tenantId)?.revision ?? 0) + 1;
    this.configs.set(config.tenantId, { ...config, enabled: config.enabled ?? true, revision });
  }

  remove(tenantId: string): void {
    this.configs.delete(tenantId);
  }
}
