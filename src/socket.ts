import { WebSocket, type RawData } from "ws";

/** The slice of a websocket the connection loop needs; fakes implement it in tests. */
export interface ProtocolSocket {
  send(frame: string): void;
  close(code?: number, reason?: string): void;
  onMessage(listener: (frame: string) => void): void;
  onClose(listener: (code: number, reason: string) => void): void;
  onError(listener: (error: Error) => void): void;
}

export type SocketFactory = (url: string) => Promise<ProtocolSocket>;

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

class WsProtocolSocket implements ProtocolSocket {
  constructor(private readonly ws: WebSocket) {}

  send(frame: string): void {
    if (this.ws.readyState !== WebSocket.OPEN) {
      throw new Error(`socket not open (state ${this.ws.readyState})`);
    }
    this.ws.send(frame);
  }

  close(code = 1000, reason = "closing"): void {
    if (this.ws.readyState === WebSocket.CLOSED || this.ws.readyState === WebSocket.CLOSING) {
      return;
    }
    this.ws.close(code, reason);
  }

  onMessage(listener: (frame: string) => void): void {
    this.ws.on("message", (data: RawData) => listener(rawToText(data)));
  }

  onClose(listener: (code: number, reason: string) => void): void {
    this.ws.on("close", (code: number, reason: Buffer) => listener(code, reason.toString("utf8")));
  }

  onError(listener: (error: Error) => void): void {
    this.ws.on("error", listener);
  }
}

/** Opens a `ws` connection and resolves once it is open. */
export function createWsSocketFactory(options: { handshakeTimeoutMs: number }): SocketFactory {
  return (url) =>
    new Promise<ProtocolSocket>((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });
      } catch (error) {
        reject(error);
        return;
      }
      const onOpen = (): void => {
        ws.off("error", onEarlyError);
        ws.off("close", onEarlyClose);
        resolve(new WsProtocolSocket(ws));
      };
      const onEarlyError = (error: Error): void => {
        ws.off("open", onOpen);
        ws.off("close", onEarlyClose);
        reject(error);
      };
      const onEarlyClose = (code: number): void => {
        ws.off("open", onOpen);
        ws.off("error", onEarlyError);
        reject(new Error(`socket closed before open (code ${code})`));
      };
      ws.once("open", onOpen);
      ws.once("error", onEarlyError);
      ws.once("close", onEarlyClose);
    });
}

export type InboxItem =
  | { type: "frame"; raw: string }
  | { type: "timeout" }
  | { type: "closed"; code: number; reason: string }
  | { type: "error"; error: Error }
  | { type: "aborted" };

/**
 * Buffers socket callbacks so the receive loop can `await` one item at a time
 * with an idle timeout. Terminal items (closed, error) are sticky.
 */
export class FrameInbox {
  private readonly frames: string[] = [];
  private terminal: InboxItem | null = null;
  private waiter: ((item: InboxItem) => void) | null = null;

  constructor(socket: ProtocolSocket) {
    socket.onMessage((raw) => this.push({ type: "frame", raw }));
    socket.onClose((code, reason) => this.finish({ type: "closed", code, reason }));
    socket.onError((error) => this.finish({ type: "error", error }));
  }

  next(timeoutMs: number, signal: AbortSignal): Promise<InboxItem> {
    if (signal.aborted) {
      return Promise.resolve({ type: "aborted" });
    }
    const frame = this.frames.shift();
    if (frame !== undefined) {
      return Promise.resolve({ type: "frame", raw: frame });
    }
    if (this.terminal) {
      return Promise.resolve(this.terminal);
    }

    return new Promise<InboxItem>((resolve) => {
      const settle = (item: InboxItem): void => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        this.waiter = null;
        resolve(item);
      };
      const onAbort = (): void => settle({ type: "aborted" });
      const timer = setTimeout(() => settle({ type: "timeout" }), timeoutMs);
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiter = settle;
    });
  }

  private push(item: { type: "frame"; raw: string }): void {
    if (this.terminal) {
      return;
    }
    if (this.waiter) {
      this.waiter(item);
      return;
    }
    this.frames.push(item.raw);
  }

  private finish(item: InboxItem): void {
    if (this.terminal) {
      return;
    }
    this.terminal = item;
    if (this.waiter && this.frames.length === 0) {
      this.waiter(item);
    }
  }
}
