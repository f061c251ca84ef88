import fs from "node:fs";
import path from "node:path";

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LoggerConfig = {
  logPath: string;
  minLevel?: LogLevel;
  console?: boolean;
};

export type LogPayload = Record<string, unknown>;

export function normalizeError(reason: unknown): { message: string; stack?: string } {
  if (reason instanceof Error) {
    return { message: reason.message, ...(reason.stack ? { stack: reason.stack } : {}) };
  }
  return { message: String(reason) };
}

export class AppLogger {
  private readonly logPath: string;
  private readonly minLevel: LogLevel;
  private readonly echo: boolean;
  private readonly context: LogPayload;

  constructor(config: LoggerConfig, context: LogPayload = {}) {
    this.logPath = config.logPath;
    this.minLevel = config.minLevel ?? "info";
    this.echo = config.console ?? true;
    this.context = context;
    const dir = path.dirname(this.logPath);
    fs.mkdirSync(dir, { recursive: true });
  }

  get path(): string {
    return this.logPath;
  }

  /** Logger that merges `context` into every payload, e.g. `{ tenantId }`. */
  child(context: LogPayload): AppLogger {
    return new AppLogger(
      { logPath: this.logPath, minLevel: this.minLevel, console: this.echo },
      { ...this.context, ...context },
    );
  }

  debug(event: string, payload?: LogPayload): void {
    this.write("debug", event, payload);
  }

  info(event: string, payload?: LogPayload): void {
    this.write("info", event, payload);
  }

  warn(event: string, payload?: LogPayload): void {
    this.write("warn", event, payload);
  }

  error(event: string, payload?: LogPayload): void {
    this.write("error", event, payload);
  }

  private write(level: LogLevel, event: string, payload?: LogPayload): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }
    const merged = { ...this.context, ...(payload ?? {}) };
    const entry = {
      ts: new Date().toISOString(),
      level,
      event,
      ...(Object.keys(merged).length > 0 ? { payload: merged } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    fs.appendFileSync(this.logPath, line, "utf8");
    if (this.echo) {
      // eslint-disable-next-line no-console
      console.log(line.trim());
    }
  }
}
