import assert from "node:assert";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it } from "node:test";

import { z } from "zod";

import { AppLogger, normalizeError } from "./logger";

function mkLogPath(): { dir: string; logPath: string } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "economy-logger-test-"));
  return { dir, logPath: path.join(dir, "nested", "app.log") };
}

function readEntries(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line): Record<string, unknown> => z.record(z.unknown()).parse(JSON.parse(line)));
}

describe("AppLogger", () => {
  it("writes json lines with level, event and payload", () => {
    const paths = mkLogPath();
    const logger = new AppLogger({ logPath: paths.logPath, console: false });
    logger.info("tickets_awarded", { amount: 5 });
    logger.warn("frame_skipped");

    const entries = readEntries(paths.logPath);
    assert.strictEqual(entries.length, 2);
    assert.strictEqual(entries[0]?.level, "info");
    assert.strictEqual(entries[0]?.event, "tickets_awarded");
    assert.deepStrictEqual(entries[0]?.payload, { amount: 5 });
    assert.strictEqual(entries[1]?.payload, undefined);
    fs.rmSync(paths.dir, { recursive: true, force: true });
  });

  it("drops entries below the minimum level", () => {
    const paths = mkLogPath();
    const logger = new AppLogger({ logPath: paths.logPath, console: false, minLevel: "warn" });
    logger.debug("noise");
    logger.info("noise");
    logger.error("boom");

    const entries = readEntries(paths.logPath);
    assert.deepStrictEqual(
      entries.map((entry) => entry.event),
      ["boom"],
    );
    fs.rmSync(paths.dir, { recursive: true, force: true });
  });

  it("merges child context into every payload", () => {
    const paths = mkLogPath();
    const logger = new AppLogger({ logPath: paths.logPath, console: false }).child({ tenantId: "t1" });
    logger.info("connected", { roomId: "42" });

    const entries = readEntries(paths.logPath);
    assert.deepStrictEqual(entries[0]?.payload, { tenantId: "t1", roomId: "42" });
    fs.rmSync(paths.dir, { recursive: true, force: true });
  });
});

describe("normalizeError", () => {
  it("keeps message of errors and stringifies other values", () => {
    assert.strictEqual(normalizeError(new Error("bad")).message, "bad");
    assert.deepStrictEqual(normalizeError("plain"), { message: "plain" });
  });
});
