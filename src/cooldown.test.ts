import assert from "node:assert";
import { describe, it } from "node:test";

import { CooldownTracker } from "./cooldown";

describe("CooldownTracker", () => {
  it("allows the first call and blocks until the cooldown passes", () => {
    const tracker = new CooldownTracker();
    assert.strictEqual(tracker.allow("t1", "alice", 30, 0), true);
    assert.strictEqual(tracker.allow("t1", "alice", 30, 10_000), false);
    assert.strictEqual(tracker.allow("t1", "alice", 30, 30_000), true);
  });

  it("reports whole seconds to wait, at least one", () => {
    const tracker = new CooldownTracker();
    tracker.hit("t1", "alice", 30, 0);
    assert.deepStrictEqual(tracker.hit("t1", "alice", 30, 10_500), { ok: false, waitSeconds: 20 });
    assert.deepStrictEqual(tracker.hit("t1", "alice", 30, 29_999), { ok: false, waitSeconds: 1 });
  });

  it("does not advance on a blocked call", () => {
    const tracker = new CooldownTracker();
    tracker.hit("t1", "alice", 10, 0);
    tracker.hit("t1", "alice", 10, 5_000);
    assert.strictEqual(tracker.allow("t1", "alice", 10, 10_000), true);
  });

  it("keys by tenant and normalized user", () => {
    const tracker = new CooldownTracker();
    assert.strictEqual(tracker.allow("t1", "Alice", 30, 0), true);
    assert.strictEqual(tracker.allow("t1", "alice ", 30, 1_000), false);
    assert.strictEqual(tracker.allow("t2", "alice", 30, 1_000), true);
    assert.strictEqual(tracker.allow("t1", "bob", 30, 1_000), true);
  });

  it("treats a zero cooldown as always allowed", () => {
    const tracker = new CooldownTracker();
    assert.strictEqual(tracker.allow("t1", "alice", 0, 0), true);
    assert.strictEqual(tracker.allow("t1", "alice", 0, 0), true);
  });

  it("prunes expired entries", () => {
    const tracker = new CooldownTracker();
    tracker.hit("t1", "alice", 10, 0);
    tracker.hit("t1", "bob", 60, 0);
    assert.strictEqual(tracker.prune(20_000), 1);
    assert.strictEqual(tracker.allow("t1", "bob", 60, 20_000), false);
  });
});
