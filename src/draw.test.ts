import assert from "node:assert";
import { describe, it } from "node:test";

import {
  buildTicketRanges,
  deriveTicket,
  FairDrawEngine,
  locateWinner,
  provablyFairPicker,
  verifyDrawProof,
  type TicketPicker,
} from "./draw";
import { openTestDatabase } from "./test-support";
import { TicketLedger } from "./ticket-ledger";

const ENTRIES = [
  { userId: "A", username: "alice", tickets: 10 },
  { userId: "B", username: "bob", tickets: 25 },
  { userId: "C", username: "carol", tickets: 65 },
];

const NOW = new Date("2026-03-31T23:50:00.000Z");

function setup(picker?: TicketPicker) {
  const db = openTestDatabase();
  const ledger = new TicketLedger(db);
  const engine = new FairDrawEngine(db, ledger, picker ? { picker } : {});
  const periodId = Number(
    db
      .prepare(
        `INSERT INTO periods (tenant_id, start_at, end_at, status, created_at)
         VALUES ('t1', '2026-03-01T00:00:00.000Z', '2026-04-01T00:00:00.000Z', 'active', '2026-03-01T00:00:00.000Z')`,
      )
      .run().lastInsertRowid,
  );
  return { db, ledger, engine, periodId };
}

function seedParticipants(ledger: TicketLedger, periodId: number): void {
  for (const entry of ENTRIES) {
    ledger.award({
      tenantId: "t1",
      periodId,
      userId: entry.userId,
      username: entry.username,
      amount: entry.tickets,
      source: "presence",
      description: "seed",
    });
  }
}

function fixedPicker(ticket: number): TicketPicker {
  return (_total, clientSeed, nonce) => ({
    ticket,
    proof: { serverSeed: "test-seed", clientSeed, nonce, proofHash: "fixed", rounds: 1 },
  });
}

function cyclingPicker(): TicketPicker {
  let next = 0;
  return (total, clientSeed, nonce) => {
    next += 1;
    return {
      ticket: ((next - 1) % total) + 1,
      proof: { serverSeed: "test-seed", clientSeed, nonce, proofHash: "cycle", rounds: 1 },
    };
  };
}

describe("buildTicketRanges / locateWinner", () => {
  const ranges = buildTicketRanges(ENTRIES);

  it("lays out contiguous gapless ranges in entry order", () => {
    assert.deepStrictEqual(
      ranges.map((range) => [range.userId, range.start, range.end]),
      [
        ["A", 1, 10],
        ["B", 11, 35],
        ["C", 36, 100],
      ],
    );
  });

  it("skips entries without tickets", () => {
    const withZero = buildTicketRanges([{ userId: "Z", username: "z", tickets: 0 }, ...ENTRIES]);
    assert.strictEqual(withZero[0]?.userId, "A");
    assert.strictEqual(withZero[0]?.start, 1);
  });

  it("maps ticket numbers to their holder", () => {
    assert.strictEqual(locateWinner(ranges, 42)?.userId, "C");
    assert.strictEqual(locateWinner(ranges, 10)?.userId, "A");
    assert.strictEqual(locateWinner(ranges, 11)?.userId, "B");
    assert.strictEqual(locateWinner(ranges, 1)?.userId, "A");
    assert.strictEqual(locateWinner(ranges, 35)?.userId, "B");
    assert.strictEqual(locateWinner(ranges, 100)?.userId, "C");
    assert.strictEqual(locateWinner(ranges, 0), undefined);
    assert.strictEqual(locateWinner(ranges, 101), undefined);
  });

  it("wins in proportion to tickets over many draws", () => {
    const wins = new Map<string, number>();
    const runs = 100_000;
    for (let i = 0; i < runs; i += 1) {
      const picked = provablyFairPicker(100, "1:100:3", String(i));
      const winner = locateWinner(ranges, picked.ticket)?.userId ?? "none";
      wins.set(winner, (wins.get(winner) ?? 0) + 1);
    }
    assert.strictEqual(wins.get("none"), undefined);
    for (const entry of ENTRIES) {
      const rate = (wins.get(entry.userId) ?? 0) / runs;
      assert.ok(Math.abs(rate - entry.tickets / 100) < 0.02, `${entry.userId} won at rate ${rate}`);
    }
  });
});

describe("deriveTicket / verifyDrawProof", () => {
  it("is reproducible from the published seeds", () => {
    const first = deriveTicket("test-seed", "7:100:3", "7", 100);
    const second = deriveTicket("test-seed", "7:100:3", "7", 100);
    assert.deepStrictEqual(first, second);
    assert.ok(first.ticket >= 1 && first.ticket <= 100);
    assert.strictEqual(verifyDrawProof(first.proof, 100, first.ticket), true);
  });

  it("rejects a proof that does not match the ticket or seeds", () => {
    const picked = deriveTicket("test-seed", "7:100:3", "7", 100);
    const otherTicket = picked.ticket === 100 ? 1 : picked.ticket + 1;
    assert.strictEqual(verifyDrawProof(picked.proof, 100, otherTicket), false);
    assert.strictEqual(verifyDrawProof({ ...picked.proof, serverSeed: "other-seed" }, 100, picked.ticket), false);
    assert.strictEqual(verifyDrawProof(picked.proof, 0, picked.ticket), false);
  });

  it("always returns ticket 1 for a single ticket", () => {
    assert.strictEqual(deriveTicket("s", "c", "n", 1).ticket, 1);
  });
});

describe("FairDrawEngine", () => {
  it("selects the holder of the picked ticket and ends the period", () => {
    const { ledger, engine, periodId } = setup(fixedPicker(42));
    seedParticipants(ledger, periodId);

    const outcome = engine.draw({ tenantId: "t1", periodId, drawnBy: "admin", prizeDescription: "Prize", now: NOW });
    assert.strictEqual(outcome.status, "drawn");
    if (outcome.status !== "drawn") {
      return;
    }
    assert.strictEqual(outcome.result.winnerUserId, "C");
    assert.strictEqual(outcome.result.winnerUsername, "carol");
    assert.strictEqual(outcome.result.winningTicketNumber, 42);
    assert.strictEqual(outcome.result.totalTickets, 100);
    assert.strictEqual(outcome.result.totalParticipants, 3);
    assert.strictEqual(outcome.result.winProbability, 0.65);
    assert.strictEqual(outcome.result.proof.clientSeed, `${periodId}:100:3`);
    assert.strictEqual(outcome.result.proof.nonce, String(periodId));

    assert.deepStrictEqual(engine.getDraw("t1", periodId), outcome.result);
    assert.deepStrictEqual(
      ledger.award({ tenantId: "t1", periodId, userId: "A", username: "alice", amount: 1, source: "bonus", description: "late" }),
      { ok: false, reason: "period_ended" },
    );
  });

  it("draws a period at most once", () => {
    const { ledger, engine, periodId } = setup(fixedPicker(10));
    seedParticipants(ledger, periodId);
    const first = engine.draw({ tenantId: "t1", periodId, now: NOW });
    const second = engine.draw({ tenantId: "t1", periodId, now: NOW });

    assert.strictEqual(first.status, "drawn");
    assert.strictEqual(second.status, "already_drawn");
    if (first.status === "drawn" && second.status === "already_drawn") {
      assert.deepStrictEqual(second.result, first.result);
      assert.strictEqual(first.result.winnerUserId, "A");
    }
    assert.strictEqual(engine.history("t1").length, 1);
  });

  it("reports empty periods without ending them", () => {
    const { db, engine, periodId } = setup();
    assert.deepStrictEqual(engine.draw({ tenantId: "t1", periodId }), { status: "no_participants" });
    const period = db.prepare<[number], { status: string }>("SELECT status FROM periods WHERE id = ?").get(periodId);
    assert.strictEqual(period?.status, "active");
  });

  it("does not draw another tenant's period", () => {
    const { ledger, engine, periodId } = setup();
    seedParticipants(ledger, periodId);
    assert.deepStrictEqual(engine.draw({ tenantId: "t2", periodId }), { status: "period_not_found" });
  });

  it("records a proof that verifies with the default picker", () => {
    const { ledger, engine, periodId } = setup();
    seedParticipants(ledger, periodId);
    const outcome = engine.draw({ tenantId: "t1", periodId, now: NOW });
    assert.strictEqual(outcome.status, "drawn");
    if (outcome.status === "drawn") {
      assert.match(outcome.result.proof.serverSeed, /^[0-9a-f]{64}$/);
      assert.strictEqual(
        verifyDrawProof(outcome.result.proof, outcome.result.totalTickets, outcome.result.winningTicketNumber),
        true,
      );
    }
  });

  it("never picks an excluded holder and keeps the remaining ranges contiguous", () => {
    const { ledger, engine, periodId } = setup(fixedPicker(11));
    seedParticipants(ledger, periodId);
    const added = engine.addExclusion({ tenantId: "t1", username: " BOB ", reason: "staff", now: NOW });
    assert.ok(added.ok);
    assert.deepStrictEqual(
      buildTicketRanges(engine.eligibleEntries("t1", periodId)).map((range) => [range.userId, range.start, range.end]),
      [
        ["A", 1, 10],
        ["C", 11, 75],
      ],
    );

    const outcome = engine.draw({ tenantId: "t1", periodId, now: NOW });
    assert.strictEqual(outcome.status, "drawn");
    if (outcome.status === "drawn") {
      assert.strictEqual(outcome.result.winnerUserId, "C");
      assert.strictEqual(outcome.result.totalTickets, 75);
      assert.strictEqual(outcome.result.totalParticipants, 2);
      assert.strictEqual(outcome.result.proof.clientSeed, `${periodId}:75:2`);
    }
  });

  it("skips holders excluded for a single draw", () => {
    const { ledger, engine, periodId } = setup(fixedPicker(35));
    seedParticipants(ledger, periodId);
    const outcome = engine.draw({ tenantId: "t1", periodId, excludeUserIds: ["C"], now: NOW });
    assert.strictEqual(outcome.status, "drawn");
    if (outcome.status === "drawn") {
      assert.strictEqual(outcome.result.winnerUserId, "B");
      assert.strictEqual(outcome.result.totalTickets, 35);
    }
    assert.deepStrictEqual(engine.listExclusions("t1"), []);
  });

  it("reports no participants when every holder is excluded", () => {
    const { ledger, engine, periodId } = setup();
    seedParticipants(ledger, periodId);
    engine.addExclusion({ tenantId: "t1", userId: "A" });
    engine.addExclusion({ tenantId: "t1", userId: "B" });
    assert.deepStrictEqual(engine.draw({ tenantId: "t1", periodId, excludeUserIds: ["C"] }), {
      status: "no_participants",
    });
  });

  it("manages standing exclusions per tenant", () => {
    const { engine } = setup();
    assert.deepStrictEqual(engine.addExclusion({ tenantId: "t1", username: "  " }), {
      ok: false,
      reason: "missing_target",
    });
    const added = engine.addExclusion({ tenantId: "t1", userId: "A", now: NOW });
    assert.ok(added.ok);
    assert.deepStrictEqual(engine.listExclusions("t1"), [
      { id: added.exclusion.id, tenantId: "t1", userId: "A", createdAt: NOW.toISOString() },
    ]);
    assert.deepStrictEqual(engine.listExclusions("t2"), []);
    assert.strictEqual(engine.removeExclusion("t2", added.exclusion.id), false);
    assert.strictEqual(engine.removeExclusion("t1", added.exclusion.id), true);
    assert.deepStrictEqual(engine.listExclusions("t1"), []);
  });
});

describe("FairDrawEngine.simulate", () => {
  it("compares wins with each holder's ticket share", () => {
    const { ledger, engine, periodId } = setup(cyclingPicker());
    seedParticipants(ledger, periodId);

    const outcome = engine.simulate({ tenantId: "t1", periodId, runs: 100 });
    assert.deepStrictEqual(outcome, {
      status: "simulated",
      runs: 100,
      totalTickets: 100,
      participants: 3,
      results: [
        { userId: "A", username: "alice", tickets: 10, expectedWins: 10, actualWins: 10, variancePercent: 0 },
        { userId: "B", username: "bob", tickets: 25, expectedWins: 25, actualWins: 25, variancePercent: 0 },
        { userId: "C", username: "carol", tickets: 65, expectedWins: 65, actualWins: 65, variancePercent: 0 },
      ],
    });
    assert.strictEqual(engine.getDraw("t1", periodId), undefined);
  });

  it("applies exclusions and reports missing periods", () => {
    const { ledger, engine, periodId } = setup(cyclingPicker());
    seedParticipants(ledger, periodId);
    engine.addExclusion({ tenantId: "t1", username: "carol" });

    const outcome = engine.simulate({ tenantId: "t1", periodId, runs: 70 });
    assert.strictEqual(outcome.status, "simulated");
    if (outcome.status === "simulated") {
      assert.strictEqual(outcome.totalTickets, 35);
      assert.deepStrictEqual(
        outcome.results.map((entry) => [entry.userId, entry.actualWins, entry.expectedWins]),
        [
          ["A", 20, 20],
          ["B", 50, 50],
        ],
      );
    }
    assert.deepStrictEqual(engine.simulate({ tenantId: "t2", periodId, runs: 10 }), { status: "period_not_found" });
  });
});
