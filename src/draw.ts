import crypto from "node:crypto";

import type { EconomyDatabase } from "./database";
import { normalizeUserKey } from "./session-store";
import type { DrawEntry, TicketLedger } from "./ticket-ledger";
import type { DrawProof, DrawResult, TenantId } from "./types";

export type TicketRange = DrawEntry & {
  /** First ticket number held, 1-based and inclusive. */
  start: number;
  /** Last ticket number held, inclusive. */
  end: number;
};

export type PickedTicket = {
  ticket: number;
  proof: DrawProof;
};

export type TicketPicker = (totalTickets: number, clientSeed: string, nonce: string) => PickedTicket;

const HASH_BITS = 48;
const HASH_SPACE = 2 ** HASH_BITS;
const MAX_ROUNDS = 1_000;

/** Lays participants out back to back: [1..t1], [t1+1..t1+t2], ... */
export function buildTicketRanges(entries: DrawEntry[]): TicketRange[] {
  const ranges: TicketRange[] = [];
  let cursor = 0;
  for (const entry of entries) {
    if (entry.tickets <= 0) {
      continue;
    }
    ranges.push({ ...entry, start: cursor + 1, end: cursor + entry.tickets });
    cursor += entry.tickets;
  }
  return ranges;
}

export function locateWinner(ranges: TicketRange[], ticket: number): TicketRange | undefined {
  let low = 0;
  let high = ranges.length - 1;
  while (low <= high) {
    const mid = (low + high) >> 1;
    const range = ranges[mid];
    if (!range) {
      return undefined;
    }
    if (ticket < range.start) {
      high = mid - 1;
    } else if (ticket > range.end) {
      low = mid + 1;
    } else {
      return range;
    }
  }
  return undefined;
}

function roundHash(serverSeed: string, clientSeed: string, nonce: string, round: number): string {
  return crypto.createHash("sha256").update(`${serverSeed}:${clientSeed}:${nonce}:${round}`).digest("hex");
}

/**
 * Maps the seeds onto [1, totalTickets] without modulo bias: each round takes
 * 48 bits of a sha256 digest and is rejected when it falls in the uneven tail.
 */
export function deriveTicket(
  serverSeed: string,
  clientSeed: string,
  nonce: string,
  totalTickets: number,
): PickedTicket {
  if (!Number.isSafeInteger(totalTickets) || totalTickets <= 0 || totalTickets >= HASH_SPACE) {
    throw new RangeError(`totalTickets out of range: ${totalTickets}`);
  }
  const limit = Math.floor(HASH_SPACE / totalTickets) * totalTickets;
  for (let round = 0; round < MAX_ROUNDS; round += 1) {
    const proofHash = roundHash(serverSeed, clientSeed, nonce, round);
    const value = Number.parseInt(proofHash.slice(0, HASH_BITS / 4), 16);
    if (value < limit) {
      return {
        ticket: (value % totalTickets) + 1,
        proof: { serverSeed, clientSeed, nonce, proofHash, rounds: round + 1 },
      };
    }
  }
  throw new Error("no unbiased value within round limit");
}

/** Default picker: a fresh 32-byte server seed from the OS CSPRNG per draw. */
export const provablyFairPicker: TicketPicker = (totalTickets, clientSeed, nonce) =>
  deriveTicket(crypto.randomBytes(32).toString("hex"), clientSeed, nonce, totalTickets);

export function verifyDrawProof(proof: DrawProof, totalTickets: number, winningTicket: number): boolean {
  try {
    const replay = deriveTicket(proof.serverSeed, proof.clientSeed, proof.nonce, totalTickets);
    return (
      replay.ticket === winningTicket &&
      replay.proof.proofHash === proof.proofHash &&
      replay.proof.rounds === proof.rounds
    );
  } catch {
    return false;
  }
}

export type DrawOutcome =
  | { status: "drawn"; result: DrawResult }
  | { status: "already_drawn"; result: DrawResult }
  | { status: "no_participants" }
  | { status: "period_not_found" };

export type DrawRequest = {
  tenantId: TenantId;
  periodId: number;
  drawnBy?: string;
  prizeDescription?: string;
  /** Holders left out of this draw only, on top of the tenant's standing exclusions. */
  excludeUserIds?: readonly string[];
  now?: Date;
};

export type DrawExclusion = {
  id: number;
  tenantId: TenantId;
  username?: string;
  userId?: string;
  reason?: string;
  createdAt: string;
};

export type ExclusionInput = {
  tenantId: TenantId;
  username?: string;
  userId?: string;
  reason?: string;
  now?: Date;
};

export type ExclusionResult = { ok: true; exclusion: DrawExclusion } | { ok: false; reason: "missing_target" };

export type SimulationRequest = {
  tenantId: TenantId;
  periodId: number;
  runs: number;
  excludeUserIds?: readonly string[];
};

export type SimulatedEntry = {
  userId: string;
  username: string;
  tickets: number;
  expectedWins: number;
  actualWins: number;
  variancePercent: number;
};

export type SimulationOutcome =
  | { status: "simulated"; runs: number; totalTickets: number; participants: number; results: SimulatedEntry[] }
  | { status: "no_participants" }
  | { status: "period_not_found" };

type ExclusionRow = {
  id: number;
  tenant_id: string;
  username: string | null;
  user_id: string | null;
  reason: string | null;
  created_at: string;
};

function toExclusion(row: ExclusionRow): DrawExclusion {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    ...(row.username !== null ? { username: row.username } : {}),
    ...(row.user_id !== null ? { userId: row.user_id } : {}),
    ...(row.reason !== null ? { reason: row.reason } : {}),
    createdAt: row.created_at,
  };
}

type DrawRow = {
  period_id: number;
  tenant_id: string;
  total_tickets: number;
  total_participants: number;
  winner_user_id: string;
  winner_username: string;
  winner_tickets: number;
  winning_ticket: number;
  win_probability: number;
  prize_description: string | null;
  drawn_by: string | null;
  server_seed: string;
  client_seed: string;
  nonce: string;
  proof_hash: string;
  proof_rounds: number;
  drawn_at: string;
};

function toResult(row: DrawRow): DrawResult {
  return {
    periodId: row.period_id,
    tenantId: row.tenant_id,
    totalTickets: row.total_tickets,
    totalParticipants: row.total_participants,
    winnerUserId: row.winner_user_id,
    winnerUsername: row.winner_username,
    winnerTickets: row.winner_tickets,
    winningTicketNumber: row.winning_ticket,
    winProbability: row.win_probability,
    ...(row.prize_description !== null ? { prizeDescription: row.prize_description } : {}),
    ...(row.drawn_by !== null ? { drawnBy: row.drawn_by } : {}),
    proof: {
      serverSeed: row.server_seed,
      clientSeed: row.client_seed,
      nonce: row.nonce,
      proofHash: row.proof_hash,
      rounds: row.proof_rounds,
    },
    drawnAt: row.drawn_at,
  };
}

export class FairDrawEngine {
  private readonly picker: TicketPicker;

  constructor(
    private readonly db: EconomyDatabase,
    private readonly ledger: TicketLedger,
    options: { picker?: TicketPicker } = {},
  ) {
    this.picker = options.picker ?? provablyFairPicker;
  }

  /**
   * Picks one winner weighted by tickets, records the result and ends the
   * period. A period is drawn at most once.
   */
  draw(request: DrawRequest): DrawOutcome {
    const drawnAt = (request.now ?? new Date()).toISOString();
    const run = this.db.transaction((): DrawOutcome => {
      if (!this.periodBelongsTo(request.tenantId, request.periodId)) {
        return { status: "period_not_found" };
      }
      const existing = this.getDraw(request.tenantId, request.periodId);
      if (existing) {
        return { status: "already_drawn", result: existing };
      }

      const ranges = buildTicketRanges(
        this.eligibleEntries(request.tenantId, request.periodId, request.excludeUserIds ?? []),
      );
      const last = ranges[ranges.length - 1];
      if (!last) {
        return { status: "no_participants" };
      }
      const totalTickets = last.end;
      const clientSeed = `${request.periodId}:${totalTickets}:${ranges.length}`;
      const picked = this.picker(totalTickets, clientSeed, String(request.periodId));
      const winner = locateWinner(ranges, picked.ticket);
      if (!winner) {
        throw new Error(`winning ticket ${picked.ticket} outside 1..${totalTickets}`);
      }

      const result: DrawResult = {
        periodId: request.periodId,
        tenantId: request.tenantId,
        totalTickets,
        totalParticipants: ranges.length,
        winnerUserId: winner.userId,
        winnerUsername: winner.username,
        winnerTickets: winner.tickets,
        winningTicketNumber: picked.ticket,
        winProbability: winner.tickets / totalTickets,
        ...(request.prizeDescription ? { prizeDescription: request.prizeDescription } : {}),
        ...(request.drawnBy ? { drawnBy: request.drawnBy } : {}),
        proof: picked.proof,
        drawnAt,
      };
      this.db
        .prepare(
          `INSERT INTO draws
             (period_id, tenant_id, total_tickets, total_participants, winner_user_id, winner_username,
              winner_tickets, winning_ticket, win_probability, prize_description, drawn_by,
              server_seed, client_seed, nonce, proof_hash, proof_rounds, drawn_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          result.periodId,
          result.tenantId,
          result.totalTickets,
          result.totalParticipants,
          result.winnerUserId,
          result.winnerUsername,
          result.winnerTickets,
          result.winningTicketNumber,
          result.winProbability,
          result.prizeDescription ?? null,
          result.drawnBy ?? null,
          result.proof.serverSeed,
          result.proof.clientSeed,
          result.proof.nonce,
          result.proof.proofHash,
          result.proof.rounds,
          result.drawnAt,
        );
      this.db
        .prepare("UPDATE periods SET status = 'ended', ended_at = COALESCE(ended_at, ?) WHERE id = ?")
        .run(drawnAt, request.periodId);
      return { status: "drawn", result };
    });
    return run();
  }

  /**
   * Replays the draw `runs` times without recording anything, to compare each
   * holder's wins against their ticket share.
   */
  simulate(request: SimulationRequest): SimulationOutcome {
    if (!this.periodBelongsTo(request.tenantId, request.periodId)) {
      return { status: "period_not_found" };
    }
    const ranges = buildTicketRanges(
      this.eligibleEntries(request.tenantId, request.periodId, request.excludeUserIds ?? []),
    );
    const last = ranges[ranges.length - 1];
    if (!last) {
      return { status: "no_participants" };
    }
    const totalTickets = last.end;
    const clientSeed = `${request.periodId}:${totalTickets}:${ranges.length}`;
    const wins = new Map<string, number>();
    for (let run = 0; run < request.runs; run += 1) {
      const picked = this.picker(totalTickets, clientSeed, `sim:${run}`);
      const winner = locateWinner(ranges, picked.ticket);
      if (winner) {
        wins.set(winner.userId, (wins.get(winner.userId) ?? 0) + 1);
      }
    }

    const results = ranges.map((range): SimulatedEntry => {
      const expectedWins = (range.tickets * request.runs) / totalTickets;
      const actualWins = wins.get(range.userId) ?? 0;
      return {
        userId: range.userId,
        username: range.username,
        tickets: range.tickets,
        expectedWins,
        actualWins,
        variancePercent: expectedWins > 0 ? ((actualWins - expectedWins) / expectedWins) * 100 : 0,
      };
    });
    return { status: "simulated", runs: request.runs, totalTickets, participants: ranges.length, results };
  }

  /** Standing exclusion by platform username (case-insensitive) or account id. */
  addExclusion(input: ExclusionInput): ExclusionResult {
    const username = input.username ? normalizeUserKey(input.username) : "";
    const userId = input.userId?.trim() ?? "";
    if (!username && !userId) {
      return { ok: false, reason: "missing_target" };
    }
    const createdAt = (input.now ?? new Date()).toISOString();
    const inserted = this.db
      .prepare(
        "INSERT INTO draw_exclusions (tenant_id, username, user_id, reason, created_at) VALUES (?, ?, ?, ?, ?)",
      )
      .run(input.tenantId, username || null, userId || null, input.reason ?? null, createdAt);
    return {
      ok: true,
      exclusion: {
        id: Number(inserted.lastInsertRowid),
        tenantId: input.tenantId,
        ...(username ? { username } : {}),
        ...(userId ? { userId } : {}),
        ...(input.reason !== undefined ? { reason: input.reason } : {}),
        createdAt,
      },
    };
  }

  removeExclusion(tenantId: TenantId, exclusionId: number): boolean {
    return (
      this.db.prepare("DELETE FROM draw_exclusions WHERE id = ? AND tenant_id = ?").run(exclusionId, tenantId)
        .changes > 0
    );
  }

  listExclusions(tenantId: TenantId): DrawExclusion[] {
    return this.db
      .prepare<[string], ExclusionRow>("SELECT * FROM draw_exclusions WHERE tenant_id = ? ORDER BY id ASC")
      .all(tenantId)
      .map(toExclusion);
  }

  /** Ticket holders of the period minus standing and per-draw exclusions, in ledger order. */
  eligibleEntries(tenantId: TenantId, periodId: number, excludeUserIds: readonly string[] = []): DrawEntry[] {
    const exclusions = this.listExclusions(tenantId);
    const usernames = new Set(exclusions.flatMap((exclusion) => (exclusion.username ? [exclusion.username] : [])));
    const userIds = new Set([
      ...excludeUserIds,
      ...exclusions.flatMap((exclusion) => (exclusion.userId ? [exclusion.userId] : [])),
    ]);
    return this.ledger
      .drawEntries(tenantId, periodId)
      .filter((entry) => !userIds.has(entry.userId) && !usernames.has(normalizeUserKey(entry.username)));
  }

  getDraw(tenantId: TenantId, periodId: number): DrawResult | undefined {
    const row = this.db
      .prepare<[number, string], DrawRow>("SELECT * FROM draws WHERE period_id = ? AND tenant_id = ?")
      .get(periodId, tenantId);
    return row ? toResult(row) : undefined;
  }

  history(tenantId: TenantId, limit = 10): DrawResult[] {
    return this.db
      .prepare<[string, number], DrawRow>("SELECT * FROM draws WHERE tenant_id = ? ORDER BY id DESC LIMIT ?")
      .all(tenantId, limit)
      .map(toResult);
  }

  private periodBelongsTo(tenantId: TenantId, periodId: number): boolean {
    const period = this.db
      .prepare<[number], { tenant_id: string }>("SELECT tenant_id FROM periods WHERE id = ?")
      .get(periodId);
    return period?.tenant_id === tenantId;
  }
}
