import { describe, expect, it } from "vitest";
import { BetHistoryRepository } from "../src";
import { createDbClient } from "../../../apps/test-utils/test-helpers";

describe("BetHistoryRepository", () => {
  it("stores settled bets and lists them per player and game", async () => {
    const repo = new BetHistoryRepository(createDbClient());

    const stored = await repo.append({
      game: "crash",
      userId: "alice",
      betAmount: 1000n,
      payoutAmount: 11760n,
      result: "WIN",
      nonce: 0,
      roundId: 4,
      meta: { autoCashout: 120, crashMultiplier: 150 },
    });
    await repo.append({
      game: "wheel",
      userId: "alice",
      betAmount: 500n,
      payoutAmount: 0n,
      result: "LOSE",
      nonce: 1,
      roundId: null,
      meta: { outcomeIndex: 0 },
    });
    await repo.append({
      game: "crash",
      userId: "bob",
      betAmount: 700n,
      payoutAmount: 0n,
      result: "LOSE",
      nonce: 0,
      roundId: 4,
      meta: {},
    });

    expect(stored.betAmount).toBe(1000n);
    expect(stored.meta).toEqual({ autoCashout: 120, crashMultiplier: 150 });

    const crash = await repo.listForUser("alice", "crash");
    expect(crash).toHaveLength(1);
    expect(crash[0]).toMatchObject({ id: stored.id, payoutAmount: 11760n, result: "WIN", roundId: 4 });

    const all = await repo.listForUser("alice");
    expect(all.map((record) => record.game).sort()).toEqual(["crash", "wheel"]);
  });
});
