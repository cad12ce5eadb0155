import { describe, expect, it } from "vitest";
import type { EntropyState } from "@wagerhouse/core-entropy";
import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";
import { BetHistoryRepository } from "@wagerhouse/core-game-history";
import { KvWalletService } from "@wagerhouse/core-wallet";
import type { IWalletPort } from "@wagerhouse/core-wallet";
import type { GameName } from "@wagerhouse/core-types";
import { HouseTable, KvHouseStateStore } from "../src";
import type { HouseSnapshot, IHouseStateStore, OutcomeEngine } from "../src";
import {
  HookedWallet,
  InMemoryLogger,
  InMemoryStore,
  NoopLockManager,
  RecordingMetrics,
  ScriptedEntropy,
  createDbClient,
} from "../../../apps/test-utils/test-helpers";

const config = { minBet: 10n, maxBet: 1_000n, ownerId: "owner", houseAccount: "house:coinflip" };

type FlipMeta = { draw: number };

/** Even-money call on a single bit, standing in for a real game. */
const flipEngine: OutcomeEngine<boolean, FlipMeta> = {
  game: "coinflip",
  worstCasePayout: (betAmount) => betAmount * 2n,
  resolve: ({ caller, betAmount, input, entropy }) => {
    const draw = entropy.drawBounded(2n, caller);
    const won = draw === (input ? 1n : 0n);
    return { won, payout: won ? betAmount * 2n : 0n, metadata: { draw: Number(draw) } };
  },
};

/** Checkpoint store that can be switched into failing every save. */
class SwitchableStateStore implements IHouseStateStore {
  failing = false;
  private readonly inner: KvHouseStateStore;

  constructor(store: InMemoryStore) {
    this.inner = new KvHouseStateStore(store);
  }

  load(game: GameName): Promise<HouseSnapshot | null> {
    return this.inner.load(game);
  }

  async save(game: GameName, snapshot: HouseSnapshot): Promise<void> {
    if (this.failing) {
      throw new Error("store offline");
    }
    await this.inner.save(game, snapshot);
  }
}

function reopen(store: InMemoryStore, wallet: IWalletPort, values: number[] = []) {
  return HouseTable.open({
    game: "coinflip",
    config,
    wallet,
    entropy: () => new ScriptedEntropy(values),
    stateStore: new KvHouseStateStore(store),
    logger: new InMemoryLogger(),
    metrics: new RecordingMetrics(),
  });
}

async function setup(values: number[] = [1], overrides: { stateStore?: IHouseStateStore; store?: InMemoryStore } = {}) {
  const store = overrides.store ?? new InMemoryStore();
  const wallet = new HookedWallet(new KvWalletService(store, new NoopLockManager()));
  await wallet.credit("owner", 100_000n);
  await wallet.credit("alice", 10_000n);
  const entropy = new ScriptedEntropy(values);
  const logger = new InMemoryLogger();
  const metrics = new RecordingMetrics();
  const table = await HouseTable.open({
    game: "coinflip",
    config,
    wallet,
    entropy: () => entropy,
    stateStore: overrides.stateStore ?? new KvHouseStateStore(store),
    logger,
    metrics,
  });
  return { store, wallet, entropy, logger, metrics, table };
}

describe("HouseTable", () => {
  it("escrows a win and pays it out on claim", async () => {
    const { table, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);

    const outcome = await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    expect(outcome).toMatchObject({ game: "coinflip", payout: 200n, won: true, result: "WIN", nonce: 1, metadata: { draw: 1 } });
    expect(outcome.stats).toEqual({ totalBet: 100n, totalWon: 200n, totalLost: 0n });
    expect(await table.bankroll()).toEqual({ held: 1_100n, pending: 200n, available: 900n });
    expect(await wallet.getBalance("alice")).toBe(9_900n);
    expect(table.globalTotalBet()).toBe(100n);

    expect(await table.claim("alice")).toBe(200n);
    expect(await wallet.getBalance("alice")).toBe(10_100n);
    expect(await table.bankroll()).toEqual({ held: 900n, pending: 0n, available: 900n });
    await expect(table.claim("alice")).rejects.toMatchObject({ code: HouseErrorCode.NOTHING_TO_CLAIM });
  });

  it("books a loss against the player's stats", async () => {
    const { table } = await setup([0]);
    await table.deposit("owner", 1_000n);

    const outcome = await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    expect(outcome.result).toBe("LOSE");
    expect(table.userStats("alice")).toEqual({ totalBet: 100n, totalWon: 0n, totalLost: 100n });
    expect(table.pendingOf("alice")).toBe(0n);
    expect(await table.bankroll()).toEqual({ held: 1_100n, pending: 0n, available: 1_100n });
  });

  it("rejects a mismatched transfer before touching entropy or funds", async () => {
    const { table, entropy, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);

    await expect(
      table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 90n, input: true })
    ).rejects.toMatchObject({ code: HouseErrorCode.INVALID_BET });

    expect(entropy.remaining()).toBe(1);
    expect(entropy.nonceOf("alice")).toBe(0);
    expect(await wallet.getBalance("alice")).toBe(10_000n);
  });

  it("counts the incoming stake towards solvency", async () => {
    const { table, entropy } = await setup([1]);

    await expect(
      table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true })
    ).rejects.toMatchObject({ code: HouseErrorCode.INSUFFICIENT_BANKROLL });
    expect(entropy.remaining()).toBe(1);

    await table.deposit("owner", 100n);
    const outcome = await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });
    expect(outcome.payout).toBe(200n);
    expect(await table.bankroll()).toEqual({ held: 200n, pending: 200n, available: 0n });
  });

  it("leaves entropy alone when the player cannot pay the stake", async () => {
    const { table, entropy } = await setup([1]);
    await table.deposit("owner", 1_000n);

    await expect(
      table.placeBet(flipEngine, { caller: "carol", betAmount: 100n, transferAmount: 100n, input: true })
    ).rejects.toMatchObject({ code: HouseErrorCode.INSUFFICIENT_FUNDS });
    expect(entropy.remaining()).toBe(1);
  });

  it("refunds the stake when settlement fails", async () => {
    const { table, wallet, metrics } = await setup([]);
    await table.deposit("owner", 1_000n);
    const capped: OutcomeEngine<void, FlipMeta> = {
      game: "coinflip",
      worstCasePayout: () => 0n,
      resolve: () => {
        throw new HouseError(HouseErrorCode.PAYOUT_CAP_EXCEEDED, "too large");
      },
    };

    await expect(
      table.placeBet(capped, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: undefined })
    ).rejects.toMatchObject({ code: HouseErrorCode.PAYOUT_CAP_EXCEEDED });

    expect(await wallet.getBalance("alice")).toBe(10_000n);
    expect(await table.bankroll()).toEqual({ held: 1_000n, pending: 0n, available: 1_000n });
    expect(table.userStats("alice").totalBet).toBe(0n);
    expect(metrics.count("house_rejections_total", { game: "coinflip", operation: "bet", code: "PAYOUT_CAP_EXCEEDED" })).toBe(1);
  });

  it("records the last outcome for engines that report one", async () => {
    const { table } = await setup([]);
    await table.deposit("owner", 1_000n);
    const spinner: OutcomeEngine<void, FlipMeta> = {
      game: "coinflip",
      worstCasePayout: (betAmount) => betAmount,
      resolve: ({ betAmount }) => ({ won: true, payout: betAmount, outcomeIndex: 3, multiplierTenths: 10, metadata: { draw: 3 } }),
    };

    await table.placeBet(spinner, { caller: "alice", betAmount: 50n, transferAmount: 50n, input: undefined });
    const second = await table.placeBet(spinner, { caller: "alice", betAmount: 60n, transferAmount: 60n, input: undefined });

    const expected = { outcomeIndex: 3, multiplierTenths: 10, won: true, payout: 60n, nonce: 2 };
    expect(second.lastOutcome).toEqual(expected);
    expect(table.lastOutcome("alice")).toEqual(expected);
    expect(table.lastOutcome("bob")).toBeNull();
  });

  it("lets only the owner withdraw, and only the unreserved part", async () => {
    const { table, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    await expect(table.withdraw("alice")).rejects.toMatchObject({ code: HouseErrorCode.NOT_OWNER });
    expect(await table.withdraw("owner")).toBe(900n);
    expect(await wallet.getBalance("owner")).toBe(99_900n);
    expect(await table.bankroll()).toEqual({ held: 200n, pending: 200n, available: 0n });
    await expect(table.withdraw("owner")).rejects.toMatchObject({ code: HouseErrorCode.INSUFFICIENT_BANKROLL });
  });

  it("rejects a claim issued from inside a claim's transfer", async () => {
    const { table, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    let reentrant: unknown;
    wallet.onTransfer = async () => {
      wallet.onTransfer = null;
      reentrant = await table.claim("alice").catch((err: unknown) => err);
    };

    expect(await table.claim("alice")).toBe(200n);
    expect(reentrant).toMatchObject({ code: HouseErrorCode.REENTRANCY });
    expect(await wallet.getBalance("alice")).toBe(10_100n);
    expect(table.pendingOf("alice")).toBe(0n);
    expect(table.isBusy()).toBe(false);
  });

  it("queues concurrent callers instead of rejecting them", async () => {
    const { table } = await setup();
    await Promise.all([table.deposit("owner", 10n), table.deposit("alice", 20n), table.deposit("owner", 30n)]);
    expect((await table.bankroll()).held).toBe(60n);
  });

  it("keeps escrow when a claim transfer fails", async () => {
    const { table, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    wallet.failNextTransfer = new Error("recipient rejected");
    await expect(table.claim("alice")).rejects.toMatchObject({ code: HouseErrorCode.TRANSFER_FAILED });
    expect(table.pendingOf("alice")).toBe(200n);
    expect(await table.claim("alice")).toBe(200n);
  });

  it("checkpoints state and resumes it", async () => {
    const { table, store, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    let restored: EntropyState | undefined;
    const resumed = await HouseTable.open({
      game: "coinflip",
      config,
      wallet,
      entropy: (state) => {
        restored = state;
        return new ScriptedEntropy();
      },
      stateStore: new KvHouseStateStore(store),
      logger: new InMemoryLogger(),
      metrics: new RecordingMetrics(),
    });

    expect(restored?.nonces).toEqual({ alice: 1 });
    expect(resumed.pendingOf("alice")).toBe(200n);
    expect(resumed.userStats("alice")).toEqual({ totalBet: 100n, totalWon: 200n, totalLost: 0n });
    expect(resumed.globalTotalBet()).toBe(100n);
  });

  it("carries attached extensions through the checkpoint", async () => {
    const { table, store } = await setup();
    table.attach("round", { snapshot: () => ({ roundId: 7 }) });
    await table.deposit("owner", 10n);

    const saved = await new KvHouseStateStore(store).load("coinflip");
    expect(saved?.extensions).toEqual({ round: { roundId: 7 } });
  });

  it("does not pay a claim whose zeroed escrow cannot be saved", async () => {
    const store = new InMemoryStore();
    const stateStore = new SwitchableStateStore(store);
    const { table, wallet, metrics } = await setup([1], { store, stateStore });
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    stateStore.failing = true;
    await expect(table.claim("alice")).rejects.toMatchObject({ code: HouseErrorCode.CHECKPOINT_FAILED });
    expect(await wallet.getBalance("alice")).toBe(9_900n);
    expect(table.pendingOf("alice")).toBe(200n);
    expect(metrics.count("house_checkpoint_failures_total", { game: "coinflip" })).toBe(1);

    const restarted = await reopen(store, wallet);
    expect(restarted.pendingOf("alice")).toBe(200n);
    expect(await restarted.claim("alice")).toBe(200n);
    expect(await wallet.getBalance("alice")).toBe(10_100n);
  });

  it("does not resurrect a paid claim after a restart", async () => {
    const { table, store, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });
    await table.claim("alice");

    const restarted = await reopen(store, wallet);
    expect(restarted.pendingOf("alice")).toBe(0n);
    await expect(restarted.claim("alice")).rejects.toMatchObject({ code: HouseErrorCode.NOTHING_TO_CLAIM });
    expect(await wallet.getBalance("alice")).toBe(10_100n);
  });

  it("saves the restored escrow when a claim transfer fails", async () => {
    const { table, store, wallet } = await setup([1]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    wallet.failNextTransfer = new Error("recipient rejected");
    await expect(table.claim("alice")).rejects.toMatchObject({ code: HouseErrorCode.TRANSFER_FAILED });

    const restarted = await reopen(store, wallet);
    expect(restarted.pendingOf("alice")).toBe(200n);
  });

  it("rolls back and refunds a bet whose settlement cannot be saved", async () => {
    const store = new InMemoryStore();
    const stateStore = new SwitchableStateStore(store);
    const { table, wallet } = await setup([1], { store, stateStore });
    await table.deposit("owner", 1_000n);

    stateStore.failing = true;
    await expect(
      table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true })
    ).rejects.toMatchObject({ code: HouseErrorCode.CHECKPOINT_FAILED });

    expect(await wallet.getBalance("alice")).toBe(10_000n);
    expect(await table.bankroll()).toEqual({ held: 1_000n, pending: 0n, available: 1_000n });
    expect(table.userStats("alice")).toEqual({ totalBet: 0n, totalWon: 0n, totalLost: 0n });
    expect(table.globalTotalBet()).toBe(0n);

    const restarted = await reopen(store, wallet);
    expect(restarted.pendingOf("alice")).toBe(0n);
  });

  it("refuses a withdrawal while the escrow cannot be saved", async () => {
    const store = new InMemoryStore();
    const stateStore = new SwitchableStateStore(store);
    const { table, wallet } = await setup([], { store, stateStore });
    await table.deposit("owner", 1_000n);

    stateStore.failing = true;
    await expect(table.withdraw("owner")).rejects.toMatchObject({ code: HouseErrorCode.CHECKPOINT_FAILED });
    expect(await wallet.getBalance("owner")).toBe(99_000n);
    expect((await table.bankroll()).held).toBe(1_000n);
  });

  it("rejects a deposit issued from inside a withdrawal's transfer", async () => {
    const { table, wallet } = await setup([]);
    await table.deposit("owner", 1_000n);

    let reentrant: unknown;
    wallet.onTransfer = async () => {
      wallet.onTransfer = null;
      reentrant = await table.deposit("owner", 10n).catch((err: unknown) => err);
    };

    expect(await table.withdraw("owner")).toBe(1_000n);
    expect(reentrant).toMatchObject({ code: HouseErrorCode.REENTRANCY, details: { operation: "deposit", running: "withdraw" } });
    expect(await table.bankroll()).toEqual({ held: 0n, pending: 0n, available: 0n });
    expect(await wallet.getBalance("owner")).toBe(100_000n);
  });

  it("rejects a bet issued from inside a withdrawal's transfer", async () => {
    const { table, wallet, entropy } = await setup([1]);
    await table.deposit("owner", 1_000n);

    let reentrant: unknown;
    wallet.onTransfer = async () => {
      wallet.onTransfer = null;
      reentrant = await table
        .placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true })
        .catch((err: unknown) => err);
    };

    expect(await table.withdraw("owner")).toBe(1_000n);
    expect(reentrant).toMatchObject({ code: HouseErrorCode.REENTRANCY, details: { operation: "bet", running: "withdraw" } });
    expect(entropy.remaining()).toBe(1);
    expect(await wallet.getBalance("alice")).toBe(10_000n);
  });

  it("rejects a claim issued from inside a stake collection", async () => {
    const { table, wallet } = await setup([1, 0]);
    await table.deposit("owner", 1_000n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    let reentrant: unknown;
    wallet.onTransfer = async () => {
      wallet.onTransfer = null;
      reentrant = await table.claim("alice").catch((err: unknown) => err);
    };

    const outcome = await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });
    expect(outcome.result).toBe("LOSE");
    expect(reentrant).toMatchObject({ code: HouseErrorCode.REENTRANCY, details: { operation: "claim", running: "bet" } });
    expect(table.pendingOf("alice")).toBe(200n);
    expect(await wallet.getBalance("alice")).toBe(9_800n);
  });

  it("logs and counts a failed deposit checkpoint without failing the deposit", async () => {
    const failing: IHouseStateStore = {
      load: async () => null,
      save: async (_game: string, _snapshot: HouseSnapshot) => {
        throw new Error("store offline");
      },
    };
    const { table, logger, metrics } = await setup([], { stateStore: failing });

    await expect(table.deposit("owner", 10n)).resolves.toEqual({ held: 10n, pending: 0n, available: 10n });
    expect(logger.messages("error")).toEqual(["coinflip.checkpoint.failed"]);
    expect(metrics.count("house_checkpoint_failures_total", { game: "coinflip" })).toBe(1);
  });

  it("appends settled bets to the history", async () => {
    const store = new InMemoryStore();
    const wallet = new KvWalletService(store, new NoopLockManager());
    await wallet.credit("owner", 1_000n);
    await wallet.credit("alice", 1_000n);
    const table = await HouseTable.open({
      game: "coinflip",
      config,
      wallet,
      entropy: () => new ScriptedEntropy([0]),
      stateStore: new KvHouseStateStore(store),
      history: new BetHistoryRepository(createDbClient()),
      logger: new InMemoryLogger(),
      metrics: new RecordingMetrics(),
    });
    await table.deposit("owner", 500n);
    await table.placeBet(flipEngine, { caller: "alice", betAmount: 100n, transferAmount: 100n, input: true });

    const history = await table.history("alice");
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ game: "coinflip", betAmount: 100n, payoutAmount: 0n, result: "LOSE", nonce: 1, meta: { draw: 0 } });
  });
});
