import { beforeEach, describe, expect, it } from "vitest";
import { HouseErrorCode } from "@wagerhouse/core-errors";
import { KvWalletService } from "@wagerhouse/core-wallet";
import { BankrollLedger } from "../src";
import { HookedWallet, InMemoryStore, NoopLockManager } from "../../../apps/test-utils/test-helpers";

const HOUSE = "house:wheel";

describe("BankrollLedger", () => {
  let wallet: HookedWallet;
  let ledger: BankrollLedger;

  beforeEach(async () => {
    wallet = new HookedWallet(new KvWalletService(new InMemoryStore(), new NoopLockManager()));
    await wallet.credit("alice", 1000n);
    ledger = new BankrollLedger(wallet, HOUSE, "wheel");
  });

  it("moves deposits into the house account", async () => {
    await ledger.deposit("alice", 400n);

    expect(await ledger.heldBalance()).toBe(400n);
    expect(await wallet.getBalance("alice")).toBe(600n);
    expect(await ledger.view()).toEqual({ held: 400n, pending: 0n, available: 400n });
  });

  it("rejects zero deposits", async () => {
    await expect(ledger.deposit("alice", 0n)).rejects.toMatchObject({ code: HouseErrorCode.INVALID_DEPOSIT });
    expect(await ledger.heldBalance()).toBe(0n);
  });

  it("surfaces a depositor's missing funds", async () => {
    await expect(ledger.deposit("alice", 5000n)).rejects.toMatchObject({ code: HouseErrorCode.INSUFFICIENT_FUNDS });
  });

  it("escrows prizes until they are claimed", async () => {
    await ledger.deposit("alice", 400n);
    ledger.reserve("bob", 100n);
    ledger.reserve("bob", 50n);

    expect(ledger.pendingOf("bob")).toBe(150n);
    expect(await ledger.availableBankroll()).toBe(250n);

    expect(await ledger.claim("bob")).toBe(150n);
    expect(await wallet.getBalance("bob")).toBe(150n);
    expect(ledger.totalPending()).toBe(0n);
    expect(await ledger.heldBalance()).toBe(250n);

    await expect(ledger.claim("bob")).rejects.toMatchObject({ code: HouseErrorCode.NOTHING_TO_CLAIM });
  });

  it("ignores non-positive reservations", () => {
    ledger.reserve("bob", 0n);
    expect(ledger.snapshot()).toEqual({ pending: {} });
  });

  it("restores escrow when the claim transfer fails", async () => {
    await ledger.deposit("alice", 400n);
    ledger.reserve("bob", 150n);
    wallet.failNextTransfer = new Error("recipient rejected");

    await expect(ledger.claim("bob")).rejects.toMatchObject({
      code: HouseErrorCode.TRANSFER_FAILED,
      details: { to: "bob", amount: "150", cause: "recipient rejected" },
    });
    expect(ledger.pendingOf("bob")).toBe(150n);
    expect(ledger.totalPending()).toBe(150n);
    expect(await ledger.heldBalance()).toBe(400n);
  });

  it("withdraws only what is not owed to players", async () => {
    await ledger.deposit("alice", 400n);
    ledger.reserve("bob", 150n);

    expect(await ledger.withdraw("owner")).toBe(250n);
    expect(await wallet.getBalance("owner")).toBe(250n);
    expect(await ledger.heldBalance()).toBe(150n);
    await ledger.assertInvariant();

    await expect(ledger.withdraw("owner")).rejects.toMatchObject({ code: HouseErrorCode.INSUFFICIENT_BANKROLL });
  });

  it("resumes escrow from a snapshot", async () => {
    await ledger.deposit("alice", 400n);
    ledger.reserve("bob", 120n);

    const resumed = new BankrollLedger(wallet, HOUSE, "wheel", ledger.snapshot());
    expect(resumed.pendingOf("bob")).toBe(120n);
    expect(resumed.totalPending()).toBe(120n);
    await resumed.assertInvariant();
  });

  it("flags escrow that the held balance cannot cover", async () => {
    const broken = new BankrollLedger(wallet, HOUSE, "wheel", { pending: { bob: 10n } });
    await expect(broken.assertInvariant()).rejects.toMatchObject({ code: HouseErrorCode.LEDGER_INVARIANT });
  });
});
