import { HouseError, HouseErrorCode, isHouseError } from "@wagerhouse/core-errors";
import type { IWalletPort } from "@wagerhouse/core-wallet";
import type { AccountId, BankrollView, GameName } from "@wagerhouse/core-types";

export interface BankrollState {
  pending: Record<AccountId, bigint>;
}

/**
 * Pooled bankroll of one game. The held balance lives in the wallet under the
 * game's house account; this class only tracks the escrow of won-but-unclaimed
 * prizes, so `available = held - totalPending`.
 *
 * Callers are expected to serialize access (see the house table's guard).
 */
export class BankrollLedger {
  private readonly pending = new Map<AccountId, bigint>();
  private pendingTotal = 0n;

  constructor(
    private readonly wallet: IWalletPort,
    readonly houseAccount: AccountId,
    private readonly game: GameName,
    state?: BankrollState
  ) {
    if (state) {
      this.restore(state);
    }
  }

  /** Replaces the escrow with an earlier snapshot. */
  restore(state: BankrollState): void {
    this.pending.clear();
    this.pendingTotal = 0n;
    for (const [user, amount] of Object.entries(state.pending)) {
      if (amount > 0n) {
        this.pending.set(user, amount);
        this.pendingTotal += amount;
      }
    }
  }

  pendingOf(user: AccountId): bigint {
    return this.pending.get(user) ?? 0n;
  }

  totalPending(): bigint {
    return this.pendingTotal;
  }

  heldBalance(): Promise<bigint> {
    return this.wallet.getBalance(this.houseAccount);
  }

  async availableBankroll(): Promise<bigint> {
    return (await this.heldBalance()) - this.pendingTotal;
  }

  async view(): Promise<BankrollView> {
    const held = await this.heldBalance();
    return { held, pending: this.pendingTotal, available: held - this.pendingTotal };
  }

  async deposit(from: AccountId, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new HouseError(HouseErrorCode.INVALID_DEPOSIT, "Deposit amount must be positive", { amount: amount.toString() });
    }
    await this.wallet.transfer(from, this.houseAccount, amount, { reason: "DEPOSIT", game: this.game });
  }

  async collectStake(from: AccountId, amount: bigint): Promise<void> {
    await this.wallet.transfer(from, this.houseAccount, amount, { reason: "STAKE", game: this.game });
  }

  /** Moves a settled prize into escrow. Solvency is checked by the caller beforehand. */
  reserve(user: AccountId, amount: bigint): void {
    if (amount <= 0n) return;
    this.pending.set(user, this.pendingOf(user) + amount);
    this.pendingTotal += amount;
  }

  async claim(user: AccountId): Promise<bigint> {
    const amount = this.releaseClaim(user);
    try {
      await this.payClaim(user, amount);
    } catch (err) {
      this.revertClaim(user, amount);
      throw err;
    }
    return amount;
  }

  /**
   * First half of a claim: zeroes the user's escrow entry and returns what it
   * held. The caller may persist the zeroed escrow before paying it out.
   */
  releaseClaim(user: AccountId): bigint {
    const amount = this.pendingOf(user);
    if (amount === 0n) {
      throw new HouseError(HouseErrorCode.NOTHING_TO_CLAIM, "No pending prize to claim", { user });
    }
    this.pending.delete(user);
    this.pendingTotal -= amount;
    return amount;
  }

  async payClaim(user: AccountId, amount: bigint): Promise<void> {
    try {
      await this.wallet.transfer(this.houseAccount, user, amount, { reason: "CLAIM", game: this.game });
    } catch (err) {
      throw transferFailure(err, user, amount);
    }
  }

  /** Puts a released prize back into escrow. */
  revertClaim(user: AccountId, amount: bigint): void {
    this.pending.set(user, this.pendingOf(user) + amount);
    this.pendingTotal += amount;
  }

  async withdraw(owner: AccountId): Promise<bigint> {
    const available = await this.availableBankroll();
    if (available <= 0n) {
      throw new HouseError(HouseErrorCode.INSUFFICIENT_BANKROLL, "Nothing available to withdraw", {
        available: available.toString(),
      });
    }
    try {
      await this.wallet.transfer(this.houseAccount, owner, available, { reason: "WITHDRAWAL", game: this.game });
    } catch (err) {
      throw transferFailure(err, owner, available);
    }
    return available;
  }

  async assertInvariant(): Promise<void> {
    let sum = 0n;
    for (const amount of this.pending.values()) {
      sum += amount;
    }
    if (sum !== this.pendingTotal) {
      throw new HouseError(HouseErrorCode.LEDGER_INVARIANT, "Pending total does not match escrow entries", {
        totalPending: this.pendingTotal.toString(),
        sum: sum.toString(),
      });
    }
    const held = await this.heldBalance();
    if (held < this.pendingTotal) {
      throw new HouseError(HouseErrorCode.LEDGER_INVARIANT, "Held balance is below pending prizes", {
        held: held.toString(),
        totalPending: this.pendingTotal.toString(),
      });
    }
  }

  snapshot(): BankrollState {
    return { pending: Object.fromEntries(this.pending) };
  }
}

function transferFailure(err: unknown, to: AccountId, amount: bigint): HouseError {
  if (isHouseError(err)) {
    return err;
  }
  return new HouseError(HouseErrorCode.TRANSFER_FAILED, "Native-asset transfer failed", {
    to,
    amount: amount.toString(),
    cause: err instanceof Error ? err.message : String(err),
  });
}
