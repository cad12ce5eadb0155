import type { IDbClient } from "@wagerhouse/core-db";
import type { IKeyValueStore, ILockManager } from "@wagerhouse/core-redis";
import { TransferJournalRepository } from "@wagerhouse/core-ledger";
import type { TransferMeta } from "@wagerhouse/core-ledger";
import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";
import type { AccountId } from "@wagerhouse/core-types";

/**
 * Native-asset ledger. Balances belong to accounts (players, owners, and one
 * house account per game); `transfer` is the push primitive the games settle
 * through and either moves the whole amount or nothing.
 */
export interface IWalletPort {
  getBalance(accountId: AccountId): Promise<bigint>;
  credit(accountId: AccountId, amount: bigint, meta?: TransferMeta): Promise<void>;
  transfer(from: AccountId, to: AccountId, amount: bigint, meta: TransferMeta): Promise<void>;
}

export const WALLET = Symbol("WALLET");

const BALANCE_KEY = (accountId: AccountId) => `wallet:${accountId}`;
const LOCK_KEY = (accountId: AccountId) => `wallet:lock:${accountId}`;
const LOCK_TTL_MS = 2000;

function assertPositive(amount: bigint): void {
  if (amount <= BigInt(0)) {
    throw new RangeError(`Transfer amount must be positive, got ${amount}`);
  }
}

function assertDistinct(from: AccountId, to: AccountId): void {
  if (from === to) {
    throw new RangeError(`Cannot transfer from ${from} to itself`);
  }
}

function insufficientFunds(accountId: AccountId, balance: bigint, amount: bigint): HouseError {
  return new HouseError(HouseErrorCode.INSUFFICIENT_FUNDS, "Insufficient funds for transfer", {
    accountId,
    balance: balance.toString(),
    amount: amount.toString(),
  });
}

/**
 * Key/value-backed wallet for demo deployments and tests. A transfer debits
 * first and puts the debit back if the credit cannot be written.
 */
export class KvWalletService implements IWalletPort {
  constructor(private readonly store: IKeyValueStore, private readonly lock: ILockManager) {}

  async getBalance(accountId: AccountId): Promise<bigint> {
    const record = await this.store.get<{ balance: bigint }>(BALANCE_KEY(accountId));
    return record ? record.balance : BigInt(0);
  }

  async credit(accountId: AccountId, amount: bigint): Promise<void> {
    assertPositive(amount);
    await this.lock.withLock(LOCK_KEY(accountId), LOCK_TTL_MS, async () => {
      const balance = await this.getBalance(accountId);
      await this.store.set(BALANCE_KEY(accountId), { balance: balance + amount });
    });
  }

  async transfer(from: AccountId, to: AccountId, amount: bigint, _meta: TransferMeta): Promise<void> {
    assertPositive(amount);
    assertDistinct(from, to);
    const [first, second] = [from, to].sort();
    await this.lock.withLock(LOCK_KEY(first), LOCK_TTL_MS, () =>
      this.lock.withLock(LOCK_KEY(second), LOCK_TTL_MS, async () => {
        const fromBalance = await this.getBalance(from);
        if (fromBalance < amount) {
          throw insufficientFunds(from, fromBalance, amount);
        }
        await this.store.set(BALANCE_KEY(from), { balance: fromBalance - amount });
        try {
          const toBalance = await this.getBalance(to);
          await this.store.set(BALANCE_KEY(to), { balance: toBalance + amount });
        } catch (err) {
          // Both keys are locked, so the sender still holds exactly what was debited.
          await this.store.set(BALANCE_KEY(from), { balance: fromBalance });
          throw err;
        }
      })
    );
  }
}

/**
 * Postgres-backed wallet. Each transfer runs in one SQL transaction that also
 * appends to `wallet_transfers`, so balances and the journal cannot diverge.
 */
export class DbWalletService implements IWalletPort {
  constructor(private readonly db: IDbClient, private readonly lock: ILockManager, private readonly lockTtlMs = LOCK_TTL_MS) {}

  async getBalance(accountId: AccountId): Promise<bigint> {
    const rows = await this.db.query<BalanceRow>(`SELECT account_id, balance FROM wallet_balances WHERE account_id = $1`, [
      accountId,
    ]);
    return rows.length ? BigInt(rows[0].balance) : BigInt(0);
  }

  async credit(accountId: AccountId, amount: bigint, meta: TransferMeta = { reason: "FUNDING" }): Promise<void> {
    assertPositive(amount);
    await this.lock.withLock(LOCK_KEY(accountId), this.lockTtlMs, () =>
      this.db.transaction(async (tx) => {
        const balance = await this.balanceForUpdate(tx, accountId);
        await this.writeBalance(tx, accountId, balance + amount);
        await new TransferJournalRepository(tx).append({
          fromAccount: null,
          toAccount: accountId,
          amount,
          reason: meta.reason,
          game: meta.game ?? null,
          meta,
        });
      })
    );
  }

  async transfer(from: AccountId, to: AccountId, amount: bigint, meta: TransferMeta): Promise<void> {
    assertPositive(amount);
    assertDistinct(from, to);
    await this.lock.withLock(LOCK_KEY(from), this.lockTtlMs, () =>
      this.db.transaction(async (tx) => {
        // Row locks are always taken in account order.
        const [first, second] = [from, to].sort();
        const balances = new Map<AccountId, bigint>();
        balances.set(first, await this.balanceForUpdate(tx, first));
        balances.set(second, await this.balanceForUpdate(tx, second));

        const fromBalance = balances.get(from) ?? BigInt(0);
        if (fromBalance < amount) {
          throw insufficientFunds(from, fromBalance, amount);
        }
        await this.writeBalance(tx, from, fromBalance - amount);
        await this.writeBalance(tx, to, (balances.get(to) ?? BigInt(0)) + amount);
        await new TransferJournalRepository(tx).append({
          fromAccount: from,
          toAccount: to,
          amount,
          reason: meta.reason,
          game: meta.game ?? null,
          meta,
        });
      })
    );
  }

  private async balanceForUpdate(tx: IDbClient, accountId: AccountId): Promise<bigint> {
    const rows = await tx.query<BalanceRow>(`SELECT account_id, balance FROM wallet_balances WHERE account_id = $1 FOR UPDATE`, [
      accountId,
    ]);
    if (rows.length) {
      return BigInt(rows[0].balance);
    }
    await tx.query(`INSERT INTO wallet_balances (account_id, balance) VALUES ($1, 0)`, [accountId]);
    return BigInt(0);
  }

  private async writeBalance(tx: IDbClient, accountId: AccountId, balance: bigint): Promise<void> {
    await tx.query(`UPDATE wallet_balances SET balance = $1, updated_at = NOW() WHERE account_id = $2`, [
      balance.toString(),
      accountId,
    ]);
  }
}

export function createWallet(impl: string, deps: { store: IKeyValueStore; lock: ILockManager; db: IDbClient }): IWalletPort {
  switch (impl.toLowerCase()) {
    case "db":
      return new DbWalletService(deps.db, deps.lock);
    case "kv":
    case "demo":
      return new KvWalletService(deps.store, deps.lock);
    default:
      throw new Error(`Unknown WALLET_IMPL: ${impl}`);
  }
}

interface BalanceRow {
  account_id: string;
  balance: string | number;
}
