import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { randomUUID } from "crypto";
import { newDb, DataType } from "pg-mem";
import { PgDbClient } from "@wagerhouse/core-db";
import type { IEntropySource, EntropyState } from "@wagerhouse/core-entropy";
import type { IKeyValueStore, ILockManager } from "@wagerhouse/core-redis";
import { deserializeFromRedis, serializeForRedis } from "@wagerhouse/core-redis";
import type { ILogger } from "@wagerhouse/core-logging";
import type { IMetrics } from "@wagerhouse/core-metrics";
import type { IWalletPort } from "@wagerhouse/core-wallet";
import type { TransferMeta } from "@wagerhouse/core-ledger";
import type { AccountId } from "@wagerhouse/core-types";

export class InMemoryStore implements IKeyValueStore {
  private store = new Map<string, string>();

  async get<T>(key: string): Promise<T | null> {
    return deserializeFromRedis<T>(this.store.get(key) ?? null);
  }

  async set<T>(key: string, value: T): Promise<void> {
    this.store.set(key, serializeForRedis(value));
  }

  async setNx(key: string, value: string, _ttlSeconds?: number): Promise<boolean> {
    if (this.store.has(key)) return false;
    this.store.set(key, serializeForRedis(value));
    return true;
  }

  async incr(key: string, _ttlSeconds?: number): Promise<number> {
    const next = Number(this.store.get(key) ?? "0") + 1;
    this.store.set(key, next.toString());
    return next;
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  keys(): string[] {
    return [...this.store.keys()];
  }
}

/** Key/value store whose writes can be made to fail on demand. */
export class FlakyStore extends InMemoryStore {
  private failAfter: number | null = null;

  /** Lets `okWrites` more writes through, then fails the next one. */
  failWriteAfter(okWrites: number): void {
    this.failAfter = okWrites;
  }

  async set<T>(key: string, value: T): Promise<void> {
    if (this.failAfter !== null) {
      if (this.failAfter === 0) {
        this.failAfter = null;
        throw new Error("store write failed");
      }
      this.failAfter -= 1;
    }
    await super.set(key, value);
  }
}

export class NoopLockManager implements ILockManager {
  async withLock<T>(_key: string, _ttlMs: number, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}

export class InMemoryLockManager implements ILockManager {
  private locks = new Set<string>();

  async withLock<T>(key: string, _ttlMs: number, fn: () => Promise<T>): Promise<T> {
    while (this.locks.has(key)) {
      await new Promise((resolve) => setTimeout(resolve, 0));
    }
    this.locks.add(key);
    try {
      return await fn();
    } finally {
      this.locks.delete(key);
    }
  }
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly entries: LogEntry[] = [];

  debug(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "debug", msg, meta });
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.entries.push({ level: "error", msg, meta });
  }

  messages(level?: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.msg);
  }
}

export class RecordingMetrics implements IMetrics {
  readonly counters = new Map<string, number>();
  readonly gauges = new Map<string, number>();

  increment(name: string, labels: Record<string, string> = {}): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + 1);
  }

  observe(): void {}

  gauge(name: string, value: number, labels: Record<string, string> = {}): void {
    this.gauges.set(metricKey(name, labels), value);
  }

  count(name: string, labels: Record<string, string> = {}): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }
}

function metricKey(name: string, labels: Record<string, string>): string {
  const parts = Object.keys(labels)
    .sort()
    .map((key) => `${key}=${labels[key]}`);
  return parts.length ? `${name}{${parts.join(",")}}` : name;
}

/** Whole-second clock the tests move by hand. */
export class ManualClock {
  constructor(private seconds: number) {}

  readonly now = (): number => this.seconds;

  advance(seconds: number): void {
    this.seconds += seconds;
  }
}

/**
 * Entropy stand-in that hands out queued raw values; bounded draws reduce
 * them with a plain modulo.
 */
export class ScriptedEntropy implements IEntropySource {
  private readonly queue: bigint[];
  private readonly nonces = new Map<string, number>();

  constructor(values: Array<bigint | number> = []) {
    this.queue = values.map((value) => BigInt(value));
  }

  push(...values: Array<bigint | number>): void {
    this.queue.push(...values.map((value) => BigInt(value)));
  }

  remaining(): number {
    return this.queue.length;
  }

  drawRaw(caller: string): bigint {
    const next = this.queue.shift();
    if (next === undefined) {
      throw new Error("ScriptedEntropy has no values left");
    }
    this.nonces.set(caller, this.nonceOf(caller) + 1);
    return next;
  }

  drawBounded(mod: bigint, caller: string): bigint {
    return this.drawRaw(caller) % mod;
  }

  nonceOf(caller: string): number {
    return this.nonces.get(caller) ?? 0;
  }

  snapshot(): EntropyState {
    return { accumulator: "0".repeat(64), nonces: Object.fromEntries(this.nonces) };
  }
}

/**
 * Wallet whose transfers can be made to fail or to call back into the game
 * before returning, the way a recipient contract would.
 */
export class HookedWallet implements IWalletPort {
  failNextTransfer: Error | null = null;
  onTransfer: ((from: AccountId, to: AccountId, amount: bigint) => Promise<void>) | null = null;

  constructor(private readonly inner: IWalletPort) {}

  getBalance(accountId: AccountId): Promise<bigint> {
    return this.inner.getBalance(accountId);
  }

  credit(accountId: AccountId, amount: bigint, meta?: TransferMeta): Promise<void> {
    return this.inner.credit(accountId, amount, meta);
  }

  async transfer(from: AccountId, to: AccountId, amount: bigint, meta: TransferMeta): Promise<void> {
    if (this.failNextTransfer) {
      const error = this.failNextTransfer;
      this.failNextTransfer = null;
      throw error;
    }
    if (this.onTransfer) {
      await this.onTransfer(from, to, amount);
    }
    await this.inner.transfer(from, to, amount, meta);
  }
}

const SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

export function createDbClient(): PgDbClient {
  const db = newDb({ autoCreateForeignKeyIndices: true });
  db.public.registerFunction({
    name: "now",
    returns: DataType.timestamptz,
    implementation: () => new Date(),
  });
  db.public.registerFunction({
    name: "gen_random_uuid",
    returns: DataType.uuid,
    implementation: () => randomUUID(),
  });

  const schema = readFileSync(SCHEMA_PATH, "utf-8");
  for (const statement of schema.split(";")) {
    if (statement.trim()) {
      db.public.none(statement);
    }
  }

  const pg = db.adapters.createPg();
  return new PgDbClient(new pg.Pool());
}
