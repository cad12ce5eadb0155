import { BankrollLedger } from "@wagerhouse/core-bankroll";
import type { BankrollState } from "@wagerhouse/core-bankroll";
import type { EntropyState, IEntropySource } from "@wagerhouse/core-entropy";
import { HouseError, HouseErrorCode, isHouseError } from "@wagerhouse/core-errors";
import type { IBetHistoryRepository, BetRecord } from "@wagerhouse/core-game-history";
import { ScopedLogger } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";
import type { IMetrics } from "@wagerhouse/core-metrics";
import type { IKeyValueStore } from "@wagerhouse/core-redis";
import { StakeValidator } from "@wagerhouse/core-stake";
import type { BetLimits } from "@wagerhouse/core-stake";
import { StatsBook } from "@wagerhouse/core-stats";
import type { LastOutcome, StatsState } from "@wagerhouse/core-stats";
import type { AccountId, BankrollView, BetResult, GameName, UserStats } from "@wagerhouse/core-types";
import type { IWalletPort } from "@wagerhouse/core-wallet";
import { ReentrancyGuard } from "./reentrancy-guard";

export { ReentrancyGuard } from "./reentrancy-guard";

export interface EngineResolveInput<TInput> {
  caller: AccountId;
  betAmount: bigint;
  input: TInput;
  entropy: IEntropySource;
  /** Bankroll at settlement, with this bet's stake already held. */
  available: bigint;
}

export interface EngineResolution<TMeta extends object> {
  won: boolean;
  payout: bigint;
  metadata: TMeta;
  /** Set by engines that keep a per-player last outcome. */
  outcomeIndex?: number;
  multiplierTenths?: number;
  roundId?: number;
}

/**
 * Game-specific odds and payout rules. The table owns everything else:
 * validation, solvency, transfers, escrow, stats and checkpoints.
 */
export interface OutcomeEngine<TInput, TMeta extends object> {
  readonly game: GameName;
  /** Gatekeeping that must pass before any funds move, e.g. an open betting window. */
  admit?(input: TInput): void;
  worstCasePayout(betAmount: bigint, input: TInput): bigint;
  resolve(params: EngineResolveInput<TInput>): EngineResolution<TMeta>;
}

export interface BetRequest<TInput> {
  caller: AccountId;
  betAmount: bigint;
  transferAmount: bigint;
  input: TInput;
}

export interface BetOutcome<TMeta extends object> {
  game: GameName;
  betAmount: bigint;
  payout: bigint;
  won: boolean;
  result: BetResult;
  metadata: TMeta;
  nonce: number;
  stats: UserStats;
  lastOutcome: LastOutcome | null;
  settledAt: string;
}

export interface StatefulExtension<TState> {
  snapshot(): TState;
}

export interface HouseSnapshot {
  bankroll: BankrollState;
  stats: StatsState;
  entropy: EntropyState;
  extensions: Record<string, unknown>;
}

export interface IHouseStateStore {
  load(game: GameName): Promise<HouseSnapshot | null>;
  save(game: GameName, snapshot: HouseSnapshot): Promise<void>;
}

export const HOUSE_STATE_STORE = Symbol("HOUSE_STATE_STORE");

const STATE_KEY = (game: GameName) => `house:state:${game}`;

export class KvHouseStateStore implements IHouseStateStore {
  constructor(private readonly store: IKeyValueStore) {}

  load(game: GameName): Promise<HouseSnapshot | null> {
    return this.store.get<HouseSnapshot>(STATE_KEY(game));
  }

  save(game: GameName, snapshot: HouseSnapshot): Promise<void> {
    return this.store.set(STATE_KEY(game), snapshot);
  }
}

export interface HouseTableConfig extends BetLimits {
  ownerId: AccountId;
  houseAccount: AccountId;
}

export interface HouseTableOptions {
  game: GameName;
  config: HouseTableConfig;
  wallet: IWalletPort;
  entropy: (state?: EntropyState) => IEntropySource;
  stateStore: IHouseStateStore;
  history?: IBetHistoryRepository;
  logger: ILogger;
  metrics: IMetrics;
}

/**
 * One game's pooled bankroll, stats and entropy behind a single reentrancy
 * guard. Every mutating entry point runs inside the guard.
 *
 * Escrow changes are saved before any money leaves the house account: a
 * claim or withdrawal persists first and pays second, and a bet whose
 * settlement cannot be saved is rolled back and its stake refunded.
 */
export class HouseTable {
  readonly game: GameName;
  readonly entropy: IEntropySource;

  private readonly guard = new ReentrancyGuard();
  private readonly validator = new StakeValidator();
  private readonly extensions = new Map<string, StatefulExtension<unknown>>();
  private readonly logger: ILogger;

  private constructor(
    private readonly options: HouseTableOptions,
    private readonly ledger: BankrollLedger,
    private readonly stats: StatsBook,
    entropy: IEntropySource,
    private readonly saved: HouseSnapshot | null
  ) {
    this.game = options.game;
    this.entropy = entropy;
    this.logger = new ScopedLogger(options.logger, { game: options.game });
  }

  static async open(options: HouseTableOptions): Promise<HouseTable> {
    const saved = await options.stateStore.load(options.game);
    const ledger = new BankrollLedger(options.wallet, options.config.houseAccount, options.game, saved?.bankroll);
    const table = new HouseTable(options, ledger, new StatsBook(saved?.stats), options.entropy(saved?.entropy), saved);
    table.logger.info(`${options.game}.table.opened`, { resumed: saved !== null, houseAccount: options.config.houseAccount });
    return table;
  }

  get ownerId(): AccountId {
    return this.options.config.ownerId;
  }

  get houseAccount(): AccountId {
    return this.options.config.houseAccount;
  }

  /** State an extension left in the last checkpoint, if any. */
  savedExtension(name: string): unknown {
    return this.saved?.extensions[name];
  }

  attach(name: string, extension: StatefulExtension<unknown>): void {
    this.extensions.set(name, extension);
  }

  deposit(caller: AccountId, amount: bigint): Promise<BankrollView> {
    return this.guarded("deposit", async () => {
      await this.ledger.deposit(caller, amount);
      const view = await this.ledger.view();
      this.logger.info(`${this.game}.bankroll.deposited`, { userId: caller, amount: amount.toString() });
      this.options.metrics.increment("house_deposits_total", { game: this.game });
      return view;
    });
  }

  claim(caller: AccountId): Promise<bigint> {
    return this.guarded(
      "claim",
      async () => {
        const amount = this.ledger.releaseClaim(caller);
        try {
          await this.persist();
        } catch (err) {
          this.ledger.revertClaim(caller, amount);
          throw err;
        }
        try {
          await this.ledger.payClaim(caller, amount);
        } catch (err) {
          this.ledger.revertClaim(caller, amount);
          await this.checkpoint();
          throw err;
        }
        this.logger.info(`${this.game}.prize.claimed`, { userId: caller, amount: amount.toString() });
        this.options.metrics.increment("house_claims_total", { game: this.game });
        return amount;
      },
      { checkpoint: false }
    );
  }

  withdraw(caller: AccountId): Promise<bigint> {
    return this.guarded(
      "withdraw",
      async () => {
        this.assertOwner(caller);
        // The stored escrow must be current before the unreserved balance leaves.
        await this.persist();
        const amount = await this.ledger.withdraw(caller);
        this.logger.info(`${this.game}.bankroll.withdrawn`, { userId: caller, amount: amount.toString() });
        this.options.metrics.increment("house_withdrawals_total", { game: this.game });
        return amount;
      },
      { checkpoint: false }
    );
  }

  placeBet<TInput, TMeta extends object>(engine: OutcomeEngine<TInput, TMeta>, request: BetRequest<TInput>): Promise<BetOutcome<TMeta>> {
    return this.guarded("bet", () => this.settleBet(engine, request), { checkpoint: false });
  }

  /** Guarded mutation that is not a bet, e.g. opening a crash round. */
  run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return this.guarded(operation, fn);
  }

  runOwnerAction<T>(caller: AccountId, operation: string, fn: () => Promise<T>): Promise<T> {
    return this.guarded(operation, async () => {
      this.assertOwner(caller);
      return fn();
    });
  }

  assertOwner(caller: AccountId): void {
    if (caller !== this.options.config.ownerId) {
      throw new HouseError(HouseErrorCode.NOT_OWNER, "Only the owner may perform this operation", { caller });
    }
  }

  isBusy(): boolean {
    return this.guard.isLocked();
  }

  bankroll(): Promise<BankrollView> {
    return this.ledger.view();
  }

  pendingOf(user: AccountId): bigint {
    return this.ledger.pendingOf(user);
  }

  userStats(user: AccountId): UserStats {
    return this.stats.userStats(user);
  }

  globalTotalBet(): bigint {
    return this.stats.globalTotalBet();
  }

  lastOutcome(user: AccountId): LastOutcome | null {
    return this.stats.lastOutcome(user);
  }

  async history(user: AccountId, limit?: number, offset?: number): Promise<BetRecord[]> {
    if (!this.options.history) return [];
    return this.options.history.listForUser(user, this.game, limit, offset);
  }

  snapshot(): HouseSnapshot {
    const extensions: Record<string, unknown> = {};
    for (const [name, extension] of this.extensions) {
      extensions[name] = extension.snapshot();
    }
    return {
      bankroll: this.ledger.snapshot(),
      stats: this.stats.snapshot(),
      entropy: this.entropy.snapshot(),
      extensions,
    };
  }

  /**
   * Saves the current state after an operation that moved no escrow, such as
   * a deposit or a new crash round. A failure is logged and counted; the next
   * strict save catches the store up.
   */
  private async checkpoint(): Promise<void> {
    try {
      await this.persist();
    } catch (err) {
      if (!isHouseError(err, HouseErrorCode.CHECKPOINT_FAILED)) {
        throw err;
      }
    }
  }

  private async persist(): Promise<void> {
    try {
      await this.options.stateStore.save(this.game, this.snapshot());
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      this.logger.error(`${this.game}.checkpoint.failed`, { err: cause });
      this.options.metrics.increment("house_checkpoint_failures_total", { game: this.game });
      throw new HouseError(HouseErrorCode.CHECKPOINT_FAILED, "House state could not be saved", { cause });
    }
  }

  private async guarded<T>(operation: string, fn: () => Promise<T>, options: { checkpoint: boolean } = { checkpoint: true }): Promise<T> {
    try {
      return await this.guard.run(operation, async () => {
        const result = await fn();
        await this.ledger.assertInvariant();
        if (options.checkpoint) {
          await this.checkpoint();
        }
        await this.publishGauges();
        return result;
      });
    } catch (err) {
      if (isHouseError(err)) {
        this.logger.warn(`${this.game}.operation.rejected`, { operation, code: err.code, details: err.details });
        this.options.metrics.increment("house_rejections_total", { game: this.game, operation, code: err.code });
      }
      throw err;
    }
  }

  private async settleBet<TInput, TMeta extends object>(engine: OutcomeEngine<TInput, TMeta>, request: BetRequest<TInput>): Promise<BetOutcome<TMeta>> {
    const { caller, betAmount, input } = request;
    const start = Date.now();
    const before = { bankroll: this.ledger.snapshot(), stats: this.stats.snapshot() };

    this.validator.validate(betAmount, request.transferAmount, this.options.config);
    engine.admit?.(input);

    // The stake joins the bankroll in the same operation, so it counts towards solvency.
    const projected = (await this.ledger.heldBalance()) + betAmount - this.ledger.totalPending();
    this.validator.ensureSolvent(engine.worstCasePayout(betAmount, input), projected);

    await this.ledger.collectStake(caller, betAmount);

    let resolution: EngineResolution<TMeta>;
    try {
      resolution = engine.resolve({
        caller,
        betAmount,
        input,
        entropy: this.entropy,
        available: await this.ledger.availableBankroll(),
      });
    } catch (err) {
      await this.refundStake(caller, betAmount);
      throw err;
    }

    if (resolution.won) {
      this.ledger.reserve(caller, resolution.payout);
    }
    const payout = resolution.won ? resolution.payout : 0n;
    const stats = this.stats.recordBet(caller, betAmount, resolution.won, payout);
    const lastOutcome =
      resolution.outcomeIndex === undefined
        ? null
        : this.stats.recordLastOutcome(caller, {
            outcomeIndex: resolution.outcomeIndex,
            multiplierTenths: resolution.multiplierTenths ?? 0,
            won: resolution.won,
            payout,
          });
    const result: BetResult = resolution.won ? "WIN" : "LOSE";
    const nonce = this.entropy.nonceOf(caller);

    try {
      await this.persist();
    } catch (err) {
      this.ledger.restore(before.bankroll);
      this.stats.restore(before.stats);
      await this.refundStake(caller, betAmount);
      throw err;
    }

    await this.recordHistory({
      game: this.game,
      userId: caller,
      betAmount,
      payoutAmount: payout,
      result,
      nonce,
      roundId: resolution.roundId ?? null,
      meta: Object.fromEntries(Object.entries(resolution.metadata)),
    });

    this.logger.info(`${this.game}.bet.settled`, {
      userId: caller,
      betAmount: betAmount.toString(),
      payout: payout.toString(),
      result,
      roundId: resolution.roundId,
    });
    this.options.metrics.increment("house_bets_total", { game: this.game, result });
    this.options.metrics.observe("house_bet_latency_ms", Date.now() - start, { game: this.game });

    return {
      game: this.game,
      betAmount,
      payout,
      won: resolution.won,
      result,
      metadata: resolution.metadata,
      nonce,
      stats,
      lastOutcome,
      settledAt: new Date().toISOString(),
    };
  }

  private async refundStake(caller: AccountId, betAmount: bigint): Promise<void> {
    try {
      await this.options.wallet.transfer(this.options.config.houseAccount, caller, betAmount, {
        reason: "REFUND",
        game: this.game,
      });
    } catch (err) {
      this.logger.error(`${this.game}.bet.refund_failed`, {
        userId: caller,
        amount: betAmount.toString(),
        err: err instanceof Error ? err.message : String(err),
      });
      this.options.metrics.increment("house_refund_failures_total", { game: this.game });
      throw err;
    }
  }

  private async recordHistory(entry: Omit<BetRecord, "id" | "createdAt">): Promise<void> {
    if (!this.options.history) return;
    try {
      await this.options.history.append(entry);
    } catch (err) {
      this.logger.error(`${this.game}.history.append_failed`, {
        userId: entry.userId,
        err: err instanceof Error ? err.message : String(err),
      });
      this.options.metrics.increment("house_history_failures_total", { game: this.game });
    }
  }

  private async publishGauges(): Promise<void> {
    const view = await this.ledger.view();
    this.options.metrics.gauge("house_bankroll_held", Number(view.held), { game: this.game });
    this.options.metrics.gauge("house_bankroll_pending", Number(view.pending), { game: this.game });
    this.options.metrics.gauge("house_bankroll_available", Number(view.available), { game: this.game });
  }
}
