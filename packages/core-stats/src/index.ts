import type { AccountId, UserStats } from "@wagerhouse/core-types";

/** Most recent wheel spin per player; the nonce counts every spin they have made. */
export interface LastOutcome {
  outcomeIndex: number;
  multiplierTenths: number;
  won: boolean;
  payout: bigint;
  nonce: number;
}

export interface StatsState {
  users: Record<AccountId, UserStats>;
  globalTotalBet: bigint;
  lastOutcomes: Record<AccountId, LastOutcome>;
}

const EMPTY_STATS: UserStats = { totalBet: 0n, totalWon: 0n, totalLost: 0n };

export class StatsBook {
  private readonly users: Map<AccountId, UserStats>;
  private readonly lastOutcomes: Map<AccountId, LastOutcome>;
  private totalBet: bigint;

  constructor(state?: StatsState) {
    this.users = new Map(Object.entries(state?.users ?? {}));
    this.lastOutcomes = new Map(Object.entries(state?.lastOutcomes ?? {}));
    this.totalBet = state?.globalTotalBet ?? 0n;
  }

  /** Rolls the book back to an earlier snapshot. */
  restore(state: StatsState): void {
    this.users.clear();
    for (const [user, stats] of Object.entries(state.users)) {
      this.users.set(user, stats);
    }
    this.lastOutcomes.clear();
    for (const [user, outcome] of Object.entries(state.lastOutcomes)) {
      this.lastOutcomes.set(user, outcome);
    }
    this.totalBet = state.globalTotalBet;
  }

  recordBet(user: AccountId, betAmount: bigint, won: boolean, payout: bigint): UserStats {
    const current = this.userStats(user);
    const next: UserStats = {
      totalBet: current.totalBet + betAmount,
      totalWon: won ? current.totalWon + payout : current.totalWon,
      totalLost: won ? current.totalLost : current.totalLost + betAmount,
    };
    this.users.set(user, next);
    this.totalBet += betAmount;
    return next;
  }

  recordLastOutcome(user: AccountId, latest: Omit<LastOutcome, "nonce">): LastOutcome {
    const outcome: LastOutcome = {
      ...latest,
      nonce: (this.lastOutcomes.get(user)?.nonce ?? 0) + 1,
    };
    this.lastOutcomes.set(user, outcome);
    return outcome;
  }

  userStats(user: AccountId): UserStats {
    return this.users.get(user) ?? EMPTY_STATS;
  }

  globalTotalBet(): bigint {
    return this.totalBet;
  }

  lastOutcome(user: AccountId): LastOutcome | null {
    return this.lastOutcomes.get(user) ?? null;
  }

  snapshot(): StatsState {
    return {
      users: Object.fromEntries(this.users),
      globalTotalBet: this.totalBet,
      lastOutcomes: Object.fromEntries(this.lastOutcomes),
    };
  }
}
