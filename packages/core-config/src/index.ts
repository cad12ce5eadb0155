import type { ConfigService } from "@nestjs/config";
import type { AccountId, GameName } from "@wagerhouse/core-types";

export interface GameConfig {
  game: GameName;
  minBet: bigint;
  maxBet: bigint;
  ownerId: AccountId;
  houseAccount: AccountId;
  /** Crash only; other games ignore it. */
  bettingWindowSeconds: number;
  idempotencyTtlSeconds: number;
}

export interface IGameConfigService {
  getConfig(game: GameName): GameConfig;
}

export const GAME_CONFIG_SERVICE = Symbol("GAME_CONFIG_SERVICE");

const DEFAULT_LIMITS: Record<GameName, { minBet: bigint; maxBet: bigint }> = {
  wheel: { minBet: 1_000n, maxBet: 1_000_000n },
  coinflip: { minBet: 1_000n, maxBet: 1_000_000n },
  crash: { minBet: 1_000n, maxBet: 500_000n },
};
const DEFAULT_BETTING_WINDOW_SECONDS = 30;
const DEFAULT_IDEMPOTENCY_TTL_SECONDS = 60;

/**
 * Reads `<GAME>_MIN_BET`, `<GAME>_MAX_BET`, `<GAME>_OWNER_ID` (falling back
 * to `HOUSE_OWNER_ID`) and `<GAME>_HOUSE_ACCOUNT` from the environment.
 * Misconfiguration fails at first use, which in the apps means at boot.
 */
export class EnvGameConfigService implements IGameConfigService {
  private readonly cache = new Map<GameName, GameConfig>();

  constructor(private readonly config: ConfigService) {}

  getConfig(game: GameName): GameConfig {
    const cached = this.cache.get(game);
    if (cached) return cached;

    const prefix = game.toUpperCase();
    const minBet = this.amount(`${prefix}_MIN_BET`, DEFAULT_LIMITS[game].minBet);
    const maxBet = this.amount(`${prefix}_MAX_BET`, DEFAULT_LIMITS[game].maxBet);
    if (minBet > maxBet) {
      throw new Error(`${prefix}_MIN_BET (${minBet}) exceeds ${prefix}_MAX_BET (${maxBet})`);
    }

    const ownerId = this.read(`${prefix}_OWNER_ID`) ?? this.read("HOUSE_OWNER_ID");
    if (!ownerId) {
      throw new Error(`${prefix}_OWNER_ID or HOUSE_OWNER_ID must be configured`);
    }

    const config: GameConfig = {
      game,
      minBet,
      maxBet,
      ownerId,
      houseAccount: this.read(`${prefix}_HOUSE_ACCOUNT`) ?? `house:${game}`,
      bettingWindowSeconds: this.seconds("CRASH_BETTING_WINDOW_SECONDS", DEFAULT_BETTING_WINDOW_SECONDS),
      idempotencyTtlSeconds: this.seconds("IDEMPOTENCY_TTL_SECONDS", DEFAULT_IDEMPOTENCY_TTL_SECONDS),
    };
    this.cache.set(game, config);
    return config;
  }

  private read(key: string): string | undefined {
    const raw = this.config.get<string>(key);
    return raw === undefined || raw === "" ? undefined : String(raw).trim();
  }

  private amount(key: string, fallback: bigint): bigint {
    const raw = this.read(key);
    if (raw === undefined) return fallback;
    if (!/^\d+$/.test(raw)) {
      throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw);
  }

  private seconds(key: string, fallback: number): number {
    const raw = this.read(key);
    if (raw === undefined) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(`${key} must be a positive whole number of seconds, got "${raw}"`);
    }
    return value;
  }
}
