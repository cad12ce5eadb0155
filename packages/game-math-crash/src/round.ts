import type { IEntropySource } from "@wagerhouse/core-entropy";
import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";
import type { StatefulExtension } from "@wagerhouse/core-house";

export interface CrashRound {
  readonly roundId: number;
  /** Unix seconds. */
  readonly startTime: number;
  readonly bettingEndsAt: number;
  /** Tenths, 10..300. */
  readonly crashMultiplier: number;
}

export type RoundPhase = "BETTING" | "CLOSED";

/** Whole seconds since the epoch. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export const MIN_CRASH_MULTIPLIER = 10;
export const MAX_CRASH_MULTIPLIER = 300;
const DRAW_RANGE = 1_000_000_000n;
const CURVE_NUMERATOR = 10n * DRAW_RANGE;

/**
 * Heavy-tailed draw: `u` uniform in [1, 1e9), multiplier `10e9 / (1e9 - u)`
 * in tenths, clamped to [1.0x, 30.0x].
 */
export function drawCrashMultiplier(entropy: IEntropySource, caller: string): number {
  let u = entropy.drawBounded(DRAW_RANGE, caller);
  if (u < 1n) u = 1n;
  const tenths = CURVE_NUMERATOR / (DRAW_RANGE - u);
  if (tenths < BigInt(MIN_CRASH_MULTIPLIER)) return MIN_CRASH_MULTIPLIER;
  if (tenths > BigInt(MAX_CRASH_MULTIPLIER)) return MAX_CRASH_MULTIPLIER;
  return Number(tenths);
}

function isCrashRound(value: unknown): value is CrashRound {
  if (!value || typeof value !== "object") return false;
  const fields = new Map<string, unknown>(Object.entries(value));
  return ["roundId", "startTime", "bettingEndsAt", "crashMultiplier"].every((key) => Number.isInteger(fields.get(key)));
}

/**
 * The shared crash round. Rounds are immutable records: opening a round and
 * force-closing betting both replace the current record.
 */
export class CrashRoundMachine implements StatefulExtension<CrashRound> {
  private round: CrashRound;

  private constructor(round: CrashRound, private readonly windowSeconds: number, private readonly clock: Clock) {
    this.round = Object.freeze({ ...round });
  }

  static start(entropy: IEntropySource, caller: string, windowSeconds: number, clock: Clock = systemClock): CrashRoundMachine {
    return new CrashRoundMachine(CrashRoundMachine.draw(0, entropy, caller, windowSeconds, clock()), windowSeconds, clock);
  }

  /** Rebuilds the machine from a checkpoint; null when nothing usable was saved. */
  static resume(saved: unknown, windowSeconds: number, clock: Clock = systemClock): CrashRoundMachine | null {
    return isCrashRound(saved) ? new CrashRoundMachine(saved, windowSeconds, clock) : null;
  }

  private static draw(previousId: number, entropy: IEntropySource, caller: string, windowSeconds: number, now: number): CrashRound {
    return {
      roundId: previousId + 1,
      startTime: now,
      bettingEndsAt: now + windowSeconds,
      crashMultiplier: drawCrashMultiplier(entropy, caller),
    };
  }

  current(): CrashRound {
    return this.round;
  }

  phase(): RoundPhase {
    return this.clock() < this.round.bettingEndsAt ? "BETTING" : "CLOSED";
  }

  openNextRound(entropy: IEntropySource, caller: string): CrashRound {
    if (this.phase() === "BETTING") {
      throw new HouseError(HouseErrorCode.ROUND_STILL_OPEN, "Current round is still taking bets", {
        roundId: this.round.roundId,
        bettingEndsAt: this.round.bettingEndsAt,
      });
    }
    this.round = Object.freeze(CrashRoundMachine.draw(this.round.roundId, entropy, caller, this.windowSeconds, this.clock()));
    return this.round;
  }

  /** Returns whether betting was open and has now been closed. */
  forceCloseBetting(): boolean {
    if (this.phase() === "CLOSED") return false;
    this.round = Object.freeze({ ...this.round, bettingEndsAt: this.clock() });
    return true;
  }

  snapshot(): CrashRound {
    return { ...this.round };
  }
}
