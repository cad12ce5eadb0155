import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";
import type { EngineResolution, EngineResolveInput, OutcomeEngine } from "@wagerhouse/core-house";
import type { GameName } from "@wagerhouse/core-types";
import { MAX_CRASH_MULTIPLIER } from "./round";
import type { CrashRoundMachine } from "./round";

export * from "./round";

export const MIN_AUTO_CASHOUT = 11;
export const MAX_AUTO_CASHOUT = MAX_CRASH_MULTIPLIER;

const TENTHS = 10n;
const EDGE_NUMERATOR = 9_800n;
const EDGE_DENOMINATOR = 10_000n;
/** A single payout may take at most a quarter of the available bankroll. */
const PAYOUT_CAP_DIVISOR = 4n;

export interface CrashBetInput {
  /** Tenths, 11..300. */
  autoCashout: number;
}

export interface CrashEvaluationMetadata extends Record<string, unknown> {
  roundId: number;
  autoCashout: number;
  crashMultiplier: number;
  win: boolean;
}

export function netPayout(betAmount: bigint, autoCashout: number): bigint {
  const gross = (betAmount * BigInt(autoCashout)) / TENTHS;
  return (gross * EDGE_NUMERATOR) / EDGE_DENOMINATOR;
}

/** Settles bets against the shared round; draws no entropy of its own. */
export class CrashMathEngine implements OutcomeEngine<CrashBetInput, CrashEvaluationMetadata> {
  readonly game: GameName = "crash";

  constructor(private readonly rounds: CrashRoundMachine) {}

  admit(input: CrashBetInput): void {
    const { autoCashout } = input;
    if (!Number.isInteger(autoCashout) || autoCashout < MIN_AUTO_CASHOUT || autoCashout > MAX_AUTO_CASHOUT) {
      throw new HouseError(HouseErrorCode.INVALID_BET, `Auto cash-out must be between ${MIN_AUTO_CASHOUT} and ${MAX_AUTO_CASHOUT} tenths`, {
        autoCashout,
      });
    }
    if (this.rounds.phase() !== "BETTING") {
      const round = this.rounds.current();
      throw new HouseError(HouseErrorCode.BETTING_CLOSED, "Betting is closed for this round", {
        roundId: round.roundId,
        bettingEndsAt: round.bettingEndsAt,
      });
    }
  }

  worstCasePayout(betAmount: bigint): bigint {
    return (betAmount * BigInt(MAX_AUTO_CASHOUT)) / TENTHS;
  }

  resolve({ betAmount, input, available }: EngineResolveInput<CrashBetInput>): EngineResolution<CrashEvaluationMetadata> {
    const round = this.rounds.current();
    const win = input.autoCashout <= round.crashMultiplier;
    const metadata: CrashEvaluationMetadata = {
      roundId: round.roundId,
      autoCashout: input.autoCashout,
      crashMultiplier: round.crashMultiplier,
      win,
    };
    if (!win) {
      return { won: false, payout: 0n, metadata, roundId: round.roundId };
    }

    const payout = netPayout(betAmount, input.autoCashout);
    if (payout * PAYOUT_CAP_DIVISOR > available) {
      throw new HouseError(HouseErrorCode.PAYOUT_CAP_EXCEEDED, "Payout exceeds a quarter of the available bankroll", {
        payout: payout.toString(),
        available: available.toString(),
      });
    }
    if (payout > available) {
      throw new HouseError(HouseErrorCode.INSUFFICIENT_BANKROLL, "Bankroll cannot cover the payout", {
        payout: payout.toString(),
        available: available.toString(),
      });
    }
    return { won: true, payout, metadata, roundId: round.roundId };
  }
}
