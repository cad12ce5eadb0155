import type { BetResult } from "@wagerhouse/core-types";
import type { RoundPhase } from "@wagerhouse/game-math-crash";

export interface CrashBetResponse {
  betAmount: string;
  payout: string;
  result: BetResult;
  roundId: number;
  autoCashout: number;
  isWin: boolean;
  pendingPrize: string;
  createdAt: string;
}

export interface CrashRoundResponse {
  roundId: number;
  startTime: number;
  bettingEndsAt: number;
  phase: RoundPhase;
  /** Withheld while the round is taking bets. */
  crashMultiplier: number | null;
}

export interface CrashCloseResponse {
  closed: boolean;
  round: CrashRoundResponse;
}
