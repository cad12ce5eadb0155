import { HouseError, HouseErrorCode } from "@wagerhouse/core-errors";

export interface BetLimits {
  minBet: bigint;
  maxBet: bigint;
}

export class StakeValidator {
  /** The stake must lie in `[minBet, maxBet]` and match the amount sent with it exactly. */
  validate(betAmount: bigint, transferredAmount: bigint, limits: BetLimits): void {
    if (betAmount !== transferredAmount) {
      throw new HouseError(HouseErrorCode.INVALID_BET, "Transferred amount does not match the bet", {
        betAmount: betAmount.toString(),
        transferredAmount: transferredAmount.toString(),
      });
    }
    if (betAmount < limits.minBet || betAmount > limits.maxBet) {
      throw new HouseError(HouseErrorCode.INVALID_BET, "Bet amount outside allowed range", {
        betAmount: betAmount.toString(),
        minBet: limits.minBet.toString(),
        maxBet: limits.maxBet.toString(),
      });
    }
  }

  ensureSolvent(worstCasePayout: bigint, available: bigint): void {
    if (worstCasePayout > available) {
      throw new HouseError(HouseErrorCode.INSUFFICIENT_BANKROLL, "Bankroll cannot cover the maximum payout", {
        worstCasePayout: worstCasePayout.toString(),
        available: available.toString(),
      });
    }
  }
}
