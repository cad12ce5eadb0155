import type { BetResult } from "@wagerhouse/core-types";
import type { CoinFlipSide } from "@wagerhouse/game-math-coinflip";

export interface CoinflipBetResponse {
  betAmount: string;
  payoutAmount: string;
  result: BetResult;
  pickedSide: CoinFlipSide;
  outcome: CoinFlipSide;
  isWin: boolean;
  nonce: number;
  totalBet: string;
  globalTotalBet: string;
  createdAt: string;
}
