import type { BetResult } from "@wagerhouse/core-types";

export interface WheelBetResponse {
  betAmount: string;
  payout: string;
  result: BetResult;
  outcomeIndex: number;
  multiplierTenths: number;
  nonce: number;
  pendingPrize: string;
  createdAt: string;
}

export interface WheelLastOutcomeResponse {
  outcomeIndex: number;
  multiplierTenths: number;
  won: boolean;
  payout: string;
  nonce: number;
}
