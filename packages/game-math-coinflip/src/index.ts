import type { EngineResolution, EngineResolveInput, OutcomeEngine } from "@wagerhouse/core-house";
import type { GameName } from "@wagerhouse/core-types";

export type CoinFlipSide = "heads" | "tails";

export interface CoinFlipBetInput {
  /** `true` calls heads. */
  guess: boolean;
}

export interface CoinFlipEvaluationMetadata extends Record<string, unknown> {
  side: CoinFlipSide;
  outcome: CoinFlipSide;
  win: boolean;
}

const PAYOUT_MULTIPLIER = 2n;

export function sideToGuess(side: CoinFlipSide): boolean {
  return side === "heads";
}

export function guessToSide(guess: boolean): CoinFlipSide {
  return guess ? "heads" : "tails";
}

/** Even-money flip: the house edge is structural, nothing is shaved off the payout. */
export class CoinFlipMathEngine implements OutcomeEngine<CoinFlipBetInput, CoinFlipEvaluationMetadata> {
  readonly game: GameName = "coinflip";

  worstCasePayout(betAmount: bigint): bigint {
    return betAmount * PAYOUT_MULTIPLIER;
  }

  resolve({ caller, betAmount, input, entropy }: EngineResolveInput<CoinFlipBetInput>): EngineResolution<CoinFlipEvaluationMetadata> {
    const result = entropy.drawBounded(2n, caller);
    const win = result === (input.guess ? 1n : 0n);

    return {
      won: win,
      payout: win ? betAmount * PAYOUT_MULTIPLIER : 0n,
      metadata: {
        side: guessToSide(input.guess),
        outcome: guessToSide(result === 1n),
        win,
      } satisfies CoinFlipEvaluationMetadata,
    };
  }
}
