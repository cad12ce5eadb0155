import type { EngineResolution, EngineResolveInput, OutcomeEngine } from "@wagerhouse/core-house";
import type { GameName } from "@wagerhouse/core-types";

export interface WheelSegment {
  index: number;
  /** Basis points out of 10000. */
  weight: number;
  /** Payout multiplier in tenths: 15 pays 1.5x. */
  multiplierTenths: bigint;
}

/**
 * The paying table. Older documentation for this wheel quotes
 * 2250/2250/1800/1800/1000/600/300; both sum to 10000, and this one is what
 * the engine draws against.
 */
export const WHEEL_SEGMENTS: readonly WheelSegment[] = [
  { index: 0, weight: 1900, multiplierTenths: 0n },
  { index: 1, weight: 1900, multiplierTenths: 0n },
  { index: 2, weight: 2200, multiplierTenths: 15n },
  { index: 3, weight: 2100, multiplierTenths: 20n },
  { index: 4, weight: 1000, multiplierTenths: 30n },
  { index: 5, weight: 600, multiplierTenths: 50n },
  { index: 6, weight: 300, multiplierTenths: 100n },
];

const TOTAL_WEIGHT = 10_000n;
const TENTHS = 10n;

export interface WheelEvaluationMetadata extends Record<string, unknown> {
  outcomeIndex: number;
  multiplierTenths: number;
  draw: number;
}

/** First segment whose cumulative weight exceeds `draw`. */
export function pickSegment(draw: bigint, segments: readonly WheelSegment[] = WHEEL_SEGMENTS): WheelSegment {
  let cumulative = 0n;
  for (const segment of segments) {
    cumulative += BigInt(segment.weight);
    if (cumulative > draw) {
      return segment;
    }
  }
  throw new RangeError(`Wheel draw ${draw} is outside the weight table`);
}

export class WheelMathEngine implements OutcomeEngine<void, WheelEvaluationMetadata> {
  readonly game: GameName = "wheel";
  private readonly maxMultiplierTenths: bigint;

  constructor(private readonly segments: readonly WheelSegment[] = WHEEL_SEGMENTS) {
    const total = segments.reduce((sum, segment) => sum + BigInt(segment.weight), 0n);
    if (total !== TOTAL_WEIGHT) {
      throw new Error(`Wheel weights must sum to ${TOTAL_WEIGHT}, got ${total}`);
    }
    this.maxMultiplierTenths = segments.reduce((max, segment) => (segment.multiplierTenths > max ? segment.multiplierTenths : max), 0n);
  }

  worstCasePayout(betAmount: bigint): bigint {
    return (betAmount * this.maxMultiplierTenths) / TENTHS;
  }

  resolve({ caller, betAmount, entropy }: EngineResolveInput<void>): EngineResolution<WheelEvaluationMetadata> {
    const draw = entropy.drawBounded(TOTAL_WEIGHT, caller);
    const segment = pickSegment(draw, this.segments);
    const payout = (betAmount * segment.multiplierTenths) / TENTHS;

    return {
      won: payout > 0n,
      payout,
      outcomeIndex: segment.index,
      multiplierTenths: Number(segment.multiplierTenths),
      metadata: {
        outcomeIndex: segment.index,
        multiplierTenths: Number(segment.multiplierTenths),
        draw: Number(draw),
      } satisfies WheelEvaluationMetadata,
    };
  }
}
