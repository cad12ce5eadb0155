import { EntropySource, SeededEntropyInputs, SystemEntropyInputs } from "@wagerhouse/core-entropy";
import type { IEntropySource } from "@wagerhouse/core-entropy";
import type { EngineResolution, OutcomeEngine } from "@wagerhouse/core-house";
import type { GameName } from "@wagerhouse/core-types";
import { CoinFlipMathEngine, sideToGuess } from "@wagerhouse/game-math-coinflip";
import type { CoinFlipSide } from "@wagerhouse/game-math-coinflip";
import { CrashMathEngine, CrashRoundMachine } from "@wagerhouse/game-math-crash";
import { WheelMathEngine } from "@wagerhouse/game-math-wheel";

export interface SimOptions {
  rounds: number;
  bet: bigint;
  /** Reproducible runs; omitted, the system entropy inputs are used. */
  seed?: string;
}

export interface SimReport {
  game: GameName;
  rounds: number;
  totalBet: string;
  totalPayout: string;
  /** Percent, two decimals. */
  rtp: number;
  winRate: number;
  frequencies: Record<string, number>;
}

const SIM_CALLER = "simulator";
// Large enough that no simulated payout trips a solvency or cap check.
const SIM_BANKROLL = 10n ** 30n;

export function calculateRTP(totalPayout: bigint, totalBet: bigint): number {
  return Number((totalPayout * 10_000n) / (totalBet === 0n ? 1n : totalBet)) / 100;
}

export function simEntropy(game: GameName, seed?: string): IEntropySource {
  return new EntropySource(`sim:${game}`, seed ? new SeededEntropyInputs(seed) : new SystemEntropyInputs());
}

function simulate<TInput, TMeta extends object>(
  engine: OutcomeEngine<TInput, TMeta>,
  input: TInput,
  options: SimOptions,
  bucket: (resolution: EngineResolution<TMeta>) => string,
  afterRound: () => void = () => undefined,
): SimReport {
  const entropy = simEntropy(engine.game, options.seed);
  const frequencies: Record<string, number> = {};
  let totalBet = 0n;
  let totalPayout = 0n;
  let wins = 0;

  for (let i = 0; i < options.rounds; i++) {
    engine.admit?.(input);
    const resolution = engine.resolve({ caller: SIM_CALLER, betAmount: options.bet, input, entropy, available: SIM_BANKROLL });
    totalBet += options.bet;
    if (resolution.won) {
      totalPayout += resolution.payout;
      wins += 1;
    }
    const key = bucket(resolution);
    frequencies[key] = (frequencies[key] ?? 0) + 1;
    afterRound();
  }

  return {
    game: engine.game,
    rounds: options.rounds,
    totalBet: totalBet.toString(),
    totalPayout: totalPayout.toString(),
    rtp: calculateRTP(totalPayout, totalBet),
    winRate: options.rounds ? wins / options.rounds : 0,
    frequencies,
  };
}

export function runWheelSim(options: SimOptions): SimReport {
  return simulate(new WheelMathEngine(), undefined, options, (resolution) => String(resolution.outcomeIndex));
}

export function runCoinFlipSim(options: SimOptions & { side: CoinFlipSide }): SimReport {
  return simulate(new CoinFlipMathEngine(), { guess: sideToGuess(options.side) }, options, (resolution) => resolution.metadata.outcome);
}

/** One bet per round; each round is closed and replaced before the next bet. */
export function runCrashSim(options: SimOptions & { autoCashout: number }): SimReport {
  let now = 0;
  const clock = () => now;
  const entropy = simEntropy("crash", options.seed && `${options.seed}:rounds`);
  const rounds = CrashRoundMachine.start(entropy, SIM_CALLER, 1, clock);

  return simulate(
    new CrashMathEngine(rounds),
    { autoCashout: options.autoCashout },
    options,
    (resolution) => (resolution.won ? "win" : "lose"),
    () => {
      now += 1;
      rounds.openNextRound(entropy, SIM_CALLER);
    },
  );
}
