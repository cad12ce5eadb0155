import { isGameName } from "@wagerhouse/core-types";
import type { GameName } from "@wagerhouse/core-types";
import { runCoinFlipSim, runCrashSim, runWheelSim } from "./simulate";
import type { SimOptions, SimReport } from "./simulate";

const USAGE = "Example: npm run simulator -- crash --rounds 10000 --bet 100 --auto 20 [--seed demo]";

function main() {
  const [, , game, ...rest] = process.argv;
  if (!isGameName(game)) {
    console.error("Available games: wheel, coinflip, crash");
    console.error(USAGE);
    process.exit(1);
  }

  const args = parseArgs(rest);
  const options: SimOptions = {
    rounds: Number(args.rounds ?? 1000),
    bet: BigInt(args.bet ?? "100"),
    seed: args.seed,
  };

  console.log(JSON.stringify(run(game, options, args), null, 2));
}

function run(game: GameName, options: SimOptions, args: Record<string, string>): SimReport {
  switch (game) {
    case "wheel":
      return runWheelSim(options);
    case "coinflip":
      return runCoinFlipSim({ ...options, side: args.side === "tails" ? "tails" : "heads" });
    case "crash":
      return runCrashSim({ ...options, autoCashout: Number(args.auto ?? 20) });
  }
}

function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.replace(/^--/, "");
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

main();
