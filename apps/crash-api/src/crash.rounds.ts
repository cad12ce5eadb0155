import type { IGameConfigService } from "@wagerhouse/core-config";
import type { HouseTable } from "@wagerhouse/core-house";
import type { ILogger } from "@wagerhouse/core-logging";
import { CrashRoundMachine } from "@wagerhouse/game-math-crash";
import type { Clock } from "@wagerhouse/game-math-crash";

export const CRASH_CLOCK = Symbol("CRASH_CLOCK");
export const CRASH_ROUNDS = Symbol("CRASH_ROUNDS");

/** Checkpoint slot the round machine is saved under. */
export const ROUND_EXTENSION = "round";

/**
 * Resumes the round from the table's last checkpoint, or opens round 1 on the
 * owner's behalf when there is none.
 */
export async function openCrashRounds(
  table: HouseTable,
  configService: IGameConfigService,
  clock: Clock,
  logger: ILogger,
): Promise<CrashRoundMachine> {
  const { bettingWindowSeconds, ownerId } = configService.getConfig("crash");

  const resumed = CrashRoundMachine.resume(table.savedExtension(ROUND_EXTENSION), bettingWindowSeconds, clock);
  if (resumed) {
    table.attach(ROUND_EXTENSION, resumed);
    logger.info("crash.round.resumed", { game: "crash", roundId: resumed.current().roundId, phase: resumed.phase() });
    return resumed;
  }

  return table.run("round.start", async () => {
    const machine = CrashRoundMachine.start(table.entropy, ownerId, bettingWindowSeconds, clock);
    table.attach(ROUND_EXTENSION, machine);
    const round = machine.current();
    logger.info("crash.round.opened", { game: "crash", roundId: round.roundId, bettingEndsAt: round.bettingEndsAt });
    return machine;
  });
}
