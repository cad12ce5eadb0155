import { Inject, Injectable } from "@nestjs/common";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { LOGGER } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";
import { METRICS } from "@wagerhouse/core-metrics";
import type { IMetrics } from "@wagerhouse/core-metrics";
import { HOUSE_TABLE, HouseBetRunner } from "@wagerhouse/game-core";
import { CrashMathEngine } from "@wagerhouse/game-math-crash";
import type { CrashRoundMachine } from "@wagerhouse/game-math-crash";
import { CRASH_ROUNDS } from "./crash.rounds";
import type { CrashBetDto } from "./dto/crash-bet.dto";
import type { CrashBetResponse, CrashCloseResponse, CrashRoundResponse } from "./dto/crash-response.dto";

@Injectable()
export class CrashService {
  private readonly engine: CrashMathEngine;

  constructor(
    @Inject(HOUSE_TABLE) private readonly table: HouseTable,
    @Inject(CRASH_ROUNDS) private readonly rounds: CrashRoundMachine,
    @Inject(HouseBetRunner) private readonly betRunner: HouseBetRunner,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(METRICS) private readonly metrics: IMetrics,
  ) {
    this.engine = new CrashMathEngine(rounds);
  }

  play(ctx: AuthContext, dto: CrashBetDto, idempotencyKey: string): Promise<CrashBetResponse> {
    return this.betRunner.run({
      ctx,
      idempotencyKey,
      engine: this.engine,
      request: {
        betAmount: BigInt(dto.betAmount),
        transferAmount: BigInt(dto.transferAmount),
        input: { autoCashout: dto.autoCashout },
      },
      toResponse: (outcome) => ({
        betAmount: outcome.betAmount.toString(),
        payout: outcome.payout.toString(),
        result: outcome.result,
        roundId: outcome.metadata.roundId,
        autoCashout: outcome.metadata.autoCashout,
        isWin: outcome.won,
        pendingPrize: this.table.pendingOf(ctx.userId).toString(),
        createdAt: outcome.settledAt,
      }),
    });
  }

  round(): CrashRoundResponse {
    const round = this.rounds.current();
    const phase = this.rounds.phase();
    return {
      roundId: round.roundId,
      startTime: round.startTime,
      bettingEndsAt: round.bettingEndsAt,
      phase,
      crashMultiplier: phase === "CLOSED" ? round.crashMultiplier : null,
    };
  }

  /** Anyone may open the next round once betting on the current one has ended. */
  async openNextRound(ctx: AuthContext): Promise<CrashRoundResponse> {
    await this.table.run("round.next", async () => {
      const round = this.rounds.openNextRound(this.table.entropy, ctx.userId);
      this.logger.info("crash.round.opened", {
        game: "crash",
        userId: ctx.userId,
        roundId: round.roundId,
        bettingEndsAt: round.bettingEndsAt,
      });
      this.metrics.increment("crash_rounds_opened_total", { game: "crash" });
    });
    return this.round();
  }

  async closeBetting(ctx: AuthContext): Promise<CrashCloseResponse> {
    const closed = await this.table.runOwnerAction(ctx.userId, "round.close", async () => {
      const wasOpen = this.rounds.forceCloseBetting();
      if (wasOpen) {
        this.logger.info("crash.betting.closed", { game: "crash", userId: ctx.userId, roundId: this.rounds.current().roundId });
      }
      return wasOpen;
    });
    return { closed, round: this.round() };
  }
}
