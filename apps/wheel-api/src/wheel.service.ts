import { Inject, Injectable } from "@nestjs/common";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { HOUSE_TABLE, HouseBetRunner } from "@wagerhouse/game-core";
import { WheelMathEngine } from "@wagerhouse/game-math-wheel";
import type { WheelBetDto } from "./dto/wheel-bet.dto";
import type { WheelBetResponse, WheelLastOutcomeResponse } from "./dto/wheel-response.dto";

@Injectable()
export class WheelService {
  private readonly engine = new WheelMathEngine();

  constructor(
    @Inject(HOUSE_TABLE) private readonly table: HouseTable,
    @Inject(HouseBetRunner) private readonly betRunner: HouseBetRunner,
  ) {}

  spin(ctx: AuthContext, dto: WheelBetDto, idempotencyKey: string): Promise<WheelBetResponse> {
    return this.betRunner.run({
      ctx,
      idempotencyKey,
      engine: this.engine,
      request: {
        betAmount: BigInt(dto.betAmount),
        transferAmount: BigInt(dto.transferAmount),
        input: undefined,
      },
      toResponse: (outcome) => ({
        betAmount: outcome.betAmount.toString(),
        payout: outcome.payout.toString(),
        result: outcome.result,
        outcomeIndex: outcome.metadata.outcomeIndex,
        multiplierTenths: outcome.metadata.multiplierTenths,
        nonce: outcome.nonce,
        pendingPrize: this.table.pendingOf(ctx.userId).toString(),
        createdAt: outcome.settledAt,
      }),
    });
  }

  lastOutcome(ctx: AuthContext): WheelLastOutcomeResponse | null {
    const last = this.table.lastOutcome(ctx.userId);
    if (!last) return null;
    return {
      outcomeIndex: last.outcomeIndex,
      multiplierTenths: last.multiplierTenths,
      won: last.won,
      payout: last.payout.toString(),
      nonce: last.nonce,
    };
  }
}
