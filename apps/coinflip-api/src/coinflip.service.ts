import { Inject, Injectable } from "@nestjs/common";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { HOUSE_TABLE, HouseBetRunner } from "@wagerhouse/game-core";
import { CoinFlipMathEngine, sideToGuess } from "@wagerhouse/game-math-coinflip";
import type { CoinflipBetDto } from "./dto/coinflip-bet.dto";
import type { CoinflipBetResponse } from "./dto/coinflip-response.dto";

@Injectable()
export class CoinflipService {
  private readonly engine = new CoinFlipMathEngine();

  constructor(
    @Inject(HOUSE_TABLE) private readonly table: HouseTable,
    @Inject(HouseBetRunner) private readonly betRunner: HouseBetRunner,
  ) {}

  flip(ctx: AuthContext, dto: CoinflipBetDto, idempotencyKey: string): Promise<CoinflipBetResponse> {
    return this.betRunner.run({
      ctx,
      idempotencyKey,
      engine: this.engine,
      request: {
        betAmount: BigInt(dto.betAmount),
        transferAmount: BigInt(dto.transferAmount),
        input: { guess: sideToGuess(dto.side) },
      },
      toResponse: (outcome) => ({
        betAmount: outcome.betAmount.toString(),
        payoutAmount: outcome.payout.toString(),
        result: outcome.result,
        pickedSide: outcome.metadata.side,
        outcome: outcome.metadata.outcome,
        isWin: outcome.won,
        nonce: outcome.nonce,
        totalBet: outcome.stats.totalBet.toString(),
        globalTotalBet: this.table.globalTotalBet().toString(),
        createdAt: outcome.settledAt,
      }),
    });
  }
}
