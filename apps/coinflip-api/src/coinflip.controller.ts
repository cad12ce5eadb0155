import { Body, Controller, Inject, Post, UseGuards } from "@nestjs/common";
import { Auth, AuthGuard } from "@wagerhouse/core-auth";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { IdempotencyKey } from "@wagerhouse/core-idempotency";
import { TRANSFER_JOURNAL } from "@wagerhouse/core-ledger";
import type { ITransferJournal } from "@wagerhouse/core-ledger";
import { BankrollController, HOUSE_TABLE, validateBody } from "@wagerhouse/game-core";
import { CoinflipService } from "./coinflip.service";
import { CoinflipBetDto } from "./dto/coinflip-bet.dto";
import type { CoinflipBetResponse } from "./dto/coinflip-response.dto";

@Controller("coinflip")
@UseGuards(AuthGuard)
export class CoinflipController extends BankrollController {
  constructor(
    @Inject(HOUSE_TABLE) table: HouseTable,
    @Inject(TRANSFER_JOURNAL) journal: ITransferJournal,
    @Inject(CoinflipService) private readonly coinflipService: CoinflipService,
  ) {
    super(table, journal);
  }

  @Post("flip")
  flip(
    @Auth() ctx: AuthContext,
    @Body(validateBody(CoinflipBetDto)) dto: CoinflipBetDto,
    @IdempotencyKey() idempotencyKey: string,
  ): Promise<CoinflipBetResponse> {
    return this.coinflipService.flip(ctx, dto, idempotencyKey);
  }
}
