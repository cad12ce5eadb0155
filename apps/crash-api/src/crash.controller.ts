import { Body, Controller, Get, Inject, Post, UseGuards } from "@nestjs/common";
import { Auth, AuthGuard } from "@wagerhouse/core-auth";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { IdempotencyKey } from "@wagerhouse/core-idempotency";
import { TRANSFER_JOURNAL } from "@wagerhouse/core-ledger";
import type { ITransferJournal } from "@wagerhouse/core-ledger";
import { BankrollController, HOUSE_TABLE, validateBody } from "@wagerhouse/game-core";
import { CrashService } from "./crash.service";
import { CrashBetDto } from "./dto/crash-bet.dto";
import type { CrashBetResponse, CrashCloseResponse, CrashRoundResponse } from "./dto/crash-response.dto";

@Controller("crash")
@UseGuards(AuthGuard)
export class CrashController extends BankrollController {
  constructor(
    @Inject(HOUSE_TABLE) table: HouseTable,
    @Inject(TRANSFER_JOURNAL) journal: ITransferJournal,
    @Inject(CrashService) private readonly crashService: CrashService,
  ) {
    super(table, journal);
  }

  @Post("play")
  play(
    @Auth() ctx: AuthContext,
    @Body(validateBody(CrashBetDto)) dto: CrashBetDto,
    @IdempotencyKey() idempotencyKey: string,
  ): Promise<CrashBetResponse> {
    return this.crashService.play(ctx, dto, idempotencyKey);
  }

  @Get("round")
  round(): CrashRoundResponse {
    return this.crashService.round();
  }

  @Post("rounds/next")
  openNextRound(@Auth() ctx: AuthContext): Promise<CrashRoundResponse> {
    return this.crashService.openNextRound(ctx);
  }

  @Post("rounds/close")
  closeBetting(@Auth() ctx: AuthContext): Promise<CrashCloseResponse> {
    return this.crashService.closeBetting(ctx);
  }
}
