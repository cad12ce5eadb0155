import { Body, Controller, Get, Inject, Post, UseGuards } from "@nestjs/common";
import { Auth, AuthGuard } from "@wagerhouse/core-auth";
import type { AuthContext } from "@wagerhouse/core-auth";
import type { HouseTable } from "@wagerhouse/core-house";
import { IdempotencyKey } from "@wagerhouse/core-idempotency";
import { TRANSFER_JOURNAL } from "@wagerhouse/core-ledger";
import type { ITransferJournal } from "@wagerhouse/core-ledger";
import { BankrollController, HOUSE_TABLE, validateBody } from "@wagerhouse/game-core";
import { WheelBetDto } from "./dto/wheel-bet.dto";
import type { WheelBetResponse, WheelLastOutcomeResponse } from "./dto/wheel-response.dto";
import { WheelService } from "./wheel.service";

@Controller("wheel")
@UseGuards(AuthGuard)
export class WheelController extends BankrollController {
  constructor(
    @Inject(HOUSE_TABLE) table: HouseTable,
    @Inject(TRANSFER_JOURNAL) journal: ITransferJournal,
    @Inject(WheelService) private readonly wheelService: WheelService,
  ) {
    super(table, journal);
  }

  @Post("spin")
  spin(
    @Auth() ctx: AuthContext,
    @Body(validateBody(WheelBetDto)) dto: WheelBetDto,
    @IdempotencyKey() idempotencyKey: string,
  ): Promise<WheelBetResponse> {
    return this.wheelService.spin(ctx, dto, idempotencyKey);
  }

  @Get("last-outcome")
  lastOutcome(@Auth() ctx: AuthContext): { lastOutcome: WheelLastOutcomeResponse | null } {
    return { lastOutcome: this.wheelService.lastOutcome(ctx) };
  }
}
