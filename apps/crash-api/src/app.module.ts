import { Module } from "@nestjs/common";
import { GAME_CONFIG_SERVICE } from "@wagerhouse/core-config";
import type { IGameConfigService } from "@wagerhouse/core-config";
import type { HouseTable } from "@wagerhouse/core-house";
import { LOGGER } from "@wagerhouse/core-logging";
import type { ILogger } from "@wagerhouse/core-logging";
import { GameCoreModule, HOUSE_TABLE } from "@wagerhouse/game-core";
import { systemClock } from "@wagerhouse/game-math-crash";
import type { Clock } from "@wagerhouse/game-math-crash";
import { CrashController } from "./crash.controller";
import { CRASH_CLOCK, CRASH_ROUNDS, openCrashRounds } from "./crash.rounds";
import { CrashService } from "./crash.service";

@Module({
  imports: [GameCoreModule.register({ game: "crash" })],
  controllers: [CrashController],
  providers: [
    CrashService,
    { provide: CRASH_CLOCK, useValue: systemClock },
    {
      provide: CRASH_ROUNDS,
      inject: [HOUSE_TABLE, GAME_CONFIG_SERVICE, CRASH_CLOCK, LOGGER],
      useFactory: (table: HouseTable, configService: IGameConfigService, clock: Clock, logger: ILogger) =>
        openCrashRounds(table, configService, clock, logger),
    },
  ],
})
export class AppModule {}
