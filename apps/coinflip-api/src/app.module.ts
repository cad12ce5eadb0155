import { Module } from "@nestjs/common";
import { GameCoreModule } from "@wagerhouse/game-core";
import { CoinflipController } from "./coinflip.controller";
import { CoinflipService } from "./coinflip.service";

@Module({
  imports: [GameCoreModule.register({ game: "coinflip" })],
  controllers: [CoinflipController],
  providers: [CoinflipService],
})
export class AppModule {}
