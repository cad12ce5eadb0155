import { Module } from "@nestjs/common";
import { GameCoreModule } from "@wagerhouse/game-core";
import { WheelController } from "./wheel.controller";
import { WheelService } from "./wheel.service";

@Module({
  imports: [GameCoreModule.register({ game: "wheel" })],
  controllers: [WheelController],
  providers: [WheelService],
})
export class AppModule {}
