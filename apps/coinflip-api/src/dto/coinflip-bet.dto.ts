import { IsIn, IsString, Matches } from "class-validator";
import type { CoinFlipSide } from "@wagerhouse/game-math-coinflip";

export class CoinflipBetDto {
  @IsString()
  @Matches(/^(?!0+$)\d+$/, { message: "betAmount must be a positive integer string" })
  betAmount!: string;

  @IsString()
  @Matches(/^\d+$/, { message: "transferAmount must be a non-negative integer string" })
  transferAmount!: string;

  @IsIn(["heads", "tails"], { message: "side must be 'heads' or 'tails'" })
  side!: CoinFlipSide;
}
