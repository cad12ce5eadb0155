import { IsInt, IsString, Matches } from "class-validator";

export class CrashBetDto {
  @IsString()
  @Matches(/^(?!0+$)\d+$/, { message: "betAmount must be a positive integer string" })
  betAmount!: string;

  @IsString()
  @Matches(/^\d+$/, { message: "transferAmount must be a non-negative integer string" })
  transferAmount!: string;

  /** Tenths of a multiplier: 150 cashes out at 15.0x. */
  @IsInt({ message: "autoCashout must be an integer number of tenths" })
  autoCashout!: number;
}
