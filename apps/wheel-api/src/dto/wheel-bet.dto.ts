import { IsString, Matches } from "class-validator";

export class WheelBetDto {
  @IsString()
  @Matches(/^(?!0+$)\d+$/, { message: "betAmount must be a positive integer string" })
  betAmount!: string;

  /** What the player actually sends with the spin; must equal betAmount. */
  @IsString()
  @Matches(/^\d+$/, { message: "transferAmount must be a non-negative integer string" })
  transferAmount!: string;
}
