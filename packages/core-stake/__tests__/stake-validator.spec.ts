import { describe, expect, it } from "vitest";
import { HouseErrorCode } from "@wagerhouse/core-errors";
import { StakeValidator } from "../src";

const limits = { minBet: 1000n, maxBet: 5000n };

describe("StakeValidator", () => {
  const validator = new StakeValidator();

  it("accepts stakes on both bounds", () => {
    expect(() => validator.validate(1000n, 1000n, limits)).not.toThrow();
    expect(() => validator.validate(5000n, 5000n, limits)).not.toThrow();
  });

  it("rejects stakes outside the bounds", () => {
    expect(() => validator.validate(999n, 999n, limits)).toThrow(expect.objectContaining({ code: HouseErrorCode.INVALID_BET }));
    expect(() => validator.validate(5001n, 5001n, limits)).toThrow(expect.objectContaining({ code: HouseErrorCode.INVALID_BET }));
  });

  it("rejects a transfer that differs from the stake", () => {
    expect(() => validator.validate(2000n, 1999n, limits)).toThrow("Transferred amount does not match the bet");
  });

  it("requires the bankroll to cover the worst case", () => {
    expect(() => validator.ensureSolvent(3000n, 3000n)).not.toThrow();
    expect(() => validator.ensureSolvent(3001n, 3000n)).toThrow(
      expect.objectContaining({ code: HouseErrorCode.INSUFFICIENT_BANKROLL })
    );
  });
});
