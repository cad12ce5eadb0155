import { describe, expect, it } from "vitest";
import { EntropySource, SeededEntropyInputs } from "@wagerhouse/core-entropy";
import { WHEEL_SEGMENTS, WheelMathEngine, pickSegment } from "../src";
import { ScriptedEntropy } from "../../../apps/test-utils/test-helpers";

const engine = new WheelMathEngine();

const spin = (draw: number, betAmount = 1000n) =>
  engine.resolve({ caller: "player", betAmount, input: undefined, entropy: new ScriptedEntropy([draw]), available: 1_000_000n });

describe("WheelMathEngine", () => {
  it("assigns each boundary draw to the segment that starts there", () => {
    const cases: Array<[number, number]> = [
      [0, 0],
      [1899, 0],
      [1900, 1],
      [3799, 1],
      [3800, 2],
      [5999, 2],
      [6000, 3],
      [8099, 3],
      [8100, 4],
      [9099, 4],
      [9100, 5],
      [9699, 5],
      [9700, 6],
      [9999, 6],
    ];
    for (const [draw, index] of cases) {
      expect(pickSegment(BigInt(draw)).index).toBe(index);
    }
  });

  it("rejects draws past the table", () => {
    expect(() => pickSegment(10_000n)).toThrow(RangeError);
  });

  it("pays the multiplier in tenths, truncating", () => {
    expect(spin(4000).payout).toBe(1500n);
    expect(spin(4000, 3n).payout).toBe(4n);
    expect(spin(9800).payout).toBe(10_000n);
    expect(spin(7000).metadata).toEqual({ outcomeIndex: 3, multiplierTenths: 20, draw: 7000 });
  });

  it("reports zero-multiplier segments as losses", () => {
    const result = spin(100);
    expect(result.won).toBe(false);
    expect(result.payout).toBe(0n);
    expect(result.outcomeIndex).toBe(0);
  });

  it("sizes the worst case at ten times the stake", () => {
    expect(engine.worstCasePayout(1000n)).toBe(10_000n);
  });

  it("refuses a table that does not sum to 10000", () => {
    expect(() => new WheelMathEngine(WHEEL_SEGMENTS.slice(1))).toThrow("Wheel weights must sum to 10000, got 8100");
  });

  it("hits each segment in proportion to its weight", () => {
    const entropy = new EntropySource("wheel", new SeededEntropyInputs("wheel"));
    const samples = 50_000;
    const counts = new Array<number>(WHEEL_SEGMENTS.length).fill(0);
    for (let i = 0; i < samples; i++) {
      const result = engine.resolve({ caller: "player", betAmount: 10n, input: undefined, entropy, available: 1_000_000n });
      counts[result.outcomeIndex ?? -1] += 1;
    }
    WHEEL_SEGMENTS.forEach((segment, index) => {
      expect(Math.abs(counts[index] / samples - segment.weight / 10_000)).toBeLessThan(0.01);
    });
  });
});
