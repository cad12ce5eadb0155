import { calculateRTP, runCoinFlipSim, runCrashSim, runWheelSim } from "../src/simulate";

const ROUNDS = 20_000;

describe("simulator", () => {
  it("computes RTP as a percentage with two decimals", () => {
    expect(calculateRTP(9_850n, 10_000n)).toBe(98.5);
    expect(calculateRTP(0n, 0n)).toBe(0);
  });

  it("lands wheel segments at their weights", () => {
    const report = runWheelSim({ rounds: ROUNDS, bet: 100n, seed: "wheel-sim" });
    const share = (index: number) => (report.frequencies[String(index)] ?? 0) / ROUNDS;

    expect(share(0)).toBeCloseTo(0.19, 1);
    expect(share(2)).toBeCloseTo(0.22, 1);
    expect(share(3)).toBeCloseTo(0.21, 1);
    expect(share(6)).toBeGreaterThan(0.02);
    expect(share(6)).toBeLessThan(0.04);
    // Expected return of the paying table is 1.65x.
    expect(report.rtp).toBeGreaterThan(160);
    expect(report.rtp).toBeLessThan(170);
  });

  it("returns the stake on average for an even-money flip", () => {
    const report = runCoinFlipSim({ rounds: ROUNDS, bet: 100n, seed: "flip-sim", side: "tails" });

    expect(report.rtp).toBeGreaterThan(97);
    expect(report.rtp).toBeLessThan(103);
    expect((report.frequencies.heads ?? 0) + (report.frequencies.tails ?? 0)).toBe(ROUNDS);
  });

  it("keeps the crash edge at a 2.0x cash-out", () => {
    const report = runCrashSim({ rounds: ROUNDS, bet: 100n, seed: "crash-sim", autoCashout: 20 });

    expect(report.winRate).toBeGreaterThan(0.48);
    expect(report.winRate).toBeLessThan(0.52);
    expect(report.rtp).toBeGreaterThan(95);
    expect(report.rtp).toBeLessThan(101);
  });

  it("rejects an auto cash-out the game does not offer", () => {
    expect(() => runCrashSim({ rounds: 1, bet: 100n, autoCashout: 400 })).toThrow("Auto cash-out must be between 11 and 300 tenths");
  });
});
