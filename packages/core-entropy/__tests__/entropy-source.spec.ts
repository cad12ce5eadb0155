import { describe, expect, it } from "vitest";
import { EntropySource, MAX_UINT256, SeededEntropyInputs, reduceUnbiased, rejectionLimit } from "../src";

describe("EntropySource", () => {
  it("keeps bounded draws inside [0, mod)", () => {
    const source = new EntropySource("table", new SeededEntropyInputs("bounds"));
    for (let i = 0; i < 500; i++) {
      const value = source.drawBounded(10_000n, "player");
      expect(value).toBeGreaterThanOrEqual(0n);
      expect(value).toBeLessThan(10_000n);
    }
  });

  it("spreads bounded draws evenly across residues", () => {
    const source = new EntropySource("table", new SeededEntropyInputs("uniformity"));
    const mod = 7;
    const samples = 70_000;
    const counts = new Array<number>(mod).fill(0);
    for (let i = 0; i < samples; i++) {
      counts[Number(source.drawBounded(BigInt(mod), "player"))] += 1;
    }

    for (const count of counts) {
      const share = count / samples;
      expect(share).toBeLessThan((1 / mod) * 1.05);
      expect(share).toBeGreaterThan((1 / mod) * 0.95);
    }
  });

  it("increments the nonce per caller", () => {
    const source = new EntropySource("table", new SeededEntropyInputs("nonces"));
    source.drawRaw("alice");
    source.drawRaw("alice");
    source.drawBounded(2n, "bob");

    expect(source.nonceOf("alice")).toBe(2);
    expect(source.nonceOf("bob")).toBe(1);
    expect(source.nonceOf("carol")).toBe(0);
  });

  it("folds every draw into the accumulator", () => {
    const source = new EntropySource("table", new SeededEntropyInputs("accumulator"));
    const first = source.drawRaw("alice");
    expect(source.snapshot().accumulator).toBe(first.toString(16).padStart(64, "0"));

    const second = source.drawRaw("alice");
    expect(source.snapshot().accumulator).toBe((first ^ second).toString(16).padStart(64, "0"));
  });

  it("resumes from a snapshot", () => {
    const original = new EntropySource("table", new SeededEntropyInputs("resume"));
    original.drawRaw("alice");
    const state = original.snapshot();

    const a = new EntropySource("table", new SeededEntropyInputs("next"), state);
    const b = new EntropySource("table", new SeededEntropyInputs("next"), state);
    expect(a.drawRaw("alice")).toBe(b.drawRaw("alice"));
    expect(a.nonceOf("alice")).toBe(2);
  });

  it("separates draws by system id", () => {
    const a = new EntropySource("wheel", new SeededEntropyInputs("same"));
    const b = new EntropySource("crash", new SeededEntropyInputs("same"));
    expect(a.drawRaw("alice")).not.toBe(b.drawRaw("alice"));
  });

  it("rejects non-positive moduli", () => {
    const source = new EntropySource("table", new SeededEntropyInputs("mod"));
    expect(() => source.drawBounded(0n, "alice")).toThrow(RangeError);
    expect(source.nonceOf("alice")).toBe(0);
  });
});

describe("reduceUnbiased", () => {
  it("computes the largest multiple of the modulus as the limit", () => {
    expect(rejectionLimit(10n)).toBe(MAX_UINT256 - 5n);
    expect(rejectionLimit(1n)).toBe(MAX_UINT256);
    expect(rejectionLimit(10_000n) % 10_000n).toBe(0n);
  });

  it("accepts draws below the limit without rehashing", () => {
    let rehashes = 0;
    const value = reduceUnbiased(MAX_UINT256 - 6n, 10n, (previous) => {
      rehashes += 1;
      return previous;
    });
    expect(value).toBe(9n);
    expect(rehashes).toBe(0);
  });

  it("rehashes draws in the biased tail", () => {
    const seen: bigint[] = [];
    const value = reduceUnbiased(MAX_UINT256 - 5n, 10n, (previous) => {
      seen.push(previous);
      return seen.length === 1 ? MAX_UINT256 : 1234n;
    });
    expect(seen).toEqual([MAX_UINT256 - 5n, MAX_UINT256]);
    expect(value).toBe(4n);
  });
});
