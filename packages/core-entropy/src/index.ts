import { createHash, randomBytes } from "crypto";

export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Ambient unpredictability the host environment offers at call time: a
 * per-block beacon, the previous block's hash and the caller's remaining
 * budget. None of it is attestable to third parties.
 */
export interface EntropyInputs {
  beacon(): Buffer;
  previousHash(): Buffer;
  remainingBudget(): bigint;
}

export interface EntropyState {
  /** 32-byte accumulator, hex encoded. */
  accumulator: string;
  nonces: Record<string, number>;
}

export interface IEntropySource {
  drawRaw(caller: string): bigint;
  /** Uniform integer in `[0, mod)`. */
  drawBounded(mod: bigint, caller: string): bigint;
  nonceOf(caller: string): number;
  snapshot(): EntropyState;
}

export const ENTROPY_INPUTS = Symbol("ENTROPY_INPUTS");

function word(value: bigint): Buffer {
  return Buffer.from(value.toString(16).padStart(64, "0"), "hex");
}

function text(value: string): Buffer {
  return Buffer.from(value, "utf-8");
}

function sha256(parts: Buffer[]): bigint {
  const hash = createHash("sha256");
  for (const part of parts) {
    hash.update(part);
  }
  return BigInt(`0x${hash.digest("hex")}`);
}

/** Largest multiple of `mod` not above MAX_UINT256; draws at or above it are discarded. */
export function rejectionLimit(mod: bigint): bigint {
  if (mod <= 0n) {
    throw new RangeError(`Modulus must be positive, got ${mod}`);
  }
  return MAX_UINT256 - (MAX_UINT256 % mod);
}

export function reduceUnbiased(draw: bigint, mod: bigint, rehash: (previous: bigint) => bigint): bigint {
  const limit = rejectionLimit(mod);
  let value = draw;
  while (value >= limit) {
    value = rehash(value);
  }
  return value % mod;
}

export class EntropySource implements IEntropySource {
  private accumulator: bigint;
  private readonly nonces: Map<string, number>;

  constructor(private readonly systemId: string, private readonly inputs: EntropyInputs, state?: EntropyState) {
    this.accumulator = state ? BigInt(`0x${state.accumulator}`) : 0n;
    this.nonces = new Map(Object.entries(state?.nonces ?? {}));
  }

  drawRaw(caller: string): bigint {
    const nonce = this.nonceOf(caller) + 1;
    this.nonces.set(caller, nonce);

    const draw = sha256([
      word(this.accumulator),
      this.inputs.beacon(),
      this.inputs.previousHash(),
      text(caller),
      text(this.systemId),
      word(BigInt(nonce)),
      word(this.inputs.remainingBudget()),
    ]);
    this.accumulator ^= draw;
    return draw;
  }

  drawBounded(mod: bigint, caller: string): bigint {
    rejectionLimit(mod);
    return reduceUnbiased(this.drawRaw(caller), mod, (previous) =>
      sha256([word(previous), this.inputs.previousHash(), text(caller), word(this.inputs.remainingBudget())])
    );
  }

  nonceOf(caller: string): number {
    return this.nonces.get(caller) ?? 0;
  }

  snapshot(): EntropyState {
    return {
      accumulator: this.accumulator.toString(16).padStart(64, "0"),
      nonces: Object.fromEntries(this.nonces),
    };
  }
}

/** OS entropy for the beacon, a hash chain of past beacons, and the high-resolution clock as budget salt. */
export class SystemEntropyInputs implements EntropyInputs {
  private lastBeacon: Buffer = randomBytes(32);

  beacon(): Buffer {
    this.lastBeacon = randomBytes(32);
    return this.lastBeacon;
  }

  previousHash(): Buffer {
    return createHash("sha256").update(this.lastBeacon).digest();
  }

  remainingBudget(): bigint {
    return process.hrtime.bigint();
  }
}

/** Reproducible inputs for simulations and tests. */
export class SeededEntropyInputs implements EntropyInputs {
  private counter = 0;

  constructor(private readonly seed: string) {}

  beacon(): Buffer {
    this.counter += 1;
    return createHash("sha256").update(`${this.seed}:beacon:${this.counter}`).digest();
  }

  previousHash(): Buffer {
    return createHash("sha256").update(`${this.seed}:block:${this.counter}`).digest();
  }

  remainingBudget(): bigint {
    return BigInt(this.counter);
  }
}
