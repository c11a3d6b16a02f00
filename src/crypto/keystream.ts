/**
 * LCG multiplier (glibc rand constants)
 */
export const LCG_MULTIPLIER = 1103515245n;

/**
 * LCG increment
 */
export const LCG_INCREMENT = 12345n;

const LCG_MASK = (1n << 32n) - 1n;

/**
 * Deterministic byte generator seeded from the shared secret.
 *
 * Each step computes `state = (A * state + C) mod 2^32` and emits the low
 * eight bits of the new state. One instance exists per direction of a
 * connection and is advanced exactly once per byte sent or received in that
 * direction. Instances cannot be reseeded.
 */
export class KeystreamGenerator {
  private current: bigint;
  private emitted = 0;

  constructor(seed: bigint) {
    if (seed < 0n) {
      throw new RangeError('Keystream seed must be non-negative');
    }
    this.current = seed;
  }

  /**
   * Advance one step and return the next keystream byte
   */
  next(): number {
    this.current = (LCG_MULTIPLIER * this.current + LCG_INCREMENT) & LCG_MASK;
    this.emitted++;
    return Number(this.current & 0xffn);
  }

  /**
   * Return the next `count` keystream bytes
   */
  take(count: number): Uint8Array {
    const out = new Uint8Array(count);
    for (let i = 0; i < count; i++) {
      out[i] = this.next();
    }
    return out;
  }

  /** Bytes emitted so far */
  get position(): number {
    return this.emitted;
  }

  /** Current internal state (before the seed's first step, the seed itself) */
  get state(): bigint {
    return this.current;
  }
}

/**
 * Keystream bytes from a throwaway generator, for transcript display only
 */
export function previewKeystream(seed: bigint, count: number): Uint8Array {
  return new KeystreamGenerator(seed).take(count);
}
