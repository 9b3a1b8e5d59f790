/**
 * Seeded pseudo-random source owned by the job runner.
 *
 * Nothing in the signal pipeline draws from it today; it exists so that any
 * randomized step added later is reproducible from the configured seed.
 */
export class RandomState {
  private state: number;

  constructor(readonly seed: number) {
    if (!Number.isSafeInteger(seed)) {
      throw new RangeError(`RandomState seed must be a safe integer, got ${seed}`);
    }
    // mulberry32 works on 32-bit state.
    this.state = seed >>> 0;
  }

  /** Uniform float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Uniform integer in [min, max). */
  nextInt(min: number, max: number): number {
    if (!Number.isInteger(min) || !Number.isInteger(max) || max <= min) {
      throw new RangeError(`Invalid integer range [${min}, ${max})`);
    }
    return min + Math.floor(this.next() * (max - min));
  }
}
