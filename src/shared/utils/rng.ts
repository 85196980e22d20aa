/**
 * Seedable pseudo-random number generator (xorshift128+).
 *
 * Session-level dice rolls (engine draw acceptance, whether a turn gets
 * commentary) go through this so a seeded session replays identically.
 */
export class SeededRNG {
  private s0: number;
  private s1: number;
  private s2: number;
  private s3: number;

  constructor(public readonly seed: number) {
    this.s0 = this.splitmix32(seed);
    this.s1 = this.splitmix32(this.s0);
    this.s2 = this.splitmix32(this.s1);
    this.s3 = this.splitmix32(this.s2);
  }

  private splitmix32(a: number): number {
    a |= 0;
    a = (a + 0x9e3779b9) | 0;
    let t = a ^ (a >>> 16);
    t = Math.imul(t, 0x21f0aaad);
    t = t ^ (t >>> 15);
    t = Math.imul(t, 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  }

  /**
   * Returns next random number in [0, 1)
   */
  next(): number {
    const t = this.s1 ^ (this.s1 << 23);
    this.s1 = this.s0;
    this.s0 = this.s3;
    this.s3 = this.s2;
    this.s2 = t ^ this.s0 ^ (this.s1 >>> 26) ^ (this.s0 >>> 5);
    return ((this.s0 + this.s2) >>> 0) / 0x100000000;
  }

  /**
   * True with the given probability. 0 never fires, 1 always does.
   */
  chance(probability: number): boolean {
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.next() < probability;
  }
}

/**
 * Generates a random seed for sessions started without one.
 */
export function generateSessionSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}
