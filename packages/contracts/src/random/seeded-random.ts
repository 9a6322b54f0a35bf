import { choice, range } from "./rng";

/**
 * Deterministic PRNG (xoshiro128++) used for maze carving.
 *
 * Two instances built from the same seed yield the same sequence, which is
 * what makes a maze reproducible from its seed alone.
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * SplitMix32 expands one 32-bit seed into well-diffused state words.
 */
function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

export type RngState = [number, number, number, number];

const WARM_UP_ROUNDS = 8;

export class SeededRandom {
  readonly seed: number;
  private s: RngState;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    const mix = splitmix32(this.seed);
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    for (let i = 0; i < WARM_UP_ROUNDS; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;
    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    return this.next32() / 0x100000000;
  }

  range(min: number, max: number): number {
    return range(() => this.next(), min, max);
  }

  choice<T>(array: readonly [T, ...T[]]): T;
  choice<T>(array: readonly T[]): T | undefined;
  choice<T>(array: readonly T[]): T | undefined {
    return choice(() => this.next(), array);
  }

  /**
   * Bind `next` as a plain function for APIs that take a `RandomSource`.
   */
  asSource(): () => number {
    return () => this.next();
  }

  getState(): RngState {
    const [a, b, c, d] = this.s;
    return [a, b, c, d];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}
