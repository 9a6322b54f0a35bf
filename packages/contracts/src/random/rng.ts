/**
 * Helpers that draw from any `() => number` source returning values in [0, 1).
 */

export type RandomSource = () => number;

/**
 * Random integer between min and max (inclusive)
 */
export function range(rng: RandomSource, min: number, max: number): number {
  return ~~(rng() * (max - min + 1)) + min;
}

/**
 * Uniform choice from an array; `undefined` only when the array is empty.
 */
export function choice<T>(rng: RandomSource, array: readonly [T, ...T[]]): T;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined;
export function choice<T>(rng: RandomSource, array: readonly T[]): T | undefined {
  if (array.length === 0) return undefined;
  return array[range(rng, 0, array.length - 1)];
}
