import { SeededRandom } from "./seeded-random";

interface CryptoLike {
  getRandomValues?: (array: Uint32Array) => Uint32Array;
}

let fallbackCounter = 0;

function fallbackUint32(): number {
  fallbackCounter = (fallbackCounter + 0x9e3779b9) >>> 0;
  const rng = new SeededRandom((Date.now() ^ fallbackCounter) >>> 0);
  return Math.floor(rng.next() * 0x100000000) >>> 0;
}

/**
 * Unsigned 32-bit integer for seeding a maze when the caller supplies none.
 *
 * Uses Web Crypto when the runtime exposes it.
 */
export function randomUint32(): number {
  const cryptoLike = (globalThis as { crypto?: CryptoLike }).crypto;

  if (cryptoLike?.getRandomValues) {
    const buffer = new Uint32Array(1);
    cryptoLike.getRandomValues(buffer);
    const value = buffer[0];
    if (value !== undefined) return value >>> 0;
  }

  return fallbackUint32();
}
