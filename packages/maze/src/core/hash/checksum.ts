import type { ReadonlyMazeGrid } from "../grid";
import { FNV64Hasher } from "./fnv64";

/**
 * Bump when the hashed fields change.
 */
export const CHECKSUM_VERSION = 1;

/**
 * Digest of a maze's shape and wall layout, formatted `v{version}:{hash}`.
 * Search state is not included, so solving does not change it.
 */
export function mazeChecksum(grid: ReadonlyMazeGrid): string {
  const hash = new FNV64Hasher()
    .updateUint32(CHECKSUM_VERSION)
    .updateUint32(grid.rows)
    .updateUint32(grid.cols)
    .updateBytes(grid.wallSnapshot())
    .digest();
  return `v${CHECKSUM_VERSION}:${hash}`;
}
