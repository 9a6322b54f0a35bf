export { CHECKSUM_VERSION, mazeChecksum } from "./checksum";
export { FNV64Hasher, fnv64Hash } from "./fnv64";
