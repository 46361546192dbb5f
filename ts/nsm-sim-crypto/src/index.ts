export type { CryptoProvider } from "./cryptoProvider";
export type { DigestFunction } from "./digest";
export {
  DIGEST_LENGTH,
  MixingDigest,
  Sha256Digest,
  createDigestFunction,
  digestsEqual
} from "./digest";
export type { RandomSource } from "./random";
export {
  CryptoRandomSource,
  SeededRandomSource,
  RandomSourceProvider,
  processRandom
} from "./random";
export type { DigestAlgorithm } from "./types";
export { digestAlgorithms } from "./types";
