import { DigestFunction } from "./digest";
import { RandomSource } from "./random";

// Primitives a simulated module is built on
export interface CryptoProvider {
  digest: DigestFunction;
  random: RandomSource;
}
