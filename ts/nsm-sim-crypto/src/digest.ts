/**
 * Digest functions used for PCR extension and attestation aggregation.
 * Every implementation maps an arbitrary byte sequence to exactly
 * {@link DIGEST_LENGTH} bytes.
 */

import { sha256 } from "viem";
import { DigestAlgorithm } from "./types";

export const DIGEST_LENGTH = 32;

const MIXER_SEED = 0x42;
const MIXER_STRIDE = 17;

export interface DigestFunction {
  readonly algorithm: DigestAlgorithm;
  digest(data: Uint8Array): Uint8Array;
}

function rotateLeft5(value: number): number {
  return ((value << 5) | (value >> 3)) & 0xff;
}

/**
 * Placeholder mixer of the simulated module. Deterministic and sensitive to
 * both content and length of the input, but NOT collision-resistant.
 * Kept for byte compatibility with existing vectors; some extension orders
 * collide (single bytes `x` and `x ^ 0xff` commute), so sessions default to
 * {@link Sha256Digest}.
 *
 * Output byte `i` folds every input byte at position `i + 32k` into a
 * running value, then mixes in the low byte of the input length.
 */
export class MixingDigest implements DigestFunction {
  readonly algorithm = "mixer";

  digest(data: Uint8Array): Uint8Array {
    const out = new Uint8Array(DIGEST_LENGTH);
    const lengthByte = data.length & 0xff;
    for (let i = 0; i < DIGEST_LENGTH; i++) {
      let value = (MIXER_SEED + i * MIXER_STRIDE) & 0xff;
      for (let j = i; j < data.length; j += DIGEST_LENGTH) {
        value = rotateLeft5(value) ^ data[j];
      }
      out[i] = value ^ lengthByte;
    }
    return out;
  }
}

export class Sha256Digest implements DigestFunction {
  readonly algorithm = "sha256";

  digest(data: Uint8Array): Uint8Array {
    return sha256(data, "bytes");
  }
}

export function createDigestFunction(
  algorithm: DigestAlgorithm
): DigestFunction {
  switch (algorithm) {
    case "mixer":
      return new MixingDigest();
    case "sha256":
      return new Sha256Digest();
  }
}

export function digestsEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}
