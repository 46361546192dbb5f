// Web Crypto refuses requests above this size in a single call
const MAX_GET_RANDOM_VALUES_BYTES = 65536;

const DEFAULT_XORSHIFT_STATE = 0x9e3779b9;

export interface RandomSource {
  /**
   * Returns exactly `length` random bytes. Callers validate `length`.
   */
  randomBytes(length: number): Uint8Array;
}

export class CryptoRandomSource implements RandomSource {
  randomBytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    for (
      let offset = 0;
      offset < length;
      offset += MAX_GET_RANDOM_VALUES_BYTES
    ) {
      crypto.getRandomValues(
        out.subarray(offset, offset + MAX_GET_RANDOM_VALUES_BYTES)
      );
    }
    return out;
  }
}

/**
 * Deterministic xorshift32 stream. Meant for tests and reproducible
 * simulations only.
 */
export class SeededRandomSource implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // xorshift never leaves the all-zero state
    this.state = seed >>> 0 || DEFAULT_XORSHIFT_STATE;
  }

  private nextWord(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state;
  }

  randomBytes(length: number): Uint8Array {
    const out = new Uint8Array(length);
    let word = 0;
    for (let i = 0; i < length; i++) {
      if (i % 4 === 0) word = this.nextWord();
      out[i] = (word >>> ((i % 4) * 8)) & 0xff;
    }
    return out;
  }
}

/**
 * Holds a random source that is created on first use and shared afterwards.
 */
export class RandomSourceProvider {
  private source: RandomSource | null = null;

  constructor(private factory: () => RandomSource) {}

  get(): RandomSource {
    if (!this.source) {
      this.source = this.factory();
    }
    return this.source;
  }

  isInitialized(): boolean {
    return this.source !== null;
  }
}

export const processRandom = new RandomSourceProvider(
  () => new CryptoRandomSource()
);
