import { stringToBytes } from "viem";
import { NoMemoryError } from "@/errors";

export function flatUint8(arr: Uint8Array[]) {
  const out = allocateBytes(arr.reduce((acc, val) => acc + val.length, 0));
  let offset = 0;
  for (const chunk of arr) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/**
 * Runs an allocation of `length` bytes, surfacing failure as `NoMemoryError`
 * @throws {NoMemoryError} if the runtime cannot allocate the buffer
 */
export function guardAllocation<T>(length: number, allocate: () => T): T {
  try {
    return allocate();
  } catch (error) {
    if (error instanceof RangeError) {
      throw new NoMemoryError(length);
    }
    throw error;
  }
}

export function allocateBytes(length: number): Uint8Array {
  return guardAllocation(length, () => new Uint8Array(length));
}

export function copyBytes(bytes: Uint8Array): Uint8Array {
  const copy = allocateBytes(bytes.length);
  copy.set(bytes);
  return copy;
}

export function uint8ToHex(uint8: Uint8Array): string {
  return Array.from(uint8)
    .map((byte) => byte.toString(16).padStart(2, "0"))
    .join("");
}

export function hexToUint8(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error("Hex string must have an even length");
  }
  if (!/^[0-9a-fA-F]*$/.test(hex)) {
    throw new Error("Hex string contains non-hex characters");
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return bytes;
}

/**
 * UTF-8 encodes a string payload, e.g. a measurement label
 */
export function bytesFromText(text: string): Uint8Array {
  return stringToBytes(text);
}
