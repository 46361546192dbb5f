import { vi } from "vitest";
import { SeededRandomSource } from "nsm-sim-crypto";
import { createSession } from "../src/session/factories";
import type { CreateSessionOptions } from "../src/session/factories";
import type { Session } from "../src/session/session";
import type { Logger } from "../src/session/types";

export const TEST_SEED = 1;
export const TEST_TIMESTAMP = 1_700_000_000_000;

export function createTestSession(
  options: CreateSessionOptions = {}
): Session {
  return createSession({
    random: new SeededRandomSource(TEST_SEED),
    now: () => TEST_TIMESTAMP,
    ...options
  });
}

export function text(value: string): Uint8Array {
  return new TextEncoder().encode(value);
}

export function bytesOf(length: number, fill: number): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

export function mockedLogger() {
  return {
    debug: vi.fn(),
    warn: vi.fn()
  } satisfies Logger;
}
