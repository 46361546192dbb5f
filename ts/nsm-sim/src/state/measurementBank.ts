import { DigestFunction } from "nsm-sim-crypto";
import { PCR_DIGEST_LENGTH, PCR_SLOTS } from "@/constants";
import {
  InvalidLengthError,
  InvalidSlotError,
  PcrLockedError
} from "@/errors";
import { allocateBytes, copyBytes, flatUint8 } from "@/utils";
import { PcrValue } from "@/types";

export function isSlotIndex(slot: number, slotCount: number): boolean {
  return Number.isInteger(slot) && slot >= 0 && slot < slotCount;
}

export function assertCount(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidLengthError(
      `${name} must be a non-negative integer, got ${value}`
    );
  }
}

/**
 * Fixed bank of PCR slots. Each slot starts zeroed and unlocked; a lock is
 * permanent for the life of the bank.
 */
export class MeasurementBank {
  private values: Uint8Array[];
  private locks: boolean[];

  constructor(private digestFunction: DigestFunction) {
    this.values = Array.from({ length: PCR_SLOTS }, () =>
      allocateBytes(PCR_DIGEST_LENGTH)
    );
    this.locks = new Array<boolean>(PCR_SLOTS).fill(false);
  }

  get digestAlgorithm() {
    return this.digestFunction.algorithm;
  }

  private validateSlot(slot: number): number {
    if (!isSlotIndex(slot, PCR_SLOTS)) {
      throw new InvalidSlotError("pcr", slot, PCR_SLOTS);
    }
    return slot;
  }

  /**
   * Returns a copy of the current value of a slot, locked or not
   */
  describe(slot: number): Uint8Array {
    return copyBytes(this.values[this.validateSlot(slot)]);
  }

  describeValue(slot: number): PcrValue {
    const index = this.validateSlot(slot);
    return {
      slot: index,
      digest: copyBytes(this.values[index]),
      locked: this.locks[index]
    };
  }

  isLocked(slot: number): boolean {
    return this.locks[this.validateSlot(slot)];
  }

  /**
   * Replaces the slot value with `digest(current || data)` and returns it.
   * The new value is computed in full before the slot is touched.
   */
  extend(slot: number, data: Uint8Array): Uint8Array {
    const index = this.validateSlot(slot);
    if (data.length === 0) {
      throw new InvalidLengthError("Data to extend must not be empty");
    }
    if (this.locks[index]) {
      throw new PcrLockedError(index);
    }
    const next = this.digestFunction.digest(
      flatUint8([this.values[index], data])
    );
    if (next.length !== PCR_DIGEST_LENGTH) {
      throw new Error(
        `Digest function returned ${next.length} bytes, expected ${PCR_DIGEST_LENGTH}`
      );
    }
    this.values[index] = copyBytes(next);
    return copyBytes(next);
  }

  lock(slot: number): void {
    this.locks[this.validateSlot(slot)] = true;
  }

  /**
   * Locks slots `0..min(limit, PCR_SLOTS) - 1`
   * @returns the slots covered by the range
   */
  lockRange(limit: number): number[] {
    assertCount(limit, "Lock range");
    const end = Math.min(limit, PCR_SLOTS);
    const slots: number[] = [];
    for (let slot = 0; slot < end; slot++) {
      this.locks[slot] = true;
      slots.push(slot);
    }
    return slots;
  }

  /**
   * One byte per requested slot: 1 when the slot exists and is locked,
   * 0 otherwise (including past the end of the bank).
   */
  lockedFlags(length: number): Uint8Array {
    assertCount(length, "Flag count");
    const flags = allocateBytes(length);
    const covered = Math.min(length, PCR_SLOTS);
    for (let slot = 0; slot < covered; slot++) {
      flags[slot] = this.locks[slot] ? 1 : 0;
    }
    return flags;
  }

  lockedSlots(): number[] {
    return this.locks.flatMap((locked, slot) => (locked ? [slot] : []));
  }

  // all slot values in index order, back to back
  concatenatedValues(): Uint8Array {
    return flatUint8(this.values);
  }

  allValues(): Map<number, Uint8Array> {
    const values = new Map<number, Uint8Array>();
    this.values.forEach((value, slot) => values.set(slot, copyBytes(value)));
    return values;
  }

  wipe(): void {
    for (const value of this.values) {
      value.fill(0);
    }
  }
}
