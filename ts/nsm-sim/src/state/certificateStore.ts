import { CERTIFICATE_SLOTS } from "@/constants";
import {
  CertificateMissingError,
  InvalidLengthError,
  InvalidSlotError
} from "@/errors";
import { copyBytes } from "@/utils";
import { isSlotIndex } from "./measurementBank";

/**
 * Fixed set of certificate slots holding opaque blobs
 */
export class CertificateStore {
  private slots: (Uint8Array | null)[] = new Array<Uint8Array | null>(
    CERTIFICATE_SLOTS
  ).fill(null);

  private validateSlot(slot: number): number {
    if (!isSlotIndex(slot, CERTIFICATE_SLOTS)) {
      throw new InvalidSlotError("certificate", slot, CERTIFICATE_SLOTS);
    }
    return slot;
  }

  /**
   * Replaces the slot content. The copy is made before the old blob is dropped.
   */
  set(slot: number, data: Uint8Array): void {
    const index = this.validateSlot(slot);
    if (data.length === 0) {
      throw new InvalidLengthError("Certificate payload must not be empty");
    }
    const copy = copyBytes(data);
    this.slots[index]?.fill(0);
    this.slots[index] = copy;
  }

  describe(slot: number): Uint8Array {
    const index = this.validateSlot(slot);
    const content = this.slots[index];
    if (!content) {
      throw new CertificateMissingError(index);
    }
    return copyBytes(content);
  }

  remove(slot: number): void {
    const index = this.validateSlot(slot);
    const content = this.slots[index];
    if (!content) {
      throw new CertificateMissingError(index);
    }
    content.fill(0);
    this.slots[index] = null;
  }

  has(slot: number): boolean {
    return this.slots[this.validateSlot(slot)] !== null;
  }

  count(): number {
    return this.slots.filter((content) => content !== null).length;
  }

  /**
   * Copies of occupied slots, in slot order
   */
  occupied(): { slot: number; content: Uint8Array }[] {
    return this.slots.flatMap((content, slot) =>
      content ? [{ slot, content: copyBytes(content) }] : []
    );
  }

  clear(): void {
    for (const content of this.slots) {
      content?.fill(0);
    }
    this.slots.fill(null);
  }
}
