import { it, expect, describe, beforeEach } from "vitest";
import { CertificateStore } from "../../src/state/certificateStore";
import {
  CertificateMissingError,
  InvalidLengthError,
  InvalidSlotError
} from "../../src/errors";
import { text } from "../helpers";

describe("CertificateStore", () => {
  let store: CertificateStore;

  beforeEach(() => {
    store = new CertificateStore();
  });

  it("starts with every slot empty", () => {
    for (let slot = 0; slot < 4; slot++) {
      expect(store.has(slot)).toBe(false);
      expect(() => store.describe(slot)).toThrow(CertificateMissingError);
    }
    expect(store.occupied()).toEqual([]);
  });

  it("stores an independent copy", () => {
    const payload = text("root-ca");
    store.set(0, payload);
    payload.fill(0);

    expect(store.describe(0)).toEqual(text("root-ca"));
  });

  it("returns copies on describe", () => {
    store.set(0, text("root-ca"));
    store.describe(0).fill(0);
    expect(store.describe(0)).toEqual(text("root-ca"));
  });

  it("replaces the previous content", () => {
    store.set(2, text("first"));
    store.set(2, text("second"));
    expect(store.describe(2)).toEqual(text("second"));
  });

  it("keeps the old content when the new payload is empty", () => {
    store.set(1, text("kept"));
    expect(() => store.set(1, new Uint8Array())).toThrow(InvalidLengthError);
    expect(store.describe(1)).toEqual(text("kept"));
  });

  it("removes content", () => {
    store.set(3, text("leaf"));
    store.remove(3);

    expect(store.has(3)).toBe(false);
    expect(() => store.describe(3)).toThrow("Certificate slot 3 is empty");
  });

  it("rejects removing an empty slot", () => {
    expect(() => store.remove(0)).toThrow(CertificateMissingError);
  });

  it.each([-1, 4, 0.5])("rejects slot %s", (slot) => {
    expect(() => store.set(slot, text("x"))).toThrow(InvalidSlotError);
    expect(() => store.describe(slot)).toThrow(InvalidSlotError);
    expect(() => store.remove(slot)).toThrow(InvalidSlotError);
  });

  it("checks the slot before the payload", () => {
    expect(() => store.set(4, new Uint8Array())).toThrow(
      "Certificate slot 4 is out of range (0..3)"
    );
  });

  it("lists occupied slots in order", () => {
    store.set(3, text("c"));
    store.set(1, text("a"));

    expect(store.occupied()).toEqual([
      { slot: 1, content: text("a") },
      { slot: 3, content: text("c") }
    ]);
  });

  it("counts occupied slots", () => {
    expect(store.count()).toBe(0);
    store.set(0, text("a"));
    store.set(3, text("b"));
    store.set(3, text("c"));
    expect(store.count()).toBe(2);
    store.remove(0);
    expect(store.count()).toBe(1);
  });

  it("clears every slot", () => {
    store.set(0, text("a"));
    store.set(2, text("b"));
    store.clear();
    expect(store.occupied()).toEqual([]);
  });
});
