import { it, expect, describe, beforeEach } from "vitest";
import { sha256 } from "viem";
import { MixingDigest, Sha256Digest } from "nsm-sim-crypto";
import { AttestationAggregator } from "../../src/attestation/aggregator";
import { MeasurementBank } from "../../src/state/measurementBank";
import { flatUint8 } from "../../src/utils";
import { text } from "../helpers";

describe("AttestationAggregator", () => {
  const mixer = new MixingDigest();
  let bank: MeasurementBank;
  let aggregator: AttestationAggregator;

  beforeEach(() => {
    bank = new MeasurementBank(mixer);
    aggregator = new AttestationAggregator(bank, mixer);
  });

  it("digests a zeroed bank to the mixer seed bytes", () => {
    const digest = aggregator.attestationDigest();

    expect(digest.length).toBe(32);
    expect(digest[0]).toBe(0x42);
    expect(digest[1]).toBe(0x53);
    expect(digest[31]).toBe(0x51);
  });

  it("hashes the concatenated PCR values", () => {
    bank.extend(4, text("boot"));
    expect(aggregator.attestationDigest()).toEqual(
      mixer.digest(bank.concatenatedValues())
    );
  });

  it.each([0, 17, 31])("changes when slot %s is extended", (slot) => {
    const before = aggregator.attestationDigest();
    bank.extend(slot, text("boot"));
    expect(aggregator.attestationDigest()).not.toEqual(before);
  });

  it("ignores lock state", () => {
    const before = aggregator.attestationDigest();
    bank.lockRange(32);
    expect(aggregator.attestationDigest()).toEqual(before);
  });

  it("matches the attestation digest without extras", () => {
    bank.extend(2, text("app"));
    expect(aggregator.documentDigest([])).toEqual(
      aggregator.attestationDigest()
    );
  });

  it("appends extras after the PCR values", () => {
    const extras = [text("user"), text("nonce")];
    expect(aggregator.documentDigest(extras)).toEqual(
      mixer.digest(
        flatUint8([new Uint8Array(1024), text("user"), text("nonce")])
      )
    );
  });

  it("uses the configured digest", () => {
    const shaBank = new MeasurementBank(new Sha256Digest());
    const shaAggregator = new AttestationAggregator(
      shaBank,
      new Sha256Digest()
    );

    expect(shaAggregator.attestationDigest()).toEqual(
      sha256(new Uint8Array(1024), "bytes")
    );
  });
});
