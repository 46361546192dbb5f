import { DigestFunction } from "nsm-sim-crypto";
import { MeasurementBank } from "@/state/measurementBank";
import { flatUint8 } from "@/utils";

/**
 * Aggregates the measurement bank into a single digest. The result depends on
 * PCR values only; lock state and certificates do not contribute.
 */
export class AttestationAggregator {
  constructor(
    private bank: MeasurementBank,
    private digestFunction: DigestFunction
  ) {}

  attestationDigest(): Uint8Array {
    return this.digestFunction.digest(this.bank.concatenatedValues());
  }

  /**
   * Digest over the PCR values followed by `extras`, in order. With no
   * extras this equals `attestationDigest()`.
   */
  documentDigest(extras: Uint8Array[]): Uint8Array {
    return this.digestFunction.digest(
      flatUint8([this.bank.concatenatedValues(), ...extras])
    );
  }
}
