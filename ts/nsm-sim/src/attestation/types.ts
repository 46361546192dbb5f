import { DigestAlgorithm } from "nsm-sim-crypto";

/**
 * Attestation document produced by the simulated module, shaped after the
 * AWS Nitro attestation document. Nothing in it is signed.
 */
export type AttestationDocument = {
  /** identity of the issuing session */
  moduleId: string;
  /** creation time, in milliseconds since UNIX epoch */
  timestamp: number;
  /** the digest function used for the register values and `digest` */
  digestAlgorithm: DigestAlgorithm;
  /** digest over all PCR values followed by the optional fields below */
  digest: Uint8Array;
  /** all PCR values, by slot */
  pcrs: Map<number, Uint8Array>;
  lockedPcrs: number[];
  /** content of the first occupied certificate slot */
  certificate?: Uint8Array;
  /** remaining occupied certificate slots, in slot order */
  cabundle: Uint8Array[];
  userData?: Uint8Array;
  publicKey?: Uint8Array;
  nonce?: Uint8Array;
};

export type AttestationOptions = {
  userData?: Uint8Array;
  publicKey?: Uint8Array;
  nonce?: Uint8Array;
};
