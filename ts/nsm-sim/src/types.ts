import { DigestAlgorithm } from "nsm-sim-crypto";

export type PcrValue = {
  slot: number;
  digest: Uint8Array;
  locked: boolean;
};

export type CertificateChange = "set" | "removed";

export type ModuleDescription = {
  moduleId: string;
  digestAlgorithm: DigestAlgorithm;
  pcrSlots: number;
  certificateSlots: number;
  lockedPcrs: number[];
  /** number of occupied certificate slots */
  certificates: number;
};
