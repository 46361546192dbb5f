import { CertificateChange } from "@/types";

export type SessionOperation =
  | "randomBytes"
  | "describePcr"
  | "extendPcr"
  | "lockPcr"
  | "lockPcrs"
  | "lockedFlags"
  | "setCertificate"
  | "describeCertificate"
  | "removeCertificate"
  | "attestationDigest"
  | "getAttestation"
  | "describeModule";

export type Logger = Pick<Console, "debug" | "warn">;

/**
 * Observers of session events. Change callbacks run after the change is
 * applied; one that throws is reported through `Logger.warn` and does not
 * fail the operation.
 */
export interface SessionCallbacks {
  /**
   * Fired after a PCR slot has been extended.
   * @param slot - extended slot
   * @param value - new slot value
   */
  onPcrExtended?: (slot: number, value: Uint8Array) => unknown;
  /**
   * Fired after a lock request, with every slot the request covered.
   * Slots that were already locked are included.
   */
  onPcrsLocked?: (slots: number[]) => unknown;
  onCertificateChanged?: (slot: number, change: CertificateChange) => unknown;
  /**
   * Fired once, when the session transitions to closed.
   */
  onClosed?: (moduleId: string) => unknown;
  /**
   * Fired for every failed operation, before the error is thrown to the caller.
   */
  onError?: (error: unknown, operation: SessionOperation) => unknown;
}
