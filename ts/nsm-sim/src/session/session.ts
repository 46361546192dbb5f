import { RandomSource } from "nsm-sim-crypto";
import { AttestationAggregator } from "@/attestation/aggregator";
import { buildAttestationDocument } from "@/attestation/document";
import { AttestationDocument, AttestationOptions } from "@/attestation/types";
import { CERTIFICATE_SLOTS, PCR_SLOTS } from "@/constants";
import { InvalidLengthError, SessionClosedError } from "@/errors";
import { CertificateStore } from "@/state/certificateStore";
import { MeasurementBank } from "@/state/measurementBank";
import { ModuleDescription, PcrValue } from "@/types";
import { copyBytes, guardAllocation, uint8ToHex } from "@/utils";
import { handleSessionError } from "@/utils/errorHandler";
import { Logger, SessionCallbacks, SessionOperation } from "./types";

export type SessionComponents = {
  moduleId: string;
  bank: MeasurementBank;
  certificates: CertificateStore;
  aggregator: AttestationAggregator;
  random: RandomSource;
  now: () => number;
};

export class Session {
  private moduleId: string;
  private bank: MeasurementBank;
  private certificates: CertificateStore;
  private aggregator: AttestationAggregator;
  private random: RandomSource;
  private now: () => number;
  private closed = false;
  private destroyed = false;

  /**
   * Creates a new Session instance.
   * Please use the factory method `createSession` to create the instance. This constructor is not meant to be used directly.
   * @param {SessionComponents} components - state owned by the session
   * @param {SessionCallbacks} callbacks - callbacks for session events
   * @param {Logger} [logger] - debug sink; when absent nothing is logged except unexpected errors
   */
  constructor(
    components: SessionComponents,
    private callbacks: SessionCallbacks = {},
    private logger?: Logger
  ) {
    this.moduleId = components.moduleId;
    this.bank = components.bank;
    this.certificates = components.certificates;
    this.aggregator = components.aggregator;
    this.random = components.random;
    this.now = components.now;
  }

  private run<T>(operation: SessionOperation, action: () => T): T {
    try {
      if (this.closed) {
        throw new SessionClosedError();
      }
      return action();
    } catch (error) {
      handleSessionError(error, this.callbacks, operation, this.logger);
      throw error;
    }
  }

  /**
   * Fires an observer callback for a change that has already been applied.
   * A failing observer is reported as a warning and never fails the operation.
   */
  private notify(callback: keyof SessionCallbacks, fire: () => unknown) {
    const warn = (error: unknown) =>
      (this.logger ?? console).warn(
        `Session callback ${callback} failed:`,
        error
      );
    try {
      const result = fire();
      if (result instanceof Promise) {
        void result.catch(warn);
      }
    } catch (error) {
      warn(error);
    }
  }

  private debug(message: string) {
    this.logger?.debug(`[nsm-sim ${this.moduleId}] ${message}`);
  }

  /**
   * The module ID: 32 lowercase hex characters fixed at creation.
   * Available after close.
   */
  identity(): string {
    return this.moduleId;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Closes the session. Closing a closed session does nothing.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.debug("session closed");
    this.notify("onClosed", () => this.callbacks.onClosed?.(this.moduleId));
  }

  /**
   * Closes the session and wipes everything it owns. Later calls do nothing.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.close();
    this.bank.wipe();
    this.certificates.clear();
    this.destroyed = true;
    this.debug("session destroyed");
  }

  /**
   * @throws {InvalidLengthError} if `length` is not a positive integer
   * @throws {SessionClosedError} if the session is closed
   */
  randomBytes(length: number): Uint8Array {
    return this.run("randomBytes", () => {
      if (!Number.isSafeInteger(length) || length <= 0) {
        throw new InvalidLengthError(
          `Random length must be greater than zero, got ${length}`
        );
      }
      return guardAllocation(length, () => this.random.randomBytes(length));
    });
  }

  /**
   * Current value of a PCR slot, regardless of its lock state.
   * @throws {InvalidSlotError} if the slot is outside 0..31
   */
  describePcr(slot: number): Uint8Array {
    return this.run("describePcr", () => this.bank.describe(slot));
  }

  describePcrValue(slot: number): PcrValue {
    return this.run("describePcr", () => this.bank.describeValue(slot));
  }

  /**
   * Extends a PCR slot: `value = digest(value || data)`.
   * @returns the new slot value
   * @throws {InvalidSlotError} if the slot is outside 0..31
   * @throws {InvalidLengthError} if `data` is empty
   * @throws {PcrLockedError} if the slot is locked
   */
  extendPcr(slot: number, data: Uint8Array): Uint8Array {
    const value = this.run("extendPcr", () => this.bank.extend(slot, data));
    this.debug(`PCR${slot} extended to ${uint8ToHex(value)}`);
    this.notify("onPcrExtended", () =>
      this.callbacks.onPcrExtended?.(slot, copyBytes(value))
    );
    return value;
  }

  lockPcr(slot: number): void {
    this.run("lockPcr", () => this.bank.lock(slot));
    this.debug(`PCR${slot} locked`);
    this.notify("onPcrsLocked", () => this.callbacks.onPcrsLocked?.([slot]));
  }

  /**
   * Locks every slot below `min(limit, 32)`. A limit of zero locks nothing.
   */
  lockPcrs(limit: number): void {
    const slots = this.run("lockPcrs", () => this.bank.lockRange(limit));
    if (slots.length === 0) return;
    this.debug(`PCR0..PCR${slots.length - 1} locked`);
    this.notify("onPcrsLocked", () => this.callbacks.onPcrsLocked?.(slots));
  }

  lockedFlags(length: number): Uint8Array {
    return this.run("lockedFlags", () => this.bank.lockedFlags(length));
  }

  /**
   * @throws {InvalidSlotError} if the slot is outside 0..3
   * @throws {InvalidLengthError} if `data` is empty
   */
  setCertificate(slot: number, data: Uint8Array): void {
    this.run("setCertificate", () => this.certificates.set(slot, data));
    this.debug(`certificate slot ${slot} set (${data.length} bytes)`);
    this.notify("onCertificateChanged", () =>
      this.callbacks.onCertificateChanged?.(slot, "set")
    );
  }

  /**
   * @throws {CertificateMissingError} if the slot is empty
   */
  describeCertificate(slot: number): Uint8Array {
    return this.run("describeCertificate", () =>
      this.certificates.describe(slot)
    );
  }

  removeCertificate(slot: number): void {
    this.run("removeCertificate", () => this.certificates.remove(slot));
    this.debug(`certificate slot ${slot} removed`);
    this.notify("onCertificateChanged", () =>
      this.callbacks.onCertificateChanged?.(slot, "removed")
    );
  }

  /**
   * Digest over all 32 PCR values in slot order
   */
  attestationDigest(): Uint8Array {
    return this.run("attestationDigest", () =>
      this.aggregator.attestationDigest()
    );
  }

  /**
   * Builds an unsigned attestation document from the current state.
   * @throws {InvalidLengthError} if an optional field is empty or longer than 1024 bytes
   */
  getAttestation(options: AttestationOptions = {}): AttestationDocument {
    return this.run("getAttestation", () =>
      buildAttestationDocument({
        moduleId: this.moduleId,
        timestamp: this.now(),
        bank: this.bank,
        certificates: this.certificates,
        aggregator: this.aggregator,
        options
      })
    );
  }

  describeModule(): ModuleDescription {
    return this.run("describeModule", () => ({
      moduleId: this.moduleId,
      digestAlgorithm: this.bank.digestAlgorithm,
      pcrSlots: PCR_SLOTS,
      certificateSlots: CERTIFICATE_SLOTS,
      lockedPcrs: this.bank.lockedSlots(),
      certificates: this.certificates.count()
    }));
  }
}
