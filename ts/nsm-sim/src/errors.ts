import { CustomError } from "ts-custom-error";

export type NsmErrorKind =
  | "Closed"
  | "InvalidSlot"
  | "InvalidLength"
  | "Locked"
  | "CertMissing"
  | "NoMemory";

export type SlotStore = "pcr" | "certificate";

export abstract class NsmError extends CustomError {
  abstract readonly kind: NsmErrorKind;

  public constructor(message: string) {
    super(message);
  }
}

export class SessionClosedError extends NsmError {
  readonly kind = "Closed";

  public constructor() {
    super("NSM session is closed");
  }
}

export class InvalidSlotError extends NsmError {
  readonly kind = "InvalidSlot";

  public constructor(
    public readonly store: SlotStore,
    public readonly slot: number,
    public readonly slotCount: number
  ) {
    super(
      `${store === "pcr" ? "PCR" : "Certificate"} slot ${slot} is out of range (0..${slotCount - 1})`
    );
  }
}

export class InvalidLengthError extends NsmError {
  readonly kind = "InvalidLength";

  public constructor(message: string) {
    super(message);
  }
}

export class PcrLockedError extends NsmError {
  readonly kind = "Locked";

  public constructor(public readonly slot: number) {
    super(`PCR slot ${slot} is locked`);
  }
}

export class CertificateMissingError extends NsmError {
  readonly kind = "CertMissing";

  public constructor(public readonly slot: number) {
    super(`Certificate slot ${slot} is empty`);
  }
}

export class NoMemoryError extends NsmError {
  readonly kind = "NoMemory";

  public constructor(length: number) {
    super(`Unable to allocate ${length} bytes`);
  }
}

export class AttestationDecodeError extends CustomError {
  public constructor(message: string) {
    super(message);
  }
}

export function isNsmError(
  error: unknown,
  kind?: NsmErrorKind
): error is NsmError {
  return error instanceof NsmError && (kind === undefined || error.kind === kind);
}
