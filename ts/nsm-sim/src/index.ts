export {
  Session,
  SerializedSession,
  createSession,
  destroySession
} from "@/session";
export type {
  CreateSessionOptions,
  Logger,
  SessionCallbacks,
  SessionOperation
} from "@/session";
export {
  PCR_SLOTS,
  PCR_DIGEST_LENGTH,
  CERTIFICATE_SLOTS,
  MODULE_ID_LENGTH,
  MAX_ATTESTATION_FIELD_LENGTH
} from "@/constants";
export {
  NsmError,
  SessionClosedError,
  InvalidSlotError,
  InvalidLengthError,
  PcrLockedError,
  CertificateMissingError,
  NoMemoryError,
  AttestationDecodeError,
  isNsmError
} from "@/errors";
export type { NsmErrorKind, SlotStore } from "@/errors";
export type { CertificateChange, ModuleDescription, PcrValue } from "@/types";
export type {
  AttestationDocument,
  AttestationOptions
} from "@/attestation/types";
export {
  encodeAttestationDocument,
  decodeAttestationDocument
} from "@/attestation/encoding";
export { sessionConfigSchema, sessionConfigFromEnv } from "@/config";
export type { SessionConfig, SessionConfigInput } from "@/config";
export { bytesFromText, flatUint8, hexToUint8, uint8ToHex } from "@/utils";
export {
  MixingDigest,
  Sha256Digest,
  SeededRandomSource,
  CryptoRandomSource
} from "nsm-sim-crypto";
export type { DigestFunction, RandomSource } from "nsm-sim-crypto";
