import { MAX_ATTESTATION_FIELD_LENGTH } from "@/constants";
import { InvalidLengthError } from "@/errors";
import { CertificateStore } from "@/state/certificateStore";
import { MeasurementBank } from "@/state/measurementBank";
import { copyBytes } from "@/utils";
import { AttestationAggregator } from "./aggregator";
import { AttestationDocument, AttestationOptions } from "./types";

function validateField(
  name: string,
  value: Uint8Array | undefined
): Uint8Array | undefined {
  if (value === undefined) return undefined;
  if (value.length === 0) {
    throw new InvalidLengthError(`${name} must not be empty`);
  }
  if (value.length > MAX_ATTESTATION_FIELD_LENGTH) {
    throw new InvalidLengthError(
      `${name} must be at most ${MAX_ATTESTATION_FIELD_LENGTH} bytes, got ${value.length}`
    );
  }
  return copyBytes(value);
}

export function buildAttestationDocument(params: {
  moduleId: string;
  timestamp: number;
  bank: MeasurementBank;
  certificates: CertificateStore;
  aggregator: AttestationAggregator;
  options: AttestationOptions;
}): AttestationDocument {
  const { bank, certificates, aggregator, options } = params;
  const userData = validateField("userData", options.userData);
  const publicKey = validateField("publicKey", options.publicKey);
  const nonce = validateField("nonce", options.nonce);

  const extras = [userData, publicKey, nonce].filter(
    (field): field is Uint8Array => field !== undefined
  );
  const [first, ...rest] = certificates.occupied();

  return {
    moduleId: params.moduleId,
    timestamp: params.timestamp,
    digestAlgorithm: bank.digestAlgorithm,
    digest: aggregator.documentDigest(extras),
    pcrs: bank.allValues(),
    lockedPcrs: bank.lockedSlots(),
    certificate: first?.content,
    cabundle: rest.map(({ content }) => content),
    userData,
    publicKey,
    nonce
  };
}
