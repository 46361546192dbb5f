/**
 * CBOR encoding of attestation documents, using the Nitro field names
 */

import * as cbor from "cbor";
import { z } from "zod";
import { digestAlgorithms } from "nsm-sim-crypto";
import { PCR_DIGEST_LENGTH, PCR_SLOTS } from "@/constants";
import { AttestationDecodeError } from "@/errors";
import { AttestationDocument } from "./types";

const bytesSchema = z
  .instanceof(Uint8Array)
  .transform((bytes) => new Uint8Array(bytes));

const optionalBytesSchema = bytesSchema
  .nullable()
  .transform((bytes) => bytes ?? undefined);

const digestSchema = bytesSchema.refine(
  (bytes) => bytes.length === PCR_DIGEST_LENGTH,
  { message: `Digest must be ${PCR_DIGEST_LENGTH} bytes` }
);

const slotSchema = z
  .number()
  .int()
  .min(0)
  .max(PCR_SLOTS - 1);

// node-cbor hands back integers above 2^53 as bigint; those do not fit a
// millisecond timestamp without losing precision
const timestampSchema = z
  .union([
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
    z.bigint().nonnegative().lte(BigInt(Number.MAX_SAFE_INTEGER))
  ])
  .transform((value) => Number(value));

const encodedDocumentSchema = z.object({
  module_id: z.string().min(1),
  timestamp: timestampSchema,
  digest_algorithm: z.enum(digestAlgorithms),
  digest: digestSchema,
  pcrs: z.map(slotSchema, digestSchema),
  locked_pcrs: z.array(slotSchema),
  certificate: optionalBytesSchema,
  cabundle: z.array(bytesSchema),
  user_data: optionalBytesSchema,
  public_key: optionalBytesSchema,
  nonce: optionalBytesSchema
});

function toBuffer(bytes: Uint8Array | undefined): Buffer | null {
  return bytes === undefined ? null : Buffer.from(bytes);
}

/**
 * Encodes a document as a CBOR map. Byte fields become CBOR byte strings,
 * absent optional fields become `null`.
 */
export function encodeAttestationDocument(doc: AttestationDocument): Uint8Array {
  const pcrs = new Map<number, Buffer>();
  for (const [slot, value] of doc.pcrs) {
    pcrs.set(slot, Buffer.from(value));
  }

  const encoded = cbor.encode({
    module_id: doc.moduleId,
    timestamp: doc.timestamp,
    digest_algorithm: doc.digestAlgorithm,
    digest: Buffer.from(doc.digest),
    pcrs,
    locked_pcrs: doc.lockedPcrs,
    certificate: toBuffer(doc.certificate),
    cabundle: doc.cabundle.map((cert) => Buffer.from(cert)),
    user_data: toBuffer(doc.userData),
    public_key: toBuffer(doc.publicKey),
    nonce: toBuffer(doc.nonce)
  });
  return new Uint8Array(encoded);
}

/**
 * @throws {AttestationDecodeError} if the bytes are not CBOR or do not hold
 * a well-formed document
 */
export function decodeAttestationDocument(
  payload: Uint8Array
): AttestationDocument {
  let raw: unknown;
  try {
    raw = cbor.decodeFirstSync(Buffer.from(payload));
  } catch (error) {
    throw new AttestationDecodeError(
      `Failed to parse attestation document: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = encodedDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AttestationDecodeError(
      `Invalid attestation document: ${parsed.error.message}`
    );
  }

  const doc = parsed.data;
  return {
    moduleId: doc.module_id,
    timestamp: doc.timestamp,
    digestAlgorithm: doc.digest_algorithm,
    digest: doc.digest,
    pcrs: doc.pcrs,
    lockedPcrs: doc.locked_pcrs,
    certificate: doc.certificate,
    cabundle: doc.cabundle,
    userData: doc.user_data,
    publicKey: doc.public_key,
    nonce: doc.nonce
  };
}
