import { DIGEST_LENGTH } from "nsm-sim-crypto";

export const PCR_SLOTS = 32;
export const PCR_DIGEST_LENGTH = DIGEST_LENGTH;
export const CERTIFICATE_SLOTS = 4;
/** Random bytes drawn for the module ID; hex encoding doubles the length */
export const MODULE_ID_BYTES = 16;
export const MODULE_ID_LENGTH = MODULE_ID_BYTES * 2;
/**
 * Upper bound for `user_data`, `public_key` and `nonce` in an attestation
 * document, as enforced by the Nitro hypervisor.
 */
export const MAX_ATTESTATION_FIELD_LENGTH = 1024;
