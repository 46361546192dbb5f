import {
  CryptoProvider,
  DigestFunction,
  RandomSource,
  SeededRandomSource,
  createDigestFunction,
  processRandom
} from "nsm-sim-crypto";
import { AttestationAggregator } from "@/attestation/aggregator";
import { SessionConfig, SessionConfigInput, sessionConfigSchema } from "@/config";
import { MODULE_ID_BYTES } from "@/constants";
import { CertificateStore } from "@/state/certificateStore";
import { MeasurementBank } from "@/state/measurementBank";
import { uint8ToHex } from "@/utils";
import { Session, SessionComponents } from "./session";
import { Logger, SessionCallbacks } from "./types";

// Config fields plus injected collaborators; injected ones take precedence
export type CreateSessionOptions = SessionConfigInput & {
  random?: RandomSource;
  digest?: DigestFunction;
  callbacks?: SessionCallbacks;
  logger?: Logger;
  now?: () => number;
};

function createCryptoProvider(
  config: SessionConfig,
  random?: RandomSource,
  digest?: DigestFunction
): CryptoProvider {
  return {
    digest: digest ?? createDigestFunction(config.digestAlgorithm),
    random:
      random ??
      (config.randomSeed !== undefined
        ? new SeededRandomSource(config.randomSeed)
        : processRandom.get())
  };
}

function createSessionComponents(
  crypto: CryptoProvider,
  now: () => number
): SessionComponents {
  const moduleId = uint8ToHex(crypto.random.randomBytes(MODULE_ID_BYTES));
  const bank = new MeasurementBank(crypto.digest);
  const certificates = new CertificateStore();
  const aggregator = new AttestationAggregator(bank, crypto.digest);

  return {
    moduleId,
    bank,
    certificates,
    aggregator,
    random: crypto.random,
    now
  };
}

/**
 * Factory method to create an open Session with zeroed PCRs and empty
 * certificate slots
 * @param {CreateSessionOptions} options - configuration and injected collaborators
 * @throws {ZodError} if the configuration is invalid
 */
export const createSession = (options: CreateSessionOptions = {}): Session => {
  const { random, digest, callbacks, logger, now, ...configInput } = options;
  const config = sessionConfigSchema.parse(configInput);
  const crypto = createCryptoProvider(config, random, digest);
  const components = createSessionComponents(crypto, now ?? Date.now);

  return new Session(
    components,
    callbacks,
    config.verbose ? (logger ?? console) : undefined
  );
};

/**
 * Closes the session and releases everything it owns. Safe to call more than
 * once; the session rejects every later operation with `SessionClosedError`.
 */
export const destroySession = (session: Session): void => {
  session.destroy();
};
