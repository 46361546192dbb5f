import { z } from "zod";
import { digestAlgorithms } from "nsm-sim-crypto";

export const sessionConfigSchema = z.object({
  digestAlgorithm: z.enum(digestAlgorithms).default("sha256"),
  // when set, the session draws from a deterministic seeded stream
  randomSeed: z.number().int().nonnegative().optional(),
  verbose: z.boolean().default(false)
});

export type SessionConfig = z.infer<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

const booleanFromEnv = z
  .enum(["1", "0", "true", "false"])
  .transform((value) => value === "1" || value === "true");

const envSchema = z.object({
  NSM_SIM_DIGEST: z.enum(digestAlgorithms).optional(),
  NSM_SIM_RANDOM_SEED: z.coerce.number().int().nonnegative().optional(),
  NSM_SIM_VERBOSE: booleanFromEnv.optional()
});

/**
 * Reads session configuration from environment variables:
 * `NSM_SIM_DIGEST`, `NSM_SIM_RANDOM_SEED` and `NSM_SIM_VERBOSE`.
 * Empty variables count as unset.
 * @throws {ZodError} if a variable holds an invalid value
 */
export function sessionConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): SessionConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = envSchema.parse(present);
  return sessionConfigSchema.parse({
    digestAlgorithm: parsed.NSM_SIM_DIGEST,
    randomSeed: parsed.NSM_SIM_RANDOM_SEED,
    verbose: parsed.NSM_SIM_VERBOSE
  });
}
