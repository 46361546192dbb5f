import { it, expect, describe } from "vitest";
import { ZodError } from "zod";
import { sessionConfigFromEnv, sessionConfigSchema } from "../src/config";

describe("sessionConfigSchema", () => {
  it("fills in defaults", () => {
    expect(sessionConfigSchema.parse({})).toEqual({
      digestAlgorithm: "sha256",
      verbose: false
    });
  });

  it("rejects unknown digests", () => {
    expect(() => sessionConfigSchema.parse({ digestAlgorithm: "md5" })).toThrow(
      ZodError
    );
  });

  it("rejects fractional seeds", () => {
    expect(() => sessionConfigSchema.parse({ randomSeed: 1.5 })).toThrow(
      ZodError
    );
  });
});

describe("sessionConfigFromEnv", () => {
  it("uses defaults for an empty environment", () => {
    expect(sessionConfigFromEnv({})).toEqual({
      digestAlgorithm: "sha256",
      verbose: false
    });
  });

  it("reads every variable", () => {
    expect(
      sessionConfigFromEnv({
        NSM_SIM_DIGEST: "mixer",
        NSM_SIM_RANDOM_SEED: "42",
        NSM_SIM_VERBOSE: "true",
        PATH: "/usr/bin"
      })
    ).toEqual({
      digestAlgorithm: "mixer",
      randomSeed: 42,
      verbose: true
    });
  });

  it("accepts 0 and 1 for verbose", () => {
    expect(sessionConfigFromEnv({ NSM_SIM_VERBOSE: "1" }).verbose).toBe(true);
    expect(sessionConfigFromEnv({ NSM_SIM_VERBOSE: "0" }).verbose).toBe(false);
  });

  it("treats empty variables as unset", () => {
    expect(
      sessionConfigFromEnv({ NSM_SIM_DIGEST: "", NSM_SIM_RANDOM_SEED: "" })
    ).toEqual({
      digestAlgorithm: "sha256",
      verbose: false
    });
  });

  it.each([
    { NSM_SIM_DIGEST: "md5" },
    { NSM_SIM_RANDOM_SEED: "-1" },
    { NSM_SIM_RANDOM_SEED: "seed" },
    { NSM_SIM_VERBOSE: "yes" }
  ])("rejects %o", (env) => {
    expect(() => sessionConfigFromEnv(env)).toThrow(ZodError);
  });
});
