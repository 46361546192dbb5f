import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  plugins: [],
  test: {
    globals: true,
    include: ["ts/*/__tests/**/*.test.ts"],
    coverage: {
      include: ["ts/*/src/**/*.ts"],
      reporter: ["text", "json-summary"]
    }
  },
  resolve: {
    alias: {
      "@": fromRoot("./ts/nsm-sim/src"),
      "nsm-sim-crypto": fromRoot("./ts/nsm-sim-crypto/src/index.ts")
    }
  }
});
