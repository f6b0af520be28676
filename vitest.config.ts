import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    testTimeout: 30000, // 30s timeout for crypto init
    include: ["tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      // Force CJS resolution for libsodium-wrappers (ESM build is broken)
      "libsodium-wrappers": fileURLToPath(
        new URL(
          "./node_modules/libsodium-wrappers/dist/modules/libsodium-wrappers.js",
          import.meta.url
        )
      ),
    },
  },
});
