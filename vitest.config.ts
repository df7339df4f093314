import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

export default defineConfig({
  test: {
    environment: "node",
    globals: true,
    testTimeout: 30000, // 30s timeout for crypto init
    include: ["tests/**/*.test.ts"],
  },
  resolve: {
    alias: {
      // CommonJS build of libsodium-wrappers
      "libsodium-wrappers": fileURLToPath(
        new URL("./node_modules/libsodium-wrappers/dist/modules/libsodium-wrappers.js", import.meta.url)
      ),
    },
  },
});
