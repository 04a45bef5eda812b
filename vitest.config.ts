import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*.test.ts", "tests/integration/**/*.test.ts"],
    // MuPDF compiles its WebAssembly module on first use in each worker.
    testTimeout: 30_000,
  },
});
