import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["lib/__tests__/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    environment: "node",
    clearMocks: true,
    testTimeout: 10_000,
  },
})
