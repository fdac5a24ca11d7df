import { fileURLToPath } from "node:url"

import { defineConfig } from "vitest/config"

const coverageEnabled = process.env.VITEST_COVERAGE === "true"

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    pool: "forks",
    environment: "node",
    globals: true,
    setupFiles: ["src/test/setup.ts"],
    include: ["src/**/*.test.ts"],
    coverage: {
      enabled: coverageEnabled,
      provider: "v8",
      reporter: ["text", "html"],
      reportsDirectory: "coverage",
      include: ["src/**/*.ts"],
      exclude: [
        // Do not count test helpers toward coverage
        "src/test/**",
        "src/**/*.test.*",
      ],
    },
  },
})
