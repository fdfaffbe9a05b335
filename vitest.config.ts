import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    setupFiles: ["packages/connector/src/__tests__/setup.ts"],
    environment: "node",
    unstubEnvs: true,
  },
});
