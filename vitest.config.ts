import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["stages/*/src/__tests__/**/*.test.ts", "config/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
