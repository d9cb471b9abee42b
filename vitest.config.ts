import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      AGENT_REGISTRY_NO_TELEMETRY: "1",
    },
  },
});
