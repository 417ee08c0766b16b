import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    include: ["test/**/*.test.ts"],
    env: {
      UTTERD_LOG_LEVEL: "silent",
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      // cli.ts and the daemon spawn path need a built dist/ and a real desktop
      include: [
        "src/framing.ts",
        "src/scope.ts",
        "src/grammar.ts",
        "src/registry.ts",
        "src/processor.ts",
        "src/dispatcher.ts",
        "src/server.ts",
        "src/config.ts",
        "src/protocol.ts",
      ],
    },
  },
});
