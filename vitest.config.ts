import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
    hookTimeout: 10000,
    clearMocks: true,
    // Placeholder env, mocked OpenAI client, silent logger
    setupFiles: ["./tests/setup.ts"],
  },
});
